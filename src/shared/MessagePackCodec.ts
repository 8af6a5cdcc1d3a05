import { encode, decode } from "@msgpack/msgpack";
import { logger } from "../infrastructure/utils/logger";
import { LogCategory } from "./constants/LogEnums";

/**
 * Wire codec of the mission stream. Outgoing frames are always MessagePack;
 * incoming frames may be MessagePack or JSON text.
 */
export function encodeMsgPack<T>(frame: T): Buffer {
  return Buffer.from(encode(frame));
}

/**
 * Text frames are parsed as JSON. Binary frames are tried as MessagePack
 * first, then as UTF-8 JSON. The result is untrusted.
 */
export function decodeMessage(raw: string | Buffer | ArrayBuffer): unknown {
  if (typeof raw === "string") {
    return JSON.parse(raw);
  }

  const bytes = raw instanceof ArrayBuffer ? Buffer.from(raw) : raw;
  try {
    return decode(bytes);
  } catch (error) {
    logger.debug("Binary frame is not MessagePack, trying JSON", LogCategory.TRANSPORT, {
      error: error instanceof Error ? error.message : String(error),
    });
    return JSON.parse(bytes.toString("utf-8"));
  }
}
