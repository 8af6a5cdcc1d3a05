import type { IncomingMessage } from "node:http";
import type { Duplex } from "node:stream";
import { WebSocketServer, WebSocket, type RawData } from "ws";
import type {
  MapeLoopRunner,
  MissionSnapshotEvent,
} from "../../../domain/simulation/core/MapeLoopRunner";
import { LogCategory } from "../../../shared/constants/LogEnums";
import { WebSocketMessageType } from "../../../shared/constants/WebSocketEnums";
import { isMissionError } from "../../../shared/errors";
import { decodeMessage, encodeMsgPack } from "../../../shared/MessagePackCodec";
import {
  parseMissionCommand,
  type CommandReceipt,
  type DashboardView,
} from "../../../shared/types/commands/MissionCommand";
import { logger } from "../../utils/logger";

interface SnapshotFrame {
  type: WebSocketMessageType.SNAPSHOT | WebSocketMessageType.STATE;
  payload: DashboardView;
}

interface AckFrame {
  type: WebSocketMessageType.ACK;
  payload: CommandReceipt;
}

interface ErrorFrame {
  type: WebSocketMessageType.ERROR;
  code?: string;
  message: string;
}

export type ServerFrame = SnapshotFrame | AckFrame | ErrorFrame;

/**
 * Minimal socket surface; `ws` sockets satisfy it.
 */
export interface FrameSink {
  readonly readyState: number;
  send(data: Buffer): void;
}

function toDecodable(data: RawData, isBinary: boolean): string | Buffer | ArrayBuffer {
  const buffer = Array.isArray(data) ? Buffer.concat(data) : data;
  if (isBinary) {
    return buffer;
  }
  return Buffer.isBuffer(buffer) ? buffer.toString("utf-8") : Buffer.from(buffer).toString("utf-8");
}

/**
 * Pushes the dashboard view to every client on `/ws/mission` and accepts
 * user commands from them.
 *
 * Frames are MessagePack: `SNAPSHOT` once on connect, `STATE` after every
 * tick or applied command, `ACK` for an accepted command and `ERROR` for a
 * rejected one.
 */
export class MissionStreamServer {
  private readonly wss: WebSocketServer;
  private readonly snapshotListener = (event: MissionSnapshotEvent): void => {
    this.broadcast({ type: WebSocketMessageType.STATE, payload: event.view });
  };

  constructor(private readonly runner: MapeLoopRunner) {
    this.wss = new WebSocketServer({ noServer: true });
    this.wss.on("connection", (ws) => this.handleConnection(ws));
    this.runner.on("snapshot", this.snapshotListener);
  }

  public get clientCount(): number {
    return this.wss.clients.size;
  }

  public handleUpgrade(
    request: IncomingMessage,
    socket: Duplex,
    head: Buffer,
  ): void {
    this.wss.handleUpgrade(request, socket, head, (ws) => {
      this.wss.emit("connection", ws, request);
    });
  }

  private handleConnection(ws: WebSocket): void {
    logger.info("Dashboard client connected", LogCategory.TRANSPORT, {
      clients: this.wss.clients.size,
    });
    ws.on("message", (data: RawData, isBinary: boolean) => {
      this.handleMessage(ws, toDecodable(data, isBinary));
    });
    ws.on("close", () => {
      logger.info("Dashboard client disconnected", LogCategory.TRANSPORT);
    });
    ws.on("error", (error) => {
      logger.warn("Dashboard socket error", LogCategory.TRANSPORT, {
        error: error.message,
      });
    });

    this.send(ws, {
      type: WebSocketMessageType.SNAPSHOT,
      payload: this.runner.getView(),
    });
  }

  /**
   * Decodes, validates and submits one client command, answering with
   * `ACK` or `ERROR` on the same socket.
   */
  public handleMessage(client: FrameSink, raw: string | Buffer | ArrayBuffer): void {
    let decoded: unknown;
    try {
      decoded = decodeMessage(raw);
    } catch (error) {
      this.send(client, {
        type: WebSocketMessageType.ERROR,
        message: `Invalid message: ${error instanceof Error ? error.message : String(error)}`,
      });
      return;
    }

    try {
      const command = parseMissionCommand(decoded);
      logger.debug(`📨 Received command: ${command.type}`, LogCategory.TRANSPORT);
      const receipt = this.runner.submit(command);
      this.send(client, { type: WebSocketMessageType.ACK, payload: receipt });
    } catch (error) {
      if (!isMissionError(error)) {
        logger.error("Failed to process client command", LogCategory.TRANSPORT, {
          error: error instanceof Error ? error.message : String(error),
        });
        this.send(client, {
          type: WebSocketMessageType.ERROR,
          message: "Failed to process command",
        });
        return;
      }
      this.send(client, {
        type: WebSocketMessageType.ERROR,
        code: error.code,
        message: error.message,
      });
    }
  }

  private broadcast(frame: ServerFrame): void {
    if (this.wss.clients.size === 0) {
      return;
    }
    const buffer = encodeMsgPack(frame);
    for (const client of this.wss.clients) {
      if (client.readyState === WebSocket.OPEN) {
        client.send(buffer);
      }
    }
  }

  private send(client: FrameSink, frame: ServerFrame): void {
    if (client.readyState === WebSocket.OPEN) {
      client.send(encodeMsgPack(frame));
    }
  }

  /**
   * Detaches from the runner and closes every client.
   */
  public close(): Promise<void> {
    this.runner.off("snapshot", this.snapshotListener);
    for (const client of this.wss.clients) {
      client.terminate();
    }
    return new Promise((resolve, reject) => {
      this.wss.close((error) => (error ? reject(error) : resolve()));
    });
  }
}
