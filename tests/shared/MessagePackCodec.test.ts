import { describe, it, expect } from "vitest";
import { encodeMsgPack, decodeMessage } from "../../src/shared/MessagePackCodec";

describe("MessagePackCodec", () => {
  describe("encodeMsgPack", () => {
    it("debe serializar a Buffer", () => {
      const encoded = encodeMsgPack({ type: "STATE", tick: 4 });

      expect(Buffer.isBuffer(encoded)).toBe(true);
      expect(encoded.length).toBeGreaterThan(0);
    });
  });

  describe("decodeMessage", () => {
    it("debe deserializar string JSON", () => {
      expect(decodeMessage('{"type":"RESET"}')).toEqual({ type: "RESET" });
    });

    it("debe deserializar Buffer MessagePack", () => {
      const data = { type: "ADD_ORDER", x: 10, y: 3 };
      expect(decodeMessage(encodeMsgPack(data))).toEqual(data);
    });

    it("debe deserializar ArrayBuffer", () => {
      const encoded = encodeMsgPack({ type: "RESET" });
      const arrayBuffer = new ArrayBuffer(encoded.length);
      new Uint8Array(arrayBuffer).set(encoded);

      expect(decodeMessage(arrayBuffer)).toEqual({ type: "RESET" });
    });

    it("debe hacer fallback a JSON si MsgPack falla", () => {
      expect(decodeMessage(Buffer.from('{"test":123}'))).toEqual({ test: 123 });
    });

    it("debe lanzar con texto que no es JSON", () => {
      expect(() => decodeMessage("no es json")).toThrow(SyntaxError);
    });
  });
});
