import { describe, it, expect } from "vitest";
import { RpcErrorKind } from "@wirecall/core";
import { FRAME_MAGIC, encodeFrame, decodeFrame, parseFrameHeader } from "./framing.ts";

function caught(fn: () => unknown): unknown {
  try {
    fn();
  } catch (e) {
    return e;
  }
  throw new Error("expected a failure");
}

describe("frames", () => {
  it("lays out magic, little-endian length, payload", () => {
    expect(encodeFrame(Uint8Array.of(1, 2, 3))).toEqual(
      Uint8Array.of(0x57, 0x43, 0x52, 0x50, 0x43, 0x01, 3, 0, 0, 0, 1, 2, 3),
    );
  });

  it("reproduces large payloads exactly", () => {
    const payload = new Uint8Array(256 * 1024).map((_, i) => (i * 7) & 0xff);
    const framed = encodeFrame(payload);
    expect(framed.length).toBe(payload.length + 10);
    expect(framed.subarray(6, 10)).toEqual(Uint8Array.of(0x00, 0x00, 0x04, 0x00));

    const { payload: decoded, next } = decodeFrame(framed);
    expect(next).toBe(framed.length);
    expect(decoded).toEqual(payload);
  });

  it("decodes consecutive frames from one buffer", () => {
    const buf = Uint8Array.from([...encodeFrame(Uint8Array.of(1)), ...encodeFrame(new Uint8Array(0))]);
    const first = decodeFrame(buf);
    const second = decodeFrame(buf, first.next);
    expect(first.payload).toEqual(Uint8Array.of(1));
    expect(second.payload).toEqual(new Uint8Array(0));
    expect(second.next).toBe(buf.length);
  });

  it("rejects a wrong magic as a serialization error", () => {
    const header = Uint8Array.of(0x00, 0x43, 0x52, 0x50, 0x43, 0x01, 0, 0, 0, 0);
    expect(caught(() => parseFrameHeader(header, 100))).toMatchObject({
      kind: RpcErrorKind.SerializationError,
      message: "bad frame magic: 00 43 52 50 43 01",
    });
  });

  it("rejects lengths above the limit", () => {
    const header = Uint8Array.from([...FRAME_MAGIC, 100, 0, 0, 0]);
    expect(caught(() => parseFrameHeader(header, 10))).toMatchObject({
      kind: RpcErrorKind.SerializationError,
      message: "frame of 100 bytes exceeds the 10 byte limit",
    });
  });

  it("reports a truncated frame as end of stream", () => {
    const framed = encodeFrame(Uint8Array.of(1, 2, 3, 4));
    expect(caught(() => decodeFrame(framed.subarray(0, 12)))).toMatchObject({
      kind: RpcErrorKind.TransportEOF,
      message: "buffer holds 2 of 4 payload bytes",
    });
    expect(caught(() => decodeFrame(framed.subarray(0, 4)))).toMatchObject({ kind: RpcErrorKind.TransportEOF });
  });
});
