import { describe, it, expect } from "vitest";
import { memoryChannelPair } from "./memory.ts";
import { readExactSync, readChunkSync } from "./channel.ts";
import { RpcErrorKind } from "@wirecall/core";

function caught(fn: () => unknown): unknown {
  try {
    fn();
  } catch (e) {
    return e;
  }
  throw new Error("expected a failure");
}

describe("memoryChannelPair", () => {
  it("delivers writes to the other end", () => {
    const [a, b] = memoryChannelPair();
    a.write(Uint8Array.of(1, 2, 3));
    expect(b.pending).toBe(3);
    expect(readExactSync(b, 3)).toEqual(Uint8Array.of(1, 2, 3));
  });

  it("limits each read to maxRead bytes", () => {
    const [a, b] = memoryChannelPair({ maxRead: 2 });
    a.write(Uint8Array.of(1, 2, 3, 4, 5));
    expect(readChunkSync(b, 16)).toEqual(Uint8Array.of(1, 2));
    expect(readExactSync(b, 3)).toEqual(Uint8Array.of(3, 4, 5));
  });

  it("runs onStarved before giving up on an empty read", () => {
    const [a, b] = memoryChannelPair();
    b.onStarved = () => a.write(Uint8Array.of(42));
    expect(readExactSync(b, 1)).toEqual(Uint8Array.of(42));
  });

  it("fails with TransportError when nothing arrives", () => {
    const [, b] = memoryChannelPair();
    expect(caught(() => readExactSync(b, 1))).toMatchObject({
      kind: RpcErrorKind.TransportError,
      message: "read would block",
    });
  });

  it("reports end of stream once the peer closes and the data is drained", () => {
    const [a, b] = memoryChannelPair();
    a.write(Uint8Array.of(1));
    a.close();
    expect(readChunkSync(b, 8)).toEqual(Uint8Array.of(1));
    expect(readChunkSync(b, 8)).toBeNull();
    expect(caught(() => readExactSync(b, 1))).toMatchObject({ kind: RpcErrorKind.TransportEOF });
  });

  it("refuses writes to a closed peer", () => {
    const [a, b] = memoryChannelPair();
    b.close();
    expect(caught(() => a.write(Uint8Array.of(1)))).toMatchObject({
      kind: RpcErrorKind.TransportError,
      message: "broken pipe: peer is closed",
    });
  });

  it("copies written bytes", () => {
    const [a, b] = memoryChannelPair();
    const bytes = Uint8Array.of(5);
    a.write(bytes);
    bytes[0] = 6;
    expect(readExactSync(b, 1)).toEqual(Uint8Array.of(5));
  });
});
