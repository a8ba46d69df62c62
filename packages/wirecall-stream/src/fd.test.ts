import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { FdChannel } from "./fd.ts";
import { readExactSync, readChunkSync } from "./channel.ts";

describe("FdChannel", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "wirecall-fd-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("writes bytes that read back from the same file", () => {
    const file = path.join(dir, "stream.bin");
    const writer = new FdChannel(fs.openSync(file, "w"));
    const payload = new Uint8Array(256 * 1024).map((_, i) => i & 0xff);
    writer.write(payload);
    writer.close();

    const reader = new FdChannel(fs.openSync(file, "r"));
    expect(readExactSync(reader, payload.length)).toEqual(payload);
    expect(readChunkSync(reader, 16)).toBeNull();
    reader.close();
  });

  it("reports end of file as TransportEOF on an exact read", () => {
    const file = path.join(dir, "short.bin");
    fs.writeFileSync(file, Uint8Array.of(1, 2));
    const reader = new FdChannel(fs.openSync(file, "r"));

    expect(() => readExactSync(reader, 3)).toThrow("stream ended after 2 of 3 bytes");
    reader.close();
  });

  it("refuses use after close", () => {
    const file = path.join(dir, "closed.bin");
    const channel = new FdChannel(fs.openSync(file, "w"));
    channel.close();
    expect(() => channel.write(Uint8Array.of(1))).toThrow("channel is closed");
  });
});
