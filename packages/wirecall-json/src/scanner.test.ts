import { describe, it, expect } from "vitest";
import { RpcErrorKind } from "@wirecall/core";
import { JsonScanner } from "./scanner.ts";

const encoder = new TextEncoder();
const decoder = new TextDecoder();

const STREAM = '{"a":"}","b":[{"c":"\\"]"}]}\n[1,[2]] "x\\"y" 42 \n true';
const VALUES = ['{"a":"}","b":[{"c":"\\"]"}]}', "[1,[2]]", '"x\\"y"', "42", "true"];

function caught(fn: () => unknown): unknown {
  try {
    fn();
  } catch (e) {
    return e;
  }
  throw new Error("expected a failure");
}

/** Feed `text` in chunks of `size` bytes and collect every value found. */
function scanAll(text: string, size: number, limit = 1024): string[] {
  const bytes = encoder.encode(text);
  const scanner = new JsonScanner(limit);
  const found: string[] = [];
  for (let offset = 0; offset < bytes.length; offset += size) {
    scanner.push(bytes.subarray(offset, offset + size));
    for (let value = scanner.next(); value; value = scanner.next()) {
      found.push(decoder.decode(value));
    }
  }
  for (let value = scanner.finish(); value; value = scanner.finish()) {
    found.push(decoder.decode(value));
  }
  return found;
}

describe("JsonScanner", () => {
  it("splits a stream into values", () => {
    expect(scanAll(STREAM, STREAM.length)).toEqual(VALUES);
  });

  it("finds the same values however the bytes are chunked", () => {
    for (let size = 1; size <= 16; size++) {
      expect(scanAll(STREAM, size)).toEqual(VALUES);
    }
  });

  it("completes a top-level scalar only at a delimiter or at end of stream", () => {
    const scanner = new JsonScanner(1024);
    scanner.push(encoder.encode("12"));
    expect(scanner.next()).toBeNull();
    scanner.push(encoder.encode("34"));
    expect(scanner.next()).toBeNull();
    expect(scanner.finish()).toEqual(encoder.encode("1234"));
  });

  it("keeps bytes after a value for the next read", () => {
    const scanner = new JsonScanner(1024);
    scanner.push(encoder.encode('{}\n{"par'));
    expect(scanner.next()).toEqual(encoder.encode("{}"));
    expect(scanner.next()).toBeNull();
    expect(scanner.buffered).toBe(6);
  });

  it("returns null at end of stream when only whitespace is left", () => {
    const scanner = new JsonScanner(1024);
    scanner.push(encoder.encode(" \n\t"));
    expect(scanner.finish()).toBeNull();
  });

  it("fails with TransportEOF when the stream ends inside a value", () => {
    const scanner = new JsonScanner(1024);
    scanner.push(encoder.encode('{"a":'));
    expect(caught(() => scanner.finish())).toMatchObject({
      kind: RpcErrorKind.TransportEOF,
      message: "stream ended inside a JSON value after 5 bytes",
    });
  });

  it("accepts a bare scalar exactly as long as the limit", () => {
    const scanner = new JsonScanner(4);
    scanner.push(encoder.encode("1234 12345 "));
    expect(scanner.next()).toEqual(encoder.encode("1234"));
    expect(caught(() => scanner.next())).toMatchObject({
      kind: RpcErrorKind.SerializationError,
      message: "JSON value exceeds the 4 byte limit",
    });
  });

  it("accepts a string exactly as long as the limit", () => {
    const scanner = new JsonScanner(4);
    scanner.push(encoder.encode('"ab"'));
    expect(scanner.next()).toEqual(encoder.encode('"ab"'));
  });

  it("reassembles a value larger than its internal buffer from small chunks", () => {
    const text = JSON.stringify("x".repeat(10_000));
    expect(scanAll(`${text}\n[1]`, 100, 1 << 20)).toEqual([text, "[1]"]);
  });

  it("keeps finding values across a long stream of small chunks", () => {
    const values = Array.from({ length: 2000 }, (_, i) => `{"n":${i}}`);
    expect(scanAll(values.join("\n"), 7)).toEqual(values);
  });

  it("refuses values larger than the limit", () => {
    const scanner = new JsonScanner(8);
    scanner.push(encoder.encode('"0123456789"'));
    expect(caught(() => scanner.next())).toMatchObject({
      kind: RpcErrorKind.SerializationError,
      message: "JSON value exceeds the 8 byte limit",
    });
  });
});
