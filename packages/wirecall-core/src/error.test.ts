import { describe, it, expect } from "vitest";
import { encodeValue, decodeValue } from "@wirecall/postcard";
import {
  RpcError,
  RpcErrorKind,
  GenericError,
  isRpcError,
  rpcErrorType,
  genericErrorType,
} from "./error.ts";

describe("GenericError.from", () => {
  it("follows the cause chain of Error instances", () => {
    const projected = GenericError.from(new Error("outer", { cause: new Error("inner") }));
    expect(projected.description).toBe("outer");
    expect(projected.cause?.description).toBe("inner");
    expect(projected.cause?.cause).toBeNull();
  });

  it("renders non-errors as strings", () => {
    expect(GenericError.from("plain").description).toBe("plain");
    expect(GenericError.from(42).description).toBe("42");
  });

  it("stops at a cycle", () => {
    const a = new Error("a");
    const b = new Error("b", { cause: a });
    a.cause = b;
    const projected = GenericError.from(a);
    expect(projected.toWire()).toEqual({ description: "a", cause: { description: "b", cause: null } });
  });

  it("formats the chain one cause per line", () => {
    const chain = new GenericError("outer", new GenericError("middle", new GenericError("inner")));
    expect(chain.toString()).toBe("outer caused by:\n middle caused by:\n inner");
  });
});

describe("RpcError", () => {
  it("projects its cause", () => {
    const error = RpcError.with(RpcErrorKind.Other, "failed", new Error("disk full"));
    expect(error.kind).toBe("Other");
    expect(error.message).toBe("failed");
    expect(error.cause?.description).toBe("disk full");
    expect(error.toString()).toBe("RpcError (Other): failed caused by:\n disk full");
  });

  it("has no cause unless one is given", () => {
    expect(RpcError.eof().cause).toBeNull();
    expect(RpcError.with(RpcErrorKind.Other, "x", null).cause).toBeNull();
  });

  it("is narrowed by isRpcError", () => {
    const error: unknown = RpcError.eof("gone");
    expect(isRpcError(error)).toBe(true);
    expect(isRpcError(error, RpcErrorKind.TransportEOF)).toBe(true);
    expect(isRpcError(error, RpcErrorKind.SerializationError)).toBe(false);
    expect(isRpcError(new Error("gone"))).toBe(false);
  });
});

describe("error wire types", () => {
  it("lays out RpcError as kind, msg, cause", () => {
    const encoded = encodeValue(RpcError.unknownMethod("x").toWire(), rpcErrorType);
    expect(encoded).toEqual(Uint8Array.of(1, 1, 0x78, 0));
  });

  it("encodes recursive GenericError chains", () => {
    const chain = new GenericError("a", new GenericError("b"));
    expect(encodeValue(chain.toWire(), genericErrorType)).toEqual(Uint8Array.of(1, 0x61, 1, 1, 0x62, 0));
  });

  it("survives a round trip", () => {
    const original = RpcError.serialization("bad frame", new Error("magic mismatch"));
    const decoded = decodeValue(encodeValue(original.toWire(), rpcErrorType), 0, rpcErrorType).value;
    const restored = RpcError.fromWire(decoded);
    expect(restored.kind).toBe(RpcErrorKind.SerializationError);
    expect(restored.message).toBe("bad frame");
    expect(restored.cause?.description).toBe("magic mismatch");
  });

  it("rejects unknown kinds", () => {
    expect(() => RpcError.fromWire({ kind: { tag: "Nope" }, msg: "", cause: null })).toThrow(
      "Unknown RpcErrorKind: Nope",
    );
  });
});
