import { describe, it, expect } from "vitest";
import { t, ok, err, wireType, encodeValue, decodeValue, type TypeOf } from "./wire_type.ts";
import type { Schema } from "./schema.ts";

describe("t builders", () => {
  it("encodes tuples positionally", () => {
    const args = t.tuple(t.string, t.i32);
    const encoded = encodeValue(["the answer", 42], args);
    expect(encoded[0]).toBe(10);
    expect(new TextDecoder().decode(encoded.subarray(1, 11))).toBe("the answer");
    expect(encoded[11]).toBe(84);
    expect(encoded.length).toBe(12);
  });

  it("encodes results as a two-variant enum", () => {
    const outcome = t.result(t.string, t.u8);
    expect(encodeValue(ok("ok"), outcome)).toEqual(Uint8Array.of(0, 2, 0x6f, 0x6b));
    expect(encodeValue(err(7), outcome)).toEqual(Uint8Array.of(1, 7));
  });

  it("decodes structs to typed values", () => {
    const user = t.struct({ name: t.string, age: t.option(t.u8), tags: t.vec(t.string) });
    const value: TypeOf<typeof user> = { name: "ada", age: null, tags: ["x"] };
    const decoded = decodeValue(encodeValue(value, user), 0, user);
    expect(decoded.value).toEqual(value);
    expect(decoded.value.tags[0]).toBe("x");
  });

  it("carries registries through composite builders", () => {
    const chain: Schema = {
      kind: "struct",
      fields: {
        description: { kind: "string" },
        cause: { kind: "option", inner: { kind: "ref", name: "Chain" } },
      },
    };
    const chainType = wireType<{ description: string; cause: unknown }>(
      { kind: "ref", name: "Chain" },
      new Map<string, Schema>([["Chain", chain]]),
    );
    const list = t.vec(chainType);
    expect(list.registry?.has("Chain")).toBe(true);
    const value = [{ description: "a", cause: { description: "b", cause: null } }];
    expect(decodeValue(encodeValue(value, list), 0, list).value).toEqual(value);
  });

  it("refuses to merge conflicting registrations", () => {
    const a = wireType<unknown>({ kind: "ref", name: "X" }, new Map<string, Schema>([["X", { kind: "u8" }]]));
    const b = wireType<unknown>({ kind: "ref", name: "X" }, new Map<string, Schema>([["X", { kind: "string" }]]));
    expect(() => t.tuple(a, b)).toThrow("Conflicting schemas registered as X");
  });
});
