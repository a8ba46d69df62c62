// Tests for schema-driven encoding/decoding

import { describe, it, expect } from "vitest";
import { encodeWithSchema, decodeWithSchema } from "./schema_codec.ts";
import type { Schema, SchemaRegistry, EnumSchema, StructSchema } from "./schema.ts";

// ============================================================================
// Test Schemas
// ============================================================================

const PointSchema: StructSchema = {
  kind: "struct",
  fields: {
    x: { kind: "i32" },
    y: { kind: "i32" },
  },
};

const ShapeSchema: EnumSchema = {
  kind: "enum",
  variants: [
    { name: "Empty", fields: { kind: "unit" } },
    { name: "Circle", fields: { kind: "newtype", inner: { kind: "f64" } } },
    { name: "Segment", fields: { kind: "tuple", elements: [PointSchema, PointSchema] } },
    { name: "Labelled", discriminant: 7, fields: { kind: "struct", fields: { label: { kind: "string" } } } },
  ],
};

const ChainSchema: StructSchema = {
  kind: "struct",
  fields: {
    description: { kind: "string" },
    cause: { kind: "option", inner: { kind: "ref", name: "Chain" } },
  },
};

const registry: SchemaRegistry = new Map<string, Schema>([["Chain", ChainSchema]]);

function roundtrip(value: unknown, schema: Schema, reg?: SchemaRegistry): unknown {
  const encoded = encodeWithSchema(value, schema, reg);
  const decoded = decodeWithSchema(encoded, 0, schema, reg);
  expect(decoded.next).toBe(encoded.length);
  return decoded.value;
}

// ============================================================================
// Layout
// ============================================================================

describe("encodeWithSchema layout", () => {
  it("writes struct fields back to back in declaration order", () => {
    expect(encodeWithSchema({ y: -3, x: 10 }, PointSchema)).toEqual(Uint8Array.of(0x14, 0x05));
  });

  it("prefixes vecs with their length", () => {
    const schema: Schema = { kind: "vec", element: { kind: "u8" } };
    expect(encodeWithSchema([7, 8, 9], schema)).toEqual(Uint8Array.of(3, 7, 8, 9));
  });

  it("tags options with a single byte", () => {
    const schema: Schema = { kind: "option", inner: { kind: "u8" } };
    expect(encodeWithSchema(5, schema)).toEqual(Uint8Array.of(1, 5));
    expect(encodeWithSchema(null, schema)).toEqual(Uint8Array.of(0));
    expect(encodeWithSchema(undefined, schema)).toEqual(Uint8Array.of(0));
  });

  it("writes enum discriminants as varints, honouring explicit ones", () => {
    expect(encodeWithSchema({ tag: "Empty" }, ShapeSchema)).toEqual(Uint8Array.of(0));
    expect(encodeWithSchema({ tag: "Labelled", label: "a" }, ShapeSchema)).toEqual(
      Uint8Array.of(7, 1, 0x61),
    );
  });

  it("writes unit as nothing", () => {
    expect(encodeWithSchema(null, { kind: "unit" })).toEqual(new Uint8Array(0));
  });

  it("follows refs through the registry for recursive types", () => {
    const value = { description: "a", cause: { description: "b", cause: null } };
    expect(encodeWithSchema(value, { kind: "ref", name: "Chain" }, registry)).toEqual(
      Uint8Array.of(1, 0x61, 1, 1, 0x62, 0),
    );
  });
});

// ============================================================================
// Round trips through the value shapes
// ============================================================================

describe("decodeWithSchema value shapes", () => {
  it("decodes every variant style", () => {
    expect(roundtrip({ tag: "Circle", value: 1.5 }, ShapeSchema)).toEqual({ tag: "Circle", value: 1.5 });
    expect(
      roundtrip({ tag: "Segment", 0: { x: 0, y: 0 }, 1: { x: 3, y: 4 } }, ShapeSchema),
    ).toEqual({ tag: "Segment", "0": { x: 0, y: 0 }, "1": { x: 3, y: 4 } });
    expect(roundtrip({ tag: "Labelled", label: "north" }, ShapeSchema)).toEqual({
      tag: "Labelled",
      label: "north",
    });
  });

  it("decodes maps into Map instances", () => {
    const schema: Schema = { kind: "map", key: { kind: "string" }, value: { kind: "i64" } };
    const value = new Map([
      ["a", 1n],
      ["b", -2n],
    ]);
    expect(roundtrip(value, schema)).toEqual(value);
  });

  it("decodes recursive values", () => {
    const value = { description: "outer", cause: { description: "inner", cause: null } };
    expect(roundtrip(value, { kind: "ref", name: "Chain" }, registry)).toEqual(value);
  });

  it("decodes from an offset and reports where it stopped", () => {
    const buf = Uint8Array.of(0xee, 0x14, 0x05, 0xee);
    expect(decodeWithSchema(buf, 1, PointSchema)).toEqual({ value: { x: 10, y: -3 }, next: 3 });
  });
});

// ============================================================================
// Errors
// ============================================================================

describe("schema codec errors", () => {
  it("names the path to a mismatched value", () => {
    const schema: StructSchema = {
      kind: "struct",
      fields: { name: { kind: "string" }, tags: { kind: "vec", element: { kind: "string" } } },
    };
    expect(() => encodeWithSchema({ name: "a", tags: ["ok", 5] }, schema)).toThrow(
      /Path: tags\.\[1\]/,
    );
  });

  it("rejects unknown variant names", () => {
    expect(() => encodeWithSchema({ tag: "Square" }, ShapeSchema)).toThrow(/Unknown variant: Square/);
  });

  it("rejects tuples of the wrong length", () => {
    const schema: Schema = { kind: "tuple", elements: [{ kind: "u8" }, { kind: "u8" }] };
    expect(() => encodeWithSchema([1], schema)).toThrow(/tuple: expected an array of 2 elements/);
  });

  it("rejects unknown discriminants with the valid set", () => {
    expect(() => decodeWithSchema(Uint8Array.of(3), 0, ShapeSchema)).toThrow(
      /unknown enum discriminant: 3 \(valid: 0=Empty, 1=Circle, 2=Segment, 7=Labelled\)/,
    );
  });

  it("rejects invalid option tags", () => {
    const schema: Schema = { kind: "option", inner: { kind: "u8" } };
    expect(() => decodeWithSchema(Uint8Array.of(2), 0, schema)).toThrow(/option: invalid tag 2/);
  });

  it("rejects vec lengths longer than the input", () => {
    const schema: Schema = { kind: "vec", element: { kind: "u8" } };
    expect(() => decodeWithSchema(Uint8Array.of(100, 1), 0, schema)).toThrow(
      /vec: length 100 exceeds remaining input/,
    );
  });

  it("reports truncated input", () => {
    expect(() => decodeWithSchema(Uint8Array.of(0x14), 0, PointSchema)).toThrow(/varint: eof/);
  });

  it("reports refs that are not registered", () => {
    expect(() => encodeWithSchema({}, { kind: "ref", name: "Missing" })).toThrow(
      /Unknown type ref: Missing/,
    );
  });
});
