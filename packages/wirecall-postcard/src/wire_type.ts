// Typed handles over schemas.
//
// A WireType<T> pairs a Schema (and the registry its refs resolve against)
// with the static type of the values it describes. Transports take a
// WireType wherever they need to know how to read or write a value; the
// builders in `t` keep the static type and the schema in step.

import type { Schema, SchemaRegistry, EnumSchema } from "./schema.ts";
import type { DecodeResult } from "./primitives.ts";
import { encodeWithSchema, decodeWithSchema } from "./schema_codec.ts";

export interface WireType<T> {
  readonly schema: Schema;
  readonly registry?: SchemaRegistry;
  /** Type-level only; never present at runtime. */
  readonly __value?: T;
}

export type TypeOf<W> = W extends WireType<infer T> ? T : never;

/** Success/failure union carried as an ordinary value. */
export type Result<T, E> = { tag: "Ok"; value: T } | { tag: "Err"; value: E };

export function ok<T>(value: T): { tag: "Ok"; value: T } {
  return { tag: "Ok", value };
}

export function err<E>(value: E): { tag: "Err"; value: E } {
  return { tag: "Err", value };
}

/** Wrap a hand-written schema, e.g. a recursive one that needs a registry. */
export function wireType<T>(schema: Schema, registry?: SchemaRegistry): WireType<T> {
  return registry ? { schema, registry } : { schema };
}

function mergeRegistries(types: ReadonlyArray<WireType<unknown>>): SchemaRegistry | undefined {
  const withRegistry = types.filter((type) => type.registry !== undefined);
  if (withRegistry.length === 0) return undefined;
  if (withRegistry.length === 1) return withRegistry[0].registry;
  const merged: SchemaRegistry = new Map();
  for (const type of withRegistry) {
    for (const [name, schema] of type.registry ?? []) {
      const existing = merged.get(name);
      if (existing && existing !== schema) {
        throw new Error(`Conflicting schemas registered as ${name}`);
      }
      merged.set(name, schema);
    }
  }
  return merged;
}

// ============================================================================
// Builders
// ============================================================================

function vec<T>(element: WireType<T>): WireType<T[]> {
  return wireType({ kind: "vec", element: element.schema }, element.registry);
}

function option<T>(inner: WireType<T>): WireType<T | null> {
  return wireType({ kind: "option", inner: inner.schema }, inner.registry);
}

function map<K, V>(key: WireType<K>, value: WireType<V>): WireType<Map<K, V>> {
  return wireType(
    { kind: "map", key: key.schema, value: value.schema },
    mergeRegistries([key, value]),
  );
}

function tuple<const E extends ReadonlyArray<WireType<unknown>>>(
  ...elements: E
): WireType<{ -readonly [K in keyof E]: TypeOf<E[K]> }> {
  return wireType(
    { kind: "tuple", elements: elements.map((e) => e.schema) },
    mergeRegistries(elements),
  );
}

function struct<F extends Record<string, WireType<unknown>>>(
  fields: F,
): WireType<{ [K in keyof F]: TypeOf<F[K]> }> {
  const schemas: Record<string, Schema> = {};
  for (const [name, field] of Object.entries(fields)) {
    schemas[name] = field.schema;
  }
  return wireType({ kind: "struct", fields: schemas }, mergeRegistries(Object.values(fields)));
}

function result<T, E>(okType: WireType<T>, errType: WireType<E>): WireType<Result<T, E>> {
  const schema: EnumSchema = {
    kind: "enum",
    variants: [
      { name: "Ok", fields: { kind: "newtype", inner: okType.schema } },
      { name: "Err", fields: { kind: "newtype", inner: errType.schema } },
    ],
  };
  return wireType(schema, mergeRegistries([okType, errType]));
}

export const t = {
  bool: wireType<boolean>({ kind: "bool" }),
  u8: wireType<number>({ kind: "u8" }),
  u16: wireType<number>({ kind: "u16" }),
  u32: wireType<number>({ kind: "u32" }),
  u64: wireType<bigint>({ kind: "u64" }),
  i8: wireType<number>({ kind: "i8" }),
  i16: wireType<number>({ kind: "i16" }),
  i32: wireType<number>({ kind: "i32" }),
  i64: wireType<bigint>({ kind: "i64" }),
  f32: wireType<number>({ kind: "f32" }),
  f64: wireType<number>({ kind: "f64" }),
  string: wireType<string>({ kind: "string" }),
  bytes: wireType<Uint8Array>({ kind: "bytes" }),
  unit: wireType<null>({ kind: "unit" }),
  vec,
  option,
  map,
  tuple,
  struct,
  result,
};

// ============================================================================
// Typed encode/decode
// ============================================================================

export function encodeValue<T>(value: T, type: WireType<T>): Uint8Array {
  return encodeWithSchema(value, type.schema, type.registry);
}

export function decodeValue<T>(buf: Uint8Array, offset: number, type: WireType<T>): DecodeResult<T> {
  return decodeWithSchema(buf, offset, type.schema, type.registry) as DecodeResult<T>;
}
