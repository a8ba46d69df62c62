// Schema-driven encoding/decoding for postcard format.
//
// Values are checked against their schema while encoding, so a mismatched
// value fails here instead of producing bytes the peer cannot read.

import type {
  Schema,
  SchemaRegistry,
  EnumSchema,
  StructSchema,
  TupleSchema,
  VecSchema,
  OptionSchema,
  MapSchema,
} from "./schema.ts";
import {
  resolveSchema,
  findVariantByDiscriminant,
  findVariantByName,
  variantDiscriminant,
  variantSlots,
  isRecord,
  isTagged,
  schemaToString,
} from "./schema.ts";
import {
  type DecodeResult,
  encodeBool,
  decodeBool,
  encodeU8,
  decodeU8,
  encodeI8,
  decodeI8,
  encodeU16,
  decodeU16,
  encodeI16,
  decodeI16,
  encodeU32,
  decodeU32,
  encodeI32,
  decodeI32,
  encodeU64,
  decodeU64,
  encodeI64,
  decodeI64,
  encodeF32,
  decodeF32,
  encodeF64,
  decodeF64,
  encodeString,
  decodeString,
  encodeBytes,
  decodeBytes,
  describeValue,
} from "./primitives.ts";
import { encodeVarint, decodeVarintNumber } from "./binary/varint.ts";
import { concat, hexBytes } from "./binary/bytes.ts";

/** Prefix shared by every error raised through a CodecContext. */
const CODEC_ERROR = "Codec error:";

// ============================================================================
// Codec Context - tracks path for error reporting
// ============================================================================

/**
 * Tracks the path through the schema so a failure deep inside a value says
 * where it happened (`args.1.cause.Some`).
 */
class CodecContext {
  private path: string[] = [];

  constructor(private readonly buf: Uint8Array | null) {}

  push(segment: string): void {
    this.path.push(segment);
  }

  pop(): void {
    this.path.pop();
  }

  currentPath(): string {
    return this.path.length === 0 ? "<root>" : this.path.join(".");
  }

  error(message: string, schema: Schema, offset?: number): Error {
    const details = [`${message}`, `Path: ${this.currentPath()}`, `Schema: ${schemaToString(schema)}`];
    if (this.buf !== null && offset !== undefined) {
      details.push(
        `Offset: ${offset} (0x${offset.toString(16)}) of ${this.buf.length}`,
        `Bytes: ${hexBytes(this.buf, offset - 8, offset + 24, offset)}`,
      );
    }
    return new Error(`${CODEC_ERROR} ${details.join("\n  ")}`);
  }

  /** Run `fn`, attaching path context to the first error raised inside it. */
  wrap<T>(schema: Schema, offset: number | undefined, fn: () => T): T {
    try {
      return fn();
    } catch (e) {
      if (e instanceof Error && e.message.startsWith(CODEC_ERROR)) throw e;
      throw this.error(e instanceof Error ? e.message : String(e), schema, offset);
    }
  }
}

// ============================================================================
// Schema-driven Encoding
// ============================================================================

/**
 * Encode a value according to its schema.
 *
 * @throws Error when the value does not match the schema
 */
export function encodeWithSchema(value: unknown, schema: Schema, registry?: SchemaRegistry): Uint8Array {
  return encodeImpl(value, schema, registry, new CodecContext(null));
}

function encodeImpl(
  value: unknown,
  schema: Schema,
  registry: SchemaRegistry | undefined,
  ctx: CodecContext,
): Uint8Array {
  const resolved = ctx.wrap(schema, undefined, () => resolveSchema(schema, registry));

  return ctx.wrap(resolved, undefined, () => {
    switch (resolved.kind) {
      case "bool":
        return encodeBool(value);
      case "u8":
        return encodeU8(value);
      case "i8":
        return encodeI8(value);
      case "u16":
        return encodeU16(value);
      case "i16":
        return encodeI16(value);
      case "u32":
        return encodeU32(value);
      case "i32":
        return encodeI32(value);
      case "u64":
        return encodeU64(value);
      case "i64":
        return encodeI64(value);
      case "f32":
        return encodeF32(value);
      case "f64":
        return encodeF64(value);
      case "string":
        return encodeString(value);
      case "bytes":
        return encodeBytes(value);
      case "unit":
        if (value !== null && value !== undefined) {
          throw new Error(`unit: expected null, got ${describeValue(value)}`);
        }
        return new Uint8Array(0);
      case "vec":
        return encodeVec(value, resolved, registry, ctx);
      case "option":
        return encodeOption(value, resolved, registry, ctx);
      case "map":
        return encodeMap(value, resolved, registry, ctx);
      case "struct":
        return encodeStruct(value, resolved, registry, ctx);
      case "tuple":
        return encodeTuple(value, resolved, registry, ctx);
      case "enum":
        return encodeEnum(value, resolved, registry, ctx);
      case "ref":
        throw new Error(`Unresolved ref: ${resolved.name}`);
    }
  });
}

function encodeVec(
  value: unknown,
  schema: VecSchema,
  registry: SchemaRegistry | undefined,
  ctx: CodecContext,
): Uint8Array {
  if (!Array.isArray(value)) throw new Error(`vec: expected an array, got ${describeValue(value)}`);
  const parts: Uint8Array[] = [encodeVarint(value.length)];
  value.forEach((item, i) => {
    ctx.push(`[${i}]`);
    parts.push(encodeImpl(item, schema.element, registry, ctx));
    ctx.pop();
  });
  return concat(...parts);
}

function encodeOption(
  value: unknown,
  schema: OptionSchema,
  registry: SchemaRegistry | undefined,
  ctx: CodecContext,
): Uint8Array {
  if (value === null || value === undefined) {
    return Uint8Array.of(0);
  }
  ctx.push("Some");
  const inner = encodeImpl(value, schema.inner, registry, ctx);
  ctx.pop();
  return concat(Uint8Array.of(1), inner);
}

function encodeMap(
  value: unknown,
  schema: MapSchema,
  registry: SchemaRegistry | undefined,
  ctx: CodecContext,
): Uint8Array {
  if (!(value instanceof Map)) throw new Error(`map: expected a Map, got ${describeValue(value)}`);
  const parts: Uint8Array[] = [encodeVarint(value.size)];
  let i = 0;
  for (const [k, v] of value) {
    ctx.push(`{key ${i}}`);
    parts.push(encodeImpl(k, schema.key, registry, ctx));
    ctx.pop();
    ctx.push(`{value ${i}}`);
    parts.push(encodeImpl(v, schema.value, registry, ctx));
    ctx.pop();
    i++;
  }
  return concat(...parts);
}

function encodeStruct(
  value: unknown,
  schema: StructSchema,
  registry: SchemaRegistry | undefined,
  ctx: CodecContext,
): Uint8Array {
  if (!isRecord(value)) throw new Error(`struct: expected an object, got ${describeValue(value)}`);
  const parts: Uint8Array[] = [];
  for (const [fieldName, fieldSchema] of Object.entries(schema.fields)) {
    ctx.push(fieldName);
    parts.push(encodeImpl(value[fieldName], fieldSchema, registry, ctx));
    ctx.pop();
  }
  return concat(...parts);
}

function encodeTuple(
  value: unknown,
  schema: TupleSchema,
  registry: SchemaRegistry | undefined,
  ctx: CodecContext,
): Uint8Array {
  if (!Array.isArray(value) || value.length !== schema.elements.length) {
    throw new Error(
      `tuple: expected an array of ${schema.elements.length} elements, got ${describeValue(value)}`,
    );
  }
  const parts = schema.elements.map((elementSchema, i) => {
    ctx.push(`${i}`);
    const part = encodeImpl(value[i], elementSchema, registry, ctx);
    ctx.pop();
    return part;
  });
  return concat(...parts);
}

function encodeEnum(
  value: unknown,
  schema: EnumSchema,
  registry: SchemaRegistry | undefined,
  ctx: CodecContext,
): Uint8Array {
  if (!isTagged(value)) throw new Error(`enum: expected a { tag } object, got ${describeValue(value)}`);
  const variant = findVariantByName(schema, value.tag);
  if (!variant) {
    throw new Error(`Unknown variant: ${value.tag}`);
  }

  const parts: Uint8Array[] = [encodeVarint(variantDiscriminant(schema, variant))];
  ctx.push(variant.name);
  for (const [key, fieldSchema] of variantSlots(variant)) {
    ctx.push(key);
    parts.push(encodeImpl(value[key], fieldSchema, registry, ctx));
    ctx.pop();
  }
  ctx.pop();
  return concat(...parts);
}

// ============================================================================
// Schema-driven Decoding
// ============================================================================

/**
 * Decode a value according to its schema.
 *
 * @returns Decoded value and the offset just past it
 * @throws Error on truncated input or input that does not match the schema
 */
export function decodeWithSchema(
  buf: Uint8Array,
  offset: number,
  schema: Schema,
  registry?: SchemaRegistry,
): DecodeResult<unknown> {
  return decodeImpl(buf, offset, schema, registry, new CodecContext(buf));
}

function decodeImpl(
  buf: Uint8Array,
  offset: number,
  schema: Schema,
  registry: SchemaRegistry | undefined,
  ctx: CodecContext,
): DecodeResult<unknown> {
  const resolved = ctx.wrap(schema, offset, () => resolveSchema(schema, registry));

  return ctx.wrap(resolved, offset, (): DecodeResult<unknown> => {
    switch (resolved.kind) {
      case "bool":
        return decodeBool(buf, offset);
      case "u8":
        return decodeU8(buf, offset);
      case "i8":
        return decodeI8(buf, offset);
      case "u16":
        return decodeU16(buf, offset);
      case "i16":
        return decodeI16(buf, offset);
      case "u32":
        return decodeU32(buf, offset);
      case "i32":
        return decodeI32(buf, offset);
      case "u64":
        return decodeU64(buf, offset);
      case "i64":
        return decodeI64(buf, offset);
      case "f32":
        return decodeF32(buf, offset);
      case "f64":
        return decodeF64(buf, offset);
      case "string":
        return decodeString(buf, offset);
      case "bytes":
        return decodeBytes(buf, offset);
      case "unit":
        return { value: null, next: offset };
      case "vec":
        return decodeVec(buf, offset, resolved, registry, ctx);
      case "option":
        return decodeOption(buf, offset, resolved, registry, ctx);
      case "map":
        return decodeMap(buf, offset, resolved, registry, ctx);
      case "struct":
        return decodeStruct(buf, offset, resolved, registry, ctx);
      case "tuple":
        return decodeTuple(buf, offset, resolved, registry, ctx);
      case "enum":
        return decodeEnum(buf, offset, resolved, registry, ctx);
      case "ref":
        throw new Error(`Unresolved ref: ${resolved.name}`);
    }
  });
}

function decodeVec(
  buf: Uint8Array,
  offset: number,
  schema: VecSchema,
  registry: SchemaRegistry | undefined,
  ctx: CodecContext,
): DecodeResult<unknown[]> {
  const len = decodeVarintNumber(buf, offset);
  // Every element takes at least one byte, except zero-sized ones.
  if (len.value > buf.length - len.next && resolveSchema(schema.element, registry).kind !== "unit") {
    throw ctx.error(`vec: length ${len.value} exceeds remaining input`, schema, offset);
  }
  let pos = len.next;
  const items: unknown[] = [];
  for (let i = 0; i < len.value; i++) {
    ctx.push(`[${i}]`);
    const item = decodeImpl(buf, pos, schema.element, registry, ctx);
    items.push(item.value);
    pos = item.next;
    ctx.pop();
  }
  return { value: items, next: pos };
}

function decodeOption(
  buf: Uint8Array,
  offset: number,
  schema: OptionSchema,
  registry: SchemaRegistry | undefined,
  ctx: CodecContext,
): DecodeResult<unknown> {
  if (offset >= buf.length) {
    throw ctx.error("option: eof", schema, offset);
  }
  const tag = buf[offset];
  if (tag === 0) {
    return { value: null, next: offset + 1 };
  }
  if (tag !== 1) {
    throw ctx.error(`option: invalid tag ${tag} (expected 0 or 1)`, schema, offset);
  }
  ctx.push("Some");
  const inner = decodeImpl(buf, offset + 1, schema.inner, registry, ctx);
  ctx.pop();
  return inner;
}

function decodeMap(
  buf: Uint8Array,
  offset: number,
  schema: MapSchema,
  registry: SchemaRegistry | undefined,
  ctx: CodecContext,
): DecodeResult<Map<unknown, unknown>> {
  const len = decodeVarintNumber(buf, offset);
  let pos = len.next;
  const map = new Map<unknown, unknown>();
  for (let i = 0; i < len.value; i++) {
    ctx.push(`{key ${i}}`);
    const k = decodeImpl(buf, pos, schema.key, registry, ctx);
    ctx.pop();
    ctx.push(`{value ${i}}`);
    const v = decodeImpl(buf, k.next, schema.value, registry, ctx);
    ctx.pop();
    map.set(k.value, v.value);
    pos = v.next;
  }
  return { value: map, next: pos };
}

function decodeStruct(
  buf: Uint8Array,
  offset: number,
  schema: StructSchema,
  registry: SchemaRegistry | undefined,
  ctx: CodecContext,
): DecodeResult<Record<string, unknown>> {
  const obj: Record<string, unknown> = {};
  let pos = offset;
  for (const [fieldName, fieldSchema] of Object.entries(schema.fields)) {
    ctx.push(fieldName);
    const field = decodeImpl(buf, pos, fieldSchema, registry, ctx);
    obj[fieldName] = field.value;
    pos = field.next;
    ctx.pop();
  }
  return { value: obj, next: pos };
}

function decodeTuple(
  buf: Uint8Array,
  offset: number,
  schema: TupleSchema,
  registry: SchemaRegistry | undefined,
  ctx: CodecContext,
): DecodeResult<unknown[]> {
  const values: unknown[] = [];
  let pos = offset;
  schema.elements.forEach((elementSchema, i) => {
    ctx.push(`${i}`);
    const element = decodeImpl(buf, pos, elementSchema, registry, ctx);
    values.push(element.value);
    pos = element.next;
    ctx.pop();
  });
  return { value: values, next: pos };
}

function decodeEnum(
  buf: Uint8Array,
  offset: number,
  schema: EnumSchema,
  registry: SchemaRegistry | undefined,
  ctx: CodecContext,
): DecodeResult<Record<string, unknown>> {
  const disc = decodeVarintNumber(buf, offset);
  const variant = findVariantByDiscriminant(schema, disc.value);
  if (!variant) {
    const valid = schema.variants.map((v, i) => `${v.discriminant ?? i}=${v.name}`).join(", ");
    throw ctx.error(`unknown enum discriminant: ${disc.value} (valid: ${valid})`, schema, offset);
  }

  ctx.push(variant.name);
  let pos = disc.next;
  const result: Record<string, unknown> = { tag: variant.name };
  for (const [key, fieldSchema] of variantSlots(variant)) {
    ctx.push(key);
    const field = decodeImpl(buf, pos, fieldSchema, registry, ctx);
    result[key] = field.value;
    pos = field.next;
    ctx.pop();
  }
  ctx.pop();
  return { value: result, next: pos };
}
