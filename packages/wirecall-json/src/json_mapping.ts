// Schema-driven mapping between application values and JSON values.
//
// The same schemas that drive postcard decide the JSON shape:
//   - integers are numbers (64-bit ones may be bigint, printed exactly)
//   - bytes are arrays of numbers, sequences and tuples are arrays
//   - options are null or the inner value
//   - maps are objects keyed by the string or integer key
//   - structs are objects; a missing option field reads as null
//   - enums are externally tagged: "Unit", {"Newtype": v},
//     {"Tuple": [a, b]}, {"Struct": {...}}
//   - non-finite floats are written as null, and null reads back as NaN

import {
  resolveSchema,
  findVariantByName,
  variantSlots,
  isRecord,
  isTagged,
  describeValue,
  type Schema,
  type SchemaRegistry,
  type EnumSchema,
  type EnumVariant,
  type MapSchema,
  type StructSchema,
  type TaggedValue,
} from "@wirecall/postcard";
import { isJsonObject, setJsonProperty, type JsonObject, type JsonValue } from "./json_text.ts";

type IntegerKind = "u8" | "u16" | "u32" | "i8" | "i16" | "i32";

const INTEGER_RANGES: Record<IntegerKind, [number, number]> = {
  u8: [0, 0xff],
  u16: [0, 0xffff],
  u32: [0, 0xffff_ffff],
  i8: [-0x80, 0x7f],
  i16: [-0x8000, 0x7fff],
  i32: [-0x8000_0000, 0x7fff_ffff],
};

const BIG_RANGES = {
  u64: [0n, (1n << 64n) - 1n],
  i64: [-(1n << 63n), (1n << 63n) - 1n],
} as const;

function isIntegerKind(kind: string): kind is IntegerKind {
  return Object.hasOwn(INTEGER_RANGES, kind);
}

/** Path into the value being mapped, for error messages. */
class MappingPath {
  private segments: string[] = [];

  enter<T>(segment: string, fn: () => T): T {
    this.segments.push(segment);
    try {
      return fn();
    } finally {
      this.segments.pop();
    }
  }

  error(message: string): Error {
    return new Error(this.segments.length === 0 ? message : `${message} (at ${this.segments.join(".")})`);
  }
}

function describeJson(value: JsonValue | undefined): string {
  if (value === undefined) return "nothing";
  if (isJsonObject(value)) return "object";
  return describeValue(value);
}

// ============================================================================
// Numbers
// ============================================================================

function integerToJson(value: unknown, kind: IntegerKind, path: MappingPath): number {
  const [min, max] = INTEGER_RANGES[kind];
  if (typeof value !== "number" || !Number.isInteger(value) || value < min || value > max) {
    throw path.error(`${kind}: expected an integer in [${min}, ${max}], got ${describeValue(value)}`);
  }
  return value;
}

function integerFromJson(json: JsonValue, kind: IntegerKind, path: MappingPath): number {
  const [min, max] = INTEGER_RANGES[kind];
  const n = typeof json === "bigint" ? Number(json) : json;
  if (typeof n !== "number" || !Number.isInteger(n) || n < min || n > max) {
    throw path.error(`${kind}: expected an integer in [${min}, ${max}], got ${describeJson(json)}`);
  }
  return n;
}

function bigToJson(value: unknown, kind: "u64" | "i64", path: MappingPath): number | bigint {
  const [min, max] = BIG_RANGES[kind];
  let n: bigint;
  if (typeof value === "bigint") {
    n = value;
  } else if (typeof value === "number" && Number.isSafeInteger(value)) {
    n = BigInt(value);
  } else {
    throw path.error(`${kind}: expected a bigint or safe integer, got ${describeValue(value)}`);
  }
  if (n < min || n > max) throw path.error(`${kind}: ${n} out of range`);
  return Number.isSafeInteger(Number(n)) ? Number(n) : n;
}

function bigFromJson(json: JsonValue, kind: "u64" | "i64", path: MappingPath): bigint {
  const [min, max] = BIG_RANGES[kind];
  let n: bigint;
  if (typeof json === "bigint") {
    n = json;
  } else if (typeof json === "number" && Number.isSafeInteger(json)) {
    n = BigInt(json);
  } else {
    throw path.error(`${kind}: expected an integer, got ${describeJson(json)}`);
  }
  if (n < min || n > max) throw path.error(`${kind}: ${n} out of range`);
  return n;
}

function floatFromJson(json: JsonValue, kind: string, path: MappingPath): number {
  if (json === null) return Number.NaN;
  if (typeof json === "number") return json;
  if (typeof json === "bigint") return Number(json);
  throw path.error(`${kind}: expected a number, got ${describeJson(json)}`);
}

// ============================================================================
// Value -> JSON
// ============================================================================

/**
 * Map a value to its JSON form.
 *
 * @throws Error when the value does not match the schema
 */
export function toJson(value: unknown, schema: Schema, registry?: SchemaRegistry): JsonValue {
  return writeValue(value, schema, registry, new MappingPath());
}

function writeValue(value: unknown, schema: Schema, registry: SchemaRegistry | undefined, path: MappingPath): JsonValue {
  const resolved = resolveSchema(schema, registry);
  const kind = resolved.kind;
  if (isIntegerKind(kind)) return integerToJson(value, kind, path);

  switch (resolved.kind) {
    case "bool":
      if (typeof value !== "boolean") throw path.error(`bool: expected a boolean, got ${describeValue(value)}`);
      return value;
    case "u64":
    case "i64":
      return bigToJson(value, resolved.kind, path);
    case "f32":
    case "f64":
      if (typeof value !== "number") {
        throw path.error(`${resolved.kind}: expected a number, got ${describeValue(value)}`);
      }
      return Number.isFinite(value) ? value : null;
    case "string":
      if (typeof value !== "string") throw path.error(`string: expected a string, got ${describeValue(value)}`);
      return value;
    case "bytes":
      if (!(value instanceof Uint8Array)) {
        throw path.error(`bytes: expected a Uint8Array, got ${describeValue(value)}`);
      }
      return Array.from(value);
    case "unit":
      if (value !== null && value !== undefined) {
        throw path.error(`unit: expected null, got ${describeValue(value)}`);
      }
      return null;
    case "vec": {
      if (!Array.isArray(value)) throw path.error(`vec: expected an array, got ${describeValue(value)}`);
      const element = resolved.element;
      const items: unknown[] = value;
      return items.map((item, i) => path.enter(`[${i}]`, () => writeValue(item, element, registry, path)));
    }
    case "option": {
      if (value === null || value === undefined) return null;
      const inner = resolved.inner;
      const present: unknown = value;
      return path.enter("Some", () => writeValue(present, inner, registry, path));
    }
    case "map":
      return writeMap(value, resolved, registry, path);
    case "struct":
      if (!isRecord(value)) throw path.error(`struct: expected an object, got ${describeValue(value)}`);
      return writeFields(value, Object.entries(resolved.fields), registry, path);
    case "tuple": {
      const elements = resolved.elements;
      if (!Array.isArray(value) || value.length !== elements.length) {
        throw path.error(`tuple: expected an array of ${elements.length} elements, got ${describeValue(value)}`);
      }
      const items: unknown[] = value;
      return elements.map((element, i) => path.enter(`${i}`, () => writeValue(items[i], element, registry, path)));
    }
    case "enum":
      return writeEnum(value, resolved, registry, path);
    default:
      throw path.error(`Unsupported schema kind: ${kind}`);
  }
}

function writeFields(
  value: Record<string, unknown>,
  fields: Array<[string, Schema]>,
  registry: SchemaRegistry | undefined,
  path: MappingPath,
): JsonObject {
  const out: JsonObject = {};
  for (const [name, fieldSchema] of fields) {
    setJsonProperty(out, name, path.enter(name, () => writeValue(value[name], fieldSchema, registry, path)));
  }
  return out;
}

function mapKeyToJson(key: unknown, schema: Schema, registry: SchemaRegistry | undefined, path: MappingPath): string {
  const json = writeValue(key, schema, registry, path);
  if (typeof json === "string" || typeof json === "number" || typeof json === "bigint") return String(json);
  throw path.error(`map: keys must be strings or integers, got ${describeValue(key)}`);
}

function writeMap(value: unknown, schema: MapSchema, registry: SchemaRegistry | undefined, path: MappingPath): JsonObject {
  if (!(value instanceof Map)) throw path.error(`map: expected a Map, got ${describeValue(value)}`);
  const out: JsonObject = {};
  let i = 0;
  for (const [k, v] of value) {
    const key = path.enter(`{key ${i}}`, () => mapKeyToJson(k, schema.key, registry, path));
    setJsonProperty(out, key, path.enter(key, () => writeValue(v, schema.value, registry, path)));
    i++;
  }
  return out;
}

function writeEnum(value: unknown, schema: EnumSchema, registry: SchemaRegistry | undefined, path: MappingPath): JsonValue {
  if (!isTagged(value)) throw path.error(`enum: expected a { tag } object, got ${describeValue(value)}`);
  const tagged = value;
  const variant = findVariantByName(schema, tagged.tag);
  if (!variant) throw path.error(`Unknown variant: ${tagged.tag}`);

  const fields = variant.fields;
  const payload = path.enter(variant.name, (): JsonValue | undefined => {
    switch (fields.kind) {
      case "unit":
        return undefined;
      case "newtype":
        return path.enter("value", () => writeValue(tagged.value, fields.inner, registry, path));
      case "tuple":
        return fields.elements.map((element, i) =>
          path.enter(`${i}`, () => writeValue(tagged[String(i)], element, registry, path)),
        );
      case "struct":
        return writeFields(tagged, Object.entries(fields.fields), registry, path);
    }
  });
  if (payload === undefined) return variant.name;
  const out: JsonObject = {};
  setJsonProperty(out, variant.name, payload);
  return out;
}

// ============================================================================
// JSON -> Value
// ============================================================================

/**
 * Map a JSON value back to an application value.
 *
 * @throws Error when the JSON does not have the shape the schema describes
 */
export function fromJson(json: JsonValue, schema: Schema, registry?: SchemaRegistry): unknown {
  return readValue(json, schema, registry, new MappingPath());
}

function readValue(json: JsonValue, schema: Schema, registry: SchemaRegistry | undefined, path: MappingPath): unknown {
  const resolved = resolveSchema(schema, registry);
  const kind = resolved.kind;
  if (isIntegerKind(kind)) return integerFromJson(json, kind, path);

  switch (resolved.kind) {
    case "bool":
      if (typeof json !== "boolean") throw path.error(`bool: expected a boolean, got ${describeJson(json)}`);
      return json;
    case "u64":
    case "i64":
      return bigFromJson(json, resolved.kind, path);
    case "f32":
    case "f64":
      return floatFromJson(json, resolved.kind, path);
    case "string":
      if (typeof json !== "string") throw path.error(`string: expected a string, got ${describeJson(json)}`);
      return json;
    case "bytes": {
      if (!Array.isArray(json)) throw path.error(`bytes: expected an array, got ${describeJson(json)}`);
      return Uint8Array.from(json, (item, i) => path.enter(`[${i}]`, () => integerFromJson(item, "u8", path)));
    }
    case "unit":
      if (json !== null) throw path.error(`unit: expected null, got ${describeJson(json)}`);
      return null;
    case "vec": {
      if (!Array.isArray(json)) throw path.error(`vec: expected an array, got ${describeJson(json)}`);
      const element = resolved.element;
      return json.map((item, i) => path.enter(`[${i}]`, () => readValue(item, element, registry, path)));
    }
    case "option": {
      if (json === null) return null;
      const inner = resolved.inner;
      const present = json;
      return path.enter("Some", () => readValue(present, inner, registry, path));
    }
    case "map":
      return readMap(json, resolved, registry, path);
    case "struct":
      return readStruct(json, resolved, registry, path);
    case "tuple": {
      const elements = resolved.elements;
      if (!Array.isArray(json) || json.length !== elements.length) {
        throw path.error(`tuple: expected an array of ${elements.length} elements, got ${describeJson(json)}`);
      }
      const items = json;
      return elements.map((element, i) => path.enter(`${i}`, () => readValue(items[i], element, registry, path)));
    }
    case "enum":
      return readEnum(json, resolved, registry, path);
    default:
      throw path.error(`Unsupported schema kind: ${kind}`);
  }
}

function isOptional(schema: Schema, registry: SchemaRegistry | undefined): boolean {
  return resolveSchema(schema, registry).kind === "option";
}

function readFields(
  json: JsonObject,
  fields: Array<[string, Schema]>,
  registry: SchemaRegistry | undefined,
  path: MappingPath,
): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [name, fieldSchema] of fields) {
    if (!Object.hasOwn(json, name)) {
      if (isOptional(fieldSchema, registry)) {
        out[name] = null;
        continue;
      }
      throw path.error(`missing field ${name}`);
    }
    out[name] = path.enter(name, () => readValue(json[name], fieldSchema, registry, path));
  }
  return out;
}

function readStruct(
  json: JsonValue,
  schema: StructSchema,
  registry: SchemaRegistry | undefined,
  path: MappingPath,
): Record<string, unknown> {
  if (!isJsonObject(json)) throw path.error(`struct: expected an object, got ${describeJson(json)}`);
  return readFields(json, Object.entries(schema.fields), registry, path);
}

function mapKeyFromJson(key: string, schema: Schema, registry: SchemaRegistry | undefined, path: MappingPath): unknown {
  const resolved = resolveSchema(schema, registry);
  if (resolved.kind === "string") return key;
  if (!/^-?\d+$/.test(key)) throw path.error(`map: key ${JSON.stringify(key)} is not an integer`);
  const n = Number(key);
  return readValue(Number.isSafeInteger(n) ? n : BigInt(key), resolved, registry, path);
}

function readMap(
  json: JsonValue,
  schema: MapSchema,
  registry: SchemaRegistry | undefined,
  path: MappingPath,
): Map<unknown, unknown> {
  if (!isJsonObject(json)) throw path.error(`map: expected an object, got ${describeJson(json)}`);
  const out = new Map<unknown, unknown>();
  for (const [key, item] of Object.entries(json)) {
    path.enter(key, () => {
      out.set(mapKeyFromJson(key, schema.key, registry, path), readValue(item, schema.value, registry, path));
    });
  }
  return out;
}

/** Split an externally tagged enum into its variant name and payload. */
function splitTagged(json: JsonValue, path: MappingPath): [name: string, payload: JsonValue | undefined] {
  if (typeof json === "string") return [json, undefined];
  if (!isJsonObject(json)) {
    throw path.error(`enum: expected a string or an object, got ${describeJson(json)}`);
  }
  const keys = Object.keys(json);
  if (keys.length !== 1) {
    throw path.error(`enum: expected an object with exactly one key, got ${keys.length}`);
  }
  return [keys[0], json[keys[0]]];
}

function readEnum(json: JsonValue, schema: EnumSchema, registry: SchemaRegistry | undefined, path: MappingPath): TaggedValue {
  const [name, payload] = splitTagged(json, path);

  const variant = findVariantByName(schema, name);
  if (!variant) {
    throw path.error(`Unknown variant: ${name}, expected one of ${schema.variants.map((v) => v.name).join(", ")}`);
  }

  const fields = variant.fields;
  return path.enter(variant.name, (): TaggedValue => {
    if (fields.kind === "unit") {
      if (payload !== undefined && payload !== null) {
        throw path.error(`unit variant ${name} takes no payload`);
      }
      return { tag: name };
    }
    if (payload === undefined) throw path.error(`variant ${name} needs a payload`);
    return readVariantPayload(name, variant, payload, registry, path);
  });
}

function readVariantPayload(
  name: string,
  variant: EnumVariant,
  payload: JsonValue,
  registry: SchemaRegistry | undefined,
  path: MappingPath,
): TaggedValue {
  const fields = variant.fields;
  switch (fields.kind) {
    case "unit":
      return { tag: name };
    case "newtype":
      return { tag: name, value: readValue(payload, fields.inner, registry, path) };
    case "tuple": {
      const slots = variantSlots(variant);
      if (!Array.isArray(payload) || payload.length !== slots.length) {
        throw path.error(`variant ${name}: expected an array of ${slots.length} elements`);
      }
      const items = payload;
      const out: TaggedValue = { tag: name };
      slots.forEach(([key, slotSchema], i) => {
        out[key] = path.enter(key, () => readValue(items[i], slotSchema, registry, path));
      });
      return out;
    }
    case "struct":
      if (!isJsonObject(payload)) throw path.error(`variant ${name}: expected an object, got ${describeJson(payload)}`);
      return { ...readFields(payload, Object.entries(fields.fields), registry, path), tag: name };
  }
}
