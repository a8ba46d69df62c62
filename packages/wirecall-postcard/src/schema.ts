// Runtime type descriptions.
//
// A Schema says how a value is laid out, so the same value can be written
// positionally (postcard) or by name (JSON) without the codec knowing the
// application's types in advance. Named types live in a SchemaRegistry and
// are referenced with `ref`, which is how recursive types are expressed.

// ============================================================================
// Primitive Schema Kinds
// ============================================================================

export type PrimitiveKind =
  | "bool"
  | "u8"
  | "u16"
  | "u32"
  | "u64"
  | "i8"
  | "i16"
  | "i32"
  | "i64"
  | "f32"
  | "f64"
  | "string"
  | "bytes"
  | "unit";

// ============================================================================
// Container Schemas
// ============================================================================

export interface VecSchema {
  kind: "vec";
  element: Schema;
}

/** Absent values are `null`. */
export interface OptionSchema {
  kind: "option";
  inner: Schema;
}

/** Values are JS `Map`s. */
export interface MapSchema {
  kind: "map";
  key: Schema;
  value: Schema;
}

// ============================================================================
// Composite Schemas
// ============================================================================

export interface StructSchema {
  kind: "struct";
  /** Fields in declaration order. Order is significant for encoding! */
  fields: Record<string, Schema>;
}

/** Fixed-size tuple, encoded as its elements back to back. */
export interface TupleSchema {
  kind: "tuple";
  elements: Schema[];
}

/**
 * Payload carried by an enum variant.
 *
 * Decoded variant values are objects with a `tag` naming the variant, plus:
 * - nothing, for unit variants
 * - `value`, for newtype variants
 * - `"0"`, `"1"`, ... for tuple variants
 * - one property per field, for struct variants
 */
export type VariantFields =
  | { kind: "unit" }
  | { kind: "newtype"; inner: Schema }
  | { kind: "tuple"; elements: Schema[] }
  | { kind: "struct"; fields: Record<string, Schema> };

export interface EnumVariant {
  name: string;
  /** Wire discriminant. Defaults to the variant's index. */
  discriminant?: number;
  fields: VariantFields;
}

export interface EnumSchema {
  kind: "enum";
  /** Variants in declaration order. */
  variants: EnumVariant[];
}

// ============================================================================
// Reference Schema
// ============================================================================

/** Reference to a named type in the registry. */
export interface RefSchema {
  kind: "ref";
  name: string;
}

export type Schema =
  | { kind: PrimitiveKind }
  | VecSchema
  | OptionSchema
  | MapSchema
  | StructSchema
  | TupleSchema
  | EnumSchema
  | RefSchema;

export type SchemaRegistry = Map<string, Schema>;

/**
 * Follow a ref to the schema it names. Only one level is resolved; refs
 * nested inside the result are resolved when they are reached.
 */
export function resolveSchema(schema: Schema, registry: SchemaRegistry | undefined): Schema {
  if (schema.kind !== "ref") return schema;
  const resolved = registry?.get(schema.name);
  if (!resolved) {
    throw new Error(`Unknown type ref: ${schema.name}`);
  }
  return resolved;
}

// ============================================================================
// Enum helpers
// ============================================================================

export function variantDiscriminant(schema: EnumSchema, variant: EnumVariant): number {
  if (variant.discriminant !== undefined) return variant.discriminant;
  const index = schema.variants.indexOf(variant);
  if (index === -1) {
    throw new Error(`Variant "${variant.name}" not found in schema`);
  }
  return index;
}

export function findVariantByDiscriminant(
  schema: EnumSchema,
  discriminant: number,
): EnumVariant | undefined {
  return schema.variants.find((v, index) => (v.discriminant ?? index) === discriminant);
}

export function findVariantByName(schema: EnumSchema, name: string): EnumVariant | undefined {
  return schema.variants.find((v) => v.name === name);
}

/**
 * Field schemas of a variant in encoding order, each paired with the
 * property of the decoded value object that holds it.
 */
export function variantSlots(variant: EnumVariant): Array<[key: string, schema: Schema]> {
  const fields = variant.fields;
  switch (fields.kind) {
    case "unit":
      return [];
    case "newtype":
      return [["value", fields.inner]];
    case "tuple":
      return fields.elements.map((schema, i): [string, Schema] => [String(i), schema]);
    case "struct":
      return Object.entries(fields.fields);
  }
}

// ============================================================================
// Value shape guards
// ============================================================================

export type TaggedValue = { tag: string } & Record<string, unknown>;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isTagged(value: unknown): value is TaggedValue {
  return isRecord(value) && typeof value.tag === "string";
}

/** Short human-readable rendering of a schema, for error messages. */
export function schemaToString(schema: Schema): string {
  switch (schema.kind) {
    case "enum":
      return `enum { ${schema.variants.map((v) => v.name).join(" | ")} }`;
    case "struct":
      return `struct { ${Object.keys(schema.fields).join(", ")} }`;
    case "vec":
      return `vec<${schemaToString(schema.element)}>`;
    case "option":
      return `option<${schemaToString(schema.inner)}>`;
    case "map":
      return `map<${schemaToString(schema.key)}, ${schemaToString(schema.value)}>`;
    case "tuple":
      return `tuple(${schema.elements.map(schemaToString).join(", ")})`;
    case "ref":
      return schema.name;
    default:
      return schema.kind;
  }
}
