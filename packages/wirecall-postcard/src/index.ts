// @wirecall/postcard - positional binary encoding and runtime schemas
//
// Postcard-compatible primitives, schema-driven encode/decode, and the
// typed WireType handles the transports are parameterized over.

export * from "./primitives.ts";
export { encodeVarint, decodeVarint, decodeVarintNumber } from "./binary/varint.ts";
export { concat, hexBytes } from "./binary/bytes.ts";

export {
  type PrimitiveKind,
  type VecSchema,
  type OptionSchema,
  type MapSchema,
  type StructSchema,
  type TupleSchema,
  type VariantFields,
  type EnumVariant,
  type EnumSchema,
  type RefSchema,
  type Schema,
  type SchemaRegistry,
  type TaggedValue,
  resolveSchema,
  variantDiscriminant,
  findVariantByDiscriminant,
  findVariantByName,
  variantSlots,
  isRecord,
  isTagged,
  schemaToString,
} from "./schema.ts";

export { encodeWithSchema, decodeWithSchema } from "./schema_codec.ts";

export {
  type WireType,
  type TypeOf,
  type Result,
  ok,
  err,
  wireType,
  t,
  encodeValue,
  decodeValue,
} from "./wire_type.ts";
