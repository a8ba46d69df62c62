// Postcard primitives.
//
// Integers wider than a byte are varints (signed ones zigzagged first),
// floats are little-endian IEEE 754, strings and byte arrays carry a varint
// length prefix. Encoders check their input and throw on values the target
// type cannot hold; decoders throw on truncated or out-of-range input.

import { encodeVarint, decodeVarint, decodeVarintNumber } from "./binary/varint.ts";
import { concat } from "./binary/bytes.ts";

export interface DecodeResult<T> {
  value: T;
  next: number; // offset after this value
}

// ============================================================================
// Input checks
// ============================================================================

function describe(value: unknown): string {
  if (value === null) return "null";
  if (typeof value === "bigint") return `${value}n`;
  if (typeof value === "string") return JSON.stringify(value);
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  if (value instanceof Uint8Array) return `Uint8Array(${value.length})`;
  if (Array.isArray(value)) return `array(${value.length})`;
  return typeof value;
}

function checkInteger(value: unknown, kind: string, min: number, max: number): number {
  if (typeof value !== "number" || !Number.isInteger(value) || value < min || value > max) {
    throw new Error(`${kind}: expected an integer in [${min}, ${max}], got ${describe(value)}`);
  }
  return value;
}

function checkBigInt(value: unknown, kind: string, min: bigint, max: bigint): bigint {
  let n: bigint;
  if (typeof value === "bigint") {
    n = value;
  } else if (typeof value === "number" && Number.isSafeInteger(value)) {
    n = BigInt(value);
  } else {
    throw new Error(`${kind}: expected a bigint or safe integer, got ${describe(value)}`);
  }
  if (n < min || n > max) throw new Error(`${kind}: ${n} out of range`);
  return n;
}

const U64_MAX = (1n << 64n) - 1n;
const I64_MIN = -(1n << 63n);
const I64_MAX = (1n << 63n) - 1n;

// ============================================================================
// Booleans and bytes
// ============================================================================

export function encodeBool(value: unknown): Uint8Array {
  if (typeof value !== "boolean") throw new Error(`bool: expected a boolean, got ${describe(value)}`);
  return Uint8Array.of(value ? 1 : 0);
}

export function decodeBool(buf: Uint8Array, offset: number): DecodeResult<boolean> {
  if (offset >= buf.length) throw new Error("bool: eof");
  const byte = buf[offset];
  if (byte > 1) throw new Error(`bool: invalid value ${byte}`);
  return { value: byte === 1, next: offset + 1 };
}

export function encodeU8(value: unknown): Uint8Array {
  return Uint8Array.of(checkInteger(value, "u8", 0, 0xff));
}

export function decodeU8(buf: Uint8Array, offset: number): DecodeResult<number> {
  if (offset >= buf.length) throw new Error("u8: eof");
  return { value: buf[offset], next: offset + 1 };
}

export function encodeI8(value: unknown): Uint8Array {
  return Uint8Array.of(checkInteger(value, "i8", -0x80, 0x7f) & 0xff);
}

export function decodeI8(buf: Uint8Array, offset: number): DecodeResult<number> {
  if (offset >= buf.length) throw new Error("i8: eof");
  const byte = buf[offset];
  return { value: byte > 127 ? byte - 256 : byte, next: offset + 1 };
}

// ============================================================================
// Unsigned varints
// ============================================================================

export function encodeU16(value: unknown): Uint8Array {
  return encodeVarint(checkInteger(value, "u16", 0, 0xffff));
}

export function decodeU16(buf: Uint8Array, offset: number): DecodeResult<number> {
  const result = decodeVarintNumber(buf, offset);
  if (result.value > 0xffff) throw new Error("u16: overflow");
  return result;
}

export function encodeU32(value: unknown): Uint8Array {
  return encodeVarint(checkInteger(value, "u32", 0, 0xffff_ffff));
}

export function decodeU32(buf: Uint8Array, offset: number): DecodeResult<number> {
  const result = decodeVarintNumber(buf, offset);
  if (result.value > 0xffff_ffff) throw new Error("u32: overflow");
  return result;
}

export function encodeU64(value: unknown): Uint8Array {
  return encodeVarint(checkBigInt(value, "u64", 0n, U64_MAX));
}

export function decodeU64(buf: Uint8Array, offset: number): DecodeResult<bigint> {
  return decodeVarint(buf, offset);
}

// ============================================================================
// Signed varints (zigzag)
// ============================================================================

function zigzagEncode(n: bigint): bigint {
  return (n << 1n) ^ (n >> 63n);
}

function zigzagDecode(n: bigint): bigint {
  return (n >> 1n) ^ -(n & 1n);
}

export function encodeI16(value: unknown): Uint8Array {
  return encodeVarint(zigzagEncode(BigInt(checkInteger(value, "i16", -0x8000, 0x7fff))));
}

export function decodeI16(buf: Uint8Array, offset: number): DecodeResult<number> {
  const result = decodeVarint(buf, offset);
  const signed = Number(zigzagDecode(result.value));
  if (signed < -0x8000 || signed > 0x7fff) throw new Error("i16: overflow");
  return { value: signed, next: result.next };
}

export function encodeI32(value: unknown): Uint8Array {
  return encodeVarint(zigzagEncode(BigInt(checkInteger(value, "i32", -0x8000_0000, 0x7fff_ffff))));
}

export function decodeI32(buf: Uint8Array, offset: number): DecodeResult<number> {
  const result = decodeVarint(buf, offset);
  const signed = Number(zigzagDecode(result.value));
  if (signed < -0x8000_0000 || signed > 0x7fff_ffff) throw new Error("i32: overflow");
  return { value: signed, next: result.next };
}

export function encodeI64(value: unknown): Uint8Array {
  return encodeVarint(zigzagEncode(checkBigInt(value, "i64", I64_MIN, I64_MAX)));
}

export function decodeI64(buf: Uint8Array, offset: number): DecodeResult<bigint> {
  const result = decodeVarint(buf, offset);
  return { value: zigzagDecode(result.value), next: result.next };
}

// ============================================================================
// Floats
// ============================================================================

export function encodeF32(value: unknown): Uint8Array {
  if (typeof value !== "number") throw new Error(`f32: expected a number, got ${describe(value)}`);
  const buf = new ArrayBuffer(4);
  new DataView(buf).setFloat32(0, value, true);
  return new Uint8Array(buf);
}

export function decodeF32(buf: Uint8Array, offset: number): DecodeResult<number> {
  if (offset + 4 > buf.length) throw new Error("f32: eof");
  const view = new DataView(buf.buffer, buf.byteOffset + offset, 4);
  return { value: view.getFloat32(0, true), next: offset + 4 };
}

export function encodeF64(value: unknown): Uint8Array {
  if (typeof value !== "number") throw new Error(`f64: expected a number, got ${describe(value)}`);
  const buf = new ArrayBuffer(8);
  new DataView(buf).setFloat64(0, value, true);
  return new Uint8Array(buf);
}

export function decodeF64(buf: Uint8Array, offset: number): DecodeResult<number> {
  if (offset + 8 > buf.length) throw new Error("f64: eof");
  const view = new DataView(buf.buffer, buf.byteOffset + offset, 8);
  return { value: view.getFloat64(0, true), next: offset + 8 };
}

// ============================================================================
// Strings and byte arrays
// ============================================================================

const utf8Decoder = new TextDecoder("utf-8", { fatal: true });

export function encodeString(value: unknown): Uint8Array {
  if (typeof value !== "string") throw new Error(`string: expected a string, got ${describe(value)}`);
  const bytes = new TextEncoder().encode(value);
  return concat(encodeVarint(bytes.length), bytes);
}

export function decodeString(buf: Uint8Array, offset: number): DecodeResult<string> {
  const len = decodeVarintNumber(buf, offset);
  const end = len.next + len.value;
  if (end > buf.length) throw new Error("string: overrun");
  return { value: utf8Decoder.decode(buf.subarray(len.next, end)), next: end };
}

export function encodeBytes(value: unknown): Uint8Array {
  if (!(value instanceof Uint8Array)) throw new Error(`bytes: expected a Uint8Array, got ${describe(value)}`);
  return concat(encodeVarint(value.length), value);
}

export function decodeBytes(buf: Uint8Array, offset: number): DecodeResult<Uint8Array> {
  const len = decodeVarintNumber(buf, offset);
  const end = len.next + len.value;
  if (end > buf.length) throw new Error("bytes: overrun");
  // Copy so the value does not pin the frame it was read from.
  return { value: buf.slice(len.next, end), next: end };
}

export { describe as describeValue };
