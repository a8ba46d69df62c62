// LEB128-style unsigned varints, as used by postcard for every integer wider
// than a byte and for all length prefixes.

const VARINT_MAX = (1n << 64n) - 1n;

export function encodeVarint(value: number | bigint): Uint8Array {
  if (typeof value === "number" && Number.isInteger(value) && value >= 0 && value < 0x80) return Uint8Array.of(value);
  const big = BigInt(value);
  if (big < 0n) throw new Error("varint: negative value");
  if (big > VARINT_MAX) throw new Error("varint: wider than 64 bits");
  const out: number[] = [];
  for (let rest = big; ; rest >>= 7n) {
    const low = Number(rest & 0x7fn);
    if (rest < 0x80n) {
      out.push(low);
      return Uint8Array.from(out);
    }
    out.push(low | 0x80);
  }
}

/** A postcard varint is at most ten bytes: 9 × 7 bits, then one bit of the tenth. */
const MAX_VARINT_BYTES = 10;

/**
 * Decode a varint holding at most 64 bits. A tenth byte above 1, or an
 * eleventh byte, would carry bits past 2^64 and is rejected.
 */
export function decodeVarint(buf: Uint8Array, offset: number): { value: bigint; next: number } {
  let value = 0n;
  for (let n = 0; n < MAX_VARINT_BYTES; n++) {
    const at = offset + n;
    if (at >= buf.length) throw new Error("varint: eof");
    const byte = buf[at];
    if (n === MAX_VARINT_BYTES - 1 && byte > 0x01) throw new Error("varint: overflow");
    value |= BigInt(byte & 0x7f) << BigInt(7 * n);
    if ((byte & 0x80) === 0) return { value, next: at + 1 };
  }
  throw new Error("varint: overflow");
}

/** Decode a varint that must fit a JS number: lengths, indices, u32 and below. */
export function decodeVarintNumber(buf: Uint8Array, offset: number): { value: number; next: number } {
  const decoded = decodeVarint(buf, offset);
  if (decoded.value > BigInt(Number.MAX_SAFE_INTEGER)) throw new Error("varint: too large for a number");
  return { value: Number(decoded.value), next: decoded.next };
}
