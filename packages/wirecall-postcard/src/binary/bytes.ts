export function concat(...parts: Uint8Array[]): Uint8Array {
  const total = parts.reduce((n, p) => n + p.length, 0);
  const out = new Uint8Array(total);
  let o = 0;
  for (const p of parts) {
    out.set(p, o);
    o += p.length;
  }
  return out;
}

/** Render bytes as space-separated hex, bracketing the byte at `mark`. */
export function hexBytes(buf: Uint8Array, start: number, end: number, mark = -1): string {
  const bytes: string[] = [];
  for (let i = Math.max(0, start); i < Math.min(buf.length, end); i++) {
    const hex = buf[i].toString(16).padStart(2, "0");
    bytes.push(i === mark ? `[${hex}]` : hex);
  }
  return bytes.join(" ");
}
