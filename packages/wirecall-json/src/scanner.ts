// Incremental JSON value boundary detection.
//
// Bytes arrive in arbitrary chunks; the scanner reports when the buffered
// bytes hold one complete top-level value, without parsing it. Structural
// characters are all ASCII, so scanning UTF-8 bytes directly is safe.
//
// A value is complete when:
// - an object or array closes its outermost bracket,
// - a top-level string reaches its closing quote,
// - a top-level bare scalar (number, true, false, null) is followed by a
//   delimiter, or the stream ends.

import { RpcError } from "@wirecall/core";

const QUOTE = 0x22;
const BACKSLASH = 0x5c;

function isWhitespace(b: number): boolean {
  return b === 0x20 || b === 0x09 || b === 0x0a || b === 0x0d;
}

function isOpen(b: number): boolean {
  return b === 0x7b || b === 0x5b; // { [
}

function isClose(b: number): boolean {
  return b === 0x7d || b === 0x5d; // } ]
}

function endsScalar(b: number): boolean {
  return isWhitespace(b) || isOpen(b) || isClose(b) || b === 0x2c || b === 0x3a || b === QUOTE;
}

const INITIAL_CAPACITY = 4096;

export class JsonScanner {
  /** Live bytes are `buf[head..tail)`; offsets below are absolute in `buf`. */
  private buf = new Uint8Array(0);
  private head = 0;
  private tail = 0;
  private pos = 0;
  /** Offset where the current value starts, -1 while skipping whitespace. */
  private start = -1;
  private depth = 0;
  private inString = false;
  private escaped = false;
  private scalar = false;

  constructor(private readonly maxValueSize: number) {}

  /** Bytes held, including any not yet scanned. */
  get buffered(): number {
    return this.tail - this.head;
  }

  push(bytes: Uint8Array): void {
    if (bytes.length === 0) return;
    if (this.tail + bytes.length > this.buf.length) this.compact(bytes.length);
    this.buf.set(bytes, this.tail);
    this.tail += bytes.length;
  }

  /** The next complete value, or null until more bytes arrive. */
  next(): Uint8Array | null {
    const buf = this.buf;
    while (this.pos < this.tail) {
      const b = buf[this.pos];

      if (this.start < 0) {
        if (isWhitespace(b)) {
          this.pos++;
          continue;
        }
        this.start = this.pos++;
        if (isOpen(b)) this.depth = 1;
        else if (b === QUOTE) this.inString = true;
        else this.scalar = true;
        continue;
      }

      if (this.scalar) {
        if (endsScalar(b)) return this.take(this.pos);
        this.checkSize();
        this.pos++;
        continue;
      }

      this.checkSize();

      if (this.inString) {
        this.pos++;
        if (this.escaped) {
          this.escaped = false;
        } else if (b === BACKSLASH) {
          this.escaped = true;
        } else if (b === QUOTE) {
          this.inString = false;
          if (this.depth === 0) return this.take(this.pos);
        }
        continue;
      }

      this.pos++;
      if (b === QUOTE) {
        this.inString = true;
      } else if (isOpen(b)) {
        this.depth++;
      } else if (isClose(b)) {
        this.depth--;
        if (this.depth === 0) return this.take(this.pos);
      }
    }
    return null;
  }

  /**
   * The stream has ended: return a trailing bare scalar, or null if only
   * whitespace is left. A value cut off part-way fails with TransportEOF.
   */
  finish(): Uint8Array | null {
    const value = this.next();
    if (value) return value;
    if (this.start < 0) return null;
    if (this.scalar) return this.take(this.tail);
    throw RpcError.eof(`stream ended inside a JSON value after ${this.tail - this.start} bytes`);
  }

  /**
   * Move the live bytes to the front, growing so that at least as much room
   * is left free as is live. Each byte is then copied a bounded number of
   * times on average.
   */
  private compact(incoming: number): void {
    const live = this.tail - this.head;
    let capacity = Math.max(this.buf.length, INITIAL_CAPACITY);
    while (capacity < 2 * (live + incoming)) capacity *= 2;
    const target = capacity === this.buf.length ? this.buf : new Uint8Array(capacity);
    if (target === this.buf) target.copyWithin(0, this.head, this.tail);
    else target.set(this.buf.subarray(this.head, this.tail), 0);
    const shift = this.head;
    this.buf = target;
    this.head = 0;
    this.tail = live;
    this.pos -= shift;
    if (this.start >= 0) this.start -= shift;
  }

  private checkSize(): void {
    if (this.pos - this.start >= this.maxValueSize) {
      throw RpcError.serialization(`JSON value exceeds the ${this.maxValueSize} byte limit`);
    }
  }

  private take(end: number): Uint8Array {
    const value = this.buf.slice(this.start, end);
    this.head = end;
    this.pos = end;
    this.start = -1;
    this.depth = 0;
    this.inString = false;
    this.escaped = false;
    this.scalar = false;
    return value;
  }
}
