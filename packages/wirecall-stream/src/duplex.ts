// Async byte channel over a Node Duplex stream (net.Socket, pipes, ...).

import { Duplex } from "node:stream";
import { RpcError } from "@wirecall/core";
import type { AsyncByteChannel } from "./channel.ts";

/**
 * Buffers everything the stream emits and hands it out by exact byte count
 * or by chunk. One reader at a time.
 */
export class DuplexChannel implements AsyncByteChannel {
  private chunks: Uint8Array[] = [];
  private buffered = 0;
  private waitingResolve: (() => void) | null = null;
  private ended = false;
  private error: Error | null = null;

  constructor(private readonly stream: Duplex) {
    stream.on("data", (chunk: Buffer | string) => {
      const buffer = typeof chunk === "string" ? Buffer.from(chunk) : chunk;
      const bytes = new Uint8Array(buffer.buffer, buffer.byteOffset, buffer.byteLength);
      this.chunks.push(bytes);
      this.buffered += bytes.length;
      this.wake();
    });

    stream.on("end", () => {
      this.ended = true;
      this.wake();
    });

    stream.on("close", () => {
      this.ended = true;
      this.wake();
    });

    stream.on("error", (err: Error) => {
      this.error = err;
      this.ended = true;
      this.wake();
    });
  }

  /** Get the underlying stream. */
  getStream(): Duplex {
    return this.stream;
  }

  async readChunk(): Promise<Uint8Array | null> {
    for (;;) {
      const chunk = this.chunks.shift();
      if (chunk) {
        this.buffered -= chunk.length;
        return chunk;
      }
      this.throwIfFailed();
      if (this.ended) return null;
      await this.waitForData();
    }
  }

  async readExact(n: number): Promise<Uint8Array> {
    for (;;) {
      if (this.buffered >= n) return this.take(n);
      this.throwIfFailed();
      if (this.ended) {
        throw RpcError.eof(`stream ended after ${this.buffered} of ${n} bytes`);
      }
      await this.waitForData();
    }
  }

  write(bytes: Uint8Array): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      if (this.stream.destroyed || this.stream.writableEnded) {
        reject(RpcError.transport("write on a closed stream"));
        return;
      }
      this.stream.write(bytes, (err) => {
        if (err) reject(RpcError.transport("write failed", err));
        else resolve();
      });
    });
  }

  /** Half-close: the peer sees end of stream once buffered writes drain. */
  close(): void {
    if (!this.stream.writableEnded) {
      this.stream.end();
    }
  }

  private take(n: number): Uint8Array {
    const out = new Uint8Array(n);
    let filled = 0;
    while (filled < n) {
      const head = this.chunks[0];
      const need = n - filled;
      if (head.length <= need) {
        out.set(head, filled);
        filled += head.length;
        this.chunks.shift();
      } else {
        out.set(head.subarray(0, need), filled);
        this.chunks[0] = head.subarray(need);
        filled = n;
      }
    }
    this.buffered -= n;
    return out;
  }

  private throwIfFailed(): void {
    if (this.error) {
      const err = this.error;
      this.error = null;
      throw RpcError.transport("stream failed", err);
    }
  }

  private waitForData(): Promise<void> {
    if (this.waitingResolve) {
      return Promise.reject(RpcError.illegalState("another read is already waiting on this channel"));
    }
    return new Promise((resolve) => {
      this.waitingResolve = resolve;
    });
  }

  private wake(): void {
    const resolve = this.waitingResolve;
    this.waitingResolve = null;
    resolve?.();
  }
}

// ============================================================================
// In-process pair
// ============================================================================

class LoopbackDuplex extends Duplex {
  peer: LoopbackDuplex | null = null;

  _read(): void {
    // Data is pushed by the peer's writes.
  }

  _write(chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    if (!this.peer || this.peer.destroyed) {
      callback(new Error("peer stream is closed"));
      return;
    }
    this.peer.push(Buffer.from(chunk));
    callback();
  }

  _final(callback: (error?: Error | null) => void): void {
    this.peer?.push(null);
    callback();
  }

  _destroy(error: Error | null, callback: (error?: Error | null) => void): void {
    if (this.peer && !this.peer.destroyed) {
      this.peer.push(null);
    }
    callback(error);
  }
}

/** Two Duplex streams wired back to back: what one writes, the other reads. */
export function duplexPair(): [Duplex, Duplex] {
  const a = new LoopbackDuplex();
  const b = new LoopbackDuplex();
  a.peer = b;
  b.peer = a;
  return [a, b];
}
