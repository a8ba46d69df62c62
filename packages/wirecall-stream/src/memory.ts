// In-memory blocking channels, for running a client and a server in one
// thread.
//
// Nothing can block for real here: a read that finds no data runs the
// channel's `onStarved` hook (typically "serve one call on the other end")
// and fails with TransportError if there is still nothing to read.

import { RpcError } from "@wirecall/core";
import type { SyncByteChannel } from "./channel.ts";

export interface MemoryChannelOptions {
  /** Upper bound on the bytes returned by a single read. Defaults to unlimited. */
  maxRead?: number;
}

export class MemoryChannel implements SyncByteChannel {
  private inbox: Uint8Array[] = [];
  private closed = false;
  private peer: MemoryChannel | null = null;
  private readonly maxRead: number;

  /** Runs when a read finds the inbox empty and the peer still open. */
  onStarved: (() => void) | null = null;

  constructor(options: MemoryChannelOptions = {}) {
    this.maxRead = options.maxRead ?? Number.POSITIVE_INFINITY;
  }

  /** Wire two channels back to back. */
  static connect(a: MemoryChannel, b: MemoryChannel): void {
    a.peer = b;
    b.peer = a;
  }

  /** Bytes written by the peer and not read yet. */
  get pending(): number {
    return this.inbox.reduce((sum, chunk) => sum + chunk.length, 0);
  }

  read(into: Uint8Array): number {
    if (this.closed) throw RpcError.transport("channel is closed");
    if (into.length === 0) return 0;
    if (this.inbox.length === 0 && !this.peerClosed()) {
      this.onStarved?.();
    }
    const head = this.inbox[0];
    if (head === undefined) {
      if (this.peerClosed()) return 0;
      throw RpcError.transport("read would block");
    }
    const n = Math.min(into.length, head.length, this.maxRead);
    into.set(head.subarray(0, n));
    if (n === head.length) {
      this.inbox.shift();
    } else {
      this.inbox[0] = head.subarray(n);
    }
    return n;
  }

  write(bytes: Uint8Array): void {
    if (this.closed) throw RpcError.transport("channel is closed");
    const peer = this.peer;
    if (!peer || peer.closed) throw RpcError.transport("broken pipe: peer is closed");
    if (bytes.length > 0) peer.inbox.push(bytes.slice());
  }

  close(): void {
    this.closed = true;
    this.inbox = [];
  }

  private peerClosed(): boolean {
    return this.peer === null || this.peer.closed;
  }
}

/** A connected pair of in-memory channels. */
export function memoryChannelPair(options: MemoryChannelOptions = {}): [MemoryChannel, MemoryChannel] {
  const a = new MemoryChannel(options);
  const b = new MemoryChannel(options);
  MemoryChannel.connect(a, b);
  return [a, b];
}
