// Byte channel contracts.
//
// Transports see the connection only through one of these. Blocking
// transports need reads and writes that complete synchronously; async
// transports read whole chunks as they arrive.

import { RpcError } from "@wirecall/core";

export interface SyncByteChannel {
  /**
   * Read at most `into.length` bytes into `into`. Returns the count read;
   * 0 means the peer closed the channel.
   */
  read(into: Uint8Array): number;
  /** Write all of `bytes` before returning. */
  write(bytes: Uint8Array): void;
  close(): void;
}

export interface AsyncByteChannel {
  /** Next chunk as it arrived, or `null` once the peer has closed. */
  readChunk(): Promise<Uint8Array | null>;
  /** Exactly `n` bytes. Fails with TransportEOF if the stream ends first. */
  readExact(n: number): Promise<Uint8Array>;
  write(bytes: Uint8Array): Promise<void>;
  close(): void;
}

/** Read exactly `n` bytes from a blocking channel. */
export function readExactSync(channel: SyncByteChannel, n: number): Uint8Array {
  const out = new Uint8Array(n);
  let filled = 0;
  while (filled < n) {
    const got = channel.read(out.subarray(filled));
    if (got === 0) {
      throw RpcError.eof(`stream ended after ${filled} of ${n} bytes`);
    }
    filled += got;
  }
  return out;
}

/** Read whatever is available, up to `max` bytes; `null` at end of stream. */
export function readChunkSync(channel: SyncByteChannel, max: number): Uint8Array | null {
  const buf = new Uint8Array(max);
  const got = channel.read(buf);
  return got === 0 ? null : buf.subarray(0, got);
}
