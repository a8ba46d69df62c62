// Frame layout for the binary transport.
//
//   magic (6 bytes: "WCRPC" 0x01) | length (u32 little-endian) | payload
//
// The magic lets a reader fail fast on a desynchronized or foreign stream
// instead of taking noise for a length.

import { hexBytes } from "@wirecall/postcard";
import { RpcError } from "@wirecall/core";
import { readExactSync, type SyncByteChannel, type AsyncByteChannel } from "@wirecall/stream";

export const FRAME_MAGIC = Uint8Array.of(0x57, 0x43, 0x52, 0x50, 0x43, 0x01);

export const FRAME_HEADER_SIZE = FRAME_MAGIC.length + 4;

/** 64 MiB */
export const DEFAULT_MAX_FRAME_SIZE = 64 * 1024 * 1024;

export function encodeFrame(payload: Uint8Array): Uint8Array {
  if (payload.length > 0xffff_ffff) {
    throw RpcError.serialization("frame too large for u32 length prefix");
  }
  const framed = new Uint8Array(FRAME_HEADER_SIZE + payload.length);
  framed.set(FRAME_MAGIC, 0);
  new DataView(framed.buffer).setUint32(FRAME_MAGIC.length, payload.length, true);
  framed.set(payload, FRAME_HEADER_SIZE);
  return framed;
}

/** Validate a frame header and return the payload length it declares. */
export function parseFrameHeader(header: Uint8Array, maxFrameSize: number): number {
  for (let i = 0; i < FRAME_MAGIC.length; i++) {
    if (header[i] !== FRAME_MAGIC[i]) {
      throw RpcError.serialization(`bad frame magic: ${hexBytes(header, 0, FRAME_MAGIC.length)}`);
    }
  }
  const length = new DataView(header.buffer, header.byteOffset, header.byteLength).getUint32(
    FRAME_MAGIC.length,
    true,
  );
  if (length > maxFrameSize) {
    throw RpcError.serialization(`frame of ${length} bytes exceeds the ${maxFrameSize} byte limit`);
  }
  return length;
}

/**
 * Decode one whole frame from a buffer.
 *
 * @returns the payload and the offset just past the frame
 */
export function decodeFrame(
  buf: Uint8Array,
  offset = 0,
  maxFrameSize = DEFAULT_MAX_FRAME_SIZE,
): { payload: Uint8Array; next: number } {
  if (buf.length - offset < FRAME_HEADER_SIZE) {
    throw RpcError.eof("buffer ends inside a frame header");
  }
  const length = parseFrameHeader(buf.subarray(offset, offset + FRAME_HEADER_SIZE), maxFrameSize);
  const start = offset + FRAME_HEADER_SIZE;
  if (buf.length - start < length) {
    throw RpcError.eof(`buffer holds ${buf.length - start} of ${length} payload bytes`);
  }
  return { payload: buf.slice(start, start + length), next: start + length };
}

export function readFrameSync(channel: SyncByteChannel, maxFrameSize: number): Uint8Array {
  const length = parseFrameHeader(readExactSync(channel, FRAME_HEADER_SIZE), maxFrameSize);
  return readExactSync(channel, length);
}

export async function readFrame(channel: AsyncByteChannel, maxFrameSize: number): Promise<Uint8Array> {
  const length = parseFrameHeader(await channel.readExact(FRAME_HEADER_SIZE), maxFrameSize);
  return channel.readExact(length);
}
