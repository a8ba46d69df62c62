// @wirecall/stream - byte channels the transports run over.

export {
  type SyncByteChannel,
  type AsyncByteChannel,
  readExactSync,
  readChunkSync,
} from "./channel.ts";
export { DuplexChannel, duplexPair } from "./duplex.ts";
export { FdChannel } from "./fd.ts";
export { MemoryChannel, memoryChannelPair, type MemoryChannelOptions } from "./memory.ts";
