// @wirecall/binary - postcard payloads in length-prefixed frames.

export {
  FRAME_MAGIC,
  FRAME_HEADER_SIZE,
  DEFAULT_MAX_FRAME_SIZE,
  encodeFrame,
  decodeFrame,
  parseFrameHeader,
  readFrameSync,
  readFrame,
} from "./framing.ts";
export {
  BinaryTransport,
  AsyncBinaryTransport,
  type BinaryTransportOptions,
  type BinaryTx,
  type BinaryPending,
  type BinaryRx,
} from "./transport.ts";
