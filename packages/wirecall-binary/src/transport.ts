// Binary transport: postcard payloads in magic-tagged, length-prefixed frames.
//
// A call is one frame holding the method index (varint) followed by every
// parameter in declaration order; the response is one frame holding the
// encoded result. Parameters are buffered on the client and sent as a single
// frame by finalize, so nothing reaches the wire until the call is complete.

import createDebug from "debug";
import {
  concat,
  encodeVarint,
  decodeVarintNumber,
  encodeValue,
  decodeValue,
  type DecodeResult,
  type WireType,
} from "@wirecall/postcard";
import {
  RpcError,
  PartialMethodId,
  CallGate,
  consume,
  ensureLive,
  type MethodId,
  type CallState,
  type ClientTransport,
  type AsyncClientTransport,
  type ServerTransport,
  type AsyncServerTransport,
} from "@wirecall/core";
import type { SyncByteChannel, AsyncByteChannel } from "@wirecall/stream";
import { DEFAULT_MAX_FRAME_SIZE, encodeFrame, readFrameSync, readFrame } from "./framing.ts";

const log = createDebug("wirecall:binary");

export interface BinaryTransportOptions {
  /** Largest payload accepted in either direction. Defaults to 64 MiB. */
  maxFrameSize?: number;
}

/** Call being built on the client. */
export interface BinaryTx extends CallState {
  parts: Uint8Array[];
}

/** Call sent, response not yet read. */
export type BinaryPending = CallState;

/** Call being read on the server. */
export interface BinaryRx extends CallState {
  payload: Uint8Array;
  offset: number;
}

// ============================================================================
// Payload helpers shared by both variants
// ============================================================================

function startCall(id: MethodId): BinaryTx {
  return { consumed: false, parts: [encodeVarint(id.index)] };
}

function appendParam<T>(gate: CallGate, state: BinaryTx, name: string, value: T, type: WireType<T>): void {
  ensureLive(state, "call");
  try {
    state.parts.push(encodeValue(value, type));
  } catch (e) {
    state.consumed = true;
    gate.end();
    throw RpcError.serialization(`cannot encode parameter ${name}`, e);
  }
}

function frameOrThrow(payload: Uint8Array, maxFrameSize: number, what: string): Uint8Array {
  if (payload.length > maxFrameSize) {
    throw RpcError.serialization(`${what} of ${payload.length} bytes exceeds the ${maxFrameSize} byte limit`);
  }
  return encodeFrame(payload);
}

function callFrame(gate: CallGate, state: BinaryTx, maxFrameSize: number): Uint8Array {
  consume(state, "call");
  try {
    return frameOrThrow(concat(...state.parts), maxFrameSize, "call");
  } catch (e) {
    gate.end();
    throw e;
  }
}

function decodeResponse<T>(payload: Uint8Array, type: WireType<T>): T {
  let decoded: DecodeResult<T>;
  try {
    decoded = decodeValue(payload, 0, type);
  } catch (e) {
    throw RpcError.serialization("cannot decode response", e);
  }
  if (decoded.next !== payload.length) {
    throw RpcError.serialization(`${payload.length - decoded.next} trailing bytes after response`);
  }
  return decoded.value;
}

function openCall(payload: Uint8Array): [PartialMethodId, BinaryRx] {
  let index: DecodeResult<number>;
  try {
    index = decodeVarintNumber(payload, 0);
  } catch (e) {
    throw RpcError.serialization("cannot decode method index", e);
  }
  if (index.value > 0xffff_ffff) {
    throw RpcError.serialization(`method index ${index.value} does not fit in a u32`);
  }
  return [PartialMethodId.byIndex(index.value), { consumed: false, payload, offset: index.next }];
}

function nextParam<T>(state: BinaryRx, name: string, type: WireType<T>): T {
  ensureLive(state, "receive");
  try {
    const decoded = decodeValue(state.payload, state.offset, type);
    state.offset = decoded.next;
    return decoded.value;
  } catch (e) {
    throw RpcError.serialization(`cannot decode parameter ${name}`, e);
  }
}

function responseFrame<T>(state: BinaryRx | null, value: T, type: WireType<T>, maxFrameSize: number): Uint8Array {
  if (!state) throw RpcError.illegalState("no call is waiting for a response");
  consume(state, "receive");
  let payload: Uint8Array;
  try {
    payload = encodeValue(value, type);
  } catch (e) {
    throw RpcError.serialization("cannot encode response", e);
  }
  return frameOrThrow(payload, maxFrameSize, "response");
}

// ============================================================================
// Blocking
// ============================================================================

/**
 * Blocking binary transport over a SyncByteChannel. One instance can act as
 * a client or as a server; use one instance per role and connection.
 */
export class BinaryTransport
  implements ClientTransport<BinaryTx, BinaryPending>, ServerTransport<BinaryRx>
{
  private readonly maxFrameSize: number;
  private readonly gate = new CallGate();
  private current: BinaryRx | null = null;

  constructor(
    private readonly channel: SyncByteChannel,
    options: BinaryTransportOptions = {},
  ) {
    this.maxFrameSize = options.maxFrameSize ?? DEFAULT_MAX_FRAME_SIZE;
  }

  /** Get the underlying channel. */
  getChannel(): SyncByteChannel {
    return this.channel;
  }

  beginCall(id: MethodId): BinaryTx {
    this.gate.begin();
    return startCall(id);
  }

  addParam<T>(name: string, value: T, type: WireType<T>, state: BinaryTx): void {
    appendParam(this.gate, state, name, value, type);
  }

  finalize(state: BinaryTx): BinaryPending {
    const frame = callFrame(this.gate, state, this.maxFrameSize);
    this.gate.run("finalize", () => this.channel.write(frame));
    log("sent call frame (%d bytes)", frame.length);
    return { consumed: false };
  }

  readResponse<T>(state: BinaryPending, type: WireType<T>): T {
    consume(state, "response");
    const payload = this.gate.run("readResponse", () => readFrameSync(this.channel, this.maxFrameSize));
    log("received response frame (%d bytes)", payload.length);
    // The whole frame is consumed, so a bad payload leaves the stream usable.
    this.gate.end();
    return decodeResponse(payload, type);
  }

  beginReceive(): [PartialMethodId, BinaryRx] {
    this.current = null;
    const payload = readFrameSync(this.channel, this.maxFrameSize);
    log("received call frame (%d bytes)", payload.length);
    const [id, state] = openCall(payload);
    this.current = state;
    return [id, state];
  }

  readParam<T>(name: string, type: WireType<T>, state: BinaryRx): T {
    return nextParam(state, name, type);
  }

  sendResponse<T>(value: T, type: WireType<T>): void {
    const frame = responseFrame(this.current, value, type, this.maxFrameSize);
    this.current = null;
    this.channel.write(frame);
    log("sent response frame (%d bytes)", frame.length);
  }

  close(): void {
    this.channel.close();
  }
}

// ============================================================================
// Async
// ============================================================================

/** Promise-based binary transport over an AsyncByteChannel. */
export class AsyncBinaryTransport
  implements AsyncClientTransport<BinaryTx, BinaryPending>, AsyncServerTransport<BinaryRx>
{
  private readonly maxFrameSize: number;
  private readonly gate = new CallGate();
  private current: BinaryRx | null = null;

  constructor(
    private readonly channel: AsyncByteChannel,
    options: BinaryTransportOptions = {},
  ) {
    this.maxFrameSize = options.maxFrameSize ?? DEFAULT_MAX_FRAME_SIZE;
  }

  /** Get the underlying channel. */
  getChannel(): AsyncByteChannel {
    return this.channel;
  }

  async beginCall(id: MethodId): Promise<BinaryTx> {
    this.gate.begin();
    return startCall(id);
  }

  async addParam<T>(name: string, value: T, type: WireType<T>, state: BinaryTx): Promise<void> {
    appendParam(this.gate, state, name, value, type);
  }

  async finalize(state: BinaryTx): Promise<BinaryPending> {
    const frame = callFrame(this.gate, state, this.maxFrameSize);
    await this.gate.runAsync("finalize", () => this.channel.write(frame));
    log("sent call frame (%d bytes)", frame.length);
    return { consumed: false };
  }

  async readResponse<T>(state: BinaryPending, type: WireType<T>): Promise<T> {
    consume(state, "response");
    const payload = await this.gate.runAsync("readResponse", () => readFrame(this.channel, this.maxFrameSize));
    log("received response frame (%d bytes)", payload.length);
    this.gate.end();
    return decodeResponse(payload, type);
  }

  async beginReceive(): Promise<[PartialMethodId, BinaryRx]> {
    this.current = null;
    const payload = await readFrame(this.channel, this.maxFrameSize);
    log("received call frame (%d bytes)", payload.length);
    const [id, state] = openCall(payload);
    this.current = state;
    return [id, state];
  }

  async readParam<T>(name: string, type: WireType<T>, state: BinaryRx): Promise<T> {
    return nextParam(state, name, type);
  }

  async sendResponse<T>(value: T, type: WireType<T>): Promise<void> {
    const frame = responseFrame(this.current, value, type, this.maxFrameSize);
    this.current = null;
    await this.channel.write(frame);
    log("sent response frame (%d bytes)", frame.length);
  }

  close(): void {
    this.channel.close();
  }
}
