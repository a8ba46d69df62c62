// JSON transport: newline-terminated JSON texts over a byte channel.
//
// A call is a JSON-RPC 2.0 style envelope whose params are keyed by name:
//
//   {"jsonrpc":"2.0","method":"bar","params":{"a":"x","b":1},"id":"<uuid>"}
//
// The response is the bare result value. Readers find value boundaries with
// JsonScanner, so the newline is a courtesy for line-oriented tools rather
// than the delimiter; any bytes after a complete value wait for the next read.

import { randomUUID } from "node:crypto";
import createDebug from "debug";
import type { WireType } from "@wirecall/postcard";
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
import { readChunkSync, type SyncByteChannel, type AsyncByteChannel } from "@wirecall/stream";
import { JsonScanner } from "./scanner.ts";
import { parseJson, stringifyJson, isJsonObject, setJsonProperty, type JsonObject, type JsonValue } from "./json_text.ts";
import { toJson, fromJson } from "./json_mapping.ts";

const log = createDebug("wirecall:json");

/** 64 MiB */
export const DEFAULT_MAX_VALUE_SIZE = 64 * 1024 * 1024;

const READ_CHUNK_SIZE = 64 * 1024;

export interface JsonTransportOptions {
  /** Largest JSON text accepted in either direction. Defaults to 64 MiB. */
  maxValueSize?: number;
  /** Produces the envelope id. Defaults to a random v4 UUID. */
  generateId?: () => string;
}

/** Call being built on the client. */
export interface JsonTx extends CallState {
  method: string;
  params: JsonObject;
}

export type JsonPending = CallState;

/** Call being read on the server. */
export interface JsonRx extends CallState {
  params: JsonObject;
}

const utf8Decoder = new TextDecoder("utf-8", { fatal: true });
const utf8Encoder = new TextEncoder();

// ============================================================================
// Helpers shared by both variants
// ============================================================================

function startCall(id: MethodId): JsonTx {
  return { consumed: false, method: id.name, params: {} };
}

function appendParam<T>(gate: CallGate, state: JsonTx, name: string, value: T, type: WireType<T>): void {
  ensureLive(state, "call");
  try {
    setJsonProperty(state.params, name, toJson(value, type.schema, type.registry));
  } catch (e) {
    state.consumed = true;
    gate.end();
    throw RpcError.serialization(`cannot encode parameter ${name}`, e);
  }
}

/** Serialize a JSON value as one line, enforcing the size limit. */
function encodeLine(value: JsonValue, maxValueSize: number, what: string): Uint8Array {
  const bytes = utf8Encoder.encode(`${stringifyJson(value)}\n`);
  if (bytes.length - 1 > maxValueSize) {
    throw RpcError.serialization(`${what} of ${bytes.length - 1} bytes exceeds the ${maxValueSize} byte limit`);
  }
  return bytes;
}

function callLine(gate: CallGate, state: JsonTx, generateId: () => string, maxValueSize: number): Uint8Array {
  consume(state, "call");
  try {
    const envelope: JsonObject = {
      jsonrpc: "2.0",
      method: state.method,
      params: state.params,
      id: generateId(),
    };
    return encodeLine(envelope, maxValueSize, "call");
  } catch (e) {
    gate.end();
    throw e;
  }
}

function parseText(bytes: Uint8Array): JsonValue {
  let text: string;
  try {
    text = utf8Decoder.decode(bytes);
  } catch (e) {
    throw RpcError.serialization("JSON text is not valid UTF-8", e);
  }
  try {
    return parseJson(text);
  } catch (e) {
    throw RpcError.serialization("malformed JSON", e);
  }
}

function decodeResponse<T>(bytes: Uint8Array, type: WireType<T>): T {
  const json = parseText(bytes);
  try {
    return decodeAs(json, type);
  } catch (e) {
    throw RpcError.serialization("cannot decode response", e);
  }
}

/** fromJson has checked the value against the schema the WireType carries. */
function decodeAs<T>(json: JsonValue, type: WireType<T>): T {
  return fromJson(json, type.schema, type.registry) as T;
}

function openCall(bytes: Uint8Array): [PartialMethodId, JsonRx] {
  const request = parseText(bytes);
  if (!isJsonObject(request)) {
    throw RpcError.serialization("request is not a JSON object");
  }
  const method = request.method;
  if (typeof method !== "string") {
    throw RpcError.serialization(
      method === undefined ? "request has no method" : "request method is not a string",
    );
  }
  const params = request.params ?? {};
  if (!isJsonObject(params)) {
    throw RpcError.serialization("request params are not a JSON object");
  }
  return [PartialMethodId.byName(method), { consumed: false, params }];
}

function nextParam<T>(state: JsonRx, name: string, type: WireType<T>): T {
  ensureLive(state, "receive");
  if (!Object.hasOwn(state.params, name)) {
    throw RpcError.serialization(`parameters do not contain ${name}`);
  }
  try {
    return decodeAs(state.params[name], type);
  } catch (e) {
    throw RpcError.serialization(`cannot decode parameter ${name}`, e);
  }
}

function responseLine<T>(state: JsonRx | null, value: T, type: WireType<T>, maxValueSize: number): Uint8Array {
  if (!state) throw RpcError.illegalState("no call is waiting for a response");
  consume(state, "receive");
  let json: JsonValue;
  try {
    json = toJson(value, type.schema, type.registry);
  } catch (e) {
    throw RpcError.serialization("cannot encode response", e);
  }
  return encodeLine(json, maxValueSize, "response");
}

// ============================================================================
// Blocking
// ============================================================================

/**
 * Blocking JSON transport over a SyncByteChannel. Acts as a client or a
 * server; use one instance per role and connection.
 */
export class JsonTransport implements ClientTransport<JsonTx, JsonPending>, ServerTransport<JsonRx> {
  private readonly maxValueSize: number;
  private readonly generateId: () => string;
  private readonly scanner: JsonScanner;
  private readonly gate = new CallGate();
  private current: JsonRx | null = null;

  constructor(
    private readonly channel: SyncByteChannel,
    options: JsonTransportOptions = {},
  ) {
    this.maxValueSize = options.maxValueSize ?? DEFAULT_MAX_VALUE_SIZE;
    this.generateId = options.generateId ?? randomUUID;
    this.scanner = new JsonScanner(this.maxValueSize);
  }

  /** Get the underlying channel. */
  getChannel(): SyncByteChannel {
    return this.channel;
  }

  beginCall(id: MethodId): JsonTx {
    this.gate.begin();
    return startCall(id);
  }

  addParam<T>(name: string, value: T, type: WireType<T>, state: JsonTx): void {
    appendParam(this.gate, state, name, value, type);
  }

  finalize(state: JsonTx): JsonPending {
    const line = callLine(this.gate, state, this.generateId, this.maxValueSize);
    this.gate.run("finalize", () => this.channel.write(line));
    log("sent call %s (%d bytes)", state.method, line.length);
    return { consumed: false };
  }

  readResponse<T>(state: JsonPending, type: WireType<T>): T {
    consume(state, "response");
    const bytes = this.gate.run("readResponse", () => this.readValue());
    log("received response (%d bytes)", bytes.length);
    // The scanner has consumed the whole value; a bad one leaves the stream usable.
    this.gate.end();
    return decodeResponse(bytes, type);
  }

  beginReceive(): [PartialMethodId, JsonRx] {
    this.current = null;
    const bytes = this.readValue();
    log("received call (%d bytes)", bytes.length);
    const [id, state] = openCall(bytes);
    this.current = state;
    return [id, state];
  }

  readParam<T>(name: string, type: WireType<T>, state: JsonRx): T {
    return nextParam(state, name, type);
  }

  sendResponse<T>(value: T, type: WireType<T>): void {
    const line = responseLine(this.current, value, type, this.maxValueSize);
    this.current = null;
    this.channel.write(line);
    log("sent response (%d bytes)", line.length);
  }

  close(): void {
    this.channel.close();
  }

  private readValue(): Uint8Array {
    for (;;) {
      const value = this.scanner.next();
      if (value) return value;
      const chunk = readChunkSync(this.channel, READ_CHUNK_SIZE);
      if (chunk === null) {
        const last = this.scanner.finish();
        if (last) return last;
        throw RpcError.eof("stream ended before a JSON value");
      }
      this.scanner.push(chunk);
    }
  }
}

// ============================================================================
// Async
// ============================================================================

/** Promise-based JSON transport over an AsyncByteChannel. */
export class AsyncJsonTransport
  implements AsyncClientTransport<JsonTx, JsonPending>, AsyncServerTransport<JsonRx>
{
  private readonly maxValueSize: number;
  private readonly generateId: () => string;
  private readonly scanner: JsonScanner;
  private readonly gate = new CallGate();
  private current: JsonRx | null = null;

  constructor(
    private readonly channel: AsyncByteChannel,
    options: JsonTransportOptions = {},
  ) {
    this.maxValueSize = options.maxValueSize ?? DEFAULT_MAX_VALUE_SIZE;
    this.generateId = options.generateId ?? randomUUID;
    this.scanner = new JsonScanner(this.maxValueSize);
  }

  /** Get the underlying channel. */
  getChannel(): AsyncByteChannel {
    return this.channel;
  }

  async beginCall(id: MethodId): Promise<JsonTx> {
    this.gate.begin();
    return startCall(id);
  }

  async addParam<T>(name: string, value: T, type: WireType<T>, state: JsonTx): Promise<void> {
    appendParam(this.gate, state, name, value, type);
  }

  async finalize(state: JsonTx): Promise<JsonPending> {
    const line = callLine(this.gate, state, this.generateId, this.maxValueSize);
    await this.gate.runAsync("finalize", () => this.channel.write(line));
    log("sent call %s (%d bytes)", state.method, line.length);
    return { consumed: false };
  }

  async readResponse<T>(state: JsonPending, type: WireType<T>): Promise<T> {
    consume(state, "response");
    const bytes = await this.gate.runAsync("readResponse", () => this.readValue());
    log("received response (%d bytes)", bytes.length);
    this.gate.end();
    return decodeResponse(bytes, type);
  }

  async beginReceive(): Promise<[PartialMethodId, JsonRx]> {
    this.current = null;
    const bytes = await this.readValue();
    log("received call (%d bytes)", bytes.length);
    const [id, state] = openCall(bytes);
    this.current = state;
    return [id, state];
  }

  async readParam<T>(name: string, type: WireType<T>, state: JsonRx): Promise<T> {
    return nextParam(state, name, type);
  }

  async sendResponse<T>(value: T, type: WireType<T>): Promise<void> {
    const line = responseLine(this.current, value, type, this.maxValueSize);
    this.current = null;
    await this.channel.write(line);
    log("sent response (%d bytes)", line.length);
  }

  close(): void {
    this.channel.close();
  }

  private async readValue(): Promise<Uint8Array> {
    for (;;) {
      const value = this.scanner.next();
      if (value) return value;
      const chunk = await this.channel.readChunk();
      if (chunk === null) {
        const last = this.scanner.finish();
        if (last) return last;
        throw RpcError.eof("stream ended before a JSON value");
      }
      this.scanner.push(chunk);
    }
  }
}
