// Transport contracts.
//
// A client drives one call through beginCall -> addParam* -> finalize ->
// readResponse; a server through beginReceive -> readParam* -> sendResponse.
// State objects are private to the transport that created them and live for
// a single call.

import type { WireType } from "@wirecall/postcard";
import type { MethodId, PartialMethodId } from "./method.ts";
import { RpcError } from "./error.ts";

// ============================================================================
// Client
// ============================================================================

export interface ClientTransport<TX, F> {
  /** Start a call. May transmit immediately or defer until finalize. */
  beginCall(id: MethodId): TX;
  /** Add the next declared parameter. Fails with SerializationError. */
  addParam<T>(name: string, value: T, type: WireType<T>, state: TX): void;
  /** All call bytes are on the wire when this returns. */
  finalize(state: TX): F;
  /** Wait for the complete response and decode it as `type`. */
  readResponse<T>(state: F, type: WireType<T>): T;
}

/**
 * Promise-based client contract. Same ordering as ClientTransport; an
 * operation that fails part-way leaves the transport unusable.
 */
export interface AsyncClientTransport<TX, F> {
  beginCall(id: MethodId): Promise<TX>;
  addParam<T>(name: string, value: T, type: WireType<T>, state: TX): Promise<void>;
  finalize(state: TX): Promise<F>;
  readResponse<T>(state: F, type: WireType<T>): Promise<T>;
}

// ============================================================================
// Server
// ============================================================================

export interface ServerTransport<RX> {
  /** Wait for one complete call. TransportEOF when the peer has gone. */
  beginReceive(): [PartialMethodId, RX];
  /**
   * Read the next parameter. The name is a hint; positional transports
   * keep their own cursor.
   */
  readParam<T>(name: string, type: WireType<T>, state: RX): T;
  /** Send the single response to the call being served. */
  sendResponse<T>(value: T, type: WireType<T>): void;
}

export interface AsyncServerTransport<RX> {
  beginReceive(): Promise<[PartialMethodId, RX]>;
  readParam<T>(name: string, type: WireType<T>, state: RX): Promise<T>;
  sendResponse<T>(value: T, type: WireType<T>): Promise<void>;
}

// ============================================================================
// Call state bookkeeping
// ============================================================================

/** Base of every transport state object. */
export interface CallState {
  consumed: boolean;
}

/** Fail unless the state is still live. */
export function ensureLive(state: CallState, what: string): void {
  if (state.consumed) {
    throw RpcError.illegalState(`${what} state was already used`);
  }
}

/** Mark a state as used; a second consume fails with IllegalState. */
export function consume(state: CallState, what: string): void {
  ensureLive(state, what);
  state.consumed = true;
}

/**
 * Tracks whether a client transport is mid-call. A call that fails once its
 * bytes may have reached the wire poisons the transport: the stream can no
 * longer be trusted to be at a message boundary, so later calls are refused.
 */
export class CallGate {
  private inCall = false;
  private poisonedBy: string | null = null;

  /** Enter a new call. */
  begin(): void {
    if (this.poisonedBy !== null) {
      throw RpcError.illegalState(`transport is unusable after an interrupted call: ${this.poisonedBy}`);
    }
    if (this.inCall) {
      this.poison("a new call began before the previous one finished");
      throw RpcError.illegalState("a call is already in progress on this transport");
    }
    this.inCall = true;
  }

  /** Leave the current call, whether it completed or was dropped before writing. */
  end(): void {
    this.inCall = false;
  }

  poison(reason: string): void {
    this.poisonedBy ??= reason;
  }

  get poisoned(): boolean {
    return this.poisonedBy !== null;
  }

  /** Run a step that touches the wire; failure poisons the transport. */
  run<T>(what: string, fn: () => T): T {
    try {
      return fn();
    } catch (e) {
      this.poison(`${what} failed: ${describeFailure(e)}`);
      throw e;
    }
  }

  async runAsync<T>(what: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (e) {
      this.poison(`${what} failed: ${describeFailure(e)}`);
      throw e;
    }
  }
}

function describeFailure(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
