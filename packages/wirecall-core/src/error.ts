// Error model shared by every transport.
//
// RpcError is raised locally for protocol and channel failures. Its cause
// chain is a GenericError: a lossy projection of whatever was thrown that
// keeps the message text and the chain depth, so it can be serialized.

import { wireType, type Schema, type EnumSchema, type SchemaRegistry, type WireType } from "@wirecall/postcard";

/** What went wrong, coarsely. */
export const RpcErrorKind = {
  /** Encoding or decoding a value failed. */
  SerializationError: "SerializationError",
  /** The server could not resolve the method identifier. */
  UnknownMethod: "UnknownMethod",
  /** Channel-level I/O fault. Only concrete transports raise this. */
  TransportError: "TransportError",
  /** The peer closed the channel while a read was in progress. */
  TransportEOF: "TransportEOF",
  /** A transport was driven out of order, or its state reused. */
  IllegalState: "IllegalState",
  Other: "Other",
} as const;

export type RpcErrorKind = (typeof RpcErrorKind)[keyof typeof RpcErrorKind];

const RPC_ERROR_KINDS: readonly RpcErrorKind[] = Object.values(RpcErrorKind);

function isRpcErrorKind(value: string): value is RpcErrorKind {
  return RPC_ERROR_KINDS.some((kind) => kind === value);
}

// ============================================================================
// GenericError
// ============================================================================

/** Serialized shape of a GenericError. */
export interface GenericErrorWire {
  description: string;
  cause: GenericErrorWire | null;
}

/** Error chains deeper than this are cut off when projected. */
const MAX_CAUSE_DEPTH = 32;

export class GenericError extends Error {
  readonly description: string;
  cause: GenericError | null;

  constructor(description: string, cause: GenericError | null = null) {
    super(description);
    this.name = "GenericError";
    this.description = description;
    this.cause = cause;
  }

  /**
   * Project any thrown value. Error instances keep their message and their
   * `cause` chain; anything else is rendered with `String()`.
   */
  static from(error: unknown): GenericError {
    return projectError(error, new Set(), 0);
  }

  static fromWire(wire: GenericErrorWire): GenericError {
    return new GenericError(wire.description, wire.cause ? GenericError.fromWire(wire.cause) : null);
  }

  toWire(): GenericErrorWire {
    return { description: this.description, cause: this.cause ? this.cause.toWire() : null };
  }

  toString(): string {
    return this.cause ? `${this.description} caused by:\n ${this.cause.toString()}` : this.description;
  }
}

function projectError(error: unknown, seen: Set<unknown>, depth: number): GenericError {
  if (error instanceof GenericError) return error;
  seen.add(error);
  if (!(error instanceof Error)) {
    return new GenericError(typeof error === "string" ? error : String(error));
  }
  const next: unknown = error.cause;
  const cause =
    next === undefined || next === null || seen.has(next) || depth + 1 >= MAX_CAUSE_DEPTH
      ? null
      : projectError(next, seen, depth + 1);
  return new GenericError(error.message, cause);
}

// ============================================================================
// RpcError
// ============================================================================

/** Serialized shape of an RpcError. The kind is a unit enum variant. */
export interface RpcErrorWire {
  kind: { tag: string };
  msg: string;
  cause: GenericErrorWire | null;
}

export class RpcError extends Error {
  readonly kind: RpcErrorKind;
  cause: GenericError | null;

  constructor(kind: RpcErrorKind, message: string, cause: GenericError | null = null) {
    super(message);
    this.name = "RpcError";
    this.kind = kind;
    this.cause = cause;
  }

  /** Build an error whose cause is the projection of `cause`. */
  static with(kind: RpcErrorKind, message: string, cause?: unknown): RpcError {
    return new RpcError(kind, message, cause === undefined || cause === null ? null : GenericError.from(cause));
  }

  static serialization(message: string, cause?: unknown): RpcError {
    return RpcError.with(RpcErrorKind.SerializationError, message, cause);
  }

  static unknownMethod(message: string): RpcError {
    return new RpcError(RpcErrorKind.UnknownMethod, message);
  }

  static transport(message: string, cause?: unknown): RpcError {
    return RpcError.with(RpcErrorKind.TransportError, message, cause);
  }

  static eof(message = "unexpected end of stream"): RpcError {
    return new RpcError(RpcErrorKind.TransportEOF, message);
  }

  static illegalState(message: string): RpcError {
    return new RpcError(RpcErrorKind.IllegalState, message);
  }

  static fromWire(wire: RpcErrorWire): RpcError {
    if (!isRpcErrorKind(wire.kind.tag)) {
      throw new Error(`Unknown RpcErrorKind: ${wire.kind.tag}`);
    }
    return new RpcError(wire.kind.tag, wire.msg, wire.cause ? GenericError.fromWire(wire.cause) : null);
  }

  toWire(): RpcErrorWire {
    return { kind: { tag: this.kind }, msg: this.message, cause: this.cause ? this.cause.toWire() : null };
  }

  toString(): string {
    const head = `${this.name} (${this.kind}): ${this.message}`;
    return this.cause ? `${head} caused by:\n ${this.cause.toString()}` : head;
  }
}

/** Narrow an unknown value to RpcError, optionally of one kind. */
export function isRpcError(error: unknown, kind?: RpcErrorKind): error is RpcError {
  return error instanceof RpcError && (kind === undefined || error.kind === kind);
}

// ============================================================================
// Wire types
// ============================================================================

const causeSchema: Schema = { kind: "option", inner: { kind: "ref", name: "GenericError" } };

const genericErrorSchema: Schema = {
  kind: "struct",
  fields: {
    description: { kind: "string" },
    cause: causeSchema,
  },
};

const rpcErrorKindSchema: EnumSchema = {
  kind: "enum",
  variants: RPC_ERROR_KINDS.map((name) => ({ name, fields: { kind: "unit" } })),
};

const errorRegistry: SchemaRegistry = new Map([["GenericError", genericErrorSchema]]);

export const genericErrorType: WireType<GenericErrorWire> = wireType(
  { kind: "ref", name: "GenericError" },
  errorRegistry,
);

export const rpcErrorType: WireType<RpcErrorWire> = wireType(
  {
    kind: "struct",
    fields: {
      kind: rpcErrorKindSchema,
      msg: { kind: "string" },
      cause: causeSchema,
    },
  },
  errorRegistry,
);
