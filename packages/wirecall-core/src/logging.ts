// Logging decorator for client transports.
//
// Logs every call with its timing through a `debug` namespace. Enable with
// DEBUG=wirecall:* (or the namespace passed in the options).

import createDebug from "debug";
import type { WireType } from "@wirecall/postcard";
import type { AsyncClientTransport } from "./transport.ts";
import type { MethodId } from "./method.ts";
import { RpcError } from "./error.ts";

export interface LoggingOptions {
  /**
   * Namespace for debug matching. Defaults to "wirecall:client".
   */
  namespace?: string;

  /**
   * Log request arguments. Defaults to true.
   */
  logArgs?: boolean;

  /**
   * Log response values. Defaults to true.
   */
  logResults?: boolean;

  /**
   * Minimum duration (ms) to log. Calls faster than this are skipped.
   * Defaults to 0 (log all calls).
   */
  minDuration?: number;
}

export interface LoggedCall<S> {
  readonly inner: S;
  readonly method: string;
  readonly args: Record<string, unknown>;
  readonly start: number;
}

type CallOutcome = { ok: true; value: unknown } | { ok: false; error: unknown };

/**
 * Wrap an async client transport so every call is logged.
 *
 * Logs structured objects:
 * - Request: { type: "request", method, args? }
 * - Response: { type: "response", method, duration, ok, result? | error? }
 *
 * @example
 * ```typescript
 * const client = new AsyncRpcClient(Foo, withLogging(new AsyncBinaryTransport(channel)));
 * ```
 */
export function withLogging<TX, F>(
  transport: AsyncClientTransport<TX, F>,
  options: LoggingOptions = {},
): AsyncClientTransport<LoggedCall<TX>, LoggedCall<F>> {
  const log = createDebug(options.namespace ?? "wirecall:client");
  const logArgs = options.logArgs ?? true;
  const logResults = options.logResults ?? true;
  const minDuration = options.minDuration ?? 0;

  function report(call: LoggedCall<unknown>, outcome: CallOutcome): void {
    const duration = performance.now() - call.start;

    // Skip if below minimum duration
    if (duration < minDuration) return;
    if (!log.enabled) return;

    const logObj: Record<string, unknown> = {
      type: "response",
      method: call.method,
      duration: `${duration.toFixed(2)}ms`,
    };

    if (outcome.ok) {
      logObj.ok = true;
      if (logResults) {
        logObj.result = outcome.value;
      }
      log(`← ${call.method}: ✓ ${duration.toFixed(2)}ms`, logObj);
      return;
    }

    logObj.ok = false;
    const error = outcome.error;
    if (error instanceof RpcError) {
      logObj.errorKind = error.kind;
      logObj.error = error.toString();
    } else if (error instanceof Error) {
      logObj.error = { name: error.name, message: error.message };
    } else {
      logObj.error = error;
    }
    log(`← ${call.method}: ✗ ${duration.toFixed(2)}ms`, logObj);
  }

  return {
    async beginCall(id: MethodId): Promise<LoggedCall<TX>> {
      const start = performance.now();
      return { inner: await transport.beginCall(id), method: id.name, args: {}, start };
    },

    async addParam<T>(name: string, value: T, type: WireType<T>, state: LoggedCall<TX>): Promise<void> {
      await transport.addParam(name, value, type, state.inner);
      state.args[name] = value;
    },

    async finalize(state: LoggedCall<TX>): Promise<LoggedCall<F>> {
      if (log.enabled) {
        const logObj: Record<string, unknown> = { type: "request", method: state.method };
        if (logArgs && Object.keys(state.args).length > 0) {
          logObj.args = state.args;
        }
        log(`→ ${state.method}`, logObj);
      }
      return { ...state, inner: await transport.finalize(state.inner) };
    },

    async readResponse<T>(state: LoggedCall<F>, type: WireType<T>): Promise<T> {
      try {
        const value = await transport.readResponse(state.inner, type);
        report(state, { ok: true, value });
        return value;
      } catch (e) {
        report(state, { ok: false, error: e });
        throw e;
      }
    },
  };
}
