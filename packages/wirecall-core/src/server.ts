// Servers: resolve each incoming call to a handler and answer it.
//
// Calls are served strictly one after another on a transport. An
// unresolvable method identifier is reported to whoever is running the
// server as RpcError(UnknownMethod); nothing is sent back to the peer, which
// typically sees the connection close.

import createDebug, { type Debugger } from "debug";
import type { ServerTransport, AsyncServerTransport } from "./transport.ts";
import type { Service, MethodMap, AnyMethod, Handlers, AsyncHandlers } from "./service.ts";
import { MethodTable, formatPartialMethodId, type PartialMethodId } from "./method.ts";
import { RpcError, RpcErrorKind } from "./error.ts";

const defaultLog = createDebug("wirecall:server");

export interface ServerOptions {
  /** Defaults to the `wirecall:server` namespace. */
  logger?: Debugger;
}

interface DispatchEntry {
  method: AnyMethod;
  /** The handler method, bound to its handler object. */
  call: (args: unknown[]) => unknown;
}

/** The per-server dispatch table. */
class Dispatcher {
  private readonly table: MethodTable;
  private readonly entries: DispatchEntry[];

  constructor(
    private readonly service: Service<MethodMap>,
    handlers: object,
  ) {
    this.table = new MethodTable(service.list.map((m) => m.id));
    this.entries = [];
    for (const [key, method] of Object.entries(service.methods)) {
      const impl: unknown = Reflect.get(handlers, key);
      if (typeof impl !== "function") {
        throw new Error(`No handler for ${service.name}.${key}`);
      }
      const call = (args: unknown[]): unknown => Reflect.apply(impl, handlers, args);
      this.entries[method.id.index] = { method, call };
    }
  }

  resolve(id: PartialMethodId): DispatchEntry {
    const index = this.table.resolve(id);
    const entry = index === undefined ? undefined : this.entries[index];
    if (!entry) {
      throw RpcError.unknownMethod(`no method ${formatPartialMethodId(id)} in service ${this.service.name}`);
    }
    return entry;
  }

  invoke(entry: DispatchEntry, args: unknown[]): unknown {
    try {
      return entry.call(args);
    } catch (e) {
      throw this.handlerFailed(entry, e);
    }
  }

  async invokeAsync(entry: DispatchEntry, args: unknown[]): Promise<unknown> {
    try {
      return await entry.call(args);
    } catch (e) {
      throw this.handlerFailed(entry, e);
    }
  }

  label(entry: DispatchEntry): string {
    return `${this.service.name}.${entry.method.id.name}`;
  }

  private handlerFailed(entry: DispatchEntry, cause: unknown): RpcError {
    return RpcError.with(RpcErrorKind.Other, `handler for ${this.label(entry)} threw`, cause);
  }
}

function logStop(log: Debugger, error: unknown): void {
  if (error instanceof RpcError && error.kind === RpcErrorKind.TransportEOF) {
    log("peer disconnected, serve loop finished");
  } else {
    log("serve loop stopped: %s", error instanceof Error ? error.message : String(error));
  }
}

// ============================================================================
// Blocking server
// ============================================================================

export class RpcServer<M extends MethodMap, RX> {
  private readonly dispatcher: Dispatcher;
  private readonly log: Debugger;

  constructor(
    readonly service: Service<M>,
    handlers: Handlers<M>,
    private readonly transport: ServerTransport<RX>,
    options: ServerOptions = {},
  ) {
    this.dispatcher = new Dispatcher(service, handlers);
    this.log = options.logger ?? defaultLog;
  }

  /** Receive one call, run its handler and send the response. */
  serveSingleCall(): void {
    const [id, rx] = this.transport.beginReceive();
    const entry = this.dispatcher.resolve(id);
    const args = entry.method.params.map((p) => this.transport.readParam(p.name, p.type, rx));
    const start = performance.now();
    const result = this.dispatcher.invoke(entry, args);
    this.transport.sendResponse(result, entry.method.result);
    this.log("%s served in %sms", this.dispatcher.label(entry), (performance.now() - start).toFixed(2));
  }

  /** Serve calls for as long as `keepServing` returns true. It is checked after each call. */
  serveUntil(keepServing: () => boolean): void {
    try {
      do {
        this.serveSingleCall();
      } while (keepServing());
    } catch (e) {
      logStop(this.log, e);
      throw e;
    }
  }

  /** Serve until something fails; a clean disconnect surfaces as TransportEOF. */
  serve(): never {
    try {
      for (;;) {
        this.serveSingleCall();
      }
    } catch (e) {
      logStop(this.log, e);
      throw e;
    }
  }
}

// ============================================================================
// Async server
// ============================================================================

export class AsyncRpcServer<M extends MethodMap, RX> {
  private readonly dispatcher: Dispatcher;
  private readonly log: Debugger;

  constructor(
    readonly service: Service<M>,
    handlers: AsyncHandlers<M>,
    private readonly transport: AsyncServerTransport<RX>,
    options: ServerOptions = {},
  ) {
    this.dispatcher = new Dispatcher(service, handlers);
    this.log = options.logger ?? defaultLog;
  }

  async serveSingleCall(): Promise<void> {
    const [id, rx] = await this.transport.beginReceive();
    const entry = this.dispatcher.resolve(id);
    const args: unknown[] = [];
    for (const p of entry.method.params) {
      args.push(await this.transport.readParam(p.name, p.type, rx));
    }
    const start = performance.now();
    const result = await this.dispatcher.invokeAsync(entry, args);
    await this.transport.sendResponse(result, entry.method.result);
    this.log("%s served in %sms", this.dispatcher.label(entry), (performance.now() - start).toFixed(2));
  }

  async serveUntil(keepServing: () => boolean): Promise<void> {
    try {
      do {
        await this.serveSingleCall();
      } while (keepServing());
    } catch (e) {
      logStop(this.log, e);
      throw e;
    }
  }

  async serve(): Promise<never> {
    try {
      for (;;) {
        await this.serveSingleCall();
      }
    } catch (e) {
      logStop(this.log, e);
      throw e;
    }
  }
}
