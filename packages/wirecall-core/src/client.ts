// Typed clients over the client transport contracts.

import type { ClientTransport, AsyncClientTransport } from "./transport.ts";
import type { Service, MethodMap, Method, ParamList, ArgsOf } from "./service.ts";
import { belongsTo } from "./service.ts";
import { LockedAsyncClientTransport } from "./lock.ts";
import { RpcError } from "./error.ts";

/** Blocking client. Each call occupies the caller for the full round trip. */
export class RpcClient<M extends MethodMap, TX, F> {
  constructor(
    readonly service: Service<M>,
    private readonly transport: ClientTransport<TX, F>,
  ) {}

  call<P extends ParamList, R>(method: Method<P, R>, ...args: ArgsOf<P>): R {
    checkMethod(this.service, method, args.length);
    const tx = this.transport.beginCall(method.id);
    method.params.forEach((p, i) => {
      this.transport.addParam(p.name, args[i], p.type, tx);
    });
    const pending = this.transport.finalize(tx);
    return this.transport.readResponse(pending, method.result);
  }
}

/**
 * Async client. Concurrent calls are queued on a lock so only one is ever
 * in flight on the transport.
 */
export class AsyncRpcClient<M extends MethodMap, TX, F> {
  private readonly transport: LockedAsyncClientTransport<TX, F>;

  constructor(
    readonly service: Service<M>,
    transport: AsyncClientTransport<TX, F>,
  ) {
    this.transport = new LockedAsyncClientTransport(transport);
  }

  async call<P extends ParamList, R>(method: Method<P, R>, ...args: ArgsOf<P>): Promise<R> {
    checkMethod(this.service, method, args.length);
    const tx = await this.transport.beginCall(method.id);
    for (const [i, p] of method.params.entries()) {
      await this.transport.addParam(p.name, args[i], p.type, tx);
    }
    const pending = await this.transport.finalize(tx);
    return this.transport.readResponse(pending, method.result);
  }
}

function checkMethod<M extends MethodMap>(
  service: Service<M>,
  method: Method<ParamList, unknown>,
  argCount: number,
): void {
  if (!belongsTo(service, method)) {
    throw RpcError.illegalState(`${method.service}.${method.id.name} is not a method of ${service.name}`);
  }
  if (argCount !== method.params.length) {
    throw RpcError.illegalState(
      `${service.name}.${method.id.name} takes ${method.params.length} arguments, got ${argCount}`,
    );
  }
}
