// Service definitions.
//
// A service is a runtime table of methods: each has a MethodId, an ordered
// parameter list and a result type. Clients and servers are built from the
// same definition, so both ends agree on indices, names and types.
//
// ```typescript
// const Foo = defineService("Foo", (method) => ({
//   bar: method("bar", [param("a", t.string), param("b", t.i32)], t.result(t.string, TestErr)),
// }));
// ```

import type { WireType } from "@wirecall/postcard";
import { methodId, type MethodId } from "./method.ts";

export interface Param<T> {
  readonly name: string;
  readonly type: WireType<T>;
}

export function param<T>(name: string, type: WireType<T>): Param<T> {
  return { name, type };
}

export type ParamList = readonly Param<unknown>[];

/** Argument tuple for a parameter list. */
export type ArgsOf<P extends ParamList> = { -readonly [K in keyof P]: P[K] extends Param<infer T> ? T : never };

export interface Method<P extends ParamList, R> {
  readonly service: string;
  readonly id: MethodId;
  readonly params: P;
  readonly result: WireType<R>;
}

export type AnyMethod = Method<ParamList, unknown>;

export type MethodMap = Record<string, AnyMethod>;

export type MethodFactory = <const P extends ParamList, R>(
  name: string,
  params: P,
  result: WireType<R>,
) => Method<P, R>;

export interface Service<M extends MethodMap> {
  readonly name: string;
  readonly methods: M;
  /** Methods by index. */
  readonly list: readonly AnyMethod[];
}

/**
 * Declare a service. Indices are assigned in the order `method` is called,
 * starting at 0.
 */
export function defineService<M extends MethodMap>(
  name: string,
  build: (method: MethodFactory) => M,
): Service<M> {
  const list: AnyMethod[] = [];
  const names = new Set<string>();
  const method: MethodFactory = (methodName, params, result) => {
    if (names.has(methodName)) {
      throw new Error(`Duplicate method ${methodName} in service ${name}`);
    }
    const paramNames = new Set<string>();
    for (const p of params) {
      if (paramNames.has(p.name)) {
        throw new Error(`Duplicate parameter ${p.name} in ${name}.${methodName}`);
      }
      paramNames.add(p.name);
    }
    names.add(methodName);
    const m = Object.freeze({ service: name, id: methodId(methodName, list.length), params, result });
    list.push(m);
    return m;
  };
  const methods = build(method);
  for (const [key, m] of Object.entries(methods)) {
    if (!list.includes(m)) {
      throw new Error(`Method ${key} of service ${name} was not created by its method factory`);
    }
  }
  return { name, methods, list };
}

/** Whether `method` was declared by `service`. */
export function belongsTo(service: Service<MethodMap>, method: AnyMethod): boolean {
  return service.list[method.id.index] === method;
}

// ============================================================================
// Handler types
// ============================================================================

type MethodResult<X> = X extends Method<ParamList, infer R> ? R : never;

type MethodArgs<X> = X extends Method<infer P extends ParamList, unknown> ? ArgsOf<P> : never;

/** Implementation of every method of a service, for blocking servers. */
export type Handlers<M extends MethodMap> = {
  [K in keyof M]: (...args: MethodArgs<M[K]>) => MethodResult<M[K]>;
};

/** Implementation of every method of a service, for async servers. */
export type AsyncHandlers<M extends MethodMap> = {
  [K in keyof M]: (...args: MethodArgs<M[K]>) => MethodResult<M[K]> | Promise<MethodResult<M[K]>>;
};
