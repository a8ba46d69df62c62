// @wirecall/core - error model, method identity, transport contracts,
// clients, servers and the shared-transport lock.

export {
  RpcErrorKind,
  RpcError,
  GenericError,
  isRpcError,
  genericErrorType,
  rpcErrorType,
  type GenericErrorWire,
  type RpcErrorWire,
} from "./error.ts";

export { methodId, PartialMethodId, MethodTable, formatPartialMethodId, type MethodId } from "./method.ts";

export {
  type ClientTransport,
  type AsyncClientTransport,
  type ServerTransport,
  type AsyncServerTransport,
  type CallState,
  ensureLive,
  consume,
  CallGate,
} from "./transport.ts";

export { AsyncMutex, LockedAsyncClientTransport, LockedClientTransport, type Locked } from "./lock.ts";

export {
  param,
  defineService,
  belongsTo,
  type Param,
  type ParamList,
  type ArgsOf,
  type Method,
  type AnyMethod,
  type MethodMap,
  type MethodFactory,
  type Service,
  type Handlers,
  type AsyncHandlers,
} from "./service.ts";

export { RpcClient, AsyncRpcClient } from "./client.ts";
export { RpcServer, AsyncRpcServer, type ServerOptions } from "./server.ts";
export { withLogging, type LoggingOptions, type LoggedCall } from "./logging.ts";
