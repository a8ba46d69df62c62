// @wirecall/json - JSON envelopes over byte channels.

export {
  JsonTransport,
  AsyncJsonTransport,
  DEFAULT_MAX_VALUE_SIZE,
  type JsonTransportOptions,
  type JsonTx,
  type JsonPending,
  type JsonRx,
} from "./transport.ts";
export { JsonScanner } from "./scanner.ts";
export { toJson, fromJson } from "./json_mapping.ts";
export {
  parseJson,
  stringifyJson,
  isJsonObject,
  JsonSyntaxError,
  type JsonValue,
  type JsonObject,
} from "./json_text.ts";
