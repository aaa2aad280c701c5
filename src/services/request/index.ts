/**
 * Request module.
 *
 * Re-exports the wire method model, the transports and the dispatcher.
 */

export { Method, httpVerb, bodyOf } from "./method";
export type { HttpVerb } from "./method";
export { addQueryParameters, qualifiedVersion, NO_QUERY } from "./query";
export type { QueryParams, QueryValue } from "./query";
export {
  ParseError,
  ServiceError,
  CommunicationError,
  TransportError,
  isDispatchError,
} from "./errors";
export type { DispatchError } from "./errors";
export type { Transport, RequestBuilder } from "./transport";
export { NativeTransport } from "./native";
export type { NativeRequest } from "./native";
export { FetchTransport, CLIENT_AGENT_HEADER } from "./fetch";
export type { FetchLike, FetchRequest } from "./fetch";
export {
  Dispatcher,
  makeDispatcher,
  parseResponse,
  NativeDispatcherLive,
  FetchDispatcherLive,
} from "./dispatcher";
export type { DispatcherService, RequestOptions } from "./dispatcher";
