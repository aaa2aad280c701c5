/**
 * Transport interface.
 *
 * A transport performs one HTTP call over one concrete channel. The dispatcher
 * only ever talks to this interface, so request building and response parsing
 * stay identical whether the bytes travel through Node's sockets or through a
 * browser's `fetch`.
 */

import type { Effect } from "effect";
import type { TransportError } from "./errors";
import type { HttpVerb, Method } from "./method";

/**
 * Builder for a single outgoing request.
 */
export interface RequestBuilder<Prepared> {
  /**
   * Set the `Authorization` header to the given value (e.g. `Bearer <key>`).
   */
  withAuthorizationHeader(value: string): RequestBuilder<Prepared>;

  /**
   * Identify the client to the service.
   */
  withUserAgentHeader(value: string): RequestBuilder<Prepared>;

  withMethod(verb: HttpVerb): RequestBuilder<Prepared>;

  /**
   * Finish the request. The JSON body and its content type are attached only
   * for methods that carry a body.
   */
  addBody<Q, B>(method: Method<Q, B>, contentType: string): Prepared;
}

/**
 * One concrete channel for HTTP calls.
 *
 * @example
 * ```typescript
 * // Node
 * const transport = new NativeTransport();
 *
 * // Browser or worker
 * const transport = new FetchTransport();
 *
 * // Both plug into the same dispatcher
 * const dispatcher = makeDispatcher(transport);
 * ```
 */
export interface Transport<Prepared, Raw> {
  /** Short name used in logs and spans. */
  readonly name: string;

  newRequest(url: string): RequestBuilder<Prepared>;

  /**
   * Perform the round trip. Connection-level failures become `TransportError`.
   */
  send(request: Prepared): Effect.Effect<Raw, TransportError>;

  statusOf(response: Raw): number;

  /**
   * Drain the response body as text.
   */
  bodyTextOf(response: Raw): Effect.Effect<string, TransportError>;
}
