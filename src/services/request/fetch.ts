/**
 * Fetch transport.
 *
 * For hosts that only expose the WHATWG `fetch` API: browsers, web workers and
 * edge runtimes. Also runs on Node, which ships `fetch` as a global.
 */

import { Effect } from "effect";
import { TransportError, describeCause } from "./errors";
import { bodyOf, type HttpVerb, type Method } from "./method";
import type { RequestBuilder, Transport } from "./transport";

/**
 * Browsers refuse a script-set `User-Agent`, so the client identifies itself
 * with this header instead.
 */
export const CLIENT_AGENT_HEADER = "X-Searchlane-Client";

/**
 * Any function with the shape of the global `fetch`.
 */
export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface FetchRequest {
  readonly url: string;
  readonly init: RequestInit;
}

class FetchRequestBuilder implements RequestBuilder<FetchRequest> {
  private readonly headers: Record<string, string> = {};
  private verb: HttpVerb = "GET";

  constructor(private readonly url: string) {}

  withAuthorizationHeader(value: string): this {
    this.headers["Authorization"] = value;
    return this;
  }

  withUserAgentHeader(value: string): this {
    this.headers[CLIENT_AGENT_HEADER] = value;
    return this;
  }

  withMethod(verb: HttpVerb): this {
    this.verb = verb;
    return this;
  }

  addBody<Q, B>(method: Method<Q, B>, contentType: string): FetchRequest {
    const body = bodyOf(method);
    if (body === undefined) {
      return {
        url: this.url,
        init: { method: this.verb, headers: { ...this.headers } },
      };
    }
    return {
      url: this.url,
      init: {
        method: this.verb,
        headers: { ...this.headers, "Content-Type": contentType },
        body: JSON.stringify(body.value),
      },
    };
  }
}

/**
 * Transport over `fetch`.
 *
 * @example
 * ```typescript
 * const transport = new FetchTransport();
 *
 * // Custom fetch, e.g. one that adds tracing headers
 * const transport = new FetchTransport((input, init) => tracedFetch(input, init));
 * ```
 */
export class FetchTransport implements Transport<FetchRequest, Response> {
  readonly name = "fetch";

  /**
   * @param fetchFn - The function used to send requests (default: global `fetch`)
   */
  constructor(
    private readonly fetchFn: FetchLike = (input, init) => fetch(input, init)
  ) {}

  newRequest(url: string): RequestBuilder<FetchRequest> {
    return new FetchRequestBuilder(url);
  }

  send(request: FetchRequest): Effect.Effect<Response, TransportError> {
    return Effect.tryPromise({
      // invalid URLs and header values reject inside fetch
      try: (signal) => this.fetchFn(request.url, { ...request.init, signal }),
      catch: (error) =>
        new TransportError(request.url, describeCause(error), error),
    });
  }

  statusOf(response: Response): number {
    return response.status;
  }

  bodyTextOf(response: Response): Effect.Effect<string, TransportError> {
    return Effect.tryPromise({
      try: () => response.text(),
      catch: (error) =>
        new TransportError(
          response.url,
          `Could not read response body: ${describeCause(error)}`,
          error
        ),
    });
  }
}
