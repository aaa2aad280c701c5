/**
 * Node transport.
 *
 * Uses axios with its Node HTTP adapter. Responses are kept as raw text and
 * every status resolves, so that status handling stays in the dispatcher.
 */

import axios from "axios";
import type { AxiosInstance, AxiosRequestConfig, AxiosResponse } from "axios";
import { Effect } from "effect";
import { TransportError, describeCause } from "./errors";
import { bodyOf, type HttpVerb, type Method } from "./method";
import type { RequestBuilder, Transport } from "./transport";

/** Header values may hold tab, visible ASCII and the Latin-1 upper half. */
const INVALID_HEADER_VALUE = /[^\t\x20-\x7e\x80-\xff]/;

export interface NativeRequest {
  readonly config: AxiosRequestConfig;
  /** Name of the first header whose value cannot be sent. */
  readonly invalidHeader?: string;
}

class AxiosRequestBuilder implements RequestBuilder<NativeRequest> {
  private readonly headers: Record<string, string> = {};
  private verb: HttpVerb = "GET";
  private invalidHeader: string | undefined;

  constructor(private readonly url: string) {}

  withAuthorizationHeader(value: string): this {
    return this.setHeader("Authorization", value);
  }

  withUserAgentHeader(value: string): this {
    return this.setHeader("User-Agent", value);
  }

  withMethod(verb: HttpVerb): this {
    this.verb = verb;
    return this;
  }

  addBody<Q, B>(method: Method<Q, B>, contentType: string): NativeRequest {
    const body = bodyOf(method);
    const config: AxiosRequestConfig = {
      url: this.url,
      method: this.verb,
      headers: { ...this.headers },
      responseType: "text",
      // keep the raw text; the dispatcher decodes it
      transformResponse: [(data: unknown) => data],
      validateStatus: () => true,
    };

    if (body !== undefined) {
      config.headers = { ...this.headers, "Content-Type": contentType };
      config.data = JSON.stringify(body.value);
    }

    return { config, invalidHeader: this.invalidHeader };
  }

  private setHeader(name: string, value: string): this {
    if (this.invalidHeader === undefined && INVALID_HEADER_VALUE.test(value)) {
      this.invalidHeader = name;
    }
    this.headers[name] = value;
    return this;
  }
}

/**
 * Transport for Node processes.
 *
 * @example
 * ```typescript
 * // Default axios instance
 * const transport = new NativeTransport();
 *
 * // Shared keep-alive agent
 * const transport = new NativeTransport(
 *   axios.create({ httpAgent: new http.Agent({ keepAlive: true }) })
 * );
 * ```
 */
export class NativeTransport
  implements Transport<NativeRequest, AxiosResponse<unknown>>
{
  readonly name = "native";

  /**
   * @param http - The axios instance used to send requests
   */
  constructor(private readonly http: AxiosInstance = axios.create()) {}

  newRequest(url: string): RequestBuilder<NativeRequest> {
    return new AxiosRequestBuilder(url);
  }

  send(
    request: NativeRequest
  ): Effect.Effect<AxiosResponse<unknown>, TransportError> {
    const url = request.config.url ?? "";
    if (request.invalidHeader !== undefined) {
      return Effect.fail(new TransportError(url, "invalid header value"));
    }
    return Effect.tryPromise({
      try: (signal) => this.http.request<unknown>({ ...request.config, signal }),
      catch: (error) => new TransportError(url, describeCause(error), error),
    });
  }

  statusOf(response: AxiosResponse<unknown>): number {
    return response.status;
  }

  bodyTextOf(
    response: AxiosResponse<unknown>
  ): Effect.Effect<string, TransportError> {
    const data = response.data;
    if (typeof data === "string") {
      return Effect.succeed(data);
    }
    if (data === undefined || data === null) {
      return Effect.succeed("");
    }
    return Effect.fail(
      new TransportError(
        response.config.url ?? "",
        `Expected a text body, got ${typeof data}`
      )
    );
  }
}
