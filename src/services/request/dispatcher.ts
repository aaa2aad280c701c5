/**
 * Request dispatcher.
 *
 * Turns a wire method into one HTTP call through a {@link Transport} and the
 * response into either a decoded value or one of the client errors.
 */

import { Context, Effect, Either, Layer, ParseResult, Schema } from "effect";
import {
  CommunicationError,
  ParseError,
  ServiceError,
  type DispatchError,
} from "./errors";
import { FetchTransport, type FetchLike } from "./fetch";
import { httpVerb, type Method } from "./method";
import { NativeTransport } from "./native";
import { addQueryParameters, qualifiedVersion, type QueryParams } from "./query";
import type { Transport } from "./transport";

const CONTENT_TYPE = "application/json";

/** Longest body excerpt carried by a {@link CommunicationError}. */
const DETAIL_LENGTH = 200;

/**
 * Error payload returned by the service.
 */
const ServiceErrorBody = Schema.Struct({
  message: Schema.String,
  code: Schema.String,
  type: Schema.String,
  link: Schema.optional(Schema.String),
});

/**
 * A single call: where to send it, how, and what a successful answer
 * looks like.
 */
export interface RequestOptions<Q extends QueryParams, B, A, I> {
  /** Fully-qualified URL without a query string. */
  readonly url: string;
  /** Sent as a bearer token when present. */
  readonly apiKey?: string;
  readonly method: Method<Q, B>;
  /** The one status code that means success for this call. */
  readonly expectedStatus: number;
  /** Decoder for the successful response body. */
  readonly schema: Schema.Schema<A, I>;
}

export interface DispatcherService {
  /**
   * Send one request and decode its response.
   *
   * Never retries: every failure goes straight to the caller.
   */
  execute<Q extends QueryParams, B, A, I>(
    options: RequestOptions<Q, B, A, I>
  ): Effect.Effect<A, DispatchError>;
}

/**
 * The dispatcher service. Which transport backs it is decided when the
 * program is composed, by providing one of the layers below.
 */
export class Dispatcher extends Context.Tag("Dispatcher")<
  Dispatcher,
  DispatcherService
>() {}

/**
 * Build a dispatcher on top of any transport.
 */
export function makeDispatcher<Prepared, Raw>(
  transport: Transport<Prepared, Raw>
): DispatcherService {
  return {
    execute: <Q extends QueryParams, B, A, I>(
      options: RequestOptions<Q, B, A, I>
    ) =>
      Effect.gen(function* () {
        const verb = httpVerb(options.method);
        let builder = transport
          .newRequest(addQueryParameters(options.url, options.method.query))
          .withMethod(verb)
          .withUserAgentHeader(qualifiedVersion());

        if (options.apiKey !== undefined) {
          builder = builder.withAuthorizationHeader(`Bearer ${options.apiKey}`);
        }

        const response = yield* transport.send(
          builder.addBody(options.method, CONTENT_TYPE)
        );
        const status = transport.statusOf(response);
        const text = yield* transport.bodyTextOf(response);

        return yield* parseResponse(
          status,
          options.expectedStatus,
          text,
          options.url,
          options.schema
        );
      }).pipe(
        Effect.withSpan("request.execute", {
          attributes: { transport: transport.name, url: options.url },
        })
      ),
  };
}

/**
 * Classify a response.
 *
 * - expected status: decode `body` with `schema`, or fail with `ParseError`
 * - other status with a service error body: `ServiceError`
 * - other status ≥ 400 with any other body: `CommunicationError`
 * - other status < 400 with any other body: `ParseError`
 *
 * An empty body reads as JSON `null`.
 */
export function parseResponse<A, I>(
  status: number,
  expectedStatus: number,
  body: string,
  url: string,
  schema: Schema.Schema<A, I>
): Effect.Effect<A, ParseError | ServiceError | CommunicationError> {
  return Effect.gen(function* () {
    const text = body.length === 0 ? "null" : body;

    if (status === expectedStatus) {
      const decoded = yield* Effect.either(decodeJson(schema, text));
      if (Either.isLeft(decoded)) {
        yield* Effect.logError(
          "[REQUEST] Request succeeded but failed to parse response"
        );
        return yield* Effect.fail(toParseError(decoded.left, url, body));
      }
      yield* Effect.logDebug("[REQUEST] Request succeeded");
      return decoded.right;
    }

    yield* Effect.logWarning(
      `[REQUEST] Expected response code ${expectedStatus}, got ${status}`
    );

    const serviceError = yield* Effect.either(decodeJson(ServiceErrorBody, text));
    if (Either.isRight(serviceError)) {
      const { code, message, type, link } = serviceError.right;
      return yield* Effect.fail(
        new ServiceError(code, message, type, status, url, link)
      );
    }
    if (status >= 400) {
      return yield* Effect.fail(
        new CommunicationError(status, url, detailOf(body))
      );
    }
    return yield* Effect.fail(toParseError(serviceError.left, url, body));
  });
}

function detailOf(body: string): string | undefined {
  const trimmed = body.trim();
  if (trimmed === "") {
    return undefined;
  }
  return trimmed.length > DETAIL_LENGTH
    ? `${trimmed.slice(0, DETAIL_LENGTH)}...`
    : trimmed;
}

function decodeJson<A, I>(
  schema: Schema.Schema<A, I>,
  text: string
): Effect.Effect<A, ParseResult.ParseError> {
  return Schema.decodeUnknown(Schema.parseJson(schema))(text);
}

function toParseError(
  error: ParseResult.ParseError,
  url: string,
  body: string
): ParseError {
  return new ParseError(error.message, url, body, error);
}

/**
 * Dispatcher over Node's HTTP stack.
 */
export const NativeDispatcherLive = Layer.sync(Dispatcher, () =>
  makeDispatcher(new NativeTransport())
);

/**
 * Dispatcher over `fetch`, for browsers and other sandboxed hosts.
 *
 * @param fetchFn - Optional replacement for the global `fetch`
 */
export const FetchDispatcherLive = (fetchFn?: FetchLike) =>
  Layer.sync(Dispatcher, () => makeDispatcher(new FetchTransport(fetchFn)));
