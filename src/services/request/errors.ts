/**
 * Client error types.
 *
 * Every failure the client can report is one of these tagged classes, so they
 * travel through the typed error channel of an Effect and can be matched with
 * `Effect.catchTag`.
 */

/**
 * The service answered, but the body did not decode into the expected shape.
 * Usually means the client and the service disagree on a schema.
 */
export class ParseError extends Error {
  readonly _tag = "ParseError";

  constructor(
    message: string,
    public readonly url: string,
    public readonly body: string,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = "ParseError";
    Object.setPrototypeOf(this, ParseError.prototype);
  }
}

/**
 * The service rejected the request with a structured error payload.
 */
export class ServiceError extends Error {
  readonly _tag = "ServiceError";

  constructor(
    public readonly errorCode: string,
    public readonly errorMessage: string,
    public readonly errorType: string,
    public readonly statusCode: number,
    public readonly url: string,
    public readonly errorLink?: string
  ) {
    super(`${errorMessage} (${errorCode})`);
    this.name = "ServiceError";
    Object.setPrototypeOf(this, ServiceError.prototype);
  }
}

/**
 * An error status whose body is not a service error, typically produced by a
 * proxy or gateway in front of the service.
 */
export class CommunicationError extends Error {
  readonly _tag = "CommunicationError";

  constructor(
    public readonly statusCode: number,
    public readonly url: string,
    public readonly detail?: string
  ) {
    super(
      `HTTP ${statusCode} from ${url}${detail === undefined ? "" : `: ${detail}`}`
    );
    this.name = "CommunicationError";
    Object.setPrototypeOf(this, CommunicationError.prototype);
  }
}

/**
 * The request never produced a response: bad URL or header, DNS, TLS,
 * refused connection, or a body that could not be read.
 */
export class TransportError extends Error {
  readonly _tag = "TransportError";

  constructor(
    public readonly url: string,
    public readonly reason: string,
    public readonly cause?: unknown
  ) {
    super(`Request to ${url} failed: ${reason}`);
    this.name = "TransportError";
    Object.setPrototypeOf(this, TransportError.prototype);
  }
}

/**
 * Errors `Dispatcher.execute` can fail with.
 */
export type DispatchError =
  | ParseError
  | ServiceError
  | CommunicationError
  | TransportError;

/**
 * Type guard for the errors produced by the dispatcher.
 */
export function isDispatchError(value: unknown): value is DispatchError {
  return (
    value instanceof ParseError ||
    value instanceof ServiceError ||
    value instanceof CommunicationError ||
    value instanceof TransportError
  );
}

/**
 * Best-effort description of a thrown value for error messages.
 */
export function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
