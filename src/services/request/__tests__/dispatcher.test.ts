import { Effect, Schema } from "effect";
import { describe, expect, test, vi } from "vitest";
import { Dispatcher, FetchDispatcherLive, parseResponse } from "../dispatcher";
import {
  CommunicationError,
  ParseError,
  ServiceError,
  TransportError,
} from "../errors";
import type { FetchLike } from "../fetch";
import { Method } from "../method";
import { NO_QUERY, type QueryParams } from "../query";

const INDEX_URL = "http://localhost:7700/indexes/movies";
const Health = Schema.Struct({ status: Schema.String });

describe("parseResponse", () => {
  test("decodes the body when the status is the expected one", async () => {
    const health = await Effect.runPromise(
      parseResponse(200, 200, '{"status":"available"}', INDEX_URL, Health)
    );
    expect(health).toEqual({ status: "available" });
  });

  test("reads an empty body as null", async () => {
    const value = await Effect.runPromise(
      parseResponse(202, 202, "", INDEX_URL, Schema.Null)
    );
    expect(value).toBeNull();
  });

  test("fails with ParseError when the expected body does not decode", async () => {
    const error = await Effect.runPromise(
      Effect.flip(parseResponse(200, 200, '{"status":1}', INDEX_URL, Health))
    );
    expect(error).toBeInstanceOf(ParseError);
    expect(error).toMatchObject({ url: INDEX_URL, body: '{"status":1}' });
  });

  test("fails with ParseError when the body is not JSON", async () => {
    const error = await Effect.runPromise(
      Effect.flip(parseResponse(200, 200, "not json", INDEX_URL, Health))
    );
    expect(error).toBeInstanceOf(ParseError);
    expect(error).toMatchObject({ body: "not json" });
  });

  test("turns a service error body into ServiceError", async () => {
    const body = JSON.stringify({
      message: "Index `movies` not found.",
      code: "index_not_found",
      type: "invalid_request",
      link: "https://example.com/errors#index_not_found",
    });
    const error = await Effect.runPromise(
      Effect.flip(parseResponse(404, 200, body, INDEX_URL, Health))
    );

    expect(error).toBeInstanceOf(ServiceError);
    expect(error).toMatchObject({
      errorCode: "index_not_found",
      errorMessage: "Index `movies` not found.",
      errorType: "invalid_request",
      errorLink: "https://example.com/errors#index_not_found",
      statusCode: 404,
      url: INDEX_URL,
    });
    expect(error.message).toBe("Index `movies` not found. (index_not_found)");
  });

  test("accepts a service error without a link", async () => {
    const body = '{"message":"Bad key","code":"invalid_api_key","type":"auth"}';
    const error = await Effect.runPromise(
      Effect.flip(parseResponse(403, 200, body, INDEX_URL, Health))
    );
    expect(error).toBeInstanceOf(ServiceError);
    expect(error).toMatchObject({ statusCode: 403, errorLink: undefined });
  });

  test("reports other error statuses as CommunicationError", async () => {
    const error = await Effect.runPromise(
      Effect.flip(parseResponse(502, 200, "<html>Bad Gateway</html>", INDEX_URL, Health))
    );
    expect(error).toBeInstanceOf(CommunicationError);
    expect(error).toMatchObject({
      statusCode: 502,
      url: INDEX_URL,
      detail: "<html>Bad Gateway</html>",
    });
    expect(error.message).toBe(`HTTP 502 from ${INDEX_URL}: <html>Bad Gateway</html>`);
  });

  test("leaves out the detail when the error body is empty", async () => {
    const error = await Effect.runPromise(
      Effect.flip(parseResponse(500, 200, "  \n", INDEX_URL, Health))
    );
    expect(error).toBeInstanceOf(CommunicationError);
    expect(error).toMatchObject({ statusCode: 500, detail: undefined });
    expect(error.message).toBe(`HTTP 500 from ${INDEX_URL}`);
  });

  test("cuts a long error body down to an excerpt", async () => {
    const body = `${"x".repeat(250)}\n`;
    const error = await Effect.runPromise(
      Effect.flip(parseResponse(504, 200, body, INDEX_URL, Health))
    );
    expect(error).toMatchObject({ detail: `${"x".repeat(200)}...` });
  });

  test("reports an unexpected success status without error body as ParseError", async () => {
    const error = await Effect.runPromise(
      Effect.flip(parseResponse(204, 200, "", INDEX_URL, Health))
    );
    expect(error).toBeInstanceOf(ParseError);
    expect(error).toMatchObject({ body: "" });
  });
});

describe("Dispatcher.execute", () => {
  const replying = (status: number, body: string) =>
    vi.fn<FetchLike>(async () => new Response(body, { status }));

  const execute = <A, I>(
    fetchFn: FetchLike,
    options: {
      url: string;
      apiKey?: string;
      method: Method<QueryParams, unknown>;
      expectedStatus: number;
      schema: Schema.Schema<A, I>;
    }
  ) =>
    Effect.gen(function* () {
      const dispatcher = yield* Dispatcher;
      return yield* dispatcher.execute(options);
    }).pipe(Effect.provide(FetchDispatcherLive(fetchFn)));

  test("sends a GET with its query and no credentials", async () => {
    const fetchFn = replying(200, '{"status":"available"}');

    const result = await Effect.runPromise(
      execute(fetchFn, {
        url: INDEX_URL,
        method: Method.get({ limit: 2, offset: undefined }),
        expectedStatus: 200,
        schema: Health,
      })
    );

    expect(result).toEqual({ status: "available" });
    expect(fetchFn).toHaveBeenCalledTimes(1);

    const [input, init] = fetchFn.mock.calls[0];
    const headers = new Headers(init.headers);
    expect(input).toBe(`${INDEX_URL}?limit=2`);
    expect(init.method).toBe("GET");
    expect(init.body).toBeUndefined();
    expect(headers.get("authorization")).toBeNull();
    expect(headers.get("content-type")).toBeNull();
    expect(headers.get("x-searchlane-client")).toBe("Searchlane TS (v0.1.0)");
  });

  test("sends a JSON body and bearer token on POST", async () => {
    const fetchFn = replying(
      202,
      '{"taskUid":3,"indexUid":"movies","status":"enqueued","type":"indexCreation"}'
    );

    const result = await Effect.runPromise(
      execute(fetchFn, {
        url: "http://localhost:7700/indexes",
        apiKey: "test-key",
        method: Method.post(NO_QUERY, { uid: "movies", primaryKey: undefined }),
        expectedStatus: 202,
        schema: Schema.Struct({ taskUid: Schema.Number }),
      })
    );

    expect(result).toEqual({ taskUid: 3 });

    const [input, init] = fetchFn.mock.calls[0];
    const headers = new Headers(init.headers);
    expect(input).toBe("http://localhost:7700/indexes");
    expect(init.method).toBe("POST");
    expect(init.body).toBe('{"uid":"movies"}');
    expect(headers.get("authorization")).toBe("Bearer test-key");
    expect(headers.get("content-type")).toBe("application/json");
  });

  test("sends no body on DELETE", async () => {
    const fetchFn = replying(202, "");

    await Effect.runPromise(
      execute(fetchFn, {
        url: INDEX_URL,
        method: Method.delete(NO_QUERY),
        expectedStatus: 202,
        schema: Schema.Null,
      })
    );

    const [, init] = fetchFn.mock.calls[0];
    expect(init.method).toBe("DELETE");
    expect(init.body).toBeUndefined();
    expect(new Headers(init.headers).get("content-type")).toBeNull();
  });

  test("maps a rejected fetch to TransportError", async () => {
    const fetchFn = vi.fn<FetchLike>(async () => {
      throw new TypeError("fetch failed");
    });

    const error = await Effect.runPromise(
      Effect.flip(
        execute(fetchFn, {
          url: INDEX_URL,
          method: Method.get({ limit: 1 }),
          expectedStatus: 200,
          schema: Health,
        })
      )
    );

    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({
      url: `${INDEX_URL}?limit=1`,
      reason: "fetch failed",
    });
  });

  test("never retries a failed call", async () => {
    const fetchFn = replying(503, "Service Unavailable");

    const error = await Effect.runPromise(
      Effect.flip(
        execute(fetchFn, {
          url: INDEX_URL,
          method: Method.get({}),
          expectedStatus: 200,
          schema: Health,
        })
      )
    );

    expect(error).toBeInstanceOf(CommunicationError);
    expect(error).toMatchObject({ statusCode: 503, detail: "Service Unavailable" });
    expect(fetchFn).toHaveBeenCalledTimes(1);
  });
});
