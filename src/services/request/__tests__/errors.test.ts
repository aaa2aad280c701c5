import { Duration } from "effect";
import { describe, expect, test } from "vitest";
import { TaskTimeoutError } from "../../tasks/errors";
import {
  CommunicationError,
  ParseError,
  ServiceError,
  TransportError,
  describeCause,
  isDispatchError,
  type DispatchError,
} from "../errors";

const INDEX_URL = "http://localhost:7700/indexes/movies";

describe("isDispatchError", () => {
  const dispatchErrors: Array<[string, DispatchError]> = [
    ["ParseError", new ParseError("Expected number", INDEX_URL, "{}")],
    [
      "ServiceError",
      new ServiceError(
        "index_not_found",
        "Index not found.",
        "invalid_request",
        404,
        INDEX_URL
      ),
    ],
    ["CommunicationError", new CommunicationError(502, INDEX_URL)],
    ["TransportError", new TransportError(INDEX_URL, "fetch failed")],
  ];

  test.each(dispatchErrors)("accepts a %s", (tag, error) => {
    expect(isDispatchError(error)).toBe(true);
    expect(error._tag).toBe(tag);
    expect(error.name).toBe(tag);
  });

  test("rejects other errors and look-alike objects", () => {
    expect(isDispatchError(new Error("boom"))).toBe(false);
    expect(isDispatchError(new TaskTimeoutError(1, Duration.millis(50)))).toBe(false);
    expect(
      isDispatchError({ _tag: "TransportError", url: INDEX_URL, reason: "x" })
    ).toBe(false);
    expect(isDispatchError(undefined)).toBe(false);
  });
});

describe("error messages", () => {
  test("name the failing request", () => {
    expect(new TransportError(INDEX_URL, "fetch failed").message).toBe(
      `Request to ${INDEX_URL} failed: fetch failed`
    );
    expect(new CommunicationError(502, INDEX_URL, "Bad Gateway").message).toBe(
      `HTTP 502 from ${INDEX_URL}: Bad Gateway`
    );
  });

  test("describeCause reads thrown values", () => {
    expect(describeCause(new Error("socket hang up"))).toBe("socket hang up");
    expect(describeCause("timeout")).toBe("timeout");
  });
});
