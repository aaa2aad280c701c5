/**
 * Query string and client identification helpers.
 */

import { VERSION } from "../../version";

export type QueryValue =
  | string
  | number
  | boolean
  | ReadonlyArray<string | number>;

/**
 * Structured query parameters. `undefined` values are left out of the URL.
 */
export type QueryParams = Readonly<Record<string, QueryValue | undefined>>;

/** Query object for calls that take no parameters. */
export const NO_QUERY: QueryParams = {};

/**
 * The fixed identification string sent with every request.
 */
export function qualifiedVersion(): string {
  return `Searchlane TS (v${VERSION})`;
}

/**
 * Serialize `query` and append it to `url`.
 *
 * Lists are joined with commas, which is how the service reads
 * multi-valued parameters such as `fields` or `statuses`.
 */
export function addQueryParameters(url: string, query: QueryParams): string {
  const pairs: string[] = [];

  for (const [key, value] of Object.entries(query)) {
    if (value === undefined) {
      continue;
    }
    pairs.push(`${encodeURIComponent(key)}=${encodeQueryValue(value)}`);
  }

  return pairs.length === 0 ? url : `${url}?${pairs.join("&")}`;
}

function encodeQueryValue(value: QueryValue): string {
  if (typeof value === "object") {
    return value.map((item) => encodeURIComponent(String(item))).join(",");
  }
  return encodeURIComponent(String(value));
}
