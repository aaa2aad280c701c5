/**
 * Document query and result types.
 */

import { Schema } from "effect";

/**
 * Decoder used when the caller does not supply one: any JSON object.
 */
export const AnyDocument = Schema.Record({
  key: Schema.String,
  value: Schema.Unknown,
});
export type AnyDocument = Schema.Schema.Type<typeof AnyDocument>;

export type DocumentId = string | number;

export type DocumentQuery = {
  /** Fields to return. All fields when omitted. */
  readonly fields?: ReadonlyArray<string>;
};

export type DocumentsQuery = {
  /** Number of documents to skip. */
  readonly offset?: number;
  /** Maximum number of documents returned (service default: 20). */
  readonly limit?: number;
  readonly fields?: ReadonlyArray<string>;
};

export interface DocumentsResults<T> {
  readonly results: ReadonlyArray<T>;
  readonly offset: number;
  readonly limit: number;
  readonly total: number;
}

/**
 * Decoder for a page of documents of the given shape.
 */
export function DocumentsResults<A, I>(document: Schema.Schema<A, I>) {
  return Schema.Struct({
    results: Schema.Array(document),
    offset: Schema.Number,
    limit: Schema.Number,
    total: Schema.Number,
  });
}
