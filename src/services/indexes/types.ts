/**
 * Index types.
 */

import { Schema } from "effect";

/**
 * An index as described by the service.
 */
export const IndexInfo = Schema.Struct({
  uid: Schema.String,
  primaryKey: Schema.optional(Schema.NullOr(Schema.String)),
  createdAt: Schema.optional(Schema.String),
  updatedAt: Schema.optional(Schema.String),
});
export type IndexInfo = Schema.Schema.Type<typeof IndexInfo>;

export const IndexesResults = Schema.Struct({
  results: Schema.Array(IndexInfo),
  offset: Schema.Number,
  limit: Schema.Number,
  total: Schema.Number,
});
export type IndexesResults = Schema.Schema.Type<typeof IndexesResults>;

export type IndexesQuery = {
  readonly offset?: number;
  readonly limit?: number;
};
