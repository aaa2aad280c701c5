/**
 * Index settings.
 *
 * Every field is optional; a field left out is neither sent nor changed on
 * the service.
 */

import { Schema } from "effect";

export const StringList = Schema.Array(Schema.String);

export const Synonyms = Schema.Record({
  key: Schema.String,
  value: StringList,
});
export type Synonyms = Schema.Schema.Type<typeof Synonyms>;

export const PaginationSettings = Schema.Struct({
  maxTotalHits: Schema.Number,
});
export type PaginationSettings = Schema.Schema.Type<typeof PaginationSettings>;

export const FacetingSettings = Schema.Struct({
  maxValuesPerFacet: Schema.Number,
});
export type FacetingSettings = Schema.Schema.Type<typeof FacetingSettings>;

export const DistinctAttribute = Schema.NullOr(Schema.String);

export const Settings = Schema.Struct({
  /** Words treated as equivalent in queries. */
  synonyms: Schema.optional(Synonyms),
  /** Words ignored when present in queries. */
  stopWords: Schema.optional(StringList),
  /** Ranking rules, most important first. */
  rankingRules: Schema.optional(StringList),
  /** Attributes usable in filters and facets. */
  filterableAttributes: Schema.optional(StringList),
  sortableAttributes: Schema.optional(StringList),
  /** Only one document per value of this attribute is returned. */
  distinctAttribute: Schema.optional(DistinctAttribute),
  /** Attributes searched for query words, most important first. */
  searchableAttributes: Schema.optional(StringList),
  /** Attributes present in returned documents. */
  displayedAttributes: Schema.optional(StringList),
  pagination: Schema.optional(PaginationSettings),
  faceting: Schema.optional(FacetingSettings),
});
export type Settings = Schema.Schema.Type<typeof Settings>;
