/**
 * Index configuration for a document type.
 *
 * Declare once, per document type, which fields are the primary key, the
 * distinct attribute, and which are searchable, displayed, filterable or
 * sortable. The result produces the matching settings and can create the
 * index.
 */

import { Effect } from "effect";
import type { SearchClient } from "../client";
import { waitForIndex } from "../indexes/from-task";
import type { Index } from "../indexes/index-handle";
import type { DispatchError } from "../request/errors";
import type { Settings } from "../settings/types";
import type { TaskNotSucceededError, TaskTimeoutError } from "../tasks/errors";
import type { WaitOptions } from "../tasks/poller";
import { IndexConfigError } from "./errors";

export const INDEX_CONFIG_ATTRIBUTES = [
  "primaryKey",
  "distinct",
  "searchable",
  "displayed",
  "filterable",
  "sortable",
] as const;

export type IndexConfigAttribute = (typeof INDEX_CONFIG_ATTRIBUTES)[number];

/**
 * Attributes per document field, in field order.
 */
export type IndexConfigFields<T> = {
  readonly [K in keyof T & string]?: ReadonlyArray<IndexConfigAttribute>;
};

export interface IndexConfig {
  /** The type name in snake case. */
  readonly indexName: string;
  readonly primaryKey: string | undefined;

  /** Handle on the index; sends nothing. */
  index(client: SearchClient): Index;

  /**
   * Settings derived from the field attributes. Displayed, sortable,
   * filterable and searchable lists are always present, possibly empty.
   */
  generateSettings(): Settings;

  /**
   * Create the index with its primary key, wait for the creation task and
   * return the live index.
   */
  generateIndex(
    client: SearchClient,
    options?: WaitOptions
  ): Effect.Effect<
    Index,
    DispatchError | TaskTimeoutError | TaskNotSucceededError
  >;
}

/**
 * `MovieClips` → `movie_clips`, `HTTPLogs` → `http_logs`.
 */
export function toSnakeCase(name: string): string {
  return name
    .replace(/([A-Z]+)([A-Z][a-z])/g, "$1_$2")
    .replace(/([a-z0-9])([A-Z])/g, "$1_$2")
    .toLowerCase();
}

const VALID_ATTRIBUTES: ReadonlySet<string> = new Set(INDEX_CONFIG_ATTRIBUTES);

/**
 * @throws IndexConfigError when `primaryKey` or `distinct` is set on more
 * than one field, an attribute is repeated on a field, or an attribute is
 * unknown
 *
 * @example
 * ```typescript
 * interface Movie {
 *   movie_id: number;
 *   title: string;
 *   release_date: string;
 *   genres: string[];
 * }
 *
 * const MovieConfig = defineIndexConfig<Movie>("Movie", {
 *   movie_id: ["primaryKey"],
 *   title: ["displayed", "searchable"],
 *   release_date: ["filterable", "sortable", "displayed"],
 *   genres: ["filterable", "displayed"],
 * });
 *
 * const settings = MovieConfig.generateSettings();
 * const movies = yield* MovieConfig.generateIndex(client);
 * ```
 */
export function defineIndexConfig<T>(
  typeName: string,
  fields: IndexConfigFields<T>
): IndexConfig {
  let primaryKey: string | undefined;
  let distinct: string | undefined;
  const displayed: string[] = [];
  const searchable: string[] = [];
  const filterable: string[] = [];
  const sortable: string[] = [];

  const entries: ReadonlyArray<
    readonly [string, ReadonlyArray<string> | undefined]
  > = Object.entries(fields);

  for (const [field, attributes] of entries) {
    const seen = new Set<string>();

    for (const attribute of attributes ?? []) {
      if (!VALID_ATTRIBUTES.has(attribute)) {
        throw new IndexConfigError(
          typeName,
          field,
          `unknown attribute \`${attribute}\``
        );
      }
      if (seen.has(attribute)) {
        throw new IndexConfigError(
          typeName,
          field,
          `\`${attribute}\` already set for this field`
        );
      }
      seen.add(attribute);

      switch (attribute) {
        case "primaryKey":
          if (primaryKey !== undefined) {
            throw new IndexConfigError(
              typeName,
              field,
              `\`primaryKey\` already set on \`${primaryKey}\``
            );
          }
          primaryKey = field;
          break;
        case "distinct":
          if (distinct !== undefined) {
            throw new IndexConfigError(
              typeName,
              field,
              `\`distinct\` already set on \`${distinct}\``
            );
          }
          distinct = field;
          break;
        case "displayed":
          displayed.push(field);
          break;
        case "searchable":
          searchable.push(field);
          break;
        case "filterable":
          filterable.push(field);
          break;
        case "sortable":
          sortable.push(field);
          break;
      }
    }
  }

  const indexName = toSnakeCase(typeName);

  return {
    indexName,
    primaryKey,
    index: (client) => client.index(indexName),
    generateSettings: () => ({
      displayedAttributes: [...displayed],
      sortableAttributes: [...sortable],
      filterableAttributes: [...filterable],
      searchableAttributes: [...searchable],
      ...(distinct === undefined ? {} : { distinctAttribute: distinct }),
    }),
    generateIndex: (client, options) =>
      client
        .createIndex(indexName, primaryKey)
        .pipe(Effect.flatMap((info) => waitForIndex(client, info, options))),
  };
}
