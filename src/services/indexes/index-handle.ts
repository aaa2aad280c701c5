/**
 * Index handle.
 *
 * Document and settings operations for one index. Creating a handle sends
 * nothing; each method returns an Effect that performs one request.
 */

import { Effect, type Schema } from "effect";
import type { SearchClient } from "../client";
import {
  AnyDocument,
  DocumentsResults,
  type DocumentId,
  type DocumentQuery,
  type DocumentsQuery,
} from "../documents/types";
import type { DispatchError } from "../request/errors";
import { Method } from "../request/method";
import { NO_QUERY } from "../request/query";
import {
  getSetting,
  resetSetting,
  updateSetting,
} from "../settings/operations";
import {
  DistinctAttribute,
  FacetingSettings,
  PaginationSettings,
  Settings,
  StringList,
  Synonyms,
} from "../settings/types";
import type { TaskTimeoutError } from "../tasks/errors";
import type { WaitOptions } from "../tasks/poller";
import { TaskInfo, type Task, type TaskReference } from "../tasks/types";
import { IndexInfo } from "./types";

export class Index {
  /**
   * @param client - Client the requests go through
   * @param uid - Index identifier
   * @param primaryKey - Primary key, when known
   */
  constructor(
    readonly client: SearchClient,
    readonly uid: string,
    readonly primaryKey?: string
  ) {}

  /** Path of this index, relative to the host. */
  get path(): string {
    return `/indexes/${encodeURIComponent(this.uid)}`;
  }

  /**
   * Read the index from the service, including its primary key.
   */
  fetchInfo(): Effect.Effect<Index, DispatchError> {
    return this.client
      .execute(this.path, Method.get(NO_QUERY), 200, IndexInfo)
      .pipe(
        Effect.map(
          (info) => new Index(this.client, info.uid, info.primaryKey ?? undefined)
        )
      );
  }

  delete(): Effect.Effect<TaskInfo, DispatchError> {
    return this.client.execute(
      this.path,
      Method.delete(NO_QUERY),
      202,
      TaskInfo
    );
  }

  updatePrimaryKey(primaryKey: string): Effect.Effect<TaskInfo, DispatchError> {
    return this.client.execute(
      this.path,
      Method.patch(NO_QUERY, { primaryKey }),
      202,
      TaskInfo
    );
  }

  waitForTask(
    reference: TaskReference,
    options?: WaitOptions
  ): Effect.Effect<Task, DispatchError | TaskTimeoutError> {
    return this.client.waitForTask(reference, options);
  }

  // Documents

  getDocument(
    id: DocumentId,
    query?: DocumentQuery
  ): Effect.Effect<AnyDocument, DispatchError>;
  getDocument<A, I>(
    id: DocumentId,
    query: DocumentQuery,
    schema: Schema.Schema<A, I>
  ): Effect.Effect<A, DispatchError>;
  getDocument<A, I>(
    id: DocumentId,
    query: DocumentQuery = {},
    schema?: Schema.Schema<A, I>
  ): Effect.Effect<A | AnyDocument, DispatchError> {
    const path = `${this.path}/documents/${encodeURIComponent(String(id))}`;
    return schema === undefined
      ? this.client.execute(path, Method.get(query), 200, AnyDocument)
      : this.client.execute(path, Method.get(query), 200, schema);
  }

  getDocuments(
    query?: DocumentsQuery
  ): Effect.Effect<DocumentsResults<AnyDocument>, DispatchError>;
  getDocuments<A, I>(
    query: DocumentsQuery,
    schema: Schema.Schema<A, I>
  ): Effect.Effect<DocumentsResults<A>, DispatchError>;
  getDocuments<A, I>(
    query: DocumentsQuery = {},
    schema?: Schema.Schema<A, I>
  ): Effect.Effect<
    DocumentsResults<A> | DocumentsResults<AnyDocument>,
    DispatchError
  > {
    const path = `${this.path}/documents`;
    return schema === undefined
      ? this.client.execute(
          path,
          Method.get(query),
          200,
          DocumentsResults(AnyDocument)
        )
      : this.client.execute(path, Method.get(query), 200, DocumentsResults(schema));
  }

  /**
   * Add documents, replacing any existing document with the same id.
   *
   * @param primaryKey - Only used when the index has no primary key yet
   */
  addDocuments<T>(
    documents: ReadonlyArray<T>,
    primaryKey?: string
  ): Effect.Effect<TaskInfo, DispatchError> {
    return this.client.execute(
      `${this.path}/documents`,
      Method.post({ primaryKey }, documents),
      202,
      TaskInfo
    );
  }

  /**
   * Add documents, merging fields into any existing document with the
   * same id.
   */
  addOrUpdateDocuments<T>(
    documents: ReadonlyArray<T>,
    primaryKey?: string
  ): Effect.Effect<TaskInfo, DispatchError> {
    return this.client.execute(
      `${this.path}/documents`,
      Method.put({ primaryKey }, documents),
      202,
      TaskInfo
    );
  }

  deleteDocument(id: DocumentId): Effect.Effect<TaskInfo, DispatchError> {
    return this.client.execute(
      `${this.path}/documents/${encodeURIComponent(String(id))}`,
      Method.delete(NO_QUERY),
      202,
      TaskInfo
    );
  }

  deleteAllDocuments(): Effect.Effect<TaskInfo, DispatchError> {
    return this.client.execute(
      `${this.path}/documents`,
      Method.delete(NO_QUERY),
      202,
      TaskInfo
    );
  }

  deleteDocuments(
    ids: ReadonlyArray<DocumentId>
  ): Effect.Effect<TaskInfo, DispatchError> {
    return this.client.execute(
      `${this.path}/documents/delete-batch`,
      Method.post(NO_QUERY, ids),
      202,
      TaskInfo
    );
  }

  /**
   * Delete every document matching a filter expression. The filtered
   * attributes must be filterable.
   */
  deleteDocumentsByFilter(
    filter: string | ReadonlyArray<string>
  ): Effect.Effect<TaskInfo, DispatchError> {
    return this.client.execute(
      `${this.path}/documents/delete`,
      Method.post(NO_QUERY, { filter }),
      202,
      TaskInfo
    );
  }

  // Settings

  getSettings(): Effect.Effect<Settings, DispatchError> {
    return getSetting(this, undefined, Settings);
  }

  /**
   * Update the given settings; settings left out keep their value.
   */
  setSettings(settings: Settings): Effect.Effect<TaskInfo, DispatchError> {
    return updateSetting(this, undefined, "merge", settings);
  }

  resetSettings(): Effect.Effect<TaskInfo, DispatchError> {
    return resetSetting(this, undefined);
  }

  getSynonyms(): Effect.Effect<Synonyms, DispatchError> {
    return getSetting(this, "synonyms", Synonyms);
  }

  setSynonyms(synonyms: Synonyms): Effect.Effect<TaskInfo, DispatchError> {
    return updateSetting(this, "synonyms", "replace", synonyms);
  }

  resetSynonyms(): Effect.Effect<TaskInfo, DispatchError> {
    return resetSetting(this, "synonyms");
  }

  getStopWords(): Effect.Effect<ReadonlyArray<string>, DispatchError> {
    return getSetting(this, "stop-words", StringList);
  }

  setStopWords(
    stopWords: Iterable<string>
  ): Effect.Effect<TaskInfo, DispatchError> {
    return updateSetting(this, "stop-words", "replace", Array.from(stopWords));
  }

  resetStopWords(): Effect.Effect<TaskInfo, DispatchError> {
    return resetSetting(this, "stop-words");
  }

  getRankingRules(): Effect.Effect<ReadonlyArray<string>, DispatchError> {
    return getSetting(this, "ranking-rules", StringList);
  }

  setRankingRules(
    rankingRules: Iterable<string>
  ): Effect.Effect<TaskInfo, DispatchError> {
    return updateSetting(
      this,
      "ranking-rules",
      "replace",
      Array.from(rankingRules)
    );
  }

  resetRankingRules(): Effect.Effect<TaskInfo, DispatchError> {
    return resetSetting(this, "ranking-rules");
  }

  getFilterableAttributes(): Effect.Effect<ReadonlyArray<string>, DispatchError> {
    return getSetting(this, "filterable-attributes", StringList);
  }

  setFilterableAttributes(
    attributes: Iterable<string>
  ): Effect.Effect<TaskInfo, DispatchError> {
    return updateSetting(
      this,
      "filterable-attributes",
      "replace",
      Array.from(attributes)
    );
  }

  resetFilterableAttributes(): Effect.Effect<TaskInfo, DispatchError> {
    return resetSetting(this, "filterable-attributes");
  }

  getSortableAttributes(): Effect.Effect<ReadonlyArray<string>, DispatchError> {
    return getSetting(this, "sortable-attributes", StringList);
  }

  setSortableAttributes(
    attributes: Iterable<string>
  ): Effect.Effect<TaskInfo, DispatchError> {
    return updateSetting(
      this,
      "sortable-attributes",
      "replace",
      Array.from(attributes)
    );
  }

  resetSortableAttributes(): Effect.Effect<TaskInfo, DispatchError> {
    return resetSetting(this, "sortable-attributes");
  }

  getDistinctAttribute(): Effect.Effect<string | null, DispatchError> {
    return getSetting(this, "distinct-attribute", DistinctAttribute);
  }

  setDistinctAttribute(
    attribute: string
  ): Effect.Effect<TaskInfo, DispatchError> {
    return updateSetting(this, "distinct-attribute", "replace", attribute);
  }

  resetDistinctAttribute(): Effect.Effect<TaskInfo, DispatchError> {
    return resetSetting(this, "distinct-attribute");
  }

  getSearchableAttributes(): Effect.Effect<ReadonlyArray<string>, DispatchError> {
    return getSetting(this, "searchable-attributes", StringList);
  }

  setSearchableAttributes(
    attributes: Iterable<string>
  ): Effect.Effect<TaskInfo, DispatchError> {
    return updateSetting(
      this,
      "searchable-attributes",
      "replace",
      Array.from(attributes)
    );
  }

  resetSearchableAttributes(): Effect.Effect<TaskInfo, DispatchError> {
    return resetSetting(this, "searchable-attributes");
  }

  getDisplayedAttributes(): Effect.Effect<ReadonlyArray<string>, DispatchError> {
    return getSetting(this, "displayed-attributes", StringList);
  }

  setDisplayedAttributes(
    attributes: Iterable<string>
  ): Effect.Effect<TaskInfo, DispatchError> {
    return updateSetting(
      this,
      "displayed-attributes",
      "replace",
      Array.from(attributes)
    );
  }

  resetDisplayedAttributes(): Effect.Effect<TaskInfo, DispatchError> {
    return resetSetting(this, "displayed-attributes");
  }

  getPagination(): Effect.Effect<PaginationSettings, DispatchError> {
    return getSetting(this, "pagination", PaginationSettings);
  }

  setPagination(
    pagination: PaginationSettings
  ): Effect.Effect<TaskInfo, DispatchError> {
    return updateSetting(this, "pagination", "merge", pagination);
  }

  resetPagination(): Effect.Effect<TaskInfo, DispatchError> {
    return resetSetting(this, "pagination");
  }

  getFaceting(): Effect.Effect<FacetingSettings, DispatchError> {
    return getSetting(this, "faceting", FacetingSettings);
  }

  setFaceting(
    faceting: FacetingSettings
  ): Effect.Effect<TaskInfo, DispatchError> {
    return updateSetting(this, "faceting", "merge", faceting);
  }

  resetFaceting(): Effect.Effect<TaskInfo, DispatchError> {
    return resetSetting(this, "faceting");
  }
}
