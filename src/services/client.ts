/**
 * Search engine client.
 *
 * Entry point for index and task operations. Every method returns an Effect
 * that performs exactly one request (or, for `waitForTask`, one request per
 * poll) when run.
 */

import { Effect, Schema } from "effect";
import { Environment } from "../environment";
import { Index } from "./indexes/index-handle";
import { IndexInfo, IndexesResults, type IndexesQuery } from "./indexes/types";
import { Dispatcher, type DispatcherService } from "./request/dispatcher";
import type { DispatchError } from "./request/errors";
import { Method } from "./request/method";
import { NO_QUERY, type QueryParams } from "./request/query";
import type { TaskTimeoutError } from "./tasks/errors";
import { waitForCompletion, type WaitOptions } from "./tasks/poller";
import {
  Task,
  TaskInfo,
  TasksResults,
  taskUidOf,
  type TaskReference,
  type TasksQuery,
} from "./tasks/types";

const Health = Schema.Struct({ status: Schema.String });

export const Version = Schema.Struct({
  commitSha: Schema.String,
  commitDate: Schema.String,
  pkgVersion: Schema.String,
});
export type Version = Schema.Schema.Type<typeof Version>;

/**
 * @example
 * ```typescript
 * const client = new SearchClient(
 *   "http://localhost:7700",
 *   "test-key",
 *   makeDispatcher(new NativeTransport())
 * );
 *
 * const program = client.createIndex("movies", "id").pipe(
 *   Effect.flatMap((info) => client.waitForTask(info))
 * );
 * const task = await Effect.runPromise(program);
 * ```
 */
export class SearchClient {
  readonly host: string;

  /**
   * @param host - Base URL of the service
   * @param apiKey - Sent as a bearer token when set
   * @param dispatcher - Sends the requests
   */
  constructor(
    host: string,
    readonly apiKey: string | undefined,
    readonly dispatcher: DispatcherService
  ) {
    this.host = host.replace(/\/+$/, "");
  }

  /**
   * Send a request to `path` on this client's host.
   */
  execute<Q extends QueryParams, B, A, I>(
    path: string,
    method: Method<Q, B>,
    expectedStatus: number,
    schema: Schema.Schema<A, I>
  ): Effect.Effect<A, DispatchError> {
    return this.dispatcher.execute({
      url: `${this.host}${path}`,
      apiKey: this.apiKey,
      method,
      expectedStatus,
      schema,
    });
  }

  /**
   * A handle on an index. Sends nothing; the index may not exist yet.
   */
  index(uid: string): Index {
    return new Index(this, uid);
  }

  getIndex(uid: string): Effect.Effect<Index, DispatchError> {
    return this.index(uid).fetchInfo();
  }

  listIndexes(
    query: IndexesQuery = {}
  ): Effect.Effect<IndexesResults, DispatchError> {
    return this.execute("/indexes", Method.get(query), 200, IndexesResults);
  }

  /**
   * Queue the creation of an index. The index exists once the returned
   * task has succeeded.
   */
  createIndex(
    uid: string,
    primaryKey?: string
  ): Effect.Effect<TaskInfo, DispatchError> {
    return this.execute(
      "/indexes",
      Method.post(NO_QUERY, { uid, primaryKey }),
      202,
      TaskInfo
    );
  }

  deleteIndex(uid: string): Effect.Effect<TaskInfo, DispatchError> {
    return this.index(uid).delete();
  }

  getTask(reference: TaskReference): Effect.Effect<Task, DispatchError> {
    return this.execute(
      `/tasks/${taskUidOf(reference)}`,
      Method.get(NO_QUERY),
      200,
      Task
    );
  }

  getTasks(query: TasksQuery = {}): Effect.Effect<TasksResults, DispatchError> {
    return this.execute("/tasks", Method.get(query), 200, TasksResults);
  }

  /**
   * Poll a task until it is `succeeded`, `failed` or `canceled`.
   *
   * A failed or canceled task is returned, not raised.
   */
  waitForTask(
    reference: TaskReference,
    options?: WaitOptions
  ): Effect.Effect<Task, DispatchError | TaskTimeoutError> {
    return waitForCompletion(
      (uid) => this.getTask(uid),
      taskUidOf(reference),
      options
    );
  }

  health(): Effect.Effect<{ readonly status: string }, DispatchError> {
    return this.execute("/health", Method.get(NO_QUERY), 200, Health);
  }

  /**
   * `true` when the service answers its health check with `available`.
   */
  isHealthy(): Effect.Effect<boolean> {
    return this.health().pipe(
      Effect.map((health) => health.status === "available"),
      Effect.catchAll((error) =>
        Effect.logWarning(`[CLIENT] Health check failed: ${error.message}`).pipe(
          Effect.as(false)
        )
      )
    );
  }

  version(): Effect.Effect<Version, DispatchError> {
    return this.execute("/version", Method.get(NO_QUERY), 200, Version);
  }
}

/**
 * Build a client from the configured environment and dispatcher.
 *
 * @example
 * ```typescript
 * const program = Effect.gen(function* () {
 *   const client = yield* makeSearchClient;
 *   return yield* client.listIndexes();
 * });
 *
 * Effect.runPromise(
 *   program.pipe(
 *     Effect.provide(EnvironmentLive),
 *     Effect.provide(NativeDispatcherLive)
 *   )
 * );
 * ```
 */
export const makeSearchClient = Effect.gen(function* () {
  const config = yield* Environment;
  const dispatcher = yield* Dispatcher;
  return new SearchClient(config.host, config.apiKey, dispatcher);
});
