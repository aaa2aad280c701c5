/**
 * Searchlane: typed client for a task-based search engine.
 *
 * @example
 * ```typescript
 * import { Effect } from "effect";
 * import {
 *   EnvironmentLive,
 *   NativeDispatcherLive,
 *   makeSearchClient,
 *   waitForIndex,
 * } from "searchlane";
 *
 * const program = Effect.gen(function* () {
 *   const client = yield* makeSearchClient;
 *   const info = yield* client.createIndex("movies", "id");
 *   const movies = yield* waitForIndex(client, info);
 *   const added = yield* movies.addDocuments([{ id: 1, title: "Carol" }]);
 *   return yield* client.waitForTask(added);
 * });
 *
 * await Effect.runPromise(
 *   program.pipe(
 *     Effect.provide(EnvironmentLive),
 *     Effect.provide(NativeDispatcherLive)
 *   )
 * );
 * ```
 */

export { VERSION } from "./version";
export {
  Environment,
  EnvironmentLive,
  makeEnvironment,
  DEFAULT_HOST,
} from "./environment";
export type { EnvironmentShape } from "./environment";
export { SearchClient, makeSearchClient, Version } from "./services/client";
export * from "./services/request";
export * from "./services/tasks";
export * from "./services/indexes";
export * from "./services/documents";
export * from "./services/settings";
export * from "./services/index-config";
