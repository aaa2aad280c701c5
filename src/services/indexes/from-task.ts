/**
 * Turning a finished index-creation task into a usable index handle.
 */

import { Effect, Either } from "effect";
import type { SearchClient } from "../client";
import type { DispatchError } from "../request/errors";
import { TaskNotSucceededError, type TaskTimeoutError } from "../tasks/errors";
import type { WaitOptions } from "../tasks/poller";
import type { Task, TaskReference } from "../tasks/types";
import { Index } from "./index-handle";

/**
 * Convert a succeeded `indexCreation` task into an {@link Index}.
 *
 * Works on data already fetched; sends nothing. Any other task (failed,
 * canceled, still running, or not an index creation) is returned as a
 * `TaskNotSucceededError` carrying the task.
 */
export function tryMakeIndex(
  client: SearchClient,
  task: Task
): Either.Either<Index, TaskNotSucceededError> {
  if (
    task.status !== "succeeded" ||
    task.type !== "indexCreation" ||
    typeof task.indexUid !== "string"
  ) {
    return Either.left(new TaskNotSucceededError(task));
  }

  const primaryKey = task.details?.["primaryKey"];
  return Either.right(
    new Index(
      client,
      task.indexUid,
      typeof primaryKey === "string" ? primaryKey : undefined
    )
  );
}

/**
 * Wait for an index-creation task and return the created index.
 *
 * @example
 * ```typescript
 * const movies = yield* client
 *   .createIndex("movies", "id")
 *   .pipe(Effect.flatMap((info) => waitForIndex(client, info)));
 * ```
 */
export function waitForIndex(
  client: SearchClient,
  reference: TaskReference,
  options?: WaitOptions
): Effect.Effect<Index, DispatchError | TaskTimeoutError | TaskNotSucceededError> {
  return client
    .waitForTask(reference, options)
    .pipe(Effect.flatMap((task) => tryMakeIndex(client, task)));
}
