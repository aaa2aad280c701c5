/**
 * Task completion poller.
 *
 * The service offers no completion callback, so waiting for a job means
 * re-reading it until its status is terminal. The loop runs inside the
 * caller's fiber; interrupting that fiber stops it between two polls.
 */

import { Clock, Duration, Effect } from "effect";
import { TaskTimeoutError } from "./errors";
import { isTerminalStatus, type Task } from "./types";

export const DEFAULT_POLL_INTERVAL = Duration.millis(50);
export const DEFAULT_POLL_TIMEOUT = Duration.seconds(5);

export interface WaitOptions {
  /** Pause between two polls (default: 50 ms). */
  readonly interval?: Duration.DurationInput;
  /** Overall deadline, counted from the start of the wait (default: 5 s). */
  readonly timeout?: Duration.DurationInput;
}

/**
 * Poll `fetchTask` until the job reaches `succeeded`, `failed` or `canceled`.
 *
 * Failed and canceled jobs are returned like succeeded ones; it is up to the
 * caller to decide whether they are fatal. Errors from `fetchTask` end the
 * wait immediately.
 *
 * @example
 * ```typescript
 * const task = yield* waitForCompletion(
 *   (uid) => client.getTask(uid),
 *   info.taskUid,
 *   { interval: "100 millis", timeout: "30 seconds" }
 * );
 * ```
 */
export function waitForCompletion<E, R>(
  fetchTask: (taskUid: number) => Effect.Effect<Task, E, R>,
  taskUid: number,
  options: WaitOptions = {}
): Effect.Effect<Task, E | TaskTimeoutError, R> {
  const interval = Duration.decode(options.interval ?? DEFAULT_POLL_INTERVAL);
  const timeout = Duration.decode(options.timeout ?? DEFAULT_POLL_TIMEOUT);

  return Effect.gen(function* () {
    const startedAt = yield* Clock.currentTimeMillis;
    let polls = 0;

    while (true) {
      const task = yield* fetchTask(taskUid);
      polls += 1;

      if (isTerminalStatus(task.status)) {
        yield* Effect.logInfo(
          `[TASKS] Task ${taskUid} ${task.status} after ${polls} poll(s)`
        );
        return task;
      }

      const elapsed = (yield* Clock.currentTimeMillis) - startedAt;
      if (elapsed >= Duration.toMillis(timeout)) {
        yield* Effect.logWarning(
          `[TASKS] Task ${taskUid} still ${task.status} after ${elapsed}ms, giving up`
        );
        return yield* Effect.fail(new TaskTimeoutError(taskUid, timeout));
      }

      yield* Effect.logDebug(`[TASKS] Task ${taskUid} is ${task.status}`);
      yield* Effect.sleep(interval);
    }
  }).pipe(
    Effect.withSpan("tasks.waitForCompletion", { attributes: { taskUid } })
  );
}
