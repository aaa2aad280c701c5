/**
 * Task waiting errors.
 */

import { Duration } from "effect";
import type { Task } from "./types";

/**
 * The job was still enqueued or processing when the wait deadline passed.
 * The job itself keeps running on the service.
 */
export class TaskTimeoutError extends Error {
  readonly _tag = "TaskTimeoutError";

  constructor(
    public readonly taskUid: number,
    public readonly timeout: Duration.Duration
  ) {
    super(
      `Task ${taskUid} did not finish within ${Duration.format(timeout)}`
    );
    this.name = "TaskTimeoutError";
    Object.setPrototypeOf(this, TaskTimeoutError.prototype);
  }
}

/**
 * A finished task could not be turned into the resource it was supposed to
 * create: it failed, was canceled, or was a different kind of job.
 */
export class TaskNotSucceededError extends Error {
  readonly _tag = "TaskNotSucceededError";

  constructor(public readonly task: Task) {
    super(
      task.error
        ? `Task ${task.uid} (${task.type}) ended as ${task.status}: ${task.error.message}`
        : `Task ${task.uid} (${task.type}) ended as ${task.status}`
    );
    this.name = "TaskNotSucceededError";
    Object.setPrototypeOf(this, TaskNotSucceededError.prototype);
  }
}
