/**
 * Task types.
 *
 * Every mutating call is answered with a {@link TaskInfo}; the job's later
 * state is read back as a {@link Task}. Status only ever changes by fetching
 * it again from the service.
 */

import { Schema } from "effect";

export const TaskStatus = Schema.Literal(
  "enqueued",
  "processing",
  "succeeded",
  "failed",
  "canceled"
);
export type TaskStatus = Schema.Schema.Type<typeof TaskStatus>;

/**
 * Kinds of job the service runs.
 */
export const TaskType = Schema.Literal(
  "indexCreation",
  "indexUpdate",
  "indexDeletion",
  "indexSwap",
  "documentAdditionOrUpdate",
  "documentDeletion",
  "settingsUpdate",
  "dumpCreation",
  "taskCancelation",
  "taskDeletion",
  "snapshotCreation"
);
export type TaskType = Schema.Schema.Type<typeof TaskType>;

/**
 * Why a job failed.
 */
export const TaskError = Schema.Struct({
  message: Schema.String,
  code: Schema.String,
  type: Schema.String,
  link: Schema.optional(Schema.String),
});
export type TaskError = Schema.Schema.Type<typeof TaskError>;

/**
 * Answer to a mutating call (HTTP 202): the job has been queued.
 */
export const TaskInfo = Schema.Struct({
  taskUid: Schema.Number,
  indexUid: Schema.optional(Schema.NullOr(Schema.String)),
  status: TaskStatus,
  type: TaskType,
  enqueuedAt: Schema.optional(Schema.String),
});
export type TaskInfo = Schema.Schema.Type<typeof TaskInfo>;

/**
 * A job as reported by `GET /tasks/{uid}`.
 *
 * `details` describes the job's input and outcome (e.g. `primaryKey` for an
 * index creation, `indexedDocuments` for a document addition); `error` is set
 * when the status is `failed`.
 */
export const Task = Schema.Struct({
  uid: Schema.Number,
  indexUid: Schema.optional(Schema.NullOr(Schema.String)),
  status: TaskStatus,
  type: TaskType,
  details: Schema.optional(
    Schema.NullOr(Schema.Record({ key: Schema.String, value: Schema.Unknown }))
  ),
  error: Schema.optional(Schema.NullOr(TaskError)),
  canceledBy: Schema.optional(Schema.NullOr(Schema.Number)),
  duration: Schema.optional(Schema.NullOr(Schema.String)),
  enqueuedAt: Schema.optional(Schema.String),
  startedAt: Schema.optional(Schema.NullOr(Schema.String)),
  finishedAt: Schema.optional(Schema.NullOr(Schema.String)),
});
export type Task = Schema.Schema.Type<typeof Task>;

export const TasksResults = Schema.Struct({
  results: Schema.Array(Task),
  limit: Schema.Number,
  from: Schema.NullOr(Schema.Number),
  next: Schema.NullOr(Schema.Number),
});
export type TasksResults = Schema.Schema.Type<typeof TasksResults>;

/**
 * Filters for listing tasks.
 */
export type TasksQuery = {
  readonly indexUids?: ReadonlyArray<string>;
  readonly statuses?: ReadonlyArray<TaskStatus>;
  readonly types?: ReadonlyArray<TaskType>;
  readonly limit?: number;
  readonly from?: number;
};

/**
 * Anything that identifies a task.
 */
export type TaskReference = TaskInfo | Task | number;

export function taskUidOf(reference: TaskReference): number {
  if (typeof reference === "number") {
    return reference;
  }
  return "taskUid" in reference ? reference.taskUid : reference.uid;
}

/**
 * `succeeded`, `failed` and `canceled` never change once reached.
 */
export function isTerminalStatus(status: TaskStatus): boolean {
  return status === "succeeded" || status === "failed" || status === "canceled";
}

export function isSucceeded(task: Task): boolean {
  return task.status === "succeeded";
}

export function isFailure(task: Task): boolean {
  return task.status === "failed" || task.status === "canceled";
}
