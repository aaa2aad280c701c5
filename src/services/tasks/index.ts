/**
 * Task module.
 *
 * Re-exports the job handle types and the completion poller.
 */

export {
  Task,
  TaskInfo,
  TaskStatus,
  TaskType,
  TaskError,
  TasksResults,
  taskUidOf,
  isTerminalStatus,
  isSucceeded,
  isFailure,
} from "./types";
export type { TaskReference, TasksQuery } from "./types";
export {
  waitForCompletion,
  DEFAULT_POLL_INTERVAL,
  DEFAULT_POLL_TIMEOUT,
} from "./poller";
export type { WaitOptions } from "./poller";
export { TaskTimeoutError, TaskNotSucceededError } from "./errors";
