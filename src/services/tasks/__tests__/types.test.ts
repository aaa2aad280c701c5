import { describe, expect, test } from "vitest";
import {
  isFailure,
  isSucceeded,
  isTerminalStatus,
  taskUidOf,
  type Task,
  type TaskStatus,
} from "../types";

const taskWith = (status: TaskStatus): Task => ({
  uid: 3,
  indexUid: "movies",
  status,
  type: "documentAdditionOrUpdate",
});

describe("task status helpers", () => {
  const cases: Array<[TaskStatus, boolean, boolean, boolean]> = [
    ["enqueued", false, false, false],
    ["processing", false, false, false],
    ["succeeded", true, true, false],
    ["failed", true, false, true],
    ["canceled", true, false, true],
  ];

  test.each(cases)(
    "%s: terminal %s, succeeded %s, failure %s",
    (status, terminal, succeeded, failure) => {
      expect(isTerminalStatus(status)).toBe(terminal);
      expect(isSucceeded(taskWith(status))).toBe(succeeded);
      expect(isFailure(taskWith(status))).toBe(failure);
    }
  );
});

describe("taskUidOf", () => {
  test("reads the uid from a number, a TaskInfo or a Task", () => {
    expect(taskUidOf(12)).toBe(12);
    expect(
      taskUidOf({ taskUid: 5, status: "enqueued", type: "indexCreation" })
    ).toBe(5);
    expect(taskUidOf(taskWith("succeeded"))).toBe(3);
  });
});
