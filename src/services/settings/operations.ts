/**
 * Shared shape of the settings endpoints.
 *
 * Each setting lives under `/indexes/{uid}/settings/{name}`: GET reads it
 * (200), PUT or PATCH changes it and DELETE restores the default (both 202).
 */

import type { Effect, Schema } from "effect";
import type { DispatchError } from "../request/errors";
import { Method } from "../request/method";
import { NO_QUERY } from "../request/query";
import type { Index } from "../indexes/index-handle";
import { TaskInfo } from "../tasks/types";

export type SettingPath =
  | "synonyms"
  | "stop-words"
  | "ranking-rules"
  | "filterable-attributes"
  | "sortable-attributes"
  | "distinct-attribute"
  | "searchable-attributes"
  | "displayed-attributes"
  | "pagination"
  | "faceting";

function settingsPath(index: Index, name?: SettingPath): string {
  const base = `${index.path}/settings`;
  return name === undefined ? base : `${base}/${name}`;
}

export function getSetting<A, I>(
  index: Index,
  name: SettingPath | undefined,
  schema: Schema.Schema<A, I>
): Effect.Effect<A, DispatchError> {
  return index.client.execute(
    settingsPath(index, name),
    Method.get(NO_QUERY),
    200,
    schema
  );
}

/**
 * Lists and single values are replaced (PUT); the whole settings object and
 * nested objects such as `pagination` are merged (PATCH).
 */
export function updateSetting<B>(
  index: Index,
  name: SettingPath | undefined,
  update: "replace" | "merge",
  body: B
): Effect.Effect<TaskInfo, DispatchError> {
  const method =
    update === "replace"
      ? Method.put(NO_QUERY, body)
      : Method.patch(NO_QUERY, body);
  return index.client.execute(settingsPath(index, name), method, 202, TaskInfo);
}

export function resetSetting(
  index: Index,
  name: SettingPath | undefined
): Effect.Effect<TaskInfo, DispatchError> {
  return index.client.execute(
    settingsPath(index, name),
    Method.delete(NO_QUERY),
    202,
    TaskInfo
  );
}
