/**
 * In-process stand-in for the search service.
 *
 * A Hono app implementing the subset of the HTTP API the client uses. Its
 * `fetch` plugs into `FetchTransport`, so tests exercise the real request
 * building and response parsing without opening a socket.
 */

import { Hono, type Context } from "hono";
import type { FetchLike } from "../services/request/fetch";
import type { Settings } from "../services/settings/types";
import type { Task, TaskStatus, TaskType } from "../services/tasks/types";

export interface RecordedRequest {
  readonly method: string;
  readonly path: string;
  readonly search: string;
  readonly headers: Readonly<Record<string, string>>;
  readonly body: string;
}

interface StoredIndex {
  primaryKey: string | null;
  documents: Map<string, Record<string, unknown>>;
  settings: Settings;
}

interface StoredTask {
  task: Task;
  polls: number;
}

const DEFAULT_SETTINGS: Settings = {
  synonyms: {},
  stopWords: [],
  rankingRules: ["words", "typo", "proximity", "attribute", "sort", "exactness"],
  filterableAttributes: [],
  sortableAttributes: [],
  distinctAttribute: null,
  searchableAttributes: ["*"],
  displayedAttributes: ["*"],
  pagination: { maxTotalHits: 1000 },
  faceting: { maxValuesPerFacet: 100 },
};

const SETTING_KEYS: Readonly<Record<string, keyof Settings>> = {
  synonyms: "synonyms",
  "stop-words": "stopWords",
  "ranking-rules": "rankingRules",
  "filterable-attributes": "filterableAttributes",
  "sortable-attributes": "sortableAttributes",
  "distinct-attribute": "distinctAttribute",
  "searchable-attributes": "searchableAttributes",
  "displayed-attributes": "displayedAttributes",
  pagination: "pagination",
  faceting: "faceting",
};

const ENQUEUED_AT = "2024-01-01T00:00:00Z";

export interface FakeServiceOptions {
  /** Key the service requires; requests are not checked when unset. */
  readonly apiKey?: string;
  /**
   * Statuses reported by successive polls of a task; the last one repeats.
   * The task's outcome (success or error) applies once it is terminal.
   */
  readonly taskStatuses?: ReadonlyArray<TaskStatus>;
}

export class FakeService {
  readonly app = new Hono();
  readonly requests: RecordedRequest[] = [];
  readonly indexes = new Map<string, StoredIndex>();
  readonly tasks = new Map<number, StoredTask>();
  private nextTaskUid = 0;

  constructor(private readonly options: FakeServiceOptions = {}) {
    this.routes();
  }

  /** `fetch` that answers from the in-process app. */
  readonly fetch: FetchLike = async (input, init) =>
    this.app.request(input, init);

  /** Requests to a path, in order. */
  requestsTo(path: string): RecordedRequest[] {
    return this.requests.filter((request) => request.path === path);
  }

  seedIndex(uid: string, primaryKey: string | null = null): StoredIndex {
    const stored: StoredIndex = {
      primaryKey,
      documents: new Map(),
      settings: { ...DEFAULT_SETTINGS },
    };
    this.indexes.set(uid, stored);
    return stored;
  }

  private enqueue(
    c: Context,
    type: TaskType,
    indexUid: string | null,
    details: Record<string, unknown>,
    error?: { message: string; code: string }
  ) {
    const uid = this.nextTaskUid++;
    const finalStatus: TaskStatus = error === undefined ? "succeeded" : "failed";
    this.tasks.set(uid, {
      polls: 0,
      task: {
        uid,
        indexUid,
        status: finalStatus,
        type,
        details,
        error:
          error === undefined
            ? null
            : { ...error, type: "invalid_request", link: undefined },
        enqueuedAt: ENQUEUED_AT,
      },
    });
    return c.json(
      { taskUid: uid, indexUid, status: "enqueued", type, enqueuedAt: ENQUEUED_AT },
      202
    );
  }

  private pollTask(stored: StoredTask): Task {
    const script = this.options.taskStatuses ?? ["succeeded"];
    const scripted = script[Math.min(stored.polls, script.length - 1)];
    stored.polls += 1;

    if (scripted === "succeeded" || scripted === "failed") {
      return stored.task;
    }
    return { ...stored.task, status: scripted ?? stored.task.status, error: null };
  }

  private indexNotFound(c: Context, uid: string) {
    return c.json(
      {
        message: `Index \`${uid}\` not found.`,
        code: "index_not_found",
        type: "invalid_request",
        link: "https://example.com/errors#index_not_found",
      },
      404
    );
  }

  private routes(): void {
    const app = this.app;

    app.use("*", async (c, next) => {
      const url = new URL(c.req.url);
      const headers: Record<string, string> = {};
      c.req.raw.headers.forEach((value, key) => {
        headers[key] = value;
      });
      this.requests.push({
        method: c.req.method,
        path: url.pathname,
        search: url.search,
        headers,
        body: await c.req.text(),
      });

      const expected = this.options.apiKey;
      if (
        expected !== undefined &&
        c.req.header("authorization") !== `Bearer ${expected}`
      ) {
        return c.json(
          {
            message: "The provided API key is invalid.",
            code: "invalid_api_key",
            type: "auth",
          },
          403
        );
      }
      await next();
    });

    app.get("/health", (c) => c.json({ status: "available" }));

    app.get("/version", (c) =>
      c.json({
        commitSha: "0000000",
        commitDate: "2024-01-01T00:00:00Z",
        pkgVersion: "1.0.0",
      })
    );

    app.get("/tasks", (c) => {
      const statuses = c.req.query("statuses")?.split(",");
      const limit = Number(c.req.query("limit") ?? 20);
      const results = [...this.tasks.values()]
        .map((stored) => stored.task)
        .filter((task) => statuses === undefined || statuses.includes(task.status))
        .reverse()
        .slice(0, limit);
      return c.json({
        results,
        limit,
        from: results.length === 0 ? null : results[0].uid,
        next: null,
      });
    });

    app.get("/tasks/:uid", (c) => {
      const stored = this.tasks.get(Number(c.req.param("uid")));
      if (stored === undefined) {
        return c.json(
          {
            message: `Task \`${c.req.param("uid")}\` not found.`,
            code: "task_not_found",
            type: "invalid_request",
          },
          404
        );
      }
      return c.json(this.pollTask(stored));
    });

    app.get("/indexes", (c) => {
      const results = [...this.indexes.entries()].map(([uid, stored]) => ({
        uid,
        primaryKey: stored.primaryKey,
      }));
      return c.json({ results, offset: 0, limit: 20, total: results.length });
    });

    app.post("/indexes", async (c) => {
      const body = JSON.parse(await c.req.text());
      const uid = String(body.uid);
      const primaryKey = typeof body.primaryKey === "string" ? body.primaryKey : null;

      if (this.indexes.has(uid)) {
        return this.enqueue(c, "indexCreation", uid, { primaryKey }, {
          message: `Index \`${uid}\` already exists.`,
          code: "index_already_exists",
        });
      }
      this.seedIndex(uid, primaryKey);
      return this.enqueue(c, "indexCreation", uid, { primaryKey });
    });

    app.get("/indexes/:uid", (c) => {
      const uid = c.req.param("uid");
      const stored = this.indexes.get(uid);
      if (stored === undefined) {
        return this.indexNotFound(c, uid);
      }
      return c.json({ uid, primaryKey: stored.primaryKey });
    });

    app.patch("/indexes/:uid", async (c) => {
      const uid = c.req.param("uid");
      const stored = this.indexes.get(uid);
      if (stored === undefined) {
        return this.indexNotFound(c, uid);
      }
      const { primaryKey } = JSON.parse(await c.req.text());
      stored.primaryKey = typeof primaryKey === "string" ? primaryKey : null;
      return this.enqueue(c, "indexUpdate", uid, { primaryKey });
    });

    app.delete("/indexes/:uid", (c) => {
      const uid = c.req.param("uid");
      this.indexes.delete(uid);
      return this.enqueue(c, "indexDeletion", uid, { deletedDocuments: 0 });
    });

    app.get("/indexes/:uid/documents", (c) => {
      const uid = c.req.param("uid");
      const stored = this.indexes.get(uid);
      if (stored === undefined) {
        return this.indexNotFound(c, uid);
      }
      const offset = Number(c.req.query("offset") ?? 0);
      const limit = Number(c.req.query("limit") ?? 20);
      const all = [...stored.documents.values()];
      return c.json({
        results: all.slice(offset, offset + limit),
        offset,
        limit,
        total: all.length,
      });
    });

    app.get("/indexes/:uid/documents/:id", (c) => {
      const uid = c.req.param("uid");
      const stored = this.indexes.get(uid);
      const document = stored?.documents.get(c.req.param("id"));
      if (document === undefined) {
        return c.json(
          {
            message: `Document \`${c.req.param("id")}\` not found.`,
            code: "document_not_found",
            type: "invalid_request",
          },
          404
        );
      }
      return c.json(document);
    });

    const addDocuments = async (c: Context, uid: string, merge: boolean) => {
      const stored = this.indexes.get(uid) ?? this.seedIndex(uid);
      const documents: Record<string, unknown>[] = JSON.parse(await c.req.text());
      const primaryKey =
        stored.primaryKey ?? c.req.query("primaryKey") ?? "id";
      stored.primaryKey = primaryKey;

      for (const document of documents) {
        const id = String(document[primaryKey]);
        const previous = merge ? stored.documents.get(id) : undefined;
        stored.documents.set(id, { ...previous, ...document });
      }
      return this.enqueue(c, "documentAdditionOrUpdate", uid, {
        receivedDocuments: documents.length,
        indexedDocuments: documents.length,
      });
    };

    app.post("/indexes/:uid/documents", (c) =>
      addDocuments(c, c.req.param("uid"), false)
    );
    app.put("/indexes/:uid/documents", (c) =>
      addDocuments(c, c.req.param("uid"), true)
    );

    app.delete("/indexes/:uid/documents", (c) => {
      const uid = c.req.param("uid");
      const stored = this.indexes.get(uid);
      const deleted = stored?.documents.size ?? 0;
      stored?.documents.clear();
      return this.enqueue(c, "documentDeletion", uid, {
        deletedDocuments: deleted,
      });
    });

    app.delete("/indexes/:uid/documents/:id", (c) => {
      const uid = c.req.param("uid");
      const deleted = this.indexes.get(uid)?.documents.delete(c.req.param("id"));
      return this.enqueue(c, "documentDeletion", uid, {
        deletedDocuments: deleted ? 1 : 0,
      });
    });

    app.post("/indexes/:uid/documents/delete-batch", async (c) => {
      const uid = c.req.param("uid");
      const ids: unknown[] = JSON.parse(await c.req.text());
      const stored = this.indexes.get(uid);
      let deleted = 0;
      for (const id of ids) {
        if (stored?.documents.delete(String(id))) {
          deleted += 1;
        }
      }
      return this.enqueue(c, "documentDeletion", uid, {
        providedIds: ids.length,
        deletedDocuments: deleted,
      });
    });

    app.post("/indexes/:uid/documents/delete", async (c) => {
      const uid = c.req.param("uid");
      const { filter } = JSON.parse(await c.req.text());
      return this.enqueue(c, "documentDeletion", uid, { originalFilter: filter });
    });

    app.get("/indexes/:uid/settings", (c) => {
      const uid = c.req.param("uid");
      const stored = this.indexes.get(uid);
      return stored === undefined
        ? this.indexNotFound(c, uid)
        : c.json(stored.settings);
    });

    app.patch("/indexes/:uid/settings", async (c) => {
      const uid = c.req.param("uid");
      const patch: Settings = JSON.parse(await c.req.text());
      const stored = this.indexes.get(uid) ?? this.seedIndex(uid);
      stored.settings = { ...stored.settings, ...patch };
      return this.enqueue(c, "settingsUpdate", uid, { ...patch });
    });

    app.delete("/indexes/:uid/settings", (c) => {
      const uid = c.req.param("uid");
      const stored = this.indexes.get(uid) ?? this.seedIndex(uid);
      stored.settings = { ...DEFAULT_SETTINGS };
      return this.enqueue(c, "settingsUpdate", uid, {});
    });

    app.get("/indexes/:uid/settings/:name", (c) => {
      const uid = c.req.param("uid");
      const key = SETTING_KEYS[c.req.param("name")];
      const stored = this.indexes.get(uid);
      if (stored === undefined || key === undefined) {
        return this.indexNotFound(c, uid);
      }
      return c.json(stored.settings[key] ?? null);
    });

    const updateSetting = async (
      c: Context,
      uid: string,
      name: string,
      merge: boolean
    ) => {
      const key = SETTING_KEYS[name];
      const stored = this.indexes.get(uid) ?? this.seedIndex(uid);
      if (key === undefined) {
        return this.indexNotFound(c, uid);
      }
      const value: unknown = JSON.parse(await c.req.text());
      const current = stored.settings[key];
      const next =
        merge &&
        typeof current === "object" &&
        current !== null &&
        typeof value === "object" &&
        value !== null
          ? { ...current, ...value }
          : value;
      stored.settings = { ...stored.settings, [key]: next };
      return this.enqueue(c, "settingsUpdate", uid, { [key]: next });
    };

    app.put("/indexes/:uid/settings/:name", (c) =>
      updateSetting(c, c.req.param("uid"), c.req.param("name"), false)
    );
    app.patch("/indexes/:uid/settings/:name", (c) =>
      updateSetting(c, c.req.param("uid"), c.req.param("name"), true)
    );

    app.delete("/indexes/:uid/settings/:name", (c) => {
      const uid = c.req.param("uid");
      const key = SETTING_KEYS[c.req.param("name")];
      const stored = this.indexes.get(uid) ?? this.seedIndex(uid);
      if (key !== undefined) {
        stored.settings = { ...stored.settings, [key]: DEFAULT_SETTINGS[key] };
      }
      return this.enqueue(c, "settingsUpdate", uid, {});
    });
  }
}
