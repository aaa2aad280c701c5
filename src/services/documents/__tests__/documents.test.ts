import { Effect, Schema } from "effect";
import { beforeEach, describe, expect, test } from "vitest";
import { FakeService } from "../../../test-utils/fake-service";
import { SearchClient } from "../../client";
import type { Index } from "../../indexes/index-handle";
import { makeDispatcher } from "../../request/dispatcher";
import { ParseError, ServiceError } from "../../request/errors";
import { FetchTransport } from "../../request/fetch";

const Movie = Schema.Struct({ id: Schema.Number, title: Schema.String });

describe("Index documents", () => {
  let service: FakeService;
  let client: SearchClient;
  let movies: Index;

  beforeEach(() => {
    service = new FakeService();
    client = new SearchClient(
      "http://localhost:7700",
      undefined,
      makeDispatcher(new FetchTransport(service.fetch))
    );
    movies = client.index("movies");
  });

  const run = <A, E>(effect: Effect.Effect<A, E>) => Effect.runPromise(effect);

  test("addDocuments posts the batch with its primary key", async () => {
    const info = await run(
      movies.addDocuments(
        [
          { id: 1, title: "Carol" },
          { id: 2, title: "Heat" },
        ],
        "id"
      )
    );

    expect(info).toMatchObject({
      indexUid: "movies",
      status: "enqueued",
      type: "documentAdditionOrUpdate",
    });

    const [request] = service.requestsTo("/indexes/movies/documents");
    expect(request.method).toBe("POST");
    expect(request.search).toBe("?primaryKey=id");
    expect(request.body).toBe('[{"id":1,"title":"Carol"},{"id":2,"title":"Heat"}]');
  });

  test("addDocuments without a primary key sends no query", async () => {
    await run(movies.addDocuments([{ id: 1 }]));

    expect(service.requestsTo("/indexes/movies/documents")[0].search).toBe("");
  });

  test("getDocuments pages through the index", async () => {
    await run(
      movies.addDocuments([
        { id: 1, title: "Carol" },
        { id: 2, title: "Heat" },
        { id: 3, title: "Ran" },
      ])
    );

    const all = await run(movies.getDocuments());
    const page = await run(movies.getDocuments({ offset: 1, limit: 1 }, Movie));

    expect(all.total).toBe(3);
    expect(all.results).toHaveLength(3);
    expect(page).toEqual({
      results: [{ id: 2, title: "Heat" }],
      offset: 1,
      limit: 1,
      total: 3,
    });
    expect(
      service.requestsTo("/indexes/movies/documents").map((r) => r.search)
    ).toEqual(["", "", "?offset=1&limit=1"]);
  });

  test("getDocument decodes with the given schema", async () => {
    await run(movies.addDocuments([{ id: 1, title: "Carol", year: 2015 }]));

    const raw = await run(movies.getDocument(1));
    const typed = await run(movies.getDocument(1, { fields: ["id", "title"] }, Movie));

    expect(raw).toEqual({ id: 1, title: "Carol", year: 2015 });
    expect(typed).toEqual({ id: 1, title: "Carol" });
    expect(service.requestsTo("/indexes/movies/documents/1")[1].search).toBe(
      "?fields=id,title"
    );
  });

  test("getDocument reports a missing document as ServiceError", async () => {
    await run(movies.addDocuments([{ id: 1, title: "Carol" }]));

    const error = await run(Effect.flip(movies.getDocument(99)));

    expect(error).toBeInstanceOf(ServiceError);
    expect(error).toMatchObject({ errorCode: "document_not_found", statusCode: 404 });
  });

  test("a schema that does not match fails with ParseError", async () => {
    await run(movies.addDocuments([{ id: "one", title: "Carol" }]));

    const error = await run(Effect.flip(movies.getDocuments({}, Movie)));

    expect(error).toBeInstanceOf(ParseError);
    expect(error).toMatchObject({
      url: "http://localhost:7700/indexes/movies/documents",
    });
  });

  test("addDocuments replaces and addOrUpdateDocuments merges", async () => {
    await run(movies.addDocuments([{ id: 1, title: "Carol", year: 2015 }]));
    await run(movies.addOrUpdateDocuments([{ id: 1, title: "Carol (2015)" }]));

    expect(await run(movies.getDocument(1))).toEqual({
      id: 1,
      title: "Carol (2015)",
      year: 2015,
    });
    expect(service.requestsTo("/indexes/movies/documents")[1].method).toBe("PUT");

    await run(movies.addDocuments([{ id: 1, title: "Carol" }]));

    expect(await run(movies.getDocument(1))).toEqual({ id: 1, title: "Carol" });
  });

  test("deletes one, several, or all documents", async () => {
    await run(
      movies.addDocuments([
        { id: 1, title: "Carol" },
        { id: 2, title: "Heat" },
        { id: 3, title: "Ran" },
        { id: 4, title: "Ikiru" },
      ])
    );

    await run(movies.deleteDocument(1));
    expect(service.requestsTo("/indexes/movies/documents/1")[0].method).toBe(
      "DELETE"
    );

    await run(movies.deleteDocuments([2, 3]));
    const [batch] = service.requestsTo("/indexes/movies/documents/delete-batch");
    expect(batch.method).toBe("POST");
    expect(batch.body).toBe("[2,3]");
    expect((await run(movies.getDocuments())).results).toEqual([
      { id: 4, title: "Ikiru" },
    ]);

    const info = await run(movies.deleteAllDocuments());
    const task = await run(client.waitForTask(info));
    expect(task.details).toEqual({ deletedDocuments: 1 });
    expect((await run(movies.getDocuments())).total).toBe(0);
  });

  test("deleteDocumentsByFilter sends the filter expression", async () => {
    await run(movies.deleteDocumentsByFilter("year > 2000"));

    const [request] = service.requestsTo("/indexes/movies/documents/delete");
    expect(request.method).toBe("POST");
    expect(request.body).toBe('{"filter":"year > 2000"}');
  });
});

describe("Index", () => {
  test("percent-encodes the uid in its path", () => {
    const client = new SearchClient(
      "http://localhost:7700",
      undefined,
      makeDispatcher(new FetchTransport(new FakeService().fetch))
    );

    expect(client.index("my movies").path).toBe("/indexes/my%20movies");
  });

  test("updatePrimaryKey and fetchInfo", async () => {
    const service = new FakeService();
    service.seedIndex("movies");
    const client = new SearchClient(
      "http://localhost:7700",
      undefined,
      makeDispatcher(new FetchTransport(service.fetch))
    );

    const info = await Effect.runPromise(
      client.index("movies").updatePrimaryKey("movie_id")
    );
    const movies = await Effect.runPromise(client.index("movies").fetchInfo());

    expect(info.type).toBe("indexUpdate");
    expect(service.requestsTo("/indexes/movies")[0]).toMatchObject({
      method: "PATCH",
      body: '{"primaryKey":"movie_id"}',
    });
    expect(movies.primaryKey).toBe("movie_id");
  });
});
