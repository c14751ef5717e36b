/**
 * Tests for the Notion-backed transport.
 *
 * Run: node --import tsx --test src/notion/client.test.ts
 *
 * The SDK client is replaced by a recording requester, so these tests check
 * the requests sent and the handling of responses without any network.
 */

import { describe, it } from "node:test";
import { strict as assert } from "node:assert";
import { APIErrorCode, APIResponseError, ClientErrorCode, RequestTimeoutError } from "@notionhq/client";

import { NotionTransport, toDomainError, type NotionRequest, type NotionRequester } from "./client.js";
import { NotFoundError, RemoteServiceError } from "../speakers/errors.js";

// ═══════════════════════════════════════════════════════════════════════════
// TEST HELPERS
// ═══════════════════════════════════════════════════════════════════════════

class RecordingRequester implements NotionRequester {
  readonly requests: NotionRequest[] = [];

  constructor(private readonly responses: Array<unknown | Error>) {}

  async request(args: NotionRequest): Promise<unknown> {
    this.requests.push(args);
    const next = this.responses.shift();
    if (next instanceof Error) {
      throw next;
    }
    return next;
  }
}

function transportWith(...responses: Array<unknown | Error>): {
  transport: NotionTransport;
  requester: RecordingRequester;
} {
  const requester = new RecordingRequester(responses);
  const transport = new NotionTransport({ apiKey: "test-secret", databaseId: "db-123", client: requester });
  return { transport, requester };
}

function apiError(code: APIErrorCode, status: number, message: string): APIResponseError {
  return new APIResponseError({
    code,
    status,
    message,
    headers: new Headers(),
    rawBodyText: JSON.stringify({ object: "error", status, code, message }),
  });
}

const PAGE = {
  object: "page",
  id: "page-abc",
  url: "https://www.notion.so/page-abc",
  archived: false,
  properties: {
    Name: { id: "title", type: "title", title: [{ type: "text", plain_text: "Ada" }] },
  },
};

// ═══════════════════════════════════════════════════════════════════════════
// REQUESTS
// ═══════════════════════════════════════════════════════════════════════════

describe("NotionTransport requests", () => {
  it("creates pages under the configured database", async () => {
    const { transport, requester } = transportWith(PAGE);
    const properties = { Priority: { type: "select" as const, select: { name: "High" } } };

    const record = await transport.createRecord(properties);

    assert.deepStrictEqual(requester.requests, [
      { path: "pages", method: "post", body: { parent: { database_id: "db-123" }, properties } },
    ]);
    assert.deepStrictEqual(record, {
      id: "page-abc",
      url: "https://www.notion.so/page-abc",
      archived: false,
      properties: PAGE.properties,
    });
  });

  it("retrieves and updates pages by id", async () => {
    const { transport, requester } = transportWith(PAGE, PAGE);

    await transport.retrieveRecord("page-abc");
    await transport.updateRecord("page-abc", { archived: true });

    assert.deepStrictEqual(requester.requests, [
      { path: "pages/page-abc", method: "get" },
      { path: "pages/page-abc", method: "patch", body: { archived: true } },
    ]);
  });

  it("sends paging and filter parameters with a query", async () => {
    const { transport, requester } = transportWith({
      object: "list",
      results: [PAGE],
      has_more: true,
      next_cursor: "cursor-2",
    });
    const filter = { property: "Priority", select: { equals: "High" } };

    const page = await transport.queryRecords({ filter, pageSize: 25, startCursor: "cursor-1" });

    assert.deepStrictEqual(requester.requests, [
      {
        path: "databases/db-123/query",
        method: "post",
        body: { page_size: 25, filter, start_cursor: "cursor-1" },
      },
    ]);
    assert.equal(page.hasMore, true);
    assert.equal(page.nextCursor, "cursor-2");
    assert.deepStrictEqual(
      page.results.map((result) => result.id),
      ["page-abc"]
    );
  });

  it("omits absent query parameters", async () => {
    const { transport, requester } = transportWith({ results: [], has_more: false, next_cursor: null });

    await transport.queryRecords({ pageSize: 100 });

    assert.deepStrictEqual(requester.requests[0]?.body, { page_size: 100 });
  });

  it("reduces the database to its title and property kinds", async () => {
    const { transport, requester } = transportWith({
      object: "database",
      id: "db-123",
      title: [{ type: "text", plain_text: "Speaker " }, { type: "text", plain_text: "Pipeline" }],
      properties: {
        Name: { id: "title", name: "Name", type: "title", title: {} },
        Priority: { id: "abc", name: "Priority", type: "select", select: { options: [] } },
      },
    });

    assert.deepStrictEqual(await transport.retrieveDatabase(), {
      id: "db-123",
      title: "Speaker Pipeline",
      properties: { Name: "title", Priority: "select" },
    });
    assert.deepStrictEqual(requester.requests, [{ path: "databases/db-123", method: "get" }]);
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// FAILURES
// ═══════════════════════════════════════════════════════════════════════════

describe("NotionTransport failures", () => {
  it("rejects a malformed response", async () => {
    const { transport } = transportWith({ results: "nope" });

    await assert.rejects(transport.queryRecords({ pageSize: 10 }), (err: unknown) => {
      assert.ok(err instanceof RemoteServiceError);
      assert.equal(err.code, "malformed_response");
      assert.ok(err.message.startsWith("Notion query database returned a malformed response: "));
      return true;
    });
  });

  it("wraps client timeouts", async () => {
    const { transport } = transportWith(new RequestTimeoutError());

    await assert.rejects(transport.retrieveRecord("page-abc"), (err: unknown) => {
      assert.ok(err instanceof RemoteServiceError);
      assert.equal(err.code, ClientErrorCode.RequestTimeout);
      assert.equal(err.status, undefined);
      assert.ok(err.message.startsWith("Notion retrieve page failed: "));
      return true;
    });
  });

  it("reports a missing page as not found", async () => {
    const { transport } = transportWith(
      apiError(APIErrorCode.ObjectNotFound, 404, "Could not find page with ID: page-abc.")
    );

    await assert.rejects(transport.retrieveRecord("page-abc"), (err: unknown) => {
      assert.ok(err instanceof NotFoundError);
      assert.equal(err.recordId, "page-abc");
      return true;
    });
  });

  it("reports a missing database on query as a service error", async () => {
    const { transport } = transportWith(
      apiError(APIErrorCode.ObjectNotFound, 404, "Could not find database with ID: db-123.")
    );

    await assert.rejects(transport.queryRecords({ pageSize: 10 }), (err: unknown) => {
      assert.ok(err instanceof RemoteServiceError);
      assert.equal(err.code, "object_not_found");
      assert.equal(err.status, 404);
      assert.equal(err.message, "Notion query database failed: Could not find database with ID: db-123.");
      return true;
    });
  });

  it("wraps network errors", async () => {
    const { transport } = transportWith(new Error("getaddrinfo ENOTFOUND api.notion.com"));

    await assert.rejects(transport.retrieveDatabase(), {
      name: "RemoteServiceError",
      message: "Notion retrieve database failed: getaddrinfo ENOTFOUND api.notion.com",
    });
  });
});

describe("toDomainError", () => {
  it("passes domain errors through unchanged", () => {
    const original = new NotFoundError("page-abc");
    assert.equal(toDomainError("retrieve page", original, "page-abc"), original);
  });

  it("keeps the original error as the cause", () => {
    const cause = new Error("socket hang up");
    const err = toDomainError("update page", cause);
    assert.ok(err instanceof RemoteServiceError);
    assert.equal(err.cause, cause);
  });

  it("maps object_not_found to NotFoundError only for a record lookup", () => {
    const notFound = apiError(APIErrorCode.ObjectNotFound, 404, "Could not find page with ID: page-abc.");

    const lookup = toDomainError("retrieve page", notFound, "page-abc");
    assert.ok(lookup instanceof NotFoundError);
    assert.equal(lookup.recordId, "page-abc");
    assert.equal(lookup.cause, notFound);

    const query = toDomainError("query database", notFound);
    assert.ok(query instanceof RemoteServiceError);
    assert.equal(query.code, "object_not_found");
    assert.equal(query.status, 404);
  });

  it("keeps the code and status of other API errors", () => {
    const cases = [
      { code: APIErrorCode.Unauthorized, status: 401, message: "API token is invalid." },
      { code: APIErrorCode.RateLimited, status: 429, message: "You have been rate limited." },
    ];
    for (const { code, status, message } of cases) {
      const err = toDomainError("update page", apiError(code, status, message), "page-abc");
      assert.ok(err instanceof RemoteServiceError);
      assert.equal(err.code, code);
      assert.equal(err.status, status);
      assert.equal(err.message, `Notion update page failed: ${message}`);
    }
  });

  it("stringifies non-Error values", () => {
    assert.equal(toDomainError("query database", "boom").message, "Notion query database failed: boom");
  });
});
