import assert from "node:assert";
import { describe, it, mock } from "node:test";
import type { BreakerStatus } from "../../src/core/breakers";
import { GitHubError } from "../../src/errors/app.errors";
import {
  GitHubIssueClient,
  sanitize,
  type HttpRequest,
  type HttpResponse,
} from "../../src/lib/github-reporter";
import { formatBreakerStatus } from "../../src/telegram/reports";

const STATUS: BreakerStatus = {
  tradingEnabled: false,
  probesEnabled: false,
  entriesEnabled: false,
  tripped: ["KILL_SWITCH"],
  lpDrainPct: 0,
  dailyGasUsd: 0,
  dailyPnlUsd: 0,
};

const NOW = Date.UTC(2026, 0, 2, 3, 4, 5);

function routeTransport(routes: Record<string, HttpResponse>) {
  return mock.fn(async (request: HttpRequest): Promise<HttpResponse> => {
    const key = `${request.method} ${request.url}`;
    const response = routes[key];
    if (!response) throw new Error(`no route for ${key}`);
    return response;
  });
}

const BASE = "https://api.github.com/repos/acme/bot";

describe("GitHubIssueClient", () => {
  it("requires an owner/repo", () => {
    assert.throws(() => new GitHubIssueClient({ token: "test-token", repo: "acme" }), GitHubError);
  });

  it("reads an issue with its comments", async () => {
    const transport = routeTransport({
      [`GET ${BASE}/issues/7`]: {
        status: 200,
        data: { number: 7, title: "Breakers", state: "open", body: "tracking" },
      },
      [`GET ${BASE}/issues/7/comments`]: {
        status: 200,
        data: [
          { id: 1, user: { login: "alice" }, body: "first", created_at: "2026-01-01T00:00:00Z" },
          { id: 2, body: "second" },
        ],
      },
    });
    const client = new GitHubIssueClient({ token: "test-token", repo: "acme/bot" }, { transport });

    const issue = await client.readIssue(7);
    assert.deepStrictEqual(issue, {
      number: 7,
      title: "Breakers",
      state: "open",
      body: "tracking",
      comments: [
        { id: 1, author: "alice", body: "first", createdAt: "2026-01-01T00:00:00Z" },
        { id: 2, author: "unknown", body: "second", createdAt: "" },
      ],
    });
    assert.strictEqual(transport.mock.calls[0]?.arguments[0].headers.Authorization, "token test-token");
  });

  it("limits listed comments", async () => {
    const transport = routeTransport({
      [`GET ${BASE}/issues/7/comments`]: { status: 200, data: [{ id: 1 }, { id: 2 }, { id: 3 }] },
    });
    const client = new GitHubIssueClient({ token: "test-token", repo: "acme/bot" }, { transport });
    const comments = await client.listComments(7, 2);
    assert.deepStrictEqual(comments.map((c) => c.id), [1, 2]);
  });

  it("posts a sanitized comment and returns its id", async () => {
    const transport = routeTransport({
      [`POST ${BASE}/issues/7/comments`]: { status: 201, data: { id: 99 } },
    });
    const client = new GitHubIssueClient({ token: "test-token", repo: "acme/bot" }, { transport });
    const id = await client.createComment(7, `key 0x${"ab".repeat(32)} wallet 0x${"1".repeat(40)}`);

    assert.strictEqual(id, 99);
    assert.deepStrictEqual(transport.mock.calls[0]?.arguments[0].body, {
      body: "key [REDACTED] wallet 0x111111...111111",
    });
  });

  it("raises GitHubError with the API message on a non-2xx answer", async () => {
    const transport = routeTransport({
      [`POST ${BASE}/issues/7/comments`]: { status: 404, data: { message: "Not Found" } },
    });
    const client = new GitHubIssueClient({ token: "test-token", repo: "acme/bot" }, { transport });
    await assert.rejects(
      client.createComment(7, "hello"),
      (err: unknown) =>
        err instanceof GitHubError &&
        err.status === 404 &&
        err.message === "POST /issues/7/comments -> 404: Not Found",
    );
  });

  it("wraps transport failures", async () => {
    const client = new GitHubIssueClient(
      { token: "test-token", repo: "acme/bot" },
      {
        transport: async () => {
          throw new Error("boom");
        },
      },
    );
    await assert.rejects(client.readIssue(7), /GET \/issues\/7 failed: boom/);
  });

  describe("reportBreakerTrip", () => {
    it("posts the breaker status", async () => {
      const transport = routeTransport({
        [`POST ${BASE}/issues/7/comments`]: { status: 201, data: { id: 1 } },
      });
      const client = new GitHubIssueClient(
        { token: "test-token", repo: "acme/bot" },
        { transport, now: () => NOW },
      );
      assert.strictEqual(await client.reportBreakerTrip(7, "KILL_SWITCH", STATUS), true);
      assert.deepStrictEqual(transport.mock.calls[0]?.arguments[0].body, {
        body: [
          "### 🚨 Breaker tripped: `KILL_SWITCH`",
          "",
          "**Timestamp**: 2026-01-02T03:04:05.000Z",
          "",
          "```",
          formatBreakerStatus(STATUS),
          "```",
        ].join("\n"),
      });
    });

    it("rate limits comments per hour", async () => {
      let now = NOW;
      const transport = routeTransport({
        [`POST ${BASE}/issues/7/comments`]: { status: 201, data: { id: 1 } },
      });
      const client = new GitHubIssueClient(
        { token: "test-token", repo: "acme/bot", maxCommentsPerHour: 2 },
        { transport, now: () => now },
      );
      assert.strictEqual(await client.reportBreakerTrip(7, "KILL_SWITCH", STATUS), true);
      assert.strictEqual(await client.reportBreakerTrip(7, "KILL_SWITCH", STATUS), true);
      assert.strictEqual(await client.reportBreakerTrip(7, "KILL_SWITCH", STATUS), false);
      assert.strictEqual(transport.mock.callCount(), 2);

      now += 3_600_000;
      assert.strictEqual(await client.reportBreakerTrip(7, "KILL_SWITCH", STATUS), true);
    });

    it("never throws on API failure", async () => {
      const transport = routeTransport({
        [`POST ${BASE}/issues/7/comments`]: { status: 500, data: {} },
      });
      const client = new GitHubIssueClient({ token: "test-token", repo: "acme/bot" }, { transport });
      assert.strictEqual(await client.reportBreakerTrip(7, "DAILY_LOSS", STATUS), false);
    });
  });
});

describe("sanitize", () => {
  it("redacts bearer tokens and long hex", () => {
    assert.strictEqual(sanitize("Authorization: Bearer test-secret"), "Authorization: [REDACTED]");
    assert.strictEqual(sanitize(`token ${"f".repeat(40)}`), "token [REDACTED]");
  });
});
