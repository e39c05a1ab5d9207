import { afterEach, beforeEach, describe, expect, it, type MockInstance, vi } from "vitest";
import { AuthError, ConfigurationError, NotFoundError, RateLimitError, SourceClientError } from "../errors.js";
import { GitHubClient, type GitHubClientOptions } from "../github.js";
import { type FakeResponse, fakeGitHub, ghPull, pullRoutes } from "./helpers.js";

const REPO = "acme/widgets";
const NEXT_PULLS_PAGE = `<https://api.github.com/repos/${REPO}/pulls?per_page=100&page=2>; rel="next"`;

function client(routes: Record<string, FakeResponse | FakeResponse[]>, opts: Partial<GitHubClientOptions> = {}) {
  const gh = fakeGitHub(routes);
  const sleeps: number[] = [];
  const c = new GitHubClient({
    token: "test-token",
    sleep: async (ms) => {
      sleeps.push(ms);
    },
    request: { fetch: gh.fetch },
    ...opts,
  });
  return { client: c, requests: gh.requests, sleeps };
}

function hits(requests: URL[], pathname: string): number {
  return requests.filter((u) => u.pathname === pathname).length;
}

describe("GitHubClient", () => {
  let warn: MockInstance<(typeof console)["warn"]>;

  beforeEach(() => {
    warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("requires a token", () => {
    expect(() => new GitHubClient({})).toThrow(ConfigurationError);
  });

  describe("fetchOne", () => {
    it("maps a pull request with its comments, reviews and files", async () => {
      const { client: c } = client({
        [`/repos/${REPO}/pulls/1`]: {
          body: ghPull(1, {
            state: "closed",
            merged_at: "2025-03-03T00:00:00Z",
            body: null,
            user: null,
            labels: [{ name: "bug" }, { name: "" }],
          }),
        },
        [`/repos/${REPO}/issues/1/comments`]: { body: [{ body: "Looks good" }, { body: null }] },
        [`/repos/${REPO}/pulls/1/reviews`]: {
          body: [{ user: { login: "rev" }, state: "APPROVED", body: "ship it", submitted_at: "2025-03-02T12:00:00Z" }],
        },
        [`/repos/${REPO}/pulls/1/files`]: {
          body: [{ filename: "src/a.ts", status: "modified", additions: 3, deletions: 1, changes: 4 }],
        },
      });

      expect(await c.fetchOne(REPO, 1)).toEqual({
        id: 1,
        repoName: REPO,
        title: "Pull 1",
        body: "",
        state: "merged",
        createdAt: "2025-03-01T10:00:00Z",
        updatedAt: "2025-03-02T10:00:00Z",
        author: "unknown",
        labels: ["bug"],
        comments: ["Looks good", ""],
        reviews: [{ user: "rev", state: "APPROVED", body: "ship it", submittedAt: "2025-03-02T12:00:00Z" }],
        filesChanged: [{ filename: "src/a.ts", status: "modified", additions: 3, deletions: 1, changes: 4 }],
        additions: 10,
        deletions: 2,
        changedFiles: 1,
        baseBranch: "main",
        headBranch: "feature-1",
        mergeable: true,
      });
    });

    it("collects comments across pages", async () => {
      const { client: c, requests } = client({
        ...pullRoutes(REPO, ghPull(6)),
        [`/repos/${REPO}/issues/6/comments`]: [
          {
            body: [{ body: "first" }, { body: "second" }],
            headers: { link: `<https://api.github.com/repos/${REPO}/issues/6/comments?per_page=100&page=2>; rel="next"` },
          },
          { body: [{ body: "third" }] },
        ],
      });

      expect((await c.fetchOne(REPO, 6)).comments).toEqual(["first", "second", "third"]);
      expect(hits(requests, `/repos/${REPO}/issues/6/comments`)).toBe(2);
    });

    it("keeps closed and open states apart from merged", async () => {
      const { client: c } = client({
        ...pullRoutes(REPO, ghPull(2, { state: "closed" })),
        ...pullRoutes(REPO, ghPull(3, { state: "open" })),
      });
      expect((await c.fetchOne(REPO, 2)).state).toBe("closed");
      expect((await c.fetchOne(REPO, 3)).state).toBe("open");
    });

    it("accepts a repository URL", async () => {
      const { client: c, requests } = client(pullRoutes(REPO, ghPull(4)));
      const pr = await c.fetchOne("https://github.com/acme/widgets", 4);
      expect(pr.repoName).toBe(REPO);
      expect(requests[0].pathname).toBe(`/repos/${REPO}/pulls/4`);
    });

    it("tracks the rate limit from response headers", async () => {
      const routes = pullRoutes(REPO, ghPull(5));
      routes[`/repos/${REPO}/pulls/5`].headers = { "x-ratelimit-remaining": "4321", "x-ratelimit-limit": "5000" };
      const { client: c } = client(routes);

      await c.fetchOne(REPO, 5);
      expect(c.getRateLimit().remaining).toBe(4321);
      expect(c.getRateLimit().limit).toBe(5000);
      expect(c.formatRateLimitWarning(c.estimateAPICallsNeeded(1000))).toMatch(
        /^⚠ 4321\/5000 API calls remaining, ~4010 needed\./,
      );
      expect(c.formatRateLimitWarning(c.estimateAPICallsNeeded(10))).toBeNull();
    });
  });

  describe("failures", () => {
    it("maps 404 to NotFoundError without retrying", async () => {
      const { client: c, sleeps } = client({});
      await expect(c.fetchOne(REPO, 99)).rejects.toThrow(NotFoundError);
      await expect(c.fetchOne(REPO, 99)).rejects.toThrow("GET /repos/acme/widgets/pulls/99 not found");
      expect(sleeps).toEqual([]);
    });

    it("maps 401 to AuthError without retrying", async () => {
      const { client: c, sleeps } = client({
        [`/repos/${REPO}/pulls/1`]: { status: 401, body: { message: "Bad credentials" } },
      });
      const err = await c.fetchOne(REPO, 1).catch((e: unknown) => e);
      expect(err).toBeInstanceOf(AuthError);
      expect(err).toMatchObject({ status: 401, message: "GET /repos/acme/widgets/pulls/1: credentials rejected (401)" });
      expect(sleeps).toEqual([]);
    });

    it("waits out a rate limit and then succeeds", async () => {
      const { client: c, sleeps, requests } = client({
        ...pullRoutes(REPO, ghPull(7)),
        [`/repos/${REPO}/pulls/7`]: [
          {
            status: 403,
            body: { message: "API rate limit exceeded" },
            headers: { "x-ratelimit-remaining": "0", "retry-after": "7" },
          },
          { body: ghPull(7) },
        ],
      });

      const pr = await c.fetchOne(REPO, 7);
      expect(pr.id).toBe(7);
      expect(sleeps).toEqual([7000]);
      expect(hits(requests, `/repos/${REPO}/pulls/7`)).toBe(2);
      expect(warn).toHaveBeenCalledWith("Rate limited on GET /repos/acme/widgets/pulls/7. Waiting 7s (retry 1/3)...");
    });

    it("raises RateLimitError once retries run out", async () => {
      const { client: c, sleeps, requests } = client(
        { [`/repos/${REPO}/pulls/7`]: { status: 429, body: { message: "slow down" }, headers: { "retry-after": "1" } } },
        { retry: { maxRetries: 2 } },
      );

      const err = await c.fetchOne(REPO, 7).catch((e: unknown) => e);
      expect(err).toBeInstanceOf(RateLimitError);
      expect(err).toMatchObject({ message: "GET /repos/acme/widgets/pulls/7: rate limit exhausted after 2 retries" });
      expect(sleeps).toEqual([1000, 1000]);
      expect(hits(requests, `/repos/${REPO}/pulls/7`)).toBe(3);
    });

    it("retries server errors with exponential backoff", async () => {
      const { client: c, sleeps } = client(
        {
          ...pullRoutes(REPO, ghPull(8)),
          [`/repos/${REPO}/pulls/8`]: [
            { status: 502, body: { message: "Bad Gateway" } },
            { status: 502, body: { message: "Bad Gateway" } },
            { body: ghPull(8) },
          ],
        },
        { retry: { baseDelayMs: 10 } },
      );

      expect((await c.fetchOne(REPO, 8)).id).toBe(8);
      expect(sleeps).toEqual([10, 20]);
      expect(warn).not.toHaveBeenCalled();
    });

    it("does not retry client errors", async () => {
      const { client: c, sleeps } = client({
        [`/repos/${REPO}/pulls/1`]: { status: 422, body: { message: "Validation Failed" } },
      });
      const err = await c.fetchOne(REPO, 1).catch((e: unknown) => e);
      expect(err).toBeInstanceOf(SourceClientError);
      expect(err).toMatchObject({ status: 422 });
      expect(sleeps).toEqual([]);
    });

    it("does not retry an aborted request", async () => {
      const controller = new AbortController();
      controller.abort();
      const gh = fakeGitHub(pullRoutes(REPO, ghPull(1)));
      const { client: c, sleeps } = client({}, { request: { fetch: gh.fetch, signal: controller.signal } });

      const err = await c.fetchOne(REPO, 1).catch((e: unknown) => e);
      expect(err).toBeInstanceOf(SourceClientError);
      expect(err).toMatchObject({ message: "GET /repos/acme/widgets/pulls/1: This operation was aborted" });
      expect(sleeps).toEqual([]);
      expect(gh.requests).toHaveLength(1);
    });
  });

  describe("fetchMany", () => {
    const twoPulls = () => ({
      [`/repos/${REPO}/pulls`]: { body: [{ number: 1 }, { number: 2 }] },
      ...pullRoutes(REPO, ghPull(1)),
      ...pullRoutes(REPO, ghPull(2)),
    });

    it("makes no request until the first item is pulled", async () => {
      const { client: c, requests } = client(twoPulls());
      const stream = c.fetchMany(REPO);
      expect(requests).toHaveLength(0);

      const first = await stream.next();
      expect(first.done).toBe(false);
      expect(requests).toHaveLength(5);

      await stream.return(undefined);
      expect(requests).toHaveLength(5);
    });

    it("yields every pull request on a short page", async () => {
      const { client: c, requests } = client(twoPulls());
      const ids: number[] = [];
      for await (const pr of c.fetchMany(REPO)) ids.push(pr.id);

      expect(ids).toEqual([1, 2]);
      const list = requests[0].searchParams;
      expect([list.get("state"), list.get("sort"), list.get("direction"), list.get("per_page")]).toEqual([
        "all",
        "updated",
        "desc",
        "100",
      ]);
    });

    it("stops at the limit", async () => {
      const { client: c, requests } = client(twoPulls());
      const ids: number[] = [];
      for await (const pr of c.fetchMany(REPO, { state: "open", limit: 1 })) ids.push(pr.id);

      expect(ids).toEqual([1]);
      expect(requests[0].searchParams.get("per_page")).toBe("1");
      expect(requests[0].searchParams.get("state")).toBe("open");
      expect(hits(requests, `/repos/${REPO}/pulls/2`)).toBe(0);
    });

    it("starts again from the first page on every call", async () => {
      const { client: c, requests } = client(twoPulls());
      for (let run = 0; run < 2; run++) {
        const ids: number[] = [];
        for await (const pr of c.fetchMany(REPO)) ids.push(pr.id);
        expect(ids).toEqual([1, 2]);
      }

      const pages = requests.filter((u) => u.pathname === `/repos/${REPO}/pulls`).map((u) => u.searchParams.get("page"));
      expect(pages).toEqual([null, null]);
    });

    it("follows the Link header to the next page", async () => {
      const { client: c, requests } = client({
        ...twoPulls(),
        ...pullRoutes(REPO, ghPull(3)),
        [`/repos/${REPO}/pulls`]: [
          { body: [{ number: 1 }, { number: 2 }], headers: { link: NEXT_PULLS_PAGE } },
          { body: [{ number: 3 }] },
        ],
      });
      const ids: number[] = [];
      for await (const pr of c.fetchMany(REPO)) ids.push(pr.id);

      expect(ids).toEqual([1, 2, 3]);
      const lists = requests.filter((u) => u.pathname === `/repos/${REPO}/pulls`);
      expect(lists.map((u) => u.searchParams.get("page"))).toEqual([null, "2"]);
    });

    it("never requests the next page when the caller stops early", async () => {
      const { client: c, requests } = client({
        ...twoPulls(),
        [`/repos/${REPO}/pulls`]: [
          { body: [{ number: 1 }, { number: 2 }], headers: { link: NEXT_PULLS_PAGE } },
          { body: [{ number: 3 }] },
        ],
      });
      const ids: number[] = [];
      for await (const pr of c.fetchMany(REPO)) {
        ids.push(pr.id);
        if (ids.length === 2) break;
      }

      expect(ids).toEqual([1, 2]);

      expect(hits(requests, `/repos/${REPO}/pulls`)).toBe(1);
    });

    it("yields nothing for a zero limit", async () => {
      const { client: c, requests } = client(twoPulls());
      const ids: number[] = [];
      for await (const pr of c.fetchMany(REPO, { limit: 0 })) ids.push(pr.id);
      expect(ids).toEqual([]);
      expect(requests).toHaveLength(0);
    });
  });
});
