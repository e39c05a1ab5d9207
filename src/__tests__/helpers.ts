import { mkdirSync } from "node:fs";
import { tmpdir } from "node:os";
import { resolve } from "node:path";
import type { EmbeddingProvider, FetchManyOptions, PullRequestInput, SourceClient } from "../types.js";

export function tmpDb(): string {
  const dir = resolve(tmpdir(), `pr-indexer-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
  mkdirSync(dir, { recursive: true });
  return resolve(dir, "test.db");
}

export function makePR(id: number, overrides: Partial<PullRequestInput> = {}): PullRequestInput {
  return {
    id,
    repoName: "acme/widgets",
    title: `PR ${id}`,
    body: "",
    state: "open",
    createdAt: "2025-01-01T00:00:00Z",
    updatedAt: "2025-01-02T00:00:00Z",
    author: "octo",
    labels: [],
    comments: [],
    ...overrides,
  };
}

/**
 * Bag-of-words embedder: one dimension per vocabulary word plus a constant
 * bias dimension, so no text maps to the zero vector.
 */
export class WordEmbedder implements EmbeddingProvider {
  readonly dimensions: number;
  readonly embedCalls: string[] = [];
  readonly batchCalls: string[][] = [];
  private vocab: string[];

  constructor(vocab: string[]) {
    this.vocab = vocab;
    this.dimensions = vocab.length + 1;
  }

  vectorFor(text: string): number[] {
    const words = text.toLowerCase().split(/[^a-z0-9]+/).filter(Boolean);
    return [...this.vocab.map((w) => words.filter((x) => x === w).length), 1];
  }

  async embed(text: string): Promise<number[]> {
    this.embedCalls.push(text);
    return this.vectorFor(text);
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    this.batchCalls.push(texts);
    return texts.map((t) => this.vectorFor(t));
  }
}

/** In-memory source; `failAfter` makes the stream throw once that many records were yielded. */
export class FakeSource implements SourceClient {
  readonly fetched: number[] = [];
  private records: PullRequestInput[];
  private failAfter?: number;

  constructor(records: PullRequestInput[], opts: { failAfter?: number } = {}) {
    this.records = records;
    this.failAfter = opts.failAfter;
  }

  async fetchOne(repoName: string, prNumber: number): Promise<PullRequestInput> {
    const pr = this.records.find((r) => r.repoName === repoName && r.id === prNumber);
    if (!pr) throw new Error(`${repoName}#${prNumber} not found`);
    return pr;
  }

  async *fetchMany(repoName: string, opts: FetchManyOptions = {}): AsyncGenerator<PullRequestInput, void, undefined> {
    let yielded = 0;
    for (const pr of this.records) {
      if (pr.repoName !== repoName) continue;
      if (opts.limit !== undefined && yielded >= opts.limit) return;
      if (this.failAfter !== undefined && yielded >= this.failAfter) throw new Error("connection reset");
      this.fetched.push(pr.id);
      yield pr;
      yielded++;
    }
  }
}

// ── fake GitHub REST API ────────────────────────────────────────

export interface FakeResponse {
  status?: number;
  body?: unknown;
  headers?: Record<string, string>;
}

function jsonResponse(res: FakeResponse): Response {
  return new Response(JSON.stringify(res.body ?? {}), {
    status: res.status ?? 200,
    headers: { "content-type": "application/json; charset=utf-8", ...res.headers },
  });
}

/**
 * A `fetch` stand-in for Octokit. Routes match on pathname; an array route
 * answers its entries in order and then keeps repeating the last one.
 */
export function fakeGitHub(routes: Record<string, FakeResponse | FakeResponse[]>) {
  const requests: URL[] = [];
  const hits = new Map<string, number>();

  const fetchStub: typeof fetch = async (input, init) => {
    const url = new URL(input instanceof Request ? input.url : String(input));
    requests.push(url);
    if (init?.signal?.aborted) {
      const err = new Error("This operation was aborted");
      err.name = "AbortError";
      throw err;
    }
    const n = hits.get(url.pathname) ?? 0;
    hits.set(url.pathname, n + 1);

    const route = routes[url.pathname];
    if (route === undefined) return jsonResponse({ status: 404, body: { message: "Not Found" } });
    const res = Array.isArray(route) ? route[Math.min(n, route.length - 1)] : route;
    return jsonResponse(res);
  };

  return { fetch: fetchStub, requests };
}

export function ghPull(number: number, overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    number,
    title: `Pull ${number}`,
    body: `Body of ${number}`,
    state: "open",
    merged_at: null,
    created_at: "2025-03-01T10:00:00Z",
    updated_at: "2025-03-02T10:00:00Z",
    user: { login: "octo" },
    labels: [],
    additions: 10,
    deletions: 2,
    changed_files: 1,
    base: { ref: "main" },
    head: { ref: `feature-${number}` },
    mergeable: true,
    ...overrides,
  };
}

/** Routes for one fully fetchable pull request with no comments, reviews or files. */
export function pullRoutes(repo: string, pull: Record<string, unknown>): Record<string, FakeResponse> {
  const n = String(pull.number);
  return {
    [`/repos/${repo}/pulls/${n}`]: { body: pull },
    [`/repos/${repo}/issues/${n}/comments`]: { body: [] },
    [`/repos/${repo}/pulls/${n}/reviews`]: { body: [] },
    [`/repos/${repo}/pulls/${n}/files`]: { body: [] },
  };
}
