import { Octokit } from "@octokit/rest";
import { parseRepo } from "./config.js";
import { AuthError, ConfigurationError, NotFoundError, RateLimitError, SourceClientError } from "./errors.js";
import { classifyFailure, DEFAULT_RETRY_POLICY, type FailureKind, nextRetryDelay, type RetryPolicy } from "./retry.js";
import type { FetchManyOptions, PRState, PullRequestInput, RateLimitInfo, SourceClient } from "./types.js";

const PAGE_SIZE = 100;

type HeaderMap = Record<string, string | number | undefined>;

export interface GitHubClientOptions {
  token?: string;
  baseUrl?: string;
  retry?: Partial<RetryPolicy>;
  sleep?: (ms: number) => Promise<void>;
  /** Passed through to Octokit's request layer (custom `fetch`, `signal`, timeouts). */
  request?: { fetch?: typeof fetch; signal?: AbortSignal };
}

interface FailureDetails {
  status?: number;
  name?: string;
  headers: Record<string, string | undefined>;
  message: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function normalizeHeaders(headers: unknown): Record<string, string | undefined> {
  const out: Record<string, string | undefined> = {};
  if (!isRecord(headers)) return out;
  for (const [key, value] of Object.entries(headers)) {
    if (typeof value === "string" || typeof value === "number") out[key.toLowerCase()] = String(value);
  }
  return out;
}

function describeFailure(err: unknown): FailureDetails {
  if (!isRecord(err)) return { headers: {}, message: String(err) };
  const status = typeof err.status === "number" ? err.status : undefined;
  const name = typeof err.name === "string" ? err.name : undefined;
  const headers = isRecord(err.response) ? normalizeHeaders(err.response.headers) : {};
  const message = typeof err.message === "string" ? err.message : String(err);
  return { status, name, headers, message };
}

function mapState(state: string, mergedAt: string | null | undefined): PRState {
  if (mergedAt) return "merged";
  return state === "open" ? "open" : "closed";
}

export class GitHubClient implements SourceClient {
  private octokit: Octokit;
  private policy: RetryPolicy;
  private sleep: (ms: number) => Promise<void>;
  private rateLimit: RateLimitInfo = { remaining: 5000, limit: 5000, resetAt: new Date() };

  constructor(opts: GitHubClientOptions) {
    if (!opts.token) throw new ConfigurationError("GitHub token is required (set GITHUB_TOKEN)");
    this.octokit = new Octokit({
      auth: opts.token,
      baseUrl: opts.baseUrl,
      userAgent: "pr-indexer",
      request: opts.request,
    });
    this.policy = { ...DEFAULT_RETRY_POLICY, ...opts.retry };
    this.sleep = opts.sleep ?? ((ms) => new Promise((r) => setTimeout(r, ms)));

    // every request, including each page the paginator fetches, runs under the retry policy
    this.octokit.hook.wrap("request", (request, options) => {
      const { method, url } = this.octokit.request.endpoint.parse(options);
      const path = url.replace(options.baseUrl, "").replace(/\?.*$/, "");
      return this.withBackoff(`${method} ${path}`, async () => request(options));
    });
  }

  getRateLimit(): RateLimitInfo {
    return { ...this.rateLimit, resetAt: new Date(this.rateLimit.resetAt) };
  }

  private updateRateLimit(headers: HeaderMap) {
    const h = normalizeHeaders(headers);
    if (h["x-ratelimit-remaining"]) {
      this.rateLimit.remaining = parseInt(h["x-ratelimit-remaining"], 10);
    }
    if (h["x-ratelimit-limit"]) {
      this.rateLimit.limit = parseInt(h["x-ratelimit-limit"], 10);
    }
    if (h["x-ratelimit-reset"]) {
      this.rateLimit.resetAt = new Date(parseInt(h["x-ratelimit-reset"], 10) * 1000);
    }
  }

  /**
   * Run one request under the retry policy. Rate-limit and transient failures
   * are retried; everything else is mapped to a source error straight away.
   */
  private async withBackoff<T extends { headers: HeaderMap }>(what: string, fn: () => Promise<T>): Promise<T> {
    const started = Date.now();
    for (let attempt = 0; ; attempt++) {
      try {
        const response = await fn();
        this.updateRateLimit(response.headers);
        return response;
      } catch (err) {
        const failure = describeFailure(err);
        this.updateRateLimit(failure.headers);
        const kind = classifyFailure(failure.status, failure.headers, failure.message, failure.name);
        const retryAfter = failure.headers["retry-after"];
        const decision = nextRetryDelay(this.policy, {
          attempt,
          elapsedMs: Date.now() - started,
          kind,
          resetAt: failure.headers["x-ratelimit-reset"] ? this.rateLimit.resetAt : undefined,
          retryAfterSec: retryAfter !== undefined ? Number(retryAfter) : undefined,
        });
        if (!decision.retry) throw this.toSourceError(what, kind, failure, attempt, err);

        if (kind === "rate-limit") {
          console.warn(
            `Rate limited on ${what}. Waiting ${Math.ceil(decision.waitMs / 1000)}s (retry ${attempt + 1}/${this.policy.maxRetries})...`,
          );
        }
        await this.sleep(decision.waitMs);
      }
    }
  }

  private toSourceError(
    what: string,
    kind: FailureKind,
    failure: FailureDetails,
    attempt: number,
    cause: unknown,
  ): SourceClientError {
    switch (kind) {
      case "not-found":
        return new NotFoundError(`${what} not found`, { cause });
      case "auth":
        return new AuthError(`${what}: credentials rejected (${failure.status})`, { status: failure.status, cause });
      case "rate-limit":
        return new RateLimitError(`${what}: rate limit exhausted after ${attempt} retries`, {
          status: failure.status,
          resetAt: failure.headers["x-ratelimit-reset"] ? this.getRateLimit().resetAt : undefined,
          cause,
        });
      case "transient":
        return new SourceClientError(`${what}: ${failure.message} (gave up after ${attempt} retries)`, {
          status: failure.status,
          cause,
        });
      case "fatal":
        return new SourceClientError(`${what}: ${failure.message}`, { status: failure.status, cause });
    }
  }

  async fetchOne(repoName: string, prNumber: number): Promise<PullRequestInput> {
    const { owner, repo } = parseRepo(repoName);
    const repoFull = `${owner}/${repo}`;

    const { data: pr } = await this.octokit.rest.pulls.get({ owner, repo, pull_number: prNumber });
    const comments = await this.octokit.paginate(this.octokit.rest.issues.listComments, {
      owner,
      repo,
      issue_number: prNumber,
      per_page: PAGE_SIZE,
    });
    const reviews = await this.octokit.paginate(this.octokit.rest.pulls.listReviews, {
      owner,
      repo,
      pull_number: prNumber,
      per_page: PAGE_SIZE,
    });
    const files = await this.octokit.paginate(this.octokit.rest.pulls.listFiles, {
      owner,
      repo,
      pull_number: prNumber,
      per_page: PAGE_SIZE,
    });

    return {
      id: pr.number,
      repoName: repoFull,
      title: pr.title,
      body: pr.body || "",
      state: mapState(pr.state, pr.merged_at),
      createdAt: pr.created_at,
      updatedAt: pr.updated_at,
      author: pr.user?.login || "unknown",
      labels: pr.labels.map((l) => (typeof l === "string" ? l : l.name || "")).filter((l) => l.length > 0),
      comments: comments.map((c) => c.body || ""),
      reviews: reviews.map((r) => ({
        user: r.user?.login || "unknown",
        state: r.state,
        body: r.body || "",
        submittedAt: r.submitted_at ?? null,
      })),
      filesChanged: files.map((f) => ({
        filename: f.filename,
        status: f.status,
        additions: f.additions,
        deletions: f.deletions,
        changes: f.changes,
      })),
      additions: pr.additions,
      deletions: pr.deletions,
      changedFiles: pr.changed_files,
      baseBranch: pr.base.ref,
      headBranch: pr.head.ref,
      mergeable: pr.mergeable,
    };
  }

  /**
   * Lazily walk a repository's pull requests, fetching each one in full.
   * Pages follow GitHub's `Link` header. No request is made until the first
   * `next()`; every call starts from page 1.
   */
  async *fetchMany(repoName: string, opts: FetchManyOptions = {}): AsyncGenerator<PullRequestInput, void, undefined> {
    const { owner, repo } = parseRepo(repoName);
    const { state = "all", sort = "updated", direction = "desc", limit } = opts;
    if (limit !== undefined && limit <= 0) return;

    const pages = this.octokit.paginate.iterator(this.octokit.rest.pulls.list, {
      owner,
      repo,
      state,
      sort,
      direction,
      per_page: Math.min(PAGE_SIZE, limit ?? PAGE_SIZE),
    });
    let yielded = 0;

    for await (const { data } of pages) {
      for (const pr of data) {
        yield await this.fetchOne(`${owner}/${repo}`, pr.number);
        yielded++;
        if (limit !== undefined && yielded >= limit) return;
      }
    }
  }

  estimateAPICallsNeeded(totalPRs: number): number {
    // one list call per page, then pull + comments + reviews + files per PR (single pages assumed)
    return Math.ceil(totalPRs / PAGE_SIZE) + totalPRs * 4;
  }

  formatRateLimitWarning(estimatedCalls: number): string | null {
    if (this.rateLimit.remaining > estimatedCalls * 1.2) return null;
    const resetMin = Math.ceil((this.rateLimit.resetAt.getTime() - Date.now()) / 60000);
    return `⚠ ${this.rateLimit.remaining}/${this.rateLimit.limit} API calls remaining, ~${estimatedCalls} needed. Resets in ${resetMin}min.`;
  }
}
