export type FailureKind = "rate-limit" | "auth" | "not-found" | "transient" | "fatal";

export interface RetryPolicy {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Upper bound on a wait derived from the remote's reset hint. */
  maxResetWaitMs: number;
  /** Give up once total time spent (including the next wait) would pass this. */
  maxElapsedMs?: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30_000,
  maxResetWaitMs: 60_000,
};

export interface FailureContext {
  /** Number of failed attempts before this one (0 for the first failure). */
  attempt: number;
  elapsedMs: number;
  kind: FailureKind;
  resetAt?: Date;
  retryAfterSec?: number;
  now?: number;
}

export type RetryDecision = { retry: true; waitMs: number } | { retry: false };

export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  return Math.min(policy.baseDelayMs * 2 ** attempt, policy.maxDelayMs);
}

/**
 * Decide whether a failed request should be retried and how long to wait.
 * Pure: the caller owns the clock and the sleeping.
 */
export function nextRetryDelay(policy: RetryPolicy, ctx: FailureContext): RetryDecision {
  if (ctx.kind !== "rate-limit" && ctx.kind !== "transient") return { retry: false };
  if (ctx.attempt >= policy.maxRetries) return { retry: false };

  let waitMs: number;
  if (ctx.kind === "rate-limit" && ctx.retryAfterSec !== undefined) {
    waitMs = Math.min(ctx.retryAfterSec * 1000, policy.maxResetWaitMs);
  } else if (ctx.kind === "rate-limit" && ctx.resetAt) {
    const now = ctx.now ?? Date.now();
    waitMs = Math.min(Math.max(0, ctx.resetAt.getTime() - now) + 1000, policy.maxResetWaitMs);
  } else {
    waitMs = backoffDelay(policy, ctx.attempt);
  }

  if (policy.maxElapsedMs !== undefined && ctx.elapsedMs + waitMs > policy.maxElapsedMs) {
    return { retry: false };
  }
  return { retry: true, waitMs };
}

export function classifyFailure(
  status: number | undefined,
  headers: Record<string, string | undefined>,
  message = "",
  name?: string,
): FailureKind {
  if (name === "AbortError") return "fatal";
  if (status === undefined) return "transient";
  if (status === 404) return "not-found";
  if (status === 401) return "auth";
  if (status === 403 || status === 429) {
    const exhausted = headers["x-ratelimit-remaining"] === "0";
    if (exhausted || headers["retry-after"] !== undefined || /rate limit/i.test(message)) return "rate-limit";
    return status === 429 ? "rate-limit" : "auth";
  }
  if (status === 408 || status >= 500) return "transient";
  return "fatal";
}
