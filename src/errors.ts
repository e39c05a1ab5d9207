// ── source client ───────────────────────────────────────────────

export class SourceClientError extends Error {
  readonly status?: number;

  constructor(message: string, opts: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: opts.cause });
    this.name = "SourceClientError";
    this.status = opts.status;
  }
}

export class AuthError extends SourceClientError {
  constructor(message: string, opts: { status?: number; cause?: unknown } = {}) {
    super(message, opts);
    this.name = "AuthError";
  }
}

export class NotFoundError extends SourceClientError {
  constructor(message: string, opts: { cause?: unknown } = {}) {
    super(message, { status: 404, cause: opts.cause });
    this.name = "NotFoundError";
  }
}

export class RateLimitError extends SourceClientError {
  readonly resetAt?: Date;

  constructor(message: string, opts: { status?: number; resetAt?: Date; cause?: unknown } = {}) {
    super(message, opts);
    this.name = "RateLimitError";
    this.resetAt = opts.resetAt;
  }
}

// ── vector store ────────────────────────────────────────────────

export class VectorStoreError extends Error {
  constructor(message: string, opts: { cause?: unknown } = {}) {
    super(message, { cause: opts.cause });
    this.name = "VectorStoreError";
  }
}

export class ConnectionError extends VectorStoreError {
  constructor(message: string, opts: { cause?: unknown } = {}) {
    super(message, opts);
    this.name = "ConnectionError";
  }
}

export class ConfigurationError extends VectorStoreError {
  constructor(message: string, opts: { cause?: unknown } = {}) {
    super(message, opts);
    this.name = "ConfigurationError";
  }
}

export class DimensionMismatchError extends VectorStoreError {
  readonly expected: number;
  readonly actual: number;

  constructor(expected: number, actual: number, context = "vector") {
    super(`dimension mismatch: ${context} has ${actual} dimensions but the collection expects ${expected}`);
    this.name = "DimensionMismatchError";
    this.expected = expected;
    this.actual = actual;
  }
}

// ── embeddings ──────────────────────────────────────────────────

export class EmbeddingError extends Error {
  constructor(message: string, opts: { cause?: unknown } = {}) {
    super(message, { cause: opts.cause });
    this.name = "EmbeddingError";
  }
}

// ── pipeline ────────────────────────────────────────────────────

export interface FieldIssue {
  field: string;
  message: string;
}

export class DataValidationError extends Error {
  readonly issues: FieldIssue[];
  readonly recordId: number | null;

  constructor(issues: FieldIssue[], recordId: number | null = null) {
    const fields = issues.map((i) => `${i.field}: ${i.message}`).join("; ");
    super(`invalid pull request${recordId !== null ? ` #${recordId}` : ""}: ${fields}`);
    this.name = "DataValidationError";
    this.issues = issues;
    this.recordId = recordId;
  }

  get fields(): string[] {
    return [...new Set(this.issues.map((i) => i.field))];
  }
}

export type PipelineOperation =
  | "processOne"
  | "processBatch"
  | "processRepository"
  | "searchSimilar"
  | "getOne"
  | "deleteOne"
  | "deleteAll";

export class PRProcessingError extends Error {
  readonly operation: PipelineOperation;
  readonly recordId: number | null;
  readonly repoName?: string;

  constructor(
    operation: PipelineOperation,
    opts: { recordId?: number | null; repoName?: string; cause?: unknown; message?: string } = {},
  ) {
    const subject = [
      opts.repoName,
      opts.recordId !== undefined && opts.recordId !== null ? `#${opts.recordId}` : undefined,
    ]
      .filter(Boolean)
      .join(" ");
    const reason = opts.message ?? describeCause(opts.cause);
    super(`${operation} failed${subject ? ` for ${subject}` : ""}: ${reason}`, { cause: opts.cause });
    this.name = "PRProcessingError";
    this.operation = operation;
    this.recordId = opts.recordId ?? null;
    this.repoName = opts.repoName;
  }
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

function describeCause(cause: unknown): string {
  if (cause === undefined) return "unknown error";
  return toError(cause).message;
}
