export type PRState = "open" | "closed" | "merged";

export interface PRReview {
  user: string;
  state: string;
  body: string;
  submittedAt: string | null;
}

export interface PRFileChange {
  filename: string;
  status: string;
  additions: number;
  deletions: number;
  changes: number;
}

/**
 * A pull request as it arrives from the source client, before the pipeline
 * touches it. Collections may be missing; `validate` decides what is usable.
 */
export interface PullRequestInput {
  id: number;
  repoName: string;
  title: string;
  body?: string | null;
  state: PRState;
  createdAt: string;
  updatedAt: string;
  author: string;
  labels?: string[] | null;
  comments?: string[] | null;
  // source extras
  reviews?: PRReview[];
  filesChanged?: PRFileChange[];
  additions?: number;
  deletions?: number;
  changedFiles?: number;
  baseBranch?: string;
  headBranch?: string;
  mergeable?: boolean | null;
}

/** A validated, transformed record: the payload stored alongside each vector. */
export interface PullRequestRecord extends PullRequestInput {
  body: string;
  labels: string[];
  comments: string[];
  processedAt: string;
}

export interface VectorPoint {
  id: number;
  vector: number[];
  payload: PullRequestRecord;
}

export interface SearchHit {
  record: PullRequestRecord;
  score: number;
}

export type DistanceMetric = "cosine" | "l2";

export type StoreState = "uninitialized" | "active" | "incompatible" | "deleted";

export interface BatchUpsertResult {
  upserted: number[];
  failed: Array<{ id: number; error: Error }>;
}

export interface SearchOptions {
  repoName?: string;
}

export interface VectorStore {
  readonly state: StoreState;
  readonly dimensions: number;
  readonly batchSize: number;
  initialize(): void;
  upsert(record: PullRequestRecord, vector: number[]): void;
  upsertBatch(items: Array<{ record: PullRequestRecord; vector: number[] }>): BatchUpsertResult;
  search(vector: number[], limit: number, opts?: SearchOptions): SearchHit[];
  get(id: number): PullRequestRecord | undefined;
  getPoint(id: number): VectorPoint | undefined;
  count(): number;
  delete(id: number): void;
  deleteCollection(): void;
  close(): void;
}

export interface EmbeddingProvider {
  embed(text: string): Promise<number[]>;
  embedBatch(texts: string[]): Promise<number[][]>;
  dimensions: number;
}

export interface RateLimitInfo {
  remaining: number;
  limit: number;
  resetAt: Date;
}

export interface FetchManyOptions {
  state?: "open" | "closed" | "all";
  sort?: "created" | "updated" | "popularity" | "long-running";
  direction?: "asc" | "desc";
  limit?: number;
}

export interface SourceClient {
  fetchOne(repoName: string, prNumber: number): Promise<PullRequestInput>;
  fetchMany(repoName: string, opts?: FetchManyOptions): AsyncGenerator<PullRequestInput, void, undefined>;
}

export type FailureStage = "validate" | "embed" | "store";

export interface ItemFailure {
  id: number | null;
  repoName?: string;
  stage: FailureStage;
  error: Error;
}

export interface BatchReport {
  stored: number[];
  failures: ItemFailure[];
}

export interface RepositoryReport extends BatchReport {
  repoName: string;
  chunks: number;
}
