// Public API: pipeline, store and source client for programmatic use

export type { PipelineContext, PipelineContextOptions } from "./context.js";
export { createPipelineContext } from "./context.js";
export { loadConfig, loadEnvConfig, parseRepo, toRetryPolicy } from "./config.js";
export { createEmbeddingProvider, modelDimensions, prepareEmbeddingText } from "./embeddings.js";
export {
  AuthError,
  ConfigurationError,
  ConnectionError,
  DataValidationError,
  DimensionMismatchError,
  EmbeddingError,
  NotFoundError,
  PRProcessingError,
  RateLimitError,
  SourceClientError,
  VectorStoreError,
} from "./errors.js";
export { GitHubClient } from "./github.js";
export type { GitHubClientOptions } from "./github.js";
export { chunked, PRProcessor } from "./processor.js";
export type { PRProcessorOptions, ProcessRepositoryOptions } from "./processor.js";
export { classifyFailure, DEFAULT_RETRY_POLICY, nextRetryDelay } from "./retry.js";
export type { FailureKind, RetryDecision, RetryPolicy } from "./retry.js";
export { SqliteVectorStore } from "./store.js";
export type { SqliteVectorStoreOptions } from "./store.js";
export { validatePullRequest } from "./validation.js";
export type {
  BatchReport,
  BatchUpsertResult,
  EmbeddingProvider,
  FetchManyOptions,
  ItemFailure,
  PRState,
  PullRequestInput,
  PullRequestRecord,
  RateLimitInfo,
  RepositoryReport,
  SearchHit,
  SourceClient,
  VectorPoint,
  VectorStore,
} from "./types.js";
