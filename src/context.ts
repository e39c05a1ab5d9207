import { resolve } from "node:path";
import { type EnvConfig, type IndexerConfig, loadConfig, loadEnvConfig, toRetryPolicy } from "./config.js";
import { createEmbeddingProvider } from "./embeddings.js";
import { GitHubClient } from "./github.js";
import { toError } from "./errors.js";
import { PRProcessor } from "./processor.js";
import { SqliteVectorStore } from "./store.js";
import type { EmbeddingProvider } from "./types.js";

export interface PipelineContext {
  config: IndexerConfig;
  env: EnvConfig;
  embedder: EmbeddingProvider;
  store: SqliteVectorStore;
  github?: GitHubClient;
  processor: PRProcessor;
}

export interface PipelineContextOptions {
  configPath?: string;
  envPath?: string;
  /** Build the GitHub client too (needs GITHUB_TOKEN). */
  withSource?: boolean;
  batchSize?: number;
  /**
   * Return a context even when the stored collection no longer matches the
   * configured dimension or distance. Only `deleteAll()` works on such a store.
   */
  allowIncompatible?: boolean;
}

/**
 * Wire config, embedder, store and (optionally) the GitHub client into a
 * ready processor. The store is initialized before returning.
 */
export async function createPipelineContext(opts: PipelineContextOptions = {}): Promise<PipelineContext> {
  const config = loadConfig(opts.configPath);
  const env = loadEnvConfig(opts.envPath);

  const embedder = await createEmbeddingProvider({
    provider: env.EMBEDDING_PROVIDER,
    apiKey: env.EMBEDDING_API_KEY,
    model: env.EMBEDDING_MODEL,
    baseUrl: env.EMBEDDING_BASE_URL,
    dimensions: env.EMBEDDING_DIMENSIONS,
  });

  const store = new SqliteVectorStore({
    path: resolve(process.cwd(), env.PR_INDEXER_DB || config.store_path),
    collection: config.collection,
    dimensions: embedder.dimensions,
    distance: config.distance,
    batchSize: opts.batchSize ?? config.batch_size,
  });
  try {
    store.initialize();
  } catch (err) {
    if (!(opts.allowIncompatible && store.state === "incompatible")) {
      store.close();
      throw err;
    }
    console.warn(`warning: ${toError(err).message}`);
  }

  const github = opts.withSource
    ? new GitHubClient({ token: env.GITHUB_TOKEN, baseUrl: env.GITHUB_API_URL, retry: toRetryPolicy(config.retry) })
    : undefined;

  const processor = new PRProcessor({ store, embedder, source: github, batchSize: opts.batchSize ?? config.batch_size });
  return { config, env, embedder, store, github, processor };
}
