import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import { config as loadEnv } from "dotenv";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import type { RetryPolicy } from "./retry.js";

const RetrySchema = z.object({
  max_retries: z.number().int().min(0).default(3),
  base_delay_ms: z.number().positive().default(1000),
  max_delay_ms: z.number().positive().default(30_000),
  max_reset_wait_ms: z.number().positive().default(60_000),
  max_elapsed_ms: z.number().positive().optional(),
});

const FetchSchema = z.object({
  state: z.enum(["open", "closed", "all"]).default("all"),
  sort: z.enum(["created", "updated", "popularity", "long-running"]).default("updated"),
  direction: z.enum(["asc", "desc"]).default("desc"),
  limit: z.number().int().positive().optional(),
});

const ConfigSchema = z.object({
  version: z.number().optional().default(1),
  collection: z.string().default("github_prs"),
  distance: z.enum(["cosine", "l2"]).default("cosine"),
  batch_size: z.number().int().positive().default(100),
  store_path: z.string().default("data/pr-indexer.db"),
  retry: RetrySchema.optional().transform((v) => RetrySchema.parse(v ?? {})),
  fetch: FetchSchema.optional().transform((v) => FetchSchema.parse(v ?? {})),
});

export type IndexerConfig = z.infer<typeof ConfigSchema>;

const EnvSchema = z.object({
  GITHUB_TOKEN: z.string().optional(),
  GITHUB_API_URL: z.string().url().optional(),
  EMBEDDING_PROVIDER: z.enum(["openai", "ollama", "voyageai"]).default("openai"),
  EMBEDDING_API_KEY: z.string().optional(),
  EMBEDDING_MODEL: z.string().default("text-embedding-3-small"),
  EMBEDDING_DIMENSIONS: z.coerce.number().int().positive().optional(),
  EMBEDDING_BASE_URL: z.string().url().optional(),
  PR_INDEXER_DB: z.string().optional(),
});

export type EnvConfig = z.infer<typeof EnvSchema>;

/**
 * Load `pr-indexer.config.yaml`. The file is optional; every setting has a default.
 * An explicitly passed path that does not exist is an error.
 */
export function loadConfig(configPath?: string): IndexerConfig {
  const p = configPath || resolve(process.cwd(), "pr-indexer.config.yaml");
  if (!existsSync(p)) {
    if (configPath) throw new Error(`config not found at ${p}`);
    return ConfigSchema.parse({});
  }
  const raw: unknown = parseYaml(readFileSync(p, "utf-8"));
  const parsed = ConfigSchema.parse(raw ?? {});
  if (parsed.version > 1) {
    throw new Error(`config version ${parsed.version} requires a newer version of pr-indexer`);
  }
  return parsed;
}

export function loadEnvConfig(envPath?: string): EnvConfig {
  loadEnv({ path: envPath || resolve(process.cwd(), ".env") });
  return EnvSchema.parse(process.env);
}

export function toRetryPolicy(retry: IndexerConfig["retry"]): RetryPolicy {
  return {
    maxRetries: retry.max_retries,
    baseDelayMs: retry.base_delay_ms,
    maxDelayMs: retry.max_delay_ms,
    maxResetWaitMs: retry.max_reset_wait_ms,
    maxElapsedMs: retry.max_elapsed_ms,
  };
}

export function parseRepo(repo: string): { owner: string; repo: string } {
  let cleaned = repo.trim();
  cleaned = cleaned.replace(/^https?:\/\/github\.com\//, "");
  cleaned = cleaned.replace(/^github\.com\//, "");
  cleaned = cleaned.replace(/\.git$/, "");
  cleaned = cleaned.replace(/\/$/, "");

  const parts = cleaned.split("/").filter(Boolean);
  if (parts.length !== 2 || !parts[0] || !parts[1]) {
    throw new Error(`invalid repo format: "${repo}". expected owner/repo`);
  }
  return { owner: parts[0], repo: parts[1] };
}
