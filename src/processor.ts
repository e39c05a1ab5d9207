import { prepareEmbeddingText } from "./embeddings.js";
import { ConfigurationError, DataValidationError, EmbeddingError, PRProcessingError, toError } from "./errors.js";
import type {
  BatchReport,
  BatchUpsertResult,
  EmbeddingProvider,
  FetchManyOptions,
  ItemFailure,
  PullRequestInput,
  PullRequestRecord,
  RepositoryReport,
  SearchHit,
  SearchOptions,
  SourceClient,
  VectorStore,
} from "./types.js";
import { validatePullRequest } from "./validation.js";

export interface PRProcessorOptions {
  store: VectorStore;
  embedder: EmbeddingProvider;
  source?: SourceClient;
  /** Records per chunk in repository sweeps. Defaults to the store's batch size. */
  batchSize?: number;
  now?: () => Date;
}

export interface ProcessRepositoryOptions extends FetchManyOptions {
  onProgress?: (report: RepositoryReport) => void;
}

type Embedded = { record: PullRequestRecord; vector: number[] };

function identify(input: unknown): { id: number | null; repoName?: string } {
  if (typeof input !== "object" || input === null) return { id: null };
  const id = "id" in input && typeof input.id === "number" ? input.id : null;
  const repoName = "repoName" in input && typeof input.repoName === "string" ? input.repoName : undefined;
  return { id, repoName };
}

/** Group a lazy sequence into arrays of at most `size`, preserving order. */
export async function* chunked<T>(source: AsyncIterable<T>, size: number): AsyncGenerator<T[], void, undefined> {
  let chunk: T[] = [];
  for await (const item of source) {
    chunk.push(item);
    if (chunk.length >= size) {
      yield chunk;
      chunk = [];
    }
  }
  if (chunk.length > 0) yield chunk;
}

export class PRProcessor {
  private store: VectorStore;
  private embedder: EmbeddingProvider;
  private source?: SourceClient;
  private now: () => Date;
  readonly batchSize: number;

  constructor(opts: PRProcessorOptions) {
    this.store = opts.store;
    this.embedder = opts.embedder;
    this.source = opts.source;
    this.now = opts.now ?? (() => new Date());
    this.batchSize = opts.batchSize ?? opts.store.batchSize;
    if (!Number.isInteger(this.batchSize) || this.batchSize <= 0) {
      throw new ConfigurationError(`batch size must be a positive integer, got ${this.batchSize}`);
    }
  }

  validate(input: unknown): PullRequestInput {
    return validatePullRequest(input);
  }

  /**
   * Normalize a validated record for storage. Returns a new object; the input
   * and its collections are never touched.
   */
  transform(input: PullRequestInput): PullRequestRecord {
    return {
      ...input,
      body: input.body ?? "",
      labels: [...new Set(input.labels ?? [])],
      comments: [...(input.comments ?? [])],
      reviews: input.reviews?.map((r) => ({ ...r })),
      filesChanged: input.filesChanged?.map((f) => ({ ...f })),
      processedAt: this.now().toISOString(),
    };
  }

  async processOne(input: unknown): Promise<PullRequestRecord> {
    const { id, repoName } = identify(input);
    try {
      const record = this.transform(this.validate(input));
      const vector = await this.embedder.embed(prepareEmbeddingText(record));
      this.store.upsert(record, vector);
      return record;
    } catch (err) {
      throw new PRProcessingError("processOne", { recordId: id, repoName, cause: err });
    }
  }

  /**
   * Validate, embed and store a group of records. Records that fail validation
   * or embedding are reported and left out; the rest go to the store in one call.
   */
  async processBatch(inputs: unknown[]): Promise<BatchReport> {
    const failures: ItemFailure[] = [];
    const records: PullRequestRecord[] = [];

    for (const input of inputs) {
      try {
        records.push(this.transform(this.validate(input)));
      } catch (err) {
        const error = toError(err);
        const { id, repoName } = identify(input);
        failures.push({ id: error instanceof DataValidationError ? error.recordId : id, repoName, stage: "validate", error });
      }
    }
    if (failures.length > 0) {
      console.warn(`warning: ${failures.length} of ${inputs.length} records failed validation and were skipped`);
    }
    if (records.length === 0) return { stored: [], failures };

    const embedded = await this.embedRecords(records, failures);
    if (embedded.length === 0) return { stored: [], failures };

    let result: BatchUpsertResult;
    try {
      result = this.store.upsertBatch(embedded);
    } catch (err) {
      throw new PRProcessingError("processBatch", {
        repoName: records[0].repoName,
        cause: err,
        message: `store rejected batch of ${embedded.length} records: ${toError(err).message}`,
      });
    }

    const repoById = new Map(records.map((r) => [r.id, r.repoName]));
    for (const f of result.failed) {
      failures.push({ id: f.id, repoName: repoById.get(f.id), stage: "store", error: f.error });
    }
    return { stored: result.upserted, failures };
  }

  private async embedRecords(records: PullRequestRecord[], failures: ItemFailure[]): Promise<Embedded[]> {
    const texts = records.map((r) => prepareEmbeddingText(r));
    try {
      const vectors = await this.embedder.embedBatch(texts);
      if (vectors.length !== records.length) {
        throw new EmbeddingError(`expected ${records.length} embeddings, got ${vectors.length}`);
      }
      return records.map((record, i) => ({ record, vector: vectors[i] }));
    } catch (err) {
      console.warn(`warning: batch embedding failed (${toError(err).message}), embedding records one by one`);
    }

    const embedded: Embedded[] = [];
    for (let i = 0; i < records.length; i++) {
      const record = records[i];
      try {
        embedded.push({ record, vector: await this.embedder.embed(texts[i]) });
      } catch (err) {
        failures.push({ id: record.id, repoName: record.repoName, stage: "embed", error: toError(err) });
      }
    }
    return embedded;
  }

  /**
   * Sweep a repository: stream its pull requests, process them in chunks of
   * `batchSize`, and keep going past failed chunks. A failure of the source
   * stream itself ends the sweep.
   */
  async processRepository(repoName: string, opts: ProcessRepositoryOptions = {}): Promise<RepositoryReport> {
    if (!this.source) throw new ConfigurationError("processRepository requires a source client");
    const { onProgress, ...fetchOpts } = opts;
    const report: RepositoryReport = { repoName, chunks: 0, stored: [], failures: [] };
    const chunks = chunked(this.source.fetchMany(repoName, fetchOpts), this.batchSize);

    for (;;) {
      let next: IteratorResult<PullRequestInput[], void>;
      try {
        next = await chunks.next();
      } catch (err) {
        throw new PRProcessingError("processRepository", {
          repoName,
          cause: err,
          message: `fetching stopped after ${report.chunks} chunks (${report.stored.length} stored): ${toError(err).message}`,
        });
      }
      if (next.done) break;

      const chunk = next.value;
      report.chunks++;
      try {
        const result = await this.processBatch(chunk);
        report.stored.push(...result.stored);
        report.failures.push(...result.failures);
      } catch (err) {
        const error = toError(err);
        console.warn(`warning: chunk ${report.chunks} of ${repoName} failed: ${error.message}`);
        for (const pr of chunk) {
          report.failures.push({ id: pr.id, repoName: pr.repoName, stage: "store", error });
        }
      }
      onProgress?.(report);
    }

    return report;
  }

  async searchSimilar(query: string, limit = 5, opts: SearchOptions = {}): Promise<SearchHit[]> {
    try {
      const vector = await this.embedder.embed(query);
      return this.store.search(vector, limit, opts);
    } catch (err) {
      throw new PRProcessingError("searchSimilar", { repoName: opts.repoName, cause: err });
    }
  }

  getOne(id: number): PullRequestRecord | undefined {
    try {
      return this.store.get(id);
    } catch (err) {
      throw new PRProcessingError("getOne", { recordId: id, cause: err });
    }
  }

  /** Remove one record. Unknown ids succeed without changing anything. */
  deleteOne(id: number): void {
    try {
      this.store.delete(id);
    } catch (err) {
      throw new PRProcessingError("deleteOne", { recordId: id, cause: err });
    }
  }

  /** Drop the whole collection; the store must be re-initialized before reuse. */
  deleteAll(): void {
    try {
      this.store.deleteCollection();
    } catch (err) {
      throw new PRProcessingError("deleteAll", { cause: err });
    }
  }
}
