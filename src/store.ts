import { mkdirSync } from "node:fs";
import { dirname, resolve } from "node:path";
import Database from "better-sqlite3";
import * as sqliteVec from "sqlite-vec";
import { z } from "zod";
import { ConfigurationError, ConnectionError, DimensionMismatchError, toError, VectorStoreError } from "./errors.js";
import type {
  BatchUpsertResult,
  DistanceMetric,
  PullRequestRecord,
  SearchHit,
  SearchOptions,
  StoreState,
  VectorPoint,
  VectorStore,
} from "./types.js";
import { parseStoredRecord } from "./validation.js";

export interface SqliteVectorStoreOptions {
  /** Database file, or ":memory:". */
  path: string;
  collection: string;
  dimensions: number;
  distance?: DistanceMetric;
  batchSize?: number;
}

type BatchItem = { record: PullRequestRecord; vector: number[] };

const COLLECTION_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

// sqlite-vec refuses KNN queries with a larger k
const MAX_KNN_K = 4096;

const CollectionRow = z.object({ dimensions: z.number(), distance: z.enum(["cosine", "l2"]) });
const NeighborRow = z.object({ id: z.string(), distance: z.number() });
const PayloadRow = z.object({ id: z.number(), payload_json: z.string() });
const CountRow = z.object({ c: z.number() });
const EmbeddingRow = z.object({ embedding: z.instanceof(Buffer) });
const ExactRow = z.object({ payload_json: z.string(), distance: z.number() });

function toBlob(vector: number[]): Buffer {
  return Buffer.from(new Float32Array(vector).buffer);
}

/**
 * Collection-scoped vector store on SQLite + sqlite-vec. Each collection is a
 * payload table plus a vec0 table, registered in `collections` with its
 * dimension and distance metric.
 */
export class SqliteVectorStore implements VectorStore {
  readonly dimensions: number;
  readonly batchSize: number;
  readonly distance: DistanceMetric;
  readonly collection: string;
  private path: string;
  private db?: Database.Database;
  private _state: StoreState = "uninitialized";

  constructor(opts: SqliteVectorStoreOptions) {
    if (!opts.path) throw new ConfigurationError("vector store path is required");
    if (!COLLECTION_NAME.test(opts.collection)) {
      throw new ConfigurationError(`invalid collection name "${opts.collection}"`);
    }
    if (/^sqlite_/i.test(opts.collection)) {
      throw new ConfigurationError(`collection name "${opts.collection}" uses the reserved sqlite_ prefix`);
    }
    if (!Number.isInteger(opts.dimensions) || opts.dimensions <= 0) {
      throw new ConfigurationError(`vector dimension must be a positive integer, got ${opts.dimensions}`);
    }
    const batchSize = opts.batchSize ?? 100;
    if (!Number.isInteger(batchSize) || batchSize <= 0) {
      throw new ConfigurationError(`batch size must be a positive integer, got ${batchSize}`);
    }
    this.path = opts.path;
    this.collection = opts.collection;
    this.dimensions = opts.dimensions;
    this.distance = opts.distance ?? "cosine";
    this.batchSize = batchSize;
  }

  get state(): StoreState {
    return this._state;
  }

  private get pointsTable(): string {
    return `${this.collection}_points`;
  }

  private get vectorsTable(): string {
    return `${this.collection}_vectors`;
  }

  private open(): Database.Database {
    if (this.db) return this.db;
    let db: Database.Database | undefined;
    try {
      if (this.path !== ":memory:") mkdirSync(dirname(resolve(this.path)), { recursive: true });
      db = new Database(this.path);
      sqliteVec.load(db);
      db.pragma("journal_mode = WAL");
      this.db = db;
      return db;
    } catch (err) {
      db?.close();
      throw new ConnectionError(`failed to open vector store at ${this.path}: ${toError(err).message}`, { cause: err });
    }
  }

  /**
   * Create the collection if absent. Safe to call repeatedly.
   *
   * A collection registered with another dimension or distance leaves the store
   * "incompatible": the database stays open so that `deleteCollection()` can
   * clear it before a rebuild.
   */
  initialize(): void {
    if (this._state === "active") return;
    const db = this.open();

    let existing: z.infer<typeof CollectionRow> | undefined;
    try {
      db.exec(`
        CREATE TABLE IF NOT EXISTS collections (
          name TEXT PRIMARY KEY,
          dimensions INTEGER NOT NULL,
          distance TEXT NOT NULL,
          created_at TEXT NOT NULL
        )
      `);
      const row = db.prepare("SELECT dimensions, distance FROM collections WHERE name = ?").get(this.collection);
      existing = row === undefined ? undefined : CollectionRow.parse(row);
    } catch (err) {
      throw this.wrap(err, "failed to read the collection registry");
    }

    if (existing && existing.dimensions !== this.dimensions) {
      this._state = "incompatible";
      throw new DimensionMismatchError(existing.dimensions, this.dimensions, `configured collection "${this.collection}"`);
    }
    if (existing && existing.distance !== this.distance) {
      this._state = "incompatible";
      throw new ConfigurationError(
        `collection "${this.collection}" uses ${existing.distance} distance, not ${this.distance}`,
      );
    }

    try {
      db.exec(`
        CREATE TABLE IF NOT EXISTS ${this.pointsTable} (
          id INTEGER PRIMARY KEY,
          repo_name TEXT NOT NULL,
          payload_json TEXT NOT NULL
        );

        CREATE INDEX IF NOT EXISTS idx_${this.collection}_repo ON ${this.pointsTable}(repo_name);

        CREATE VIRTUAL TABLE IF NOT EXISTS ${this.vectorsTable} USING vec0(
          id TEXT PRIMARY KEY,
          embedding float[${this.dimensions}] distance_metric=${this.distance}
        );
      `);
      if (existing === undefined) {
        db.prepare("INSERT INTO collections (name, dimensions, distance, created_at) VALUES (?, ?, ?, ?)").run(
          this.collection,
          this.dimensions,
          this.distance,
          new Date().toISOString(),
        );
      }
    } catch (err) {
      throw this.wrap(err, `failed to create collection ${this.collection}`);
    }
    this._state = "active";
  }

  private active(op: string): Database.Database {
    if (this._state !== "active" || !this.db) {
      if (this._state === "incompatible") {
        throw new ConnectionError(
          `cannot ${op}: collection "${this.collection}" does not match the configured dimension or distance; delete it first`,
        );
      }
      const why = this._state === "deleted" ? "collection was deleted" : "store is not initialized";
      throw new ConnectionError(`cannot ${op}: ${why}; call initialize() first`);
    }
    return this.db;
  }

  private checkVector(vector: number[], context: string): void {
    if (vector.length !== this.dimensions) throw new DimensionMismatchError(this.dimensions, vector.length, context);
    if (!vector.every(Number.isFinite)) throw new VectorStoreError(`${context} contains non-finite values`);
  }

  private writePoint(db: Database.Database, record: PullRequestRecord, vector: number[]): void {
    db.prepare(`
      INSERT INTO ${this.pointsTable} (id, repo_name, payload_json)
      VALUES (?, ?, ?)
      ON CONFLICT(id) DO UPDATE SET
        repo_name = excluded.repo_name,
        payload_json = excluded.payload_json
    `).run(record.id, record.repoName, JSON.stringify(record));

    db.prepare(`DELETE FROM ${this.vectorsTable} WHERE id = ?`).run(String(record.id));
    db.prepare(`INSERT INTO ${this.vectorsTable} (id, embedding) VALUES (?, ?)`).run(String(record.id), toBlob(vector));
  }

  private wrap(err: unknown, what: string): Error {
    if (err instanceof VectorStoreError) return err;
    return new VectorStoreError(`${what}: ${toError(err).message}`, { cause: err });
  }

  /** Insert or fully replace the point for `record.id`. */
  upsert(record: PullRequestRecord, vector: number[]): void {
    const db = this.active("upsert");
    this.checkVector(vector, `vector for #${record.id}`);
    try {
      db.transaction(() => this.writePoint(db, record, vector))();
    } catch (err) {
      throw this.wrap(err, `failed to upsert point ${record.id}`);
    }
  }

  /**
   * Upsert in chunks of `batchSize`, one transaction per chunk. Each item runs
   * in its own savepoint, so a bad item is rolled back and reported on its own.
   */
  upsertBatch(items: BatchItem[]): BatchUpsertResult {
    const db = this.active("upsertBatch");
    const result: BatchUpsertResult = { upserted: [], failed: [] };

    const writeOne = db.transaction((record: PullRequestRecord, vector: number[]) => this.writePoint(db, record, vector));
    const writeChunk = db.transaction((chunk: BatchItem[]) => {
      const partial: BatchUpsertResult = { upserted: [], failed: [] };
      for (const { record, vector } of chunk) {
        try {
          this.checkVector(vector, `vector for #${record.id}`);
          writeOne(record, vector);
          partial.upserted.push(record.id);
        } catch (err) {
          partial.failed.push({ id: record.id, error: this.wrap(err, `failed to upsert point ${record.id}`) });
        }
      }
      return partial;
    });

    for (let i = 0; i < items.length; i += this.batchSize) {
      let partial: BatchUpsertResult;
      try {
        partial = writeChunk(items.slice(i, i + this.batchSize));
      } catch (err) {
        throw this.wrap(err, `batch upsert failed after ${result.upserted.length} points`);
      }
      result.upserted.push(...partial.upserted);
      result.failed.push(...partial.failed);
    }
    return result;
  }

  private toScore(distance: number): number {
    return this.distance === "cosine" ? 1 - distance : 1 / (1 + distance);
  }

  /** Nearest neighbours, most similar first. */
  search(vector: number[], limit: number, opts: SearchOptions = {}): SearchHit[] {
    const db = this.active("search");
    this.checkVector(vector, "query vector");
    if (!Number.isInteger(limit)) throw new VectorStoreError(`search limit must be an integer, got ${limit}`);
    if (limit <= 0) return [];

    try {
      if (opts.repoName !== undefined || limit > MAX_KNN_K) return this.searchExact(db, vector, limit, opts.repoName);

      const neighbors = db
        .prepare(`
        SELECT id, distance
        FROM ${this.vectorsTable}
        WHERE embedding MATCH ?
        ORDER BY distance
        LIMIT ?
      `)
        .all(toBlob(vector), limit)
        .map((r) => NeighborRow.parse(r));

      const hits: SearchHit[] = [];
      for (const n of neighbors) {
        const record = this.get(Number(n.id));
        if (record) hits.push({ record, score: this.toScore(n.distance) });
      }
      return hits;
    } catch (err) {
      throw this.wrap(err, "search failed");
    }
  }

  // vec0 KNN cannot filter on the payload table and caps k, so repository-scoped
  // and very large searches compute exact distances in SQL instead.
  private searchExact(db: Database.Database, vector: number[], limit: number, repoName?: string): SearchHit[] {
    const fn = this.distance === "cosine" ? "vec_distance_cosine" : "vec_distance_l2";
    const filter = repoName !== undefined ? "WHERE p.repo_name = ?" : "";
    const params = repoName !== undefined ? [toBlob(vector), repoName, limit] : [toBlob(vector), limit];
    const rows = db
      .prepare(`
      SELECT p.payload_json AS payload_json, ${fn}(v.embedding, ?) AS distance
      FROM ${this.pointsTable} p
      JOIN ${this.vectorsTable} v ON v.id = CAST(p.id AS TEXT)
      ${filter}
      ORDER BY distance
      LIMIT ?
    `)
      .all(...params)
      .map((r) => ExactRow.parse(r));

    return rows.map((r) => ({ record: parseStoredRecord(r.payload_json), score: this.toScore(r.distance) }));
  }

  get(id: number): PullRequestRecord | undefined {
    const db = this.active("get");
    const row = db.prepare(`SELECT id, payload_json FROM ${this.pointsTable} WHERE id = ?`).get(id);
    if (row === undefined) return undefined;
    return parseStoredRecord(PayloadRow.parse(row).payload_json);
  }

  /** Payload and stored vector for one id. */
  getPoint(id: number): VectorPoint | undefined {
    const db = this.active("getPoint");
    const payload = this.get(id);
    if (!payload) return undefined;
    const row = db.prepare(`SELECT embedding FROM ${this.vectorsTable} WHERE id = ?`).get(String(id));
    if (row === undefined) return undefined;
    const { embedding } = EmbeddingRow.parse(row);
    return { id, vector: Array.from(new Float32Array(new Uint8Array(embedding).buffer)), payload };
  }

  count(): number {
    const db = this.active("count");
    return CountRow.parse(db.prepare(`SELECT COUNT(*) AS c FROM ${this.pointsTable}`).get()).c;
  }

  /** Remove one point. Unknown ids are a no-op. */
  delete(id: number): void {
    const db = this.active("delete");
    try {
      db.transaction(() => {
        db.prepare(`DELETE FROM ${this.pointsTable} WHERE id = ?`).run(id);
        db.prepare(`DELETE FROM ${this.vectorsTable} WHERE id = ?`).run(String(id));
      })();
    } catch (err) {
      throw this.wrap(err, `failed to delete point ${id}`);
    }
  }

  /**
   * Drop every point and the collection itself; `initialize()` is needed afterwards.
   * Also clears a collection that `initialize()` found incompatible.
   */
  deleteCollection(): void {
    const db = this._state === "incompatible" && this.db ? this.db : this.active("deleteCollection");
    try {
      db.exec(`DROP TABLE IF EXISTS ${this.vectorsTable}`);
      db.exec(`DROP TABLE IF EXISTS ${this.pointsTable}`);
      db.prepare("DELETE FROM collections WHERE name = ?").run(this.collection);
    } catch (err) {
      throw this.wrap(err, `failed to delete collection ${this.collection}`);
    }
    this._state = "deleted";
  }

  close(): void {
    this.db?.close();
    this.db = undefined;
    this._state = "uninitialized";
  }
}
