import MiniSearch from 'minisearch';
import { ok, err, type Result } from 'neverthrow';
import { z } from 'zod';
import { StoreError } from '../types/provider.js';
import type { ListOptions, SearchResult, VectorDBStats, VectorSearchConfig } from '../types/search.js';
import { safeString } from '../utils/safe-cast.js';
import { cosineSimilarity } from '../utils/similarity.js';
import { BaseVectorDB, matchesFilter, normalizeListOptions, type VectorDBOptions } from './base-vector-db.js';

interface StoredRecord {
  id: string;
  userId: string;
  text: string;
  embedding: number[];
  metadata: Record<string, unknown>;
}

interface IndexedText {
  key: string;
  text: string;
}

const MINISEARCH_OPTIONS = {
  idField: 'key',
  fields: ['text'],
  searchOptions: {
    prefix: true,
    fuzzy: 0.2,
  },
};

const SNAPSHOT_VERSION = 1;

const snapshotSchema = z.object({
  version: z.literal(SNAPSHOT_VERSION),
  dimensions: z.number().int().positive(),
  records: z.array(
    z.object({
      id: z.string(),
      userId: z.string(),
      text: z.string(),
      embedding: z.array(z.number()),
      metadata: z.record(z.unknown()),
    }),
  ),
});

/** JSON array encoding keeps `(userId, id)` pairs distinct whatever characters either part holds. */
export function recordKey(userId: string, id: string): string {
  return JSON.stringify([userId, id]);
}

/**
 * Process-local backend: brute-force cosine search over a Map and a
 * MiniSearch BM25 index for lexical search. Used for local runs and tests,
 * and persisted by the runtime as a JSON snapshot.
 */
export class InMemoryVectorDB extends BaseVectorDB {
  readonly backend = 'memory';
  private readonly records = new Map<string, StoredRecord>();
  private readonly index = new MiniSearch<IndexedText>(MINISEARCH_OPTIONS);

  get size(): number {
    return this.records.size;
  }

  async storeVector(
    id: string,
    text: string,
    embedding: number[],
    userId: string,
    metadata: Record<string, unknown> = {},
  ): Promise<Result<boolean, StoreError>> {
    const owner = this.validateOwner(userId);
    if (owner.isErr()) return err(owner.error);
    const vector = this.validateEmbedding(embedding);
    if (vector.isErr()) return err(vector.error);

    this.put({ id, userId: owner.value, text, embedding: vector.value, metadata: this.buildPayload(owner.value, metadata) });
    return ok(true);
  }

  async searchVectors(
    queryEmbedding: number[],
    userId: string,
    config: VectorSearchConfig,
  ): Promise<Result<SearchResult[], StoreError>> {
    const query = this.validateEmbedding(queryEmbedding);
    if (query.isErr()) return err(query.error);

    const scored: SearchResult[] = [];
    for (const record of this.records.values()) {
      if (record.userId !== userId || !matchesFilter(record.metadata, config.filterMetadata)) continue;
      const score = cosineSimilarity(query.value, record.embedding);
      scored.push({ ...this.toResult(record, score, config.includeEmbeddings), semanticScore: score });
    }

    scored.sort((a, b) => b.score - a.score);
    return ok(scored.slice(0, config.topK));
  }

  async searchText(
    queryText: string,
    userId: string,
    config: VectorSearchConfig,
  ): Promise<Result<SearchResult[], StoreError>> {
    if (queryText.trim().length === 0) {
      return ok([]);
    }

    const results: SearchResult[] = [];
    for (const hit of this.index.search(queryText)) {
      const record = this.records.get(safeString(hit.id, ''));
      if (!record || record.userId !== userId || !matchesFilter(record.metadata, config.filterMetadata)) continue;
      results.push({ ...this.toResult(record, hit.score, config.includeEmbeddings), lexicalScore: hit.score });
      if (results.length >= config.topK) break;
    }
    return ok(results);
  }

  async deleteVector(id: string, userId: string): Promise<Result<boolean, StoreError>> {
    const key = recordKey(userId, id);
    if (!this.ownedRecord(key, userId, id)) {
      return ok(false);
    }
    this.records.delete(key);
    this.index.discard(key);
    return ok(true);
  }

  async getVector(id: string, userId: string): Promise<Result<SearchResult | null, StoreError>> {
    const record = this.ownedRecord(recordKey(userId, id), userId, id);
    return ok(record ? this.toResult(record, 1, true) : null);
  }

  async listVectors(userId: string, options?: ListOptions): Promise<Result<SearchResult[], StoreError>> {
    const { limit, offset } = normalizeListOptions(options);
    const owned = [...this.records.values()].filter((record) => record.userId === userId);
    return ok(owned.slice(offset, offset + limit).map((record) => this.toResult(record, 1, false)));
  }

  async getStats(userId?: string): Promise<Result<VectorDBStats, StoreError>> {
    const stats: VectorDBStats = {
      backend: this.backend,
      dimensions: this.dimensions,
      totalVectors: this.records.size,
    };
    if (userId !== undefined) {
      stats.userVectors = [...this.records.values()].filter((record) => record.userId === userId).length;
    }
    return ok(stats);
  }

  async close(): Promise<void> {
    // Nothing to release; the data stays available until the process exits.
  }

  /** Snapshot of every stored record, for persistence. */
  toJSON(): string {
    return JSON.stringify({
      version: SNAPSHOT_VERSION,
      dimensions: this.dimensions,
      records: [...this.records.values()],
    });
  }

  static fromJSON(json: string, options: VectorDBOptions): Result<InMemoryVectorDB, StoreError> {
    let raw: unknown;
    try {
      raw = JSON.parse(json);
    } catch (error) {
      return err(new StoreError(`Invalid snapshot JSON: ${error instanceof Error ? error.message : 'Unknown error'}`));
    }

    const parsed = snapshotSchema.safeParse(raw);
    if (!parsed.success) {
      return err(new StoreError(`Invalid snapshot: ${parsed.error.issues.map((issue) => issue.message).join('; ')}`));
    }
    if (parsed.data.dimensions !== options.dimensions) {
      return err(
        new StoreError(`Snapshot dimension mismatch: expected ${options.dimensions}, got ${parsed.data.dimensions}`),
      );
    }

    const db = new InMemoryVectorDB(options);
    for (const record of parsed.data.records) {
      db.put(record);
    }
    return ok(db);
  }

  private ownedRecord(key: string, userId: string, id: string): StoredRecord | null {
    const record = this.records.get(key);
    return record && record.userId === userId && record.id === id ? record : null;
  }

  private put(record: StoredRecord): void {
    const key = recordKey(record.userId, record.id);
    if (this.records.has(key)) {
      this.index.discard(key);
    }
    this.records.set(key, record);
    this.index.add({ key, text: record.text });
  }

  private toResult(record: StoredRecord, score: number, includeEmbedding: boolean): SearchResult {
    return {
      id: record.id,
      text: record.text,
      score,
      metadata: { ...record.metadata },
      ...(includeEmbedding ? { embedding: [...record.embedding] } : {}),
    };
  }
}
