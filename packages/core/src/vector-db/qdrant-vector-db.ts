import { createHash } from 'node:crypto';
import { QdrantClient } from '@qdrant/js-client-rest';
import { ok, err, type Result } from 'neverthrow';
import { StoreError } from '../types/provider.js';
import type { ListOptions, SearchResult, VectorDBStats, VectorSearchConfig } from '../types/search.js';
import { errorMessage } from '../utils/logger.js';
import { isNumberArray, isRecord, safeString } from '../utils/safe-cast.js';
import { BaseVectorDB, matchesFilter, normalizeListOptions, type VectorDBOptions } from './base-vector-db.js';
import { queryTerms, termOverlapScore } from './term-overlap.js';

export interface QdrantVectorDBOptions extends VectorDBOptions {
  url?: string;
  collectionName?: string;
  apiKey?: string;
}

const DEFAULT_URL = 'http://localhost:6333';
const DEFAULT_COLLECTION = 'fusekit';
const RECORD_ID_KEY = 'record_id';
const TEXT_KEY = 'text';

type FieldCondition = { key: string; match: { value: string | number | boolean } | { text: string } };

interface QdrantPoint {
  id: string | number;
  score?: number;
  payload?: Record<string, unknown> | null;
  vector?: unknown;
}

/**
 * UUID point id derived from a sha256 of the `(userId, id)` pair. Qdrant only
 * accepts unsigned integers or UUIDs; the string id lives in the payload.
 */
export function toPointId(userId: string, id: string): string {
  const hex = createHash('sha256').update(JSON.stringify([userId, id])).digest('hex');
  return [
    hex.slice(0, 8),
    hex.slice(8, 12),
    `5${hex.slice(13, 16)}`,
    `${((parseInt(hex.charAt(16), 16) & 0x3) | 0x8).toString(16)}${hex.slice(17, 20)}`,
    hex.slice(20, 32),
  ].join('-');
}

function isFilterValue(value: unknown): value is string | number | boolean {
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}

function ownerConditions(userId: string, filterMetadata?: Record<string, unknown>): FieldCondition[] {
  const conditions: FieldCondition[] = [{ key: 'user_id', match: { value: userId } }];
  for (const [key, value] of Object.entries(filterMetadata ?? {})) {
    if (isFilterValue(value)) {
      conditions.push({ key, match: { value } });
    }
  }
  return conditions;
}

export class QdrantVectorDB extends BaseVectorDB {
  readonly backend = 'qdrant';
  private readonly url: string;
  private readonly collectionName: string;
  private readonly apiKey?: string;
  private client: QdrantClient | null = null;
  private connecting: Promise<QdrantClient> | null = null;

  constructor(options: QdrantVectorDBOptions) {
    super(options);
    this.url = options.url ?? DEFAULT_URL;
    this.collectionName = options.collectionName ?? DEFAULT_COLLECTION;
    this.apiKey = options.apiKey;
  }

  get collection(): string {
    return this.collectionName;
  }

  /**
   * Create the client and, on first use, the collection with its payload
   * indexes. Concurrent callers share one attempt; a failed attempt is retried
   * by the next call.
   */
  connect(): Promise<QdrantClient> {
    if (!this.connecting) {
      this.connecting = this.open().catch((error: unknown) => {
        this.connecting = null;
        throw error;
      });
    }
    return this.connecting;
  }

  private async open(): Promise<QdrantClient> {
    const client = new QdrantClient({
      url: this.url,
      apiKey: this.apiKey,
      checkCompatibility: false,
    });

    const exists = await client.collectionExists(this.collectionName);
    if (!exists.exists) {
      try {
        await client.createCollection(this.collectionName, {
          vectors: {
            size: this.dimensions,
            distance: 'Cosine',
          },
        });
      } catch (error) {
        // Another process may have created it since the check
        const recheck = await client.collectionExists(this.collectionName);
        if (!recheck.exists) {
          throw error;
        }
        this.logger.debug('Qdrant collection already exists', { collection: this.collectionName });
      }
      try {
        await client.createPayloadIndex(this.collectionName, { field_name: 'user_id', field_schema: 'keyword', wait: true });
        await client.createPayloadIndex(this.collectionName, { field_name: TEXT_KEY, field_schema: 'text', wait: true });
      } catch (error) {
        // Filters still work without indexes, only slower.
        this.logger.warn('Failed to create Qdrant payload indexes', { error: errorMessage(error) });
      }
    }

    this.client = client;
    return client;
  }

  private async getClient(): Promise<QdrantClient> {
    return this.client ?? this.connect();
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

    try {
      const client = await this.getClient();
      await client.upsert(this.collectionName, {
        wait: true,
        points: [
          {
            id: toPointId(owner.value, id),
            vector: vector.value,
            payload: { ...this.buildPayload(owner.value, metadata), [RECORD_ID_KEY]: id, [TEXT_KEY]: text },
          },
        ],
      });
      return ok(true);
    } catch (error) {
      return err(new StoreError(`Qdrant upsert failed: ${errorMessage(error)}`));
    }
  }

  async searchVectors(
    queryEmbedding: number[],
    userId: string,
    config: VectorSearchConfig,
  ): Promise<Result<SearchResult[], StoreError>> {
    const query = this.validateEmbedding(queryEmbedding);
    if (query.isErr()) return err(query.error);

    try {
      const client = await this.getClient();
      const points = await client.search(this.collectionName, {
        vector: query.value,
        limit: config.topK,
        filter: { must: ownerConditions(userId, config.filterMetadata) },
        with_payload: true,
        with_vector: config.includeEmbeddings,
      });
      const results = points
        .map((point) => this.toResult(point, point.score, config.includeEmbeddings))
        .filter((result): result is SearchResult => result !== null && matchesFilter(result.metadata, config.filterMetadata))
        .map((result) => ({ ...result, semanticScore: result.score }));
      return ok(results);
    } catch (error) {
      return err(new StoreError(`Qdrant search failed: ${errorMessage(error)}`));
    }
  }

  /**
   * Full-text match on the `text` payload (any query term), scored by the
   * share of query terms each text contains.
   */
  async searchText(
    queryText: string,
    userId: string,
    config: VectorSearchConfig,
  ): Promise<Result<SearchResult[], StoreError>> {
    const terms = queryTerms(queryText);
    if (terms.length === 0) {
      return ok([]);
    }

    try {
      const client = await this.getClient();
      const page = await client.scroll(this.collectionName, {
        filter: {
          must: ownerConditions(userId, config.filterMetadata),
          should: terms.map((term) => ({ key: TEXT_KEY, match: { text: term } })),
        },
        limit: Math.max(config.topK * 10, 100),
        with_payload: true,
        with_vector: config.includeEmbeddings,
      });

      const scored: SearchResult[] = [];
      for (const point of page.points) {
        const result = this.toResult(point, 0, config.includeEmbeddings);
        if (!result || !matchesFilter(result.metadata, config.filterMetadata)) continue;
        const score = termOverlapScore(terms, result.text);
        if (score > 0) {
          scored.push({ ...result, score, lexicalScore: score });
        }
      }
      scored.sort((a, b) => b.score - a.score);
      return ok(scored.slice(0, config.topK));
    } catch (error) {
      return err(new StoreError(`Qdrant text search failed: ${errorMessage(error)}`));
    }
  }

  async deleteVector(id: string, userId: string): Promise<Result<boolean, StoreError>> {
    try {
      const client = await this.getClient();
      const owned = await this.retrieveOwned(client, id, userId, false);
      if (!owned) {
        return ok(false);
      }
      await client.delete(this.collectionName, { wait: true, points: [owned.id] });
      return ok(true);
    } catch (error) {
      return err(new StoreError(`Qdrant delete failed: ${errorMessage(error)}`));
    }
  }

  async getVector(id: string, userId: string): Promise<Result<SearchResult | null, StoreError>> {
    try {
      const client = await this.getClient();
      const owned = await this.retrieveOwned(client, id, userId, true);
      return ok(owned ? this.toResult(owned, 1, true) : null);
    } catch (error) {
      return err(new StoreError(`Qdrant get failed: ${errorMessage(error)}`));
    }
  }

  async listVectors(userId: string, options?: ListOptions): Promise<Result<SearchResult[], StoreError>> {
    const { limit, offset } = normalizeListOptions(options);
    if (limit === 0) {
      return ok([]);
    }

    try {
      const client = await this.getClient();
      const page = await client.scroll(this.collectionName, {
        filter: { must: ownerConditions(userId) },
        limit: offset + limit,
        with_payload: true,
        with_vector: false,
      });
      const results = page.points
        .slice(offset)
        .map((point) => this.toResult(point, 1, false))
        .filter((result): result is SearchResult => result !== null);
      return ok(results);
    } catch (error) {
      return err(new StoreError(`Qdrant list failed: ${errorMessage(error)}`));
    }
  }

  async getStats(userId?: string): Promise<Result<VectorDBStats, StoreError>> {
    try {
      const client = await this.getClient();
      const total = await client.count(this.collectionName, { exact: true });
      const stats: VectorDBStats = {
        backend: this.backend,
        dimensions: this.dimensions,
        totalVectors: total.count,
        collection: this.collectionName,
      };
      if (userId !== undefined) {
        const owned = await client.count(this.collectionName, { exact: true, filter: { must: ownerConditions(userId) } });
        stats.userVectors = owned.count;
      }
      return ok(stats);
    } catch (error) {
      return err(new StoreError(`Qdrant count failed: ${errorMessage(error)}`));
    }
  }

  async close(): Promise<void> {
    this.client = null;
    this.connecting = null;
  }

  private async retrieveOwned(
    client: QdrantClient,
    id: string,
    userId: string,
    withVector: boolean,
  ): Promise<QdrantPoint | null> {
    const points = await client.retrieve(this.collectionName, {
      ids: [toPointId(userId, id)],
      with_payload: true,
      with_vector: withVector,
    });
    const point = points[0];
    const payload = point?.payload;
    if (!point || !payload || payload['user_id'] !== userId || payload[RECORD_ID_KEY] !== id) {
      return null;
    }
    return point;
  }

  private toResult(point: QdrantPoint, score: number, includeEmbedding: boolean): SearchResult | null {
    if (!isRecord(point.payload)) {
      return null;
    }
    const { [RECORD_ID_KEY]: recordId, [TEXT_KEY]: text, ...metadata } = point.payload;
    const result: SearchResult = {
      id: safeString(recordId, String(point.id)),
      text: safeString(text, ''),
      score,
      metadata,
    };
    if (includeEmbedding && isNumberArray(point.vector)) {
      result.embedding = point.vector;
    }
    return result;
  }
}
