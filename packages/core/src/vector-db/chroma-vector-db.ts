import { createHash } from 'node:crypto';
import { ChromaClient, IncludeEnum, type Collection, type Metadata, type Where, type WhereDocument } from 'chromadb';
import { ok, err, type Result } from 'neverthrow';
import { StoreError } from '../types/provider.js';
import type { ListOptions, SearchResult, VectorDBStats, VectorSearchConfig } from '../types/search.js';
import { errorMessage } from '../utils/logger.js';
import { isNumberArray, safeArray, safeNumber, safeRecord, safeString } from '../utils/safe-cast.js';
import { BaseVectorDB, matchesFilter, normalizeListOptions, type VectorDBOptions } from './base-vector-db.js';
import { queryTerms, termOverlapScore } from './term-overlap.js';

export interface ChromaVectorDBOptions extends VectorDBOptions {
  url?: string;
  collectionName?: string;
}

const DEFAULT_URL = 'http://localhost:8000';
const DEFAULT_COLLECTION = 'fusekit';
const RECORD_ID_KEY = 'record_id';
const JSON_KEYS_KEY = 'json_keys';

/**
 * Chroma ids are global, so the owner is hashed in with the id. Hashing the
 * JSON pair keeps `('a::b', 'c')` and `('a', 'b::c')` apart.
 */
export function toChromaId(userId: string, id: string): string {
  return createHash('sha256').update(JSON.stringify([userId, id])).digest('hex');
}

/**
 * Chroma metadata only holds scalars; anything else is stored as JSON text
 * and its key listed under `json_keys` so reads can decode it.
 */
export function toChromaMetadata(metadata: Record<string, unknown>): Metadata {
  const flat: Metadata = {};
  const encoded: string[] = [];
  for (const [key, value] of Object.entries(metadata)) {
    if (value === undefined || value === null) continue;
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      flat[key] = value;
    } else {
      flat[key] = JSON.stringify(value);
      encoded.push(key);
    }
  }
  if (encoded.length > 0) {
    flat[JSON_KEYS_KEY] = JSON.stringify(encoded);
  }
  return flat;
}

function parseJson(text: string): { value: unknown } | null {
  try {
    return { value: JSON.parse(text) };
  } catch {
    return null;
  }
}

/** Inverse of {@link toChromaMetadata}; values that no longer parse stay as text. */
export function fromChromaMetadata(stored: Record<string, unknown>): Record<string, unknown> {
  const { [JSON_KEYS_KEY]: rawKeys, ...metadata } = stored;
  const keys = typeof rawKeys === 'string' ? parseJson(rawKeys) : null;
  for (const key of safeArray(keys?.value, [])) {
    if (typeof key !== 'string') continue;
    const value = metadata[key];
    const parsed = typeof value === 'string' ? parseJson(value) : null;
    if (parsed) {
      metadata[key] = parsed.value;
    }
  }
  return metadata;
}

function ownerWhere(userId: string, filterMetadata?: Record<string, unknown>): Where {
  const clauses: Where[] = [{ user_id: userId }];
  for (const [key, value] of Object.entries(filterMetadata ?? {})) {
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      clauses.push({ [key]: value });
    }
  }
  const [first] = clauses;
  return clauses.length === 1 && first ? first : { $and: clauses };
}

/**
 * `$contains` is case-sensitive, so each query word is matched as typed and
 * in lower, capitalised and upper case.
 */
export function containsVariants(queryText: string): string[] {
  const variants = new Set<string>();
  for (const word of queryText.match(/[\p{L}\p{N}_]+/gu) ?? []) {
    const lower = word.toLowerCase();
    variants.add(word);
    variants.add(lower);
    variants.add(lower.charAt(0).toUpperCase() + lower.slice(1));
    variants.add(word.toUpperCase());
  }
  return [...variants];
}

function termsDocumentFilter(variants: readonly string[]): WhereDocument {
  const [first] = variants;
  if (variants.length === 1 && first !== undefined) {
    return { $contains: first };
  }
  return { $or: variants.map((variant) => ({ $contains: variant })) };
}

/** Parallel `ids`/`documents`/`metadatas`/`embeddings` columns of a get or query response. */
interface Columns {
  ids: unknown[];
  documents: unknown[];
  metadatas: unknown[];
  embeddings: unknown[];
  distances: unknown[];
}

function readColumns(response: unknown, nested: boolean): Columns {
  const record = safeRecord(response, {});
  const column = (key: string): unknown[] => {
    const value = safeArray(record[key], []);
    return nested ? safeArray(value[0], []) : value;
  };
  return {
    ids: column('ids'),
    documents: column('documents'),
    metadatas: column('metadatas'),
    embeddings: column('embeddings'),
    distances: column('distances'),
  };
}

export class ChromaVectorDB extends BaseVectorDB {
  readonly backend = 'chroma';
  private readonly url: string;
  private readonly collectionName: string;
  private collection: Collection | null = null;

  constructor(options: ChromaVectorDBOptions) {
    super(options);
    this.url = options.url ?? DEFAULT_URL;
    this.collectionName = options.collectionName ?? DEFAULT_COLLECTION;
  }

  async connect(): Promise<Collection> {
    const client = new ChromaClient({ path: this.url });
    const collection = await client.getOrCreateCollection({
      name: this.collectionName,
      metadata: { 'hnsw:space': 'cosine' },
      // Embeddings are always supplied by the caller.
      embeddingFunction: {
        generate: async () => {
          throw new StoreError('ChromaVectorDB expects precomputed embeddings');
        },
      },
    });
    this.collection = collection;
    return collection;
  }

  private async getCollection(): Promise<Collection> {
    return this.collection ?? this.connect();
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
      const collection = await this.getCollection();
      await collection.upsert({
        ids: [toChromaId(owner.value, id)],
        embeddings: [vector.value],
        documents: [text],
        metadatas: [toChromaMetadata({ ...this.buildPayload(owner.value, metadata), [RECORD_ID_KEY]: id })],
      });
      return ok(true);
    } catch (error) {
      return err(new StoreError(`Chroma upsert failed: ${errorMessage(error)}`));
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
      const collection = await this.getCollection();
      const response: unknown = await collection.query({
        queryEmbeddings: [query.value],
        nResults: config.topK,
        where: ownerWhere(userId, config.filterMetadata),
        include: this.includeFor(config.includeEmbeddings, true),
      });
      const columns = readColumns(response, true);
      const results: SearchResult[] = [];
      columns.ids.forEach((_id, i) => {
        // Cosine space: distance = 1 - similarity.
        const score = 1 - safeNumber(columns.distances[i], 1);
        const result = this.toResult(columns, i, score, config.includeEmbeddings);
        if (result && matchesFilter(result.metadata, config.filterMetadata)) {
          results.push({ ...result, semanticScore: score });
        }
      });
      return ok(results);
    } catch (error) {
      return err(new StoreError(`Chroma query failed: ${errorMessage(error)}`));
    }
  }

  /** Documents containing any query term, scored by the share of terms they contain. */
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
      const collection = await this.getCollection();
      const response: unknown = await collection.get({
        where: ownerWhere(userId, config.filterMetadata),
        whereDocument: termsDocumentFilter(containsVariants(queryText)),
        include: this.includeFor(config.includeEmbeddings, false),
      });
      const columns = readColumns(response, false);
      const scored: SearchResult[] = [];
      columns.ids.forEach((_id, i) => {
        const result = this.toResult(columns, i, 0, config.includeEmbeddings);
        if (!result || !matchesFilter(result.metadata, config.filterMetadata)) return;
        const score = termOverlapScore(terms, result.text);
        if (score > 0) {
          scored.push({ ...result, score, lexicalScore: score });
        }
      });
      scored.sort((a, b) => b.score - a.score);
      return ok(scored.slice(0, config.topK));
    } catch (error) {
      return err(new StoreError(`Chroma text search failed: ${errorMessage(error)}`));
    }
  }

  async deleteVector(id: string, userId: string): Promise<Result<boolean, StoreError>> {
    try {
      const collection = await this.getCollection();
      const existing = await this.fetchOwned(collection, id, userId, false);
      if (!existing) {
        return ok(false);
      }
      await collection.delete({ ids: [toChromaId(userId, id)] });
      return ok(true);
    } catch (error) {
      return err(new StoreError(`Chroma delete failed: ${errorMessage(error)}`));
    }
  }

  async getVector(id: string, userId: string): Promise<Result<SearchResult | null, StoreError>> {
    try {
      const collection = await this.getCollection();
      return ok(await this.fetchOwned(collection, id, userId, true));
    } catch (error) {
      return err(new StoreError(`Chroma get failed: ${errorMessage(error)}`));
    }
  }

  async listVectors(userId: string, options?: ListOptions): Promise<Result<SearchResult[], StoreError>> {
    const { limit, offset } = normalizeListOptions(options);
    if (limit === 0) {
      return ok([]);
    }

    try {
      const collection = await this.getCollection();
      const response: unknown = await collection.get({
        where: ownerWhere(userId),
        limit,
        offset,
        include: this.includeFor(false, false),
      });
      const columns = readColumns(response, false);
      const results = columns.ids
        .map((_id, i) => this.toResult(columns, i, 1, false))
        .filter((result): result is SearchResult => result !== null);
      return ok(results);
    } catch (error) {
      return err(new StoreError(`Chroma list failed: ${errorMessage(error)}`));
    }
  }

  async getStats(userId?: string): Promise<Result<VectorDBStats, StoreError>> {
    try {
      const collection = await this.getCollection();
      const stats: VectorDBStats = {
        backend: this.backend,
        dimensions: this.dimensions,
        totalVectors: await collection.count(),
        collection: this.collectionName,
      };
      if (userId !== undefined) {
        const response: unknown = await collection.get({ where: ownerWhere(userId), include: [] });
        stats.userVectors = readColumns(response, false).ids.length;
      }
      return ok(stats);
    } catch (error) {
      return err(new StoreError(`Chroma count failed: ${errorMessage(error)}`));
    }
  }

  async close(): Promise<void> {
    this.collection = null;
  }

  private includeFor(withEmbeddings: boolean, withDistances: boolean): IncludeEnum[] {
    const include = [IncludeEnum.Documents, IncludeEnum.Metadatas];
    if (withEmbeddings) include.push(IncludeEnum.Embeddings);
    if (withDistances) include.push(IncludeEnum.Distances);
    return include;
  }

  private async fetchOwned(
    collection: Collection,
    id: string,
    userId: string,
    withEmbedding: boolean,
  ): Promise<SearchResult | null> {
    const response: unknown = await collection.get({
      ids: [toChromaId(userId, id)],
      include: this.includeFor(withEmbedding, false),
    });
    const result = this.toResult(readColumns(response, false), 0, 1, withEmbedding);
    if (!result || result.metadata?.['user_id'] !== userId || result.id !== id) {
      return null;
    }
    return result;
  }

  private toResult(columns: Columns, index: number, score: number, includeEmbedding: boolean): SearchResult | null {
    const rawId = columns.ids[index];
    if (typeof rawId !== 'string') {
      return null;
    }
    const { [RECORD_ID_KEY]: recordId, ...stored } = safeRecord(columns.metadatas[index], {});
    const metadata = fromChromaMetadata(stored);
    const result: SearchResult = {
      id: safeString(recordId, rawId),
      text: safeString(columns.documents[index], ''),
      score,
      metadata,
    };
    const embedding = columns.embeddings[index];
    if (includeEmbedding && isNumberArray(embedding)) {
      result.embedding = embedding;
    }
    return result;
  }
}
