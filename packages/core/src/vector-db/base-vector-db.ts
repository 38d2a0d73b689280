import { ok, err, type Result } from 'neverthrow';
import { StoreError } from '../types/provider.js';
import {
  createSearchConfig,
  type ListOptions,
  type SearchResult,
  type VectorDBStats,
  type VectorSearchConfig,
} from '../types/search.js';
import { createLogger, errorMessage, type Logger } from '../utils/logger.js';
import { fuseResults } from './fusion.js';

export interface VectorDBOptions {
  dimensions: number;
  logger?: Logger;
}

export const DEFAULT_LIST_LIMIT = 100;

/** True when every key of `filter` is present in `metadata` with an equal primitive value. */
export function matchesFilter(
  metadata: Record<string, unknown> | undefined,
  filter: Record<string, unknown> | undefined,
): boolean {
  if (!filter) {
    return true;
  }
  return Object.entries(filter).every(([key, expected]) => metadata?.[key] === expected);
}

export function stripEmbedding(result: SearchResult): SearchResult {
  const { embedding: _embedding, ...rest } = result;
  return rest;
}

export function normalizeListOptions(options: ListOptions = {}): Required<ListOptions> {
  return {
    limit: Math.max(0, Math.floor(options.limit ?? DEFAULT_LIST_LIMIT)),
    offset: Math.max(0, Math.floor(options.offset ?? 0)),
  };
}

/**
 * Contract shared by every backend. All stored items belong to a user and
 * every read, delete and search is scoped to that user; an id owned by
 * someone else behaves as if it did not exist.
 */
export abstract class BaseVectorDB {
  abstract readonly backend: string;
  readonly dimensions: number;
  protected readonly logger: Logger;

  constructor(options: VectorDBOptions) {
    this.dimensions = options.dimensions;
    this.logger = options.logger ?? createLogger('fusekit:vector-db');
  }

  abstract storeVector(
    id: string,
    text: string,
    embedding: number[],
    userId: string,
    metadata?: Record<string, unknown>,
  ): Promise<Result<boolean, StoreError>>;

  abstract searchVectors(
    queryEmbedding: number[],
    userId: string,
    config: VectorSearchConfig,
  ): Promise<Result<SearchResult[], StoreError>>;

  /** Lexical search. Backends without one return `ok([])`. */
  abstract searchText(
    queryText: string,
    userId: string,
    config: VectorSearchConfig,
  ): Promise<Result<SearchResult[], StoreError>>;

  /** `ok(false)` when the id does not exist for this user. */
  abstract deleteVector(id: string, userId: string): Promise<Result<boolean, StoreError>>;

  abstract getVector(id: string, userId: string): Promise<Result<SearchResult | null, StoreError>>;

  abstract listVectors(userId: string, options?: ListOptions): Promise<Result<SearchResult[], StoreError>>;

  abstract getStats(userId?: string): Promise<Result<VectorDBStats, StoreError>>;

  abstract close(): Promise<void>;

  /**
   * Semantic and lexical search run together and are fused with
   * `config.rankingMethod`. A failing side is logged and counts as empty;
   * if fusion itself throws, the semantic results are returned.
   */
  async hybridSearch(
    queryText: string,
    queryEmbedding: number[],
    userId: string,
    config: VectorSearchConfig = createSearchConfig({ searchMode: 'hybrid' }),
  ): Promise<SearchResult[]> {
    // MMR needs embeddings for its diversity term even when the caller does not.
    const searchConfig = config.rankingMethod === 'mmr' ? { ...config, includeEmbeddings: true } : config;

    const [semanticOutcome, lexicalOutcome] = await Promise.allSettled([
      this.searchVectors(queryEmbedding, userId, searchConfig),
      this.searchText(queryText, userId, searchConfig),
    ]);
    const semantic = this.settledResults('Semantic', semanticOutcome);
    const lexical = this.settledResults('Lexical', lexicalOutcome);

    let fused: SearchResult[];
    try {
      fused = fuseResults(semantic, lexical, config);
    } catch (error) {
      this.logger.error('Result fusion failed, returning semantic results', {
        rankingMethod: config.rankingMethod,
        error: errorMessage(error),
      });
      fused = semantic.slice(0, config.topK);
    }

    return config.includeEmbeddings ? fused : fused.map(stripEmbedding);
  }

  protected validateEmbedding(embedding: readonly number[]): Result<number[], StoreError> {
    if (embedding.length !== this.dimensions) {
      return err(
        new StoreError(`Embedding dimension mismatch: expected ${this.dimensions}, got ${embedding.length}`),
      );
    }
    if (!embedding.every((value) => Number.isFinite(value))) {
      return err(new StoreError('Embedding contains non-finite values'));
    }
    return ok([...embedding]);
  }

  /**
   * Owners are stored exactly as given, so reads match writes. Blank ids and
   * ids with surrounding whitespace are rejected rather than trimmed.
   */
  protected validateOwner(userId: string): Result<string, StoreError> {
    if (userId.trim().length === 0) {
      return err(new StoreError('userId must not be empty'));
    }
    if (userId.trim() !== userId) {
      return err(new StoreError('userId must not have leading or trailing whitespace'));
    }
    return ok(userId);
  }

  /** Caller metadata plus the owner and a storage timestamp. */
  protected buildPayload(userId: string, metadata: Record<string, unknown> = {}): Record<string, unknown> {
    return {
      ...metadata,
      user_id: userId,
      stored_at: new Date().toISOString(),
    };
  }

  private settledResults(
    label: string,
    outcome: PromiseSettledResult<Result<SearchResult[], StoreError>>,
  ): SearchResult[] {
    if (outcome.status === 'rejected') {
      this.logger.error(`${label} search failed`, { backend: this.backend, error: errorMessage(outcome.reason) });
      return [];
    }
    if (outcome.value.isErr()) {
      this.logger.error(`${label} search failed`, { backend: this.backend, error: outcome.value.error.message });
      return [];
    }
    return outcome.value.value;
  }
}
