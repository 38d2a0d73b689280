import type { Result } from 'neverthrow';
import type { Chunk } from '../types/chunk.js';
import type { EmbeddingProvider, SimilarityFinder, StoreError } from '../types/provider.js';
import {
  createSearchConfig,
  type RankingMethod,
  type SearchMode,
  type SearchResult,
  type VectorDBStats,
  type VectorSearchConfig,
} from '../types/search.js';
import { createLogger, errorMessage, type Logger } from '../utils/logger.js';
import { isZeroVector } from '../utils/similarity.js';
import { mapWithConcurrency } from '../utils/semaphore.js';
import { MMRReranker } from '../retrieval/mmr-reranker.js';
import { matchesFilter, stripEmbedding, type BaseVectorDB } from '../vector-db/base-vector-db.js';
import { fuseResults } from '../vector-db/fusion.js';

export type StoreMethod = 'local_db' | 'none';

export type SearchMethod = 'local_hybrid' | 'local_fused' | 'fallback' | 'none' | 'error';

export interface StoreKnowledgeResponse {
  success: boolean;
  method: StoreMethod;
  id: string;
  userId: string;
  error?: string;
}

export interface StoreChunksOptions {
  /** Prepended as `<prefix>:<chunkId>` so chunk ids from different documents do not collide. */
  idPrefix?: string;
  maxConcurrent?: number;
}

export interface StoreChunksResult {
  stored: number;
  failed: number;
  /** Chunks stored with a zero vector because embedding failed. */
  unembedded: number;
  ids: string[];
}

export interface HybridSearchOptions extends Partial<VectorSearchConfig> {
  /** Run the MMR reranker over the final list. */
  diversify?: boolean;
  diversityLambda?: number;
}

export interface HybridSearchResponse {
  success: boolean;
  results: SearchResult[];
  method: SearchMethod;
  totalResults: number;
  searchMode: SearchMode;
  rankingMethod: RankingMethod;
  semanticCount?: number;
  lexicalCount?: number;
  message?: string;
  error?: string;
}

/** Where the degraded fallback reads the user's stored texts from. */
export type FallbackSource = Pick<BaseVectorDB, 'listVectors'>;

export interface HybridSearchServiceOptions {
  vectorDb: BaseVectorDB | null;
  similarityFinder: SimilarityFinder | null;
  /** Defaults to `vectorDb`. */
  fallbackSource?: FallbackSource | null;
  reranker?: MMRReranker;
  logger?: Logger;
  useFallback?: boolean;
  fallbackCandidateLimit?: number;
  maxConcurrent?: number;
}

export interface HybridSearchServiceStats {
  hasVectorDb: boolean;
  hasSimilarityFinder: boolean;
  useFallback: boolean;
  fallbackCandidateLimit: number;
  backend: VectorDBStats | null;
}

const DEFAULT_FALLBACK_CANDIDATE_LIMIT = 1000;
const DEFAULT_MAX_CONCURRENT = 5;

interface TierOutcome {
  results: SearchResult[];
  semanticCount?: number;
  lexicalCount?: number;
}

/**
 * Storage and retrieval over one vector database with a degraded fallback.
 * Search tries, in order, the backend's own hybrid search (hybrid mode only),
 * local fusion of separate semantic and lexical searches, and finally a
 * similarity ranking of the user's stored texts. A tier runs only when the
 * previous one failed or found nothing.
 */
export class HybridSearchService {
  private readonly vectorDb: BaseVectorDB | null;
  private readonly similarityFinder: SimilarityFinder | null;
  private readonly fallbackSource: FallbackSource | null;
  private readonly reranker: MMRReranker;
  private readonly logger: Logger;
  private readonly useFallback: boolean;
  private readonly fallbackCandidateLimit: number;
  private readonly maxConcurrent: number;

  constructor(options: HybridSearchServiceOptions) {
    this.vectorDb = options.vectorDb;
    this.similarityFinder = options.similarityFinder;
    this.fallbackSource = options.fallbackSource === undefined ? options.vectorDb : options.fallbackSource;
    this.reranker = options.reranker ?? new MMRReranker();
    this.logger = options.logger ?? createLogger('fusekit:search');
    this.useFallback = options.useFallback ?? true;
    this.fallbackCandidateLimit = options.fallbackCandidateLimit ?? DEFAULT_FALLBACK_CANDIDATE_LIMIT;
    this.maxConcurrent = options.maxConcurrent ?? DEFAULT_MAX_CONCURRENT;
  }

  get fallbackAvailable(): boolean {
    return this.useFallback && this.similarityFinder !== null && this.fallbackSource !== null;
  }

  async storeKnowledge(
    id: string,
    text: string,
    embedding: number[],
    userId: string,
    metadata: Record<string, unknown> = {},
  ): Promise<StoreKnowledgeResponse> {
    if (!this.vectorDb) {
      return { success: false, method: 'none', id, userId, error: 'No vector database configured' };
    }

    let result: Result<boolean, StoreError>;
    try {
      result = await this.vectorDb.storeVector(id, text, embedding, userId, metadata);
    } catch (error) {
      this.logger.error('Store failed', { id, error: errorMessage(error) });
      return { success: false, method: 'local_db', id, userId, error: errorMessage(error) };
    }

    if (result.isErr()) {
      this.logger.error('Store failed', { id, error: result.error.message });
      return { success: false, method: 'local_db', id, userId, error: result.error.message };
    }
    return { success: result.value, method: 'local_db', id, userId };
  }

  /**
   * Embed and store chunks. Chunk ids, positions and parent links go into
   * the stored metadata so results can be traced back to their source.
   */
  async storeChunks(
    chunks: readonly Chunk[],
    userId: string,
    embeddingProvider: EmbeddingProvider,
    options: StoreChunksOptions = {},
  ): Promise<StoreChunksResult> {
    const summary: StoreChunksResult = { stored: 0, failed: 0, unembedded: 0, ids: [] };
    if (chunks.length === 0) {
      return summary;
    }

    const maxConcurrent = options.maxConcurrent ?? this.maxConcurrent;
    const embeddings = await embeddingProvider.embedBatch(
      chunks.map((chunk) => chunk.text),
      maxConcurrent,
    );

    const responses = await mapWithConcurrency(chunks, maxConcurrent, async (chunk, index) => {
      const embedding = embeddings[index] ?? new Array<number>(embeddingProvider.dimensions).fill(0);
      if (isZeroVector(embedding)) {
        summary.unembedded++;
      }
      const id = options.idPrefix ? `${options.idPrefix}:${chunk.chunkId}` : chunk.chunkId;
      return this.storeKnowledge(id, chunk.text, embedding, userId, {
        ...chunk.metadata,
        chunk_id: chunk.chunkId,
        position: chunk.position,
        start_char: chunk.startChar,
        end_char: chunk.endChar,
        ...(chunk.parentId ? { parent_id: chunk.parentId } : {}),
      });
    });

    for (const response of responses) {
      if (response.success) {
        summary.stored++;
        summary.ids.push(response.id);
      } else {
        summary.failed++;
      }
    }
    if (summary.unembedded > 0) {
      this.logger.warn('Some chunks were stored without a usable embedding', { count: summary.unembedded });
    }
    return summary;
  }

  async hybridSearch(
    queryText: string,
    queryEmbedding: number[] | null,
    userId: string,
    options: HybridSearchOptions = {},
  ): Promise<HybridSearchResponse> {
    const { diversify = false, diversityLambda, ...overrides } = options;
    const config = createSearchConfig(overrides);
    const base = { searchMode: config.searchMode, rankingMethod: config.rankingMethod };

    if (!this.vectorDb && !this.fallbackAvailable) {
      return {
        ...base,
        success: false,
        results: [],
        method: 'none',
        totalResults: 0,
        error: 'No vector database or fallback search available',
      };
    }

    // Diversification and MMR fusion need embeddings even when the caller does not.
    const searchConfig: VectorSearchConfig =
      diversify || config.rankingMethod === 'mmr' ? { ...config, includeEmbeddings: true } : config;
    const errors: string[] = [];

    const finish = (method: SearchMethod, outcome: TierOutcome): HybridSearchResponse => {
      let results = outcome.results;
      if (diversify && results.length > 1) {
        results = this.reranker.rerankResults(results, results.length, diversityLambda);
      }
      if (!config.includeEmbeddings) {
        results = results.map(stripEmbedding);
      }
      return {
        ...base,
        success: true,
        results,
        method,
        totalResults: results.length,
        ...(outcome.semanticCount !== undefined ? { semanticCount: outcome.semanticCount } : {}),
        ...(outcome.lexicalCount !== undefined ? { lexicalCount: outcome.lexicalCount } : {}),
      };
    };

    if (this.vectorDb) {
      const db = this.vectorDb;

      if (config.searchMode === 'hybrid' && queryEmbedding) {
        try {
          const results = await db.hybridSearch(queryText, queryEmbedding, userId, searchConfig);
          if (results.length > 0) {
            return finish('local_hybrid', { results });
          }
        } catch (error) {
          errors.push(errorMessage(error));
          this.logger.warn('Backend hybrid search failed', { backend: db.backend, error: errorMessage(error) });
        }
      }

      try {
        const outcome = await this.localFusedSearch(db, queryText, queryEmbedding, userId, searchConfig, errors);
        if (outcome.results.length > 0) {
          return finish('local_fused', outcome);
        }
      } catch (error) {
        errors.push(errorMessage(error));
        this.logger.warn('Local fused search failed', { backend: db.backend, error: errorMessage(error) });
      }
    }

    if (this.fallbackAvailable) {
      const results = await this.fallbackSearch(queryText, userId, config, errors);
      if (results.length > 0) {
        return finish('fallback', { results });
      }
    }

    if (errors.length > 0) {
      return {
        ...base,
        success: true,
        results: [],
        method: 'error',
        totalResults: 0,
        message: 'Search failed; no results',
        error: errors.join('; '),
      };
    }
    return { ...base, success: true, results: [], method: 'none', totalResults: 0, message: 'No results found' };
  }

  /** Rerank an existing result list with MMR. */
  diversify(results: readonly SearchResult[], targetCount?: number, lambdaParam?: number): SearchResult[] {
    return this.reranker.rerankResults(results, targetCount, lambdaParam);
  }

  async getStats(userId?: string): Promise<HybridSearchServiceStats> {
    let backend: VectorDBStats | null = null;
    if (this.vectorDb) {
      const stats = await this.vectorDb.getStats(userId);
      if (stats.isOk()) {
        backend = stats.value;
      } else {
        this.logger.warn('Could not read backend stats', { error: stats.error.message });
      }
    }
    return {
      hasVectorDb: this.vectorDb !== null,
      hasSimilarityFinder: this.similarityFinder !== null,
      useFallback: this.useFallback,
      fallbackCandidateLimit: this.fallbackCandidateLimit,
      backend,
    };
  }

  private async localFusedSearch(
    db: BaseVectorDB,
    queryText: string,
    queryEmbedding: number[] | null,
    userId: string,
    config: VectorSearchConfig,
    errors: string[],
  ): Promise<TierOutcome> {
    const wantsSemantic = config.searchMode !== 'lexical' && queryEmbedding !== null;
    const wantsLexical = config.searchMode !== 'semantic' && queryText.trim().length > 0;

    const [semanticOutcome, lexicalOutcome] = await Promise.allSettled([
      wantsSemantic && queryEmbedding ? db.searchVectors(queryEmbedding, userId, config) : Promise.resolve(null),
      wantsLexical ? db.searchText(queryText, userId, config) : Promise.resolve(null),
    ]);
    const semantic = this.settled('Semantic', semanticOutcome, errors);
    const lexical = this.settled('Lexical', lexicalOutcome, errors);

    let results: SearchResult[];
    if (semantic.length > 0 && lexical.length > 0) {
      results = fuseResults(semantic, lexical, config);
    } else {
      results = (semantic.length > 0 ? semantic : lexical).slice(0, config.topK);
    }

    return {
      results,
      ...(wantsSemantic ? { semanticCount: semantic.length } : {}),
      ...(wantsLexical ? { lexicalCount: lexical.length } : {}),
    };
  }

  /**
   * Rank the user's stored texts with the similarity finder. Results are
   * the stored items themselves; nothing is synthesised.
   */
  private async fallbackSearch(
    queryText: string,
    userId: string,
    config: VectorSearchConfig,
    errors: string[],
  ): Promise<SearchResult[]> {
    const source = this.fallbackSource;
    const finder = this.similarityFinder;
    if (!source || !finder || queryText.trim().length === 0) {
      return [];
    }

    try {
      const listed = await source.listVectors(userId, { limit: this.fallbackCandidateLimit });
      if (listed.isErr()) {
        errors.push(listed.error.message);
        this.logger.warn('Fallback could not list stored items', { error: listed.error.message });
        return [];
      }

      const candidates = listed.value.filter((item) => matchesFilter(item.metadata, config.filterMetadata));
      if (candidates.length === 0) {
        return [];
      }

      const matches = await finder(queryText, candidates.map((item) => item.text), config.topK);
      if (matches.isErr()) {
        errors.push(matches.error.message);
        this.logger.warn('Fallback similarity search failed', { error: matches.error.message });
        return [];
      }

      const results: SearchResult[] = [];
      for (const match of matches.value) {
        const item = candidates[match.index];
        if (item) {
          results.push({ ...item, score: match.score, semanticScore: match.score });
        }
      }
      return results;
    } catch (error) {
      errors.push(errorMessage(error));
      this.logger.warn('Fallback search failed', { error: errorMessage(error) });
      return [];
    }
  }

  private settled(
    label: string,
    outcome: PromiseSettledResult<Result<SearchResult[], StoreError> | null>,
    errors: string[],
  ): SearchResult[] {
    if (outcome.status === 'rejected') {
      errors.push(errorMessage(outcome.reason));
      this.logger.warn(`${label} search failed`, { error: errorMessage(outcome.reason) });
      return [];
    }
    if (outcome.value === null) {
      return [];
    }
    if (outcome.value.isErr()) {
      errors.push(outcome.value.error.message);
      this.logger.warn(`${label} search failed`, { error: outcome.value.error.message });
      return [];
    }
    return outcome.value.value;
  }
}
