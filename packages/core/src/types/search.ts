export type SearchMode = 'semantic' | 'lexical' | 'hybrid';

export type RankingMethod = 'rrf' | 'weighted' | 'mmr';

export const SEARCH_MODES: readonly SearchMode[] = ['semantic', 'lexical', 'hybrid'];
export const RANKING_METHODS: readonly RankingMethod[] = ['rrf', 'weighted', 'mmr'];

export interface SearchResult {
  id: string;
  text: string;
  /** Final ranking score. Only comparable within one ranking method. */
  score: number;
  semanticScore?: number;
  lexicalScore?: number;
  metadata?: Record<string, unknown>;
  /** Only present when explicitly requested. */
  embedding?: number[];
}

export interface VectorSearchConfig {
  topK: number;
  searchMode: SearchMode;
  rankingMethod: RankingMethod;
  semanticWeight: number;
  lexicalWeight: number;
  mmrLambda: number;
  includeEmbeddings: boolean;
  /** Exact-match constraints on stored metadata keys. */
  filterMetadata?: Record<string, unknown>;
}

export const DEFAULT_SEARCH_CONFIG: Readonly<VectorSearchConfig> = {
  topK: 5,
  searchMode: 'semantic',
  rankingMethod: 'rrf',
  semanticWeight: 0.7,
  lexicalWeight: 0.3,
  mmrLambda: 0.5,
  includeEmbeddings: false,
};

export function createSearchConfig(
  overrides: Partial<VectorSearchConfig> = {},
): VectorSearchConfig {
  const config = { ...DEFAULT_SEARCH_CONFIG, ...overrides };
  return {
    ...config,
    topK: Math.max(1, Math.floor(config.topK)),
    mmrLambda: Math.min(1, Math.max(0, config.mmrLambda)),
  };
}

export interface ListOptions {
  limit?: number;
  offset?: number;
}

export interface VectorDBStats {
  backend: string;
  dimensions: number;
  totalVectors: number;
  /** Count for the requesting user, when one was given. */
  userVectors?: number;
  collection?: string;
}
