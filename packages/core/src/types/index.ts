export { CHUNKING_STRATEGIES } from './chunk.js';
export type { Chunk, ChunkConfig, ChunkMetadata, ChunkingStrategy, ContentType } from './chunk.js';
export type {
  FusekitConfig,
  ChunkingSettings,
  SearchSettings,
  RerankerSettings,
  EmbeddingSettings,
  StorageSettings,
  QdrantStorageSettings,
  ChromaStorageSettings,
  ServiceSettings,
  LoggingSettings,
} from './config.js';
export type {
  EmbeddingProvider,
  Tokenizer,
  SimilarityFinder,
  SimilarityMatch,
} from './provider.js';
export { ChunkError, EmbedError, StoreError } from './provider.js';
export type {
  SearchResult,
  SearchMode,
  RankingMethod,
  VectorSearchConfig,
  ListOptions,
  VectorDBStats,
} from './search.js';
export {
  SEARCH_MODES,
  RANKING_METHODS,
  DEFAULT_SEARCH_CONFIG,
  createSearchConfig,
} from './search.js';
