import type { ChunkingStrategy } from './chunk.js';
import type { RankingMethod, SearchMode } from './search.js';
import type { LogLevel } from '../utils/logger.js';

export interface ChunkingSettings {
  strategy: ChunkingStrategy;
  chunkSize: number;
  chunkOverlap: number;
  minChunkSize?: number;
  maxChunkSize?: number;
  similarityThreshold: number;
  useEmbeddings: boolean;
  tokenLimit: number;
  hierarchyLevels: number;
  maxConcurrent: number;
}

export interface SearchSettings {
  topK: number;
  searchMode: SearchMode;
  rankingMethod: RankingMethod;
  semanticWeight: number;
  lexicalWeight: number;
  mmrLambda: number;
  includeEmbeddings: boolean;
}

export interface RerankerSettings {
  enabled: boolean;
  lambdaParam: number;
  useSemanticDiversity: boolean;
  useLexicalDiversity: boolean;
  useMetadataDiversity: boolean;
  maxIterations: number;
}

export interface EmbeddingSettings {
  provider: 'ollama' | 'openai-compatible';
  model: string;
  dimensions: number;
  baseUrl?: string;
  apiKey?: string;
  maxBatchSize?: number;
  timeout?: number;
}

export interface QdrantStorageSettings {
  url?: string;
  collectionName?: string;
  apiKey?: string;
}

export interface ChromaStorageSettings {
  url?: string;
  collectionName?: string;
}

export interface StorageSettings {
  provider: 'memory' | 'qdrant' | 'chroma';
  path: string;
  qdrant?: QdrantStorageSettings;
  chroma?: ChromaStorageSettings;
}

export interface ServiceSettings {
  useFallback: boolean;
  fallbackCandidateLimit: number;
  maxConcurrent: number;
}

export interface LoggingSettings {
  level: LogLevel;
}

export interface FusekitConfig {
  version: string;
  chunking: ChunkingSettings;
  search: SearchSettings;
  reranker: RerankerSettings;
  embedding: EmbeddingSettings;
  storage: StorageSettings;
  service: ServiceSettings;
  logging: LoggingSettings;
}
