export {
  BaseVectorDB,
  DEFAULT_LIST_LIMIT,
  matchesFilter,
  normalizeListOptions,
  stripEmbedding,
  type VectorDBOptions,
} from './base-vector-db.js';
export {
  RRF_K,
  embeddingSimilarity,
  fuseResults,
  mmrFusion,
  mmrSelect,
  reciprocalRankFusion,
  weightedFusion,
  type MmrFusionOptions,
  type MmrOptions,
  type MmrSelection,
  type WeightedFusionOptions,
} from './fusion.js';
export { InMemoryVectorDB } from './in-memory-vector-db.js';
export { QdrantVectorDB, toPointId, type QdrantVectorDBOptions } from './qdrant-vector-db.js';
export { ChromaVectorDB, toChromaId, toChromaMetadata, type ChromaVectorDBOptions } from './chroma-vector-db.js';
export { queryTerms, termOverlapScore } from './term-overlap.js';
