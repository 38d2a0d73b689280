export { DEFAULT_MMR_CONFIG, MMRReranker } from './mmr-reranker.js';
export type { DiversityFunction, MMRRerankerConfig } from './mmr-reranker.js';
