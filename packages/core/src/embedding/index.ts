export { OllamaEmbeddingProvider } from './ollama-embedding-provider.js';
export type { OllamaEmbeddingConfig } from './ollama-embedding-provider.js';
export { OpenAICompatibleEmbeddingProvider } from './openai-compatible-embedding-provider.js';
export type { OpenAICompatibleEmbeddingConfig } from './openai-compatible-embedding-provider.js';
export { DEFAULT_EMBED_CONCURRENCY, embedInBatches, splitIntoBatches } from './batching.js';
export type { BatchEmbedOptions } from './batching.js';
export { createEmbeddingSimilarityFinder } from './similarity-finder.js';
