export { HybridSearchService } from './hybrid-search-service.js';
export type {
  FallbackSource,
  HybridSearchOptions,
  HybridSearchResponse,
  HybridSearchServiceOptions,
  HybridSearchServiceStats,
  SearchMethod,
  StoreChunksOptions,
  StoreChunksResult,
  StoreKnowledgeResponse,
  StoreMethod,
} from './hybrid-search-service.js';
