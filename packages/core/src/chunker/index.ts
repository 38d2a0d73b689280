export { BaseChunker, finalizeChunks, generateChunkId, spansToDrafts } from './base-chunker.js';
export type { ChunkDraft, ChunkerContext } from './base-chunker.js';
export {
  ChunkConfigError,
  DEFAULT_CHUNK_CONFIG,
  DEFAULT_SEPARATORS,
  chunkConfigKey,
  createChunkConfig,
  deriveChunkConfig,
} from './chunk-config.js';
export { ChunkingService, contentTypeForExtension, isChunkingStrategy } from './chunking-service.js';
export type { ChunkBatchOptions, ChunkTextOptions, ChunkingServiceOptions } from './chunking-service.js';
export { approximateTokens, cl100kTokenizer, checkTokenizer } from './tokenizer.js';
export { splitParagraphs, splitSentences } from './text-spans.js';
export { CodeChunker, detectLanguage } from './strategies/code-chunker.js';
export { ConversationChunker, matchSpeaker } from './strategies/conversation-chunker.js';
export { FixedSizeChunker } from './strategies/fixed-size-chunker.js';
export { HierarchicalChunker } from './strategies/hierarchical-chunker.js';
export { HybridChunker, detectContentType } from './strategies/hybrid-chunker.js';
export { JsonChunker } from './strategies/json-chunker.js';
export { MarkdownChunker } from './strategies/markdown-chunker.js';
export { ParagraphChunker } from './strategies/paragraph-chunker.js';
export { RecursiveChunker } from './strategies/recursive-chunker.js';
export { SemanticChunker } from './strategies/semantic-chunker.js';
export { SentenceChunker } from './strategies/sentence-chunker.js';
export { SlidingWindowChunker } from './strategies/sliding-window-chunker.js';
export { TableChunker } from './strategies/table-chunker.js';
export { TokenChunker } from './strategies/token-chunker.js';
export { TopicChunker } from './strategies/topic-chunker.js';
