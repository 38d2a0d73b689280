export const CHUNKING_STRATEGIES = [
  'fixed_size',
  'semantic',
  'recursive',
  'code_aware',
  'markdown_aware',
  'sentence_based',
  'token_based',
  'sliding_window',
  'hierarchical',
  'paragraph_based',
  'topic_based',
  'hybrid',
  'table_aware',
  'conversation_aware',
  'json_aware',
] as const;

export type ChunkingStrategy = (typeof CHUNKING_STRATEGIES)[number];

/**
 * Free-form chunk metadata. Every chunk carries `strategy`, `position` and
 * `created_at`; strategies add their own keys (`section_title`, `code_type`, ...).
 */
export type ChunkMetadata = Record<string, unknown>;

export interface Chunk {
  text: string;
  metadata: ChunkMetadata;
  /** `chunk_<position>_<sha256 prefix>`, stable for identical text and position. */
  chunkId: string;
  parentId?: string;
  childrenIds: string[];
  /** Zero-based, contiguous within one chunking run. */
  position: number;
  /** Offsets into the original input (approximate for token and JSON chunks). */
  startChar: number;
  endChar: number;
  embedding?: number[];
}

export interface ChunkConfig {
  readonly strategy: ChunkingStrategy;
  readonly chunkSize: number;
  readonly chunkOverlap: number;
  readonly minChunkSize: number;
  readonly maxChunkSize: number;
  readonly separators: readonly string[];
  readonly keepSeparator: boolean;
  readonly stripWhitespace: boolean;
  readonly similarityThreshold: number;
  readonly useEmbeddings: boolean;
  readonly tokenLimit: number;
  readonly hierarchyLevels: number;
  readonly preserveTables: boolean;
}

export type ContentType = 'code' | 'markdown' | 'structured' | 'json' | 'plain';
