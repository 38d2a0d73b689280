import { readFile, stat } from 'node:fs/promises';
import { extname } from 'node:path';
import { ok, err, type Result } from 'neverthrow';
import {
  CHUNKING_STRATEGIES,
  type Chunk,
  type ChunkConfig,
  type ChunkMetadata,
  type ChunkingStrategy,
  type ContentType,
} from '../types/chunk.js';
import { ChunkError, type EmbeddingProvider, type Tokenizer } from '../types/provider.js';
import { createLogger, errorMessage, type Logger } from '../utils/logger.js';
import { mapWithConcurrency } from '../utils/semaphore.js';
import type { BaseChunker, ChunkerContext } from './base-chunker.js';
import { chunkConfigKey, createChunkConfig, DEFAULT_CHUNK_CONFIG } from './chunk-config.js';
import { CodeChunker } from './strategies/code-chunker.js';
import { ConversationChunker } from './strategies/conversation-chunker.js';
import { FixedSizeChunker } from './strategies/fixed-size-chunker.js';
import { HierarchicalChunker } from './strategies/hierarchical-chunker.js';
import { HybridChunker } from './strategies/hybrid-chunker.js';
import { JsonChunker } from './strategies/json-chunker.js';
import { MarkdownChunker } from './strategies/markdown-chunker.js';
import { ParagraphChunker } from './strategies/paragraph-chunker.js';
import { RecursiveChunker } from './strategies/recursive-chunker.js';
import { SemanticChunker } from './strategies/semantic-chunker.js';
import { SentenceChunker } from './strategies/sentence-chunker.js';
import { SlidingWindowChunker } from './strategies/sliding-window-chunker.js';
import { TableChunker } from './strategies/table-chunker.js';
import { TokenChunker } from './strategies/token-chunker.js';
import { TopicChunker } from './strategies/topic-chunker.js';
import { checkTokenizer } from './tokenizer.js';

type ChunkerFactory = (config: ChunkConfig, context: ChunkerContext) => BaseChunker;

const CHUNKER_FACTORIES: Record<ChunkingStrategy, ChunkerFactory> = {
  fixed_size: (config, context) => new FixedSizeChunker(config, context),
  semantic: (config, context) => new SemanticChunker(config, context),
  recursive: (config, context) => new RecursiveChunker(config, context),
  code_aware: (config, context) => new CodeChunker(config, context),
  markdown_aware: (config, context) => new MarkdownChunker(config, context),
  sentence_based: (config, context) => new SentenceChunker(config, context),
  token_based: (config, context) => new TokenChunker(config, context),
  sliding_window: (config, context) => new SlidingWindowChunker(config, context),
  hierarchical: (config, context) => new HierarchicalChunker(config, context),
  paragraph_based: (config, context) => new ParagraphChunker(config, context),
  topic_based: (config, context) => new TopicChunker(config, context),
  hybrid: (config, context) => new HybridChunker(config, context),
  table_aware: (config, context) => new TableChunker(config, context),
  conversation_aware: (config, context) => new ConversationChunker(config, context),
  json_aware: (config, context) => new JsonChunker(config, context),
};

const CODE_EXTENSIONS: Record<string, string> = {
  '.py': 'python',
  '.js': 'javascript',
  '.mjs': 'javascript',
  '.cjs': 'javascript',
  '.jsx': 'javascript',
  '.ts': 'typescript',
  '.tsx': 'typescript',
  '.java': 'java',
  '.go': 'go',
  '.rs': 'rust',
  '.cpp': 'cpp',
  '.c': 'c',
  '.h': 'c',
  '.cs': 'csharp',
  '.rb': 'ruby',
  '.php': 'php',
};

const MARKDOWN_EXTENSIONS = new Set(['.md', '.markdown']);

const CODE_KEYWORDS = ['def ', 'function ', 'class ', 'import '];
const MARKDOWN_MARKERS = ['# ', '```', '**'];

export interface ChunkingServiceOptions {
  logger?: Logger;
  /** Used by the semantic and topic strategies when `useEmbeddings` is set. */
  embeddingProvider?: EmbeddingProvider | null;
  /** `null` disables token counting; omitted means check the bundled cl100k tokenizer. */
  tokenizer?: Tokenizer | null;
  /** Base settings merged under every call's options. */
  defaults?: Partial<Omit<ChunkConfig, 'strategy'>>;
  maxConcurrent?: number;
}

export type ChunkTextOptions = Partial<Omit<ChunkConfig, 'strategy'>> & {
  /** Strategy name; unknown names fall back to `recursive`. */
  strategy?: string;
  metadata?: ChunkMetadata;
};

export type ChunkBatchOptions = ChunkTextOptions & {
  maxConcurrent?: number;
};

export function isChunkingStrategy(value: unknown): value is ChunkingStrategy {
  return typeof value === 'string' && CHUNKING_STRATEGIES.some((strategy) => strategy === value);
}

export function contentTypeForExtension(extension: string): ContentType {
  const ext = extension.toLowerCase();
  if (ext in CODE_EXTENSIONS) return 'code';
  if (MARKDOWN_EXTENSIONS.has(ext)) return 'markdown';
  if (ext === '.json') return 'json';
  return 'plain';
}

/**
 * Strategy registry and dispatcher. Chunking is best-effort: unknown
 * strategies and invalid configs fall back to recursive chunking with a
 * warning, and a failing strategy is retried recursively before giving up
 * with an empty list.
 */
export class ChunkingService {
  private readonly logger: Logger;
  private readonly context: ChunkerContext;
  private readonly defaults: Partial<Omit<ChunkConfig, 'strategy'>>;
  private readonly maxConcurrent: number;
  private readonly chunkers = new Map<string, BaseChunker>();

  constructor(options: ChunkingServiceOptions = {}) {
    this.logger = options.logger ?? createLogger('fusekit:chunking');
    this.defaults = options.defaults ?? {};
    this.maxConcurrent = options.maxConcurrent ?? 5;
    const tokenizer = options.tokenizer === undefined ? checkTokenizer() : options.tokenizer;
    if (!tokenizer) {
      this.logger.info('No tokenizer available; token_based chunking will approximate 4 characters per token');
    }
    this.context = {
      logger: this.logger,
      embeddingProvider: options.embeddingProvider ?? null,
      tokenizer,
    };
  }

  get tokenizerAvailable(): boolean {
    return this.context.tokenizer !== null;
  }

  listStrategies(): readonly ChunkingStrategy[] {
    return CHUNKING_STRATEGIES;
  }

  resolveStrategy(name: string | undefined): ChunkingStrategy {
    if (name === undefined) {
      return 'recursive';
    }
    const normalized = name.trim().toLowerCase();
    if (isChunkingStrategy(normalized)) {
      return normalized;
    }
    this.logger.warn(`Unknown chunking strategy "${name}", using recursive`);
    return 'recursive';
  }

  /** Validated config for a call; invalid settings give the default recursive config. */
  resolveConfig(options: ChunkTextOptions = {}): ChunkConfig {
    const { strategy, metadata: _metadata, ...overrides } = options;
    const result = createChunkConfig({
      ...this.defaults,
      ...overrides,
      strategy: this.resolveStrategy(strategy),
    });
    if (result.isErr()) {
      this.logger.warn(`${result.error.message}; using default recursive config`);
      return DEFAULT_CHUNK_CONFIG;
    }
    return result.value;
  }

  getChunker(config: ChunkConfig): BaseChunker {
    const key = chunkConfigKey(config);
    const cached = this.chunkers.get(key);
    if (cached) {
      return cached;
    }
    const chunker = CHUNKER_FACTORIES[config.strategy](config, this.context);
    this.chunkers.set(key, chunker);
    return chunker;
  }

  clearCache(): void {
    this.chunkers.clear();
  }

  async chunkText(text: string, options: ChunkTextOptions = {}): Promise<Chunk[]> {
    if (text.trim().length === 0) {
      return [];
    }

    const metadata = { ...options.metadata };
    const config = this.resolveConfig(options);
    const result = await this.getChunker(config).chunk(text, metadata);

    if (result.isOk() && result.value.length > 0) {
      return result.value;
    }
    if (config.strategy === 'recursive') {
      if (result.isErr()) {
        this.logger.error('Recursive chunking failed', { error: result.error.message });
      }
      return [];
    }

    if (result.isErr()) {
      this.logger.warn(`${result.error.message}; retrying with recursive`);
    } else {
      this.logger.warn(`${config.strategy} produced no chunks; retrying with recursive`);
    }

    const fallback = await this.getChunker({ ...config, strategy: 'recursive' }).chunk(text, metadata);
    if (fallback.isErr()) {
      this.logger.error('Recursive fallback failed', { error: fallback.error.message });
      return [];
    }
    return fallback.value;
  }

  /** `chunkText` with the strategy picked by `getOptimalStrategy`. */
  async smartChunk(text: string, options: Omit<ChunkTextOptions, 'strategy'> = {}): Promise<Chunk[]> {
    return this.chunkText(text, { ...options, strategy: this.getOptimalStrategy(text) });
  }

  async chunkDocument(filePath: string, options: ChunkTextOptions = {}): Promise<Result<Chunk[], ChunkError>> {
    let content: string;
    let fileSize: number;
    try {
      const info = await stat(filePath);
      if (!info.isFile()) {
        return err(new ChunkError(`Not a file: ${filePath}`));
      }
      fileSize = info.size;
      content = await readFile(filePath, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return err(new ChunkError(`File not found: ${filePath}`));
      }
      return err(new ChunkError(`Failed to read ${filePath}: ${errorMessage(error)}`));
    }

    const extension = extname(filePath).toLowerCase();
    const contentType = contentTypeForExtension(extension);
    const language = CODE_EXTENSIONS[extension];
    const metadata: ChunkMetadata = {
      ...options.metadata,
      source: filePath,
      file_extension: extension,
      content_type: contentType,
      file_size: fileSize,
      ...(language ? { language } : {}),
    };

    const chunks = await this.chunkText(content, {
      ...options,
      strategy: options.strategy ?? 'hybrid',
      metadata,
    });
    return ok(chunks);
  }

  /**
   * Chunk many texts with at most `maxConcurrent` in flight. A text that
   * fails yields an empty list; the others are unaffected.
   */
  async chunkBatch(texts: readonly string[], options: ChunkBatchOptions = {}): Promise<Chunk[][]> {
    const { maxConcurrent = this.maxConcurrent, ...chunkOptions } = options;
    return mapWithConcurrency(texts, maxConcurrent, async (text, index) => {
      try {
        return await this.chunkText(text, {
          ...chunkOptions,
          metadata: { ...chunkOptions.metadata, batch_index: index },
        });
      } catch (error) {
        this.logger.error(`Batch item ${index} failed`, { error: errorMessage(error) });
        return [];
      }
    });
  }

  getOptimalStrategy(text: string): ChunkingStrategy {
    if (CODE_KEYWORDS.some((keyword) => text.includes(keyword))) {
      return 'code_aware';
    }
    if (MARKDOWN_MARKERS.some((marker) => text.includes(marker))) {
      return 'markdown_aware';
    }
    const lines = text.split('\n');
    const averageLineLength = lines.reduce((total, line) => total + line.length, 0) / lines.length;
    if (lines.length > 10 && averageLineLength < 80) {
      return 'hierarchical';
    }
    if (text.length > 5000) {
      return 'semantic';
    }
    return 'recursive';
  }
}
