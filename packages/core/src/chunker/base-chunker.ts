import { createHash } from 'node:crypto';
import { ok, err, type Result } from 'neverthrow';
import type { Chunk, ChunkConfig, ChunkMetadata, ChunkingStrategy } from '../types/chunk.js';
import { ChunkError, type EmbeddingProvider, type Tokenizer } from '../types/provider.js';
import { errorMessage, silentLogger, type Logger } from '../utils/logger.js';

/**
 * Intermediate chunk produced by a strategy before positions, ids and
 * common metadata are assigned.
 */
export interface ChunkDraft {
  text: string;
  startChar: number;
  endChar: number;
  metadata?: ChunkMetadata;
  /** Index of the parent draft in the same list (hierarchical output). */
  parentIndex?: number;
}

/** Capabilities shared by all chunkers, checked once by the service. */
export interface ChunkerContext {
  logger: Logger;
  embeddingProvider: EmbeddingProvider | null;
  tokenizer: Tokenizer | null;
}

export const DEFAULT_CHUNKER_CONTEXT: ChunkerContext = {
  logger: silentLogger,
  embeddingProvider: null,
  tokenizer: null,
};

export function generateChunkId(position: number, text: string): string {
  const hash = createHash('sha256').update(text).digest('hex').slice(0, 8);
  return `chunk_${position}_${hash}`;
}

function stripDraft(source: string, draft: ChunkDraft): ChunkDraft {
  const leading = draft.text.length - draft.text.trimStart().length;
  const text = draft.text.trim();
  if (source.slice(draft.startChar, draft.endChar) !== draft.text) {
    return { ...draft, text };
  }
  return {
    ...draft,
    text,
    startChar: draft.startChar + leading,
    endChar: draft.startChar + leading + text.length,
  };
}

/**
 * Turn drafts into chunks: strip whitespace when configured, drop empty
 * drafts, number positions from 0 and wire parent/child ids.
 */
export function finalizeChunks(
  source: string,
  drafts: readonly ChunkDraft[],
  strategy: ChunkingStrategy,
  config: ChunkConfig,
  baseMetadata: ChunkMetadata,
): Chunk[] {
  const createdAt = new Date().toISOString();
  const chunks: Chunk[] = [];
  const chunkByDraft = new Map<number, Chunk>();

  drafts.forEach((original, draftIndex) => {
    const draft = config.stripWhitespace ? stripDraft(source, original) : original;
    if (draft.text.trim().length === 0) {
      return;
    }

    const position = chunks.length;
    const chunk: Chunk = {
      text: draft.text,
      metadata: {
        ...baseMetadata,
        ...draft.metadata,
        strategy,
        position,
        created_at: createdAt,
      },
      chunkId: generateChunkId(position, draft.text),
      childrenIds: [],
      position,
      startChar: Math.max(0, Math.min(draft.startChar, source.length)),
      endChar: Math.max(0, Math.min(draft.endChar, source.length)),
    };

    if (draft.parentIndex !== undefined) {
      const parent = chunkByDraft.get(draft.parentIndex);
      if (parent) {
        chunk.parentId = parent.chunkId;
        parent.childrenIds.push(chunk.chunkId);
      }
    }

    chunkByDraft.set(draftIndex, chunk);
    chunks.push(chunk);
  });

  return chunks;
}

/**
 * Common contract for every strategy: empty input gives no chunks, the
 * caller's metadata lands on every chunk, and `chunk()` never throws.
 */
export abstract class BaseChunker {
  abstract readonly strategy: ChunkingStrategy;

  constructor(
    readonly config: ChunkConfig,
    protected readonly context: ChunkerContext = DEFAULT_CHUNKER_CONTEXT,
  ) {}

  /** Raw algorithm. May throw; `chunk()` converts failures into a ChunkError. */
  abstract split(text: string, metadata: ChunkMetadata): Promise<ChunkDraft[]>;

  async chunk(text: string, metadata: ChunkMetadata = {}): Promise<Result<Chunk[], ChunkError>> {
    if (text.trim().length === 0) {
      return ok([]);
    }

    try {
      const drafts = await this.split(text, metadata);
      return ok(finalizeChunks(text, drafts, this.strategy, this.config, metadata));
    } catch (error) {
      return err(new ChunkError(`${this.strategy} chunking failed: ${errorMessage(error)}`));
    }
  }

  protected get logger(): Logger {
    return this.context.logger;
  }
}

/** Drafts for plain spans of the source. */
export function spansToDrafts(
  text: string,
  spans: ReadonlyArray<{ start: number; end: number }>,
  metadata?: ChunkMetadata,
): ChunkDraft[] {
  return spans.map((span) => ({
    text: text.slice(span.start, span.end),
    startChar: span.start,
    endChar: span.end,
    ...(metadata ? { metadata: { ...metadata } } : {}),
  }));
}
