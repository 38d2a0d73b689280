import type { ChunkMetadata, ContentType } from '../../types/chunk.js';
import { BaseChunker, type ChunkDraft } from '../base-chunker.js';
import { CodeChunker } from './code-chunker.js';
import { HierarchicalChunker } from './hierarchical-chunker.js';
import { JsonChunker } from './json-chunker.js';
import { MarkdownChunker } from './markdown-chunker.js';
import { RecursiveChunker } from './recursive-chunker.js';

const CONTENT_TYPES: readonly ContentType[] = ['code', 'markdown', 'structured', 'json', 'plain'];

/** Indicator substrings per content type; each one present scores a point. */
const INDICATORS: ReadonlyArray<[Exclude<ContentType, 'json' | 'plain'>, readonly string[]]> = [
  ['code', ['def ', 'function ', 'class ', 'import ', 'const ', 'var ', 'let ', 'return ', '=>', '};']],
  ['markdown', ['# ', '## ', '```', '**', '](', '- [', '![']],
  ['structured', ['\t', '|', '1. ', '2. ', '•', '◦']],
];

export function isContentType(value: unknown): value is ContentType {
  return typeof value === 'string' && CONTENT_TYPES.some((type) => type === value);
}

/** Highest indicator score wins; plain scores 1 and ties go to the earlier type. */
export function detectContentType(text: string): ContentType {
  let best: ContentType = 'plain';
  let bestScore = 1;
  for (const [type, indicators] of INDICATORS) {
    const score = indicators.filter((indicator) => text.includes(indicator)).length;
    if (score > bestScore) {
      best = type;
      bestScore = score;
    }
  }
  return best;
}

/** Picks a specialised chunker from the content type and tags every chunk with it. */
export class HybridChunker extends BaseChunker {
  readonly strategy = 'hybrid' as const;

  async split(text: string, metadata: ChunkMetadata): Promise<ChunkDraft[]> {
    const declared = metadata['content_type'];
    const contentType = isContentType(declared) ? declared : detectContentType(text);
    const delegate = this.delegateFor(contentType);

    const drafts = await delegate.split(text, metadata);
    return drafts.map((draft) => ({
      ...draft,
      metadata: { ...draft.metadata, content_type: contentType, delegated_strategy: delegate.strategy },
    }));
  }

  private delegateFor(contentType: ContentType): BaseChunker {
    switch (contentType) {
      case 'code':
        return new CodeChunker(this.config, this.context);
      case 'markdown':
        return new MarkdownChunker(this.config, this.context);
      case 'structured':
        return new HierarchicalChunker(this.config, this.context);
      case 'json':
        return new JsonChunker(this.config, this.context);
      case 'plain':
        return new RecursiveChunker(this.config, this.context);
    }
  }
}
