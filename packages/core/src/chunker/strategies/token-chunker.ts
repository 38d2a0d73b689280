import type { ChunkMetadata } from '../../types/chunk.js';
import type { Tokenizer } from '../../types/provider.js';
import { BaseChunker, type ChunkDraft } from '../base-chunker.js';
import { fixedSizeSpans } from '../text-spans.js';
import { approximateTokens } from '../tokenizer.js';

const CHARS_PER_TOKEN = 4;

/**
 * Windows of `tokenLimit` tokens. Overlap is a quarter of `chunkOverlap`
 * in tokens. Without a tokenizer, windows of `tokenLimit * 4` characters
 * are used and tagged `tokenizer: 'approximate'`.
 */
export class TokenChunker extends BaseChunker {
  readonly strategy = 'token_based' as const;

  private get overlapTokens(): number {
    return Math.min(Math.floor(this.config.chunkOverlap / CHARS_PER_TOKEN), this.config.tokenLimit - 1);
  }

  async split(text: string, _metadata: ChunkMetadata): Promise<ChunkDraft[]> {
    const tokenizer = this.context.tokenizer;
    if (tokenizer) {
      return this.splitWithTokenizer(text, tokenizer);
    }

    this.logger.warn('No tokenizer available, approximating 4 characters per token; offsets are inexact');
    const size = this.config.tokenLimit * CHARS_PER_TOKEN;
    const overlap = Math.min(this.overlapTokens * CHARS_PER_TOKEN, size - 1);
    return fixedSizeSpans(text, 0, text.length, size, overlap).map((span) => {
      const chunkText = text.slice(span.start, span.end);
      return {
        text: chunkText,
        startChar: span.start,
        endChar: span.end,
        metadata: { token_count: approximateTokens(chunkText), tokenizer: 'approximate' },
      };
    });
  }

  private splitWithTokenizer(text: string, tokenizer: Tokenizer): ChunkDraft[] {
    const tokens = tokenizer.encode(text);
    const limit = this.config.tokenLimit;
    const step = Math.max(1, limit - this.overlapTokens);
    const drafts: ChunkDraft[] = [];

    // Character offset of token `cursor`, advanced incrementally.
    let cursor = 0;
    let cursorChar = 0;

    for (let start = 0; start < tokens.length; start += step) {
      if (start > cursor) {
        cursorChar += tokenizer.decode(tokens.slice(cursor, start)).length;
        cursor = start;
      }
      const window = tokens.slice(start, start + limit);
      const chunkText = tokenizer.decode(window);
      drafts.push({
        text: chunkText,
        startChar: Math.min(cursorChar, text.length),
        endChar: Math.min(cursorChar + chunkText.length, text.length),
        metadata: { token_count: window.length, tokenizer: tokenizer.name },
      });
      if (start + limit >= tokens.length) break;
    }

    return drafts;
  }
}
