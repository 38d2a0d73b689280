import type { ChunkMetadata } from '../../types/chunk.js';
import { BaseChunker, spansToDrafts, type ChunkDraft } from '../base-chunker.js';
import { fixedSizeSpans } from '../text-spans.js';

/** Character windows of `chunkSize`, broken at the last space where possible. */
export class FixedSizeChunker extends BaseChunker {
  readonly strategy = 'fixed_size' as const;

  async split(text: string, _metadata: ChunkMetadata): Promise<ChunkDraft[]> {
    const { chunkSize, chunkOverlap, minChunkSize } = this.config;
    const minBreak = Math.min(minChunkSize, Math.floor(chunkSize / 2));
    return spansToDrafts(text, fixedSizeSpans(text, 0, text.length, chunkSize, chunkOverlap, minBreak));
  }
}
