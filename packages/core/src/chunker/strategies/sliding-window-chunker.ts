import type { ChunkMetadata } from '../../types/chunk.js';
import { BaseChunker, type ChunkDraft } from '../base-chunker.js';
import type { Span } from '../text-spans.js';

function lastWhitespace(text: string, from: number, to: number): number {
  for (let i = to; i > from; i--) {
    if (/\s/.test(text.charAt(i))) return i;
  }
  return -1;
}

/**
 * Windows of `chunkSize` advancing by `chunkSize - chunkOverlap`, each
 * ending on whitespace when one falls in its second half. The final window
 * is anchored to the end of the text, so every character is covered and
 * the loop always terminates.
 */
export function slidingWindows(text: string, size: number, overlap: number): Span[] {
  const windows: Span[] = [];
  const step = Math.max(1, size - overlap);
  const length = text.length;
  let start = 0;

  for (;;) {
    const previous = windows[windows.length - 1];
    if (start + size >= length) {
      const anchored = previous ? Math.max(previous.start + 1, length - size) : 0;
      windows.push({ start: Math.min(anchored, start), end: length });
      break;
    }

    let end = start + size;
    const boundary = lastWhitespace(text, start + Math.floor(size / 2), end);
    if (boundary !== -1) {
      end = boundary;
    }
    windows.push({ start, end });
    start = Math.min(start + step, end);
  }

  return windows;
}

export class SlidingWindowChunker extends BaseChunker {
  readonly strategy = 'sliding_window' as const;

  async split(text: string, _metadata: ChunkMetadata): Promise<ChunkDraft[]> {
    const { chunkSize, chunkOverlap } = this.config;
    const overlapRatio = chunkOverlap / chunkSize;
    return slidingWindows(text, chunkSize, chunkOverlap).map((window, index) => ({
      text: text.slice(window.start, window.end),
      startChar: window.start,
      endChar: window.end,
      metadata: { window_position: index, overlap_ratio: overlapRatio },
    }));
  }
}
