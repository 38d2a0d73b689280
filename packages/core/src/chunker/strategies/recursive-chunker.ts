import type { ChunkMetadata } from '../../types/chunk.js';
import { BaseChunker, spansToDrafts, type ChunkDraft } from '../base-chunker.js';
import { fixedSizeSpans, type Span } from '../text-spans.js';

export interface RecursiveSplitOptions {
  chunkSize: number;
  chunkOverlap: number;
  minChunkSize: number;
  separators: readonly string[];
  keepSeparator: boolean;
}

/** Pieces of `[start, end)` cut at every occurrence of `separator`. */
function splitOnSeparator(
  text: string,
  start: number,
  end: number,
  separator: string,
  keepSeparator: boolean,
): Span[] {
  const pieces: Span[] = [];
  let cursor = start;
  let index = text.indexOf(separator, cursor);

  while (index !== -1 && index + separator.length <= end) {
    const pieceEnd = keepSeparator ? index + separator.length : index;
    if (pieceEnd > cursor) {
      pieces.push({ start: cursor, end: pieceEnd });
    }
    cursor = index + separator.length;
    index = text.indexOf(separator, cursor);
  }

  if (cursor < end) {
    pieces.push({ start: cursor, end });
  }
  return pieces;
}

function splitRange(
  text: string,
  start: number,
  end: number,
  separators: readonly string[],
  options: RecursiveSplitOptions,
): Span[] {
  if (end - start <= options.chunkSize) {
    return [{ start, end }];
  }

  const region = text.slice(start, end);
  const separatorIndex = separators.findIndex((sep) => sep === '' || region.includes(sep));
  const separator = separators[separatorIndex];

  if (separator === undefined || separator === '') {
    const minBreak = Math.min(options.minChunkSize, Math.floor(options.chunkSize / 2));
    return fixedSizeSpans(text, start, end, options.chunkSize, options.chunkOverlap, minBreak);
  }

  const remaining = separators.slice(separatorIndex + 1);
  const spans: Span[] = [];
  let groupStart = -1;
  let groupEnd = -1;

  const flush = (): void => {
    if (groupStart !== -1) {
      spans.push({ start: groupStart, end: groupEnd });
      groupStart = -1;
    }
  };

  for (const piece of splitOnSeparator(text, start, end, separator, options.keepSeparator)) {
    const pieceLength = piece.end - piece.start;

    if (pieceLength > options.chunkSize) {
      flush();
      spans.push(...splitRange(text, piece.start, piece.end, remaining, options));
      continue;
    }

    if (groupStart !== -1 && piece.end - groupStart > options.chunkSize) {
      flush();
    }
    if (groupStart === -1) {
      groupStart = piece.start;
    }
    groupEnd = piece.end;
  }
  flush();

  return spans;
}

/** Merge a span shorter than `minChunkSize` into its successor while the result fits `chunkSize`. */
export function mergeSmallSpans(spans: readonly Span[], chunkSize: number, minChunkSize: number): Span[] {
  const merged: Span[] = [];
  for (const span of spans) {
    const last = merged[merged.length - 1];
    if (last && last.end - last.start < minChunkSize && span.end - last.start <= chunkSize && span.start >= last.start) {
      merged[merged.length - 1] = { start: last.start, end: Math.max(last.end, span.end) };
    } else {
      merged.push({ ...span });
    }
  }
  return merged;
}

/**
 * Split `[start, end)` by trying separators in priority order, recursing
 * into oversized pieces with the remaining separators and falling back to
 * fixed-size windows. Spans are offsets into `text`.
 */
export function recursiveSpans(
  text: string,
  start: number,
  end: number,
  options: RecursiveSplitOptions,
): Span[] {
  if (end <= start) {
    return [];
  }
  const spans = splitRange(text, start, end, options.separators, options);
  return mergeSmallSpans(spans, options.chunkSize, options.minChunkSize);
}

export class RecursiveChunker extends BaseChunker {
  readonly strategy = 'recursive' as const;

  async split(text: string, _metadata: ChunkMetadata): Promise<ChunkDraft[]> {
    return spansToDrafts(text, recursiveSpans(text, 0, text.length, this.config));
  }
}
