import type { ChunkMetadata } from '../../types/chunk.js';
import { BaseChunker, spansToDrafts, type ChunkDraft } from '../base-chunker.js';
import { splitParagraphs, type Span, type TextSpan } from '../text-spans.js';
import { recursiveSpans } from './recursive-chunker.js';

const TOPIC_BOUNDARIES: readonly RegExp[] = [
  /^#{1,6}\s/,
  /^[A-Z][^.!?\n]*:$/,
  /^\d+\.\s/,
  /^Chapter\s+\d+/i,
  /^Section\s+\d+/i,
];

export function startsNewTopic(paragraph: string): boolean {
  const firstLine = paragraph.split('\n', 1)[0]?.trim() ?? '';
  return TOPIC_BOUNDARIES.some((pattern) => pattern.test(firstLine));
}

/**
 * Merges paragraphs up to `chunkSize`. A paragraph that opens a new topic
 * (heading, `Title:` line, numbered item, chapter or section marker)
 * starts a new chunk once the current one has reached `minChunkSize`.
 */
export class ParagraphChunker extends BaseChunker {
  readonly strategy = 'paragraph_based' as const;

  async split(text: string, _metadata: ChunkMetadata): Promise<ChunkDraft[]> {
    return spansToDrafts(text, this.paragraphSpans(text, splitParagraphs(text)));
  }

  paragraphSpans(text: string, paragraphs: readonly TextSpan[]): Span[] {
    const { chunkSize, minChunkSize } = this.config;
    const spans: Span[] = [];
    let group: Span | null = null;

    for (const paragraph of paragraphs) {
      if (paragraph.end - paragraph.start > chunkSize) {
        if (group) spans.push(group);
        group = null;
        spans.push(...recursiveSpans(text, paragraph.start, paragraph.end, this.config));
        continue;
      }

      if (group) {
        const tooLarge = paragraph.end - group.start > chunkSize;
        const topicBreak = startsNewTopic(paragraph.text) && group.end - group.start >= minChunkSize;
        if (tooLarge || topicBreak) {
          spans.push(group);
          group = null;
        }
      }

      group = group ? { start: group.start, end: paragraph.end } : { start: paragraph.start, end: paragraph.end };
    }

    if (group) spans.push(group);
    return spans;
  }
}
