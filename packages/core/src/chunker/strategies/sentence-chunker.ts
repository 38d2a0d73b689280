import type { ChunkMetadata } from '../../types/chunk.js';
import { BaseChunker, type ChunkDraft } from '../base-chunker.js';
import { splitSentences, type TextSpan } from '../text-spans.js';

/** Footprint of a sentence inside a group: its text plus one joining space. */
function sentenceCost(sentence: TextSpan): number {
  return sentence.text.length + 1;
}

/**
 * Group consecutive sentences while the group stays strictly below
 * `chunkSize`. A sentence that does not fit alone still forms its own
 * group. After each flush, trailing sentences totalling at most
 * `chunkOverlap` characters open the next group.
 */
export function groupSentences(
  sentences: readonly TextSpan[],
  chunkSize: number,
  chunkOverlap: number,
): TextSpan[][] {
  const groups: TextSpan[][] = [];
  let current: TextSpan[] = [];
  let currentSize = 0;

  for (const sentence of sentences) {
    const cost = sentenceCost(sentence);

    if (current.length > 0 && currentSize + cost >= chunkSize) {
      groups.push(current);

      const overlap: TextSpan[] = [];
      let overlapSize = 0;
      for (let i = current.length - 1; i > 0; i--) {
        const candidate = current[i];
        if (!candidate || overlapSize + sentenceCost(candidate) > chunkOverlap) break;
        overlap.unshift(candidate);
        overlapSize += sentenceCost(candidate);
      }

      if (overlapSize + cost >= chunkSize) {
        current = [];
        currentSize = 0;
      } else {
        current = overlap;
        currentSize = overlapSize;
      }
    }

    current.push(sentence);
    currentSize += cost;
  }

  if (current.length > 0) {
    groups.push(current);
  }

  return groups;
}

export function sentenceGroupToDraft(group: readonly TextSpan[], metadata?: ChunkMetadata): ChunkDraft {
  const first = group[0];
  const last = group[group.length - 1];
  return {
    text: group.map((sentence) => sentence.text).join(' '),
    startChar: first?.start ?? 0,
    endChar: last?.end ?? 0,
    metadata: { sentence_count: group.length, ...metadata },
  };
}

/** Sentence-boundary chunking with sentence-level overlap. */
export class SentenceChunker extends BaseChunker {
  readonly strategy = 'sentence_based' as const;

  async split(text: string, _metadata: ChunkMetadata): Promise<ChunkDraft[]> {
    const sentences = splitSentences(text);
    return groupSentences(sentences, this.config.chunkSize, this.config.chunkOverlap).map((group) =>
      sentenceGroupToDraft(group),
    );
  }
}
