import type { ChunkMetadata } from '../../types/chunk.js';
import { cosineSimilarity } from '../../utils/similarity.js';
import { BaseChunker, type ChunkDraft } from '../base-chunker.js';
import { splitSentences, type TextSpan } from '../text-spans.js';
import { groupSentences, sentenceGroupToDraft } from './sentence-chunker.js';

function addInto(sum: number[], vector: readonly number[]): void {
  for (let i = 0; i < sum.length; i++) {
    sum[i] = (sum[i] ?? 0) + (vector[i] ?? 0);
  }
}

/**
 * Sentence chunking that keeps adding sentences while they stay similar
 * to the running mean embedding of the current chunk. Without an
 * embedding provider, or when embedding fails, it degrades to plain
 * sentence grouping.
 */
export class SemanticChunker extends BaseChunker {
  readonly strategy = 'semantic' as const;

  async split(text: string, _metadata: ChunkMetadata): Promise<ChunkDraft[]> {
    const sentences = splitSentences(text);
    const provider = this.context.embeddingProvider;

    if (!this.config.useEmbeddings || !provider || sentences.length < 2) {
      return this.sentenceDrafts(sentences);
    }

    const embedded = await provider.embed(sentences.map((sentence) => sentence.text));
    if (embedded.isErr()) {
      this.logger.warn('Sentence embedding failed, using sentence chunks', { error: embedded.error.message });
      return this.sentenceDrafts(sentences);
    }
    if (embedded.value.length !== sentences.length) {
      this.logger.warn('Embedding count mismatch, using sentence chunks', {
        expected: sentences.length,
        received: embedded.value.length,
      });
      return this.sentenceDrafts(sentences);
    }

    return this.groupBySimilarity(sentences, embedded.value);
  }

  private groupBySimilarity(sentences: readonly TextSpan[], embeddings: readonly number[][]): ChunkDraft[] {
    const drafts: ChunkDraft[] = [];
    let group: TextSpan[] = [];
    let groupSize = 0;
    let sum: number[] = [];
    let similarities: number[] = [];

    const flush = (): void => {
      if (group.length === 0) return;
      const avgSimilarity =
        similarities.length > 0 ? similarities.reduce((a, b) => a + b, 0) / similarities.length : 1;
      drafts.push(sentenceGroupToDraft(group, { avg_similarity: avgSimilarity }));
    };

    sentences.forEach((sentence, i) => {
      const embedding = embeddings[i] ?? [];
      const cost = sentence.text.length + 1;

      if (group.length > 0) {
        const mean = sum.map((value) => value / group.length);
        const similarity = cosineSimilarity(mean, embedding);
        if (similarity >= this.config.similarityThreshold && groupSize + cost < this.config.chunkSize) {
          group.push(sentence);
          groupSize += cost;
          addInto(sum, embedding);
          similarities.push(similarity);
          return;
        }
        flush();
      }

      group = [sentence];
      groupSize = cost;
      sum = [...embedding];
      similarities = [];
    });
    flush();

    return drafts;
  }

  private sentenceDrafts(sentences: readonly TextSpan[]): ChunkDraft[] {
    return groupSentences(sentences, this.config.chunkSize, this.config.chunkOverlap).map((group) =>
      sentenceGroupToDraft(group),
    );
  }
}
