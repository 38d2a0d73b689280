import type { ChunkMetadata } from '../../types/chunk.js';
import { cosineSimilarity } from '../../utils/similarity.js';
import { BaseChunker, type ChunkDraft } from '../base-chunker.js';
import { splitParagraphs, splitSentences, type Span, type TextSpan } from '../text-spans.js';
import { groupSentences, sentenceGroupToDraft } from './sentence-chunker.js';

const HEADER_LIKE: readonly RegExp[] = [
  /^#{1,6}\s/,
  /^\d+(\.\d+)*\.?\s+\S/,
  /^[A-Z][^.!?\n]{0,60}:$/,
];

function isAllCapsTitle(line: string): boolean {
  return line.length > 2 && line.length < 50 && /[A-Z]/.test(line) && line === line.toUpperCase() && !/[.!?]$/.test(line);
}

export function looksLikeTopicHeader(paragraph: string): boolean {
  const firstLine = paragraph.split('\n', 1)[0]?.trim() ?? '';
  return HEADER_LIKE.some((pattern) => pattern.test(firstLine)) || isAllCapsTitle(firstLine);
}

/**
 * Splits text into topics, using drops in sentence-to-sentence embedding
 * similarity when embeddings are enabled and header heuristics otherwise.
 * Topics larger than `chunkSize` are split by sentences.
 */
export class TopicChunker extends BaseChunker {
  readonly strategy = 'topic_based' as const;

  async split(text: string, _metadata: ChunkMetadata): Promise<ChunkDraft[]> {
    const byEmbedding = await this.embeddingTopics(text);
    const topics = byEmbedding ?? this.heuristicTopics(text);
    const method = byEmbedding ? 'embedding' : 'heuristic';

    const drafts: ChunkDraft[] = [];
    topics.forEach((topic, topicIndex) => {
      const meta: ChunkMetadata = { topic_index: topicIndex, boundary_method: method };
      if (topic.end - topic.start <= this.config.chunkSize) {
        drafts.push({ text: text.slice(topic.start, topic.end), startChar: topic.start, endChar: topic.end, metadata: meta });
        return;
      }
      const sentences = splitSentences(text, topic.start, topic.end);
      for (const group of groupSentences(sentences, this.config.chunkSize, this.config.chunkOverlap)) {
        drafts.push(sentenceGroupToDraft(group, meta));
      }
    });
    return drafts;
  }

  private heuristicTopics(text: string): Span[] {
    const topics: Span[] = [];
    let current: Span | null = null;

    for (const paragraph of splitParagraphs(text)) {
      if (current && looksLikeTopicHeader(paragraph.text)) {
        topics.push(current);
        current = null;
      }
      current = current ? { start: current.start, end: paragraph.end } : { start: paragraph.start, end: paragraph.end };
    }
    if (current) topics.push(current);
    return topics;
  }

  /** Null when embeddings are disabled, unavailable or fail. */
  private async embeddingTopics(text: string): Promise<Span[] | null> {
    const provider = this.context.embeddingProvider;
    if (!this.config.useEmbeddings || !provider) {
      return null;
    }

    const sentences: TextSpan[] = splitSentences(text);
    if (sentences.length < 2) {
      return null;
    }

    const embedded = await provider.embed(sentences.map((sentence) => sentence.text));
    if (embedded.isErr() || embedded.value.length !== sentences.length) {
      this.logger.warn('Topic embedding unavailable, using header heuristics', {
        error: embedded.isErr() ? embedded.error.message : 'embedding count mismatch',
      });
      return null;
    }

    const vectors = embedded.value;
    const topics: Span[] = [];
    let topicStart = sentences[0]?.start ?? 0;
    let topicEnd = sentences[0]?.end ?? 0;

    for (let i = 1; i < sentences.length; i++) {
      const sentence = sentences[i];
      if (!sentence) continue;
      const similarity = cosineSimilarity(vectors[i - 1] ?? [], vectors[i] ?? []);
      if (similarity < this.config.similarityThreshold) {
        topics.push({ start: topicStart, end: topicEnd });
        topicStart = sentence.start;
      }
      topicEnd = sentence.end;
    }
    topics.push({ start: topicStart, end: topicEnd });
    return topics;
  }
}
