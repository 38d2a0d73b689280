import type { Result } from 'neverthrow';

export class ChunkError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ChunkError';
  }
}

export class EmbedError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EmbedError';
  }
}

export class StoreError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'StoreError';
  }
}

export interface EmbeddingProvider {
  embed(texts: string[]): Promise<Result<number[][], EmbedError>>;
  /**
   * Embed with bounded concurrency. Items that cannot be embedded come back
   * as zero vectors instead of failing the whole batch.
   */
  embedBatch(texts: string[], maxConcurrent?: number): Promise<number[][]>;
  readonly dimensions: number;
}

export interface Tokenizer {
  readonly name: string;
  encode(text: string): number[];
  decode(tokens: number[]): string;
}

export interface SimilarityMatch {
  /** Index into the candidate list. */
  index: number;
  text: string;
  score: number;
}

export type SimilarityFinder = (
  queryText: string,
  candidates: string[],
  topK: number,
) => Promise<Result<SimilarityMatch[], EmbedError>>;
