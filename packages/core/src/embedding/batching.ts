import type { Result } from 'neverthrow';
import type { EmbedError } from '../types/provider.js';
import type { Logger } from '../utils/logger.js';
import { mapWithConcurrency } from '../utils/semaphore.js';

export const DEFAULT_EMBED_CONCURRENCY = 5;

export function splitIntoBatches<T>(items: readonly T[], batchSize: number): T[][] {
  const size = Math.max(1, Math.floor(batchSize));
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size));
  }
  return batches;
}

export interface BatchEmbedOptions {
  batchSize: number;
  maxConcurrent: number;
  dimensions: number;
  logger: Logger;
}

/**
 * Embed `texts` in batches with bounded concurrency. A batch that fails, or
 * returns the wrong number of vectors, yields zero vectors for its texts.
 */
export async function embedInBatches(
  texts: readonly string[],
  request: (batch: string[]) => Promise<Result<number[][], EmbedError>>,
  options: BatchEmbedOptions,
): Promise<number[][]> {
  const batches = splitIntoBatches(texts, options.batchSize);
  const embedded = await mapWithConcurrency(batches, options.maxConcurrent, async (batch, index) => {
    const result = await request(batch);
    if (result.isOk() && result.value.length === batch.length) {
      return result.value;
    }
    options.logger.warn('Embedding batch failed, using zero vectors', {
      batch: index,
      size: batch.length,
      error: result.isErr() ? result.error.message : `expected ${batch.length} vectors, got ${result.value.length}`,
    });
    return batch.map(() => new Array<number>(options.dimensions).fill(0));
  });
  return embedded.flat();
}
