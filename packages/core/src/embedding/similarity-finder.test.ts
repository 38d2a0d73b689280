import { describe, it, expect } from 'vitest';
import { ok, err, type Result } from 'neverthrow';
import { EmbedError, type EmbeddingProvider } from '../types/provider.js';
import { createEmbeddingSimilarityFinder } from './similarity-finder.js';

const VECTORS: Record<string, number[]> = {
  query: [1, 0],
  near: [0.9, 0.1],
  far: [0, 1],
  opposite: [-1, 0],
};

class FakeProvider implements EmbeddingProvider {
  readonly dimensions = 2;
  calls: string[][] = [];

  constructor(private readonly fail = false) {}

  async embed(texts: string[]): Promise<Result<number[][], EmbedError>> {
    this.calls.push(texts);
    if (this.fail) return err(new EmbedError('offline'));
    return ok(texts.map((text) => VECTORS[text] ?? [0, 0]));
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    return texts.map((text) => VECTORS[text] ?? [0, 0]);
  }
}

describe('createEmbeddingSimilarityFinder', () => {
  it('should rank candidates by cosine and keep their indexes', async () => {
    const provider = new FakeProvider();
    const find = createEmbeddingSimilarityFinder(provider);

    const matches = (await find('query', ['far', 'opposite', 'near'], 2))._unsafeUnwrap();

    expect(matches.map((m) => [m.index, m.text])).toEqual([
      [2, 'near'],
      [0, 'far'],
    ]);
    expect(matches[1]!.score).toBe(0);
    expect(provider.calls).toEqual([['query', 'far', 'opposite', 'near']]);
  });

  it('should skip embedding when there is nothing to rank', async () => {
    const provider = new FakeProvider();

    const matches = (await createEmbeddingSimilarityFinder(provider)('query', [], 3))._unsafeUnwrap();

    expect(matches).toEqual([]);
    expect(provider.calls).toEqual([]);
  });

  it('should pass provider errors through', async () => {
    const result = await createEmbeddingSimilarityFinder(new FakeProvider(true))('query', ['near'], 1);

    expect(result._unsafeUnwrapErr().message).toBe('offline');
  });
});
