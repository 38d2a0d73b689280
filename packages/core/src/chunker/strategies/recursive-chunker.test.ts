import { describe, it, expect } from 'vitest';
import { createChunkConfig } from '../chunk-config.js';
import { FixedSizeChunker } from './fixed-size-chunker.js';
import { mergeSmallSpans, RecursiveChunker } from './recursive-chunker.js';

describe('RecursiveChunker', () => {
  it('should split on paragraph separators first', async () => {
    const chunker = new RecursiveChunker(
      createChunkConfig({ chunkSize: 12, chunkOverlap: 0, minChunkSize: 1 })._unsafeUnwrap(),
    );

    const chunks = (await chunker.chunk('para one.\n\npara two.\n\npara three.'))._unsafeUnwrap();

    expect(chunks.map((chunk) => chunk.text)).toEqual(['para one.', 'para two.', 'para three.']);
    expect(chunks.map((chunk) => [chunk.startChar, chunk.endChar])).toEqual([
      [0, 9],
      [11, 20],
      [22, 33],
    ]);
  });

  it('should cover every non-whitespace character with offsets that match the text', async () => {
    const text = Array.from({ length: 120 }, (_, i) => `Word${i} ends here.${i % 7 === 0 ? '\n\n' : ' '}`).join('');
    const chunker = new RecursiveChunker(createChunkConfig({ chunkSize: 100, chunkOverlap: 10 })._unsafeUnwrap());

    const chunks = (await chunker.chunk(text))._unsafeUnwrap();

    for (const chunk of chunks) {
      expect(chunk.text).toBe(text.slice(chunk.startChar, chunk.endChar));
      expect(chunk.text.length).toBeLessThanOrEqual(100);
    }
    for (let i = 0; i < text.length; i++) {
      if (/\s/.test(text.charAt(i))) continue;
      expect(chunks.some((chunk) => chunk.startChar <= i && i < chunk.endChar)).toBe(true);
    }
    chunks.forEach((chunk, index) => {
      expect(chunk.position).toBe(index);
    });
  });
});

describe('mergeSmallSpans', () => {
  it('should merge a short span into its successor when the result fits', () => {
    expect(
      mergeSmallSpans(
        [
          { start: 0, end: 3 },
          { start: 3, end: 10 },
          { start: 10, end: 30 },
        ],
        20,
        5,
      ),
    ).toEqual([
      { start: 0, end: 10 },
      { start: 10, end: 30 },
    ]);
  });
});

describe('FixedSizeChunker', () => {
  it('should cut windows at word boundaries', async () => {
    const chunker = new FixedSizeChunker(
      createChunkConfig({ strategy: 'fixed_size', chunkSize: 6, chunkOverlap: 0, minChunkSize: 3 })._unsafeUnwrap(),
    );

    const chunks = (await chunker.chunk('aaaa bbbb cccc'))._unsafeUnwrap();

    expect(chunks.map((chunk) => chunk.text)).toEqual(['aaaa', 'bbbb', 'cccc']);
    expect(chunks.map((chunk) => chunk.startChar)).toEqual([0, 5, 10]);
    expect(chunks[2]!.metadata['strategy']).toBe('fixed_size');
  });
});
