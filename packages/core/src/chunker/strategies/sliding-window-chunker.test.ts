import { describe, it, expect } from 'vitest';
import { createChunkConfig } from '../chunk-config.js';
import { SlidingWindowChunker, slidingWindows } from './sliding-window-chunker.js';

describe('slidingWindows', () => {
  it('should anchor the last window to the end of the text', () => {
    expect(slidingWindows('abcdefghij', 4, 1)).toEqual([
      { start: 0, end: 4 },
      { start: 3, end: 7 },
      { start: 6, end: 10 },
    ]);
  });

  it('should return one window for short text', () => {
    expect(slidingWindows('abc', 10, 2)).toEqual([{ start: 0, end: 3 }]);
  });

  it('should end windows on whitespace in their second half', () => {
    expect(slidingWindows('aaa bb cccc dd', 8, 0)[0]).toEqual({ start: 0, end: 6 });
  });
});

describe('SlidingWindowChunker', () => {
  it('should tag window position and overlap ratio', async () => {
    const chunker = new SlidingWindowChunker(
      createChunkConfig({ strategy: 'sliding_window', chunkSize: 4, chunkOverlap: 1 })._unsafeUnwrap(),
    );

    const chunks = (await chunker.chunk('abcdefghij'))._unsafeUnwrap();

    expect(chunks.map((chunk) => chunk.text)).toEqual(['abcd', 'defg', 'ghij']);
    expect(chunks.map((chunk) => chunk.metadata['window_position'])).toEqual([0, 1, 2]);
    expect(chunks[0]!.metadata['overlap_ratio']).toBe(0.25);
  });
});
