import { describe, it, expect, vi, beforeAll, afterEach } from 'vitest';
import chalk from 'chalk';
import type { Chunk } from '@fusekit/core';
import { buildChunkOptions, formatChunk, formatChunkList } from './chunk-cmd.js';

function makeChunk(overrides: Partial<Chunk> = {}): Chunk {
  return {
    text: 'Hello   world\nagain',
    metadata: { strategy: 'recursive' },
    chunkId: 'chunk_0_abc',
    childrenIds: [],
    position: 0,
    startChar: 0,
    endChar: 19,
    ...overrides,
  };
}

beforeAll(() => {
  chalk.level = 0;
});

describe('formatChunk', () => {
  it('should show position, id, span, strategy and a flattened preview', () => {
    expect(formatChunk(makeChunk())).toBe('[0] chunk_0_abc  0-19  recursive\n    Hello world again');
  });

  it('should show the parent of a child chunk', () => {
    expect(formatChunk(makeChunk({ parentId: 'chunk_0_root' }))).toBe(
      '[0] chunk_0_abc  0-19  recursive parent: chunk_0_root\n    Hello world again',
    );
  });
});

describe('formatChunkList', () => {
  it('should report an empty result', () => {
    expect(formatChunkList('empty.txt', [])).toBe('No chunks produced from empty.txt.');
  });

  it('should list every chunk under a header', () => {
    const output = formatChunkList('notes.txt', [makeChunk(), makeChunk({ position: 1, chunkId: 'chunk_1_def' })]);
    expect(output.split('\n')[0]).toBe('2 chunk(s) from notes.txt:');
    expect(output.split('\n')[4]).toBe('[1] chunk_1_def  0-19  recursive');
  });
});

describe('buildChunkOptions', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should only include the flags that were given', () => {
    expect(buildChunkOptions({ root: '.' })).toEqual({});
    expect(buildChunkOptions({ root: '.', strategy: 'sentence_based', chunkSize: '200', chunkOverlap: '20' })).toEqual({
      strategy: 'sentence_based',
      chunkSize: 200,
      chunkOverlap: 20,
    });
  });

  it('should accept a zero overlap', () => {
    expect(buildChunkOptions({ root: '.', chunkOverlap: '0' })).toEqual({ chunkOverlap: 0 });
  });

  it('should exit on a negative overlap', () => {
    vi.spyOn(process, 'exit').mockImplementation((code) => {
      throw new Error(`exit ${String(code)}`);
    });
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});

    expect(() => buildChunkOptions({ root: '.', chunkOverlap: '-1' })).toThrow('exit 1');
    expect(error).toHaveBeenCalledWith('Invalid --chunk-overlap value. Must be a non-negative integer.');
  });
});
