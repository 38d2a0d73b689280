import { describe, it, expect } from 'vitest';
import { createChunkConfig } from '../chunk-config.js';
import { HierarchicalChunker } from './hierarchical-chunker.js';

const text = 'aaaa.\n\nbbbb.\n\ncccc.';

describe('HierarchicalChunker', () => {
  it('should build root, section and paragraph levels depth-first', async () => {
    const chunker = new HierarchicalChunker(createChunkConfig({ strategy: 'hierarchical', chunkSize: 10 })._unsafeUnwrap());

    const chunks = (await chunker.chunk(text))._unsafeUnwrap();
    const [root, section, ...paragraphs] = chunks;

    expect(chunks.map((chunk) => chunk.metadata['hierarchy_level'])).toEqual([0, 1, 2, 2, 2]);
    expect(root!.text).toBe(text);
    expect(root!.metadata['is_truncated']).toBe(false);
    expect(root!.childrenIds).toEqual([section!.chunkId]);
    expect(section!.parentId).toBe(root!.chunkId);
    expect(paragraphs.map((chunk) => chunk.text)).toEqual(['aaaa.', 'bbbb.', 'cccc.']);
    expect(section!.childrenIds).toEqual(paragraphs.map((chunk) => chunk.chunkId));
    expect(paragraphs.every((chunk) => chunk.parentId === section!.chunkId)).toBe(true);
  });

  it('should stop at the configured depth', async () => {
    const chunker = new HierarchicalChunker(
      createChunkConfig({ strategy: 'hierarchical', chunkSize: 10, hierarchyLevels: 1 })._unsafeUnwrap(),
    );

    const chunks = (await chunker.chunk(text))._unsafeUnwrap();

    expect(chunks).toHaveLength(1);
    expect(chunks[0]!.childrenIds).toEqual([]);
  });

  it('should mark a root cut at maxChunkSize as truncated', async () => {
    const chunker = new HierarchicalChunker(
      createChunkConfig({ strategy: 'hierarchical', chunkSize: 5, maxChunkSize: 6, hierarchyLevels: 1 })._unsafeUnwrap(),
    );

    const chunks = (await chunker.chunk(text))._unsafeUnwrap();

    expect(chunks[0]!.text).toBe('aaaa.');
    expect(chunks[0]!.metadata['is_truncated']).toBe(true);
  });
});
