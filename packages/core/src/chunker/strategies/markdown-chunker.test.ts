import { describe, it, expect } from 'vitest';
import { createChunkConfig } from '../chunk-config.js';
import { maskCodeBlocks, MarkdownChunker } from './markdown-chunker.js';

describe('maskCodeBlocks', () => {
  it('should replace fenced blocks with same-length filler', () => {
    const text = 'a\n```\n# x\n```\nb';
    const masked = maskCodeBlocks(text);
    expect(masked).toHaveLength(text.length);
    expect(masked).toBe(`a\n${'x'.repeat(11)}\nb`);
  });
});

describe('MarkdownChunker', () => {
  it('should emit one chunk per heading section and ignore headings inside code', async () => {
    const text = [
      '# Title',
      'Intro text.',
      '',
      '## Part A',
      'Alpha body.',
      '',
      '```sh',
      '# not a heading',
      '```',
      '',
      '## Part B',
      'Beta body.',
    ].join('\n');
    const chunker = new MarkdownChunker(createChunkConfig({ strategy: 'markdown_aware' })._unsafeUnwrap());

    const chunks = (await chunker.chunk(text))._unsafeUnwrap();

    expect(chunks.map((chunk) => chunk.metadata['section_title'])).toEqual(['Title', 'Part A', 'Part B']);
    expect(chunks.map((chunk) => chunk.metadata['section_level'])).toEqual([1, 2, 2]);
    expect(chunks[1]!.text).toBe('## Part A\nAlpha body.\n\n```sh\n# not a heading\n```');
  });

  it('should keep untitled text before the first heading as level 0', async () => {
    const chunker = new MarkdownChunker(createChunkConfig({ strategy: 'markdown_aware' })._unsafeUnwrap());

    const chunks = (await chunker.chunk('Preface.\n\n# Heading\nBody.'))._unsafeUnwrap();

    expect(chunks[0]!.text).toBe('Preface.');
    expect(chunks[0]!.metadata['section_level']).toBe(0);
    expect(chunks[0]!.metadata['section_title']).toBe('');
  });

  it('should repeat the heading on every part of an oversized section', async () => {
    const text = '## Big\np1 aaaa aaaa.\n\np2 bbbb bbbb.\n\np3 cccc cccc.';
    const chunker = new MarkdownChunker(createChunkConfig({ strategy: 'markdown_aware', chunkSize: 30 })._unsafeUnwrap());

    const chunks = (await chunker.chunk(text))._unsafeUnwrap();

    expect(chunks.map((chunk) => chunk.text)).toEqual([
      '## Big\n\np1 aaaa aaaa.',
      '## Big\n\np2 bbbb bbbb.',
      '## Big\n\np3 cccc cccc.',
    ]);
    expect(chunks.map((chunk) => chunk.metadata['section_part'])).toEqual([0, 1, 2]);
    expect(chunks[0]!.startChar).toBe(0);
    expect(chunks[1]!.startChar).toBe(22);
  });
});
