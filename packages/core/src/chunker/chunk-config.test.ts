import { describe, it, expect } from 'vitest';
import { chunkConfigKey, createChunkConfig, DEFAULT_CHUNK_CONFIG, deriveChunkConfig } from './chunk-config.js';

describe('createChunkConfig', () => {
  it('should apply defaults', () => {
    expect(DEFAULT_CHUNK_CONFIG).toMatchObject({
      strategy: 'recursive',
      chunkSize: 1000,
      chunkOverlap: 100,
      minChunkSize: 100,
      maxChunkSize: 3000,
      keepSeparator: true,
      stripWhitespace: true,
      similarityThreshold: 0.7,
      useEmbeddings: false,
      tokenLimit: 512,
      hierarchyLevels: 3,
      preserveTables: true,
    });
    expect(DEFAULT_CHUNK_CONFIG.separators).toEqual(['\n\n', '\n', '. ', '! ', '? ', '; ', ', ', ' ', '']);
  });

  it('should return a frozen config', () => {
    const config = createChunkConfig({ chunkSize: 200 })._unsafeUnwrap();
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.separators)).toBe(true);
  });

  it('should derive bounds from a small chunk size', () => {
    const config = createChunkConfig({ chunkSize: 50 })._unsafeUnwrap();
    expect(config.chunkOverlap).toBe(5);
    expect(config.minChunkSize).toBe(50);
    expect(config.maxChunkSize).toBe(3000);
  });

  it('should reject an overlap that is not smaller than the chunk size', () => {
    const result = createChunkConfig({ chunkSize: 10, chunkOverlap: 10 });
    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.name).toBe('ChunkConfigError');
      expect(result.error.message).toBe(
        'Invalid chunk config: chunkOverlap: chunkOverlap (10) must be smaller than chunkSize (10)',
      );
    }
  });

  it('should reject out-of-range values', () => {
    expect(createChunkConfig({ chunkSize: 0 }).isErr()).toBe(true);
    expect(createChunkConfig({ similarityThreshold: 1.5 }).isErr()).toBe(true);
    expect(createChunkConfig({ hierarchyLevels: 4 }).isErr()).toBe(true);
    expect(createChunkConfig({ chunkSize: 100, minChunkSize: 101 }).isErr()).toBe(true);
  });
});

describe('chunkConfigKey', () => {
  it('should match for configs with equal values', () => {
    const a = createChunkConfig({ chunkSize: 300 })._unsafeUnwrap();
    const b = createChunkConfig({ chunkSize: 300 })._unsafeUnwrap();
    expect(chunkConfigKey(a)).toBe(chunkConfigKey(b));
    expect(chunkConfigKey(a)).not.toBe(chunkConfigKey(DEFAULT_CHUNK_CONFIG));
  });
});

describe('deriveChunkConfig', () => {
  it('should clamp overlap and minimum to a smaller chunk size', () => {
    const derived = deriveChunkConfig(DEFAULT_CHUNK_CONFIG, { chunkSize: 50 });
    expect(derived.chunkSize).toBe(50);
    expect(derived.chunkOverlap).toBe(49);
    expect(derived.minChunkSize).toBe(50);
    expect(DEFAULT_CHUNK_CONFIG.chunkSize).toBe(1000);
  });
});
