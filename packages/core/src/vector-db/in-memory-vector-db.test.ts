import { describe, it, expect, vi, beforeEach } from 'vitest';
import { createSearchConfig } from '../types/search.js';
import { createLogger } from '../utils/logger.js';
import { InMemoryVectorDB } from './in-memory-vector-db.js';

describe('InMemoryVectorDB', () => {
  let db: InMemoryVectorDB;
  let lines: string[];

  beforeEach(async () => {
    lines = [];
    db = new InMemoryVectorDB({
      dimensions: 3,
      logger: createLogger('test', { level: 'debug', sink: (line) => lines.push(line) }),
    });
    await db.storeVector('a', 'the quick brown fox', [1, 0, 0], 'alice', { topic: 'animals' });
    await db.storeVector('b', 'a lazy dog sleeps', [0.9, 0.1, 0], 'alice', { topic: 'animals' });
    await db.storeVector('c', 'quarterly revenue report', [0, 0, 1], 'alice', { topic: 'finance' });
    await db.storeVector('a', 'bob owns this quick note', [1, 0, 0], 'bob');
  });

  describe('storeVector', () => {
    it('should add user_id and stored_at to metadata', async () => {
      const stored = (await db.getVector('a', 'alice'))._unsafeUnwrap();

      expect(stored?.metadata?.['user_id']).toBe('alice');
      expect(stored?.metadata?.['topic']).toBe('animals');
      expect(typeof stored?.metadata?.['stored_at']).toBe('string');
    });

    it('should reject a dimension mismatch', async () => {
      const result = await db.storeVector('x', 'text', [1, 0], 'alice');

      expect(result.isErr()).toBe(true);
      expect(result._unsafeUnwrapErr().message).toBe('Embedding dimension mismatch: expected 3, got 2');
    });

    it('should reject an empty user id', async () => {
      const result = await db.storeVector('x', 'text', [1, 0, 0], '  ');
      expect(result._unsafeUnwrapErr().message).toBe('userId must not be empty');
    });

    it('should reject a user id with surrounding whitespace', async () => {
      const result = await db.storeVector('x', 'text', [1, 0, 0], ' alice ');

      expect(result._unsafeUnwrapErr().message).toBe('userId must not have leading or trailing whitespace');
      expect(db.size).toBe(4);
    });

    it('should keep owners apart when ids and user ids share separator characters', async () => {
      await db.storeVector('b\u0000c', 'secret of a', [1, 0, 0], 'a');
      await db.storeVector('b:c', 'colon note of a', [1, 0, 0], 'a');
      await db.storeVector('c', 'note of a:b', [0, 1, 0], 'a:b');

      expect((await db.getVector('c', 'a\u0000b'))._unsafeUnwrap()).toBeNull();
      expect((await db.deleteVector('c', 'a\u0000b'))._unsafeUnwrap()).toBe(false);
      expect((await db.getVector('b:c', 'a'))._unsafeUnwrap()?.text).toBe('colon note of a');
      expect((await db.getVector('c', 'a:b'))._unsafeUnwrap()?.text).toBe('note of a:b');
      expect(db.size).toBe(7);
    });

    it('should replace an existing id for the same user', async () => {
      await db.storeVector('c', 'updated text', [0, 1, 0], 'alice');

      const stored = (await db.getVector('c', 'alice'))._unsafeUnwrap();
      expect(stored?.text).toBe('updated text');
      expect(db.size).toBe(4);
    });
  });

  describe('searchVectors', () => {
    it('should rank by cosine similarity', async () => {
      const results = (await db.searchVectors([1, 0, 0], 'alice', createSearchConfig({ topK: 2 })))._unsafeUnwrap();

      expect(results.map((r) => r.id)).toEqual(['a', 'b']);
      expect(results[0]!.score).toBeCloseTo(1, 10);
      expect(results[0]!.semanticScore).toBe(results[0]!.score);
      expect(results[0]!.embedding).toBeUndefined();
    });

    it('should only return embeddings when asked', async () => {
      const config = createSearchConfig({ topK: 1, includeEmbeddings: true });
      const results = (await db.searchVectors([1, 0, 0], 'alice', config))._unsafeUnwrap();

      expect(results[0]!.embedding).toEqual([1, 0, 0]);
    });

    it('should honour filterMetadata', async () => {
      const config = createSearchConfig({ topK: 5, filterMetadata: { topic: 'finance' } });
      const results = (await db.searchVectors([1, 0, 0], 'alice', config))._unsafeUnwrap();

      expect(results.map((r) => r.id)).toEqual(['c']);
    });

    it('should never return another user\'s items', async () => {
      const results = (await db.searchVectors([1, 0, 0], 'bob', createSearchConfig({ topK: 10 })))._unsafeUnwrap();

      expect(results.map((r) => r.text)).toEqual(['bob owns this quick note']);
    });
  });

  describe('searchText', () => {
    it('should find matching texts for the owner only', async () => {
      const results = (await db.searchText('quick', 'alice', createSearchConfig({ topK: 5 })))._unsafeUnwrap();

      expect(results.map((r) => r.id)).toEqual(['a']);
      expect(results[0]!.lexicalScore).toBeGreaterThan(0);
    });

    it('should return nothing for a blank query', async () => {
      const results = (await db.searchText('   ', 'alice', createSearchConfig()))._unsafeUnwrap();
      expect(results).toEqual([]);
    });
  });

  describe('deleteVector', () => {
    it('should return false for an id owned by someone else', async () => {
      expect((await db.deleteVector('c', 'bob'))._unsafeUnwrap()).toBe(false);
      expect((await db.getVector('c', 'alice'))._unsafeUnwrap()).not.toBeNull();
    });

    it('should remove the item from both indexes', async () => {
      expect((await db.deleteVector('a', 'alice'))._unsafeUnwrap()).toBe(true);

      const lexical = (await db.searchText('quick', 'alice', createSearchConfig()))._unsafeUnwrap();
      expect(lexical).toEqual([]);
      expect((await db.getVector('a', 'alice'))._unsafeUnwrap()).toBeNull();
      expect((await db.getVector('a', 'bob'))._unsafeUnwrap()).not.toBeNull();
    });
  });

  describe('listVectors', () => {
    it('should page through the owner\'s items', async () => {
      const page = (await db.listVectors('alice', { limit: 2, offset: 1 }))._unsafeUnwrap();

      expect(page.map((r) => r.id)).toEqual(['b', 'c']);
      expect(page[0]!.embedding).toBeUndefined();
    });
  });

  describe('getStats', () => {
    it('should report total and per-user counts', async () => {
      const stats = (await db.getStats('bob'))._unsafeUnwrap();

      expect(stats).toEqual({ backend: 'memory', dimensions: 3, totalVectors: 4, userVectors: 1 });
    });
  });

  describe('hybridSearch', () => {
    it('should fuse semantic and lexical results', async () => {
      const results = await db.hybridSearch('quick', [1, 0, 0], 'alice', createSearchConfig({ topK: 2, searchMode: 'hybrid' }));

      expect(results.map((r) => r.id)).toEqual(['a', 'b']);
      expect(results[0]!.score).toBeCloseTo(1 / 61 + 1 / 61, 12);
    });

    it('should fall back to the other side when one search fails', async () => {
      vi.spyOn(db, 'searchText').mockRejectedValue(new Error('index offline'));

      const results = await db.hybridSearch('quick', [0, 0, 1], 'alice', createSearchConfig({ topK: 1 }));

      expect(results.map((r) => r.id)).toEqual(['c']);
      expect(lines).toContain('[test] error: Lexical search failed {"backend":"memory","error":"index offline"}');
    });

    it('should strip embeddings gathered for MMR', async () => {
      const results = await db.hybridSearch(
        'quick',
        [1, 0, 0],
        'alice',
        createSearchConfig({ topK: 3, rankingMethod: 'mmr' }),
      );

      expect(results).toHaveLength(3);
      expect(results.every((r) => r.embedding === undefined)).toBe(true);
    });
  });

  describe('snapshots', () => {
    it('should round-trip through JSON', async () => {
      const restored = InMemoryVectorDB.fromJSON(db.toJSON(), { dimensions: 3 })._unsafeUnwrap();

      expect(restored.size).toBe(4);
      const results = (await restored.searchText('revenue', 'alice', createSearchConfig()))._unsafeUnwrap();
      expect(results.map((r) => r.id)).toEqual(['c']);
    });

    it('should refuse a snapshot with other dimensions', () => {
      const restored = InMemoryVectorDB.fromJSON(db.toJSON(), { dimensions: 4 });
      expect(restored._unsafeUnwrapErr().message).toBe('Snapshot dimension mismatch: expected 4, got 3');
    });

    it('should refuse malformed JSON', () => {
      expect(InMemoryVectorDB.fromJSON('{', { dimensions: 3 }).isErr()).toBe(true);
    });
  });
});
