import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ok, err, type Result } from 'neverthrow';
import type { Chunk } from '../types/chunk.js';
import { EmbedError, StoreError, type EmbeddingProvider, type SimilarityFinder } from '../types/provider.js';
import { createLogger } from '../utils/logger.js';
import { InMemoryVectorDB } from '../vector-db/in-memory-vector-db.js';
import { HybridSearchService } from './hybrid-search-service.js';

/** Scores 1 for candidates containing the query, else 0. */
const containsFinder: SimilarityFinder = async (query, candidates, topK) =>
  ok(
    candidates
      .map((text, index) => ({ index, text, score: text.includes(query) ? 1 : 0 }))
      .sort((a, b) => b.score - a.score)
      .slice(0, topK),
  );

class FakeEmbeddingProvider implements EmbeddingProvider {
  readonly dimensions = 2;

  async embed(texts: string[]): Promise<Result<number[][], EmbedError>> {
    return ok(await this.embedBatch(texts));
  }

  /** `x…` texts fail (zero vector), `bad…` texts come back with the wrong size. */
  async embedBatch(texts: string[]): Promise<number[][]> {
    return texts.map((text) => {
      if (text.startsWith('x')) return [0, 0];
      if (text.startsWith('bad')) return [1];
      return [1, 0];
    });
  }
}

function makeChunk(position: number, text: string, overrides: Partial<Chunk> = {}): Chunk {
  return {
    text,
    metadata: { strategy: 'recursive', position, created_at: '2026-01-01T00:00:00.000Z' },
    chunkId: `chunk_${position}_0000000${position}`,
    childrenIds: [],
    position,
    startChar: position * 20,
    endChar: position * 20 + text.length,
    ...overrides,
  };
}

describe('HybridSearchService', () => {
  let db: InMemoryVectorDB;
  let lines: string[];
  let service: HybridSearchService;
  const logger = () => createLogger('test', { level: 'warn', sink: (line) => lines.push(line) });

  beforeEach(async () => {
    lines = [];
    db = new InMemoryVectorDB({ dimensions: 2, logger: logger() });
    await db.storeVector('a', 'alpha apples', [1, 0], 'u1');
    await db.storeVector('b', 'beta bananas', [0, 1], 'u1');
    await db.storeVector('z', 'alpha secret', [1, 0], 'u2');
    service = new HybridSearchService({ vectorDb: db, similarityFinder: containsFinder, logger: logger() });
  });

  describe('storeKnowledge', () => {
    it('should store through the vector database', async () => {
      const response = await service.storeKnowledge('k1', 'kiwi', [0, 1], 'u1', { lang: 'en' });

      expect(response).toEqual({ success: true, method: 'local_db', id: 'k1', userId: 'u1' });
      expect((await db.getVector('k1', 'u1'))._unsafeUnwrap()?.metadata?.['lang']).toBe('en');
    });

    it('should report a backend error', async () => {
      const response = await service.storeKnowledge('k1', 'kiwi', [0, 1, 0], 'u1');

      expect(response).toEqual({
        success: false,
        method: 'local_db',
        id: 'k1',
        userId: 'u1',
        error: 'Embedding dimension mismatch: expected 2, got 3',
      });
    });

    it('should report a missing backend', async () => {
      const bare = new HybridSearchService({ vectorDb: null, similarityFinder: null });

      expect(await bare.storeKnowledge('k1', 'kiwi', [0, 1], 'u1')).toEqual({
        success: false,
        method: 'none',
        id: 'k1',
        userId: 'u1',
        error: 'No vector database configured',
      });
    });
  });

  describe('storeChunks', () => {
    it('should store chunks with their chunk metadata', async () => {
      const chunks = [
        makeChunk(0, 'first chunk'),
        makeChunk(1, 'xfailing chunk', { parentId: 'chunk_0_00000000' }),
      ];

      const summary = await service.storeChunks(chunks, 'u3', new FakeEmbeddingProvider(), { idPrefix: 'doc.md' });

      expect(summary).toEqual({
        stored: 2,
        failed: 0,
        unembedded: 1,
        ids: ['doc.md:chunk_0_00000000', 'doc.md:chunk_1_00000001'],
      });
      const stored = (await db.getVector('doc.md:chunk_1_00000001', 'u3'))._unsafeUnwrap();
      expect(stored?.metadata).toMatchObject({
        strategy: 'recursive',
        chunk_id: 'chunk_1_00000001',
        position: 1,
        start_char: 20,
        end_char: 34,
        parent_id: 'chunk_0_00000000',
        user_id: 'u3',
      });
      expect(lines).toContain('[test] warn: Some chunks were stored without a usable embedding {"count":1}');
    });

    it('should count chunks the backend rejects', async () => {
      const summary = await service.storeChunks([makeChunk(0, 'bad vector')], 'u3', new FakeEmbeddingProvider());

      expect(summary).toEqual({ stored: 0, failed: 1, unembedded: 0, ids: [] });
    });
  });

  describe('hybridSearch', () => {
    it('should fail only when there is neither backend nor fallback', async () => {
      const bare = new HybridSearchService({ vectorDb: null, similarityFinder: containsFinder });

      const response = await bare.hybridSearch('alpha', [1, 0], 'u1');

      expect(response).toEqual({
        success: false,
        results: [],
        method: 'none',
        totalResults: 0,
        searchMode: 'semantic',
        rankingMethod: 'rrf',
        error: 'No vector database or fallback search available',
      });
    });

    it('should use the backend hybrid search in hybrid mode', async () => {
      const response = await service.hybridSearch('alpha', [1, 0], 'u1', { searchMode: 'hybrid', topK: 2 });

      expect(response.method).toBe('local_hybrid');
      expect(response.results.map((r) => r.id)).toEqual(['a', 'b']);
      expect(response.results[0]!.score).toBeCloseTo(2 / 61, 12);
      expect(response.totalResults).toBe(2);
    });

    it('should fuse locally when the backend hybrid search throws', async () => {
      vi.spyOn(db, 'hybridSearch').mockRejectedValue(new Error('not supported'));

      const response = await service.hybridSearch('alpha', [1, 0], 'u1', { searchMode: 'hybrid', topK: 2 });

      expect(response).toMatchObject({ method: 'local_fused', semanticCount: 2, lexicalCount: 1, totalResults: 2 });
      expect(response.results.map((r) => r.id)).toEqual(['a', 'b']);
      expect(lines).toContain('[test] warn: Backend hybrid search failed {"backend":"memory","error":"not supported"}');
    });

    it('should run only the semantic side in semantic mode', async () => {
      const response = await service.hybridSearch('alpha', [1, 0], 'u1', { topK: 2 });

      expect(response).toMatchObject({ method: 'local_fused', semanticCount: 2, searchMode: 'semantic' });
      expect(response).not.toHaveProperty('lexicalCount');
      expect(response.results.map((r) => r.id)).toEqual(['a', 'b']);
    });

    it('should run only the lexical side in lexical mode', async () => {
      const response = await service.hybridSearch('alpha', null, 'u1', { searchMode: 'lexical' });

      expect(response).toMatchObject({ method: 'local_fused', lexicalCount: 1 });
      expect(response.results.map((r) => r.id)).toEqual(['a']);
    });

    it('should fall back to ranking stored texts', async () => {
      const fallbackOnly = new HybridSearchService({ vectorDb: null, similarityFinder: containsFinder, fallbackSource: db });

      const response = await fallbackOnly.hybridSearch('bananas', null, 'u1', { topK: 1 });

      expect(response.method).toBe('fallback');
      expect(response.results).toHaveLength(1);
      expect(response.results[0]).toMatchObject({ id: 'b', text: 'beta bananas', score: 1, semanticScore: 1 });
      expect(response.results[0]!.metadata?.['user_id']).toBe('u1');
    });

    it('should use the fallback when local searches find nothing', async () => {
      vi.spyOn(db, 'searchVectors').mockResolvedValue(ok([]));

      const response = await service.hybridSearch('bananas', [1, 0], 'u1', { topK: 1 });

      expect(response.method).toBe('fallback');
      expect(response.results.map((r) => r.id)).toEqual(['b']);
    });

    it('should report errors when every tier fails', async () => {
      vi.spyOn(db, 'searchVectors').mockResolvedValue(err(new StoreError('down')));
      vi.spyOn(db, 'searchText').mockResolvedValue(err(new StoreError('down')));
      const noFallback = new HybridSearchService({
        vectorDb: db,
        similarityFinder: containsFinder,
        useFallback: false,
        logger: logger(),
      });

      const response = await noFallback.hybridSearch('alpha', [1, 0], 'u1', { searchMode: 'hybrid' });

      expect(response).toMatchObject({
        success: true,
        results: [],
        method: 'error',
        totalResults: 0,
        error: 'down; down',
      });
    });

    it('should report an empty result set', async () => {
      const response = await service.hybridSearch('nothing', null, 'u9', { searchMode: 'lexical' });

      expect(response).toMatchObject({ success: true, method: 'none', message: 'No results found', totalResults: 0 });
    });

    it('should surface fallback finder errors', async () => {
      const failing: SimilarityFinder = async () => err(new EmbedError('embedder offline'));
      const fallbackOnly = new HybridSearchService({ vectorDb: null, similarityFinder: failing, fallbackSource: db });

      const response = await fallbackOnly.hybridSearch('alpha', null, 'u1');

      expect(response).toMatchObject({ method: 'error', error: 'embedder offline' });
    });

    it('should diversify and strip the embeddings it fetched', async () => {
      const response = await service.hybridSearch('alpha', [1, 0], 'u1', {
        searchMode: 'hybrid',
        topK: 2,
        diversify: true,
      });

      expect(response.results.map((r) => [r.id, r.metadata?.['mmr_rank']])).toEqual([
        ['a', 1],
        ['b', 2],
      ]);
      expect(response.results.every((r) => r.embedding === undefined)).toBe(true);
    });
  });

  describe('diversify', () => {
    it('should rerank an existing list', () => {
      const results = service.diversify(
        [
          { id: 'p', text: 'same words here', score: 1 },
          { id: 'q', text: 'same words here', score: 0.9 },
          { id: 'r', text: 'other topic entirely', score: 0.1 },
        ],
        2,
      );

      expect(results.map((r) => r.id)).toEqual(['p', 'r']);
    });
  });

  describe('getStats', () => {
    it('should combine service flags with backend stats', async () => {
      expect(await service.getStats('u1')).toEqual({
        hasVectorDb: true,
        hasSimilarityFinder: true,
        useFallback: true,
        fallbackCandidateLimit: 1000,
        backend: { backend: 'memory', dimensions: 2, totalVectors: 3, userVectors: 2 },
      });
    });
  });
});
