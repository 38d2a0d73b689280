import { ok, err } from 'neverthrow';
import { EmbedError, type EmbeddingProvider, type SimilarityFinder, type SimilarityMatch } from '../types/provider.js';
import { cosineSimilarity } from '../utils/similarity.js';

/**
 * Rank candidate texts against a query by embedding cosine. The query and
 * candidates are embedded in one `embed` call.
 */
export function createEmbeddingSimilarityFinder(provider: EmbeddingProvider): SimilarityFinder {
  return async (queryText, candidates, topK) => {
    if (candidates.length === 0 || topK <= 0) {
      return ok([]);
    }

    const embedded = await provider.embed([queryText, ...candidates]);
    if (embedded.isErr()) {
      return err(embedded.error);
    }
    const [query, ...vectors] = embedded.value;
    if (!query || vectors.length !== candidates.length) {
      return err(
        new EmbedError(`Expected ${candidates.length + 1} embeddings, got ${embedded.value.length}`),
      );
    }

    const matches: SimilarityMatch[] = candidates.map((text, index) => ({
      index,
      text,
      score: cosineSimilarity(query, vectors[index] ?? []),
    }));
    matches.sort((a, b) => b.score - a.score);
    return ok(matches.slice(0, topK));
  };
}
