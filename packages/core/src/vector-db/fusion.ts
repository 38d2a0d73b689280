import type { SearchResult, VectorSearchConfig } from '../types/search.js';
import { cosineSimilarity, minMaxNormalize } from '../utils/similarity.js';

/** RRF damping constant. */
export const RRF_K = 60;

interface FusionEntry {
  result: SearchResult;
  semanticRank?: number;
  lexicalRank?: number;
  semanticScore?: number;
  lexicalScore?: number;
}

function copyResult(result: SearchResult): SearchResult {
  return {
    ...result,
    ...(result.metadata ? { metadata: { ...result.metadata } } : {}),
    ...(result.embedding ? { embedding: [...result.embedding] } : {}),
  };
}

function sortByScore(results: SearchResult[]): SearchResult[] {
  // Array#sort is stable, so equal scores keep first-seen order.
  return results.sort((a, b) => b.score - a.score);
}

/**
 * Merge both lists by id, semantic first. The first occurrence of an id in
 * a list gives its 1-based rank there; an embedding found on either side
 * is kept.
 */
function mergeByRank(semantic: readonly SearchResult[], lexical: readonly SearchResult[]): FusionEntry[] {
  const entries = new Map<string, FusionEntry>();

  semantic.forEach((result, index) => {
    if (entries.has(result.id)) return;
    entries.set(result.id, { result, semanticRank: index + 1, semanticScore: result.score });
  });

  lexical.forEach((result, index) => {
    const existing = entries.get(result.id);
    if (!existing) {
      entries.set(result.id, { result, lexicalRank: index + 1, lexicalScore: result.score });
      return;
    }
    if (existing.lexicalRank !== undefined) return;
    existing.lexicalRank = index + 1;
    existing.lexicalScore = result.score;
    if (!existing.result.embedding && result.embedding) {
      existing.result = { ...existing.result, embedding: result.embedding };
    }
  });

  return [...entries.values()];
}

/**
 * Reciprocal Rank Fusion: `1/(k + semanticRank) + 1/(k + lexicalRank)`,
 * where a result missing from a list ranks one past that list's end.
 * `score` becomes the fused value; the source scores are kept as
 * `semanticScore` and `lexicalScore`.
 */
export function reciprocalRankFusion(
  semantic: readonly SearchResult[],
  lexical: readonly SearchResult[],
  topK: number,
  k: number = RRF_K,
): SearchResult[] {
  const missingSemantic = semantic.length + 1;
  const missingLexical = lexical.length + 1;

  const fused = mergeByRank(semantic, lexical).map((entry) => {
    const semanticRank = entry.semanticRank ?? missingSemantic;
    const lexicalRank = entry.lexicalRank ?? missingLexical;
    const result = copyResult(entry.result);
    delete result.semanticScore;
    delete result.lexicalScore;
    return {
      ...result,
      score: 1 / (k + semanticRank) + 1 / (k + lexicalRank),
      ...(entry.semanticScore !== undefined ? { semanticScore: entry.semanticScore } : {}),
      ...(entry.lexicalScore !== undefined ? { lexicalScore: entry.lexicalScore } : {}),
    };
  });

  return sortByScore(fused).slice(0, Math.max(0, topK));
}

export interface WeightedFusionOptions {
  topK: number;
  semanticWeight: number;
  lexicalWeight: number;
}

/**
 * Min-max normalise each list on its own (a list with a single distinct
 * score maps to 1.0), then score `semanticWeight·s + lexicalWeight·l`
 * with 0 for a list the result is absent from.
 */
export function weightedFusion(
  semantic: readonly SearchResult[],
  lexical: readonly SearchResult[],
  options: WeightedFusionOptions,
): SearchResult[] {
  const semanticNorm = minMaxNormalize(semantic.map((result) => result.score));
  const lexicalNorm = minMaxNormalize(lexical.map((result) => result.score));
  const normalized = (list: readonly SearchResult[], scores: readonly number[]): SearchResult[] =>
    list.map((result, index) => ({ ...result, score: scores[index] ?? 0 }));

  const fused = mergeByRank(normalized(semantic, semanticNorm), normalized(lexical, lexicalNorm)).map((entry) => {
    const semanticScore = entry.semanticScore ?? 0;
    const lexicalScore = entry.lexicalScore ?? 0;
    const result = copyResult(entry.result);
    delete result.semanticScore;
    delete result.lexicalScore;
    return {
      ...result,
      score: options.semanticWeight * semanticScore + options.lexicalWeight * lexicalScore,
      ...(entry.semanticScore !== undefined ? { semanticScore } : {}),
      ...(entry.lexicalScore !== undefined ? { lexicalScore } : {}),
    };
  });

  return sortByScore(fused).slice(0, Math.max(0, options.topK));
}

export interface MmrOptions {
  count: number;
  /** 1 is pure relevance, 0 pure diversity. */
  lambda: number;
  /** Stop once the best remaining candidate scores below this. */
  minScore?: number;
  maxIterations?: number;
}

export interface MmrSelection<T> {
  item: T;
  index: number;
  mmrScore: number;
}

/**
 * Greedy Max Marginal Relevance: repeatedly take the candidate maximising
 * `λ·relevance − (1−λ)·max similarity to what is already selected`. The
 * first pick is the most relevant item. Ties go to the earlier candidate.
 */
export function mmrSelect<T>(
  items: readonly T[],
  relevance: readonly number[],
  similarity: (a: T, b: T) => number,
  options: MmrOptions,
): MmrSelection<T>[] {
  const { lambda, minScore = Number.NEGATIVE_INFINITY, maxIterations = Number.POSITIVE_INFINITY } = options;
  const count = Math.min(options.count, items.length);
  const remaining = items.map((_, index) => index);
  const selected: MmrSelection<T>[] = [];
  let iterations = 0;

  while (selected.length < count && remaining.length > 0 && iterations < maxIterations) {
    iterations++;
    let bestPosition = -1;
    let bestScore = Number.NEGATIVE_INFINITY;

    remaining.forEach((candidateIndex, position) => {
      const candidate = items[candidateIndex];
      if (candidate === undefined) return;
      let maxSimilarity = 0;
      for (const chosen of selected) {
        maxSimilarity = Math.max(maxSimilarity, similarity(candidate, chosen.item));
      }
      const score = lambda * (relevance[candidateIndex] ?? 0) - (1 - lambda) * maxSimilarity;
      if (score > bestScore) {
        bestScore = score;
        bestPosition = position;
      }
    });

    if (bestPosition === -1 || bestScore < minScore) {
      break;
    }
    const [bestIndex] = remaining.splice(bestPosition, 1);
    const best = bestIndex === undefined ? undefined : items[bestIndex];
    if (bestIndex === undefined || best === undefined) {
      break;
    }
    selected.push({ item: best, index: bestIndex, mmrScore: bestScore });
  }

  return selected;
}

export function embeddingSimilarity(a: SearchResult, b: SearchResult): number {
  return a.embedding && b.embedding ? cosineSimilarity(a.embedding, b.embedding) : 0;
}

export interface MmrFusionOptions {
  topK: number;
  mmrLambda: number;
}

/**
 * RRF over the whole pool, then MMR re-selection of `topK` results using
 * embedding cosine for diversity. Results keep their RRF score.
 */
export function mmrFusion(
  semantic: readonly SearchResult[],
  lexical: readonly SearchResult[],
  options: MmrFusionOptions,
): SearchResult[] {
  const pool = reciprocalRankFusion(semantic, lexical, semantic.length + lexical.length);
  if (pool.length <= 1) {
    return pool.slice(0, Math.max(0, options.topK));
  }
  const relevance = minMaxNormalize(pool.map((result) => result.score));
  return mmrSelect(pool, relevance, embeddingSimilarity, {
    count: options.topK,
    lambda: options.mmrLambda,
  }).map((selection) => selection.item);
}

/** Fuse with `config.rankingMethod`; anything unrecognised is treated as RRF. */
export function fuseResults(
  semantic: readonly SearchResult[],
  lexical: readonly SearchResult[],
  config: VectorSearchConfig,
): SearchResult[] {
  switch (config.rankingMethod) {
    case 'weighted':
      return weightedFusion(semantic, lexical, config);
    case 'mmr':
      return mmrFusion(semantic, lexical, config);
    default:
      return reciprocalRankFusion(semantic, lexical, config.topK);
  }
}
