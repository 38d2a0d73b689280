import type { SearchResult } from '../types/search.js';
import { cosineSimilarity, jaccardSimilarity, minMaxNormalize, wordSet } from '../utils/similarity.js';
import { mmrSelect } from '../vector-db/fusion.js';

export interface MMRRerankerConfig {
  /** 1 is pure relevance, 0 pure diversity. */
  lambdaParam: number;
  useSemanticDiversity: boolean;
  useLexicalDiversity: boolean;
  useMetadataDiversity: boolean;
  /** Stop once the best remaining candidate's MMR score falls below this. */
  minDiversityScore: number;
  maxIterations: number;
}

export const DEFAULT_MMR_CONFIG: Readonly<MMRRerankerConfig> = {
  lambdaParam: 0.5,
  useSemanticDiversity: true,
  useLexicalDiversity: true,
  useMetadataDiversity: false,
  minDiversityScore: Number.NEGATIVE_INFINITY,
  maxIterations: 100,
};

export type DiversityFunction = (a: SearchResult, b: SearchResult) => number;

/** Keys written by storage or by this reranker; they say nothing about content. */
const IGNORED_METADATA_KEYS = new Set(['user_id', 'stored_at', 'created_at', 'mmr_score', 'mmr_rank']);

function metadataPairs(metadata: Record<string, unknown> | undefined): Set<string> {
  const pairs = new Set<string>();
  for (const [key, value] of Object.entries(metadata ?? {})) {
    if (IGNORED_METADATA_KEYS.has(key) || value === undefined) continue;
    pairs.add(`${key}=${JSON.stringify(value)}`);
  }
  return pairs;
}

function clampLambda(lambda: number): number {
  return Math.min(1, Math.max(0, lambda));
}

/**
 * Max Marginal Relevance over an already scored list. Pairwise similarity
 * is the mean of the enabled signals both results can provide: embedding
 * cosine, word-set Jaccard of the texts and Jaccard of metadata pairs.
 */
export class MMRReranker {
  private readonly config: MMRRerankerConfig;

  constructor(config: Partial<MMRRerankerConfig> = {}) {
    this.config = { ...DEFAULT_MMR_CONFIG, ...config };
  }

  getConfig(): Readonly<MMRRerankerConfig> {
    return this.config;
  }

  rerankResults(results: readonly SearchResult[], targetCount?: number, lambdaParam?: number): SearchResult[] {
    return this.rerankWithCustomDiversity(results, (a, b) => this.similarity(a, b), targetCount, lambdaParam);
  }

  rerankWithCustomDiversity(
    results: readonly SearchResult[],
    diversityFn: DiversityFunction,
    targetCount: number = results.length,
    lambdaParam: number = this.config.lambdaParam,
  ): SearchResult[] {
    if (results.length <= 1) {
      return [...results];
    }

    const relevance = minMaxNormalize(results.map((result) => result.score));
    const selections = mmrSelect(results, relevance, diversityFn, {
      count: Math.max(0, Math.floor(targetCount)),
      lambda: clampLambda(lambdaParam),
      minScore: this.config.minDiversityScore,
      maxIterations: this.config.maxIterations,
    });

    return selections.map((selection, rank) => ({
      ...selection.item,
      metadata: { ...selection.item.metadata, mmr_score: selection.mmrScore, mmr_rank: rank + 1 },
    }));
  }

  /** Equal-weight mean of the enabled signals available for this pair; 0 when none is. */
  similarity(a: SearchResult, b: SearchResult): number {
    const signals: number[] = [];

    if (this.config.useSemanticDiversity && a.embedding && b.embedding) {
      signals.push(cosineSimilarity(a.embedding, b.embedding));
    }
    if (this.config.useLexicalDiversity) {
      const wordsA = wordSet(a.text);
      const wordsB = wordSet(b.text);
      if (wordsA.size > 0 && wordsB.size > 0) {
        signals.push(jaccardSimilarity(wordsA, wordsB));
      }
    }
    if (this.config.useMetadataDiversity) {
      const pairsA = metadataPairs(a.metadata);
      const pairsB = metadataPairs(b.metadata);
      if (pairsA.size > 0 && pairsB.size > 0) {
        signals.push(jaccardSimilarity(pairsA, pairsB));
      }
    }

    if (signals.length === 0) {
      return 0;
    }
    return signals.reduce((sum, value) => sum + value, 0) / signals.length;
  }
}
