/**
 * Cosine similarity. Mismatched lengths, empty vectors and zero-norm
 * vectors all yield 0 so ranking stays total.
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length === 0 || a.length !== b.length) {
    return 0;
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }

  if (normA === 0 || normB === 0) {
    return 0;
  }
  const result = dot / (Math.sqrt(normA) * Math.sqrt(normB));
  return Number.isFinite(result) ? result : 0;
}

export function jaccardSimilarity<T>(a: ReadonlySet<T>, b: ReadonlySet<T>): number {
  if (a.size === 0 && b.size === 0) {
    return 0;
  }
  let intersection = 0;
  for (const item of a) {
    if (b.has(item)) intersection++;
  }
  const union = a.size + b.size - intersection;
  return union === 0 ? 0 : intersection / union;
}

/** Lowercased word set, punctuation stripped. */
export function wordSet(text: string): Set<string> {
  const words = text.toLowerCase().match(/[\p{L}\p{N}_]+/gu) ?? [];
  return new Set(words);
}

/** Min-max normalise to [0, 1]; a list with one distinct value maps to all 1.0. */
export function minMaxNormalize(scores: readonly number[]): number[] {
  if (scores.length === 0) {
    return [];
  }
  const min = Math.min(...scores);
  const max = Math.max(...scores);
  if (max === min) {
    return scores.map(() => 1);
  }
  return scores.map((score) => (score - min) / (max - min));
}

export function isZeroVector(vector: readonly number[]): boolean {
  return vector.every((value) => value === 0);
}
