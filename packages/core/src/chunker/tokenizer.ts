import { encode, decode } from 'gpt-tokenizer/encoding/cl100k_base';
import type { Tokenizer } from '../types/provider.js';

export const cl100kTokenizer: Tokenizer = {
  name: 'cl100k_base',
  encode: (text) => encode(text),
  decode: (tokens) => decode(tokens),
};

/**
 * Probe a tokenizer once with a round trip. Returns null when it is
 * unusable so callers can branch on availability instead of catching.
 */
export function checkTokenizer(tokenizer: Tokenizer = cl100kTokenizer): Tokenizer | null {
  try {
    const sample = 'tokenizer check';
    return tokenizer.decode(tokenizer.encode(sample)) === sample ? tokenizer : null;
  } catch {
    return null;
  }
}

export function approximateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}
