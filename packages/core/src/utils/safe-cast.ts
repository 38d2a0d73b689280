/**
 * Runtime narrowing for values read back from stores, config files and
 * third-party responses. Each helper returns the fallback when given one,
 * otherwise throws a TypeError naming what it got.
 */

function describe(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

export function safeString(value: unknown, fallback?: string): string {
  if (typeof value === 'string') {
    return value;
  }
  if (fallback !== undefined) {
    return fallback;
  }
  throw new TypeError(`Expected string, got ${describe(value)}`);
}

export function safeNumber(value: unknown, fallback?: number): number {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return value;
  }
  if (fallback !== undefined) {
    return fallback;
  }
  throw new TypeError(`Expected number, got ${describe(value)}`);
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

export function safeRecord(
  value: unknown,
  fallback?: Record<string, unknown>,
): Record<string, unknown> {
  if (isRecord(value)) {
    return value;
  }
  if (fallback !== undefined) {
    return fallback;
  }
  throw new TypeError(`Expected record (object), got ${describe(value)}`);
}

export function safeArray(value: unknown, fallback?: unknown[]): unknown[] {
  if (Array.isArray(value)) {
    return value;
  }
  if (fallback !== undefined) {
    return fallback;
  }
  throw new TypeError(`Expected array, got ${describe(value)}`);
}

export function isNumberArray(value: unknown): value is number[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'number');
}

/** A list of vectors, e.g. an embeddings response. */
export function isNumberMatrix(value: unknown): value is number[][] {
  return Array.isArray(value) && value.every(isNumberArray);
}

/** A dense numeric vector, e.g. an embedding returned by a store. */
export function safeNumberArray(value: unknown, fallback?: number[]): number[] {
  if (isNumberArray(value)) {
    return value;
  }
  if (fallback !== undefined) {
    return fallback;
  }
  throw new TypeError(`Expected number[], got ${describe(value)}`);
}

export function safeStringUnion<T extends string>(
  value: unknown,
  allowed: readonly T[],
  fallback?: T,
): T {
  if (typeof value === 'string') {
    const matched = allowed.find((item) => item === value);
    if (matched !== undefined) {
      return matched;
    }
  }
  if (fallback !== undefined) {
    return fallback;
  }
  throw new TypeError(
    `Expected one of [${allowed.join(', ')}], got ${typeof value === 'string' ? `"${value}"` : describe(value)}`,
  );
}
