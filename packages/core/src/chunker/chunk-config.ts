import { ok, err, type Result } from 'neverthrow';
import { z } from 'zod';
import { CHUNKING_STRATEGIES, type ChunkConfig } from '../types/chunk.js';

export class ChunkConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ChunkConfigError';
  }
}

export const DEFAULT_SEPARATORS: readonly string[] = ['\n\n', '\n', '. ', '! ', '? ', '; ', ', ', ' ', ''];

const DEFAULT_CHUNK_SIZE = 1000;
const DEFAULT_MIN_CHUNK_SIZE = 100;
const DEFAULT_MAX_CHUNK_SIZE = 3000;

const chunkConfigSchema = z
  .object({
    strategy: z.enum(CHUNKING_STRATEGIES),
    chunkSize: z.number().int('chunkSize must be an integer').positive('chunkSize must be positive'),
    chunkOverlap: z.number().int('chunkOverlap must be an integer').min(0, 'chunkOverlap must not be negative'),
    minChunkSize: z.number().int('minChunkSize must be an integer').min(0, 'minChunkSize must not be negative'),
    maxChunkSize: z.number().int('maxChunkSize must be an integer').positive('maxChunkSize must be positive'),
    separators: z.array(z.string()),
    keepSeparator: z.boolean(),
    stripWhitespace: z.boolean(),
    similarityThreshold: z.number().min(0, 'similarityThreshold must be between 0 and 1').max(1, 'similarityThreshold must be between 0 and 1'),
    useEmbeddings: z.boolean(),
    tokenLimit: z.number().int('tokenLimit must be an integer').positive('tokenLimit must be positive'),
    hierarchyLevels: z.number().int('hierarchyLevels must be an integer').min(1, 'hierarchyLevels must be between 1 and 3').max(3, 'hierarchyLevels must be between 1 and 3'),
    preserveTables: z.boolean(),
  })
  .superRefine((config, ctx) => {
    if (config.chunkOverlap >= config.chunkSize) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['chunkOverlap'],
        message: `chunkOverlap (${config.chunkOverlap}) must be smaller than chunkSize (${config.chunkSize})`,
      });
    }
    if (config.minChunkSize > config.chunkSize) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['minChunkSize'],
        message: `minChunkSize (${config.minChunkSize}) must not exceed chunkSize (${config.chunkSize})`,
      });
    }
    if (config.maxChunkSize < config.chunkSize) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['maxChunkSize'],
        message: `maxChunkSize (${config.maxChunkSize}) must not be smaller than chunkSize (${config.chunkSize})`,
      });
    }
  });

function formatZodErrors(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join('.') : 'root';
      return `${path}: ${issue.message}`;
    })
    .join('; ');
}

/**
 * Build a frozen ChunkConfig. `minChunkSize` and `maxChunkSize` default
 * relative to `chunkSize` so small chunk sizes stay valid without
 * spelling out every bound.
 */
export function createChunkConfig(
  overrides: Partial<ChunkConfig> = {},
): Result<ChunkConfig, ChunkConfigError> {
  const chunkSize = overrides.chunkSize ?? DEFAULT_CHUNK_SIZE;
  const candidate = {
    strategy: overrides.strategy ?? 'recursive',
    chunkSize,
    chunkOverlap: overrides.chunkOverlap ?? Math.min(100, Math.floor(chunkSize / 10)),
    minChunkSize: overrides.minChunkSize ?? Math.min(DEFAULT_MIN_CHUNK_SIZE, chunkSize),
    maxChunkSize: overrides.maxChunkSize ?? Math.max(DEFAULT_MAX_CHUNK_SIZE, chunkSize),
    separators: [...(overrides.separators ?? DEFAULT_SEPARATORS)],
    keepSeparator: overrides.keepSeparator ?? true,
    stripWhitespace: overrides.stripWhitespace ?? true,
    similarityThreshold: overrides.similarityThreshold ?? 0.7,
    useEmbeddings: overrides.useEmbeddings ?? false,
    tokenLimit: overrides.tokenLimit ?? 512,
    hierarchyLevels: overrides.hierarchyLevels ?? 3,
    preserveTables: overrides.preserveTables ?? true,
  };

  const parsed = chunkConfigSchema.safeParse(candidate);
  if (!parsed.success) {
    return err(new ChunkConfigError(`Invalid chunk config: ${formatZodErrors(parsed.error)}`));
  }

  return ok(
    Object.freeze({
      ...parsed.data,
      separators: Object.freeze([...parsed.data.separators]),
    }),
  );
}

function buildDefaultConfig(): ChunkConfig {
  const result = createChunkConfig();
  if (result.isErr()) {
    throw result.error;
  }
  return result.value;
}

export const DEFAULT_CHUNK_CONFIG: ChunkConfig = buildDefaultConfig();

/** Stable cache key: two configs with equal values share a chunker. */
export function chunkConfigKey(config: ChunkConfig): string {
  return JSON.stringify([
    config.strategy,
    config.chunkSize,
    config.chunkOverlap,
    config.minChunkSize,
    config.maxChunkSize,
    config.separators,
    config.keepSeparator,
    config.stripWhitespace,
    config.similarityThreshold,
    config.useEmbeddings,
    config.tokenLimit,
    config.hierarchyLevels,
    config.preserveTables,
  ]);
}

/** Copy of `config` with some fields replaced; used by strategies that delegate. */
export function deriveChunkConfig(config: ChunkConfig, changes: Partial<ChunkConfig>): ChunkConfig {
  const next = { ...config, ...changes };
  return Object.freeze({
    ...next,
    minChunkSize: Math.min(next.minChunkSize, next.chunkSize),
    chunkOverlap: Math.min(next.chunkOverlap, Math.max(0, next.chunkSize - 1)),
    separators: Object.freeze([...next.separators]),
  });
}
