import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { ok, err, type Result } from 'neverthrow';
import { parse } from 'yaml';
import { z } from 'zod';
import { CHUNKING_STRATEGIES } from '../types/chunk.js';
import type { FusekitConfig } from '../types/config.js';
import { errorMessage } from '../utils/logger.js';
import { isRecord, safeRecord } from '../utils/safe-cast.js';

export const CONFIG_FILE_NAME = '.fusekit.yaml';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

// --- Zod Schemas ---

const chunkingSchema = z
  .object({
    strategy: z.enum(CHUNKING_STRATEGIES),
    chunkSize: z.number().int('chunkSize must be an integer').positive('chunkSize must be positive'),
    chunkOverlap: z.number().int('chunkOverlap must be an integer').nonnegative('chunkOverlap must not be negative'),
    minChunkSize: z.number().int().positive().optional(),
    maxChunkSize: z.number().int().positive().optional(),
    similarityThreshold: z.number().min(0, 'similarityThreshold must be between 0 and 1').max(1, 'similarityThreshold must be between 0 and 1'),
    useEmbeddings: z.boolean(),
    tokenLimit: z.number().int().positive('tokenLimit must be positive'),
    hierarchyLevels: z.number().int().min(1, 'hierarchyLevels must be between 1 and 3').max(3, 'hierarchyLevels must be between 1 and 3'),
    maxConcurrent: z.number().int().positive('maxConcurrent must be positive'),
  })
  .refine((chunking) => chunking.chunkOverlap < chunking.chunkSize, {
    message: 'chunkOverlap must be smaller than chunkSize',
    path: ['chunkOverlap'],
  });

const unitInterval = (name: string) =>
  z.number().min(0, `${name} must be between 0 and 1`).max(1, `${name} must be between 0 and 1`);

const searchSchema = z.object({
  topK: z.number().int('topK must be an integer').positive('topK must be positive'),
  searchMode: z.enum(['semantic', 'lexical', 'hybrid']),
  rankingMethod: z.enum(['rrf', 'weighted', 'mmr']),
  semanticWeight: unitInterval('semanticWeight'),
  lexicalWeight: unitInterval('lexicalWeight'),
  mmrLambda: unitInterval('mmrLambda'),
  includeEmbeddings: z.boolean(),
});

const rerankerSchema = z.object({
  enabled: z.boolean(),
  lambdaParam: unitInterval('lambdaParam'),
  useSemanticDiversity: z.boolean(),
  useLexicalDiversity: z.boolean(),
  useMetadataDiversity: z.boolean(),
  maxIterations: z.number().int().positive('maxIterations must be positive'),
});

const embeddingSchema = z.object({
  provider: z.enum(['ollama', 'openai-compatible']),
  model: z.string().min(1, 'Embedding model must not be empty'),
  dimensions: z.number().int('Dimensions must be an integer').positive('Dimensions must be positive'),
  baseUrl: z.string().url().optional(),
  apiKey: z.string().optional(),
  maxBatchSize: z.number().int().positive().optional(),
  timeout: z.number().int().positive().optional(),
});

const storageSchema = z.object({
  provider: z.enum(['memory', 'qdrant', 'chroma']),
  path: z.string().min(1, 'Storage path must not be empty'),
  qdrant: z
    .object({
      url: z.string().min(1).optional(),
      collectionName: z.string().min(1).optional(),
      apiKey: z.string().optional(),
    })
    .optional(),
  chroma: z
    .object({
      url: z.string().min(1).optional(),
      collectionName: z.string().min(1).optional(),
    })
    .optional(),
});

const serviceSchema = z.object({
  useFallback: z.boolean(),
  fallbackCandidateLimit: z.number().int().positive('fallbackCandidateLimit must be positive'),
  maxConcurrent: z.number().int().positive('maxConcurrent must be positive'),
});

const loggingSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error', 'silent']),
});

const fusekitConfigSchema = z.object({
  version: z.string().min(1, 'Version must not be empty'),
  chunking: chunkingSchema,
  search: searchSchema,
  reranker: rerankerSchema,
  embedding: embeddingSchema,
  storage: storageSchema,
  service: serviceSchema,
  logging: loggingSchema,
});

// --- Defaults ---

export const DEFAULT_CONFIG: FusekitConfig = {
  version: '1',
  chunking: {
    strategy: 'recursive',
    chunkSize: 1000,
    chunkOverlap: 100,
    similarityThreshold: 0.7,
    useEmbeddings: false,
    tokenLimit: 512,
    hierarchyLevels: 3,
    maxConcurrent: 5,
  },
  search: {
    topK: 5,
    searchMode: 'semantic',
    rankingMethod: 'rrf',
    semanticWeight: 0.7,
    lexicalWeight: 0.3,
    mmrLambda: 0.5,
    includeEmbeddings: false,
  },
  reranker: {
    enabled: false,
    lambdaParam: 0.5,
    useSemanticDiversity: true,
    useLexicalDiversity: true,
    useMetadataDiversity: false,
    maxIterations: 100,
  },
  embedding: {
    provider: 'ollama',
    model: 'nomic-embed-text',
    dimensions: 768,
  },
  storage: {
    provider: 'memory',
    path: '.fusekit',
  },
  service: {
    useFallback: true,
    fallbackCandidateLimit: 1000,
    maxConcurrent: 5,
  },
  logging: {
    level: 'warn',
  },
};

// --- Environment variable interpolation ---

/** `${NAME}` reads the environment; `\${NAME}` stays as the literal `${NAME}`. */
const ENV_VAR_PATTERN = /\\?\$\{([^}]+)\}/g;

function interpolateString(value: string, env: NodeJS.ProcessEnv): Result<string, ConfigError> {
  const missing: string[] = [];
  const resolved = value.replace(ENV_VAR_PATTERN, (match: string, name: string) => {
    if (match.startsWith('\\')) {
      return match.slice(1);
    }
    const envValue = env[name];
    if (envValue === undefined) {
      missing.push(name);
      return match;
    }
    return envValue;
  });

  if (missing.length > 0) {
    return err(new ConfigError(`Missing environment variable(s): ${missing.join(', ')}`));
  }
  return ok(resolved);
}

export function interpolateEnvVars(value: unknown, env: NodeJS.ProcessEnv = process.env): Result<unknown, ConfigError> {
  if (typeof value === 'string') {
    return interpolateString(value, env);
  }
  if (Array.isArray(value)) {
    const result: unknown[] = [];
    for (const item of value) {
      const interpolated = interpolateEnvVars(item, env);
      if (interpolated.isErr()) return err(interpolated.error);
      result.push(interpolated.value);
    }
    return ok(result);
  }
  if (isRecord(value)) {
    const result: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      const interpolated = interpolateEnvVars(item, env);
      if (interpolated.isErr()) return err(interpolated.error);
      result[key] = interpolated.value;
    }
    return ok(result);
  }
  return ok(value);
}

// --- Helpers ---

export function formatZodErrors(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join('.') : 'root';
      return `${path}: ${issue.message}`;
    })
    .join('; ');
}

/** Shallow-merge each section over its defaults; unknown sections are dropped. */
function applyDefaults(partial: Record<string, unknown>): Record<string, unknown> {
  const section = (name: keyof FusekitConfig): Record<string, unknown> => safeRecord(partial[name], {});
  return {
    version: partial['version'] ?? DEFAULT_CONFIG.version,
    chunking: { ...DEFAULT_CONFIG.chunking, ...section('chunking') },
    search: { ...DEFAULT_CONFIG.search, ...section('search') },
    reranker: { ...DEFAULT_CONFIG.reranker, ...section('reranker') },
    embedding: { ...DEFAULT_CONFIG.embedding, ...section('embedding') },
    storage: { ...DEFAULT_CONFIG.storage, ...section('storage') },
    service: { ...DEFAULT_CONFIG.service, ...section('service') },
    logging: { ...DEFAULT_CONFIG.logging, ...section('logging') },
  };
}

// --- Main ---

/** Parse and validate YAML config text. */
export function parseConfig(content: string, env: NodeJS.ProcessEnv = process.env): Result<FusekitConfig, ConfigError> {
  let parsed: unknown;
  try {
    parsed = parse(content);
  } catch (error: unknown) {
    return err(new ConfigError(`Invalid YAML in config file: ${errorMessage(error)}`));
  }

  if (!isRecord(parsed)) {
    return err(new ConfigError('Config file is empty or not a valid YAML object'));
  }

  // Interpolate environment variables (e.g. ${QDRANT_API_KEY} -> process.env.QDRANT_API_KEY)
  const interpolated = interpolateEnvVars(parsed, env);
  if (interpolated.isErr()) {
    return err(interpolated.error);
  }

  const validationResult = fusekitConfigSchema.safeParse(applyDefaults(safeRecord(interpolated.value, {})));
  if (!validationResult.success) {
    return err(new ConfigError(`Config validation failed: ${formatZodErrors(validationResult.error)}`));
  }

  return ok(validationResult.data);
}

export interface LoadConfigOptions {
  /** Return the defaults instead of an error when the file does not exist. */
  allowMissing?: boolean;
  env?: NodeJS.ProcessEnv;
}

export async function loadConfig(
  rootDir: string,
  options: LoadConfigOptions = {},
): Promise<Result<FusekitConfig, ConfigError>> {
  const configPath = join(rootDir, CONFIG_FILE_NAME);

  let content: string;
  try {
    content = await readFile(configPath, 'utf-8');
  } catch {
    return options.allowMissing
      ? ok(structuredClone(DEFAULT_CONFIG))
      : err(new ConfigError(`Config file not found: ${configPath}`));
  }

  return parseConfig(content, options.env);
}
