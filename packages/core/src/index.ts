export * from './types/index.js';

export {
  CONFIG_FILE_NAME,
  ConfigError,
  DEFAULT_CONFIG,
  formatZodErrors,
  interpolateEnvVars,
  loadConfig,
  parseConfig,
} from './config/config-parser.js';
export type { LoadConfigOptions } from './config/config-parser.js';

export * from './chunker/index.js';
export * from './embedding/index.js';
export * from './vector-db/index.js';
export * from './retrieval/index.js';
export * from './search/index.js';

export { LOG_LEVELS, createLogger, errorMessage, silentLogger } from './utils/logger.js';
export type { LogContext, LogLevel, Logger, LoggerOptions } from './utils/logger.js';
export { Semaphore, mapWithConcurrency } from './utils/semaphore.js';
export {
  cosineSimilarity,
  isZeroVector,
  jaccardSimilarity,
  minMaxNormalize,
  wordSet,
} from './utils/similarity.js';

export {
  MEMORY_STORE_FILE,
  RuntimeError,
  createEmbeddingProvider,
  createRuntime,
  createVectorDB,
} from './runtime.js';
export type { Runtime, RuntimeOptions } from './runtime.js';
