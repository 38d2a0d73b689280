import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { join, resolve, sep } from 'node:path';
import { ok, err, type Result } from 'neverthrow';
import { ChunkingService } from './chunker/chunking-service.js';
import { loadConfig } from './config/config-parser.js';
import { OllamaEmbeddingProvider } from './embedding/ollama-embedding-provider.js';
import { OpenAICompatibleEmbeddingProvider } from './embedding/openai-compatible-embedding-provider.js';
import { createEmbeddingSimilarityFinder } from './embedding/similarity-finder.js';
import { MMRReranker } from './retrieval/mmr-reranker.js';
import { HybridSearchService } from './search/hybrid-search-service.js';
import type { EmbeddingSettings, FusekitConfig, StorageSettings } from './types/config.js';
import type { EmbeddingProvider } from './types/provider.js';
import { createLogger, errorMessage, type Logger } from './utils/logger.js';
import type { BaseVectorDB } from './vector-db/base-vector-db.js';
import { ChromaVectorDB } from './vector-db/chroma-vector-db.js';
import { InMemoryVectorDB } from './vector-db/in-memory-vector-db.js';
import { QdrantVectorDB } from './vector-db/qdrant-vector-db.js';

export const MEMORY_STORE_FILE = 'memory-store.json';

export class RuntimeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RuntimeError';
  }
}

export interface RuntimeOptions {
  rootDir: string;
  /** Use this instead of reading `.fusekit.yaml`. */
  config?: FusekitConfig;
  logger?: Logger;
  embeddingProvider?: EmbeddingProvider;
  vectorDb?: BaseVectorDB;
}

/** Every long-lived instance the CLI and library callers need, built from one config. */
export interface Runtime {
  readonly rootDir: string;
  readonly config: FusekitConfig;
  readonly storagePath: string;
  readonly logger: Logger;
  readonly embeddingProvider: EmbeddingProvider;
  readonly vectorDb: BaseVectorDB;
  readonly chunking: ChunkingService;
  readonly reranker: MMRReranker;
  readonly search: HybridSearchService;
  /** Persist the in-memory store; `ok(null)` for remote backends. */
  save(): Promise<Result<string | null, RuntimeError>>;
  close(): Promise<void>;
}

export function createEmbeddingProvider(settings: EmbeddingSettings, logger: Logger): EmbeddingProvider {
  switch (settings.provider) {
    case 'openai-compatible':
      return new OpenAICompatibleEmbeddingProvider(
        {
          model: settings.model,
          dimensions: settings.dimensions,
          ...(settings.baseUrl ? { baseUrl: settings.baseUrl } : {}),
          ...(settings.apiKey ? { apiKey: settings.apiKey } : {}),
          ...(settings.maxBatchSize ? { maxBatchSize: settings.maxBatchSize } : {}),
          ...(settings.timeout ? { timeout: settings.timeout } : {}),
        },
        logger,
      );
    case 'ollama':
      return new OllamaEmbeddingProvider(
        {
          model: settings.model,
          dimensions: settings.dimensions,
          ...(settings.baseUrl ? { baseUrl: settings.baseUrl } : {}),
          ...(settings.timeout ? { timeout: settings.timeout } : {}),
        },
        logger,
      );
  }
}

/** Open the configured backend. The in-memory store is restored from its snapshot when one exists. */
export async function createVectorDB(
  settings: StorageSettings,
  storagePath: string,
  dimensions: number,
  logger: Logger,
): Promise<Result<BaseVectorDB, RuntimeError>> {
  switch (settings.provider) {
    case 'qdrant':
      return ok(new QdrantVectorDB({ dimensions, logger, ...settings.qdrant }));
    case 'chroma':
      return ok(new ChromaVectorDB({ dimensions, logger, ...settings.chroma }));
    case 'memory': {
      const snapshotPath = join(storagePath, MEMORY_STORE_FILE);
      let snapshot: string;
      try {
        snapshot = await readFile(snapshotPath, 'utf-8');
      } catch {
        return ok(new InMemoryVectorDB({ dimensions, logger }));
      }
      const restored = InMemoryVectorDB.fromJSON(snapshot, { dimensions, logger });
      if (restored.isErr()) {
        return err(new RuntimeError(`Could not load ${snapshotPath}: ${restored.error.message}`));
      }
      logger.debug('Restored in-memory store', { path: snapshotPath, vectors: restored.value.size });
      return ok(restored.value);
    }
  }
}

export async function createRuntime(options: RuntimeOptions): Promise<Result<Runtime, RuntimeError>> {
  const rootDir = resolve(options.rootDir);

  let config = options.config;
  if (!config) {
    const loaded = await loadConfig(rootDir, { allowMissing: true });
    if (loaded.isErr()) {
      return err(new RuntimeError(loaded.error.message));
    }
    config = loaded.value;
  }

  const storagePath = resolve(rootDir, config.storage.path);
  // Prevent path traversal outside project root
  if (!storagePath.startsWith(rootDir + sep) && storagePath !== rootDir) {
    return err(new RuntimeError(`Storage path escapes project root: ${config.storage.path}`));
  }

  const logger = options.logger ?? createLogger('fusekit', { level: config.logging.level });
  const embeddingProvider = options.embeddingProvider ?? createEmbeddingProvider(config.embedding, logger.child('embedding'));

  let vectorDb = options.vectorDb;
  if (!vectorDb) {
    const opened = await createVectorDB(
      config.storage,
      storagePath,
      embeddingProvider.dimensions,
      logger.child('vector-db'),
    );
    if (opened.isErr()) {
      return err(opened.error);
    }
    vectorDb = opened.value;
  }

  const { strategy: _strategy, maxConcurrent, ...chunkDefaults } = config.chunking;
  const chunking = new ChunkingService({
    logger: logger.child('chunking'),
    embeddingProvider,
    defaults: chunkDefaults,
    maxConcurrent,
  });

  const reranker = new MMRReranker({
    lambdaParam: config.reranker.lambdaParam,
    useSemanticDiversity: config.reranker.useSemanticDiversity,
    useLexicalDiversity: config.reranker.useLexicalDiversity,
    useMetadataDiversity: config.reranker.useMetadataDiversity,
    maxIterations: config.reranker.maxIterations,
  });

  const search = new HybridSearchService({
    vectorDb,
    similarityFinder: createEmbeddingSimilarityFinder(embeddingProvider),
    reranker,
    logger: logger.child('search'),
    useFallback: config.service.useFallback,
    fallbackCandidateLimit: config.service.fallbackCandidateLimit,
    maxConcurrent: config.service.maxConcurrent,
  });

  const db = vectorDb;
  return ok({
    rootDir,
    config,
    storagePath,
    logger,
    embeddingProvider,
    vectorDb: db,
    chunking,
    reranker,
    search,
    async save() {
      if (!(db instanceof InMemoryVectorDB)) {
        return ok(null);
      }
      const snapshotPath = join(storagePath, MEMORY_STORE_FILE);
      try {
        await mkdir(storagePath, { recursive: true });
        await writeFile(snapshotPath, db.toJSON(), 'utf-8');
        return ok(snapshotPath);
      } catch (error) {
        return err(new RuntimeError(`Could not write ${snapshotPath}: ${errorMessage(error)}`));
      }
    },
    async close() {
      chunking.clearCache();
      await db.close();
    },
  });
}
