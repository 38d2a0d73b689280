import { ok, err, type Result } from 'neverthrow';
import { EmbedError, type EmbeddingProvider } from '../types/provider.js';
import { createLogger, errorMessage, type Logger } from '../utils/logger.js';
import { isNumberMatrix, safeRecord } from '../utils/safe-cast.js';
import { DEFAULT_EMBED_CONCURRENCY, embedInBatches, splitIntoBatches } from './batching.js';

export interface OllamaEmbeddingConfig {
  baseUrl: string;
  model: string;
  dimensions: number;
  timeout: number;
}

const DEFAULT_CONFIG: OllamaEmbeddingConfig = {
  baseUrl: 'http://localhost:11434',
  model: 'nomic-embed-text',
  dimensions: 768,
  timeout: 30_000,
};

const BATCH_SIZE = 50;

export class OllamaEmbeddingProvider implements EmbeddingProvider {
  private readonly config: OllamaEmbeddingConfig;
  private readonly logger: Logger;

  constructor(config?: Partial<OllamaEmbeddingConfig>, logger?: Logger) {
    const merged = { ...DEFAULT_CONFIG, ...config };
    // Strip trailing slashes from baseUrl
    merged.baseUrl = merged.baseUrl.replace(/\/+$/, '');
    this.config = merged;
    this.logger = logger ?? createLogger('fusekit:embedding');
  }

  get dimensions(): number {
    return this.config.dimensions;
  }

  async embed(texts: string[]): Promise<Result<number[][], EmbedError>> {
    if (texts.length === 0) {
      return ok([]);
    }

    const allEmbeddings: number[][] = [];
    for (const batch of splitIntoBatches(texts, BATCH_SIZE)) {
      const result = await this.request(batch);
      if (result.isErr()) {
        return err(result.error);
      }
      allEmbeddings.push(...result.value);
    }
    return ok(allEmbeddings);
  }

  async embedBatch(texts: string[], maxConcurrent = DEFAULT_EMBED_CONCURRENCY): Promise<number[][]> {
    return embedInBatches(texts, (batch) => this.request(batch), {
      batchSize: BATCH_SIZE,
      maxConcurrent,
      dimensions: this.config.dimensions,
      logger: this.logger,
    });
  }

  private async request(texts: string[]): Promise<Result<number[][], EmbedError>> {
    try {
      const response = await globalThis.fetch(`${this.config.baseUrl}/api/embed`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          model: this.config.model,
          input: texts,
        }),
        signal: AbortSignal.timeout(this.config.timeout),
      });

      if (!response.ok) {
        return err(new EmbedError(`Ollama embed API returned status ${response.status}: ${response.statusText}`));
      }

      const data = safeRecord(await response.json(), {});
      const embeddings = data['embeddings'];
      if (!isNumberMatrix(embeddings)) {
        return err(new EmbedError('Invalid response: embeddings is not an array'));
      }
      return ok(embeddings);
    } catch (error) {
      return err(new EmbedError(`Ollama embed request failed: ${errorMessage(error)}`));
    }
  }
}
