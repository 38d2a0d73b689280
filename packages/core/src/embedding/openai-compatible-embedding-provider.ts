import { ok, err, type Result } from 'neverthrow';
import { EmbedError, type EmbeddingProvider } from '../types/provider.js';
import { createLogger, errorMessage, type Logger } from '../utils/logger.js';
import { isNumberArray, isRecord, safeNumber, safeRecord } from '../utils/safe-cast.js';
import { DEFAULT_EMBED_CONCURRENCY, embedInBatches, splitIntoBatches } from './batching.js';

export interface OpenAICompatibleEmbeddingConfig {
  baseUrl: string;
  model: string;
  dimensions: number;
  apiKey?: string;
  maxBatchSize: number;
  timeout: number;
}

const DEFAULT_CONFIG: OpenAICompatibleEmbeddingConfig = {
  baseUrl: 'http://localhost:1234/v1',
  model: 'nomic-embed-text',
  dimensions: 768,
  maxBatchSize: 100,
  timeout: 60_000,
};

/** `data[]` of an embeddings response, ordered by `index`. */
function parseEmbeddings(body: unknown): number[][] | null {
  const data = safeRecord(body, {})['data'];
  if (!Array.isArray(data)) {
    return null;
  }
  const items: Array<{ index: number; embedding: number[] }> = [];
  for (const item of data) {
    const embedding: unknown = isRecord(item) ? item['embedding'] : undefined;
    if (!isRecord(item) || !isNumberArray(embedding)) {
      return null;
    }
    items.push({ index: safeNumber(item['index'], items.length), embedding });
  }
  return items.sort((a, b) => a.index - b.index).map((item) => item.embedding);
}

export class OpenAICompatibleEmbeddingProvider implements EmbeddingProvider {
  private readonly config: OpenAICompatibleEmbeddingConfig;
  private readonly logger: Logger;

  constructor(config?: Partial<OpenAICompatibleEmbeddingConfig>, logger?: Logger) {
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
    for (const batch of splitIntoBatches(texts, this.config.maxBatchSize)) {
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
      batchSize: this.config.maxBatchSize,
      maxConcurrent,
      dimensions: this.config.dimensions,
      logger: this.logger,
    });
  }

  private async request(texts: string[]): Promise<Result<number[][], EmbedError>> {
    try {
      const headers: Record<string, string> = {
        'Content-Type': 'application/json',
      };

      if (this.config.apiKey) {
        headers['Authorization'] = `Bearer ${this.config.apiKey}`;
      }

      const response = await globalThis.fetch(`${this.config.baseUrl}/embeddings`, {
        method: 'POST',
        headers,
        body: JSON.stringify({
          input: texts,
          model: this.config.model,
        }),
        signal: AbortSignal.timeout(this.config.timeout),
      });

      if (!response.ok) {
        const message = await this.extractErrorMessage(response);
        return err(
          new EmbedError(`OpenAI-compatible embedding API returned status ${response.status}: ${message}`),
        );
      }

      const embeddings = parseEmbeddings(await response.json());
      if (!embeddings) {
        return err(new EmbedError('Invalid response: data is not an array of embeddings'));
      }
      return ok(embeddings);
    } catch (error) {
      const message = errorMessage(error);

      if (message.includes('ECONNREFUSED') || message.includes('fetch failed')) {
        return err(
          new EmbedError(
            `Cannot connect to embedding server at ${this.config.baseUrl}. ` +
              `Ensure the server is running and accessible. Original error: ${message}`,
          ),
        );
      }

      if (message.includes('TimeoutError') || message.includes('timed out') || message.includes('abort')) {
        return err(
          new EmbedError(
            `Request to embedding server at ${this.config.baseUrl} timed out after ${this.config.timeout}ms. ` +
              `Original error: ${message}`,
          ),
        );
      }

      return err(new EmbedError(`OpenAI-compatible embed request failed: ${message}`));
    }
  }

  private async extractErrorMessage(response: Response): Promise<string> {
    try {
      const body = safeRecord(await response.json(), {});
      const message = safeRecord(body['error'], {})['message'];
      return typeof message === 'string' && message.length > 0 ? message : response.statusText;
    } catch {
      return response.statusText;
    }
  }
}
