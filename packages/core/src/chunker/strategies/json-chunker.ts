import type { ChunkMetadata } from '../../types/chunk.js';
import { errorMessage } from '../../utils/logger.js';
import { isRecord } from '../../utils/safe-cast.js';
import { BaseChunker, spansToDrafts, type ChunkDraft } from '../base-chunker.js';
import { recursiveSpans } from './recursive-chunker.js';

function groupBySize<T>(items: readonly T[], serialize: (item: T) => string, budget: number): T[][] {
  const groups: T[][] = [];
  let current: T[] = [];
  let size = 2;
  for (const item of items) {
    const cost = serialize(item).length + 1;
    if (current.length > 0 && size + cost > budget) {
      groups.push(current);
      current = [];
      size = 2;
    }
    current.push(item);
    size += cost;
  }
  if (current.length > 0) groups.push(current);
  return groups;
}

/**
 * Splits parsed JSON along its structure: arrays by items, objects by
 * keys. Each chunk is valid JSON on its own. A single item larger than
 * `chunkSize` is kept whole. Offsets span the whole input since
 * re-serialised chunks do not map back to exact source ranges.
 * Input that does not parse is chunked recursively.
 */
export class JsonChunker extends BaseChunker {
  readonly strategy = 'json_aware' as const;

  async split(text: string, _metadata: ChunkMetadata): Promise<ChunkDraft[]> {
    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (error) {
      this.logger.warn('Invalid JSON, falling back to recursive chunking', { error: errorMessage(error) });
      return spansToDrafts(text, recursiveSpans(text, 0, text.length, this.config), { json_type: 'invalid' });
    }

    const whole = { startChar: 0, endChar: text.length };

    if (Array.isArray(parsed)) {
      if (parsed.length === 0) {
        return [{ text: '[]', ...whole, metadata: { json_type: 'array', item_count: 0, item_range: [0, 0] } }];
      }
      let offset = 0;
      return groupBySize(parsed, (item) => JSON.stringify(item) ?? 'null', this.config.chunkSize).map((items) => {
        const draft: ChunkDraft = {
          text: JSON.stringify(items),
          ...whole,
          metadata: { json_type: 'array', item_count: items.length, item_range: [offset, offset + items.length] },
        };
        offset += items.length;
        return draft;
      });
    }

    if (isRecord(parsed)) {
      const entries = Object.entries(parsed);
      if (entries.length === 0) {
        return [{ text: '{}', ...whole, metadata: { json_type: 'object', key_count: 0, keys: [] } }];
      }
      return groupBySize(entries, ([key, value]) => `${JSON.stringify(key)}:${JSON.stringify(value) ?? 'null'}`, this.config.chunkSize).map(
        (group) => ({
          text: JSON.stringify(Object.fromEntries(group)),
          ...whole,
          metadata: { json_type: 'object', key_count: group.length, keys: group.map(([key]) => key) },
        }),
      );
    }

    return [{ text: JSON.stringify(parsed), ...whole, metadata: { json_type: parsed === null ? 'null' : typeof parsed } }];
  }
}
