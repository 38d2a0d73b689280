import type { ChunkMetadata } from '../../types/chunk.js';
import { BaseChunker, type ChunkDraft } from '../base-chunker.js';
import { splitLines, type TextSpan } from '../text-spans.js';
import { recursiveSpans } from './recursive-chunker.js';

const TABLE_ROW = /^\s*\|.*\|\s*$/;
const SEPARATOR_ROW = /^\s*\|(\s*:?-{1,}:?\s*\|)+\s*$/;

interface Block {
  start: number;
  end: number;
  lines: TextSpan[];
  isTable: boolean;
}

function findBlocks(text: string): Block[] {
  const blocks: Block[] = [];
  for (const line of splitLines(text)) {
    const isTable = TABLE_ROW.test(line.text);
    const last = blocks[blocks.length - 1];
    if (last && last.isTable === isTable) {
      last.end = line.end;
      last.lines.push(line);
    } else {
      blocks.push({ start: line.start, end: line.end, lines: [line], isTable });
    }
  }
  return blocks;
}

/**
 * Keeps markdown tables whole. Tables over `chunkSize` are split by rows
 * with the header rows repeated on every part; text around tables is
 * chunked recursively.
 */
export class TableChunker extends BaseChunker {
  readonly strategy = 'table_aware' as const;

  async split(text: string, _metadata: ChunkMetadata): Promise<ChunkDraft[]> {
    const drafts: ChunkDraft[] = [];

    for (const block of findBlocks(text)) {
      if (!block.isTable || !this.config.preserveTables) {
        for (const span of recursiveSpans(text, block.start, block.end, this.config)) {
          drafts.push({
            text: text.slice(span.start, span.end),
            startChar: span.start,
            endChar: span.end,
            metadata: { contains_table: false },
          });
        }
        continue;
      }

      if (block.end - block.start <= this.config.chunkSize) {
        drafts.push({
          text: text.slice(block.start, block.end),
          startChar: block.start,
          endChar: block.end,
          metadata: { contains_table: true, is_partial_table: false, row_count: block.lines.length },
        });
        continue;
      }

      drafts.push(...this.splitTable(text, block));
    }

    return drafts;
  }

  private splitTable(text: string, block: Block): ChunkDraft[] {
    const second = block.lines[1];
    const headerCount = second && SEPARATOR_ROW.test(second.text) ? 2 : 1;
    const header = block.lines.slice(0, headerCount);
    const rows = block.lines.slice(headerCount);
    const headerText = header.map((line) => line.text).join('\n');
    const budget = Math.max(1, this.config.chunkSize - headerText.length - 1);

    const parts: TextSpan[][] = [];
    let current: TextSpan[] = [];
    let size = 0;
    for (const row of rows) {
      const cost = row.text.length + 1;
      if (current.length > 0 && size + cost > budget) {
        parts.push(current);
        current = [];
        size = 0;
      }
      current.push(row);
      size += cost;
    }
    if (current.length > 0) parts.push(current);

    return parts.map((part, index) => {
      const first = part[0];
      const last = part[part.length - 1];
      return {
        text: `${headerText}\n${part.map((row) => row.text).join('\n')}`,
        startChar: index === 0 ? block.start : first?.start ?? block.start,
        endChar: last?.end ?? block.end,
        metadata: {
          contains_table: true,
          is_partial_table: parts.length > 1,
          table_part: index,
          row_count: part.length,
        },
      };
    });
  }
}
