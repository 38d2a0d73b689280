import type { ChunkMetadata } from '../../types/chunk.js';
import { BaseChunker, type ChunkDraft } from '../base-chunker.js';
import { recursiveSpans } from './recursive-chunker.js';

const SECTION_SEPARATORS: readonly string[] = ['\n\n\n', '\n\n'];

/**
 * Three-level tree: a root holding the first `maxChunkSize` characters,
 * sections of about twice `chunkSize`, and paragraphs inside any section
 * longer than `chunkSize`. `hierarchyLevels` caps the depth. Output is
 * depth-first so a section is followed by its own paragraphs.
 */
export class HierarchicalChunker extends BaseChunker {
  readonly strategy = 'hierarchical' as const;

  async split(text: string, _metadata: ChunkMetadata): Promise<ChunkDraft[]> {
    const { chunkSize, maxChunkSize, hierarchyLevels } = this.config;
    const rootEnd = Math.min(text.length, maxChunkSize);
    const drafts: ChunkDraft[] = [
      {
        text: text.slice(0, rootEnd),
        startChar: 0,
        endChar: rootEnd,
        metadata: { hierarchy_level: 0, is_truncated: rootEnd < text.length },
      },
    ];

    if (hierarchyLevels < 2) {
      return drafts;
    }

    const sectionSize = chunkSize * 2;
    const sections = recursiveSpans(text, 0, text.length, {
      chunkSize: sectionSize,
      chunkOverlap: Math.min(this.config.chunkOverlap, sectionSize - 1),
      minChunkSize: this.config.minChunkSize,
      separators: SECTION_SEPARATORS,
      keepSeparator: this.config.keepSeparator,
    });

    sections.forEach((section, sectionIndex) => {
      const sectionDraftIndex = drafts.length;
      drafts.push({
        text: text.slice(section.start, section.end),
        startChar: section.start,
        endChar: section.end,
        parentIndex: 0,
        metadata: { hierarchy_level: 1, section_index: sectionIndex },
      });

      if (hierarchyLevels < 3 || section.end - section.start <= chunkSize) {
        return;
      }

      for (const paragraph of recursiveSpans(text, section.start, section.end, this.config)) {
        drafts.push({
          text: text.slice(paragraph.start, paragraph.end),
          startChar: paragraph.start,
          endChar: paragraph.end,
          parentIndex: sectionDraftIndex,
          metadata: { hierarchy_level: 2, section_index: sectionIndex },
        });
      }
    });

    return drafts;
  }
}
