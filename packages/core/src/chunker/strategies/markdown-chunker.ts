import type { ChunkMetadata } from '../../types/chunk.js';
import { BaseChunker, type ChunkDraft } from '../base-chunker.js';
import { splitParagraphs, trimSpan, type TextSpan } from '../text-spans.js';
import { recursiveSpans } from './recursive-chunker.js';

const FENCED_BLOCK = /```[\s\S]*?```|~~~[\s\S]*?~~~/g;
const HEADING = /^(#{1,6})[ \t]+(.+?)[ \t]*#*[ \t]*$/gm;

interface Section {
  start: number;
  end: number;
  level: number;
  title: string;
  /** End of the heading line; equals `start` for the untitled preamble. */
  bodyStart: number;
}

/**
 * Replace fenced code blocks with same-length filler so headings and blank
 * lines inside code are invisible while offsets still line up.
 */
export function maskCodeBlocks(text: string): string {
  return text.replace(FENCED_BLOCK, (block) => 'x'.repeat(block.length));
}

function findSections(text: string, masked: string): Section[] {
  const headings = [...masked.matchAll(HEADING)].map((match) => {
    const start = match.index ?? 0;
    return {
      start,
      lineEnd: start + match[0].length,
      level: match[1]?.length ?? 1,
      title: text.slice(start, start + match[0].length).replace(/^#{1,6}[ \t]+/, '').replace(/[ \t]*#*[ \t]*$/, ''),
    };
  });

  const sections: Section[] = [];
  const firstHeading = headings[0];
  const preambleEnd = firstHeading ? firstHeading.start : text.length;
  if (text.slice(0, preambleEnd).trim().length > 0) {
    sections.push({ start: 0, end: preambleEnd, level: 0, title: '', bodyStart: 0 });
  }

  headings.forEach((heading, i) => {
    const next = headings[i + 1];
    sections.push({
      start: heading.start,
      end: next ? next.start : text.length,
      level: heading.level,
      title: heading.title,
      bodyStart: heading.lineEnd,
    });
  });

  return sections;
}

/** Splits by headings, keeping fenced code intact and repeating the heading on continuation chunks. */
export class MarkdownChunker extends BaseChunker {
  readonly strategy = 'markdown_aware' as const;

  async split(text: string, _metadata: ChunkMetadata): Promise<ChunkDraft[]> {
    const masked = maskCodeBlocks(text);
    const drafts: ChunkDraft[] = [];

    for (const section of findSections(text, masked)) {
      const sectionMeta: ChunkMetadata = {
        section_title: section.title,
        section_level: section.level,
      };

      if (section.end - section.start <= this.config.chunkSize) {
        drafts.push({
          text: text.slice(section.start, section.end),
          startChar: section.start,
          endChar: section.end,
          metadata: sectionMeta,
        });
        continue;
      }

      drafts.push(...this.splitSection(text, masked, section, sectionMeta));
    }

    return drafts;
  }

  private splitSection(text: string, masked: string, section: Section, sectionMeta: ChunkMetadata): ChunkDraft[] {
    const headingLine = text.slice(section.start, section.bodyStart).trim();
    const prefix = headingLine.length > 0 ? `${headingLine}\n\n` : '';
    const budget = Math.max(Math.floor(this.config.chunkSize / 2), this.config.chunkSize - prefix.length);

    // Paragraph boundaries come from the masked text so code blocks stay whole.
    const paragraphs: TextSpan[] = splitParagraphs(masked, section.bodyStart, section.end).map((span) => ({
      ...span,
      text: text.slice(span.start, span.end),
    }));

    const parts: Array<{ start: number; end: number }> = [];
    let groupStart = -1;
    let groupEnd = -1;
    const flush = (): void => {
      if (groupStart !== -1) {
        parts.push({ start: groupStart, end: groupEnd });
        groupStart = -1;
      }
    };

    for (const paragraph of paragraphs) {
      if (paragraph.end - paragraph.start > budget) {
        flush();
        parts.push(
          ...recursiveSpans(text, paragraph.start, paragraph.end, {
            ...this.config,
            chunkSize: budget,
            chunkOverlap: Math.min(this.config.chunkOverlap, budget - 1),
            minChunkSize: Math.min(this.config.minChunkSize, budget),
          }),
        );
        continue;
      }
      if (groupStart !== -1 && paragraph.end - groupStart > budget) {
        flush();
      }
      if (groupStart === -1) groupStart = paragraph.start;
      groupEnd = paragraph.end;
    }
    flush();

    if (parts.length === 0) {
      const whole = trimSpan(text, section.start, section.end);
      return whole
        ? [{ text: whole.text, startChar: whole.start, endChar: whole.end, metadata: sectionMeta }]
        : [];
    }

    return parts.map((part, index) => {
      const body = text.slice(part.start, part.end);
      return {
        text: `${prefix}${body}`,
        // The first part owns the heading line itself.
        startChar: index === 0 ? section.start : part.start,
        endChar: part.end,
        metadata: { ...sectionMeta, section_part: index },
      };
    });
  }
}
