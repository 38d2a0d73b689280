import type { ChunkMetadata } from '../../types/chunk.js';
import { BaseChunker, type ChunkDraft } from '../base-chunker.js';
import { fixedSizeSpans, splitLines, type Span, type TextSpan } from '../text-spans.js';

export const CODE_LANGUAGES = ['python', 'javascript', 'typescript', 'java', 'go', 'rust'] as const;
export type CodeLanguage = (typeof CODE_LANGUAGES)[number];

type CodeType = 'function' | 'class' | 'interface';

interface StructurePattern {
  pattern: RegExp;
  codeType: CodeType;
}

const JS_PATTERNS: StructurePattern[] = [
  { pattern: /^(export\s+)?(default\s+)?(async\s+)?function\*?\s*\w*\s*[(<]/, codeType: 'function' },
  { pattern: /^(export\s+)?(default\s+)?(abstract\s+)?class\s+\w+/, codeType: 'class' },
  { pattern: /^(export\s+)?(const|let|var)\s+\w+\s*(:[^=]+)?=\s*(async\s+)?(function\b|\([^)]*\)\s*(:\s*[^=]+)?=>|\w+\s*=>)/, codeType: 'function' },
];

const STRUCTURE_PATTERNS: Record<CodeLanguage, StructurePattern[]> = {
  python: [
    { pattern: /^(async\s+)?def\s+\w+/, codeType: 'function' },
    { pattern: /^class\s+\w+/, codeType: 'class' },
  ],
  javascript: JS_PATTERNS,
  typescript: [
    ...JS_PATTERNS,
    { pattern: /^(export\s+)?(declare\s+)?interface\s+\w+/, codeType: 'interface' },
  ],
  java: [
    { pattern: /^((public|private|protected|abstract|final|static|sealed)\s+)*(class|interface|enum|record)\s+\w+/, codeType: 'class' },
  ],
  go: [
    { pattern: /^func\s+(\([^)]*\)\s*)?\w+/, codeType: 'function' },
    { pattern: /^type\s+\w+\s+(struct|interface)\b/, codeType: 'class' },
  ],
  rust: [
    { pattern: /^(pub(\([^)]*\))?\s+)?(const\s+)?(async\s+)?(unsafe\s+)?fn\s+\w+/, codeType: 'function' },
    { pattern: /^(pub(\([^)]*\))?\s+)?(struct|enum|trait|impl)\b/, codeType: 'class' },
  ],
};

/** Checked in order; the first language with a matching hint wins. */
const LANGUAGE_HINTS: Array<[CodeLanguage, RegExp]> = [
  ['python', /^\s*(async\s+)?def\s+\w+\s*\(.*\)\s*(->\s*[^:]+)?:\s*$|^\s*(from\s+[\w.]+\s+)?import\s+[\w.]+(\s+as\s+\w+)?\s*$/m],
  ['go', /^package\s+\w+\s*$|^func\s+(\([^)]*\)\s*)?\w+\s*\(/m],
  ['rust', /^\s*(pub\s+)?fn\s+\w+|^\s*use\s+\w+(::\w+)+;|^\s*impl\b/m],
  ['java', /^\s*(public|private|protected)\s+(static\s+)?(final\s+)?(class|interface|enum|void|[\w<>[\]]+\s+\w+\s*\()/m],
  ['typescript', /^\s*(export\s+)?(interface|type)\s+\w+|:\s*(string|number|boolean|void|unknown)\b/m],
  ['javascript', /\bfunction\b|=>|\b(const|let|var)\s+\w+\s*=|\brequire\(/],
];

const DECORATOR = /^\s*@\w+/;

export function isCodeLanguage(value: unknown): value is CodeLanguage {
  return typeof value === 'string' && CODE_LANGUAGES.some((language) => language === value);
}

export function detectLanguage(text: string, metadata: ChunkMetadata = {}): CodeLanguage | null {
  const declared = metadata['language'];
  if (isCodeLanguage(declared)) {
    return declared;
  }
  for (const [language, hint] of LANGUAGE_HINTS) {
    if (hint.test(text)) return language;
  }
  return null;
}

interface CodeUnit extends Span {
  codeType: CodeType;
  signature: string;
}

/** True when the line starting at `offset` is blank or begins a new top-level statement. */
function startsTopLevelLine(text: string, offset: number): boolean {
  const newline = text.indexOf('\n', offset);
  const line = text.slice(offset, newline === -1 ? text.length : newline);
  return line.trim().length === 0 || /^[\p{L}_$@#]/u.test(line);
}

/**
 * Offset just past the brace that closes the block opened at or after `from`.
 * When no block opens, the unit ends at its first `;`, or at the end of the
 * line when the next one is blank or starts a new top-level statement.
 */
function findBlockEnd(text: string, from: number): number {
  let depth = 0;
  let brackets = 0;
  let opened = false;
  let quote: string | null = null;

  for (let i = from; i < text.length; i++) {
    const ch = text.charAt(i);
    if (quote) {
      if (ch === '\\') {
        i++;
      } else if (ch === quote) {
        quote = null;
      }
      continue;
    }
    if (ch === '/' && text.charAt(i + 1) === '/') {
      const newline = text.indexOf('\n', i);
      if (newline === -1) return text.length;
      // Revisit the newline so a bodiless unit can end there.
      i = newline - 1;
      continue;
    }
    if (ch === '/' && text.charAt(i + 1) === '*') {
      const close = text.indexOf('*/', i + 2);
      i = close === -1 ? text.length : close + 1;
      continue;
    }
    if (ch === '"' || ch === "'" || ch === '`') {
      quote = ch;
    } else if (ch === '(' || ch === '[') {
      brackets++;
    } else if (ch === ')' || ch === ']') {
      brackets--;
    } else if (ch === '{') {
      depth++;
      opened = true;
    } else if (ch === '}') {
      depth--;
      if (opened && depth <= 0) return i + 1;
    } else if (ch === ';' && !opened) {
      return i + 1;
    } else if (ch === '\n' && !opened && brackets <= 0 && startsTopLevelLine(text, i + 1)) {
      return i;
    }
  }
  return text.length;
}

function lineEndAt(text: string, offset: number): number {
  const newline = text.indexOf('\n', offset);
  return newline === -1 ? text.length : newline;
}

function findPythonBlockEnd(lines: readonly TextSpan[], startLine: number): number {
  let end = lines[startLine]?.end ?? 0;
  for (let j = startLine + 1; j < lines.length; j++) {
    const line = lines[j];
    if (!line) break;
    if (line.text.trim().length === 0) continue;
    if (!/^\s/.test(line.text) && !/^[)\]}]/.test(line.text)) break;
    end = line.end;
  }
  return end;
}

function findUnits(text: string, language: CodeLanguage): CodeUnit[] {
  const lines = splitLines(text);
  const patterns = STRUCTURE_PATTERNS[language];
  const units: CodeUnit[] = [];
  let consumedUntil = 0;

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    if (!line || line.start < consumedUntil) continue;

    const match = patterns.find((candidate) => candidate.pattern.test(line.text));
    if (!match) continue;

    let startLine = i;
    while (startLine > 0) {
      const previous = lines[startLine - 1];
      if (!previous || previous.start < consumedUntil || !DECORATOR.test(previous.text)) break;
      startLine--;
    }

    const end =
      language === 'python'
        ? findPythonBlockEnd(lines, i)
        : lineEndAt(text, Math.max(line.start, findBlockEnd(text, line.start) - 1));

    units.push({
      start: lines[startLine]?.start ?? line.start,
      end,
      codeType: match.codeType,
      signature: line.text.trim(),
    });
    consumedUntil = end;
  }

  return units;
}

function lineCost(line: TextSpan): number {
  return line.end - line.start + 1;
}

/**
 * Line-aligned windows over `[start, end)`. Overlap is counted in whole
 * trailing lines whose combined length stays within `overlap`.
 */
export function lineChunkSpans(text: string, start: number, end: number, chunkSize: number, overlap: number): Span[] {
  const spans: Span[] = [];
  let current: TextSpan[] = [];
  let size = 0;

  const flush = (): void => {
    const first = current[0];
    const last = current[current.length - 1];
    if (first && last) spans.push({ start: first.start, end: last.end });
  };

  for (const line of splitLines(text, start, end)) {
    const cost = lineCost(line);

    if (cost > chunkSize) {
      flush();
      current = [];
      size = 0;
      spans.push(...fixedSizeSpans(text, line.start, line.end, chunkSize, Math.min(overlap, chunkSize - 1)));
      continue;
    }

    if (current.length > 0 && size + cost > chunkSize) {
      flush();
      const kept: TextSpan[] = [];
      let keptSize = 0;
      for (let i = current.length - 1; i > 0; i--) {
        const candidate = current[i];
        if (!candidate || keptSize + lineCost(candidate) > overlap) break;
        kept.unshift(candidate);
        keptSize += lineCost(candidate);
      }
      if (keptSize + cost > chunkSize) {
        current = [];
        size = 0;
      } else {
        current = kept;
        size = keptSize;
      }
    }

    current.push(line);
    size += cost;
  }
  flush();

  return spans;
}

function isLogicalBreak(line: TextSpan): boolean {
  const trimmed = line.text.trim();
  return trimmed === '' || trimmed === '}' || trimmed === '};';
}

/** Split an oversized unit after the last blank line or closing brace that fits. */
export function logicalSplitSpans(text: string, start: number, end: number, chunkSize: number): Span[] {
  const spans: Span[] = [];
  let current: TextSpan[] = [];
  let size = 0;

  const push = (lines: readonly TextSpan[]): void => {
    const first = lines[0];
    const last = lines[lines.length - 1];
    if (first && last) spans.push({ start: first.start, end: last.end });
  };

  for (const line of splitLines(text, start, end)) {
    const cost = lineCost(line);

    if (current.length > 0 && size + cost > chunkSize) {
      let breakAt = -1;
      for (let k = current.length - 1; k >= 1; k--) {
        const candidate = current[k];
        if (candidate && isLogicalBreak(candidate)) {
          breakAt = k;
          break;
        }
      }
      if (breakAt >= 1) {
        push(current.slice(0, breakAt + 1));
        current = current.slice(breakAt + 1);
      } else {
        push(current);
        current = [];
      }
      size = current.reduce((total, kept) => total + lineCost(kept), 0);
      if (current.length > 0 && size + cost > chunkSize) {
        push(current);
        current = [];
        size = 0;
      }
    }

    if (cost > chunkSize) {
      spans.push(...fixedSizeSpans(text, line.start, line.end, chunkSize, 0));
      continue;
    }

    current.push(line);
    size += cost;
  }
  push(current);

  return spans;
}

/**
 * One chunk per top-level function or class, found with per-language
 * patterns. Preambles, code between units and unrecognised languages are
 * chunked by lines with trailing-line overlap.
 */
export class CodeChunker extends BaseChunker {
  readonly strategy = 'code_aware' as const;

  async split(text: string, metadata: ChunkMetadata): Promise<ChunkDraft[]> {
    const language = detectLanguage(text, metadata);
    const languageMeta: ChunkMetadata = { language: language ?? 'unknown' };
    const units = language ? findUnits(text, language) : [];

    if (units.length === 0) {
      return this.lineDrafts(text, 0, text.length, { ...languageMeta, code_type: 'module' });
    }

    const drafts: ChunkDraft[] = [];
    let cursor = 0;

    units.forEach((unit, index) => {
      if (text.slice(cursor, unit.start).trim().length > 0) {
        drafts.push(
          ...this.lineDrafts(text, cursor, unit.start, {
            ...languageMeta,
            code_type: index === 0 ? 'preamble' : 'module',
          }),
        );
      }
      drafts.push(...this.unitDrafts(text, unit, languageMeta));
      cursor = unit.end;
    });

    if (text.slice(cursor).trim().length > 0) {
      drafts.push(...this.lineDrafts(text, cursor, text.length, { ...languageMeta, code_type: 'module' }));
    }

    return drafts;
  }

  private unitDrafts(text: string, unit: CodeUnit, languageMeta: ChunkMetadata): ChunkDraft[] {
    const unitMeta: ChunkMetadata = {
      ...languageMeta,
      code_type: unit.codeType,
      signature: unit.signature,
    };

    if (unit.end - unit.start <= this.config.chunkSize) {
      return [{ text: text.slice(unit.start, unit.end), startChar: unit.start, endChar: unit.end, metadata: unitMeta }];
    }

    return logicalSplitSpans(text, unit.start, unit.end, this.config.chunkSize).map((span, part) => ({
      text: text.slice(span.start, span.end),
      startChar: span.start,
      endChar: span.end,
      metadata: { ...unitMeta, part },
    }));
  }

  private lineDrafts(text: string, start: number, end: number, metadata: ChunkMetadata): ChunkDraft[] {
    return lineChunkSpans(text, start, end, this.config.chunkSize, this.config.chunkOverlap).map((span) => ({
      text: text.slice(span.start, span.end),
      startChar: span.start,
      endChar: span.end,
      metadata: { ...metadata },
    }));
  }
}
