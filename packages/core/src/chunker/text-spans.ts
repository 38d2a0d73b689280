/** A half-open `[start, end)` range of the source text. */
export interface Span {
  start: number;
  end: number;
}

export interface TextSpan extends Span {
  text: string;
}

const SENTENCE_BOUNDARY = /(?<=[.!?])\s+(?=[A-Z])|(?<=\.\.\.)\s+|(?<=[。！？])\s*/g;
const PARAGRAPH_BREAK = /\n[ \t]*\n\s*/g;

/** Narrow a span to exclude leading and trailing whitespace. Returns null for blank spans. */
export function trimSpan(text: string, start: number, end: number): TextSpan | null {
  let s = start;
  let e = end;
  while (s < e && /\s/.test(text.charAt(s))) s++;
  while (e > s && /\s/.test(text.charAt(e - 1))) e--;
  if (s >= e) {
    return null;
  }
  return { start: s, end: e, text: text.slice(s, e) };
}

function splitByPattern(text: string, pattern: RegExp, start: number, end: number): TextSpan[] {
  const region = text.slice(start, end);
  const spans: TextSpan[] = [];
  let cursor = 0;

  for (const match of region.matchAll(pattern)) {
    const index = match.index ?? 0;
    if (index === cursor && match[0].length === 0) {
      continue;
    }
    const span = trimSpan(text, start + cursor, start + index);
    if (span) spans.push(span);
    cursor = index + match[0].length;
  }

  const tail = trimSpan(text, start + cursor, end);
  if (tail) spans.push(tail);
  return spans;
}

/**
 * Sentence spans: a break after `.`, `!` or `?` followed by a capital
 * letter, after an ellipsis, or after CJK terminal punctuation.
 */
export function splitSentences(text: string, start = 0, end = text.length): TextSpan[] {
  return splitByPattern(text, SENTENCE_BOUNDARY, start, end);
}

/** Paragraph spans separated by blank lines. */
export function splitParagraphs(text: string, start = 0, end = text.length): TextSpan[] {
  return splitByPattern(text, PARAGRAPH_BREAK, start, end);
}

/** Every line with its offsets, newline excluded. Blank lines are kept. */
export function splitLines(text: string, start = 0, end = text.length): TextSpan[] {
  const lines: TextSpan[] = [];
  let cursor = start;
  while (cursor <= end) {
    const newline = text.indexOf('\n', cursor);
    const lineEnd = newline === -1 || newline >= end ? end : newline;
    lines.push({ start: cursor, end: lineEnd, text: text.slice(cursor, lineEnd) });
    if (lineEnd >= end) break;
    cursor = lineEnd + 1;
  }
  return lines;
}

/**
 * Fixed-size windows over `[start, end)`. A window ends at the last space
 * inside it when that keeps at least `minBreak` characters, so words are
 * not cut. Consecutive windows overlap by at most `overlap` characters and
 * together cover the whole range.
 */
export function fixedSizeSpans(
  text: string,
  start: number,
  end: number,
  size: number,
  overlap: number,
  minBreak = Math.floor(size / 2),
): Span[] {
  const spans: Span[] = [];
  const step = Math.max(1, size);
  let cursor = start;

  while (cursor < end) {
    let windowEnd = Math.min(cursor + step, end);
    if (windowEnd < end) {
      const lastSpace = text.lastIndexOf(' ', windowEnd);
      if (lastSpace > cursor && lastSpace - cursor > minBreak) {
        windowEnd = lastSpace;
      }
    }
    spans.push({ start: cursor, end: windowEnd });
    if (windowEnd >= end) break;
    cursor = Math.max(cursor + 1, windowEnd - overlap);
  }

  return spans;
}
