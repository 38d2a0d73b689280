import type { ChunkMetadata } from '../../types/chunk.js';
import { BaseChunker, type ChunkDraft } from '../base-chunker.js';
import { splitLines } from '../text-spans.js';
import { ParagraphChunker } from './paragraph-chunker.js';
import { recursiveSpans } from './recursive-chunker.js';

const SPEAKER_PATTERNS: readonly RegExp[] = [
  /^([A-Z][A-Za-z0-9_]*(?: [A-Z][A-Za-z0-9_]*)?):\s*(.*)$/,
  /^\[([^\]]+)\]\s*(.*)$/,
  /^<([^>]+)>\s*(.*)$/,
];

interface Turn {
  speaker: string | null;
  start: number;
  end: number;
}

export function matchSpeaker(line: string): string | null {
  for (const pattern of SPEAKER_PATTERNS) {
    const match = pattern.exec(line.trim());
    if (match?.[1]) return match[1].trim();
  }
  return null;
}

function findTurns(text: string): Turn[] {
  const turns: Turn[] = [];
  for (const line of splitLines(text)) {
    const speaker = matchSpeaker(line.text);
    const last = turns[turns.length - 1];
    if (speaker !== null) {
      turns.push({ speaker, start: line.start, end: line.end });
    } else if (last) {
      last.end = line.end;
    } else if (line.text.trim().length > 0) {
      turns.push({ speaker: null, start: line.start, end: line.end });
    }
  }
  return turns;
}

function uniqueSpeakers(turns: readonly Turn[]): string[] {
  const speakers: string[] = [];
  for (const turn of turns) {
    if (turn.speaker !== null && !speakers.includes(turn.speaker)) speakers.push(turn.speaker);
  }
  return speakers;
}

/**
 * Groups whole speaker turns (`Name: ...`, `[Name] ...`, `<Name> ...`)
 * up to `chunkSize`, repeating trailing turns within `chunkOverlap`.
 * Text with no recognisable turns is chunked by paragraphs.
 */
export class ConversationChunker extends BaseChunker {
  readonly strategy = 'conversation_aware' as const;

  async split(text: string, metadata: ChunkMetadata): Promise<ChunkDraft[]> {
    const turns = findTurns(text);
    if (!turns.some((turn) => turn.speaker !== null)) {
      this.logger.debug('No conversation turns found, chunking by paragraphs');
      const paragraphs = new ParagraphChunker(this.config, this.context);
      return paragraphs.split(text, metadata);
    }

    const drafts: ChunkDraft[] = [];
    let group: Turn[] = [];

    const size = (turnsInGroup: readonly Turn[], next?: Turn): number => {
      const first = turnsInGroup[0];
      const last = next ?? turnsInGroup[turnsInGroup.length - 1];
      return first && last ? last.end - first.start : 0;
    };
    const flush = (): void => {
      const first = group[0];
      const last = group[group.length - 1];
      if (!first || !last) return;
      drafts.push({
        text: text.slice(first.start, last.end),
        startChar: first.start,
        endChar: last.end,
        metadata: { conversation_turns: group.length, speakers: uniqueSpeakers(group) },
      });
    };

    for (const turn of turns) {
      if (turn.end - turn.start > this.config.chunkSize) {
        flush();
        group = [];
        for (const span of recursiveSpans(text, turn.start, turn.end, this.config)) {
          drafts.push({
            text: text.slice(span.start, span.end),
            startChar: span.start,
            endChar: span.end,
            metadata: { conversation_turns: 1, speakers: turn.speaker ? [turn.speaker] : [], is_partial_turn: true },
          });
        }
        continue;
      }

      if (group.length > 0 && size(group, turn) > this.config.chunkSize) {
        flush();
        const kept: Turn[] = [];
        for (let i = group.length - 1; i > 0; i--) {
          const candidate = group[i];
          if (!candidate) break;
          const withCandidate = [candidate, ...kept];
          if (size(withCandidate) > this.config.chunkOverlap) break;
          kept.unshift(candidate);
        }
        group = size(kept, turn) > this.config.chunkSize ? [] : kept;
      }
      group.push(turn);
    }
    flush();

    return drafts;
  }
}
