import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { registerChunkCommand } from './commands/chunk-cmd.js';
import { registerIngestCommand } from './commands/ingest-cmd.js';
import { registerSearchCommand } from './commands/search.js';
import { registerStatsCommand } from './commands/stats.js';
import { registerStrategyCommand } from './commands/strategy-cmd.js';

export function createProgram(version: string): Command {
  const program = new Command();
  program
    .name('fusekit')
    .description('Chunk documents, store their embeddings and run hybrid search over them')
    .version(version);

  registerChunkCommand(program);
  registerStrategyCommand(program);
  registerIngestCommand(program);
  registerSearchCommand(program);
  registerStatsCommand(program);
  return program;
}

/** Version from the package manifest beside `src/` and `dist/`. */
export function readVersion(manifestUrl: URL = new URL('../package.json', import.meta.url)): string {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(manifestUrl, 'utf-8'));
  } catch {
    return '0.0.0';
  }
  if (typeof raw === 'object' && raw !== null && 'version' in raw && typeof raw.version === 'string') {
    return raw.version;
  }
  return '0.0.0';
}
