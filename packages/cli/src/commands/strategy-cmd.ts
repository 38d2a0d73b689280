import { Command } from 'commander';
import chalk from 'chalk';
import { readFile } from 'node:fs/promises';
import { extname, resolve } from 'node:path';
import {
  ChunkingService,
  contentTypeForExtension,
  errorMessage,
  type ChunkingStrategy,
  type ContentType,
} from '@fusekit/core';
import { fail } from './shared.js';

export interface StrategyReport {
  file: string;
  strategy: ChunkingStrategy;
  contentType: ContentType;
  characters: number;
}

export function formatStrategyReport(report: StrategyReport): string {
  return [
    chalk.bold(report.file),
    `  Strategy:     ${chalk.cyan(report.strategy)}`,
    `  Content type: ${chalk.cyan(report.contentType)}`,
    `  Characters:   ${chalk.cyan(String(report.characters))}`,
  ].join('\n');
}

export function formatStrategyList(strategies: readonly ChunkingStrategy[]): string {
  return [chalk.bold('Available strategies:'), ...strategies.map((name) => `  ${name}`)].join('\n');
}

/** Pick a strategy for `text` the same way `smartChunk` does. */
export function recommendStrategy(file: string, text: string): StrategyReport {
  const service = new ChunkingService({ tokenizer: null });
  return {
    file,
    strategy: service.getOptimalStrategy(text),
    contentType: contentTypeForExtension(extname(file).toLowerCase()),
    characters: text.length,
  };
}

export function registerStrategyCommand(program: Command): void {
  program
    .command('strategy')
    .description('Recommend a chunking strategy for a file, or list them all')
    .argument('[file]', 'File to inspect')
    .option('--json', 'Output in JSON format')
    .action(async (file: string | undefined, options: { json?: boolean }) => {
      if (file === undefined) {
        const strategies = new ChunkingService({ tokenizer: null }).listStrategies();
        // eslint-disable-next-line no-console
        console.log(options.json ? JSON.stringify(strategies) : formatStrategyList(strategies));
        return;
      }

      let text: string;
      try {
        text = await readFile(resolve(file), 'utf-8');
      } catch (error: unknown) {
        fail(`Could not read ${file}:`, errorMessage(error));
      }

      const report = recommendStrategy(file, text);
      // eslint-disable-next-line no-console
      console.log(options.json ? JSON.stringify(report, null, 2) : formatStrategyReport(report));
    });
}
