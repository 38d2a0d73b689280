import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { basename, resolve } from 'node:path';
import { errorMessage, type StoreChunksResult } from '@fusekit/core';
import { buildChunkOptions, type ChunkCommandOptions } from './chunk-cmd.js';
import { openRuntime } from './shared.js';

export interface IngestCommandOptions extends Omit<ChunkCommandOptions, 'json'> {
  user: string;
  prefix?: string;
}

/**
 * One-line summary of a store run.
 */
export function formatIngestSummary(file: string, result: StoreChunksResult): string {
  const parts = [`${result.stored} stored`];
  if (result.failed > 0) {
    parts.push(chalk.red(`${result.failed} failed`));
  }
  if (result.unembedded > 0) {
    parts.push(chalk.yellow(`${result.unembedded} without embedding`));
  }
  return `Ingested ${file}: ${parts.join(', ')}`;
}

export function registerIngestCommand(program: Command): void {
  program
    .command('ingest')
    .description('Chunk a file, embed the chunks and store them for a user')
    .argument('<file>', 'File to ingest')
    .requiredOption('--user <id>', 'Owner of the stored chunks')
    .option('--strategy <name>', 'Chunking strategy (default: hybrid for files)')
    .option('--chunk-size <n>', 'Target chunk size in characters')
    .option('--chunk-overlap <n>', 'Overlap between neighbouring chunks')
    .option('--prefix <id>', 'Id prefix for stored chunks (default: file name)')
    .option('--root <dir>', 'Project root holding .fusekit.yaml', process.cwd())
    .action(async (file: string, options: IngestCommandOptions) => {
      const chunkOptions = buildChunkOptions(options);
      const spinner = ora('Loading configuration...').start();
      const runtime = await openRuntime(options.root);

      try {
        spinner.text = `Chunking ${file}...`;
        const chunked = await runtime.chunking.chunkDocument(resolve(options.root, file), chunkOptions);
        if (chunked.isErr()) {
          spinner.fail(chunked.error.message);
          process.exitCode = 1;
          return;
        }
        if (chunked.value.length === 0) {
          spinner.warn('No chunks produced. Nothing to ingest.');
          return;
        }

        spinner.text = `Embedding and storing ${chunked.value.length} chunks...`;
        const stored = await runtime.search.storeChunks(chunked.value, options.user, runtime.embeddingProvider, {
          idPrefix: options.prefix ?? basename(file),
        });

        spinner.text = 'Saving store...';
        const saved = await runtime.save();
        if (saved.isErr()) {
          spinner.fail(saved.error.message);
          process.exitCode = 1;
          return;
        }

        const summary = formatIngestSummary(file, stored);
        if (stored.failed > 0) {
          spinner.warn(summary);
        } else {
          spinner.succeed(summary);
        }
      } catch (error: unknown) {
        spinner.fail('Ingest failed');
        // eslint-disable-next-line no-console
        console.error(chalk.red(errorMessage(error)));
        process.exitCode = 1;
      } finally {
        await runtime.close();
      }
    });
}
