import { Command } from 'commander';
import chalk from 'chalk';
import { resolve } from 'node:path';
import type { Chunk, ChunkTextOptions } from '@fusekit/core';
import { fail, openRuntime, preview, requirePositiveInt } from './shared.js';

export interface ChunkCommandOptions {
  strategy?: string;
  chunkSize?: string;
  chunkOverlap?: string;
  json?: boolean;
  root: string;
}

/**
 * Format one chunk as a header line plus a one-line text preview.
 */
export function formatChunk(chunk: Chunk): string {
  const position = chalk.dim(`[${chunk.position}]`);
  const id = chalk.cyan(chunk.chunkId);
  const span = chalk.dim(`${chunk.startChar}-${chunk.endChar}`);
  const strategy = chalk.magenta(String(chunk.metadata['strategy'] ?? 'unknown'));
  const parent = chunk.parentId ? chalk.dim(` parent: ${chunk.parentId}`) : '';
  return `${position} ${id}  ${span}  ${strategy}${parent}\n    ${preview(chunk.text)}`;
}

export function formatChunkList(file: string, chunks: readonly Chunk[]): string {
  if (chunks.length === 0) {
    return chalk.yellow(`No chunks produced from ${file}.`);
  }
  const lines = [chalk.bold(`${chunks.length} chunk(s) from ${file}:`), ''];
  for (const chunk of chunks) {
    lines.push(formatChunk(chunk));
  }
  return lines.join('\n');
}

export function buildChunkOptions(options: ChunkCommandOptions): ChunkTextOptions {
  const chunkSize = requirePositiveInt(options.chunkSize, '--chunk-size');
  const chunkOverlap = options.chunkOverlap === undefined ? undefined : Number(options.chunkOverlap);
  if (chunkOverlap !== undefined && (!Number.isInteger(chunkOverlap) || chunkOverlap < 0)) {
    fail('Invalid --chunk-overlap value. Must be a non-negative integer.');
  }
  return {
    ...(options.strategy !== undefined ? { strategy: options.strategy } : {}),
    ...(chunkSize !== undefined ? { chunkSize } : {}),
    ...(chunkOverlap !== undefined ? { chunkOverlap } : {}),
  };
}

export function registerChunkCommand(program: Command): void {
  program
    .command('chunk')
    .description('Split a file into chunks and print them')
    .argument('<file>', 'File to chunk')
    .option('--strategy <name>', 'Chunking strategy (default: hybrid for files)')
    .option('--chunk-size <n>', 'Target chunk size in characters')
    .option('--chunk-overlap <n>', 'Overlap between neighbouring chunks')
    .option('--json', 'Output chunks as JSON')
    .option('--root <dir>', 'Project root holding .fusekit.yaml', process.cwd())
    .action(async (file: string, options: ChunkCommandOptions) => {
      const chunkOptions = buildChunkOptions(options);
      const runtime = await openRuntime(options.root);
      try {
        const result = await runtime.chunking.chunkDocument(resolve(options.root, file), chunkOptions);
        if (result.isErr()) {
          fail('Chunking failed:', result.error.message);
        }

        // eslint-disable-next-line no-console
        console.log(options.json ? JSON.stringify(result.value, null, 2) : formatChunkList(file, result.value));
      } finally {
        await runtime.close();
      }
    });
}
