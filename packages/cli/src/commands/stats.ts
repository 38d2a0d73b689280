import { Command } from 'commander';
import chalk from 'chalk';
import type { HybridSearchServiceStats } from '@fusekit/core';
import { openRuntime } from './shared.js';

/**
 * Everything `fusekit stats` reports.
 */
export interface StatsInfo extends HybridSearchServiceStats {
  embeddingModel: string;
  storagePath: string;
  health: 'ok' | 'empty' | 'unavailable';
}

export function healthOf(stats: HybridSearchServiceStats): StatsInfo['health'] {
  if (!stats.backend) {
    return 'unavailable';
  }
  return stats.backend.totalVectors > 0 ? 'ok' : 'empty';
}

/**
 * Format stats for human-readable terminal output.
 */
export function formatStats(stats: StatsInfo, userId?: string): string {
  const lines: string[] = [chalk.bold('fusekit stats'), ''];

  const healthColor = stats.health === 'ok' ? chalk.green : stats.health === 'empty' ? chalk.yellow : chalk.red;
  lines.push(`  Health:        ${healthColor(stats.health)}`);

  if (stats.backend) {
    lines.push(`  Backend:       ${chalk.cyan(stats.backend.backend)}`);
    if (stats.backend.collection !== undefined) {
      lines.push(`  Collection:    ${chalk.cyan(stats.backend.collection)}`);
    }
    lines.push(`  Dimensions:    ${chalk.cyan(String(stats.backend.dimensions))}`);
    lines.push(`  Total vectors: ${chalk.cyan(String(stats.backend.totalVectors))}`);
    if (userId !== undefined && stats.backend.userVectors !== undefined) {
      lines.push(`  Vectors (${userId}): ${chalk.cyan(String(stats.backend.userVectors))}`);
    }
  }

  lines.push(`  Model:         ${chalk.cyan(stats.embeddingModel)}`);
  lines.push(`  Fallback:      ${stats.useFallback ? `on (${stats.fallbackCandidateLimit} candidates)` : 'off'}`);
  lines.push(`  Storage:       ${chalk.dim(stats.storagePath)}`);
  return lines.join('\n');
}

export function registerStatsCommand(program: Command): void {
  program
    .command('stats')
    .description('Show vector store and search service statistics')
    .option('--user <id>', 'Also count vectors owned by this user')
    .option('--json', 'Output in JSON format')
    .option('--root <dir>', 'Project root holding .fusekit.yaml', process.cwd())
    .action(async (options: { user?: string; json?: boolean; root: string }) => {
      const runtime = await openRuntime(options.root);
      try {
        const serviceStats = await runtime.search.getStats(options.user);
        const stats: StatsInfo = {
          ...serviceStats,
          embeddingModel: runtime.config.embedding.model,
          storagePath: runtime.storagePath,
          health: healthOf(serviceStats),
        };

        // eslint-disable-next-line no-console
        console.log(options.json ? JSON.stringify(stats, null, 2) : formatStats(stats, options.user));
      } finally {
        await runtime.close();
      }
    });
}
