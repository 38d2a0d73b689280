import { Command } from 'commander';
import chalk from 'chalk';
import {
  RANKING_METHODS,
  SEARCH_MODES,
  type HybridSearchOptions,
  type HybridSearchResponse,
  type RankingMethod,
  type Runtime,
  type SearchMode,
  type SearchResult,
} from '@fusekit/core';
import { fail, openRuntime, preview, requirePositiveInt } from './shared.js';

export interface SearchCommandOptions {
  user: string;
  topK?: string;
  mode?: string;
  ranking?: string;
  diversify?: boolean;
  json?: boolean;
  root: string;
}

/**
 * Format a single search result for terminal display.
 */
export function formatSearchResult(result: SearchResult, index: number): string {
  const lines: string[] = [];
  const rank = chalk.dim(`[${index + 1}]`);
  const score = chalk.green(result.score.toFixed(4));
  const source = result.metadata?.['source'];
  const label = chalk.cyan(typeof source === 'string' ? `${result.id} (${source})` : result.id);

  const components: string[] = [];
  if (result.semanticScore !== undefined) {
    components.push(`semantic ${result.semanticScore.toFixed(4)}`);
  }
  if (result.lexicalScore !== undefined) {
    components.push(`lexical ${result.lexicalScore.toFixed(4)}`);
  }
  const detail = components.length > 0 ? chalk.dim(`  (${components.join(', ')})`) : '';

  lines.push(`${rank} ${label}  score: ${score}${detail}`);
  lines.push(`    ${preview(result.text)}`);
  return lines.join('\n');
}

export function formatSearchResponse(query: string, response: HybridSearchResponse): string {
  if (response.results.length === 0) {
    const reason = response.error ?? response.message ?? 'No results found';
    return chalk.yellow(`${reason}.`);
  }
  const lines = [
    chalk.bold(`Found ${response.results.length} result(s) for "${query}" via ${response.method}:`),
    '',
  ];
  response.results.forEach((result, index) => {
    if (index > 0) lines.push('');
    lines.push(formatSearchResult(result, index));
  });
  return lines.join('\n');
}

function pickOption<T extends string>(value: string | undefined, allowed: readonly T[], flag: string): T | undefined {
  if (value === undefined) {
    return undefined;
  }
  const match = allowed.find((item) => item === value);
  if (match === undefined) {
    fail(`Invalid ${flag} value "${value}". Expected one of: ${allowed.join(', ')}.`);
  }
  return match;
}

export function buildSearchOptions(options: SearchCommandOptions, runtime: Pick<Runtime, 'config'>): HybridSearchOptions {
  const defaults = runtime.config.search;
  const topK = requirePositiveInt(options.topK, '--top-k') ?? defaults.topK;
  const searchMode: SearchMode = pickOption(options.mode, SEARCH_MODES, '--mode') ?? defaults.searchMode;
  const rankingMethod: RankingMethod = pickOption(options.ranking, RANKING_METHODS, '--ranking') ?? defaults.rankingMethod;
  return {
    topK,
    searchMode,
    rankingMethod,
    semanticWeight: defaults.semanticWeight,
    lexicalWeight: defaults.lexicalWeight,
    mmrLambda: defaults.mmrLambda,
    includeEmbeddings: defaults.includeEmbeddings,
    diversify: options.diversify ?? runtime.config.reranker.enabled,
  };
}

/** Embed the query unless the search is purely lexical. A failed embed returns `null`. */
async function embedQuery(runtime: Runtime, query: string, mode: SearchMode | undefined): Promise<number[] | null> {
  if (mode === 'lexical') {
    return null;
  }
  const embedded = await runtime.embeddingProvider.embed([query]);
  if (embedded.isErr()) {
    runtime.logger.warn('Query embedding failed', { error: embedded.error.message });
    return null;
  }
  return embedded.value[0] ?? null;
}

export function registerSearchCommand(program: Command): void {
  program
    .command('search')
    .description("Search a user's stored chunks")
    .argument('<query>', 'Search query')
    .requiredOption('--user <id>', 'Whose chunks to search')
    .option('--top-k <n>', 'Maximum number of results')
    .option('--mode <mode>', `Search mode (${SEARCH_MODES.join(', ')})`)
    .option('--ranking <method>', `Ranking method for hybrid search (${RANKING_METHODS.join(', ')})`)
    .option('--diversify', 'Rerank results for diversity')
    .option('--json', 'Output the full response as JSON')
    .option('--root <dir>', 'Project root holding .fusekit.yaml', process.cwd())
    .action(async (query: string, options: SearchCommandOptions) => {
      const runtime = await openRuntime(options.root);
      try {
        const searchOptions = buildSearchOptions(options, runtime);
        const queryEmbedding = await embedQuery(runtime, query, searchOptions.searchMode);
        const response = await runtime.search.hybridSearch(query, queryEmbedding, options.user, searchOptions);
        if (!response.success) {
          fail('Search failed:', response.error ?? 'unknown error');
        }

        // eslint-disable-next-line no-console
        console.log(options.json ? JSON.stringify(response, null, 2) : formatSearchResponse(query, response));
      } finally {
        await runtime.close();
      }
    });
}
