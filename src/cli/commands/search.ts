import type { Command } from 'commander';
import { openRuntime } from '../runtime.js';
import { buildFilter, parseFormat, parseInteger, parseLevel, parseMode, parseNumber } from '../options.js';
import { ResultFormatter } from '../formatters/ResultFormatter.js';

interface SearchCommandOptions {
  root: string;
  mode: string;
  topK?: string;
  denseWeight?: string;
  category?: string;
  lang?: string;
  since?: string;
  mmr: boolean;
  lambda?: string;
  level: string;
  format: string;
}

/** 註冊 search 指令 */
export function registerSearchCommand(program: Command): void {
  program
    .command('search')
    .description('Search the vector store (dense, sparse or weighted hybrid)')
    .argument('<query>', 'Search query')
    .option('--root <path>', 'Project root directory', '.')
    .option('--mode <mode>', 'Search mode: dense, sparse, hybrid', 'hybrid')
    .option('--top-k <number>', 'Number of results to return (default from config)')
    .option('--dense-weight <number>', 'Dense weight for hybrid fusion, within [0, 1]')
    .option('--category <name>', 'Filter by payload category')
    .option('--lang <code>', 'Filter by payload language')
    .option('--since <unixSeconds>', 'Only points with timestamp >= since')
    .option('--mmr', 'Diversify results with maximal marginal relevance', false)
    .option('--lambda <number>', 'MMR relevance/diversity trade-off, within [0, 1]')
    .option('--level <level>', 'Detail level: brief, normal, full', 'normal')
    .option('--format <format>', 'Output format: json or text', 'text')
    .action(async (query: string, opts: SearchCommandOptions) => {
      const format = parseFormat(opts.format);
      const level = parseLevel(opts.level);
      const runtime = openRuntime(opts.root);

      try {
        const lambda = opts.lambda !== undefined ? parseNumber(opts.lambda, 'lambda') : undefined;
        const response = await runtime.searchUseCase.search({
          query,
          mode: parseMode(opts.mode),
          topK: opts.topK !== undefined ? parseInteger(opts.topK, 'topK') : undefined,
          denseWeight: opts.denseWeight !== undefined ? parseNumber(opts.denseWeight, 'denseWeight') : undefined,
          filter: buildFilter(opts),
          mmr: opts.mmr || lambda !== undefined ? { lambda } : undefined,
        });

        if (response.warnings.length > 0) {
          process.stderr.write(response.warnings.map((w) => `Warning: ${w}`).join('\n') + '\n');
        }

        process.stdout.write(
          new ResultFormatter().formatSearchResults(response.results, format, level) + '\n',
        );
      } finally {
        runtime.close();
      }
    });
}
