import type { Command } from 'commander';
import { EvaluationUseCase } from '../../application/EvaluationUseCase.js';
import { loadSampleTexts } from '../../infrastructure/dataset/SampleDatasetGenerator.js';
import { SAMPLE_CATEGORIES } from '../../domain/entities/SampleRecord.js';
import { openRuntime } from '../runtime.js';
import type { Runtime } from '../runtime.js';
import { parseFormat, parseInteger, parseMode, parseNumber } from '../options.js';
import { ResultFormatter } from '../formatters/ResultFormatter.js';

interface EvalBaseOptions {
  root: string;
  format: string;
}

interface RecallOptions extends EvalBaseOptions {
  k?: string;
}

interface DiversityOptions extends EvalBaseOptions {
  k?: string;
  lambda?: string;
}

interface LatencyOptions extends EvalBaseOptions {
  mode: string;
  runs?: string;
}

/** 未指定查詢時，以每個類別的第一句示範文字當查詢 */
function defaultQueries(): string[] {
  const texts = loadSampleTexts();
  return SAMPLE_CATEGORIES.map((category) => texts[category][0]);
}

async function withEvaluation<T>(
  root: string,
  fn: (useCase: EvaluationUseCase, runtime: Runtime) => Promise<T>,
): Promise<T> {
  const runtime = openRuntime(root);
  try {
    const useCase = new EvaluationUseCase(runtime.store, runtime.embedding, runtime.searchUseCase);
    return await fn(useCase, runtime);
  } finally {
    runtime.close();
  }
}

/**
 * 註冊 eval 指令群組
 *
 * 用法：
 *   vecfuse eval recall [queries...] [--k 10]
 *   vecfuse eval diversity <query> [--k 10] [--lambda 0.5]
 *   vecfuse eval latency <query> [--mode hybrid] [--runs 100]
 */
export function registerEvalCommand(program: Command): void {
  const evalCmd = program
    .command('eval')
    .description('Evaluate recall, diversity and latency of the search pipeline');

  evalCmd
    .command('recall')
    .description('Recall@k of store dense search against exact cosine top-k')
    .argument('[queries...]', 'Queries to evaluate (default: one sample text per category)')
    .option('--root <path>', 'Project root directory', '.')
    .option('--k <number>', 'Cut-off k (default from config)')
    .option('--format <format>', 'Output format: json or text', 'text')
    .action(async (queries: string[], opts: RecallOptions) => {
      const format = parseFormat(opts.format);
      const report = await withEvaluation(opts.root, (useCase, runtime) =>
        useCase.recall({
          queries: queries.length > 0 ? queries : defaultQueries(),
          k: opts.k !== undefined ? parseInteger(opts.k, 'k') : runtime.config.evaluation.recallK,
        }),
      );
      process.stdout.write(new ResultFormatter().formatObject(report, format) + '\n');
    });

  evalCmd
    .command('diversity')
    .description('Redundancy of plain dense top-k versus MMR top-k')
    .argument('<query>', 'Query to evaluate')
    .option('--root <path>', 'Project root directory', '.')
    .option('--k <number>', 'Number of results (default from config)')
    .option('--lambda <number>', 'MMR lambda (default from config)')
    .option('--format <format>', 'Output format: json or text', 'text')
    .action(async (query: string, opts: DiversityOptions) => {
      const format = parseFormat(opts.format);
      const report = await withEvaluation(opts.root, (useCase, runtime) =>
        useCase.diversity({
          query,
          k: opts.k !== undefined ? parseInteger(opts.k, 'k') : runtime.config.search.defaultTopK,
          lambda: opts.lambda !== undefined ? parseNumber(opts.lambda, 'lambda') : runtime.config.search.mmrLambda,
        }),
      );
      process.stdout.write(new ResultFormatter().formatObject(report, format) + '\n');
    });

  evalCmd
    .command('latency')
    .description('Latency distribution (mean, std, p50, p95, p99) of repeated searches')
    .argument('<query>', 'Query to run')
    .option('--root <path>', 'Project root directory', '.')
    .option('--mode <mode>', 'Search mode: dense, sparse, hybrid', 'hybrid')
    .option('--runs <number>', 'Number of runs (default from config)')
    .option('--format <format>', 'Output format: json or text', 'text')
    .action(async (query: string, opts: LatencyOptions) => {
      const format = parseFormat(opts.format);
      const report = await withEvaluation(opts.root, (useCase, runtime) =>
        useCase.latency({
          query,
          mode: parseMode(opts.mode),
          runs: opts.runs !== undefined ? parseInteger(opts.runs, 'runs') : runtime.config.evaluation.latencyRuns,
        }),
      );
      process.stdout.write(new ResultFormatter().formatObject(report, format) + '\n');
    });
}
