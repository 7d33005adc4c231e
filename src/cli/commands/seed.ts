import type { Command } from 'commander';
import { SeedUseCase } from '../../application/SeedUseCase.js';
import { SampleDatasetGenerator } from '../../infrastructure/dataset/SampleDatasetGenerator.js';
import { openRuntime } from '../runtime.js';
import { parseFormat, parseInteger } from '../options.js';
import { ResultFormatter } from '../formatters/ResultFormatter.js';

interface SeedCommandOptions {
  root: string;
  size?: string;
  seed?: string;
  recreate: boolean;
  format: string;
}

/**
 * 註冊 seed 指令
 *
 * 用法：
 *   vecfuse seed [--size 150] [--seed 42] [--recreate]
 */
export function registerSeedCommand(program: Command): void {
  program
    .command('seed')
    .description('Generate the sample dataset and upsert it into the vector store')
    .option('--root <path>', 'Project root directory', '.')
    .option('--size <number>', 'Number of sample records (default from config)')
    .option('--seed <number>', 'Random seed (default from config)')
    .option('--recreate', 'Drop and recreate the store before seeding', false)
    .option('--format <format>', 'Output format: json or text', 'text')
    .action(async (opts: SeedCommandOptions) => {
      const format = parseFormat(opts.format);
      const runtime = openRuntime(opts.root, { recreate: opts.recreate });

      try {
        const { config } = runtime;
        const useCase = new SeedUseCase(
          runtime.store,
          runtime.embedding,
          runtime.sparseEncoder,
          new SampleDatasetGenerator(),
          config.dataset,
          config.embedding.maxBatchSize,
        );

        const stats = await useCase.seed({
          size: opts.size !== undefined ? parseInteger(opts.size, 'size') : undefined,
          seed: opts.seed !== undefined ? parseInteger(opts.seed, 'seed') : undefined,
          recreate: opts.recreate,
        });

        process.stdout.write(new ResultFormatter().formatObject(stats, format) + '\n');
      } finally {
        runtime.close();
      }
    });
}
