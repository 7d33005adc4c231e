import type { Command } from 'commander';
import { HealthCheckUseCase } from '../../application/HealthCheckUseCase.js';
import { openRuntime } from '../runtime.js';
import { parseFormat } from '../options.js';
import { ResultFormatter } from '../formatters/ResultFormatter.js';

interface HealthCommandOptions {
  root: string;
  fix: boolean;
  format: string;
}

/** 註冊 health 指令 */
export function registerHealthCommand(program: Command): void {
  program
    .command('health')
    .description('Check store consistency and embedding provider status')
    .option('--root <path>', 'Project root directory', '.')
    .option('--fix', 'Attempt to fix issues', false)
    .option('--format <format>', 'Output format: json or text', 'text')
    .action(async (opts: HealthCommandOptions) => {
      const format = parseFormat(opts.format);
      const runtime = openRuntime(opts.root);

      try {
        const useCase = new HealthCheckUseCase(
          runtime.dbMgr.getDb(),
          runtime.store,
          runtime.embedding,
          runtime.config.embedding.dimension,
        );

        const report = await useCase.check({ fix: opts.fix });

        process.stdout.write(new ResultFormatter().formatObject(report, format) + '\n');
        process.exitCode = report.healthy ? 0 : 1;
      } finally {
        runtime.close();
      }
    });
}
