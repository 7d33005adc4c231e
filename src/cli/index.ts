#!/usr/bin/env node

import { createRequire } from 'node:module';
import { Command, CommanderError } from 'commander';
import { registerSeedCommand } from './commands/seed.js';
import { registerSearchCommand } from './commands/search.js';
import { registerEvalCommand } from './commands/eval.js';
import { registerHealthCommand } from './commands/health.js';
import { registerMcpCommand } from './commands/mcp.js';

// 從 package.json 動態讀取版本號，避免硬編碼導致版本不同步
const require = createRequire(import.meta.url);
const { version } = require('../../package.json') as { version: string };

const program = new Command();

program
  .name('vecfuse')
  .description('Hybrid dense/sparse vector search with weighted fusion, MMR re-ranking and retrieval evaluation')
  .version(version);

registerSeedCommand(program);
registerSearchCommand(program);
registerEvalCommand(program);
registerHealthCommand(program);
registerMcpCommand(program);

/** 全域錯誤處理 */
program.exitOverride();

async function main(): Promise<void> {
  try {
    await program.parseAsync(process.argv);
  } catch (err) {
    if (err instanceof CommanderError) {
      if (err.code === 'commander.helpDisplayed' || err.code === 'commander.version') {
        process.exit(0);
      }
      process.exit(err.exitCode);
    }
    const message = err instanceof Error ? err.message : 'Unknown error';
    process.stderr.write(`Error: ${message}\n`);
    process.exit(1);
  }
}

void main();
