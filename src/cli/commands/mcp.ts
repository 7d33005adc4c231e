import type { Command } from 'commander';
import path from 'node:path';
import { createMcpServer } from '../../mcp/McpServer.js';
import { startStdioTransport } from '../../mcp/transports/StdioTransport.js';
import { openRuntime } from '../runtime.js';

interface McpCommandOptions {
  root: string;
}

/**
 * 註冊 mcp 指令
 *
 * 用法：
 *   vecfuse mcp [--root .]
 */
export function registerMcpCommand(program: Command): void {
  program
    .command('mcp')
    .description('Start MCP server (stdio) for LLM tool integration')
    .option('--root <path>', 'Project root directory', '.')
    .action(async (opts: McpCommandOptions) => {
      const root = path.resolve(opts.root);
      const runtime = openRuntime(root);

      const server = createMcpServer({
        store: runtime.store,
        embedding: runtime.embedding,
        searchUseCase: runtime.searchUseCase,
        evaluation: runtime.config.evaluation,
        rootDir: root,
      });

      // stdio 模式：持續執行直到 stdin 關閉
      await startStdioTransport(server);

      process.on('SIGINT', () => {
        runtime.close();
        process.exit(0);
      });
    });
}
