import { McpServer as SDKMcpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { EmbeddingPort } from '../domain/ports/EmbeddingPort.js';
import type { VectorStorePort } from '../domain/ports/VectorStorePort.js';
import type { EvaluationConfig } from '../config/types.js';
import type { SearchUseCase } from '../application/SearchUseCase.js';
import { registerSearchTool } from './tools/SearchTool.js';
import { registerEvaluateRecallTool } from './tools/EvaluateRecallTool.js';
import { registerStatusTool } from './tools/StatusTool.js';

/**
 * MCP Server Factory
 *
 * 建立 MCP server 實例並註冊工具，工具與 CLI 指令一一對應。
 */
export interface McpDependencies {
  store: VectorStorePort;
  embedding: EmbeddingPort;
  searchUseCase: SearchUseCase;
  evaluation: EvaluationConfig;
  rootDir: string;
}

export function createMcpServer(deps: McpDependencies): SDKMcpServer {
  const server = new SDKMcpServer(
    { name: 'vecfuse', version: '0.1.0' },
    { instructions: buildInstructions(deps.rootDir) },
  );

  registerSearchTool(server, deps);
  registerEvaluateRecallTool(server, deps);
  registerStatusTool(server, deps);

  return server;
}

/** 建構 MCP server 的 instructions 文字 */
export function buildInstructions(rootDir: string): string {
  return [
    'vecfuse: hybrid dense/sparse vector search with weighted fusion and MMR re-ranking.',
    '',
    'Available tools:',
    '- vecfuse_search: Search the store (mode dense, sparse or hybrid; optional MMR diversification)',
    '- vecfuse_evaluate_recall: Recall@k of store dense search against exact cosine top-k',
    '- vecfuse_status: Point count and embedding provider info',
    '',
    'Tips:',
    '- denseWeight 1 ranks by semantic similarity only, 0 by keyword overlap only',
    '- Enable mmr when results look repetitive; lower lambda favours diversity',
    '',
    `Project root: ${rootDir}`,
  ].join('\n');
}
