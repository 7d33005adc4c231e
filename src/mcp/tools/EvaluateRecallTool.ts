import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { EvaluationUseCase } from '../../application/EvaluationUseCase.js';
import type { McpDependencies } from '../McpServer.js';

/**
 * MCP Tool: vecfuse_evaluate_recall
 * 對應 CLI: vecfuse eval recall
 */
export function registerEvaluateRecallTool(server: McpServer, deps: McpDependencies): void {
  server.tool(
    'vecfuse_evaluate_recall',
    'Measure recall@k of store dense search against exact cosine top-k',
    {
      queries: z.array(z.string()).min(1).describe('Queries to evaluate'),
      k: z.number().int().min(0).optional().describe('Cut-off k'),
    },
    async ({ queries, k }) => {
      const useCase = new EvaluationUseCase(deps.store, deps.embedding, deps.searchUseCase);
      const report = await useCase.recall({ queries, k: k ?? deps.evaluation.recallK });

      const lines = [
        `Mean recall@${report.k}: ${report.meanRecall.toFixed(4)}`,
        '',
        ...report.perQuery.map((q) => `- ${q.query}: ${q.recall.toFixed(4)}`),
      ];

      return {
        content: [{ type: 'text' as const, text: lines.join('\n') }],
      };
    },
  );
}
