import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { McpDependencies } from '../McpServer.js';

/**
 * MCP Tool: vecfuse_status
 * 對應 CLI: vecfuse health
 */
export function registerStatusTool(server: McpServer, deps: McpDependencies): void {
  server.tool(
    'vecfuse_status',
    'Show point count and embedding provider info',
    {},
    async () => {
      const totalPoints = await deps.store.count();
      const embeddingHealthy = await deps.embedding.isHealthy();

      const lines: string[] = [
        '# vecfuse Store Status',
        '',
        `Points: ${totalPoints}`,
        `Embedding provider: ${deps.embedding.providerId}`,
        `Embedding model: ${deps.embedding.modelId}`,
        `Embedding dimension: ${deps.embedding.dimension}`,
        `Embedding healthy: ${embeddingHealthy ? 'yes' : 'no'}`,
      ];

      return {
        content: [{ type: 'text' as const, text: lines.join('\n') }],
      };
    },
  );
}
