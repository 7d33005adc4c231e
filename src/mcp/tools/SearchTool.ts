import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { SearchResponse } from '../../application/dto/SearchResponse.js';
import { SEARCH_MODES } from '../../application/dto/SearchRequest.js';
import type { FieldCondition } from '../../domain/ports/VectorStorePort.js';
import type { McpDependencies } from '../McpServer.js';

/**
 * MCP Tool: vecfuse_search
 * 對應 CLI: vecfuse search <query>
 */
export function registerSearchTool(server: McpServer, deps: McpDependencies): void {
  server.tool(
    'vecfuse_search',
    'Search the vector store with dense, sparse or weighted hybrid retrieval',
    {
      query: z.string().describe('Search query string'),
      mode: z.enum(SEARCH_MODES).optional().default('hybrid').describe('Search mode'),
      topK: z.number().int().min(0).optional().describe('Number of results to return'),
      denseWeight: z.number().min(0).max(1).optional().describe('Dense weight for hybrid fusion'),
      category: z.string().optional().describe('Filter by payload category'),
      lang: z.string().optional().describe('Filter by payload language'),
      mmr: z.boolean().optional().default(false).describe('Diversify results with MMR'),
      lambda: z.number().min(0).max(1).optional().describe('MMR relevance/diversity trade-off'),
    },
    async ({ query, mode, topK, denseWeight, category, lang, mmr, lambda }) => {
      const must: FieldCondition[] = [];
      if (category) must.push({ key: 'category', match: category });
      if (lang) must.push({ key: 'lang', match: lang });

      const response = await deps.searchUseCase.search({
        query,
        mode,
        topK,
        denseWeight,
        filter: must.length > 0 ? { must } : undefined,
        mmr: mmr || lambda !== undefined ? { lambda } : undefined,
      });

      return {
        content: [{
          type: 'text' as const,
          text: formatSearchResponse(response),
        }],
      };
    },
  );
}

export function formatSearchResponse(response: SearchResponse): string {
  const lines: string[] = [];
  const mmrNote = response.mmrApplied ? ', mmr' : '';
  lines.push(`Found ${response.results.length} results (mode: ${response.searchMode}${mmrNote}, ${response.durationMs}ms)`);

  if (response.warnings.length > 0) {
    lines.push(`Warnings: ${response.warnings.join('; ')}`);
  }

  lines.push('');
  for (const r of response.results) {
    const category = r.payload?.category ?? 'N/A';
    const lang = r.payload?.lang ?? 'N/A';
    lines.push(`[#${r.id}] ${String(category)} / ${String(lang)}`);
    lines.push(`  Score: ${r.score.toFixed(4)} (dense ${r.denseScore.toFixed(4)}, sparse ${r.sparseScore.toFixed(4)})`);
    if (typeof r.payload?.text === 'string') lines.push(`  ${r.payload.text}`);
    lines.push('');
  }

  return lines.join('\n');
}
