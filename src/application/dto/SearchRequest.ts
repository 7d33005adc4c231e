import type { PayloadFilter } from '../../domain/ports/VectorStorePort.js';

/** 搜尋模式：dense（語意）、sparse（關鍵字）、hybrid（兩路融合，預設） */
export const SEARCH_MODES = ['dense', 'sparse', 'hybrid'] as const;
export type SearchMode = (typeof SEARCH_MODES)[number];

export function isSearchMode(value: unknown): value is SearchMode {
  return SEARCH_MODES.some((mode) => mode === value);
}

/** 搜尋請求 */
export interface SearchRequest {
  query: string;
  mode?: SearchMode;
  topK?: number;
  /** hybrid 融合時 dense 的權重，預設取 config */
  denseWeight?: number;
  filter?: PayloadFilter;
  /** 啟用 MMR 多樣化；lambda 省略時取 config.search.mmrLambda */
  mmr?: { lambda?: number };
  /** 回應中是否保留 dense vector */
  includeVectors?: boolean;
}
