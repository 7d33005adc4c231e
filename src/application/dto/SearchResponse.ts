import type { FusedResult } from '../../domain/entities/Candidate.js';
import type { SearchMode } from './SearchRequest.js';

/** 搜尋回應 */
export interface SearchResponse {
  results: FusedResult[];
  /** 實際執行的模式（embedding 失敗時 hybrid 會降級為 sparse） */
  searchMode: SearchMode;
  /** 融合前兩路候選的聯集大小 */
  totalCandidates: number;
  durationMs: number;
  warnings: string[];
  mmrApplied: boolean;
  pipelineStages: PipelineStageInfo[];
}

/** 管線階段執行資訊 */
export interface PipelineStageInfo {
  name: string;
  durationMs: number;
  /** 該階段是否被跳過 */
  skipped: boolean;
  /** 跳過原因 */
  skipReason?: string;
}
