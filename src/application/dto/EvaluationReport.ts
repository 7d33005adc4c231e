import type { LatencyStats } from '../../shared/LatencyProbe.js';
import type { SearchMode } from './SearchRequest.js';

export interface QueryRecall {
  query: string;
  recall: number;
  predictedIds: number[];
  groundTruthIds: number[];
}

/** ANN 搜尋 vs 暴力 top-k 的 recall 報告 */
export interface RecallReport {
  k: number;
  meanRecall: number;
  perQuery: QueryRecall[];
}

export interface RankingDiversity {
  ids: number[];
  redundancy: number;
  /** 冗餘度的計算依據：結果都帶向量時用 cosine，否則用 payload 文字的 Jaccard */
  basis: 'vector' | 'text';
}

/** 一般 dense top-k 與 MMR top-k 的冗餘度比較 */
export interface DiversityReport {
  query: string;
  k: number;
  lambda: number;
  baseline: RankingDiversity;
  mmr: RankingDiversity;
}

export interface LatencyReport {
  query: string;
  mode: SearchMode;
  runs: number;
  stats: LatencyStats;
}
