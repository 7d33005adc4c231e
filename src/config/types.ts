import type { LogLevel } from '../shared/Logger.js';

/** 向量儲存設定 */
export interface StoreConfig {
  /** SQLite 檔案路徑（相對於 root 目錄） */
  dbPath: string;
}

/** Dense embedding 提供者設定 */
export interface EmbeddingConfig {
  /** openai：OpenAI-compatible API；local：本地 feature hashing */
  provider: 'openai' | 'local';
  model: string;
  dimension: number;
  maxBatchSize: number;
  apiKey?: string;
  baseUrl?: string;
}

/** Sparse encoder 設定 */
export interface SparseConfig {
  /** token hash 的 bucket 數 */
  vocabularySize: number;
}

/** 搜尋設定 */
export interface SearchConfig {
  defaultTopK: number;
  /** 每一路候選數 = topK × candidateMultiplier */
  candidateMultiplier: number;
  /** 融合時 dense 的權重，sparse 為 1 − denseWeight */
  denseWeight: number;
  /** MMR 預設 λ */
  mmrLambda: number;
  scoreThreshold?: number;
}

/** 示範資料集設定 */
export interface DatasetConfig {
  size: number;
  seed: number;
  /** upsert 批次大小 */
  batchSize: number;
}

/** 評估設定 */
export interface EvaluationConfig {
  recallK: number;
  latencyRuns: number;
}

export interface LogConfig {
  level: LogLevel;
}

/** 完整設定 */
export interface VecFuseConfig {
  version: number;
  store: StoreConfig;
  embedding: EmbeddingConfig;
  sparse: SparseConfig;
  search: SearchConfig;
  dataset: DatasetConfig;
  evaluation: EvaluationConfig;
  log: LogConfig;
}

/** 部分設定（用於 merge） */
export type PartialConfig = {
  [K in keyof VecFuseConfig]?: VecFuseConfig[K] extends object ? Partial<VecFuseConfig[K]> : VecFuseConfig[K];
};
