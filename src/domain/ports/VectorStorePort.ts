import type { Candidate } from '../entities/Candidate.js';
import type { VectorPoint } from '../entities/VectorPoint.js';
import type { SparseVector } from '../value-objects/SparseVector.js';

/**
 * 查詢向量的 tagged variant：在 port 邊界一次決定 dense 或 sparse，
 * 融合與 MMR 只處理已取回的 Candidate。
 */
export type QueryVector =
  | { kind: 'dense'; vector: Float32Array }
  | ({ kind: 'sparse' } & SparseVector);

export type PayloadValue = string | number | boolean;

/** payload 欄位條件：等值或數值範圍 */
export type FieldCondition =
  | { key: string; match: PayloadValue }
  | { key: string; range: { gte?: number; lte?: number } };

export interface PayloadFilter {
  /** 全部條件都須成立 */
  must: FieldCondition[];
}

export interface VectorSearchRequest {
  query: QueryVector;
  limit: number;
  filter?: PayloadFilter;
  /** 是否帶回 dense vector（MMR 需要） */
  withVectors?: boolean;
  /** 低於此分數的結果丟棄 */
  scoreThreshold?: number;
}

export interface StoredVector {
  id: number;
  vector: Float32Array;
}

/**
 * 外部向量搜尋服務
 * 錯誤原樣往上拋，application 層不重試也不遮蔽
 */
export interface VectorStorePort {
  upsert(points: VectorPoint[]): Promise<void>;
  search(request: VectorSearchRequest): Promise<Candidate[]>;
  count(): Promise<number>;
  /** 依 id 遞增列出所有 dense 向量（暴力 ground truth 用） */
  listDenseVectors(): Promise<StoredVector[]>;
  /** 清空所有 points */
  recreate(): Promise<void>;
}
