import type { Vector } from '../value-objects/VectorMath.js';

/** 向量搜尋服務回傳的單筆結果 */
export interface Candidate {
  /** 同一次查詢結果內唯一的整數 id */
  id: number;
  /** 相關性分數，越大越好 */
  score: number;
  payload?: Record<string, unknown>;
  /** 只有以 withVectors 查詢時才會帶回 dense embedding */
  vector?: Vector;
}

/** 融合後的結果：score 為融合分數，另保留兩路原始分數 */
export interface FusedResult extends Candidate {
  denseScore: number;
  sparseScore: number;
}
