import type { SparseVector } from '../value-objects/SparseVector.js';

/** 寫入向量儲存的一個 point：dense + sparse 兩種具名向量，加上 payload */
export interface VectorPoint {
  id: number;
  dense: Float32Array;
  sparse: SparseVector;
  payload: Record<string, unknown>;
}
