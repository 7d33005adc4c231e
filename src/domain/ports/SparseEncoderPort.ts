import type { SparseVector } from '../value-objects/SparseVector.js';

/** 文字 → 稀疏向量（關鍵字比對用） */
export interface SparseEncoderPort {
  readonly encoderId: string;
  encode(text: string): SparseVector;
}
