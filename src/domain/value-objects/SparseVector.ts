import { InvalidArgumentError } from '../errors/DomainErrors.js';

/** 稀疏向量：token id → 權重，indices 遞增排序且不重複 */
export interface SparseVector {
  indices: number[];
  values: number[];
}

/**
 * 由 token id → weight 對應建立 SparseVector
 * 依 index 排序；同一 index 出現多次時權重相加
 */
export function sparseFromEntries(entries: Iterable<[number, number]>): SparseVector {
  const merged = new Map<number, number>();
  for (const [index, weight] of entries) {
    if (!Number.isInteger(index) || index < 0) {
      throw new InvalidArgumentError('indices', `sparse index must be a non-negative integer, got ${index}`);
    }
    merged.set(index, (merged.get(index) ?? 0) + weight);
  }

  const sorted = [...merged.entries()].sort((a, b) => a[0] - b[0]);
  return {
    indices: sorted.map(([index]) => index),
    values: sorted.map(([, weight]) => weight),
  };
}

export function sparseDot(a: SparseVector, b: SparseVector): number {
  // 兩邊都已排序，雙指標合併
  let i = 0;
  let j = 0;
  let sum = 0;
  while (i < a.indices.length && j < b.indices.length) {
    if (a.indices[i] === b.indices[j]) {
      sum += a.values[i] * b.values[j];
      i++;
      j++;
    } else if (a.indices[i] < b.indices[j]) {
      i++;
    } else {
      j++;
    }
  }
  return sum;
}
