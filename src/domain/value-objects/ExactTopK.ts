import { assertNonNegativeInteger, assertSameDimension, dot, normalize } from './VectorMath.js';
import type { Vector } from './VectorMath.js';

export interface ExactHit {
  /** 在 allVectors 中的位置 */
  index: number;
  score: number;
}

/**
 * 暴力 cosine top-k，作為 recall 評估的 ground truth
 * 分數降序，同分取 index 較小者
 */
export class ExactTopK {
  static compute(queryVector: Vector, allVectors: readonly Vector[], k: number): ExactHit[] {
    assertNonNegativeInteger(k, 'k');
    if (allVectors.length === 0 || k === 0) return [];

    const query = normalize(queryVector, 'queryVector');
    const hits: ExactHit[] = allVectors.map((v, index) => {
      assertSameDimension(queryVector, v, 'allVectors');
      return { index, score: dot(normalize(v, 'allVectors'), query) };
    });

    hits.sort((a, b) => b.score - a.score || a.index - b.index);
    return hits.slice(0, k);
  }
}
