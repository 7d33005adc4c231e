import type { Candidate } from '../entities/Candidate.js';
import {
  assertNonNegativeInteger,
  assertSameDimension,
  assertUnitInterval,
  dot,
  normalize,
} from './VectorMath.js';
import type { Vector } from './VectorMath.js';
import { InvalidArgumentError } from '../errors/DomainErrors.js';

/**
 * Maximal Marginal Relevance 重排序
 *
 * 公式：MMR(i) = λ × sim(q, i) − (1 − λ) × max_{j ∈ selected} sim(i, j)
 * - λ = 1.0：純相關性排序
 * - λ = 0.0：第一筆仍取最相關者，之後只挑與已選最不相似者
 *
 * 相似度為單位向量內積，範圍 [-1, 1]，不做 clamp。
 * 同分時取原始 index 較小者。回傳順序即為選取順序。
 */
export class MaximalMarginalRelevance {
  static rerank<T extends Candidate>(
    queryVector: Vector,
    candidates: readonly T[],
    lambda: number,
    k: number,
  ): T[] {
    assertUnitInterval(lambda, 'lambda');
    assertNonNegativeInteger(k, 'k');
    if (candidates.length === 0 || k === 0) return [];

    const query = normalize(queryVector, 'queryVector');
    const unit = candidates.map((c, i) => {
      if (!c.vector) {
        throw new InvalidArgumentError('candidates', `candidate ${c.id} (index ${i}) has no vector attached`);
      }
      assertSameDimension(queryVector, c.vector, 'candidates');
      return normalize(c.vector, 'candidates');
    });

    const relevance = unit.map((v) => dot(v, query));
    const limit = Math.min(k, candidates.length);

    const selected: number[] = [];
    const remaining = new Set<number>(candidates.map((_, i) => i));
    // maxSim 隨每次選取遞增更新，避免每輪重算全部 pair
    const maxSim = new Array<number>(candidates.length).fill(-Infinity);

    let next = MaximalMarginalRelevance.argmax(remaining, (i) => relevance[i]);
    while (true) {
      selected.push(next);
      remaining.delete(next);
      if (selected.length >= limit) break;

      for (const i of remaining) {
        const sim = dot(unit[i], unit[next]);
        if (sim > maxSim[i]) maxSim[i] = sim;
      }

      next = MaximalMarginalRelevance.argmax(
        remaining,
        (i) => lambda * relevance[i] - (1 - lambda) * maxSim[i],
      );
    }

    return selected.map((i) => candidates[i]);
  }

  /** Set 依插入順序（即原始 index 遞增）迭代，嚴格大於才替換 → 同分取小 index */
  private static argmax(indices: Set<number>, score: (i: number) => number): number {
    let best = -1;
    let bestScore = -Infinity;
    for (const i of indices) {
      const s = score(i);
      if (best === -1 || s > bestScore) {
        best = i;
        bestScore = s;
      }
    }
    return best;
  }
}
