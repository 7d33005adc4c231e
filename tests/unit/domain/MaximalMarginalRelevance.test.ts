import { describe, it, expect } from 'vitest';
import { MaximalMarginalRelevance } from '../../../src/domain/value-objects/MaximalMarginalRelevance.js';
import { InvalidArgumentError } from '../../../src/domain/errors/DomainErrors.js';
import type { Candidate } from '../../../src/domain/entities/Candidate.js';

// query 偏向 x 軸，帶一點 z 分量
const query = [1, 0, 0.5];
// A 最接近 query；B 幾乎與 A 相同；C 與 A、B 正交
const A: Candidate = { id: 1, score: 0.9, vector: [1, 0, 0] };
const B: Candidate = { id: 2, score: 0.89, vector: [1, 0.1, 0] };
const C: Candidate = { id: 3, score: 0.45, vector: [0, 0, 1] };

/**
 * Feature: MMR 多樣化重排序
 */
describe('MaximalMarginalRelevance', () => {
  /**
   * Scenario: 近似重複的候選被壓低
   * Given A 最相關、B 與 A 近乎相同、C 與兩者正交
   * When lambda = 0.5、k = 2
   * Then 第二筆選 C 而不是 B
   */
  it('should pick the orthogonal candidate over the near-duplicate', () => {
    const result = MaximalMarginalRelevance.rerank(query, [A, B, C], 0.5, 2);
    expect(result.map((r) => r.id)).toEqual([1, 3]);
  });

  /**
   * Scenario: maxSim 不截斷，負相似度會提高 MMR 分數
   * Given P 與 query 最相關；N 與 P 的 cosine 為負；O 與 P 正交且相關性略高於 N
   * When lambda = 0.5、k = 2
   * Then 第二筆選 N 而不是 O
   */
  it('should reward negative similarity to the selected set', () => {
    const P: Candidate = { id: 21, score: 0.9, vector: [1, 0, 0] };
    const N: Candidate = { id: 22, score: 0.1, vector: [-0.2, 1, 0] };
    const O: Candidate = { id: 23, score: 0.1, vector: [0, 0.35, 1] };

    const result = MaximalMarginalRelevance.rerank([1, 0.3, 0], [P, N, O], 0.5, 2);

    expect(result.map((r) => r.id)).toEqual([21, 22]);
  });

  it('should order purely by relevance when lambda is 1', () => {
    const result = MaximalMarginalRelevance.rerank(query, [C, B, A], 1, 3);
    expect(result.map((r) => r.id)).toEqual([1, 2, 3]);
  });

  it('should start with the most relevant and then maximise diversity when lambda is 0', () => {
    const result = MaximalMarginalRelevance.rerank(query, [A, B, C], 0, 3);
    expect(result.map((r) => r.id)).toEqual([1, 3, 2]);
  });

  it('should return min(k, n) distinct candidates', () => {
    const result = MaximalMarginalRelevance.rerank(query, [A, B, C], 0.5, 10);
    expect(result).toHaveLength(3);
    expect(new Set(result.map((r) => r.id)).size).toBe(3);
  });

  it('should return an empty list for no candidates or k = 0', () => {
    expect(MaximalMarginalRelevance.rerank(query, [], 0.5, 5)).toEqual([]);
    expect(MaximalMarginalRelevance.rerank(query, [A, B], 0.5, 0)).toEqual([]);
  });

  it('should break ties by the lowest original index', () => {
    const first: Candidate = { id: 10, score: 1, vector: [0, 1] };
    const second: Candidate = { id: 20, score: 1, vector: [0, 1] };
    const result = MaximalMarginalRelevance.rerank([0, 1], [first, second], 0.7, 1);
    expect(result[0].id).toBe(10);
  });

  it('should keep the candidate objects intact', () => {
    const [top] = MaximalMarginalRelevance.rerank(query, [A, B, C], 0.5, 1);
    expect(top).toBe(A);
  });

  it('should reject a candidate without a vector', () => {
    const bare: Candidate = { id: 4, score: 0.3 };
    expect(() => MaximalMarginalRelevance.rerank(query, [A, bare], 0.5, 2)).toThrow(
      'Invalid argument "candidates": candidate 4 (index 1) has no vector attached',
    );
  });

  it('should reject a dimension mismatch', () => {
    const short: Candidate = { id: 5, score: 0.3, vector: [1, 0] };
    expect(() => MaximalMarginalRelevance.rerank(query, [short], 0.5, 1)).toThrow(InvalidArgumentError);
  });

  it('should reject lambda outside [0, 1] and a negative k', () => {
    expect(() => MaximalMarginalRelevance.rerank(query, [A], 1.2, 1)).toThrow(InvalidArgumentError);
    expect(() => MaximalMarginalRelevance.rerank(query, [A], 0.5, -1)).toThrow(InvalidArgumentError);
  });

  it('should reject a zero query vector', () => {
    expect(() => MaximalMarginalRelevance.rerank([0, 0, 0], [A], 0.5, 1)).toThrow(
      'Invalid argument "queryVector": vector has zero or non-finite L2 norm',
    );
  });
});
