import { describe, it, expect } from 'vitest';
import { RetrievalMetrics } from '../../../src/domain/value-objects/RetrievalMetrics.js';
import { InvalidArgumentError } from '../../../src/domain/errors/DomainErrors.js';

describe('RetrievalMetrics', () => {
  describe('recallAtK', () => {
    it('should count the overlap of the first k ids as sets', () => {
      expect(RetrievalMetrics.recallAtK([1, 2, 3, 4], [2, 4, 6, 8], 4)).toBe(0.5);
    });

    it('should ignore order within the top k', () => {
      expect(RetrievalMetrics.recallAtK([3, 2, 1], [1, 2, 3], 3)).toBe(1);
    });

    it('should truncate both lists to k', () => {
      // pred[:2] = {1, 9}, truth[:2] = {1, 2}
      expect(RetrievalMetrics.recallAtK([1, 9, 2], [1, 2, 3], 2)).toBe(0.5);
    });

    it('should return 0 when the ground truth is empty', () => {
      expect(RetrievalMetrics.recallAtK([1, 2], [], 2)).toBe(0);
      expect(RetrievalMetrics.recallAtK([1, 2], [1, 2], 0)).toBe(0);
    });

    it('should reject a negative k', () => {
      expect(() => RetrievalMetrics.recallAtK([], [], -1)).toThrow(InvalidArgumentError);
    });
  });

  describe('redundancy', () => {
    it('should average positive pairwise cosine similarity', () => {
      // pairs: (a,b)=1, (a,c)=0, (b,c)=0 → 只有一組為正
      const value = RetrievalMetrics.redundancy([[1, 0], [2, 0], [0, 1]]);
      expect(value).toBeCloseTo(1, 10);
    });

    it('should be 0 for fewer than two vectors or only non-positive pairs', () => {
      expect(RetrievalMetrics.redundancy([])).toBe(0);
      expect(RetrievalMetrics.redundancy([[1, 0]])).toBe(0);
      expect(RetrievalMetrics.redundancy([[1, 0], [-1, 0], [0, 1]])).toBe(0);
    });

    it('should be lower for a diverse set than for near duplicates', () => {
      const duplicates = RetrievalMetrics.redundancy([[1, 0.1], [1, 0.05], [1, 0]]);
      const diverse = RetrievalMetrics.redundancy([[1, 0], [0, 1], [1, 1]]);
      expect(diverse).toBeLessThan(duplicates);
    });
  });

  describe('textRedundancy', () => {
    it('should average pairwise Jaccard similarity of lowercase word sets', () => {
      // {a,b} vs {b,c} → 1/3
      expect(RetrievalMetrics.textRedundancy(['A b', 'b C'])).toBeCloseTo(1 / 3, 10);
    });

    it('should be 1 for identical texts and 0 for fewer than two', () => {
      expect(RetrievalMetrics.textRedundancy(['same words', 'Same   words'])).toBe(1);
      expect(RetrievalMetrics.textRedundancy(['only one'])).toBe(0);
    });
  });
});
