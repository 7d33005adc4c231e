import { describe, it, expect } from 'vitest';
import {
  dot,
  l2Norm,
  normalize,
  cosineSimilarity,
  assertUnitInterval,
  assertNonNegativeInteger,
} from '../../../src/domain/value-objects/VectorMath.js';
import { sparseFromEntries, sparseDot } from '../../../src/domain/value-objects/SparseVector.js';
import { InvalidArgumentError } from '../../../src/domain/errors/DomainErrors.js';

describe('VectorMath', () => {
  it('should compute dot product and L2 norm', () => {
    expect(dot([1, 2, 3], [4, 5, 6])).toBe(32);
    expect(l2Norm([3, 4])).toBe(5);
  });

  it('should normalize to a unit vector', () => {
    expect(Array.from(normalize([3, 4]))).toEqual([0.6, 0.8]);
  });

  it('should reject zero and non-finite vectors when normalizing', () => {
    expect(() => normalize([0, 0], 'query')).toThrow(
      'Invalid argument "query": vector has zero or non-finite L2 norm',
    );
    expect(() => normalize([Number.NaN, 1])).toThrow(InvalidArgumentError);
  });

  it('should compute cosine similarity independent of magnitude', () => {
    expect(cosineSimilarity([1, 0], [5, 0])).toBe(1);
    expect(cosineSimilarity([1, 0], [0, 2])).toBe(0);
    expect(cosineSimilarity([1, 0], [-3, 0])).toBe(-1);
  });

  it('should validate unit interval and non-negative integers', () => {
    expect(() => assertUnitInterval(0, 'w')).not.toThrow();
    expect(() => assertUnitInterval(1, 'w')).not.toThrow();
    expect(() => assertUnitInterval(Number.NaN, 'w')).toThrow(InvalidArgumentError);
    expect(() => assertNonNegativeInteger(0, 'k')).not.toThrow();
    expect(() => assertNonNegativeInteger(1.5, 'k')).toThrow('Invalid argument "k": must be a non-negative integer, got 1.5');
  });
});

describe('SparseVector', () => {
  it('should sort indices and sum duplicate entries', () => {
    const v = sparseFromEntries([[7, 1], [2, 0.5], [7, 2]]);
    expect(v).toEqual({ indices: [2, 7], values: [0.5, 3] });
  });

  it('should reject negative or fractional indices', () => {
    expect(() => sparseFromEntries([[-1, 1]])).toThrow(InvalidArgumentError);
    expect(() => sparseFromEntries([[1.5, 1]])).toThrow(InvalidArgumentError);
  });

  it('should compute the dot product over shared indices only', () => {
    const a = { indices: [1, 3, 5], values: [1, 2, 3] };
    const b = { indices: [3, 4, 5], values: [10, 20, 30] };
    expect(sparseDot(a, b)).toBe(2 * 10 + 3 * 30);
    expect(sparseDot(a, { indices: [], values: [] })).toBe(0);
  });
});
