import { describe, it, expect } from 'vitest';
import { HashingEmbeddingAdapter } from '../../../src/infrastructure/embedding/HashingEmbeddingAdapter.js';
import { EmbeddingUnavailableError } from '../../../src/domain/errors/DomainErrors.js';
import { cosineSimilarity, l2Norm } from '../../../src/domain/value-objects/VectorMath.js';

describe('HashingEmbeddingAdapter', () => {
  const adapter = new HashingEmbeddingAdapter({ dimension: 256 });

  it('should expose provider metadata', () => {
    expect(adapter.providerId).toBe('local');
    expect(adapter.modelId).toBe('feature-hash-v1');
    expect(adapter.dimension).toBe(256);
  });

  it('should produce unit vectors of the configured dimension', async () => {
    const { vector, tokensUsed } = await adapter.embedOne('Reset your account password');
    expect(vector).toHaveLength(256);
    expect(l2Norm(vector)).toBeCloseTo(1, 5);
    expect(tokensUsed).toBe(4);
  });

  it('should be deterministic and case-insensitive', async () => {
    const a = await adapter.embedOne('Quarterly Report');
    const b = await adapter.embedOne('quarterly report');
    expect(Array.from(b.vector)).toEqual(Array.from(a.vector));
  });

  it('should place texts sharing words closer than unrelated texts', async () => {
    const [base, related, unrelated] = await adapter.embed([
      'reset account password',
      'reset account password today',
      'shipping container logistics',
    ]);
    expect(cosineSimilarity(base.vector, related.vector))
      .toBeGreaterThan(cosineSimilarity(base.vector, unrelated.vector));
  });

  it('should report embedding unavailable for text without tokens', async () => {
    await expect(adapter.embedOne('  ...  ')).rejects.toThrow(EmbeddingUnavailableError);
    await expect(adapter.embed(['ok', '???'])).rejects.toThrow('no tokens to embed in "???"');
  });

  it('should always report healthy', async () => {
    await expect(adapter.isHealthy()).resolves.toBe(true);
  });
});
