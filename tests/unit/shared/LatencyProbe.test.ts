import { describe, it, expect, vi } from 'vitest';
import { measureLatency, percentile, summarize } from '../../../src/shared/LatencyProbe.js';
import { InvalidArgumentError } from '../../../src/domain/errors/DomainErrors.js';

/** 依序回傳預先排好的時間點 */
function fakeClock(ticks: number[]): () => number {
  let i = 0;
  return () => ticks[i++];
}

describe('LatencyProbe', () => {
  it('should interpolate percentiles linearly', () => {
    const sorted = [1, 2, 3, 4];
    expect(percentile(sorted, 0)).toBe(1);
    expect(percentile(sorted, 50)).toBe(2.5);
    expect(percentile(sorted, 100)).toBe(4);
    expect(percentile([], 50)).toBe(0);
  });

  it('should summarize samples with population standard deviation', () => {
    const stats = summarize([4, 1, 3, 2]);
    expect(stats.mean).toBe(2.5);
    expect(stats.p50).toBe(2.5);
    expect(stats.p95).toBeCloseTo(3.85, 10);
    expect(stats.p99).toBeCloseTo(3.97, 10);
    expect(stats.std).toBeCloseTo(Math.sqrt(1.25), 10);
  });

  it('should return zeros for no samples', () => {
    expect(summarize([])).toEqual({ p50: 0, p95: 0, p99: 0, mean: 0, std: 0 });
  });

  it('should time each run sequentially with the injected clock', async () => {
    const fn = vi.fn(async () => 'done');
    // 每次 run 讀兩次時鐘：耗時依序 1, 3, 2, 4
    const clock = fakeClock([0, 1, 10, 13, 20, 22, 30, 34]);

    const stats = await measureLatency(fn, 4, clock);

    expect(fn).toHaveBeenCalledTimes(4);
    expect(stats.mean).toBe(2.5);
    expect(stats.p50).toBe(2.5);
  });

  it('should reject a non-positive run count', async () => {
    await expect(measureLatency(() => undefined, 0)).rejects.toThrow(InvalidArgumentError);
    await expect(measureLatency(() => undefined, 1.5)).rejects.toThrow(
      'Invalid argument "runs": must be a positive integer, got 1.5',
    );
  });
});
