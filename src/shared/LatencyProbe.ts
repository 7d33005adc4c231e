import { InvalidArgumentError } from '../domain/errors/DomainErrors.js';

export interface LatencyStats {
  p50: number;
  p95: number;
  p99: number;
  mean: number;
  std: number;
}

/** 線性內插百分位數（sorted 需已遞增排序） */
export function percentile(sorted: readonly number[], p: number): number {
  if (sorted.length === 0) return 0;
  const rank = (p / 100) * (sorted.length - 1);
  const lower = Math.floor(rank);
  const upper = Math.ceil(rank);
  if (lower === upper) return sorted[lower];
  return sorted[lower] + (sorted[upper] - sorted[lower]) * (rank - lower);
}

export function summarize(samplesMs: readonly number[]): LatencyStats {
  if (samplesMs.length === 0) {
    return { p50: 0, p95: 0, p99: 0, mean: 0, std: 0 };
  }
  const sorted = [...samplesMs].sort((a, b) => a - b);
  const mean = sorted.reduce((acc, v) => acc + v, 0) / sorted.length;
  // 母體標準差
  const variance = sorted.reduce((acc, v) => acc + (v - mean) ** 2, 0) / sorted.length;

  return {
    p50: percentile(sorted, 50),
    p95: percentile(sorted, 95),
    p99: percentile(sorted, 99),
    mean,
    std: Math.sqrt(variance),
  };
}

/**
 * 依序執行 fn runs 次並統計延遲（毫秒）
 * 不平行執行，避免互相干擾量測結果
 */
export async function measureLatency(
  fn: () => unknown,
  runs: number = 100,
  clock: () => number = () => performance.now(),
): Promise<LatencyStats> {
  if (!Number.isInteger(runs) || runs <= 0) {
    throw new InvalidArgumentError('runs', `must be a positive integer, got ${runs}`);
  }

  const samples: number[] = [];
  for (let i = 0; i < runs; i++) {
    const start = clock();
    await fn();
    samples.push(clock() - start);
  }
  return summarize(samples);
}
