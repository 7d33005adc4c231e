import type { Candidate, FusedResult } from '../entities/Candidate.js';
import { assertNonNegativeInteger, assertUnitInterval } from './VectorMath.js';

interface ScoreEntry {
  score: number;
  /** 勝出那筆（最後一筆）在原列表中的位置 */
  rank: number;
}

/**
 * Dense + Sparse 線性加權融合
 *
 * fused = w × dense + (1 − w) × sparse，只出現在單一路的 id 另一路以 0 計
 * （不排除；因此單路命中仍可能排在前面）。
 *
 * 同分時的次序鍵：dense 排名 → sparse 排名 → id，輸出可重現。
 * Metadata 取自 dense 列表優先，其次 sparse。
 */
export class WeightedFusion {
  static fuse(
    denseResults: readonly Candidate[],
    sparseResults: readonly Candidate[],
    denseWeight: number,
    finalLimit: number,
  ): FusedResult[] {
    assertUnitInterval(denseWeight, 'denseWeight');
    assertNonNegativeInteger(finalLimit, 'finalLimit');

    const dense = WeightedFusion.toScoreTable(denseResults);
    const sparse = WeightedFusion.toScoreTable(sparseResults);

    const allIds = new Set<number>([...dense.keys(), ...sparse.keys()]);
    if (allIds.size === 0) return [];

    const sparseWeight = 1 - denseWeight;
    const ranked: Array<{ id: number; fused: number; denseScore: number; sparseScore: number; denseRank: number; sparseRank: number }> = [];
    for (const id of allIds) {
      const d = dense.get(id);
      const s = sparse.get(id);
      const denseScore = d?.score ?? 0;
      const sparseScore = s?.score ?? 0;

      ranked.push({
        id,
        fused: denseWeight * denseScore + sparseWeight * sparseScore,
        denseScore,
        sparseScore,
        denseRank: d?.rank ?? Infinity,
        sparseRank: s?.rank ?? Infinity,
      });
    }

    ranked.sort((a, b) =>
      b.fused - a.fused
      || WeightedFusion.compareRank(a.denseRank, b.denseRank)
      || WeightedFusion.compareRank(a.sparseRank, b.sparseRank)
      || a.id - b.id,
    );

    const metadata = WeightedFusion.buildMetadataMap(denseResults, sparseResults);

    return ranked.slice(0, finalLimit).map((r) => {
      const source = metadata.get(r.id);
      return {
        ...source,
        id: r.id,
        score: r.fused,
        denseScore: r.denseScore,
        sparseScore: r.sparseScore,
      };
    });
  }

  /** Candidate 列表 → Map<id, {score, rank}>，同一 id 後寫入者覆蓋 */
  private static toScoreTable(results: readonly Candidate[]): Map<number, ScoreEntry> {
    const table = new Map<number, ScoreEntry>();
    results.forEach((r, rank) => {
      table.set(r.id, { score: r.score, rank });
    });
    return table;
  }

  /** Infinity − Infinity 為 NaN，這裡明確處理兩邊都缺席的情況 */
  private static compareRank(a: number, b: number): number {
    if (a === b) return 0;
    return a < b ? -1 : 1;
  }

  /** dense 先放、sparse 只補缺，同一列表內首筆為準 */
  private static buildMetadataMap(
    denseResults: readonly Candidate[],
    sparseResults: readonly Candidate[],
  ): Map<number, Candidate> {
    const map = new Map<number, Candidate>();
    for (const r of [...denseResults, ...sparseResults]) {
      if (!map.has(r.id)) map.set(r.id, r);
    }
    return map;
  }
}
