import type Database from 'better-sqlite3';
import type { EmbeddingPort } from '../domain/ports/EmbeddingPort.js';
import type { SqliteVectorStore } from '../infrastructure/sqlite/SqliteVectorStore.js';

export interface HealthCheckOptions {
  fix?: boolean;
}

export interface HealthReport {
  healthy: boolean;
  totalPoints: number;
  dimension: number;
  embeddingProvider: string;
  embeddingModel: string;
  embeddingHealthy: boolean;
  /** points 表有、vec0 索引缺少的 point */
  missingDenseRowIds: number[];
  /** sparse_terms 中 point 已不存在的 term 數 */
  orphanedSparseTerms: number;
  fixActions: string[];
}

/**
 * 健康檢查用例：驗證本地向量儲存一致性與 embedding 提供者狀態，可選修復模式
 *
 * 檢查項目：
 * 1. 每個 point 都應有 vec0 row
 * 2. sparse_terms 不應指向不存在的 point
 * 3. embedding 提供者可用且維度與儲存一致
 *
 * 修復項目（fix=true）：
 * 1. 從 points.dense 重建缺少的 vec0 rows
 * 2. 刪除 orphaned sparse terms
 */
export class HealthCheckUseCase {
  constructor(
    private readonly db: Database.Database,
    private readonly store: SqliteVectorStore,
    private readonly embedding: EmbeddingPort,
    private readonly dimension: number,
  ) {}

  async check(options: HealthCheckOptions = {}): Promise<HealthReport> {
    const fixActions: string[] = [];

    const totalPoints = await this.store.count();
    const missingDenseRowIds = this.findMissingDenseRows();
    const orphanedSparseTerms = this.countOrphanedSparseTerms();
    const embeddingHealthy = await this.embedding.isHealthy();
    const dimensionMatches = this.embedding.dimension === this.dimension;

    if (options.fix) {
      if (missingDenseRowIds.length > 0) {
        const rebuilt = this.store.rebuildDenseRows(missingDenseRowIds);
        fixActions.push(`Rebuilt ${rebuilt} dense index rows`);
      }
      if (orphanedSparseTerms > 0) {
        this.deleteOrphanedSparseTerms();
        fixActions.push(`Deleted ${orphanedSparseTerms} orphaned sparse terms`);
      }
    }

    const storeConsistent = options.fix
      ? true
      : missingDenseRowIds.length === 0 && orphanedSparseTerms === 0;

    return {
      healthy: storeConsistent && embeddingHealthy && dimensionMatches,
      totalPoints,
      dimension: this.dimension,
      embeddingProvider: this.embedding.providerId,
      embeddingModel: this.embedding.modelId,
      embeddingHealthy,
      missingDenseRowIds,
      orphanedSparseTerms,
      fixActions,
    };
  }

  /** vec0 不適合 LEFT JOIN，取出 rowid 集合後在記憶體比對 */
  private findMissingDenseRows(): number[] {
    const indexed = new Set(
      this.db.prepare<[], { rowid: number }>('SELECT rowid FROM points_vec').all().map((r) => Number(r.rowid)),
    );
    const points = this.db.prepare<[], { point_id: number }>('SELECT point_id FROM points ORDER BY point_id').all();
    return points.map((p) => p.point_id).filter((id) => !indexed.has(id));
  }

  private countOrphanedSparseTerms(): number {
    const row = this.db.prepare<[], { cnt: number }>(`
      SELECT COUNT(*) AS cnt
      FROM sparse_terms s
      LEFT JOIN points p ON p.point_id = s.point_id
      WHERE p.point_id IS NULL
    `).get();
    return row?.cnt ?? 0;
  }

  private deleteOrphanedSparseTerms(): void {
    this.db.prepare(
      'DELETE FROM sparse_terms WHERE point_id NOT IN (SELECT point_id FROM points)'
    ).run();
  }
}
