import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { HealthCheckUseCase } from '../../../src/application/HealthCheckUseCase.js';
import { DatabaseManager } from '../../../src/infrastructure/sqlite/DatabaseManager.js';
import { SqliteVectorStore } from '../../../src/infrastructure/sqlite/SqliteVectorStore.js';
import { HashingEmbeddingAdapter } from '../../../src/infrastructure/embedding/HashingEmbeddingAdapter.js';
import { Logger } from '../../../src/shared/Logger.js';
import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';

describe('HealthCheckUseCase', () => {
  const dim = 4;
  const tmpDir = path.join(os.tmpdir(), 'vecfuse-health-' + Date.now());
  let dbMgr: DatabaseManager;
  let store: SqliteVectorStore;
  let useCase: HealthCheckUseCase;

  beforeEach(async () => {
    Logger.configure('error');
    fs.mkdirSync(tmpDir, { recursive: true });
    dbMgr = new DatabaseManager(path.join(tmpDir, 'test.db'), dim);
    store = new SqliteVectorStore(dbMgr.getDb(), dim);
    useCase = new HealthCheckUseCase(dbMgr.getDb(), store, new HashingEmbeddingAdapter({ dimension: dim }), dim);

    await store.upsert([
      { id: 1, dense: new Float32Array([1, 0, 0, 0]), sparse: { indices: [1], values: [1] }, payload: { text: 'one' } },
      { id: 2, dense: new Float32Array([0, 1, 0, 0]), sparse: { indices: [2], values: [1] }, payload: { text: 'two' } },
    ]);
  });

  afterEach(() => {
    dbMgr.close();
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('should report healthy when the store is consistent', async () => {
    const report = await useCase.check();

    expect(report.healthy).toBe(true);
    expect(report.totalPoints).toBe(2);
    expect(report.dimension).toBe(4);
    expect(report.embeddingProvider).toBe('local');
    expect(report.missingDenseRowIds).toEqual([]);
    expect(report.orphanedSparseTerms).toBe(0);
    expect(report.fixActions).toEqual([]);
  });

  /**
   * Scenario: 索引不一致
   * Given vec0 缺少 point 2 的 row，且有指向不存在 point 的 sparse term
   * When 執行 check
   * Then 回報不健康並列出問題
   */
  it('should detect missing dense rows and orphaned sparse terms', async () => {
    const db = dbMgr.getDb();
    db.prepare('DELETE FROM points_vec WHERE rowid = ?').run(BigInt(2));
    db.prepare('INSERT INTO sparse_terms(point_id, token_id, weight) VALUES(99, 5, 1.0)').run();

    const report = await useCase.check();

    expect(report.healthy).toBe(false);
    expect(report.missingDenseRowIds).toEqual([2]);
    expect(report.orphanedSparseTerms).toBe(1);
  });

  it('should repair the store in fix mode', async () => {
    const db = dbMgr.getDb();
    db.prepare('DELETE FROM points_vec WHERE rowid = ?').run(BigInt(2));
    db.prepare('INSERT INTO sparse_terms(point_id, token_id, weight) VALUES(99, 5, 1.0)').run();

    const fixed = await useCase.check({ fix: true });
    expect(fixed.healthy).toBe(true);
    expect(fixed.fixActions).toEqual([
      'Rebuilt 1 dense index rows',
      'Deleted 1 orphaned sparse terms',
    ]);

    const after = await useCase.check();
    expect(after.healthy).toBe(true);
    expect(after.missingDenseRowIds).toEqual([]);
    expect(after.orphanedSparseTerms).toBe(0);

    const [top] = await store.search({ query: { kind: 'dense', vector: new Float32Array([0, 1, 0, 0]) }, limit: 1 });
    expect(top.id).toBe(2);
  });

  it('should report unhealthy when the embedding dimension differs from the store', async () => {
    const mismatched = new HealthCheckUseCase(dbMgr.getDb(), store, new HashingEmbeddingAdapter({ dimension: 8 }), dim);
    const report = await mismatched.check();
    expect(report.healthy).toBe(false);
    expect(report.embeddingHealthy).toBe(true);
  });
});
