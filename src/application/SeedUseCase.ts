import type { EmbeddingPort } from '../domain/ports/EmbeddingPort.js';
import type { SparseEncoderPort } from '../domain/ports/SparseEncoderPort.js';
import type { VectorStorePort } from '../domain/ports/VectorStorePort.js';
import type { VectorPoint } from '../domain/entities/VectorPoint.js';
import type { SampleDatasetGenerator } from '../infrastructure/dataset/SampleDatasetGenerator.js';
import type { DatasetConfig } from '../config/types.js';
import type { SeedStats } from './dto/SeedStats.js';
import { EmbeddingBatcher } from '../infrastructure/embedding/EmbeddingBatcher.js';
import { withRetry, retryableErrorsPolicy } from '../shared/RetryPolicy.js';
import { Logger } from '../shared/Logger.js';

const UPSERT_MAX_RETRIES = 5;
const UPSERT_BASE_DELAY_MS = 100;

export interface SeedOptions {
  size?: number;
  seed?: number;
  /** 先清空既有 points */
  recreate?: boolean;
  /** timestamp 基準時間（毫秒） */
  now?: number;
}

/**
 * 示範資料寫入：產生資料 → dense embedding（分批）→ sparse encoding → 分批 upsert
 * upsert 遇到 retryable 錯誤（StoreBusyError）時退避重試
 */
export class SeedUseCase {
  private readonly batcher: EmbeddingBatcher;
  private readonly logger = new Logger('SeedUseCase');

  constructor(
    private readonly store: VectorStorePort,
    embedding: EmbeddingPort,
    private readonly sparseEncoder: SparseEncoderPort,
    private readonly generator: SampleDatasetGenerator,
    private readonly datasetConfig: DatasetConfig = { size: 150, seed: 42, batchSize: 100 },
    embeddingBatchSize: number = 100,
  ) {
    this.batcher = new EmbeddingBatcher(embedding, { maxBatchSize: embeddingBatchSize });
  }

  async seed(options: SeedOptions = {}): Promise<SeedStats> {
    const start = Date.now();
    const records = this.generator.generate({
      size: options.size ?? this.datasetConfig.size,
      seed: options.seed ?? this.datasetConfig.seed,
      now: options.now,
    });

    if (options.recreate) {
      await this.store.recreate();
      this.logger.info('Store cleared before seeding');
    }

    const embeddings = await this.batcher.embedBatch(records.map((r) => r.text));
    const embeddingTokens = embeddings.reduce((acc, e) => acc + e.tokensUsed, 0);

    const points: VectorPoint[] = records.map((r, i) => ({
      id: r.id,
      dense: embeddings[i].vector,
      sparse: this.sparseEncoder.encode(r.text),
      payload: { text: r.text, category: r.category, lang: r.lang, timestamp: r.timestamp },
    }));

    const batchSize = this.datasetConfig.batchSize;
    const totalBatches = Math.ceil(points.length / batchSize);
    let batches = 0;

    for (let i = 0; i < points.length; i += batchSize) {
      const batch = points.slice(i, i + batchSize);
      await withRetry(
        () => this.store.upsert(batch),
        retryableErrorsPolicy(UPSERT_MAX_RETRIES, UPSERT_BASE_DELAY_MS, (attempt, err) => {
          this.logger.warn('Retrying upsert batch', {
            attempt,
            batch: batches + 1,
            error: err instanceof Error ? err.message : String(err),
          });
        }),
      );
      batches++;
      this.logger.info('Upserted batch', { batch: batches, of: totalBatches, points: batch.length });
    }

    return {
      pointsUpserted: points.length,
      batches,
      embeddingTokens,
      recreated: options.recreate ?? false,
      durationMs: Date.now() - start,
    };
  }
}
