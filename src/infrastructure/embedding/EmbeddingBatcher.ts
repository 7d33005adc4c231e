import type { EmbeddingPort, EmbeddingResult } from '../../domain/ports/EmbeddingPort.js';
import { withRetry, retryableErrorsPolicy } from '../../shared/RetryPolicy.js';
import { Logger } from '../../shared/Logger.js';

export interface EmbeddingBatcherOptions {
  maxBatchSize?: number;
  /** 每批遇到 retryable 錯誤（如 rate limit）時的重試次數 */
  maxRetries?: number;
  baseDelayMs?: number;
}

/**
 * 將大量文字拆成批次送入 EmbeddingPort
 * 處理 rate limiting 與批次大小限制
 */
export class EmbeddingBatcher {
  private readonly maxBatchSize: number;
  private readonly maxRetries: number;
  private readonly baseDelayMs: number;
  private readonly logger = new Logger('EmbeddingBatcher');

  constructor(
    private readonly provider: EmbeddingPort,
    options: EmbeddingBatcherOptions = {},
  ) {
    this.maxBatchSize = options.maxBatchSize ?? 100;
    this.maxRetries = options.maxRetries ?? 3;
    this.baseDelayMs = options.baseDelayMs ?? 1000;
  }

  async embedBatch(texts: string[]): Promise<EmbeddingResult[]> {
    if (texts.length === 0) return [];

    const results: EmbeddingResult[] = [];
    for (let i = 0; i < texts.length; i += this.maxBatchSize) {
      const batch = texts.slice(i, i + this.maxBatchSize);
      const batchResults = await withRetry(
        () => this.provider.embed(batch),
        retryableErrorsPolicy(this.maxRetries, this.baseDelayMs, (attempt, err) => {
          this.logger.warn('Retrying embedding batch', {
            attempt,
            offset: i,
            error: err instanceof Error ? err.message : String(err),
          });
        }),
      );
      results.push(...batchResults);
    }
    return results;
  }
}
