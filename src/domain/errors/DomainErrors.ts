export type ErrorClassification = 'retryable' | 'degradable' | 'manual';

/** 所有 vecfuse domain 錯誤的基底類別 */
export abstract class VecFuseError extends Error {
  abstract readonly classification: ErrorClassification;
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

// --- Retryable ---

export class EmbeddingRateLimitError extends VecFuseError {
  readonly classification = 'retryable' as const;
  readonly code = 'EMBEDDING_RATE_LIMIT';
  readonly maxRetries = 3;
  readonly baseDelayMs = 1000;
}

export class StoreBusyError extends VecFuseError {
  readonly classification = 'retryable' as const;
  readonly code = 'STORE_BUSY';
  readonly maxRetries = 5;
  readonly baseDelayMs = 100;
}

// --- Degradable ---

export class EmbeddingUnavailableError extends VecFuseError {
  readonly classification = 'degradable' as const;
  readonly code = 'EMBEDDING_UNAVAILABLE';
}

// --- Manual ---

/** 參數不合法：權重/lambda 超出 [0,1]、負的 k、零長度向量等 */
export class InvalidArgumentError extends VecFuseError {
  readonly classification = 'manual' as const;
  readonly code = 'INVALID_ARGUMENT';

  constructor(
    public readonly argument: string,
    message: string,
    options?: ErrorOptions,
  ) {
    super(`Invalid argument "${argument}": ${message}`, options);
  }
}

export class EmbeddingDimensionMismatchError extends VecFuseError {
  readonly classification = 'manual' as const;
  readonly code = 'DIMENSION_MISMATCH';

  constructor(
    public readonly storedDimension: number,
    public readonly configuredDimension: number,
    options?: ErrorOptions,
  ) {
    super(
      `Embedding dimension mismatch: store has ${storedDimension}, config specifies ${configuredDimension}. ` +
      'Run "vecfuse seed --recreate" to rebuild the store with the new dimension.',
      options,
    );
  }
}

export class DatasetFormatError extends VecFuseError {
  readonly classification = 'manual' as const;
  readonly code = 'DATASET_FORMAT';
}

/** 判斷錯誤是否可重試（供 withRetry 的 isRetryable 使用） */
export function isRetryableError(err: unknown): boolean {
  return err instanceof VecFuseError && err.classification === 'retryable';
}
