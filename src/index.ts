// 函式庫入口：融合、MMR、暴力 top-k 與評估工具可獨立使用，不需要向量儲存

export { WeightedFusion } from './domain/value-objects/WeightedFusion.js';
export { MaximalMarginalRelevance } from './domain/value-objects/MaximalMarginalRelevance.js';
export { ExactTopK } from './domain/value-objects/ExactTopK.js';
export type { ExactHit } from './domain/value-objects/ExactTopK.js';
export { RetrievalMetrics } from './domain/value-objects/RetrievalMetrics.js';
export { dot, l2Norm, normalize, cosineSimilarity } from './domain/value-objects/VectorMath.js';
export type { Vector } from './domain/value-objects/VectorMath.js';
export { sparseFromEntries, sparseDot } from './domain/value-objects/SparseVector.js';
export type { SparseVector } from './domain/value-objects/SparseVector.js';
export { measureLatency, summarize, percentile } from './shared/LatencyProbe.js';
export type { LatencyStats } from './shared/LatencyProbe.js';

export type { Candidate, FusedResult } from './domain/entities/Candidate.js';
export type { VectorPoint } from './domain/entities/VectorPoint.js';
export type { SampleRecord, SampleCategory, SampleLanguage } from './domain/entities/SampleRecord.js';
export type { EmbeddingPort, EmbeddingResult } from './domain/ports/EmbeddingPort.js';
export type { SparseEncoderPort } from './domain/ports/SparseEncoderPort.js';
export type {
  VectorStorePort,
  VectorSearchRequest,
  QueryVector,
  PayloadFilter,
  FieldCondition,
  StoredVector,
} from './domain/ports/VectorStorePort.js';
export {
  VecFuseError,
  EmbeddingRateLimitError,
  StoreBusyError,
  EmbeddingUnavailableError,
  InvalidArgumentError,
  EmbeddingDimensionMismatchError,
  DatasetFormatError,
  isRetryableError,
} from './domain/errors/DomainErrors.js';

export { SearchUseCase } from './application/SearchUseCase.js';
export { SeedUseCase } from './application/SeedUseCase.js';
export { EvaluationUseCase } from './application/EvaluationUseCase.js';
export { HealthCheckUseCase } from './application/HealthCheckUseCase.js';
export type { SearchRequest, SearchMode } from './application/dto/SearchRequest.js';
export type { SearchResponse, PipelineStageInfo } from './application/dto/SearchResponse.js';

export { DatabaseManager } from './infrastructure/sqlite/DatabaseManager.js';
export { SqliteVectorStore } from './infrastructure/sqlite/SqliteVectorStore.js';
export { HashingEmbeddingAdapter } from './infrastructure/embedding/HashingEmbeddingAdapter.js';
export { OpenAIEmbeddingAdapter } from './infrastructure/embedding/OpenAIEmbeddingAdapter.js';
export { TokenSparseEncoder } from './infrastructure/sparse/TokenSparseEncoder.js';
export { SampleDatasetGenerator } from './infrastructure/dataset/SampleDatasetGenerator.js';
export { loadConfig } from './config/ConfigLoader.js';
export type { VecFuseConfig } from './config/types.js';
