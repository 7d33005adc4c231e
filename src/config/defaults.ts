import type { VecFuseConfig } from './types.js';

export const DEFAULT_CONFIG: VecFuseConfig = {
  version: 1,
  store: {
    dbPath: '.vecfuse/store.db',
  },
  embedding: {
    provider: 'local',
    model: 'feature-hash-v1',
    dimension: 384,
    maxBatchSize: 100,
  },
  sparse: {
    vocabularySize: 65536,
  },
  search: {
    defaultTopK: 10,
    candidateMultiplier: 10,
    denseWeight: 0.5,
    mmrLambda: 0.5,
  },
  dataset: {
    size: 150,
    seed: 42,
    batchSize: 100,
  },
  evaluation: {
    recallK: 10,
    latencyRuns: 100,
  },
  log: {
    level: 'info',
  },
};
