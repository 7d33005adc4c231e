import { z } from 'zod';

/** .vecfuse.json 的結構（所有欄位皆可省略，缺少者沿用預設值） */
export const fileConfigSchema = z.object({
  version: z.number().int().optional(),
  store: z.object({
    dbPath: z.string().min(1),
  }).partial().optional(),
  embedding: z.object({
    provider: z.enum(['openai', 'local']),
    model: z.string().min(1),
    dimension: z.number(),
    maxBatchSize: z.number(),
    apiKey: z.string(),
    baseUrl: z.string(),
  }).partial().optional(),
  sparse: z.object({
    vocabularySize: z.number(),
  }).partial().optional(),
  search: z.object({
    defaultTopK: z.number(),
    candidateMultiplier: z.number(),
    denseWeight: z.number(),
    mmrLambda: z.number(),
    scoreThreshold: z.number(),
  }).partial().optional(),
  dataset: z.object({
    size: z.number(),
    seed: z.number(),
    batchSize: z.number(),
  }).partial().optional(),
  evaluation: z.object({
    recallK: z.number(),
    latencyRuns: z.number(),
  }).partial().optional(),
  log: z.object({
    level: z.enum(['debug', 'info', 'warn', 'error']),
  }).partial().optional(),
});

export type FileConfig = z.infer<typeof fileConfigSchema>;
