import fs from 'node:fs';
import path from 'node:path';
import { DEFAULT_CONFIG } from './defaults.js';
import { fileConfigSchema } from './schema.js';
import { isLogLevel } from '../shared/Logger.js';
import type { VecFuseConfig, PartialConfig } from './types.js';

export type { VecFuseConfig, PartialConfig } from './types.js';

export const CONFIG_FILE_NAME = '.vecfuse.json';

const OPENAI_DEFAULT_MODEL = 'text-embedding-3-small';

/** 逐 section 合併：partial 覆蓋 base */
function mergeConfig(base: VecFuseConfig, partial: PartialConfig): VecFuseConfig {
  return {
    version: partial.version ?? base.version,
    store: { ...base.store, ...partial.store },
    embedding: { ...base.embedding, ...partial.embedding },
    sparse: { ...base.sparse, ...partial.sparse },
    search: { ...base.search, ...partial.search },
    dataset: { ...base.dataset, ...partial.dataset },
    evaluation: { ...base.evaluation, ...partial.evaluation },
    log: { ...base.log, ...partial.log },
  };
}

/**
 * 環境變數覆蓋 config
 * OPENAI_BASE_URL → embedding.baseUrl、OPENAI_API_KEY → embedding.apiKey（檔案未設定時）
 * VECFUSE_DB_PATH → store.dbPath、VECFUSE_LOG_LEVEL → log.level
 */
function applyEnvOverrides(config: VecFuseConfig, env: NodeJS.ProcessEnv): void {
  if (env.OPENAI_BASE_URL) {
    config.embedding.baseUrl = env.OPENAI_BASE_URL;
  }
  if (env.OPENAI_API_KEY && !config.embedding.apiKey) {
    config.embedding.apiKey = env.OPENAI_API_KEY;
  }
  if (env.VECFUSE_DB_PATH) {
    config.store.dbPath = env.VECFUSE_DB_PATH;
  }
  if (isLogLevel(env.VECFUSE_LOG_LEVEL)) {
    config.log.level = env.VECFUSE_LOG_LEVEL;
  }
}

function requirePositiveInteger(value: number, name: string): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`${name} must be a positive integer`);
  }
}

function requireUnitInterval(value: number, name: string): void {
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new Error(`${name} must be within [0, 1]`);
  }
}

/** 驗證設定值的合法性 */
function validate(config: VecFuseConfig): void {
  requirePositiveInteger(config.embedding.dimension, 'dimension');
  requirePositiveInteger(config.embedding.maxBatchSize, 'maxBatchSize');
  requirePositiveInteger(config.sparse.vocabularySize, 'vocabularySize');
  requirePositiveInteger(config.search.defaultTopK, 'defaultTopK');
  requirePositiveInteger(config.search.candidateMultiplier, 'candidateMultiplier');
  requireUnitInterval(config.search.denseWeight, 'denseWeight');
  requireUnitInterval(config.search.mmrLambda, 'mmrLambda');
  requirePositiveInteger(config.dataset.size, 'dataset size');
  requirePositiveInteger(config.dataset.batchSize, 'batchSize');
  requirePositiveInteger(config.evaluation.recallK, 'recallK');
  requirePositiveInteger(config.evaluation.latencyRuns, 'latencyRuns');

  if (config.embedding.provider === 'openai' && !config.embedding.apiKey) {
    throw new Error('embedding.apiKey (or OPENAI_API_KEY) is required for the openai provider');
  }
}

/**
 * 載入設定：讀取 .vecfuse.json（若存在）並合併到預設值上
 * @param rootDir - 專案根目錄
 * @param overrides - 程式碼層級的覆蓋值（優先於檔案）
 * @param env - 環境變數來源（測試可注入）
 */
export function loadConfig(
  rootDir: string,
  overrides?: PartialConfig,
  env: NodeJS.ProcessEnv = process.env,
): VecFuseConfig {
  let fileConfig: PartialConfig = {};

  const configPath = path.join(rootDir, CONFIG_FILE_NAME);
  if (fs.existsSync(configPath)) {
    const raw: unknown = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
    const parsed = fileConfigSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new Error(`Invalid ${CONFIG_FILE_NAME}: ${issue.path.join('.')}: ${issue.message}`);
    }
    fileConfig = parsed.data;
  }

  // 合併順序：defaults < file config < overrides
  let merged = mergeConfig(structuredClone(DEFAULT_CONFIG), fileConfig);
  if (overrides) {
    merged = mergeConfig(merged, overrides);
  }

  // 環境變數優先於檔案設定
  applyEnvOverrides(merged, env);

  // 切到 openai 但沒指定 model 時，不沿用本地 hashing 的 model 名稱
  if (merged.embedding.provider === 'openai' && merged.embedding.model === DEFAULT_CONFIG.embedding.model) {
    merged.embedding.model = OPENAI_DEFAULT_MODEL;
  }

  validate(merged);
  return merged;
}
