import path from 'node:path';
import { loadConfig } from '../config/ConfigLoader.js';
import type { VecFuseConfig } from '../config/types.js';
import type { EmbeddingPort } from '../domain/ports/EmbeddingPort.js';
import { DatabaseManager } from '../infrastructure/sqlite/DatabaseManager.js';
import { SqliteVectorStore } from '../infrastructure/sqlite/SqliteVectorStore.js';
import { OpenAIEmbeddingAdapter } from '../infrastructure/embedding/OpenAIEmbeddingAdapter.js';
import { HashingEmbeddingAdapter } from '../infrastructure/embedding/HashingEmbeddingAdapter.js';
import { TokenSparseEncoder } from '../infrastructure/sparse/TokenSparseEncoder.js';
import { SearchUseCase } from '../application/SearchUseCase.js';
import { Logger } from '../shared/Logger.js';

/** 指令共用的依賴組合 */
export interface Runtime {
  config: VecFuseConfig;
  dbMgr: DatabaseManager;
  store: SqliteVectorStore;
  embedding: EmbeddingPort;
  sparseEncoder: TokenSparseEncoder;
  searchUseCase: SearchUseCase;
  close(): void;
}

/** 根據設定建構 dense embedding adapter */
export function createEmbedding(config: VecFuseConfig): EmbeddingPort {
  if (config.embedding.provider === 'openai') {
    return new OpenAIEmbeddingAdapter({
      apiKey: config.embedding.apiKey ?? '',
      model: config.embedding.model,
      dimension: config.embedding.dimension,
      baseUrl: config.embedding.baseUrl,
    });
  }
  return new HashingEmbeddingAdapter({
    dimension: config.embedding.dimension,
    model: config.embedding.model,
  });
}

/**
 * 載入設定、開啟儲存並組裝依賴
 * @param rootDir - 專案根目錄（.vecfuse.json 所在處）
 */
export function openRuntime(rootDir: string, options: { recreate?: boolean } = {}): Runtime {
  const config = loadConfig(rootDir);
  Logger.configure(config.log.level);

  const dbPath = path.resolve(rootDir, config.store.dbPath);
  const dbMgr = new DatabaseManager(dbPath, config.embedding.dimension, { recreate: options.recreate });
  const store = new SqliteVectorStore(dbMgr.getDb(), config.embedding.dimension);
  const embedding = createEmbedding(config);
  const sparseEncoder = new TokenSparseEncoder(config.sparse.vocabularySize);

  return {
    config,
    dbMgr,
    store,
    embedding,
    sparseEncoder,
    searchUseCase: new SearchUseCase(store, embedding, sparseEncoder, config.search),
    close: () => dbMgr.close(),
  };
}
