import fs from 'node:fs';
import path from 'node:path';
import Database from 'better-sqlite3';
import * as sqliteVec from 'sqlite-vec';
import { DROP_SQL, PRAGMA_SQL, SCHEMA_SQL, vecTableSQL } from './schema.js';
import { Logger } from '../../shared/Logger.js';
import { EmbeddingDimensionMismatchError } from '../../domain/errors/DomainErrors.js';

export interface DatabaseManagerOptions {
  /** 先刪除所有資料表再重建（維度變更時使用） */
  recreate?: boolean;
}

/**
 * SQLite 資料庫管理器
 *
 * 負責：初始化 DB、載入 sqlite-vec extension、執行 schema、
 * 記錄與驗證 dense 向量維度（避免 embedding 模型切換後維度不符）。
 */
export class DatabaseManager {
  private db: Database.Database;
  private logger: Logger;

  constructor(
    dbPath: string,
    private readonly embeddingDimension: number = 384,
    options: DatabaseManagerOptions = {},
  ) {
    this.logger = new Logger('DatabaseManager');

    if (dbPath !== ':memory:') {
      fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    }
    this.db = new Database(dbPath);

    // 載入 sqlite-vec extension
    sqliteVec.load(this.db);

    // 設定 PRAGMA（逐行執行，因為 PRAGMA 不支援批次）
    for (const line of PRAGMA_SQL.trim().split('\n')) {
      const trimmed = line.trim();
      if (trimmed && !trimmed.startsWith('--')) {
        this.db.pragma(trimmed.replace('PRAGMA ', '').replace(';', ''));
      }
    }

    if (options.recreate) {
      this.db.exec(DROP_SQL);
      this.logger.info('Dropped existing tables', { dbPath });
    }

    this.db.exec(SCHEMA_SQL);
    this.db.exec(vecTableSQL(this.embeddingDimension));

    this.db.prepare(
      "INSERT OR REPLACE INTO schema_meta(key, value) VALUES('version', '1')"
    ).run();

    this.validateEmbeddingDimension();

    this.logger.info('Database initialized', { dbPath, embeddingDimension });
  }

  getDb(): Database.Database {
    return this.db;
  }

  getDimension(): number {
    return this.embeddingDimension;
  }

  close(): void {
    this.db.close();
  }

  /**
   * 首次使用時把維度寫入 schema_meta；之後維度不同就拒絕開啟
   */
  private validateEmbeddingDimension(): void {
    const row = this.db.prepare<[], { value: string }>(
      "SELECT value FROM schema_meta WHERE key = 'embedding_dimension'"
    ).get();

    if (!row) {
      this.db.prepare(
        "INSERT OR REPLACE INTO schema_meta(key, value) VALUES('embedding_dimension', ?)"
      ).run(String(this.embeddingDimension));
      return;
    }

    const storedDimension = parseInt(row.value, 10);
    if (storedDimension !== this.embeddingDimension) {
      this.db.close();
      throw new EmbeddingDimensionMismatchError(storedDimension, this.embeddingDimension);
    }
  }
}
