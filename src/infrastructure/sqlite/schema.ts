export const PRAGMA_SQL = `
PRAGMA journal_mode = WAL;
PRAGMA busy_timeout = 5000;
PRAGMA synchronous = NORMAL;
PRAGMA cache_size = -64000;
`;

export const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS schema_meta (
  key TEXT PRIMARY KEY,
  value TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS points (
  point_id INTEGER PRIMARY KEY,
  payload_json TEXT NOT NULL DEFAULT '{}',
  dense BLOB NOT NULL,
  updated_at INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS sparse_terms (
  point_id INTEGER NOT NULL,
  token_id INTEGER NOT NULL,
  weight REAL NOT NULL,
  PRIMARY KEY (point_id, token_id)
);

CREATE INDEX IF NOT EXISTS idx_sparse_terms_token ON sparse_terms(token_id);
`;

export const DROP_SQL = `
DROP TABLE IF EXISTS points_vec;
DROP TABLE IF EXISTS sparse_terms;
DROP TABLE IF EXISTS points;
DROP TABLE IF EXISTS schema_meta;
`;

/**
 * sqlite-vec 的 vec0 虛擬表需要在 extension 載入後才能建立
 * dimension 由設定決定；存入的是 L2 正規化後的向量
 */
export function vecTableSQL(dimension: number): string {
  return `CREATE VIRTUAL TABLE IF NOT EXISTS points_vec USING vec0(embedding float[${dimension}]);`;
}
