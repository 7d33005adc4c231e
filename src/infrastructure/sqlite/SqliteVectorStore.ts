import type Database from 'better-sqlite3';
import type { Candidate } from '../../domain/entities/Candidate.js';
import type { VectorPoint } from '../../domain/entities/VectorPoint.js';
import type {
  FieldCondition,
  PayloadFilter,
  StoredVector,
  VectorSearchRequest,
  VectorStorePort,
} from '../../domain/ports/VectorStorePort.js';
import type { SparseVector } from '../../domain/value-objects/SparseVector.js';
import { normalize } from '../../domain/value-objects/VectorMath.js';
import { InvalidArgumentError, StoreBusyError } from '../../domain/errors/DomainErrors.js';

interface PointRow {
  point_id: number;
  payload_json: string;
  dense: Buffer;
}

interface DenseHitRow extends PointRow {
  distance: number;
}

interface SparseHitRow extends PointRow {
  score: number;
}

type BindValue = string | number | bigint | Buffer | null;

/** sqlite-vec 的 KNN 查詢 k 上限 */
const MAX_KNN_K = 4096;

const PAYLOAD_KEY_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

function toBlob(vec: Float32Array): Buffer {
  return Buffer.from(vec.buffer, vec.byteOffset, vec.byteLength);
}

/** BLOB 可能未對齊 4 bytes，先複製再轉 Float32Array */
function fromBlob(blob: Buffer): Float32Array {
  return new Float32Array(new Uint8Array(blob).buffer);
}

function parsePayload(json: string): Record<string, unknown> {
  const parsed: unknown = JSON.parse(json);
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) return {};
  return Object.fromEntries(Object.entries(parsed));
}

function isBusyError(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'SQLITE_BUSY';
}

/**
 * 本地向量搜尋服務：better-sqlite3 + sqlite-vec
 *
 * - dense：vec0 KNN。存入單位向量，L2 距離 d 換算 cosine = 1 − d² / 2
 * - sparse：sparse_terms 表與查詢 token 做內積（SUM(weight × weight)）
 * - filter：payload_json 上的 json_extract 條件
 *
 * 注意：sqlite-vec v0.1.x 的 PK 型別檢查要求 SQLite INTEGER，
 * better-sqlite3 的 JS number 會被綁為 REAL，需用 BigInt 才會綁為 INTEGER。
 */
export class SqliteVectorStore implements VectorStorePort {
  constructor(
    private readonly db: Database.Database,
    private readonly dimension: number,
  ) {}

  async upsert(points: VectorPoint[]): Promise<void> {
    if (points.length === 0) return;

    for (const p of points) {
      if (p.dense.length !== this.dimension) {
        throw new InvalidArgumentError(
          'points',
          `point ${p.id} has dense dimension ${p.dense.length}, store expects ${this.dimension}`,
        );
      }
    }

    const upsertPoint = this.db.prepare(
      'INSERT OR REPLACE INTO points(point_id, payload_json, dense, updated_at) VALUES(?, ?, ?, ?)'
    );
    const deleteVec = this.db.prepare('DELETE FROM points_vec WHERE rowid = ?');
    const insertVec = this.db.prepare('INSERT INTO points_vec(rowid, embedding) VALUES(?, ?)');
    const deleteTerms = this.db.prepare('DELETE FROM sparse_terms WHERE point_id = ?');
    const insertTerm = this.db.prepare(
      'INSERT INTO sparse_terms(point_id, token_id, weight) VALUES(?, ?, ?)'
    );

    const now = Date.now();
    const write = this.db.transaction((batch: VectorPoint[]) => {
      for (const p of batch) {
        upsertPoint.run(p.id, JSON.stringify(p.payload), toBlob(p.dense), now);

        // vec0 不支援 INSERT OR REPLACE，先刪再插
        deleteVec.run(BigInt(p.id));
        insertVec.run(BigInt(p.id), toBlob(Float32Array.from(normalize(p.dense, `point ${p.id}`))));

        deleteTerms.run(p.id);
        for (let i = 0; i < p.sparse.indices.length; i++) {
          insertTerm.run(p.id, p.sparse.indices[i], p.sparse.values[i]);
        }
      }
    });

    try {
      write(points);
    } catch (err) {
      if (isBusyError(err)) {
        throw new StoreBusyError('Vector store is busy', { cause: err });
      }
      throw err;
    }
  }

  async search(request: VectorSearchRequest): Promise<Candidate[]> {
    if (!Number.isInteger(request.limit) || request.limit < 0) {
      throw new InvalidArgumentError('limit', `must be a non-negative integer, got ${request.limit}`);
    }
    if (request.limit === 0) return [];

    const candidates = request.query.kind === 'dense'
      ? this.searchDense(request.query.vector, request)
      : this.searchSparse(request.query, request);

    const threshold = request.scoreThreshold;
    return threshold === undefined
      ? candidates
      : candidates.filter((c) => c.score >= threshold);
  }

  async count(): Promise<number> {
    return this.countSync();
  }

  async listDenseVectors(): Promise<StoredVector[]> {
    const rows = this.db.prepare<[], { point_id: number; dense: Buffer }>(
      'SELECT point_id, dense FROM points ORDER BY point_id'
    ).all();
    return rows.map((r) => ({ id: r.point_id, vector: fromBlob(r.dense) }));
  }

  async recreate(): Promise<void> {
    this.db.transaction(() => {
      this.db.exec('DELETE FROM points_vec');
      this.db.exec('DELETE FROM sparse_terms');
      this.db.exec('DELETE FROM points');
    })();
  }

  /** 依 points.dense 重建指定 point 的 vec0 row（health check 修復用） */
  rebuildDenseRows(pointIds: number[]): number {
    const select = this.db.prepare<[number], { dense: Buffer }>('SELECT dense FROM points WHERE point_id = ?');
    const deleteVec = this.db.prepare('DELETE FROM points_vec WHERE rowid = ?');
    const insertVec = this.db.prepare('INSERT INTO points_vec(rowid, embedding) VALUES(?, ?)');

    let rebuilt = 0;
    this.db.transaction(() => {
      for (const id of pointIds) {
        const row = select.get(id);
        if (!row) continue;
        deleteVec.run(BigInt(id));
        insertVec.run(BigInt(id), toBlob(Float32Array.from(normalize(fromBlob(row.dense), `point ${id}`))));
        rebuilt++;
      }
    })();
    return rebuilt;
  }

  // ────────────────────────────────────────────────
  //  Dense / Sparse 查詢
  // ────────────────────────────────────────────────

  private searchDense(vector: Float32Array, request: VectorSearchRequest): Candidate[] {
    if (vector.length !== this.dimension) {
      throw new InvalidArgumentError(
        'query',
        `dense query has dimension ${vector.length}, store expects ${this.dimension}`,
      );
    }

    const total = this.countSync();
    if (total === 0) return [];

    // 有 filter 時 KNN 先取全部再過濾，避免過濾後不足 limit
    const k = Math.min(request.filter ? total : request.limit, MAX_KNN_K);
    const { clause, params } = this.buildFilter(request.filter);

    // vec0 只接受單一 ORDER BY distance；MATERIALIZED 讓外層排序不下推到 KNN 掃描
    const rows = this.db.prepare<BindValue[], DenseHitRow>(`
      WITH knn AS MATERIALIZED (
        SELECT rowid AS point_id, distance
        FROM points_vec
        WHERE embedding MATCH ?
          AND k = ?
      )
      SELECT knn.point_id AS point_id, knn.distance AS distance, p.payload_json, p.dense
      FROM knn
      JOIN points p ON p.point_id = knn.point_id
      WHERE ${clause}
      ORDER BY knn.distance, knn.point_id
      LIMIT ?
    `).all(toBlob(Float32Array.from(normalize(vector, 'query'))), k, ...params, request.limit);

    return rows.map((row) => this.toCandidate(row, 1 - (row.distance * row.distance) / 2, request.withVectors));
  }

  private searchSparse(query: SparseVector, request: VectorSearchRequest): Candidate[] {
    if (query.indices.length === 0) return [];

    const { clause, params } = this.buildFilter(request.filter);
    const terms = JSON.stringify(query.indices.map((index, i) => [index, query.values[i]]));

    const rows = this.db.prepare<BindValue[], SparseHitRow>(`
      WITH q(token_id, weight) AS (
        SELECT json_extract(value, '$[0]'), json_extract(value, '$[1]')
        FROM json_each(?)
      )
      SELECT s.point_id AS point_id, SUM(s.weight * q.weight) AS score, p.payload_json, p.dense
      FROM sparse_terms s
      JOIN q ON q.token_id = s.token_id
      JOIN points p ON p.point_id = s.point_id
      WHERE ${clause}
      GROUP BY s.point_id
      ORDER BY score DESC, s.point_id ASC
      LIMIT ?
    `).all(terms, ...params, request.limit);

    return rows.map((row) => this.toCandidate(row, row.score, request.withVectors));
  }

  private toCandidate(row: PointRow, score: number, withVectors?: boolean): Candidate {
    const candidate: Candidate = {
      id: Number(row.point_id),
      score,
      payload: parsePayload(row.payload_json),
    };
    if (withVectors) candidate.vector = fromBlob(row.dense);
    return candidate;
  }

  /** PayloadFilter → SQL 條件；key 只允許識別字元，值一律走參數綁定 */
  private buildFilter(filter?: PayloadFilter): { clause: string; params: BindValue[] } {
    if (!filter || filter.must.length === 0) return { clause: '1 = 1', params: [] };

    const clauses: string[] = [];
    const params: BindValue[] = [];
    for (const condition of filter.must) {
      if (!PAYLOAD_KEY_PATTERN.test(condition.key)) {
        throw new InvalidArgumentError('filter', `unsupported payload key "${condition.key}"`);
      }
      const jsonPath = `$.${condition.key}`;
      this.appendCondition(condition, jsonPath, clauses, params);
    }
    return { clause: clauses.join(' AND '), params };
  }

  private appendCondition(
    condition: FieldCondition,
    jsonPath: string,
    clauses: string[],
    params: BindValue[],
  ): void {
    if ('match' in condition) {
      clauses.push('json_extract(p.payload_json, ?) = ?');
      // better-sqlite3 不接受 boolean；json_extract 對 true/false 回傳 1/0
      const value = typeof condition.match === 'boolean' ? Number(condition.match) : condition.match;
      params.push(jsonPath, value);
      return;
    }

    const { gte, lte } = condition.range;
    if (gte === undefined && lte === undefined) {
      throw new InvalidArgumentError('filter', `range condition on "${condition.key}" needs gte or lte`);
    }
    if (gte !== undefined) {
      clauses.push('json_extract(p.payload_json, ?) >= ?');
      params.push(jsonPath, gte);
    }
    if (lte !== undefined) {
      clauses.push('json_extract(p.payload_json, ?) <= ?');
      params.push(jsonPath, lte);
    }
  }

  private countSync(): number {
    const row = this.db.prepare<[], { cnt: number }>('SELECT COUNT(*) AS cnt FROM points').get();
    return row?.cnt ?? 0;
  }
}
