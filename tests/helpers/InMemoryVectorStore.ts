import type { Candidate } from '../../src/domain/entities/Candidate.js';
import type { VectorPoint } from '../../src/domain/entities/VectorPoint.js';
import type {
  FieldCondition,
  StoredVector,
  VectorSearchRequest,
  VectorStorePort,
} from '../../src/domain/ports/VectorStorePort.js';
import { cosineSimilarity } from '../../src/domain/value-objects/VectorMath.js';
import { sparseDot } from '../../src/domain/value-objects/SparseVector.js';

function matches(payload: Record<string, unknown>, condition: FieldCondition): boolean {
  const value = payload[condition.key];
  if ('match' in condition) return value === condition.match;
  if (typeof value !== 'number') return false;
  const { gte, lte } = condition.range;
  return (gte === undefined || value >= gte) && (lte === undefined || value <= lte);
}

/** 測試用的記憶體向量儲存：暴力 cosine 與 sparse 內積 */
export class InMemoryVectorStore implements VectorStorePort {
  readonly points = new Map<number, VectorPoint>();

  async upsert(points: VectorPoint[]): Promise<void> {
    for (const p of points) this.points.set(p.id, p);
  }

  async search(request: VectorSearchRequest): Promise<Candidate[]> {
    const { query } = request;
    const hits: Candidate[] = [];

    for (const p of this.points.values()) {
      if (request.filter && !request.filter.must.every((c) => matches(p.payload, c))) continue;

      const score = query.kind === 'dense'
        ? cosineSimilarity(query.vector, p.dense)
        : sparseDot(query, p.sparse);
      if (query.kind === 'sparse' && score <= 0) continue;
      if (request.scoreThreshold !== undefined && score < request.scoreThreshold) continue;

      const hit: Candidate = { id: p.id, score, payload: p.payload };
      if (request.withVectors) hit.vector = p.dense;
      hits.push(hit);
    }

    hits.sort((a, b) => b.score - a.score || a.id - b.id);
    return hits.slice(0, request.limit);
  }

  async count(): Promise<number> {
    return this.points.size;
  }

  async listDenseVectors(): Promise<StoredVector[]> {
    return [...this.points.values()]
      .sort((a, b) => a.id - b.id)
      .map((p) => ({ id: p.id, vector: p.dense }));
  }

  async recreate(): Promise<void> {
    this.points.clear();
  }
}
