import type { EmbeddingPort } from '../domain/ports/EmbeddingPort.js';
import type { VectorStorePort } from '../domain/ports/VectorStorePort.js';
import type { SearchUseCase } from './SearchUseCase.js';
import type { SearchMode } from './dto/SearchRequest.js';
import type { DiversityReport, LatencyReport, QueryRecall, RankingDiversity, RecallReport } from './dto/EvaluationReport.js';
import type { FusedResult } from '../domain/entities/Candidate.js';
import type { Vector } from '../domain/value-objects/VectorMath.js';
import { ExactTopK } from '../domain/value-objects/ExactTopK.js';
import { RetrievalMetrics } from '../domain/value-objects/RetrievalMetrics.js';
import { assertNonNegativeInteger } from '../domain/value-objects/VectorMath.js';
import { measureLatency } from '../shared/LatencyProbe.js';

/**
 * 評估用例
 *
 * - recall：向量服務 dense 搜尋 vs 暴力 cosine top-k（ground truth）
 * - diversity：一般 dense top-k 與 MMR top-k 的冗餘度
 * - latency：搜尋管線延遲分佈
 */
export class EvaluationUseCase {
  constructor(
    private readonly store: VectorStorePort,
    private readonly embedding: EmbeddingPort,
    private readonly searchUseCase: SearchUseCase,
  ) {}

  async recall(params: { queries: string[]; k: number }): Promise<RecallReport> {
    const { queries, k } = params;
    assertNonNegativeInteger(k, 'k');

    const stored = await this.store.listDenseVectors();
    const allVectors = stored.map((s) => s.vector);

    const perQuery: QueryRecall[] = [];
    for (const query of queries) {
      const { vector } = await this.embedding.embedOne(query);

      const groundTruthIds = ExactTopK.compute(vector, allVectors, k).map((hit) => stored[hit.index].id);
      const predicted = k === 0
        ? []
        : await this.store.search({ query: { kind: 'dense', vector }, limit: k });
      const predictedIds = predicted.map((c) => c.id);

      perQuery.push({
        query,
        recall: RetrievalMetrics.recallAtK(predictedIds, groundTruthIds, k),
        predictedIds,
        groundTruthIds,
      });
    }

    const meanRecall = perQuery.length > 0
      ? perQuery.reduce((acc, q) => acc + q.recall, 0) / perQuery.length
      : 0;

    return { k, meanRecall, perQuery };
  }

  async diversity(params: { query: string; k: number; lambda: number }): Promise<DiversityReport> {
    const { query, k, lambda } = params;

    const baseline = await this.searchUseCase.search({ query, mode: 'dense', topK: k, includeVectors: true });
    const diversified = await this.searchUseCase.search({
      query,
      mode: 'dense',
      topK: k,
      mmr: { lambda },
      includeVectors: true,
    });

    return {
      query,
      k,
      lambda,
      baseline: EvaluationUseCase.describe(baseline.results),
      mmr: EvaluationUseCase.describe(diversified.results),
    };
  }

  async latency(params: { query: string; mode: SearchMode; runs: number }): Promise<LatencyReport> {
    const { query, mode, runs } = params;
    const stats = await measureLatency(() => this.searchUseCase.search({ query, mode }), runs);
    return { query, mode, runs, stats };
  }

  private static describe(results: FusedResult[]): RankingDiversity {
    const ids = results.map((r) => r.id);
    const vectors: Vector[] = [];
    for (const r of results) {
      if (r.vector) vectors.push(r.vector);
    }
    if (vectors.length === results.length) {
      return { ids, redundancy: RetrievalMetrics.redundancy(vectors), basis: 'vector' };
    }

    const texts: string[] = [];
    for (const r of results) {
      const text = r.payload?.text;
      if (typeof text === 'string') texts.push(text);
    }
    return { ids, redundancy: RetrievalMetrics.textRedundancy(texts), basis: 'text' };
  }
}
