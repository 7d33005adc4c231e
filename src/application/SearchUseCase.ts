import type { Candidate, FusedResult } from '../domain/entities/Candidate.js';
import type { EmbeddingPort } from '../domain/ports/EmbeddingPort.js';
import type { SparseEncoderPort } from '../domain/ports/SparseEncoderPort.js';
import type { VectorSearchRequest, VectorStorePort } from '../domain/ports/VectorStorePort.js';
import type { SearchConfig } from '../config/types.js';
import type { SearchMode, SearchRequest } from './dto/SearchRequest.js';
import type { PipelineStageInfo, SearchResponse } from './dto/SearchResponse.js';
import { WeightedFusion } from '../domain/value-objects/WeightedFusion.js';
import { MaximalMarginalRelevance } from '../domain/value-objects/MaximalMarginalRelevance.js';
import { assertNonNegativeInteger, assertUnitInterval } from '../domain/value-objects/VectorMath.js';
import { EmbeddingUnavailableError } from '../domain/errors/DomainErrors.js';
import { Logger } from '../shared/Logger.js';

/**
 * 搜尋管線
 *
 *   (1) 查詢編碼：dense embedding + sparse encoding
 *   (2) dense / sparse 兩路向量搜尋（各取 topK × candidateMultiplier）
 *   (3) 線性加權融合（WeightedFusion）
 *   (4) MMR 多樣化（可選）
 *
 * 降級：hybrid 模式下 embedding 不可用時改為 sparse-only，並記錄 warning。
 * 向量服務的錯誤原樣往上拋。
 */
export class SearchUseCase {
  private readonly searchConfig: SearchConfig;
  private readonly logger = new Logger('SearchUseCase');

  constructor(
    private readonly store: VectorStorePort,
    private readonly embedding: EmbeddingPort,
    private readonly sparseEncoder: SparseEncoderPort,
    searchConfig?: Partial<SearchConfig>,
  ) {
    this.searchConfig = {
      defaultTopK: searchConfig?.defaultTopK ?? 10,
      candidateMultiplier: searchConfig?.candidateMultiplier ?? 10,
      denseWeight: searchConfig?.denseWeight ?? 0.5,
      mmrLambda: searchConfig?.mmrLambda ?? 0.5,
      scoreThreshold: searchConfig?.scoreThreshold,
    };
  }

  async search(request: SearchRequest): Promise<SearchResponse> {
    const start = Date.now();
    const topK = request.topK ?? this.searchConfig.defaultTopK;
    const denseWeight = request.denseWeight ?? this.searchConfig.denseWeight;
    const mmrLambda = request.mmr ? request.mmr.lambda ?? this.searchConfig.mmrLambda : undefined;

    assertNonNegativeInteger(topK, 'topK');
    assertUnitInterval(denseWeight, 'denseWeight');
    if (mmrLambda !== undefined) assertUnitInterval(mmrLambda, 'lambda');

    const candidateK = topK * this.searchConfig.candidateMultiplier;
    const warnings: string[] = [];
    const stages: PipelineStageInfo[] = [];
    let mode: SearchMode = request.mode ?? 'hybrid';

    // ── Stage 1: 查詢編碼 ──
    const encodeStart = Date.now();
    let denseQuery: Float32Array | null = null;
    if (mode !== 'sparse' || mmrLambda !== undefined) {
      try {
        denseQuery = (await this.embedding.embedOne(request.query)).vector;
      } catch (err) {
        if (!(err instanceof EmbeddingUnavailableError) || mode === 'dense') throw err;
        warnings.push(`Dense embedding failed: ${err.message}`);
        if (mode === 'hybrid') {
          this.logger.warn('Degrading hybrid search to sparse-only', { error: err.message });
          mode = 'sparse';
        }
      }
    }
    const sparseQuery = mode !== 'dense' ? this.sparseEncoder.encode(request.query) : null;
    stages.push({ name: 'query_encoding', durationMs: Date.now() - encodeStart, skipped: false });

    const mmrActive = mmrLambda !== undefined && denseQuery !== null;
    const withVectors = mmrActive || request.includeVectors === true;
    const base: Omit<VectorSearchRequest, 'query'> = {
      limit: candidateK,
      filter: request.filter,
      withVectors,
      scoreThreshold: this.searchConfig.scoreThreshold,
    };

    // ── Stage 2: 兩路向量搜尋 ──
    let denseResults: Candidate[] = [];
    const denseStart = Date.now();
    if (mode !== 'sparse' && denseQuery) {
      denseResults = await this.store.search({ ...base, query: { kind: 'dense', vector: denseQuery } });
    }
    stages.push({
      name: 'dense_search',
      durationMs: Date.now() - denseStart,
      skipped: mode === 'sparse',
      skipReason: mode === 'sparse' ? (request.mode === 'sparse' ? 'mode' : 'embedding_unavailable') : undefined,
    });

    let sparseResults: Candidate[] = [];
    const sparseStart = Date.now();
    if (sparseQuery) {
      sparseResults = await this.store.search({ ...base, query: { kind: 'sparse', ...sparseQuery } });
    }
    stages.push({
      name: 'sparse_search',
      durationMs: Date.now() - sparseStart,
      skipped: sparseQuery === null,
      skipReason: sparseQuery === null ? 'mode' : undefined,
    });

    // ── Stage 3: 融合 ──
    // 單路模式以權重 1 / 0 融合，等同該路原排序，輸出格式一致
    const fusionStart = Date.now();
    const effectiveWeight = mode === 'dense' ? 1 : mode === 'sparse' ? 0 : denseWeight;
    // MMR 需要從較大的融合池中挑選
    const poolSize = mmrActive ? candidateK : topK;
    const fused = WeightedFusion.fuse(denseResults, sparseResults, effectiveWeight, poolSize);
    const totalCandidates = new Set([...denseResults, ...sparseResults].map((c) => c.id)).size;
    stages.push({ name: 'fusion', durationMs: Date.now() - fusionStart, skipped: false });

    // ── Stage 4: MMR ──
    const mmrStart = Date.now();
    let results: FusedResult[] = fused;
    let mmrApplied = false;
    if (mmrLambda !== undefined && denseQuery) {
      results = MaximalMarginalRelevance.rerank(denseQuery, fused, mmrLambda, topK);
      mmrApplied = true;
    } else if (mmrLambda !== undefined) {
      warnings.push('MMR skipped: no dense query vector available');
      results = fused.slice(0, topK);
    }
    stages.push({
      name: 'mmr',
      durationMs: Date.now() - mmrStart,
      skipped: !mmrApplied,
      skipReason: mmrApplied ? undefined : mmrLambda === undefined ? 'not_requested' : 'embedding_unavailable',
    });

    return {
      results: request.includeVectors ? results : results.map(SearchUseCase.withoutVector),
      searchMode: mode,
      totalCandidates,
      durationMs: Date.now() - start,
      warnings,
      mmrApplied,
      pipelineStages: stages,
    };
  }

  private static withoutVector(result: FusedResult): FusedResult {
    const { vector: _vector, ...rest } = result;
    return rest;
  }
}
