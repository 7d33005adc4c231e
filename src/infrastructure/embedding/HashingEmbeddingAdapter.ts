import type { EmbeddingPort, EmbeddingResult } from '../../domain/ports/EmbeddingPort.js';
import { EmbeddingUnavailableError } from '../../domain/errors/DomainErrors.js';
import { charNgrams, fnv1a, tokenize } from '../text/Tokenizer.js';

export interface HashingEmbeddingConfig {
  dimension?: number;
  model?: string;
  /** 字元 n-gram 長度 */
  ngramSize?: number;
}

/**
 * 本地 feature-hashing embedding（provider: local）
 *
 * 每個 token 與其字元 trigram 各 hash 到一個維度，另一個 hash bit 決定正負號，
 * 最後做 L2 正規化。不需網路，相同文字永遠得到相同向量。
 * 僅適合示範與測試，沒有語意理解能力。
 */
export class HashingEmbeddingAdapter implements EmbeddingPort {
  readonly providerId = 'local';
  readonly dimension: number;
  readonly modelId: string;
  private readonly ngramSize: number;

  constructor(config: HashingEmbeddingConfig = {}) {
    this.dimension = config.dimension ?? 384;
    this.modelId = config.model ?? 'feature-hash-v1';
    this.ngramSize = config.ngramSize ?? 3;
  }

  async embed(texts: string[]): Promise<EmbeddingResult[]> {
    return texts.map((t) => this.embedSync(t));
  }

  async embedOne(text: string): Promise<EmbeddingResult> {
    return this.embedSync(text);
  }

  async isHealthy(): Promise<boolean> {
    return true;
  }

  private embedSync(text: string): EmbeddingResult {
    const vector = new Float32Array(this.dimension);
    const tokens = tokenize(text);
    // 沒有 token 只會得到零向量，無法做 cosine
    if (tokens.length === 0) {
      throw new EmbeddingUnavailableError(`no tokens to embed in "${text}"`);
    }

    for (const token of tokens) {
      this.addFeature(vector, `w:${token}`, 1.0);
      for (const gram of charNgrams(token, this.ngramSize)) {
        this.addFeature(vector, `g:${gram}`, 0.5);
      }
    }

    let norm = 0;
    for (let i = 0; i < vector.length; i++) norm += vector[i] * vector[i];
    norm = Math.sqrt(norm);
    if (norm === 0) {
      throw new EmbeddingUnavailableError(`features of "${text}" cancel out to a zero vector`);
    }
    for (let i = 0; i < vector.length; i++) vector[i] /= norm;

    return { vector, tokensUsed: tokens.length };
  }

  private addFeature(vector: Float32Array, feature: string, weight: number): void {
    const h = fnv1a(feature);
    const sign = (fnv1a(`s:${feature}`) & 1) === 0 ? 1 : -1;
    vector[h % this.dimension] += sign * weight;
  }
}
