import { assertNonNegativeInteger, dot, normalize } from './VectorMath.js';
import type { Vector } from './VectorMath.js';

/**
 * 檢索評估指標：recall@k 與結果集冗餘度
 */
export class RetrievalMetrics {
  /**
   * recall@k = |pred[:k] ∩ truth[:k]| / |truth[:k]|（以集合計）
   * ground truth 為空時回傳 0
   */
  static recallAtK(predictedIds: readonly number[], groundTruthIds: readonly number[], k: number): number {
    assertNonNegativeInteger(k, 'k');

    const predicted = new Set(predictedIds.slice(0, k));
    const truth = new Set(groundTruthIds.slice(0, k));
    if (truth.size === 0) return 0;

    let hits = 0;
    for (const id of truth) {
      if (predicted.has(id)) hits++;
    }
    return hits / truth.size;
  }

  /**
   * 向量冗餘度：上三角（i < j）pairwise cosine 中大於 0 者的平均
   * 少於兩個向量或沒有正相似 pair 時為 0
   */
  static redundancy(vectors: readonly Vector[]): number {
    if (vectors.length < 2) return 0;

    const unit = vectors.map((v) => normalize(v, 'vectors'));
    let sum = 0;
    let count = 0;
    for (let i = 0; i < unit.length; i++) {
      for (let j = i + 1; j < unit.length; j++) {
        const sim = dot(unit[i], unit[j]);
        if (sim > 0) {
          sum += sim;
          count++;
        }
      }
    }
    return count > 0 ? sum / count : 0;
  }

  /** 無向量時的替代指標：小寫空白切詞後的 pairwise Jaccard 平均 */
  static textRedundancy(texts: readonly string[]): number {
    if (texts.length < 2) return 0;

    const wordSets = texts.map((t) => new Set(t.toLowerCase().split(/\s+/).filter((w) => w.length > 0)));
    let sum = 0;
    let pairs = 0;
    for (let i = 0; i < wordSets.length; i++) {
      for (let j = i + 1; j < wordSets.length; j++) {
        const a = wordSets[i];
        const b = wordSets[j];
        let intersection = 0;
        for (const w of a) {
          if (b.has(w)) intersection++;
        }
        const union = a.size + b.size - intersection;
        sum += union > 0 ? intersection / union : 0;
        pairs++;
      }
    }
    return sum / pairs;
  }
}
