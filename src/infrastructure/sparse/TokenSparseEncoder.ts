import type { SparseEncoderPort } from '../../domain/ports/SparseEncoderPort.js';
import { sparseFromEntries } from '../../domain/value-objects/SparseVector.js';
import type { SparseVector } from '../../domain/value-objects/SparseVector.js';
import { fnv1a, tokenize } from '../text/Tokenizer.js';

/**
 * 詞頻稀疏編碼：token → FNV-1a bucket，權重 1 + ln(tf)
 * 不同 token hash 到同一 bucket 時權重相加
 */
export class TokenSparseEncoder implements SparseEncoderPort {
  readonly encoderId: string;

  constructor(private readonly vocabularySize: number = 65536) {
    this.encoderId = `token-tf-${vocabularySize}`;
  }

  encode(text: string): SparseVector {
    const termFrequency = new Map<string, number>();
    for (const token of tokenize(text)) {
      termFrequency.set(token, (termFrequency.get(token) ?? 0) + 1);
    }

    const entries: Array<[number, number]> = [];
    for (const [token, tf] of termFrequency) {
      entries.push([fnv1a(token) % this.vocabularySize, 1 + Math.log(tf)]);
    }
    return sparseFromEntries(entries);
  }
}
