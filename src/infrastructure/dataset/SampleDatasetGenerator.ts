import fs from 'node:fs';
import { z } from 'zod';
import { SAMPLE_CATEGORIES, SAMPLE_LANGUAGES } from '../../domain/entities/SampleRecord.js';
import type { SampleCategory, SampleRecord } from '../../domain/entities/SampleRecord.js';
import { DatasetFormatError, InvalidArgumentError } from '../../domain/errors/DomainErrors.js';
import { SeededRandom } from './SeededRandom.js';

const textList = z.array(z.string().min(1)).min(1);

const sampleTextsSchema = z.object({
  faq: textList,
  howto: textList,
  policy: textList,
  product: textList,
  release: textList,
});

export type SampleTexts = Record<SampleCategory, string[]>;

export const DEFAULT_SAMPLE_TEXTS_URL = new URL('../../../data/sample-texts.json', import.meta.url);

const SECONDS_PER_YEAR = 86400 * 365;

export interface GenerateOptions {
  size?: number;
  seed?: number;
  /** 產生 timestamp 的基準時間（毫秒），預設 Date.now() */
  now?: number;
}

/** 讀取並驗證 base text 檔 */
export function loadSampleTexts(source: URL | string = DEFAULT_SAMPLE_TEXTS_URL): SampleTexts {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(source, 'utf-8'));
  } catch (err) {
    throw new DatasetFormatError(`Cannot read sample texts from ${String(source)}`, { cause: err });
  }

  const parsed = sampleTextsSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new DatasetFormatError(`Invalid sample texts: ${issue.path.join('.')}: ${issue.message}`);
  }
  return parsed.data;
}

/**
 * 示範資料集產生器：FAQ / 操作說明 / 政策 / 產品 / 版本公告
 * 每列 id 由 1 起算；相同 seed 與 now 產生完全相同的資料
 */
export class SampleDatasetGenerator {
  constructor(private readonly texts: SampleTexts = loadSampleTexts()) {}

  generate(options: GenerateOptions = {}): SampleRecord[] {
    const size = options.size ?? 150;
    if (!Number.isInteger(size) || size < 0) {
      throw new InvalidArgumentError('size', `must be a non-negative integer, got ${size}`);
    }

    const rng = new SeededRandom(options.seed ?? 42);
    const nowSeconds = Math.floor((options.now ?? Date.now()) / 1000);

    const records: SampleRecord[] = [];
    for (let i = 0; i < size; i++) {
      const category = rng.pick(SAMPLE_CATEGORIES);
      const lang = rng.pick(SAMPLE_LANGUAGES);
      const base = rng.pick(this.texts[category]);
      const text = rng.pick(SampleDatasetGenerator.variations(base));
      const timestamp = nowSeconds - rng.nextInt(0, SECONDS_PER_YEAR);

      records.push({ id: i + 1, text, category, lang, timestamp });
    }
    return records;
  }

  static variations(base: string): string[] {
    return [
      base,
      `${base} - Updated version`,
      `Learn about ${base.toLowerCase()}`,
      `Guide: ${base}`,
      `FAQ: ${base}?`,
    ];
  }
}
