export const SAMPLE_CATEGORIES = ['faq', 'howto', 'policy', 'product', 'release'] as const;
export const SAMPLE_LANGUAGES = ['en', 'es', 'fr', 'de'] as const;

export type SampleCategory = typeof SAMPLE_CATEGORIES[number];
export type SampleLanguage = typeof SAMPLE_LANGUAGES[number];

/** 示範用的 FAQ/文件資料列 */
export interface SampleRecord {
  id: number;
  text: string;
  category: SampleCategory;
  lang: SampleLanguage;
  /** Unix 秒 */
  timestamp: number;
}
