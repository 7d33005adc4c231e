import type { FusedResult } from '../../domain/entities/Candidate.js';

export type OutputFormat = 'json' | 'text';
export type DetailLevel = 'brief' | 'normal' | 'full';

const TEXT_PREVIEW_LENGTH = 100;

function payloadString(payload: Record<string, unknown> | undefined, key: string): string {
  const value = payload?.[key];
  if (value === undefined || value === null) return 'N/A';
  return String(value);
}

/**
 * 搜尋結果格式化器：根據 level 控制輸出細節
 *
 * - brief：排名 + 分數 + id
 * - normal：加上 category / language 與文字前 100 字（預設）
 * - full：含完整 payload 與兩路原始分數
 */
export class ResultFormatter {
  formatSearchResults(
    results: FusedResult[],
    format: OutputFormat,
    level: DetailLevel = 'normal',
  ): string {
    if (format === 'json') {
      return JSON.stringify(this.shapeResults(results, level), null, 2);
    }
    return this.textResults(results, level);
  }

  formatObject(data: unknown, format: OutputFormat): string {
    if (format === 'json') {
      return JSON.stringify(data, null, 2);
    }
    return this.flattenToText(data);
  }

  /** 根據 level 篩選欄位 */
  private shapeResults(results: FusedResult[], level: DetailLevel): unknown[] {
    return results.map((r) => {
      if (level === 'brief') {
        return { id: r.id, score: r.score };
      }
      if (level === 'full') {
        return {
          id: r.id,
          score: r.score,
          denseScore: r.denseScore,
          sparseScore: r.sparseScore,
          payload: r.payload ?? {},
        };
      }
      return {
        id: r.id,
        score: r.score,
        category: r.payload?.category,
        lang: r.payload?.lang,
        text: r.payload?.text,
      };
    });
  }

  /** 人類可讀的搜尋結果文字格式 */
  private textResults(results: FusedResult[], level: DetailLevel): string {
    if (results.length === 0) return 'No results found.';

    return results
      .map((r, i) => {
        const header = `[${i + 1}] score: ${r.score.toFixed(4)} | id: ${r.id}`;
        if (level === 'brief') return header;

        const text = payloadString(r.payload, 'text');
        const preview = text.length > TEXT_PREVIEW_LENGTH
          ? text.slice(0, TEXT_PREVIEW_LENGTH) + '...'
          : text;

        const lines = [
          header,
          `    Category: ${payloadString(r.payload, 'category')} | Language: ${payloadString(r.payload, 'lang')}`,
          `    Text: ${preview}`,
        ];
        if (level === 'full') {
          lines.push(`    Dense: ${r.denseScore.toFixed(4)} | Sparse: ${r.sparseScore.toFixed(4)}`);
          lines.push(`    Timestamp: ${payloadString(r.payload, 'timestamp')}`);
        }
        return lines.join('\n');
      })
      .join('\n\n');
  }

  /** 將任意物件平展為人類可讀文字 */
  private flattenToText(data: unknown, indent: number = 0): string {
    if (data === null || data === undefined) return '';
    if (typeof data !== 'object') return String(data);

    const prefix = '  '.repeat(indent);
    if (Array.isArray(data)) {
      return data.map((item, i) => `${prefix}[${i}] ${this.flattenToText(item, indent + 1)}`).join('\n');
    }

    return Object.entries(data)
      .map(([key, val]) => {
        if (typeof val === 'object' && val !== null) {
          return `${prefix}${key}:\n${this.flattenToText(val, indent + 1)}`;
        }
        return `${prefix}${key}: ${val}`;
      })
      .join('\n');
  }
}
