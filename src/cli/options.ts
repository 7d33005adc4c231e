import type { PayloadFilter, FieldCondition } from '../domain/ports/VectorStorePort.js';
import { isSearchMode } from '../application/dto/SearchRequest.js';
import type { SearchMode } from '../application/dto/SearchRequest.js';
import { InvalidArgumentError } from '../domain/errors/DomainErrors.js';
import type { DetailLevel, OutputFormat } from './formatters/ResultFormatter.js';

/** CLI 參數解析；數值合法範圍交由 use case 驗證 */
export function parseInteger(value: string, argument: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isInteger(parsed)) {
    throw new InvalidArgumentError(argument, `expected an integer, got "${value}"`);
  }
  return parsed;
}

export function parseNumber(value: string, argument: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || Number.isNaN(parsed)) {
    throw new InvalidArgumentError(argument, `expected a number, got "${value}"`);
  }
  return parsed;
}

export function parseMode(value: string): SearchMode {
  if (!isSearchMode(value)) {
    throw new InvalidArgumentError('mode', `expected dense, sparse or hybrid, got "${value}"`);
  }
  return value;
}

export function parseFormat(value: string): OutputFormat {
  if (value !== 'json' && value !== 'text') {
    throw new InvalidArgumentError('format', `expected json or text, got "${value}"`);
  }
  return value;
}

export function parseLevel(value: string): DetailLevel {
  if (value !== 'brief' && value !== 'normal' && value !== 'full') {
    throw new InvalidArgumentError('level', `expected brief, normal or full, got "${value}"`);
  }
  return value;
}

export interface FilterOptions {
  category?: string;
  lang?: string;
  /** unix 秒，只保留 timestamp >= since 的 point */
  since?: string;
}

/** --category / --lang / --since → PayloadFilter；全部省略時回傳 undefined */
export function buildFilter(opts: FilterOptions): PayloadFilter | undefined {
  const must: FieldCondition[] = [];
  if (opts.category) must.push({ key: 'category', match: opts.category });
  if (opts.lang) must.push({ key: 'lang', match: opts.lang });
  if (opts.since !== undefined) {
    must.push({ key: 'timestamp', range: { gte: parseInteger(opts.since, 'since') } });
  }
  return must.length > 0 ? { must } : undefined;
}
