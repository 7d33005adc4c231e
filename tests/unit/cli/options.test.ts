import { describe, it, expect } from 'vitest';
import { buildFilter, parseFormat, parseInteger, parseMode, parseNumber } from '../../../src/cli/options.js';
import { InvalidArgumentError } from '../../../src/domain/errors/DomainErrors.js';

describe('CLI options', () => {
  it('should parse numeric arguments', () => {
    expect(parseInteger('10', 'topK')).toBe(10);
    expect(parseNumber('0.25', 'lambda')).toBe(0.25);
    expect(() => parseInteger('2.5', 'topK')).toThrow('Invalid argument "topK": expected an integer, got "2.5"');
    expect(() => parseNumber('abc', 'lambda')).toThrow(InvalidArgumentError);
    expect(() => parseNumber('', 'lambda')).toThrow(InvalidArgumentError);
    expect(() => parseInteger('', 'topK')).toThrow('Invalid argument "topK": expected an integer, got ""');
    expect(() => parseInteger('  ', 'runs')).toThrow(InvalidArgumentError);
  });

  it('should accept only known modes and formats', () => {
    expect(parseMode('sparse')).toBe('sparse');
    expect(() => parseMode('bm25')).toThrow('Invalid argument "mode": expected dense, sparse or hybrid, got "bm25"');
    expect(parseFormat('json')).toBe('json');
    expect(() => parseFormat('yaml')).toThrow(InvalidArgumentError);
  });

  it('should build a payload filter from category, language and since', () => {
    expect(buildFilter({})).toBeUndefined();
    expect(buildFilter({ category: 'faq', lang: 'de', since: '1700000000' })).toEqual({
      must: [
        { key: 'category', match: 'faq' },
        { key: 'lang', match: 'de' },
        { key: 'timestamp', range: { gte: 1700000000 } },
      ],
    });
  });
});
