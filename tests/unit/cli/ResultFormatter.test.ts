import { describe, it, expect } from 'vitest';
import { ResultFormatter } from '../../../src/cli/formatters/ResultFormatter.js';
import type { FusedResult } from '../../../src/domain/entities/Candidate.js';

describe('ResultFormatter', () => {
  const formatter = new ResultFormatter();
  const longText = 'x'.repeat(120);
  const results: FusedResult[] = [
    {
      id: 7,
      score: 0.65,
      denseScore: 0.5,
      sparseScore: 0.8,
      payload: { text: 'How do I reset my password?', category: 'faq', lang: 'en', timestamp: 1700000000 },
    },
    { id: 3, score: 0.3, denseScore: 0, sparseScore: 0.6, payload: { text: longText } },
  ];

  it('should format text results at normal level', () => {
    expect(formatter.formatSearchResults(results, 'text')).toBe([
      '[1] score: 0.6500 | id: 7',
      '    Category: faq | Language: en',
      '    Text: How do I reset my password?',
      '',
      '[2] score: 0.3000 | id: 3',
      '    Category: N/A | Language: N/A',
      `    Text: ${'x'.repeat(100)}...`,
    ].join('\n'));
  });

  it('should show only rank, score and id at brief level', () => {
    expect(formatter.formatSearchResults(results, 'text', 'brief')).toBe(
      '[1] score: 0.6500 | id: 7\n\n[2] score: 0.3000 | id: 3',
    );
  });

  it('should add raw scores and timestamp at full level', () => {
    const [first] = formatter.formatSearchResults(results, 'text', 'full').split('\n\n');
    expect(first.split('\n').slice(3)).toEqual([
      '    Dense: 0.5000 | Sparse: 0.8000',
      '    Timestamp: 1700000000',
    ]);
  });

  it('should report an empty result set', () => {
    expect(formatter.formatSearchResults([], 'text')).toBe('No results found.');
  });

  it('should shape JSON output by level', () => {
    expect(JSON.parse(formatter.formatSearchResults(results, 'json', 'brief'))).toEqual([
      { id: 7, score: 0.65 },
      { id: 3, score: 0.3 },
    ]);
    expect(JSON.parse(formatter.formatSearchResults(results.slice(0, 1), 'json'))).toEqual([
      { id: 7, score: 0.65, category: 'faq', lang: 'en', text: 'How do I reset my password?' },
    ]);
  });

  it('should flatten objects to indented text', () => {
    const text = formatter.formatObject({ k: 5, stats: { p50: 1.5, p95: 3 }, ids: [1, 2] }, 'text');
    expect(text).toBe([
      'k: 5',
      'stats:',
      '  p50: 1.5',
      '  p95: 3',
      'ids:',
      '  [0] 1',
      '  [1] 2',
    ].join('\n'));
  });
});
