import { describe, it, expect } from 'vitest';
import { TokenSparseEncoder } from '../../../src/infrastructure/sparse/TokenSparseEncoder.js';
import { charNgrams, fnv1a, tokenize } from '../../../src/infrastructure/text/Tokenizer.js';
import { sparseFromEntries } from '../../../src/domain/value-objects/SparseVector.js';

describe('Tokenizer', () => {
  it('should lowercase and split on non letter/digit characters', () => {
    expect(tokenize('Hello, World! Ça va? 2024')).toEqual(['hello', 'world', 'ça', 'va', '2024']);
    expect(tokenize('  --  ')).toEqual([]);
  });

  it('should compute 32-bit FNV-1a hashes', () => {
    expect(fnv1a('')).toBe(0x811c9dc5);
    expect(fnv1a('a')).toBe(0xe40c292c);
  });

  it('should pad tokens before taking character n-grams', () => {
    expect(charNgrams('ab', 3)).toEqual([' ab', 'ab ']);
    expect(charNgrams('a', 3)).toEqual([' a ']);
  });
});

describe('TokenSparseEncoder', () => {
  it('should name the encoder after its vocabulary size', () => {
    expect(new TokenSparseEncoder(1000).encoderId).toBe('token-tf-1000');
  });

  it('should weight terms by 1 + ln(tf) in hashed buckets', () => {
    const encoder = new TokenSparseEncoder(1000);
    const expected = sparseFromEntries([
      [fnv1a('cat') % 1000, 1 + Math.log(2)],
      [fnv1a('dog') % 1000, 1],
    ]);
    expect(encoder.encode('Cat cat, dog')).toEqual(expected);
  });

  it('should sum weights of colliding tokens', () => {
    const encoder = new TokenSparseEncoder(1);
    const v = encoder.encode('cat cat dog');
    expect(v.indices).toEqual([0]);
    expect(v.values[0]).toBeCloseTo(2 + Math.log(2), 10);
  });

  it('should return an empty vector for text without tokens', () => {
    expect(new TokenSparseEncoder().encode('!!!')).toEqual({ indices: [], values: [] });
  });
});
