import { describe, it, expect } from 'vitest';

import { analyze, repeatedWords, tokenize } from '../../src/core/frequency.js';

describe('tokenize', () => {
  it('lower-cases and splits on non-alphanumeric runs', () => {
    expect(tokenize('Climate—talks, (again)!  2024 plan')).toEqual([
      'climate',
      'talks',
      'again',
      '2024',
      'plan',
    ]);
  });

  it('keeps accented letters inside words', () => {
    expect(tokenize('Política económica')).toEqual(['política', 'económica']);
  });

  it('returns nothing for punctuation-only input', () => {
    expect(tokenize(' -- ... ')).toEqual([]);
  });
});

describe('analyze', () => {
  it('keeps only words reaching the threshold', () => {
    const titles = ['Climate talks stall', 'New climate deal'];
    expect(analyze(titles, 2)).toEqual({ climate: 2 });
  });

  it('counts across titles regardless of case', () => {
    const titles = [
      'Government plans collapse',
      'Housing crisis deepens',
      'A government without budget',
      'Teachers strike again',
      'Why GOVERNMENT matters now',
    ];
    expect(analyze(titles)).toEqual({ government: 3 });
  });

  it('includes short and common words; there is no stop-word list', () => {
    expect(analyze(['The end of the road', 'Of mice'], 2)).toEqual({ the: 2, of: 2 });
  });

  it('returns an empty table for empty input', () => {
    expect(analyze([], 2)).toEqual({});
  });

  it('with minCount 1 keeps every word', () => {
    expect(analyze(['a b', 'b'], 1)).toEqual({ a: 1, b: 2 });
  });

  it('gives the same table for already lower-cased titles', () => {
    const titles = ['Peace Talks Resume', 'peace deal NEAR', 'Talks about talks'];
    expect(analyze(titles, 2)).toEqual(analyze(titles.map((t) => t.toLowerCase()), 2));
    expect(analyze(titles, 2)).toEqual({ peace: 2, talks: 3 });
  });

  it('counts words that shadow Object.prototype members', () => {
    expect(analyze(['constructor', 'Constructor toString'], 2)).toEqual({ constructor: 2 });
  });

  it('rejects a non-positive threshold', () => {
    expect(() => analyze(['x'], 0)).toThrow(RangeError);
    expect(() => analyze(['x'], 1.5)).toThrow('minCount must be a positive integer, got 1.5');
  });
});

describe('repeatedWords', () => {
  it('orders by count, then alphabetically', () => {
    expect(repeatedWords({ beta: 2, alpha: 2, gamma: 5 })).toEqual([
      ['gamma', 5],
      ['alpha', 2],
      ['beta', 2],
    ]);
  });
});
