import { describe, expect, test } from 'vitest';

import { matchingBlocks, sequenceRatio, similarity } from '../similarity.js';

describe('similarity', () => {
  test('scores identical strings as 1', () => {
    expect(similarity('Imagine', 'Imagine')).toBe(1);
  });

  test('ignores case', () => {
    expect(similarity('IMAGINE', 'imagine')).toBe(1);
  });

  test('counts matched characters over total length', () => {
    expect(similarity('abcd', 'bcde')).toBe(0.75);
    expect(similarity('hello', 'hallo')).toBe(0.8);
  });

  test('treats two empty strings as identical', () => {
    expect(similarity('', '')).toBe(1);
  });

  test('scores disjoint strings as 0', () => {
    expect(similarity('abc', 'xyz')).toBe(0);
    expect(similarity('abc', '')).toBe(0);
  });

  test('depends on block order, not edit distance', () => {
    // Only one of the two characters can be matched without crossing.
    expect(similarity('ab', 'ba')).toBe(0.5);
  });

  test('measures length in code points', () => {
    expect(sequenceRatio('🎵a', '🎵b')).toBe(0.5);
  });
});

describe('matchingBlocks', () => {
  test('finds the longest block first and recurses on both sides', () => {
    const blocks = matchingBlocks(Array.from('xabcyz'), Array.from('abcqyz'));
    expect(blocks).toEqual([
      { i: 1, j: 0, size: 3 },
      { i: 4, j: 4, size: 2 },
    ]);
  });

  test('extends matches over popular characters in long inputs', () => {
    const a = Array.from('aaaa');
    const b = Array.from('a'.repeat(200));
    expect(matchingBlocks(a, b)).toEqual([{ i: 0, j: 0, size: 4 }]);
    expect(sequenceRatio('aaaa', 'a'.repeat(200))).toBeCloseTo(8 / 204, 12);
  });
});
