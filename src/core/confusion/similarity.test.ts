import { describe, it, expect } from 'vitest';
import { jaccardSimilarity, maxSimilarity, tokenize } from './similarity';

describe('tokenize', () => {
  it('lower-cases and splits on punctuation and whitespace', () => {
    expect([...tokenize("Why doesn't   my Loop stop?!")]).toEqual(['why', "doesn't", 'my', 'loop', 'stop']);
  });

  it('collapses repeated tokens', () => {
    expect(tokenize('again again AGAIN').size).toBe(1);
  });

  it('returns an empty set for punctuation-only text', () => {
    expect(tokenize('?!...').size).toBe(0);
  });
});

describe('jaccardSimilarity', () => {
  it('is 1 for identical token sets', () => {
    expect(jaccardSimilarity(tokenize('what is recursion'), tokenize('What is recursion?'))).toBe(1);
  });

  it('is shared over union', () => {
    // {what, is, recursion} vs {i, dont, get, recursion}: 1 shared, 6 total
    expect(jaccardSimilarity(tokenize('what is recursion'), tokenize('i dont get recursion'))).toBeCloseTo(1 / 6);
  });

  it('is symmetric', () => {
    const a = tokenize('my loop never ends');
    const b = tokenize('the loop ends too early');
    expect(jaccardSimilarity(a, b)).toBe(jaccardSimilarity(b, a));
  });

  it('is 0 for disjoint and for two empty sets', () => {
    expect(jaccardSimilarity(tokenize('alpha'), tokenize('beta'))).toBe(0);
    expect(jaccardSimilarity(new Set(), new Set())).toBe(0);
  });
});

describe('maxSimilarity', () => {
  it('returns the best match in the window', () => {
    const window = [tokenize('unrelated words here'), tokenize('what is recursion')];
    expect(maxSimilarity(tokenize('what is recursion'), window)).toBe(1);
  });

  it('returns 0 for an empty window', () => {
    expect(maxSimilarity(tokenize('anything'), [])).toBe(0);
  });
});
