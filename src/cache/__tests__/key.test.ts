import { describe, it, expect } from 'vitest';
import { cacheKey, normalizeQuery } from '../key.js';

describe('normalizeQuery', () => {
  it('case-folds, collapses whitespace and trims', () => {
    expect(normalizeQuery('  What IS\tthe\n\nbudget?  ')).toBe('what is the budget?');
  });

  it('applies NFKC so compatibility forms match', () => {
    // Full-width letters and the "fi" ligature
    expect(normalizeQuery('ＢＵＤＧＥＴ ﬁnance')).toBe('budget finance');
  });
});

describe('cacheKey', () => {
  it('is a hex SHA-256 digest', () => {
    expect(cacheKey('alpha', 'q', { topK: 5 })).toMatch(/^[0-9a-f]{64}$/);
  });

  it('matches for queries that normalize the same', () => {
    expect(cacheKey('alpha', 'What is the budget?', { topK: 5 })).toBe(
      cacheKey('alpha', '  what is   THE budget? ', { topK: 5 })
    );
  });

  it('ignores param order but not param values', () => {
    const key = cacheKey('alpha', 'q', { topK: 5, model: 'gpt-4o' });

    expect(cacheKey('alpha', 'q', { model: 'gpt-4o', topK: 5 })).toBe(key);
    expect(cacheKey('alpha', 'q', { model: 'gpt-4o', topK: 6 })).not.toBe(key);
  });

  it('separates projects', () => {
    expect(cacheKey('alpha', 'q', {})).not.toBe(cacheKey('beta', 'q', {}));
  });
});
