import { isPageNumber } from './page-number-patterns';
import { characterSetSimilarity } from './text-similarity';

describe('characterSetSimilarity', () => {
  it('returns 1 for identical strings regardless of case', () => {
    expect(characterSetSimilarity('Draft', 'DRAFT')).toBe(1);
  });

  it('returns 0 when either string is empty', () => {
    expect(characterSetSimilarity('', 'abc')).toBe(0);
    expect(characterSetSimilarity('abc', '')).toBe(0);
  });

  it('computes the Jaccard index of the character sets', () => {
    // {a,b,c} vs {b,c,d}: 2 shared of 4
    expect(characterSetSimilarity('abc', 'bcd')).toBe(0.5);
  });

  it('scores nine shared characters out of ten as 0.9', () => {
    expect(characterSetSimilarity('Draft note', 'Draft notes')).toBe(0.9);
    expect(characterSetSimilarity('Draft not', 'Draft notes')).toBe(0.8);
  });

  // Order is ignored, so short strings over-match
  it('treats reordered characters as identical', () => {
    expect(characterSetSimilarity('12', '21')).toBe(1);
    expect(characterSetSimilarity('Page 12', 'Page 21')).toBe(1);
    expect(characterSetSimilarity('11', '1')).toBe(1);
  });
});

describe('isPageNumber', () => {
  it.each(['7', 'Page 12', 'page 3', '3 / 10', '- 4 -', '5 페이지', 'p. 9', '  8  '])(
    'recognizes "%s"',
    (text) => {
      expect(isPageNumber(text)).toBe(true);
    },
  );

  it.each(['Chapter 1', '1. Intro', 'Page one', ''])('rejects "%s"', (text) => {
    expect(isPageNumber(text)).toBe(false);
  });
});
