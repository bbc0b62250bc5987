import { editSimilarity, jaccard, levenshteinDistance } from '../../src/utils/similarity';

describe('similarity', () => {
  it('jaccard compares token sets', () => {
    expect(jaccard(['hey', 'jude'], ['hey', 'jude'])).toBe(1);
    expect(jaccard(['a', 'b'], ['b', 'c'])).toBeCloseTo(1 / 3);
    expect(jaccard(['la', 'la', 'land'], ['la', 'land'])).toBe(1);
    expect(jaccard([], [])).toBe(0);
    expect(jaccard(['hey'], [])).toBe(0);
  });

  it('levenshteinDistance counts single-character edits', () => {
    expect(levenshteinDistance('kitten', 'sitting')).toBe(3);
    expect(levenshteinDistance('', 'abc')).toBe(3);
    expect(levenshteinDistance('beatles', 'beatles')).toBe(0);
  });

  it('editSimilarity scales the distance by the longer string', () => {
    expect(editSimilarity('beatles', 'beatles')).toBe(1);
    expect(editSimilarity('', '')).toBe(1);
    expect(editSimilarity('abcd', 'abcf')).toBe(0.75);
    expect(editSimilarity('abc', '')).toBe(0);
  });
});
