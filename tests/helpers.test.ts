import { inChunks, percentageOf, sanitizeFilename, uniqueSorted } from '../src/utils/helpers';

describe('percentageOf', () => {
  it('rounds to two decimals', () => {
    expect(percentageOf(1, 2)).toBe(50);
    expect(percentageOf(2, 3)).toBe(66.67);
    expect(percentageOf(1, 3)).toBe(33.33);
    expect(percentageOf(5, 8)).toBe(62.5);
  });

  it('rounds a half hundredth up', () => {
    expect(percentageOf(1, 20000)).toBe(0.01);
  });

  it('returns 0 when there are no classes', () => {
    expect(percentageOf(0, 0)).toBe(0);
  });
});

describe('inChunks', () => {
  it('splits ids in order', () => {
    expect(inChunks([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
    expect(inChunks([], 2)).toEqual([]);
  });

  it('rejects a chunk size below 1', () => {
    expect(() => inChunks([1], 0)).toThrow(RangeError);
  });
});

describe('string helpers', () => {
  it('sanitizes download filenames', () => {
    expect(sanitizeFilename('II-CSE A/2024')).toBe('II-CSE_A_2024');
  });

  it('de-duplicates and sorts', () => {
    expect(uniqueSorted(['P2', 'P1', 'P2'])).toEqual(['P1', 'P2']);
  });
});
