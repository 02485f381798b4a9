import { percentile } from './percentile';

describe('percentile', () => {
  it('uses nearest rank over ascending values', () => {
    const values = [50, 10, 40, 20, 30];
    expect(percentile(values, 50)).toBe(30);
    expect(percentile(values, 95)).toBe(50);
    expect(percentile(values, 0)).toBe(10);
  });

  it('returns 0 for no values', () => {
    expect(percentile([], 95)).toBe(0);
  });

  it('returns the only value of a single-element list', () => {
    expect(percentile([7], 50)).toBe(7);
  });
});
