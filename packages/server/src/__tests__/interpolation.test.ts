import { describe, it, expect } from 'vitest';
import { sampleLinear, Polynomial } from '../generator/interpolation';

describe('sampleLinear', () => {
  it('returns start at i = 0 and end at i = maxI', () => {
    for (const [start, end, maxI] of [[2, 10, 4], [-3, 7, 1], [0.4, 0.1, 7]]) {
      expect(sampleLinear(start, end, 0, maxI)).toBe(start);
      expect(sampleLinear(start, end, maxI, maxI)).toBeCloseTo(end, 12);
    }
  });

  it('interpolates linearly in between', () => {
    expect(sampleLinear(0, 1, 1, 4)).toBe(0.25);
    expect(sampleLinear(0.4, 0.1, 1, 3)).toBeCloseTo(0.3, 12);
    expect(sampleLinear(10, 20, 3, 2)).toBe(25);
  });

  it('is undefined when maxI is 0', () => {
    expect(sampleLinear(1, 2, 0, 0)).toBeNaN();
  });
});

describe('Polynomial', () => {
  it('sums terms[n] * x^n', () => {
    expect(new Polynomial(1, 2, 3).sample(2)).toBe(17);
    expect(new Polynomial(0, 0, 1).sample(-3)).toBe(9);
  });

  it('treats the first term as the constant', () => {
    expect(new Polynomial(5).sample(100)).toBe(5);
  });

  it('samples an empty polynomial to 0', () => {
    expect(new Polynomial().sample(5)).toBe(0);
  });

  it('keeps its terms frozen', () => {
    const terms = [1, 2];
    const p = new Polynomial(...terms);
    terms[0] = 99;
    expect(p.terms).toEqual([1, 2]);
    expect(Object.isFrozen(p.terms)).toBe(true);
  });
});
