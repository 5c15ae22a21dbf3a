/**
 * Sample the line through f(0) = start and f(maxI) = end at point i.
 * maxI must be non-zero; callers guarantee that.
 */
export function sampleLinear(start: number, end: number, i: number, maxI: number): number {
  const t = i / maxI;
  return start * (1 - t) + end * t;
}

/** terms[n] is the coefficient of x^n */
export class Polynomial {
  readonly terms: readonly number[];

  constructor(...terms: number[]) {
    this.terms = Object.freeze([...terms]);
  }

  sample(x: number): number {
    return this.terms.reduce((sum, a, n) => sum + a * x ** n, 0);
  }
}
