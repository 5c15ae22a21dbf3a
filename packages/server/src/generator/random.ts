import alea from 'alea';

/** Injected source of randomness for every generation call */
export interface RandomSource {
  /** Uniform in [0,1) */
  random(): number;
  /** Uniform integer in [min, max], both inclusive */
  randomInt(min: number, max: number): number;
}

/** Seeded source backed by the Alea PRNG; equal seeds give equal scenes */
export function createRandomSource(seed: string): RandomSource {
  const prng = alea(seed);
  return {
    random: () => prng(),
    randomInt: (min, max) => min + Math.floor(prng() * (max - min + 1)),
  };
}

/** Short base-36 seed for requests that don't name one */
export function createSeed(): string {
  return Math.floor(Math.random() * 36 ** 8).toString(36).padStart(8, '0');
}
