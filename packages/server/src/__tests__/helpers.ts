import type { SceneParameters } from '@ridgeline/shared';
import type { RandomSource } from '../generator/random';

/**
 * Deterministic random source replaying fixed draws.
 * Throws once a list runs out so tests notice unexpected extra draws.
 */
export function sequenceRng(draws: number[], ints: number[] = []): RandomSource {
  const floats = [...draws];
  const integers = [...ints];
  return {
    random() {
      const next = floats.shift();
      if (next === undefined) throw new Error('sequenceRng: out of float draws');
      return next;
    },
    randomInt(min, max) {
      const next = integers.shift();
      if (next === undefined) throw new Error('sequenceRng: out of integer draws');
      if (next < min || next > max) throw new Error(`sequenceRng: ${next} outside [${min}, ${max}]`);
      return next;
    },
  };
}

export function makeParams(overrides?: Partial<SceneParameters>): SceneParameters {
  return {
    width: 400,
    height: 200,
    sunHeight: 0.85,
    sunSize: 0.1,
    fogHeight: 0.8,
    fogThickness: 1,
    mountainRangeCount: 3,
    mountainPosition: { start: 0.15, end: 0.7 },
    mountainPeaks: { min: 2, max: 4 },
    mountainRoughness: 0.2,
    mountainPeakiness: 4,
    ...overrides,
  };
}
