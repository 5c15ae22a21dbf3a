import type { Point, Range } from '@ridgeline/shared';
import type { RandomSource } from './random';
import { SceneConfigError } from './errors';

/** Above this the rejection loop gets noticeably slow */
const MIN_DIFF_WARN = 0.45;
/** Above this the loop may never finish */
const MIN_DIFF_LIMIT = 0.49;

/**
 * Lazily yield `count` values in [min, max). Each raw [0,1) draw differs from
 * the previous raw draw by at least `minDiffFraction`, so consecutive values
 * never sit too close. The check is on the raw draw, not the scaled value.
 *
 * Redraws until the constraint holds. The clamp to 0.49 is the only guard
 * against a loop that cannot terminate.
 */
export function* generateConstrainedRandoms(
  rng: RandomSource,
  count: number,
  min: number,
  max: number,
  minDiffFraction = 0.2,
): Generator<number, void, undefined> {
  if (count === 0) return;

  let minDiff = minDiffFraction;
  if (minDiff > MIN_DIFF_WARN) {
    console.warn(`[terrain] minDiffFraction ${minDiff} is overtuned; random generation is very restricted and may be slow`);
  }
  if (minDiff > MIN_DIFF_LIMIT) {
    console.warn(`[terrain] minDiffFraction clamped to ${MIN_DIFF_LIMIT} to prevent an endless loop`);
    minDiff = MIN_DIFF_LIMIT;
  }

  const size = max - min;
  let prev = rng.random();
  yield prev * size + min;

  for (let i = 1; i < count; i++) {
    let next = rng.random();
    while (Math.abs(next - prev) < minDiff) {
      next = rng.random();
    }
    yield next * size + min;
    prev = next;
  }
}

/**
 * Generate one ridge silhouette in pixel space.
 *
 * Peaks come first (including one off-screen anchor peak at each side),
 * followed by the bottom-left and bottom-right corners that close the shape
 * against the bottom edge. Peaks run right to left.
 *
 * `roughness` is accepted but does not perturb the cliffs yet.
 */
export function generatePeaks(
  rng: RandomSource,
  peakCountRange: Range,
  yBounds: Range,
  dims: { width: number; height: number },
  peakiness: number,
  // TODO: roughen cliff edges between peaks
  _roughness = 0,
): Point[] {
  if (peakCountRange.min < 1) {
    throw new SceneConfigError(`peak count minimum must be at least 1 (got ${peakCountRange.min})`);
  }
  if (peakCountRange.min > peakCountRange.max) {
    throw new SceneConfigError(`peak count range is empty (${peakCountRange.min} > ${peakCountRange.max})`);
  }

  // Two extra peaks sit off-screen at the left and right edges
  const peakCount = rng.randomInt(peakCountRange.min, peakCountRange.max) + 2;
  const slots = peakCount - 2;

  const peaksY = [...generateConstrainedRandoms(rng, peakCount, yBounds.min, yBounds.max, 0.3 * peakiness)];

  // Even spread centered in each slot, then jitter by 20% of a slot
  const jitter = 0.2 / slots;
  const peaksX: number[] = [];
  for (let i = 0; i < peakCount; i++) {
    peaksX.push((i - 0.5) / slots + (rng.random() - 0.5) * jitter);
  }

  const points: Point[] = peaksX.map((x, i) => ({
    x: (1 - x) * dims.width,
    y: peaksY[i] * dims.height,
  }));

  points.push({ x: 0, y: dims.height }, { x: dims.width, y: dims.height });
  return points;
}
