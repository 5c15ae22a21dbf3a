import type { DrawInstruction, Point, SceneDocument, SceneParameters } from '@ridgeline/shared';
import { validateSceneParameters } from '../validation';
import type { HSV } from './color';
import { SceneConfigError } from './errors';
import { sampleLinear } from './interpolation';
import { ColorGradients, type Palette } from './palette';
import { createRandomSource, type RandomSource } from './random';
import { generatePeaks } from './terrain';

const WHITE = { r: 1, g: 1, b: 1, a: 1 };
/** Horizontal sun position as a fraction of the width */
const SUN_X = 0.85;

/** Stop mapper that darkens then desaturates every color */
export function darkenMapper(darken: number, desaturate: number) {
  return (_i: number, color: HSV): HSV => color.darken(darken).desaturate(desaturate);
}

/** Vertical band (as height fractions) for ridge layer i of count */
export function layerBand(params: SceneParameters, i: number): { min: number; max: number } {
  const { start, end } = params.mountainPosition;
  const count = params.mountainRangeCount;
  return {
    min: sampleLinear(start, end, i, count),
    max: sampleLinear(start * params.mountainPeakiness, end, i + 1, count),
  };
}

function drawSky(params: SceneParameters, palette: Palette): DrawInstruction {
  const { width, height } = params;
  return {
    shape: 'rect',
    layer: 'sky',
    rect: { x: 0, y: 0, width, height },
    fill: palette.SkyBlue.toLinearGradient(0, 0, width, height),
  };
}

function drawSun(params: SceneParameters): DrawInstruction {
  const { width, height } = params;
  return {
    shape: 'arc',
    layer: 'sun',
    arc: {
      center: { x: width * SUN_X, y: height * (1 - params.sunHeight) },
      radius: height * params.sunSize,
      startAngle: 0,
      endAngle: 2 * Math.PI,
    },
    fill: { kind: 'solid', color: WHITE },
  };
}

/**
 * Ridge layers back to front. Each layer emits its silhouette twice: once
 * with the shaded mountain gradient and once with a fog overlay that fades
 * from the bottom edge up to half the ridge's height.
 *
 * Darkening and desaturation grow with the layer index, so the last
 * (nearest) layer is the darkest and greyest.
 */
function drawMountains(params: SceneParameters, palette: Palette, rng: RandomSource): DrawInstruction[] {
  const { width, height } = params;
  const count = params.mountainRangeCount;
  const last = count - 1;
  const instructions: DrawInstruction[] = [];

  for (let i = 0; i < count; i++) {
    const peakiness = sampleLinear(0.4, 0.1, i, last);
    const path: Point[] = generatePeaks(
      rng,
      params.mountainPeaks,
      layerBand(params, i),
      { width, height },
      peakiness,
      params.mountainRoughness,
    );

    const darken = sampleLinear(0, 0.85, i, last);
    const desaturate = sampleLinear(0, 1, i, last);
    const mountainFill = palette.MountainRed
      .map(darkenMapper(darken, desaturate))
      .toLinearGradient(0, 0, width, height);
    instructions.push({ shape: 'polygon', layer: 'mountain', points: path, fill: mountainFill });

    const top = Math.min(...path.map((pt) => pt.y));
    const gradientEnd = height - top;
    const thickness = sampleLinear(params.fogThickness, params.fogThickness / 4, i, last);
    const fogFill = palette.getFogAtLevel(thickness).toLinearGradient(0, height, 0, gradientEnd / 2);
    instructions.push({ shape: 'polygon', layer: 'fog', points: path, fill: fogFill });
  }

  return instructions;
}

/** Ordered draw list: sky, sun, then each ridge and its fog, back to front */
export function composeScene(
  params: SceneParameters,
  rng: RandomSource,
  palette: Palette = ColorGradients,
): DrawInstruction[] {
  const error = validateSceneParameters(params);
  if (error) {
    throw new SceneConfigError(error);
  }

  return [drawSky(params, palette), drawSun(params), ...drawMountains(params, palette, rng)];
}

/** Seed a random source and compose a complete scene document */
export function generateScene(params: SceneParameters, seed: string, palette: Palette = ColorGradients): SceneDocument {
  const instructions = composeScene(params, createRandomSource(seed), palette);
  return {
    seed,
    width: params.width,
    height: params.height,
    instructions,
    generatedAt: Date.now(),
  };
}
