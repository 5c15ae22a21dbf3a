import { Gradient, HSV } from './color';

export interface Palette {
  readonly MountainRed: Gradient;
  readonly SkyBlue: Gradient;
  readonly SunYellow: Gradient;
  /** Single hue, fading to transparent */
  readonly Fog: Gradient;
  getFogAtLevel(thickness: number): Gradient;
}

/** Every gradient the scene draws with */
export const ColorGradients: Palette = Object.freeze({
  MountainRed: new Gradient(new HSV(347, 0.67, 0.65), new HSV(14, 0.8, 0.95)),
  SkyBlue: new Gradient(new HSV(228, 0.85, 1), new HSV(196, 1, 1)),
  SunYellow: new Gradient(new HSV(0, 0, 1), new HSV(43, 1, 1)),
  Fog: new Gradient(new HSV(0, 0, 1, 1), new HSV(0, 0, 0, 0)),

  /** Fog with every stop's alpha scaled by thickness */
  getFogAtLevel(thickness: number): Gradient {
    return this.Fog.map((_i, c) => c.withOverrides({ alpha: c.alpha * thickness }));
  },
});
