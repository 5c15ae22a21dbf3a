import type { LinearGradientFill, RGBA } from '@ridgeline/shared';

export interface HSVOverrides {
  hue?: number;
  saturation?: number;
  value?: number;
  alpha?: number;
}

export type RGB = [r: number, g: number, b: number];

/** Hue/saturation/value conversion with the hue already normalized to [0,1) */
function hsvToRgb(h: number, s: number, v: number): RGB {
  if (s === 0) return [v, v, v];

  const sector = Math.trunc(h * 6);
  const f = h * 6 - sector;
  const p = v * (1 - s);
  const q = v * (1 - s * f);
  const t = v * (1 - s * (1 - f));

  switch (((sector % 6) + 6) % 6) {
    case 0: return [v, t, p];
    case 1: return [q, v, p];
    case 2: return [p, v, t];
    case 3: return [p, q, v];
    case 4: return [t, p, v];
    default: return [v, p, q];
  }
}

/**
 * Immutable HSV color. Every transform returns a new instance.
 *
 * Ranges are not enforced: hue is whole degrees (0-359 by convention),
 * saturation, value and alpha are expected in [0,1].
 */
export class HSV {
  readonly hue: number;
  readonly saturation: number;
  readonly value: number;
  readonly alpha: number;

  constructor(hue: number, saturation: number, value: number, alpha = 1) {
    this.hue = hue;
    this.saturation = saturation;
    this.value = value;
    this.alpha = alpha;
    Object.freeze(this);
  }

  darken(amount: number): HSV {
    return new HSV(this.hue, this.saturation, this.value * (1 - amount), this.alpha);
  }

  desaturate(amount: number): HSV {
    return new HSV(this.hue, this.saturation * (1 - amount), this.value, this.alpha);
  }

  /** Copy with the given fields replaced; omitted fields are kept */
  withOverrides(overrides: HSVOverrides = {}): HSV {
    return new HSV(
      overrides.hue ?? this.hue,
      overrides.saturation ?? this.saturation,
      overrides.value ?? this.value,
      overrides.alpha ?? this.alpha,
    );
  }

  copy(): HSV {
    return this.withOverrides();
  }

  /**
   * Channels in [0,1]. The hue is divided by 359, not 360, so 359° lands on
   * the same red as 0° and 360° sits just past the wrap.
   */
  toRGB(): RGB {
    return hsvToRgb(this.hue / 359, this.saturation, this.value);
  }

  toRGBA(): RGBA {
    const [r, g, b] = this.toRGB();
    return { r, g, b, a: this.alpha };
  }

  toTuple(): [hue: number, saturation: number, value: number, alpha: number] {
    return [this.hue, this.saturation, this.value, this.alpha];
  }

  equals(other: HSV): boolean {
    return (
      this.hue === other.hue &&
      this.saturation === other.saturation &&
      this.value === other.value &&
      this.alpha === other.alpha
    );
  }
}

/** Ordered, non-empty, immutable list of HSV stops */
export class Gradient implements Iterable<HSV> {
  readonly stops: readonly HSV[];

  constructor(...stops: HSV[]) {
    if (stops.length === 0) {
      throw new Error('Gradient needs at least one stop');
    }
    this.stops = Object.freeze([...stops]);
  }

  get length(): number {
    return this.stops.length;
  }

  get start(): HSV {
    return this.stops[0];
  }

  get end(): HSV {
    return this.stops[this.stops.length - 1];
  }

  /** Negative indexes count from the end */
  at(index: number): HSV {
    const stop = this.stops.at(index);
    if (!stop) {
      throw new RangeError(`Gradient stop ${index} out of range (length ${this.stops.length})`);
    }
    return stop;
  }

  [Symbol.iterator](): Iterator<HSV> {
    return this.stops[Symbol.iterator]();
  }

  map(mapper: (index: number, color: HSV) => HSV): Gradient {
    return new Gradient(...this.stops.map((color, i) => mapper(i, color)));
  }

  /**
   * Describe this gradient along the axis (x0,y0) -> (x1,y1).
   * Stops sit at i / count, so the last color never reaches offset 1.
   */
  toLinearGradient(x0: number, y0: number, x1: number, y1: number): LinearGradientFill {
    const count = this.stops.length;
    return {
      kind: 'linear',
      from: { x: x0, y: y0 },
      to: { x: x1, y: y1 },
      stops: this.stops.map((stop, i) => ({ offset: i / count, color: stop.toRGBA() })),
    };
  }
}
