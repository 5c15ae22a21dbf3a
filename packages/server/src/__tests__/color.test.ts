import { describe, it, expect } from 'vitest';
import { Gradient, HSV } from '../generator/color';

describe('HSV', () => {
  it('defaults alpha to 1', () => {
    expect(new HSV(10, 0.5, 0.5).alpha).toBe(1);
  });

  it('is frozen', () => {
    const color = new HSV(10, 0.5, 0.5);
    expect(Object.isFrozen(color)).toBe(true);
  });

  it('darken(0) and desaturate(0) are identity', () => {
    const color = new HSV(347, 0.67, 0.65, 0.4);
    expect(color.darken(0).equals(color)).toBe(true);
    expect(color.desaturate(0).equals(color)).toBe(true);
  });

  it('darken(1) drops value to 0', () => {
    expect(new HSV(14, 0.8, 0.95).darken(1).value).toBe(0);
  });

  it('scales value and saturation without touching the source', () => {
    const color = new HSV(100, 0.8, 0.8);
    const darker = color.darken(0.5);
    const greyer = color.desaturate(0.25);
    expect(darker.value).toBeCloseTo(0.4, 12);
    expect(darker.saturation).toBe(0.8);
    expect(greyer.saturation).toBeCloseTo(0.6, 12);
    expect(greyer.value).toBe(0.8);
    expect(color.value).toBe(0.8);
    expect(color.saturation).toBe(0.8);
  });

  it('copy and withOverrides() with no overrides equal the receiver', () => {
    const color = new HSV(228, 0.85, 1, 0.3);
    expect(color.copy().equals(color)).toBe(true);
    expect(color.withOverrides().toTuple()).toEqual([228, 0.85, 1, 0.3]);
    expect(color.copy()).not.toBe(color);
  });

  it('withOverrides replaces only the given fields', () => {
    const color = new HSV(228, 0.85, 1);
    expect(color.withOverrides({ alpha: 0.5 }).toTuple()).toEqual([228, 0.85, 1, 0.5]);
    expect(color.withOverrides({ hue: 10, value: 0 }).toTuple()).toEqual([10, 0.85, 0, 1]);
  });

  it('converts pure hues to RGB', () => {
    expect(new HSV(0, 1, 1).toRGB()).toEqual([1, 0, 0]);
  });

  it('normalizes hue by 359', () => {
    // 359 wraps to the same red as 0
    expect(new HSV(359, 1, 1).toRGB()).toEqual([1, 0, 0]);

    // 120 sits slightly past pure green: b = 2/359
    const [r, g, b] = new HSV(120, 1, 1).toRGB();
    expect(r).toBe(0);
    expect(g).toBe(1);
    expect(b).toBeCloseTo(2 / 359, 12);
  });

  it('returns grey when saturation is 0', () => {
    expect(new HSV(200, 0, 0.5).toRGB()).toEqual([0.5, 0.5, 0.5]);
  });

  it('carries alpha into RGBA', () => {
    expect(new HSV(0, 1, 1, 0.5).toRGBA()).toEqual({ r: 1, g: 0, b: 0, a: 0.5 });
  });
});

describe('Gradient', () => {
  const red = new HSV(0, 1, 1);
  const grey = new HSV(0, 0, 0.5);
  const clear = new HSV(0, 0, 0, 0);

  it('requires at least one stop', () => {
    expect(() => new Gradient()).toThrow('at least one stop');
  });

  it('exposes start, end, length and indexed access', () => {
    const gradient = new Gradient(red, grey, clear);
    expect(gradient.start).toBe(red);
    expect(gradient.end).toBe(clear);
    expect(gradient.length).toBe(3);
    expect(gradient.at(1)).toBe(grey);
    expect(gradient.at(-1)).toBe(clear);
    expect([...gradient]).toEqual([red, grey, clear]);
  });

  it('throws for an index past the end', () => {
    expect(() => new Gradient(red).at(2)).toThrow(RangeError);
  });

  it('map preserves stop count and order and leaves the source alone', () => {
    const gradient = new Gradient(red, grey, clear);
    const seen: number[] = [];
    const mapped = gradient.map((i, c) => {
      seen.push(i);
      return c.withOverrides({ hue: i * 10 });
    });
    expect(seen).toEqual([0, 1, 2]);
    expect(mapped.length).toBe(3);
    expect(mapped.stops.map((c) => c.hue)).toEqual([0, 10, 20]);
    expect(mapped.at(1).value).toBe(0.5);
    expect(gradient.stops.map((c) => c.hue)).toEqual([0, 0, 0]);
  });

  it('places linear gradient stops at i / count', () => {
    const two = new Gradient(red, clear).toLinearGradient(0, 0, 100, 50);
    expect(two).toEqual({
      kind: 'linear',
      from: { x: 0, y: 0 },
      to: { x: 100, y: 50 },
      stops: [
        { offset: 0, color: { r: 1, g: 0, b: 0, a: 1 } },
        { offset: 0.5, color: { r: 0, g: 0, b: 0, a: 0 } },
      ],
    });

    const three = new Gradient(red, grey, clear).toLinearGradient(0, 0, 1, 1);
    expect(three.stops.map((s) => s.offset)).toEqual([0, 1 / 3, 2 / 3]);
  });
});
