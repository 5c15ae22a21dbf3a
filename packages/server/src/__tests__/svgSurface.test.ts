import { describe, it, expect } from 'vitest';
import type { ArcShape, Fill, Point, RectShape } from '@ridgeline/shared';
import { formatNumber, sceneToSvg, SvgSurface, toSvgColor } from '../render/svgSurface';
import { renderScene, type RenderSurface } from '../render/surface';
import { Gradient, HSV } from '../generator/color';
import { generateScene } from '../generator/scene';
import { makeParams } from './helpers';

const WHITE: Fill = { kind: 'solid', color: { r: 1, g: 1, b: 1, a: 1 } };

function count(haystack: string, needle: string): number {
  return haystack.split(needle).length - 1;
}

describe('formatNumber', () => {
  it('rounds to two decimals and drops trailing zeros', () => {
    expect(formatNumber(3.14159)).toBe('3.14');
    expect(formatNumber(2)).toBe('2');
    expect(formatNumber(-50)).toBe('-50');
    expect(formatNumber(0.5)).toBe('0.5');
  });
});

describe('toSvgColor', () => {
  it('maps 0-1 channels to 0-255', () => {
    expect(toSvgColor({ r: 1, g: 0.5, b: 0, a: 1 })).toBe('rgb(255,128,0)');
  });

  it('clamps out-of-range channels', () => {
    expect(toSvgColor({ r: 1.2, g: -0.1, b: 0.2, a: 1 })).toBe('rgb(255,0,51)');
  });
});

describe('SvgSurface', () => {
  it('writes a document sized to the scene', () => {
    expect(new SvgSurface(10, 20).toString()).toBe(
      '<svg xmlns="http://www.w3.org/2000/svg" width="10" height="20" viewBox="0 0 10 20"></svg>',
    );
  });

  it('fills a rectangle with a solid color', () => {
    const surface = new SvgSurface(10, 20);
    surface.fillRect({ x: 0, y: 0, width: 10, height: 20 }, WHITE);
    expect(surface.toString()).toContain('<rect x="0" y="0" width="10" height="20" fill="rgb(255,255,255)"/>');
  });

  it('adds fill-opacity for translucent solids', () => {
    const surface = new SvgSurface(10, 10);
    surface.fillPolygon([{ x: 0, y: 0 }, { x: 10, y: 0 }, { x: 5, y: 5 }], { kind: 'solid', color: { r: 0, g: 0, b: 0, a: 0.25 } });
    expect(surface.toString()).toContain('<polygon points="0,0 10,0 5,5" fill="rgb(0,0,0)" fill-opacity="0.25"/>');
  });

  it('defines each gradient in user space and references it by id', () => {
    const surface = new SvgSurface(10, 20);
    const fill = new Gradient(new HSV(0, 1, 1), new HSV(0, 0, 0, 0)).toLinearGradient(0, 0, 10, 20);
    surface.fillPolygon([{ x: 1.234, y: 2 }, { x: 3, y: 4 }], fill);
    surface.fillRect({ x: 0, y: 0, width: 1, height: 1 }, fill);

    const svg = surface.toString();
    expect(svg).toContain(
      '<defs><linearGradient id="grad-0" gradientUnits="userSpaceOnUse" x1="0" y1="0" x2="10" y2="20">' +
        '<stop offset="0" stop-color="rgb(255,0,0)" stop-opacity="1"/>' +
        '<stop offset="0.5" stop-color="rgb(0,0,0)" stop-opacity="0"/>' +
        '</linearGradient><linearGradient id="grad-1"',
    );
    expect(svg).toContain('<polygon points="1.23,2 3,4" fill="url(#grad-0)"/>');
    expect(svg).toContain('<rect x="0" y="0" width="1" height="1" fill="url(#grad-1)"/>');
  });

  it('draws a full arc as a circle', () => {
    const surface = new SvgSurface(100, 100);
    surface.fillArc({ center: { x: 85, y: 15 }, radius: 10, startAngle: 0, endAngle: 2 * Math.PI }, WHITE);
    expect(surface.toString()).toContain('<circle cx="85" cy="15" r="10" fill="rgb(255,255,255)"/>');
  });

  it('draws a partial arc as a closed chord', () => {
    const surface = new SvgSurface(100, 100);
    surface.fillArc({ center: { x: 50, y: 50 }, radius: 10, startAngle: 0, endAngle: Math.PI / 2 }, WHITE);
    expect(surface.toString()).toContain('<path d="M60,50 A10,10 0 0 1 50,60 Z" fill="rgb(255,255,255)"/>');
  });
});

describe('renderScene', () => {
  it('replays instructions in order', () => {
    const calls: string[] = [];
    const recorder: RenderSurface = {
      fillRect: (_rect: RectShape) => calls.push('rect'),
      fillPolygon: (points: Point[]) => calls.push(`polygon:${points.length}`),
      fillArc: (_arc: ArcShape) => calls.push('arc'),
    };
    renderScene(
      [
        { shape: 'rect', layer: 'sky', rect: { x: 0, y: 0, width: 1, height: 1 }, fill: WHITE },
        { shape: 'arc', layer: 'sun', arc: { center: { x: 0, y: 0 }, radius: 1, startAngle: 0, endAngle: 1 }, fill: WHITE },
        { shape: 'polygon', layer: 'mountain', points: [{ x: 0, y: 0 }, { x: 1, y: 1 }, { x: 0, y: 1 }], fill: WHITE },
      ],
      recorder,
    );
    expect(calls).toEqual(['rect', 'arc', 'polygon:3']);
  });
});

describe('sceneToSvg', () => {
  it('renders every layer of a generated scene', () => {
    const svg = sceneToSvg(generateScene(makeParams({ mountainRangeCount: 4 }), 'svg'));
    expect(svg.startsWith('<svg xmlns="http://www.w3.org/2000/svg" width="400" height="200"')).toBe(true);
    expect(count(svg, '<rect ')).toBe(1);
    expect(count(svg, '<circle ')).toBe(1);
    expect(count(svg, '<polygon ')).toBe(8);
    // Sky plus a mountain and a fog gradient per layer
    expect(count(svg, '<linearGradient ')).toBe(9);
  });
});
