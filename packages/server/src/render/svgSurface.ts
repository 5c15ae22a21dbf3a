import type { ArcShape, Fill, LinearGradientFill, Point, RectShape, RGBA, SceneDocument } from '@ridgeline/shared';
import { renderScene, type RenderSurface } from './surface';

/** Two decimals is well below a pixel */
export function formatNumber(n: number): string {
  return String(Math.round(n * 100) / 100);
}

/** 0-1 channels to an SVG rgb() color, alpha handled separately */
export function toSvgColor({ r, g, b }: RGBA): string {
  const channel = (c: number) => Math.round(Math.min(1, Math.max(0, c)) * 255);
  return `rgb(${channel(r)},${channel(g)},${channel(b)})`;
}

/** Builds an SVG document. Gradients go in <defs> with user-space coordinates. */
export class SvgSurface implements RenderSurface {
  private defs: string[] = [];
  private shapes: string[] = [];

  constructor(
    readonly width: number,
    readonly height: number,
  ) {}

  fillRect(rect: RectShape, fill: Fill) {
    const attrs = `x="${formatNumber(rect.x)}" y="${formatNumber(rect.y)}" width="${formatNumber(rect.width)}" height="${formatNumber(rect.height)}"`;
    this.shapes.push(`<rect ${attrs} ${this.fillAttributes(fill)}/>`);
  }

  fillPolygon(points: Point[], fill: Fill) {
    const list = points.map((p) => `${formatNumber(p.x)},${formatNumber(p.y)}`).join(' ');
    this.shapes.push(`<polygon points="${list}" ${this.fillAttributes(fill)}/>`);
  }

  fillArc(arc: ArcShape, fill: Fill) {
    const { center, radius, startAngle, endAngle } = arc;
    if (endAngle - startAngle >= 2 * Math.PI) {
      this.shapes.push(
        `<circle cx="${formatNumber(center.x)}" cy="${formatNumber(center.y)}" r="${formatNumber(radius)}" ${this.fillAttributes(fill)}/>`,
      );
      return;
    }
    // Partial arcs fill the chord, like a canvas arc with no current point
    const sx = center.x + radius * Math.cos(startAngle);
    const sy = center.y + radius * Math.sin(startAngle);
    const ex = center.x + radius * Math.cos(endAngle);
    const ey = center.y + radius * Math.sin(endAngle);
    const largeArc = endAngle - startAngle > Math.PI ? 1 : 0;
    const r = formatNumber(radius);
    const d = `M${formatNumber(sx)},${formatNumber(sy)} A${r},${r} 0 ${largeArc} 1 ${formatNumber(ex)},${formatNumber(ey)} Z`;
    this.shapes.push(`<path d="${d}" ${this.fillAttributes(fill)}/>`);
  }

  toString(): string {
    const defs = this.defs.length > 0 ? `<defs>${this.defs.join('')}</defs>` : '';
    return [
      `<svg xmlns="http://www.w3.org/2000/svg" width="${this.width}" height="${this.height}" viewBox="0 0 ${this.width} ${this.height}">`,
      defs,
      ...this.shapes,
      '</svg>',
    ].join('');
  }

  private fillAttributes(fill: Fill): string {
    if (fill.kind === 'solid') {
      const opacity = fill.color.a < 1 ? ` fill-opacity="${formatNumber(fill.color.a)}"` : '';
      return `fill="${toSvgColor(fill.color)}"${opacity}`;
    }
    return `fill="url(#${this.addGradient(fill)})"`;
  }

  private addGradient(gradient: LinearGradientFill): string {
    const id = `grad-${this.defs.length}`;
    const stops = gradient.stops
      .map((s) => `<stop offset="${formatNumber(s.offset)}" stop-color="${toSvgColor(s.color)}" stop-opacity="${formatNumber(s.color.a)}"/>`)
      .join('');
    const { from, to } = gradient;
    this.defs.push(
      `<linearGradient id="${id}" gradientUnits="userSpaceOnUse" x1="${formatNumber(from.x)}" y1="${formatNumber(from.y)}" x2="${formatNumber(to.x)}" y2="${formatNumber(to.y)}">${stops}</linearGradient>`,
    );
    return id;
  }
}

/** Render a whole scene document to SVG markup */
export function sceneToSvg(document: SceneDocument): string {
  const surface = new SvgSurface(document.width, document.height);
  renderScene(document.instructions, surface);
  return surface.toString();
}
