import type { ArcShape, Fill, Point, RGBA } from '@ridgeline/shared';

function round2(n: number): number {
  return Math.round(n * 100) / 100;
}

function clamp01(n: number): number {
  return Math.min(1, Math.max(0, n));
}

/** 0-1 channels to a CSS rgba() color */
export function toCssColor({ r, g, b, a }: RGBA): string {
  const channel = (c: number) => Math.round(clamp01(c) * 255);
  return `rgba(${channel(r)}, ${channel(g)}, ${channel(b)}, ${round2(clamp01(a))})`;
}

/** Element id for the gradient of instruction `index`, unique per scene prefix */
export function gradientId(prefix: string, index: number): string {
  const safe = prefix.replace(/[^A-Za-z0-9_-]/g, '');
  return `${safe || 'scene'}-grad-${index}`;
}

export function polygonPoints(points: Point[]): string {
  return points.map((p) => `${round2(p.x)},${round2(p.y)}`).join(' ');
}

/** Gradient stop offset as a percentage */
export function stopOffset(offset: number): string {
  return `${round2(clamp01(offset) * 100)}%`;
}

/** Value for a shape's `fill` attribute */
export function paintFor(fill: Fill, id: string): string {
  return fill.kind === 'solid' ? toCssColor(fill.color) : `url(#${id})`;
}

export function isFullCircle(arc: ArcShape): boolean {
  return arc.endAngle - arc.startAngle >= 2 * Math.PI;
}

/** Path for a partial arc, closed across the chord */
export function arcPath({ center, radius, startAngle, endAngle }: ArcShape): string {
  const sx = round2(center.x + radius * Math.cos(startAngle));
  const sy = round2(center.y + radius * Math.sin(startAngle));
  const ex = round2(center.x + radius * Math.cos(endAngle));
  const ey = round2(center.y + radius * Math.sin(endAngle));
  const largeArc = endAngle - startAngle > Math.PI ? 1 : 0;
  const r = round2(radius);
  return `M${sx},${sy} A${r},${r} 0 ${largeArc} 1 ${ex},${ey} Z`;
}
