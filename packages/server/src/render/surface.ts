import type { ArcShape, DrawInstruction, Fill, Point, RectShape } from '@ridgeline/shared';

/** Anything that can fill shapes: SVG, a canvas, a test recorder */
export interface RenderSurface {
  fillRect(rect: RectShape, fill: Fill): void;
  /** The polygon is closed implicitly */
  fillPolygon(points: Point[], fill: Fill): void;
  fillArc(arc: ArcShape, fill: Fill): void;
}

/** Replay a draw list onto a surface, in order */
export function renderScene(instructions: DrawInstruction[], surface: RenderSurface): void {
  for (const instruction of instructions) {
    switch (instruction.shape) {
      case 'rect':
        surface.fillRect(instruction.rect, instruction.fill);
        break;
      case 'polygon':
        surface.fillPolygon(instruction.points, instruction.fill);
        break;
      case 'arc':
        surface.fillArc(instruction.arc, instruction.fill);
        break;
    }
  }
}
