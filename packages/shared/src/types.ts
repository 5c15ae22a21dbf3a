// ============================================================================
// SCENE PARAMETERS
// ============================================================================

/** Inclusive numeric range */
export interface Range {
  min: number;
  max: number;
}

export interface SceneParameters {
  /** Image width in pixels */
  width: number;
  /** Image height in pixels */
  height: number;
  /** Sun center height as a fraction of the image height, measured from the bottom */
  sunHeight: number;
  /** Sun radius as a fraction of the image height */
  sunSize: number;
  /** Carried for configuration files; the composer does not read it */
  fogHeight: number;
  fogThickness: number;
  /** Number of ridge layers, must be at least 2 */
  mountainRangeCount: number;
  /** Vertical band fractions swept from the furthest to the nearest layer */
  mountainPosition: { start: number; end: number };
  /** Visible peaks per ridge (two off-screen anchors are added on top) */
  mountainPeaks: Range;
  /** Accepted and passed to the terrain generator, which ignores it for now */
  mountainRoughness: number;
  /** Scales the start of each layer's upper band bound */
  mountainPeakiness: number;
}

// ============================================================================
// GEOMETRY & COLOR
// ============================================================================

export interface Point {
  x: number;
  y: number;
}

/** Channels in [0,1] */
export interface RGBA {
  r: number;
  g: number;
  b: number;
  a: number;
}

export interface GradientStop {
  /** Position along the gradient axis, in [0,1] */
  offset: number;
  color: RGBA;
}

export interface LinearGradientFill {
  kind: 'linear';
  from: Point;
  to: Point;
  stops: GradientStop[];
}

export interface SolidFill {
  kind: 'solid';
  color: RGBA;
}

export type Fill = SolidFill | LinearGradientFill;

export interface RectShape {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface ArcShape {
  center: Point;
  radius: number;
  startAngle: number;
  endAngle: number;
}

// ============================================================================
// DRAW INSTRUCTIONS
// ============================================================================

export type DrawLayer = 'sky' | 'sun' | 'mountain' | 'fog';

export type DrawInstruction =
  | { shape: 'rect'; layer: DrawLayer; rect: RectShape; fill: Fill }
  | { shape: 'polygon'; layer: DrawLayer; points: Point[]; fill: Fill }
  | { shape: 'arc'; layer: DrawLayer; arc: ArcShape; fill: Fill };

/** A generated scene, ready for any rendering surface */
export interface SceneDocument {
  seed: string;
  width: number;
  height: number;
  instructions: DrawInstruction[];
  generatedAt: number;
}

// ============================================================================
// WEBSOCKET MESSAGES
// ============================================================================

export type WSMessage =
  | { type: 'scene'; data: SceneDocument }
  | { type: 'params'; data: SceneParameters }
  | { type: 'scene_error'; data: { error: string } };

export type ClientMessage =
  | { type: 'regenerate'; seed?: string };
