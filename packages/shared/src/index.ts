export type {
  Range,
  SceneParameters,
  Point,
  RGBA,
  GradientStop,
  LinearGradientFill,
  SolidFill,
  Fill,
  RectShape,
  ArcShape,
  DrawLayer,
  DrawInstruction,
  SceneDocument,
  WSMessage,
  ClientMessage,
} from './types';
