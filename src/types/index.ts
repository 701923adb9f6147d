/**
 * Type definitions for the keycap outline library.
 */

// Options and configuration
export type { OutlineOptions, LogLevel, ResolvedOutlineOptions } from './options.js';
export { DEFAULT_OUTLINE_OPTIONS } from './options.js';

// Geometry
export type {
  Rgba,
  Transform2D,
  ArcParameters,
  PathSegment,
  PathSegmentType,
  MoveToSegment,
  LineToSegment,
  CubicBezierToSegment,
  QuadBezierToSegment,
  CloseSegment,
  BezierSegment,
  PathContext,
} from './geometry.js';
export { IDENTITY_TRANSFORM } from './geometry.js';

// Keys
export type { Homing, KeyShape, KeyShapeType, KeyFeature, KeyOutline, KeyPath, KeyStyle } from './key.js';
export { HOMING_KINDS } from './key.js';
