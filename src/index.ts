/**
 * keycap-outline - keycap outline geometry
 *
 * Unit-typed 2D geometry and profile-driven key outline generation.
 */

// Main entry point
export { KeyOutlineGenerator, createKeyOutlineGenerator, resolveOutlineOptions, isoOutline } from './outline/index.js';
export { Profile, DEFAULT_PROFILE_DEFINITION, validateProfileDefinition } from './profile/index.js';
export type { ProfileDefinition, ProfileDefinitionInput, ProfileType, HomingGeometry } from './profile/index.js';

// Types - Options and keys
export type {
  OutlineOptions,
  LogLevel,
  ResolvedOutlineOptions,
  Homing,
  KeyShape,
  KeyFeature,
  KeyPath,
  KeyStyle,
} from './types/index.js';
export { DEFAULT_OUTLINE_OPTIONS } from './types/index.js';

// Types - Geometry
export type { Rgba, Transform2D, ArcParameters, PathSegment, BezierSegment, PathContext } from './types/index.js';

// Units and tolerance
export {
  UnitConversion,
  Length,
  DOT_PER_UNIT,
  MM_PER_UNIT,
  INCH_PER_UNIT,
  DOT_PER_MM,
  DOT_PER_INCH,
  fontUnitConversion,
  isClose,
} from './core/index.js';
export type { KeyUnit, Mm, Inch, Dot, FontUnit, Unit } from './core/index.js';

// Geometry components
export {
  Angle,
  Point,
  Vector,
  Scale,
  Translate,
  Rotate,
  Transform,
  Rect,
  RoundRect,
  Circle,
  Ellipse,
  Arc,
  Path,
  PathBuilder,
  arcToBezier,
  calculatePathBounds,
  applyPathToContext,
} from './geometry/index.js';
export type { ToPath } from './geometry/index.js';

// Logger
export { createLogger, Logger, consoleSink, formatLogEntry } from './utils/index.js';
export type { ILogger, LogEntry, LogSink } from './utils/index.js';
