/**
 * Geometry module: vector algebra, primitives and path building.
 */

export { Angle } from './Angle.js';
export { Point, Vector } from './Point.js';
export { Scale, Translate, Rotate, Transform } from './Transform.js';
export { Rect, RoundRect } from './Rect.js';
export type { ToPath } from './Rect.js';
export { Circle, Ellipse, Arc } from './Ellipse.js';
export { arcToBezier, arcCenter, arcSegment, normalizeSweep, MAX_ARC_SEGMENTS } from './ArcToBezier.js';
export { Path, PathBuilder, calculatePathBounds, applyPathToContext } from './PathBuilder.js';
