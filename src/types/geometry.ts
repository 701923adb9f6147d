import type { Unit } from '../core/Units.js';
import type { Angle } from '../geometry/Angle.js';
import type { Point, Vector } from '../geometry/Point.js';

/**
 * RGBA color with values 0-255 for each channel.
 */
export interface Rgba {
  r: number;
  g: number;
  b: number;
  a: number;
}

/**
 * 2D affine transform matrix.
 * Stored as [a, b, c, d, e, f] representing:
 * | a c e |
 * | b d f |
 * | 0 0 1 |
 */
export interface Transform2D {
  /** Scale X and rotation component */
  a: number;
  /** Rotation component */
  b: number;
  /** Rotation component */
  c: number;
  /** Scale Y and rotation component */
  d: number;
  /** Translate X */
  e: number;
  /** Translate Y */
  f: number;
}

export const IDENTITY_TRANSFORM: Readonly<Transform2D> = Object.freeze({
  a: 1,
  b: 0,
  c: 0,
  d: 1,
  e: 0,
  f: 0,
});

/**
 * Arc parameters for SVG-style elliptical arcs.
 */
export interface ArcParameters<U extends Unit> {
  /** Ellipse radii; signs are ignored */
  radii: Vector<U>;
  /** Rotation of the ellipse's x axis */
  xAxisRotation: Angle;
  /** Whether to use the larger arc (true) or smaller arc (false) */
  largeArcFlag: boolean;
  /** Direction: true = positive angle direction (clockwise on a y-down canvas) */
  sweepFlag: boolean;
}

/**
 * Path segment types.
 */
export type PathSegmentType = 'moveTo' | 'lineTo' | 'cubicBezierTo' | 'quadBezierTo' | 'close';

/**
 * Starts a new subpath at an absolute point.
 */
export interface MoveToSegment<U extends Unit> {
  type: 'moveTo';
  point: Point<U>;
}

export interface LineToSegment<U extends Unit> {
  type: 'lineTo';
  end: Vector<U>;
}

export interface CubicBezierToSegment<U extends Unit> {
  type: 'cubicBezierTo';
  ctrl1: Vector<U>;
  ctrl2: Vector<U>;
  end: Vector<U>;
}

export interface QuadBezierToSegment<U extends Unit> {
  type: 'quadBezierTo';
  ctrl: Vector<U>;
  end: Vector<U>;
}

/**
 * Closes the current subpath with a straight line to its start.
 */
export interface CloseSegment {
  type: 'close';
}

/**
 * A segment of a path. Every vector is a displacement from the pen position
 * at the time the segment was appended.
 */
export type PathSegment<U extends Unit> =
  | MoveToSegment<U>
  | LineToSegment<U>
  | CubicBezierToSegment<U>
  | QuadBezierToSegment<U>
  | CloseSegment;

/**
 * One cubic Bézier piece of a converted arc, relative to the arc's start.
 */
export interface BezierSegment<U extends Unit> {
  ctrl1: Vector<U>;
  ctrl2: Vector<U>;
  end: Vector<U>;
}

/**
 * The subset of the canvas 2D path API a path can be replayed onto.
 */
export interface PathContext {
  beginPath(): void;
  moveTo(x: number, y: number): void;
  lineTo(x: number, y: number): void;
  bezierCurveTo(cp1x: number, cp1y: number, cp2x: number, cp2y: number, x: number, y: number): void;
  quadraticCurveTo(cpx: number, cpy: number, x: number, y: number): void;
  closePath(): void;
}
