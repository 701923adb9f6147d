/**
 * Path construction utilities.
 * Provides a fluent API for building paths with incrementally tracked bounds,
 * and the immutable {@link Path} it produces.
 */

import { ABS_TOL } from '../core/Tolerance.js';
import { Length } from '../core/Units.js';
import type { Unit, UnitConversion } from '../core/Units.js';
import type { ArcParameters, PathContext, PathSegment } from '../types/geometry.js';
import type { Angle } from './Angle.js';
import { arcToBezier } from './ArcToBezier.js';
import { Point, Vector } from './Point.js';
import { Rect } from './Rect.js';
import type { Transform } from './Transform.js';
import { Rotate, Scale, Translate } from './Transform.js';

/**
 * An immutable sequence of path segments with a cached bounding box.
 */
export class Path<U extends Unit> implements Iterable<PathSegment<U>> {
  declare readonly unit: U;
  readonly segments: readonly PathSegment<U>[];
  /** Bounds of the segment end points; control points are not included */
  readonly bounds: Rect<U>;

  constructor(segments: readonly PathSegment<U>[], bounds: Rect<U>) {
    this.segments = segments;
    this.bounds = bounds;
  }

  static builder<U extends Unit>(tolerance: number = ABS_TOL): PathBuilder<U> {
    return new PathBuilder<U>(tolerance);
  }

  static empty<U extends Unit>(): Path<U> {
    return new Path<U>([], Rect.empty<U>());
  }

  /**
   * Concatenates paths. A path that does not start with a move is placed
   * after an inserted move to the origin.
   */
  static join<U extends Unit>(paths: Iterable<Path<U>>): Path<U> {
    const builder = new PathBuilder<U>();
    for (const path of paths) {
      builder.extend(path);
    }
    return builder.build();
  }

  get length(): number {
    return this.segments.length;
  }

  isEmpty(): boolean {
    return this.segments.length === 0;
  }

  [Symbol.iterator](): Iterator<PathSegment<U>> {
    return this.segments[Symbol.iterator]();
  }

  scale(scale: number | Scale): Path<U> {
    const s = typeof scale === 'number' ? Scale.uniform(scale) : scale;
    return this.transform(s.toTransform<U>());
  }

  translate(offset: Vector<U> | Translate<U>): Path<U> {
    const t = offset instanceof Vector ? Translate.fromVector(offset) : offset;
    return this.transform(t.toTransform());
  }

  rotate(angle: Angle): Path<U> {
    return this.transform(new Rotate(angle).toTransform<U>());
  }

  /**
   * Applies an affine transform. Move targets are transformed as points and
   * every other vector as a displacement. When the transform moves the origin,
   * a path that starts without a move gets one to the transformed origin.
   */
  transform(transform: Transform<U>): Path<U> {
    const segments: PathSegment<U>[] = [];
    const origin = transform.transformPoint(Point.origin<U>());
    const first = this.segments[0];

    if (first !== undefined && first.type !== 'moveTo' && (origin.x !== 0 || origin.y !== 0)) {
      segments.push({ type: 'moveTo', point: origin });
    }

    for (const segment of this.segments) {
      segments.push(
        mapSegment(segment, (p) => transform.transformPoint(p), (v) => transform.transformVector(v))
      );
    }
    return new Path<U>(segments, calculatePathBounds(segments));
  }

  /**
   * Moves the path into another unit space.
   */
  convert<V extends Unit>(conversion: UnitConversion<U, V>): Path<V> {
    const segments = this.segments.map((segment) =>
      mapSegment(segment, (p) => p.convert(conversion), (v) => v.convert(conversion))
    );
    return new Path<V>(segments, this.bounds.convert(conversion));
  }
}

function mapSegment<U extends Unit, V extends Unit>(
  segment: PathSegment<U>,
  point: (p: Point<U>) => Point<V>,
  vector: (v: Vector<U>) => Vector<V>
): PathSegment<V> {
  switch (segment.type) {
    case 'moveTo':
      return { type: 'moveTo', point: point(segment.point) };
    case 'lineTo':
      return { type: 'lineTo', end: vector(segment.end) };
    case 'cubicBezierTo':
      return {
        type: 'cubicBezierTo',
        ctrl1: vector(segment.ctrl1),
        ctrl2: vector(segment.ctrl2),
        end: vector(segment.end),
      };
    case 'quadBezierTo':
      return { type: 'quadBezierTo', ctrl: vector(segment.ctrl), end: vector(segment.end) };
    case 'close':
      return { type: 'close' };
  }
}

/**
 * Builder for constructing paths from segments.
 *
 * Relative operations take displacements from the current pen position;
 * absolute operations are the relative ones applied to `target - pen`.
 * Bounds grow with every pen position except on `close()`, which returns the
 * pen to the start of the subpath.
 */
export class PathBuilder<U extends Unit> {
  declare readonly unit: U;
  readonly tolerance: number;
  private segments: PathSegment<U>[] = [];
  private pen: Point<U> = Point.origin<U>();
  private start: Point<U> = Point.origin<U>();
  private bounds: Rect<U> = Rect.empty<U>();

  /**
   * @param tolerance Arc lengths and radii at or below this are degenerate
   */
  constructor(tolerance: number = ABS_TOL) {
    this.tolerance = tolerance;
  }

  /**
   * Starts a new subpath at an absolute point.
   */
  absMove(point: Point<U>): this {
    this.bounds = this.segments.length === 0 ? new Rect<U>(point, point) : this.bounds.include(point);
    this.segments.push({ type: 'moveTo', point });
    this.pen = point;
    this.start = point;
    return this;
  }

  relMove(d: Vector<U>): this {
    return this.absMove(this.pen.add(d));
  }

  relLine(d: Vector<U>): this {
    this.segments.push({ type: 'lineTo', end: d });
    return this.advance(d);
  }

  relHorizLine(dx: Length<U>): this {
    return this.relLine(Vector.fromLengths(dx, Length.zero<U>()));
  }

  relVertLine(dy: Length<U>): this {
    return this.relLine(Vector.fromLengths(Length.zero<U>(), dy));
  }

  relCubicBezier(ctrl1: Vector<U>, ctrl2: Vector<U>, d: Vector<U>): this {
    this.segments.push({ type: 'cubicBezierTo', ctrl1, ctrl2, end: d });
    return this.advance(d);
  }

  /**
   * Cubic whose first control point mirrors the previous cubic's second one.
   */
  relSmoothCubicBezier(ctrl2: Vector<U>, d: Vector<U>): this {
    const prev = this.segments[this.segments.length - 1];
    const ctrl1 = prev?.type === 'cubicBezierTo' ? prev.end.sub(prev.ctrl2) : Vector.zero<U>();
    return this.relCubicBezier(ctrl1, ctrl2, d);
  }

  relQuadraticBezier(ctrl: Vector<U>, d: Vector<U>): this {
    this.segments.push({ type: 'quadBezierTo', ctrl, end: d });
    return this.advance(d);
  }

  /**
   * Quadratic whose control point mirrors the previous quadratic's.
   */
  relSmoothQuadraticBezier(d: Vector<U>): this {
    const prev = this.segments[this.segments.length - 1];
    const ctrl = prev?.type === 'quadBezierTo' ? prev.end.sub(prev.ctrl) : Vector.zero<U>();
    return this.relQuadraticBezier(ctrl, d);
  }

  /**
   * Appends an SVG-style elliptical arc as up to four cubic Béziers.
   * Emits nothing when `d` is within tolerance of zero.
   */
  relArc(radii: Vector<U>, xAxisRotation: Angle, largeArcFlag: boolean, sweepFlag: boolean, d: Vector<U>): this {
    const arc: ArcParameters<U> = { radii, xAxisRotation, largeArcFlag, sweepFlag };
    for (const segment of arcToBezier(arc, d, this.tolerance)) {
      this.relCubicBezier(segment.ctrl1, segment.ctrl2, segment.end);
    }
    return this;
  }

  absLine(point: Point<U>): this {
    return this.relLine(point.sub(this.pen));
  }

  absHorizLine(x: Length<U>): this {
    return this.relLine(new Vector<U>(x.value - this.pen.x, 0));
  }

  absVertLine(y: Length<U>): this {
    return this.relLine(new Vector<U>(0, y.value - this.pen.y));
  }

  absCubicBezier(ctrl1: Point<U>, ctrl2: Point<U>, point: Point<U>): this {
    return this.relCubicBezier(ctrl1.sub(this.pen), ctrl2.sub(this.pen), point.sub(this.pen));
  }

  absSmoothCubicBezier(ctrl2: Point<U>, point: Point<U>): this {
    return this.relSmoothCubicBezier(ctrl2.sub(this.pen), point.sub(this.pen));
  }

  absQuadraticBezier(ctrl: Point<U>, point: Point<U>): this {
    return this.relQuadraticBezier(ctrl.sub(this.pen), point.sub(this.pen));
  }

  absSmoothQuadraticBezier(point: Point<U>): this {
    return this.relSmoothQuadraticBezier(point.sub(this.pen));
  }

  absArc(radii: Vector<U>, xAxisRotation: Angle, largeArcFlag: boolean, sweepFlag: boolean, point: Point<U>): this {
    return this.relArc(radii, xAxisRotation, largeArcFlag, sweepFlag, point.sub(this.pen));
  }

  /**
   * Closes the current subpath. The pen returns to the subpath start; bounds
   * are unchanged since the start is already included.
   */
  close(): this {
    this.segments.push({ type: 'close' });
    this.pen = this.start;
    return this;
  }

  /**
   * Appends another builder's or path's segments. A move to the origin is
   * inserted first when the other does not start with one.
   */
  extend(other: PathBuilder<U> | Path<U>): this {
    const { segments, bounds } = other instanceof Path ? other : other.build();
    const first = segments[0];
    if (first === undefined) return this;

    const wasEmpty = this.segments.length === 0;
    if (first.type !== 'moveTo') {
      this.segments.push({ type: 'moveTo', point: Point.origin<U>() });
    }
    this.segments.push(...segments);
    this.bounds = wasEmpty ? bounds : this.bounds.union(bounds);

    const { pen, start } = tracePen(segments);
    this.pen = pen;
    this.start = start;
    return this;
  }

  /**
   * Returns the completed path. The builder may keep being used afterwards.
   */
  build(): Path<U> {
    return new Path<U>([...this.segments], this.bounds);
  }

  getCurrentPoint(): Point<U> {
    return this.pen;
  }

  getSubpathStart(): Point<U> {
    return this.start;
  }

  getBounds(): Rect<U> {
    return this.bounds;
  }

  isEmpty(): boolean {
    return this.segments.length === 0;
  }

  private advance(d: Vector<U>): this {
    this.pen = this.pen.add(d);
    this.bounds = this.bounds.include(this.pen);
    return this;
  }
}

/**
 * Walks segments from the origin, returning the final pen position and the
 * start of the last subpath.
 */
function tracePen<U extends Unit>(segments: readonly PathSegment<U>[]): { pen: Point<U>; start: Point<U> } {
  let pen = Point.origin<U>();
  let start = pen;
  for (const segment of segments) {
    switch (segment.type) {
      case 'moveTo':
        pen = segment.point;
        start = segment.point;
        break;
      case 'close':
        pen = start;
        break;
      default:
        pen = pen.add(segment.end);
        break;
    }
  }
  return { pen, start };
}

/**
 * Calculates the bounding box of a path's end points.
 * A path that does not start with a move is taken to start at the origin.
 */
export function calculatePathBounds<U extends Unit>(segments: readonly PathSegment<U>[]): Rect<U> {
  let pen = Point.origin<U>();
  let start = pen;
  let bounds: Rect<U> | undefined;

  for (const segment of segments) {
    switch (segment.type) {
      case 'moveTo':
        pen = segment.point;
        start = segment.point;
        break;
      case 'close':
        pen = start;
        break;
      default:
        // Drawing before any move starts from the origin
        bounds ??= new Rect<U>(pen, pen);
        pen = pen.add(segment.end);
        break;
    }
    bounds = bounds ? bounds.include(pen) : new Rect<U>(pen, pen);
  }

  return bounds ?? Rect.empty<U>();
}

/**
 * Replays a path onto a canvas-style 2D context as absolute commands.
 */
export function applyPathToContext<U extends Unit>(ctx: PathContext, path: Path<U>, startNewPath = true): void {
  if (startNewPath) {
    ctx.beginPath();
  }

  let current = Point.origin<U>();
  let start = current;

  for (const segment of path.segments) {
    switch (segment.type) {
      case 'moveTo':
        current = segment.point;
        start = current;
        ctx.moveTo(current.x, current.y);
        break;

      case 'lineTo':
        current = current.add(segment.end);
        ctx.lineTo(current.x, current.y);
        break;

      case 'cubicBezierTo': {
        const cp1 = current.add(segment.ctrl1);
        const cp2 = current.add(segment.ctrl2);
        current = current.add(segment.end);
        ctx.bezierCurveTo(cp1.x, cp1.y, cp2.x, cp2.y, current.x, current.y);
        break;
      }

      case 'quadBezierTo': {
        const cp = current.add(segment.ctrl);
        current = current.add(segment.end);
        ctx.quadraticCurveTo(cp.x, cp.y, current.x, current.y);
        break;
      }

      case 'close':
        current = start;
        ctx.closePath();
        break;
    }
  }
}
