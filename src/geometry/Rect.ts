/**
 * Axis-aligned rectangles and rounded rectangles.
 */

import { ABS_TOL, isWithin } from '../core/Tolerance.js';
import { Length } from '../core/Units.js';
import type { Unit, UnitConversion } from '../core/Units.js';
import { Angle } from './Angle.js';
import type { Path } from './PathBuilder.js';
import { PathBuilder } from './PathBuilder.js';
import { Point, Vector } from './Point.js';

/**
 * Anything that can be traced as a path in unit space `U`.
 */
export interface ToPath<U extends Unit> {
  toPath(tolerance?: number): Path<U>;
}

/**
 * Axis-aligned rectangle. Constructors normalize so that `min <= max`.
 */
export class Rect<U extends Unit> implements ToPath<U> {
  declare readonly unit: U;
  readonly min: Point<U>;
  readonly max: Point<U>;

  constructor(a: Point<U>, b: Point<U>) {
    this.min = a.min(b);
    this.max = a.max(b);
  }

  static fromOriginAndSize<U extends Unit>(origin: Point<U>, size: Vector<U>): Rect<U> {
    return new Rect<U>(origin, origin.add(size));
  }

  static fromCenterAndSize<U extends Unit>(center: Point<U>, size: Vector<U>): Rect<U> {
    const half = size.div(2);
    return new Rect<U>(center.subVector(half), center.add(half));
  }

  /**
   * Smallest rectangle containing every given point.
   */
  static fromPoints<U extends Unit>(first: Point<U>, ...rest: Point<U>[]): Rect<U> {
    let min = first;
    let max = first;
    for (const p of rest) {
      min = min.min(p);
      max = max.max(p);
    }
    return new Rect<U>(min, max);
  }

  /**
   * Zero-size rectangle at the origin.
   */
  static empty<U extends Unit>(): Rect<U> {
    return new Rect<U>(Point.origin<U>(), Point.origin<U>());
  }

  size(): Vector<U> {
    return this.max.sub(this.min);
  }

  width(): Length<U> {
    return new Length<U>(this.max.x - this.min.x);
  }

  height(): Length<U> {
    return new Length<U>(this.max.y - this.min.y);
  }

  center(): Point<U> {
    return this.min.lerp(this.max, 0.5);
  }

  /**
   * Smallest rectangle containing both.
   */
  union(other: Rect<U>): Rect<U> {
    return new Rect<U>(this.min.min(other.min), this.max.max(other.max));
  }

  /**
   * Grows the rectangle to contain a point.
   */
  include(point: Point<U>): Rect<U> {
    return new Rect<U>(this.min.min(point), this.max.max(point));
  }

  contains(point: Point<U>, absTol: number = ABS_TOL): boolean {
    return isWithin(point.x, this.min.x, this.max.x, absTol) && isWithin(point.y, this.min.y, this.max.y, absTol);
  }

  translate(v: Vector<U>): Rect<U> {
    return new Rect<U>(this.min.add(v), this.max.add(v));
  }

  /**
   * Scales both corners about the origin.
   */
  scale(x: number, y: number = x): Rect<U> {
    return new Rect<U>(new Point<U>(this.min.x * x, this.min.y * y), new Point<U>(this.max.x * x, this.max.y * y));
  }

  convert<V extends Unit>(conversion: UnitConversion<U, V>): Rect<V> {
    return new Rect<V>(this.min.convert(conversion), this.max.convert(conversion));
  }

  isClose(other: Rect<U>, absTol: number = ABS_TOL): boolean {
    return this.min.isClose(other.min, absTol) && this.max.isClose(other.max, absTol);
  }

  /**
   * Traces the rectangle clockwise (on a y-down canvas) from its minimum corner.
   */
  toPath(tolerance: number = ABS_TOL): Path<U> {
    return new PathBuilder<U>(tolerance)
      .absMove(this.min)
      .absHorizLine(new Length<U>(this.max.x))
      .absVertLine(new Length<U>(this.max.y))
      .absHorizLine(new Length<U>(this.min.x))
      .close()
      .build();
  }
}

/**
 * Rectangle with elliptical corners. Radii are made non-negative and clamped
 * to half of the corresponding side when constructed.
 */
export class RoundRect<U extends Unit> implements ToPath<U> {
  declare readonly unit: U;
  readonly min: Point<U>;
  readonly max: Point<U>;
  readonly radii: Vector<U>;

  constructor(a: Point<U>, b: Point<U>, radii: Vector<U>) {
    this.min = a.min(b);
    this.max = a.max(b);
    this.radii = radii.abs().min(this.max.sub(this.min).div(2));
  }

  static fromRect<U extends Unit>(rect: Rect<U>, radii: Vector<U>): RoundRect<U> {
    return new RoundRect<U>(rect.min, rect.max, radii);
  }

  static fromOriginSizeAndRadii<U extends Unit>(origin: Point<U>, size: Vector<U>, radii: Vector<U>): RoundRect<U> {
    return new RoundRect<U>(origin, origin.add(size), radii);
  }

  static fromCenterSizeAndRadii<U extends Unit>(center: Point<U>, size: Vector<U>, radii: Vector<U>): RoundRect<U> {
    const half = size.div(2);
    return new RoundRect<U>(center.subVector(half), center.add(half), radii);
  }

  /**
   * The bounding rectangle, without corner radii.
   */
  rect(): Rect<U> {
    return new Rect<U>(this.min, this.max);
  }

  size(): Vector<U> {
    return this.max.sub(this.min);
  }

  width(): Length<U> {
    return new Length<U>(this.max.x - this.min.x);
  }

  height(): Length<U> {
    return new Length<U>(this.max.y - this.min.y);
  }

  center(): Point<U> {
    return this.min.lerp(this.max, 0.5);
  }

  /**
   * Interpolates corners and radii.
   */
  lerp(other: RoundRect<U>, t: number): RoundRect<U> {
    return new RoundRect<U>(this.min.lerp(other.min, t), this.max.lerp(other.max, t), this.radii.lerp(other.radii, t));
  }

  translate(v: Vector<U>): RoundRect<U> {
    return new RoundRect<U>(this.min.add(v), this.max.add(v), this.radii);
  }

  convert<V extends Unit>(conversion: UnitConversion<U, V>): RoundRect<V> {
    return new RoundRect<V>(this.min.convert(conversion), this.max.convert(conversion), this.radii.convert(conversion));
  }

  isClose(other: RoundRect<U>, absTol: number = ABS_TOL): boolean {
    return (
      this.min.isClose(other.min, absTol) &&
      this.max.isClose(other.max, absTol) &&
      this.radii.isClose(other.radii, absTol)
    );
  }

  /**
   * Traces the outline clockwise (on a y-down canvas), starting at the top of
   * the left edge.
   */
  toPath(tolerance: number = ABS_TOL): Path<U> {
    const { min, max, radii } = this;
    const rx = radii.x;
    const ry = radii.y;

    return new PathBuilder<U>(tolerance)
      .absMove(min.add(new Vector<U>(0, ry)))
      .relArc(radii, Angle.ZERO, false, true, new Vector<U>(rx, -ry))
      .absHorizLine(new Length<U>(max.x - rx))
      .relArc(radii, Angle.ZERO, false, true, new Vector<U>(rx, ry))
      .absVertLine(new Length<U>(max.y - ry))
      .relArc(radii, Angle.ZERO, false, true, new Vector<U>(-rx, ry))
      .absHorizLine(new Length<U>(min.x + rx))
      .relArc(radii, Angle.ZERO, false, true, new Vector<U>(-rx, -ry))
      .close()
      .build();
  }
}
