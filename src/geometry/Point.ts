/**
 * Unit-tagged points and displacement vectors.
 *
 * Point − Point is a Vector and Point + Vector is a Point; there is no
 * Point + Point.
 */

import { ABS_TOL, isClose } from '../core/Tolerance.js';
import type { Length, Unit, UnitConversion } from '../core/Units.js';
import type { Angle } from './Angle.js';

/**
 * A position in unit space `U`.
 */
export class Point<U extends Unit> {
  declare readonly unit: U;
  readonly x: number;
  readonly y: number;

  constructor(x: number, y: number) {
    this.x = x;
    this.y = y;
  }

  static origin<U extends Unit>(): Point<U> {
    return new Point<U>(0, 0);
  }

  static splat<U extends Unit>(value: number): Point<U> {
    return new Point<U>(value, value);
  }

  add(v: Vector<U>): Point<U> {
    return new Point<U>(this.x + v.x, this.y + v.y);
  }

  /**
   * Displacement from `other` to this point.
   */
  sub(other: Point<U>): Vector<U> {
    return new Vector<U>(this.x - other.x, this.y - other.y);
  }

  subVector(v: Vector<U>): Point<U> {
    return new Point<U>(this.x - v.x, this.y - v.y);
  }

  min(other: Point<U>): Point<U> {
    return new Point<U>(Math.min(this.x, other.x), Math.min(this.y, other.y));
  }

  max(other: Point<U>): Point<U> {
    return new Point<U>(Math.max(this.x, other.x), Math.max(this.y, other.y));
  }

  lerp(other: Point<U>, t: number): Point<U> {
    return new Point<U>(this.x + (other.x - this.x) * t, this.y + (other.y - this.y) * t);
  }

  /**
   * Displacement from the origin.
   */
  toVector(): Vector<U> {
    return new Vector<U>(this.x, this.y);
  }

  convert<V extends Unit>(conversion: UnitConversion<U, V>): Point<V> {
    return new Point<V>(conversion.apply(this.x), conversion.apply(this.y));
  }

  isClose(other: Point<U>, absTol: number = ABS_TOL): boolean {
    return isClose(this.x, other.x, absTol) && isClose(this.y, other.y, absTol);
  }
}

/**
 * A displacement in unit space `U`.
 */
export class Vector<U extends Unit> {
  declare readonly unit: U;
  readonly x: number;
  readonly y: number;

  constructor(x: number, y: number) {
    this.x = x;
    this.y = y;
  }

  static zero<U extends Unit>(): Vector<U> {
    return new Vector<U>(0, 0);
  }

  static splat<U extends Unit>(value: number): Vector<U> {
    return new Vector<U>(value, value);
  }

  static fromLengths<U extends Unit>(x: Length<U>, y: Length<U>): Vector<U> {
    return new Vector<U>(x.value, y.value);
  }

  add(other: Vector<U>): Vector<U> {
    return new Vector<U>(this.x + other.x, this.y + other.y);
  }

  sub(other: Vector<U>): Vector<U> {
    return new Vector<U>(this.x - other.x, this.y - other.y);
  }

  mul(factor: number): Vector<U> {
    return new Vector<U>(this.x * factor, this.y * factor);
  }

  div(divisor: number): Vector<U> {
    return new Vector<U>(this.x / divisor, this.y / divisor);
  }

  neg(): Vector<U> {
    return new Vector<U>(-this.x, -this.y);
  }

  min(other: Vector<U>): Vector<U> {
    return new Vector<U>(Math.min(this.x, other.x), Math.min(this.y, other.y));
  }

  max(other: Vector<U>): Vector<U> {
    return new Vector<U>(Math.max(this.x, other.x), Math.max(this.y, other.y));
  }

  lerp(other: Vector<U>, t: number): Vector<U> {
    return new Vector<U>(this.x + (other.x - this.x) * t, this.y + (other.y - this.y) * t);
  }

  /**
   * Euclidean length.
   */
  length(): number {
    return Math.hypot(this.x, this.y);
  }

  abs(): Vector<U> {
    return new Vector<U>(Math.abs(this.x), Math.abs(this.y));
  }

  componentMul(other: Vector<U>): Vector<U> {
    return new Vector<U>(this.x * other.x, this.y * other.y);
  }

  /**
   * Component-wise division. Returns plain ratios, still tagged `U` so the
   * result can be fed back into same-space arithmetic.
   */
  componentDiv(other: Vector<U>): Vector<U> {
    return new Vector<U>(this.x / other.x, this.y / other.y);
  }

  /**
   * Rotates counter-clockwise in a y-up frame (clockwise on a y-down canvas).
   */
  rotate(angle: Angle): Vector<U> {
    const [sin, cos] = angle.sinCos();
    return new Vector<U>(this.x * cos - this.y * sin, this.x * sin + this.y * cos);
  }

  negX(): Vector<U> {
    return new Vector<U>(-this.x, this.y);
  }

  negY(): Vector<U> {
    return new Vector<U>(this.x, -this.y);
  }

  swap(): Vector<U> {
    return new Vector<U>(this.y, this.x);
  }

  convert<V extends Unit>(conversion: UnitConversion<U, V>): Vector<V> {
    return new Vector<V>(conversion.apply(this.x), conversion.apply(this.y));
  }

  isClose(other: Vector<U>, absTol: number = ABS_TOL): boolean {
    return isClose(this.x, other.x, absTol) && isClose(this.y, other.y, absTol);
  }
}
