/**
 * Affine transforms in a single unit space.
 *
 * Matrices use the canvas layout `[a, b, c, d, e, f]`:
 * | a c e |
 * | b d f |
 * | 0 0 1 |
 */

import { ABS_TOL, isClose } from '../core/Tolerance.js';
import type { Unit } from '../core/Units.js';
import { IDENTITY_TRANSFORM } from '../types/geometry.js';
import type { Transform2D } from '../types/geometry.js';
import type { Angle } from './Angle.js';
import { Point, Vector } from './Point.js';

/**
 * Non-uniform scale. Dimensionless, so it applies in any unit space.
 */
export class Scale {
  readonly x: number;
  readonly y: number;

  constructor(x: number, y: number) {
    this.x = x;
    this.y = y;
  }

  static uniform(factor: number): Scale {
    return new Scale(factor, factor);
  }

  toTransform<U extends Unit>(): Transform<U> {
    return new Transform<U>(this.x, 0, 0, this.y, 0, 0);
  }
}

/**
 * Translation by a displacement in unit space `U`.
 */
export class Translate<U extends Unit> {
  declare readonly unit: U;
  readonly x: number;
  readonly y: number;

  constructor(x: number, y: number) {
    this.x = x;
    this.y = y;
  }

  static fromVector<U extends Unit>(v: Vector<U>): Translate<U> {
    return new Translate<U>(v.x, v.y);
  }

  toTransform(): Transform<U> {
    return new Transform<U>(1, 0, 0, 1, this.x, this.y);
  }
}

/**
 * Rotation about the origin, in the same sense as {@link Vector.rotate}.
 */
export class Rotate {
  readonly angle: Angle;

  constructor(angle: Angle) {
    this.angle = angle;
  }

  toTransform<U extends Unit>(): Transform<U> {
    const [sin, cos] = this.angle.sinCos();
    return new Transform<U>(cos, sin, -sin, cos, 0, 0);
  }
}

/**
 * General 2×3 affine transform in unit space `U`.
 */
export class Transform<U extends Unit> implements Transform2D {
  declare readonly unit: U;
  readonly a: number;
  readonly b: number;
  readonly c: number;
  readonly d: number;
  readonly e: number;
  readonly f: number;

  constructor(a: number, b: number, c: number, d: number, e: number, f: number) {
    this.a = a;
    this.b = b;
    this.c = c;
    this.d = d;
    this.e = e;
    this.f = f;
  }

  static identity<U extends Unit>(): Transform<U> {
    return Transform.fromMatrix<U>(IDENTITY_TRANSFORM);
  }

  static fromMatrix<U extends Unit>(m: Transform2D): Transform<U> {
    return new Transform<U>(m.a, m.b, m.c, m.d, m.e, m.f);
  }

  /**
   * Returns the transform that applies `this` first, then `next`.
   */
  then(next: Transform<U>): Transform<U> {
    const n = next;
    return new Transform<U>(
      n.a * this.a + n.c * this.b,
      n.b * this.a + n.d * this.b,
      n.a * this.c + n.c * this.d,
      n.b * this.c + n.d * this.d,
      n.a * this.e + n.c * this.f + n.e,
      n.b * this.e + n.d * this.f + n.f
    );
  }

  transformPoint(p: Point<U>): Point<U> {
    return new Point<U>(this.a * p.x + this.c * p.y + this.e, this.b * p.x + this.d * p.y + this.f);
  }

  /**
   * Applies the linear part only; translation does not move a displacement.
   */
  transformVector(v: Vector<U>): Vector<U> {
    return new Vector<U>(this.a * v.x + this.c * v.y, this.b * v.x + this.d * v.y);
  }

  determinant(): number {
    return this.a * this.d - this.b * this.c;
  }

  /**
   * Returns the inverse transform, or undefined when the matrix is singular.
   */
  inverse(): Transform<U> | undefined {
    const det = this.determinant();
    if (isClose(det, 0, 0)) return undefined;

    const a = this.d / det;
    const b = -this.b / det;
    const c = -this.c / det;
    const d = this.a / det;
    return new Transform<U>(a, b, c, d, -(a * this.e + c * this.f), -(b * this.e + d * this.f));
  }

  isClose(other: Transform2D, absTol: number = ABS_TOL): boolean {
    return (
      isClose(this.a, other.a, absTol) &&
      isClose(this.b, other.b, absTol) &&
      isClose(this.c, other.c, absTol) &&
      isClose(this.d, other.d, absTol) &&
      isClose(this.e, other.e, absTol) &&
      isClose(this.f, other.f, absTol)
    );
  }
}
