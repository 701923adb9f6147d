/**
 * Curve primitives traced with elliptical arcs.
 */

import { ABS_TOL } from '../core/Tolerance.js';
import type { Length, Unit, UnitConversion } from '../core/Units.js';
import { Angle } from './Angle.js';
import type { Path } from './PathBuilder.js';
import { PathBuilder } from './PathBuilder.js';
import { Point, Vector } from './Point.js';
import type { ToPath } from './Rect.js';

export class Circle<U extends Unit> implements ToPath<U> {
  declare readonly unit: U;
  readonly center: Point<U>;
  readonly radius: Length<U>;

  constructor(center: Point<U>, radius: Length<U>) {
    this.center = center;
    this.radius = radius.abs();
  }

  convert<V extends Unit>(conversion: UnitConversion<U, V>): Circle<V> {
    return new Circle<V>(this.center.convert(conversion), this.radius.convert(conversion));
  }

  /**
   * Two half turns starting from the leftmost point.
   */
  toPath(tolerance: number = ABS_TOL): Path<U> {
    const r = this.radius.value;
    const radii = Vector.splat<U>(r);
    return new PathBuilder<U>(tolerance)
      .absMove(new Point<U>(this.center.x - r, this.center.y))
      .relArc(radii, Angle.ZERO, false, true, new Vector<U>(2 * r, 0))
      .relArc(radii, Angle.ZERO, false, true, new Vector<U>(-2 * r, 0))
      .close()
      .build();
  }
}

export class Ellipse<U extends Unit> implements ToPath<U> {
  declare readonly unit: U;
  readonly center: Point<U>;
  readonly radii: Vector<U>;
  readonly rotation: Angle;

  constructor(center: Point<U>, radii: Vector<U>, rotation: Angle = Angle.ZERO) {
    this.center = center;
    this.radii = radii.abs();
    this.rotation = rotation;
  }

  convert<V extends Unit>(conversion: UnitConversion<U, V>): Ellipse<V> {
    return new Ellipse<V>(this.center.convert(conversion), this.radii.convert(conversion), this.rotation);
  }

  /**
   * Two half turns starting from the end of the (rotated) negative x semi-axis.
   */
  toPath(tolerance: number = ABS_TOL): Path<U> {
    const diameter = new Vector<U>(2 * this.radii.x, 0).rotate(this.rotation);
    return new PathBuilder<U>(tolerance)
      .absMove(this.center.subVector(diameter.div(2)))
      .relArc(this.radii, this.rotation, false, true, diameter)
      .relArc(this.radii, this.rotation, false, true, diameter.neg())
      .close()
      .build();
  }
}

/**
 * An open elliptical arc in centre parameterization.
 */
export class Arc<U extends Unit> implements ToPath<U> {
  declare readonly unit: U;
  readonly center: Point<U>;
  readonly radii: Vector<U>;
  readonly startAngle: Angle;
  readonly sweepAngle: Angle;
  readonly xRotation: Angle;

  constructor(center: Point<U>, radii: Vector<U>, startAngle: Angle, sweepAngle: Angle, xRotation: Angle = Angle.ZERO) {
    this.center = center;
    this.radii = radii.abs();
    this.startAngle = startAngle;
    this.sweepAngle = sweepAngle;
    this.xRotation = xRotation;
  }

  /**
   * Point on the ellipse at the given parametric angle.
   */
  pointAt(angle: Angle): Point<U> {
    const [sin, cos] = angle.sinCos();
    return this.center.add(new Vector<U>(this.radii.x * cos, this.radii.y * sin).rotate(this.xRotation));
  }

  startPoint(): Point<U> {
    return this.pointAt(this.startAngle);
  }

  endPoint(): Point<U> {
    return this.pointAt(this.startAngle.add(this.sweepAngle));
  }

  convert<V extends Unit>(conversion: UnitConversion<U, V>): Arc<V> {
    return new Arc<V>(
      this.center.convert(conversion),
      this.radii.convert(conversion),
      this.startAngle,
      this.sweepAngle,
      this.xRotation
    );
  }

  /**
   * Sweeps larger than π are split in two so that each half keeps the
   * large-arc flag clear.
   */
  toPath(tolerance: number = ABS_TOL): Path<U> {
    const sweepFlag = this.sweepAngle.radians > 0;
    const builder = new PathBuilder<U>(tolerance).absMove(this.startPoint());

    if (this.sweepAngle.abs().radians > Math.PI) {
      const mid = this.pointAt(this.startAngle.add(this.sweepAngle.div(2)));
      builder.absArc(this.radii, this.xRotation, false, sweepFlag, mid);
    }
    return builder.absArc(this.radii, this.xRotation, false, sweepFlag, this.endPoint()).build();
  }
}
