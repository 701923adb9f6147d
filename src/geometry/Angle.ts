import { ABS_TOL, isClose } from '../core/Tolerance.js';

const TAU = 2 * Math.PI;

/**
 * Euclidean remainder, always in `[0, divisor)` for a positive divisor.
 */
function remEuclid(value: number, divisor: number): number {
  const r = value % divisor;
  return r < 0 ? r + divisor : r + 0;
}

/**
 * A plane angle, stored in radians.
 * Degrees are a construction/inspection convenience only.
 */
export class Angle {
  static readonly ZERO = new Angle(0);
  static readonly PI = new Angle(Math.PI);
  static readonly TAU = new Angle(TAU);
  static readonly FRAC_PI_2 = new Angle(Math.PI / 2);
  static readonly FRAC_PI_4 = new Angle(Math.PI / 4);

  private readonly value: number;

  private constructor(radians: number) {
    this.value = radians;
  }

  static radians(radians: number): Angle {
    return new Angle(radians);
  }

  static degrees(degrees: number): Angle {
    return new Angle((degrees * Math.PI) / 180);
  }

  static asin(value: number): Angle {
    return new Angle(Math.asin(value));
  }

  static acos(value: number): Angle {
    return new Angle(Math.acos(value));
  }

  static atan(value: number): Angle {
    return new Angle(Math.atan(value));
  }

  /**
   * Two-argument arctangent of `y / x`, in (−π, π].
   */
  static atan2(y: number, x: number): Angle {
    return new Angle(Math.atan2(y, x));
  }

  get radians(): number {
    return this.value;
  }

  toDegrees(): number {
    return (this.value * 180) / Math.PI;
  }

  /**
   * Normalizes the angle to `[0, 2π)`.
   */
  positive(): Angle {
    return new Angle(remEuclid(this.value, TAU));
  }

  /**
   * Normalizes the angle to `(−π, π]`.
   */
  signed(): Angle {
    return new Angle(Math.PI - remEuclid(Math.PI - this.value, TAU));
  }

  sin(): number {
    return Math.sin(this.value);
  }

  cos(): number {
    return Math.cos(this.value);
  }

  tan(): number {
    return Math.tan(this.value);
  }

  /**
   * Returns `[sin, cos]`.
   */
  sinCos(): [number, number] {
    return [Math.sin(this.value), Math.cos(this.value)];
  }

  add(other: Angle): Angle {
    return new Angle(this.value + other.value);
  }

  sub(other: Angle): Angle {
    return new Angle(this.value - other.value);
  }

  mul(factor: number): Angle {
    return new Angle(this.value * factor);
  }

  div(divisor: number): Angle {
    return new Angle(this.value / divisor);
  }

  /**
   * Dimensionless ratio of two angles.
   */
  ratio(other: Angle): number {
    return this.value / other.value;
  }

  neg(): Angle {
    return new Angle(-this.value);
  }

  abs(): Angle {
    return new Angle(Math.abs(this.value));
  }

  isClose(other: Angle, absTol: number = ABS_TOL): boolean {
    return isClose(this.value, other.value, absTol);
  }
}
