/**
 * Measurement spaces and the explicit linear conversions between them.
 *
 * A unit is a string literal type. Every unit-carrying value (Length, Point,
 * Vector, Rect, Path, ...) carries its unit as a phantom member, so a
 * `Point<Mm>` is not assignable to a `Point<Dot>` and mixing spaces is a
 * compile-time error. Crossing spaces requires a {@link UnitConversion}.
 */

import { ABS_TOL, isClose } from './Tolerance.js';

/** Keyboard unit, the spacing of a standard 1×1 key (19.05 mm / 0.75 in) */
export type KeyUnit = 'key-unit';

/** Millimetre */
export type Mm = 'mm';

/** Inch */
export type Inch = 'inch';

/** Abstract drawing unit ("dot"), 1000 per key unit */
export type Dot = 'dot';

/** Font design unit */
export type FontUnit = 'font-unit';

/** Any supported measurement space. */
export type Unit = KeyUnit | Mm | Inch | Dot | FontUnit;

/**
 * Declared linear factor converting values in `From` to values in `To`.
 */
export class UnitConversion<From extends Unit, To extends Unit> {
  declare readonly from: From;
  declare readonly to: To;
  readonly factor: number;

  constructor(factor: number) {
    this.factor = factor;
  }

  /**
   * Converts a raw number from `From` to `To`.
   */
  apply(value: number): number {
    return value * this.factor;
  }

  /**
   * Chains this conversion with one out of `To`.
   */
  then<Next extends Unit>(next: UnitConversion<To, Next>): UnitConversion<From, Next> {
    return new UnitConversion<From, Next>(this.factor * next.factor);
  }

  /**
   * Returns the conversion in the opposite direction.
   */
  inverse(): UnitConversion<To, From> {
    return new UnitConversion<To, From>(1 / this.factor);
  }
}

/** Drawing units per key unit */
export const DOT_PER_UNIT = new UnitConversion<KeyUnit, Dot>(1000);

/** Millimetres per key unit */
export const MM_PER_UNIT = new UnitConversion<KeyUnit, Mm>(19.05);

/** Inches per key unit */
export const INCH_PER_UNIT = new UnitConversion<KeyUnit, Inch>(0.75);

/** Drawing units per millimetre */
export const DOT_PER_MM: UnitConversion<Mm, Dot> = MM_PER_UNIT.inverse().then(DOT_PER_UNIT);

/** Drawing units per inch */
export const DOT_PER_INCH: UnitConversion<Inch, Dot> = INCH_PER_UNIT.inverse().then(DOT_PER_UNIT);

/**
 * Builds the conversion from a font's design units to drawing units.
 * @param unitsPerEm Design units per em from the font header
 * @param emSize Rendered em size in drawing units
 */
export function fontUnitConversion(unitsPerEm: number, emSize: number): UnitConversion<FontUnit, Dot> {
  return new UnitConversion<FontUnit, Dot>(emSize / unitsPerEm);
}

/**
 * A one-dimensional length in unit `U`.
 */
export class Length<U extends Unit> {
  declare readonly unit: U;
  readonly value: number;

  constructor(value: number) {
    this.value = value;
  }

  static zero<U extends Unit>(): Length<U> {
    return new Length<U>(0);
  }

  add(other: Length<U>): Length<U> {
    return new Length<U>(this.value + other.value);
  }

  sub(other: Length<U>): Length<U> {
    return new Length<U>(this.value - other.value);
  }

  mul(factor: number): Length<U> {
    return new Length<U>(this.value * factor);
  }

  div(divisor: number): Length<U> {
    return new Length<U>(this.value / divisor);
  }

  /**
   * Dimensionless ratio between two lengths of the same unit.
   */
  ratio(other: Length<U>): number {
    return this.value / other.value;
  }

  neg(): Length<U> {
    return new Length<U>(-this.value);
  }

  abs(): Length<U> {
    return new Length<U>(Math.abs(this.value));
  }

  min(other: Length<U>): Length<U> {
    return new Length<U>(Math.min(this.value, other.value));
  }

  max(other: Length<U>): Length<U> {
    return new Length<U>(Math.max(this.value, other.value));
  }

  /**
   * Linear interpolation, `self + (other - self) * t`.
   */
  lerp(other: Length<U>, t: number): Length<U> {
    return new Length<U>(this.value + (other.value - this.value) * t);
  }

  convert<V extends Unit>(conversion: UnitConversion<U, V>): Length<V> {
    return new Length<V>(conversion.apply(this.value));
  }

  isClose(other: Length<U>, absTol: number = ABS_TOL): boolean {
    return isClose(this.value, other.value, absTol);
  }
}
