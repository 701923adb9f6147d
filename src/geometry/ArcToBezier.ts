/**
 * Converts SVG-style elliptical arcs into cubic Bézier segments.
 *
 * Works on displacements: the arc starts at the origin and ends at `d`, and
 * every emitted control point and end point is relative to the start of its
 * own segment, so the segments can be appended to a path one after another.
 *
 * The centre parameterization follows the SVG implementation notes (F.6.5),
 * with each sub-arc of at most 90° approximated on the unit circle and then
 * scaled by the radii.
 */

import { ABS_TOL, isClose } from '../core/Tolerance.js';
import type { Unit } from '../core/Units.js';
import type { ArcParameters, BezierSegment } from '../types/geometry.js';
import { Angle } from './Angle.js';
import { Vector } from './Point.js';

/** Maximum number of cubic segments emitted for one arc */
export const MAX_ARC_SEGMENTS = 4;

/**
 * Converts an arc to between zero and four cubic Bézier segments.
 * @param arc Radii, rotation and flags of the arc
 * @param d Displacement from the arc's start point to its end point
 * @param tolerance Lengths at or below this are treated as zero
 */
export function arcToBezier<U extends Unit>(
  arc: ArcParameters<U>,
  d: Vector<U>,
  tolerance: number = ABS_TOL
): BezierSegment<U>[] {
  let r = arc.radii.abs();
  const { xAxisRotation, largeArcFlag, sweepFlag } = arc;

  if (d.length() <= tolerance) {
    return [];
  }

  // A zero radius degenerates to a straight line
  if (r.x <= tolerance || r.y <= tolerance) {
    return [{ ctrl1: d.div(3), ctrl2: d.mul(2).div(3), end: d }];
  }

  const local = d.rotate(xAxisRotation.neg());

  // Scale up radii that are too small to span the chord
  const lambda = Math.max(1, local.componentDiv(r.mul(2)).length());
  r = r.mul(lambda);

  const c = arcCenter(r, largeArcFlag, sweepFlag, local, tolerance);

  const phi0 = Angle.atan2(-c.y / r.y, -c.x / r.x);
  const toEnd = local.sub(c);
  const dphi = normalizeSweep(
    Angle.atan2(toEnd.y / r.y, toEnd.x / r.x).sub(phi0),
    largeArcFlag,
    sweepFlag
  );

  const count = Math.min(
    MAX_ARC_SEGMENTS,
    Math.max(1, Math.ceil(Math.abs(dphi.ratio(Angle.FRAC_PI_2)) - ABS_TOL))
  );
  const step = dphi.div(count);

  const segments: BezierSegment<U>[] = [];
  for (let i = 0; i < count; i++) {
    const segment = arcSegment(r, phi0.add(step.mul(i)), step);
    segments.push({
      ctrl1: segment.ctrl1.rotate(xAxisRotation),
      ctrl2: segment.ctrl2.rotate(xAxisRotation),
      end: segment.end.rotate(xAxisRotation),
    });
  }
  return segments;
}

/**
 * Finds the ellipse centre relative to the arc start, in the de-rotated frame.
 * @param r Radii, already corrected to span the chord
 * @param d Chord displacement in the de-rotated frame
 */
export function arcCenter<U extends Unit>(
  r: Vector<U>,
  largeArcFlag: boolean,
  sweepFlag: boolean,
  d: Vector<U>,
  tolerance: number = ABS_TOL
): Vector<U> {
  const half = d.div(2);
  const sign = largeArcFlag === sweepFlag ? 1 : -1;

  const expr = (r.x * half.y) ** 2 + (r.y * half.x) ** 2;
  const v = ((r.x * r.y) ** 2 - expr) / expr;

  // Rounding can push v slightly negative when the radii were just corrected
  const co = isClose(v, 0, tolerance) || v < 0 ? 0 : sign * Math.sqrt(v);

  return new Vector<U>((r.x * half.y) / r.y, (-r.y * half.x) / r.x).mul(co).add(half);
}

/**
 * Brings a raw sweep angle into the range implied by the arc flags:
 * small arcs sweep at most π, large arcs at least π, in the direction
 * given by `sweepFlag`.
 */
export function normalizeSweep(dphi: Angle, largeArcFlag: boolean, sweepFlag: boolean): Angle {
  const pi = Math.PI;
  let value = dphi.radians;

  if (largeArcFlag && sweepFlag) {
    if (value < pi) value += 2 * pi;
  } else if (largeArcFlag) {
    if (value > -pi) value -= 2 * pi;
  } else if (sweepFlag) {
    if (value < 0) value += 2 * pi;
  } else if (value > 0) {
    value -= 2 * pi;
  }

  const [min, max] = sweepRange(largeArcFlag, sweepFlag);
  return Angle.radians(Math.min(max, Math.max(min, value)));
}

function sweepRange(largeArcFlag: boolean, sweepFlag: boolean): [number, number] {
  const pi = Math.PI;
  if (largeArcFlag) {
    return sweepFlag ? [pi, 2 * pi] : [-2 * pi, -pi];
  }
  return sweepFlag ? [0, pi] : [-pi, 0];
}

/**
 * Approximates one sub-arc of at most 90° with a single cubic.
 * @param r Ellipse radii
 * @param phi Start angle on the unit circle
 * @param dphi Sweep of this sub-arc
 */
export function arcSegment<U extends Unit>(r: Vector<U>, phi: Angle, dphi: Angle): BezierSegment<U> {
  const a = (4 / 3) * dphi.div(4).tan();

  const [sin1, cos1] = phi.sinCos();
  const [sin4, cos4] = phi.add(dphi).sinCos();

  const d1 = new Vector<U>(cos1, sin1);
  const d4 = new Vector<U>(cos4, sin4);
  const d2 = new Vector<U>(d1.x - d1.y * a, d1.y + d1.x * a);
  const d3 = new Vector<U>(d4.x + d4.y * a, d4.y - d4.x * a);

  return {
    ctrl1: d2.sub(d1).componentMul(r),
    ctrl2: d3.sub(d1).componentMul(r),
    end: d4.sub(d1).componentMul(r),
  };
}
