/**
 * ISO enter outline.
 *
 * The outline is the union of a wide 1.5×1 rect and a tall 1.25×2 rect
 * shifted 0.25 key units right, both grown from the same 1×1 template. It is
 * traced from a table of corners, clockwise on a y-down canvas; the two
 * corners interior to the union are omitted.
 */

import { ABS_TOL } from '../core/Tolerance.js';
import { Length } from '../core/Units.js';
import type { KeyUnit, Unit, UnitConversion } from '../core/Units.js';
import { Angle } from '../geometry/Angle.js';
import type { Path } from '../geometry/PathBuilder.js';
import { PathBuilder } from '../geometry/PathBuilder.js';
import { Point, Vector } from '../geometry/Point.js';
import { Rect } from '../geometry/Rect.js';
import type { RoundRect } from '../geometry/Rect.js';

type Side = 'min' | 'max';
type Direction = readonly [number, number];

/**
 * A rounded corner of the outline.
 */
export interface IsoCorner {
  /** Rect supplying the corner's x coordinate */
  xRect: 'wide' | 'tall';
  x: Side;
  /** Rect supplying the corner's y coordinate */
  yRect: 'wide' | 'tall';
  y: Side;
  /** Travel direction along the edge entering the corner */
  entry: Direction;
  /** Travel direction along the edge leaving the corner */
  exit: Direction;
  /** Concave corners turn against the tracing direction */
  convex: boolean;
}

const UP: Direction = [0, -1];
const DOWN: Direction = [0, 1];
const LEFT: Direction = [-1, 0];
const RIGHT: Direction = [1, 0];

export const ISO_CORNERS: readonly IsoCorner[] = [
  { xRect: 'wide', x: 'min', yRect: 'wide', y: 'min', entry: UP, exit: RIGHT, convex: true },
  { xRect: 'wide', x: 'max', yRect: 'wide', y: 'min', entry: RIGHT, exit: DOWN, convex: true },
  { xRect: 'tall', x: 'max', yRect: 'tall', y: 'max', entry: DOWN, exit: LEFT, convex: true },
  { xRect: 'tall', x: 'min', yRect: 'tall', y: 'max', entry: LEFT, exit: UP, convex: true },
  { xRect: 'tall', x: 'min', yRect: 'wide', y: 'max', entry: UP, exit: LEFT, convex: false },
  { xRect: 'wide', x: 'min', yRect: 'wide', y: 'max', entry: LEFT, exit: UP, convex: true },
];

/**
 * Rect of a key of the given size grown from a 1×1 template.
 */
export function rectWithSize<U extends Unit>(
  template: Rect<U>,
  size: Vector<KeyUnit>,
  conversion: UnitConversion<KeyUnit, U>
): Rect<U> {
  const grow = size.sub(Vector.splat<KeyUnit>(1)).convert(conversion);
  return new Rect<U>(template.min, template.max.add(grow));
}

/**
 * The wide and tall rects whose union is the ISO enter.
 */
export function isoRects<U extends Unit>(
  template: Rect<U>,
  conversion: UnitConversion<KeyUnit, U>
): { wide: Rect<U>; tall: Rect<U> } {
  const wide = rectWithSize(template, new Vector<KeyUnit>(1.5, 1), conversion);
  const tall = rectWithSize(template, new Vector<KeyUnit>(1.25, 2), conversion).translate(
    new Vector<KeyUnit>(0.25, 0).convert(conversion)
  );
  return { wide, tall };
}

/**
 * Traces the ISO enter outline for a top or bottom surface template.
 */
export function isoOutline<U extends Unit>(
  template: RoundRect<U>,
  conversion: UnitConversion<KeyUnit, U>,
  tolerance: number = ABS_TOL
): Path<U> {
  const rects = isoRects(template.rect(), conversion);
  const r = template.radii;

  const corners = ISO_CORNERS.map((corner) => {
    const center = new Point<U>(rects[corner.xRect][corner.x].x, rects[corner.yRect][corner.y].y);
    const entry = new Vector<U>(corner.entry[0], corner.entry[1]).componentMul(r);
    const exit = new Vector<U>(corner.exit[0], corner.exit[1]).componentMul(r);
    return { corner, start: center.subVector(entry), sweep: entry.add(exit) };
  });

  const builder = new PathBuilder<U>(tolerance);
  corners.forEach(({ corner, start, sweep }, i) => {
    if (i === 0) builder.absMove(start);
    builder.relArc(r, Angle.ZERO, false, corner.convex, sweep);

    const next = corners[i + 1];
    if (next === undefined) return;
    if (corner.exit[0] !== 0) {
      builder.absHorizLine(new Length<U>(next.start.x));
    } else {
      builder.absVertLine(new Length<U>(next.start.y));
    }
  });

  return builder.close().build();
}
