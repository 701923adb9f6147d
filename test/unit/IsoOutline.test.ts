import { describe, it, expect } from 'vitest';
import { DOT_PER_UNIT } from '../../src/core/Units.js';
import type { Dot } from '../../src/core/Units.js';
import type { Path } from '../../src/geometry/PathBuilder.js';
import { Point } from '../../src/geometry/Point.js';
import { Rect } from '../../src/geometry/Rect.js';
import { ISO_CORNERS, isoOutline, isoRects } from '../../src/outline/IsoOutline.js';
import { Profile } from '../../src/profile/Profile.js';

const dot = (x: number, y: number): Point<Dot> => new Point<Dot>(x, y);

/** Absolute pen position after every segment except closes */
function vertices(path: Path<Dot>): Point<Dot>[] {
  const points: Point<Dot>[] = [];
  let pen = dot(0, 0);
  for (const segment of path) {
    if (segment.type === 'close') continue;
    pen = segment.type === 'moveTo' ? segment.point : pen.add(segment.end);
    points.push(pen);
  }
  return points;
}

describe('IsoOutline', () => {
  const profile = Profile.default();

  describe('isoRects', () => {
    it('should grow a wide and a shifted tall rect from the template', () => {
      const { wide, tall } = isoRects(profile.topRect().rect(), DOT_PER_UNIT);

      expect(wide.isClose(new Rect(dot(170, 55), dot(1330, 790)))).toBe(true);
      expect(tall.isClose(new Rect(dot(420, 55), dot(1330, 1790)))).toBe(true);
    });
  });

  describe('isoOutline', () => {
    const path = isoOutline(profile.topRect(), DOT_PER_UNIT);

    it('should trace six corners and five edges', () => {
      expect(path.length).toBe(13);
      expect(path.segments.filter((s) => s.type === 'cubicBezierTo')).toHaveLength(6);
      expect(path.segments.filter((s) => s.type === 'lineTo')).toHaveLength(5);
      expect(path.segments[12]).toEqual({ type: 'close' });
    });

    it('should pass through the ends of every corner', () => {
      const expected = [
        dot(170, 120),
        dot(235, 55),
        dot(1265, 55),
        dot(1330, 120),
        dot(1330, 1725),
        dot(1265, 1790),
        dot(485, 1790),
        dot(420, 1725),
        dot(420, 855),
        dot(355, 790),
        dot(235, 790),
        dot(170, 725),
      ];
      const actual = vertices(path);

      expect(actual).toHaveLength(expected.length);
      actual.forEach((point, i) => {
        const want = expected[i];
        expect(want && point.isClose(want)).toBe(true);
      });
    });

    it('should be bounded by the union of both rects', () => {
      expect(path.bounds.isClose(new Rect(dot(170, 55), dot(1330, 1790)))).toBe(true);

      const bottom = isoOutline(profile.bottomRect(), DOT_PER_UNIT);
      expect(bottom.bounds.isClose(new Rect(dot(25, 25), dot(1475, 1975)))).toBe(true);
    });

    it('should have exactly one concave corner', () => {
      expect(ISO_CORNERS.filter((corner) => !corner.convex)).toHaveLength(1);
    });
  });
});
