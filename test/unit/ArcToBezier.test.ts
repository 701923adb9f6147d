import { describe, it, expect } from 'vitest';
import { ABS_TOL } from '../../src/core/Tolerance.js';
import type { KeyUnit } from '../../src/core/Units.js';
import { Angle } from '../../src/geometry/Angle.js';
import { MAX_ARC_SEGMENTS, arcCenter, arcSegment, arcToBezier, normalizeSweep } from '../../src/geometry/ArcToBezier.js';
import { Vector } from '../../src/geometry/Point.js';
import type { ArcParameters, BezierSegment } from '../../src/types/geometry.js';

const vec = (x: number, y: number): Vector<KeyUnit> => new Vector<KeyUnit>(x, y);

const KAPPA = 0.5522847498;

function arc(radii: Vector<KeyUnit>, largeArcFlag: boolean, sweepFlag: boolean, rotation = Angle.ZERO): ArcParameters<KeyUnit> {
  return { radii, xAxisRotation: rotation, largeArcFlag, sweepFlag };
}

function expectVector(v: Vector<KeyUnit> | undefined, x: number, y: number): void {
  expect(v).toBeDefined();
  expect(v?.x).toBeCloseTo(x, 6);
  expect(v?.y).toBeCloseTo(y, 6);
}

function lcg(seed: number): () => number {
  let state = seed;
  return () => {
    state = (state * 1664525 + 1013904223) % 4294967296;
    return state / 4294967296;
  };
}

function totalDisplacement(segments: BezierSegment<KeyUnit>[]): Vector<KeyUnit> {
  return segments.reduce((sum, segment) => sum.add(segment.end), Vector.zero<KeyUnit>());
}

describe('arcToBezier', () => {
  describe('Flags', () => {
    const d = vec(1, 1);
    const r = vec(1, 1);

    it('should draw the small counter-sweep arc', () => {
      const segments = arcToBezier(arc(r, false, false), d);

      expect(segments).toHaveLength(1);
      expectVector(segments[0]?.ctrl1, 0, KAPPA);
      expectVector(segments[0]?.ctrl2, 1 - KAPPA, 1);
      expectVector(segments[0]?.end, 1, 1);
    });

    it('should draw the small sweep arc', () => {
      const segments = arcToBezier(arc(r, false, true), d);

      expect(segments).toHaveLength(1);
      expectVector(segments[0]?.ctrl1, KAPPA, 0);
      expectVector(segments[0]?.ctrl2, 1, 1 - KAPPA);
      expectVector(segments[0]?.end, 1, 1);
    });

    it('should draw the large counter-sweep arc in three quarters', () => {
      const segments = arcToBezier(arc(r, true, false), d);

      expect(segments).toHaveLength(3);
      expectVector(segments[0]?.end, -1, 1);
      expectVector(segments[1]?.end, 1, 1);
      expectVector(segments[2]?.end, 1, -1);
    });

    it('should draw the large sweep arc in three quarters', () => {
      const segments = arcToBezier(arc(r, true, true), d);

      expect(segments).toHaveLength(3);
      expectVector(segments[0]?.end, 1, -1);
      expectVector(segments[1]?.end, 1, 1);
      expectVector(segments[2]?.end, -1, 1);
    });
  });

  describe('Radii', () => {
    it('should scale up radii too small to span the chord', () => {
      const segments = arcToBezier(arc(vec(1, 1), false, false), vec(4, 0));

      expect(segments).toHaveLength(2);
      expectVector(segments[0]?.end, 2, 2);
      expectVector(segments[1]?.end, 2, -2);
    });

    it('should draw a half circle in two quarters', () => {
      const segments = arcToBezier(arc(vec(1, 1), false, true), vec(2, 0));

      expect(segments).toHaveLength(2);
      expectVector(segments[0]?.end, 1, -1);
      expectVector(segments[1]?.end, 1, 1);
    });

    it('should ignore the sign of the radii', () => {
      const positive = arcToBezier(arc(vec(1, 1), false, true), vec(1, 1));
      const negative = arcToBezier(arc(vec(-1, -1), false, true), vec(1, 1));
      expect(negative).toEqual(positive);
    });

    it('should degenerate to a straight cubic for a zero radius', () => {
      const segments = arcToBezier(arc(vec(0, 1), false, true), vec(3, 6));

      expect(segments).toHaveLength(1);
      expectVector(segments[0]?.ctrl1, 1, 2);
      expectVector(segments[0]?.ctrl2, 2, 4);
      expectVector(segments[0]?.end, 3, 6);
    });

    it('should emit nothing for a zero displacement', () => {
      expect(arcToBezier(arc(vec(1, 1), true, true), vec(0, 0))).toEqual([]);
      expect(arcToBezier(arc(vec(1, 1), true, true), vec(1e-4, 0), 1e-3)).toEqual([]);
    });
  });

  describe('Displacement', () => {
    const cases: [boolean, boolean][] = [
      [false, false],
      [false, true],
      [true, false],
      [true, true],
    ];

    it.each(cases)('should end at the displacement (large %s, sweep %s)', (large, sweep) => {
      const d = vec(3, -1);
      const segments = arcToBezier(arc(vec(2, 1.5), large, sweep, Angle.degrees(25)), d);

      expect(segments.length).toBeGreaterThanOrEqual(1);
      expect(segments.length).toBeLessThanOrEqual(4);
      expect(totalDisplacement(segments).isClose(d, 1e-9)).toBe(true);
    });

    it('should end at the displacement of a rotated ellipse', () => {
      const d = vec(0, 4);
      const segments = arcToBezier(arc(vec(2, 1), false, true, Angle.degrees(90)), d);

      expect(segments).toHaveLength(2);
      expect(totalDisplacement(segments).isClose(d, 1e-9)).toBe(true);
    });
  });

  describe('Random arcs', () => {
    it('should end at the displacement with sub-arcs of at most a quarter turn', () => {
      const random = lcg(7);
      const between = (min: number, max: number): number => min + random() * (max - min);

      for (let run = 0; run < 500; run++) {
        const radii = vec(between(0.1, 5), between(0.1, 5));
        const rotation = Angle.degrees(between(-180, 180));
        const large = random() < 0.5;
        const sweep = random() < 0.5;
        const d = vec(between(-5, 5), between(-5, 5));
        if (d.length() < 0.01) continue;

        const segments = arcToBezier(arc(radii, large, sweep, rotation), d);

        expect(segments.length).toBeGreaterThanOrEqual(1);
        expect(segments.length).toBeLessThanOrEqual(MAX_ARC_SEGMENTS);
        expect(totalDisplacement(segments).isClose(d, 1e-6)).toBe(true);

        const local = d.rotate(rotation.neg());
        const r = radii.mul(Math.max(1, local.componentDiv(radii.mul(2)).length()));
        const center = arcCenter(r, large, sweep, local);

        let start = Vector.zero<KeyUnit>();
        for (const segment of segments) {
          const end = start.add(segment.end);
          const from = start.rotate(rotation.neg()).sub(center).componentDiv(r);
          const to = end.rotate(rotation.neg()).sub(center).componentDiv(r);
          const turn = Angle.atan2(to.y, to.x).sub(Angle.atan2(from.y, from.x)).signed().abs();
          expect(turn.radians).toBeLessThanOrEqual(Math.PI / 2 + ABS_TOL);
          start = end;
        }
      }
    });
  });
});

describe('arcCenter', () => {
  it('should pick the centre from the flags', () => {
    expectVector(arcCenter(vec(1, 1), false, false, vec(1, 1)), 1, 0);
    expectVector(arcCenter(vec(1, 1), true, false, vec(1, 1)), 0, 1);
    expectVector(arcCenter(vec(1, 1), false, true, vec(1, 1)), 0, 1);
    expectVector(arcCenter(vec(1, 1), true, true, vec(1, 1)), 1, 0);
  });

  it('should place the centre mid-chord when the radii just span it', () => {
    expectVector(arcCenter(vec(2, 2), false, false, vec(4, 0)), 2, 0);
  });
});

describe('normalizeSweep', () => {
  it('should move large arcs past a half turn in the sweep direction', () => {
    expect(normalizeSweep(Angle.radians(-Math.PI / 2), true, true).radians).toBeCloseTo((3 * Math.PI) / 2, 12);
    expect(normalizeSweep(Angle.radians(Math.PI / 2), true, false).radians).toBeCloseTo((-3 * Math.PI) / 2, 12);
  });

  it('should move small arcs within a half turn in the sweep direction', () => {
    expect(normalizeSweep(Angle.radians((-3 * Math.PI) / 2), false, true).radians).toBeCloseTo(Math.PI / 2, 12);
    expect(normalizeSweep(Angle.radians((3 * Math.PI) / 2), false, false).radians).toBeCloseTo(-Math.PI / 2, 12);
  });

  it('should keep sweeps already in range', () => {
    expect(normalizeSweep(Angle.radians(1), false, true).radians).toBe(1);
    expect(normalizeSweep(Angle.radians(-4), true, false).radians).toBe(-4);
  });
});

describe('arcSegment', () => {
  it('should approximate a quarter of the unit circle', () => {
    const segment = arcSegment(vec(1, 1), Angle.ZERO, Angle.FRAC_PI_2);

    expectVector(segment.ctrl1, 0, KAPPA);
    expectVector(segment.ctrl2, KAPPA - 1, 1);
    expectVector(segment.end, -1, 1);
  });

  it('should scale by the radii', () => {
    const segment = arcSegment(vec(2, 3), Angle.ZERO, Angle.FRAC_PI_2);
    expectVector(segment.end, -2, 3);
    expectVector(segment.ctrl1, 0, 3 * KAPPA);
  });
});
