import { describe, it, expect } from 'vitest';
import { ABS_TOL, REL_TOL, isClose, isWithin } from '../../src/core/Tolerance.js';

describe('Tolerance', () => {
  describe('isClose', () => {
    it('should treat identical values as close', () => {
      expect(isClose(0, 0)).toBe(true);
      expect(isClose(Infinity, Infinity)).toBe(true);
    });

    it('should use the absolute tolerance near zero', () => {
      expect(isClose(0, 1e-7)).toBe(true);
      expect(isClose(0, 1e-5)).toBe(false);
      expect(isClose(0, 1e-5, 1e-4)).toBe(true);
    });

    it('should use the relative tolerance for large values', () => {
      expect(isClose(1e9, 1e9 + 100)).toBe(true);
      expect(isClose(1e9, 1e9 + 2000)).toBe(false);
    });

    it('should reject clearly different values', () => {
      expect(isClose(1, 1.001)).toBe(false);
      expect(isClose(-1, 1)).toBe(false);
    });

    it('should expose the default tolerances', () => {
      expect(ABS_TOL).toBe(1e-6);
      expect(REL_TOL).toBe(1e-6);
    });
  });

  describe('isWithin', () => {
    it('should include the bounds and allow overshoot by the tolerance', () => {
      expect(isWithin(0, 0, 1)).toBe(true);
      expect(isWithin(1, 0, 1)).toBe(true);
      expect(isWithin(1 + 1e-7, 0, 1)).toBe(true);
      expect(isWithin(1.1, 0, 1)).toBe(false);
      expect(isWithin(-0.1, 0, 1)).toBe(false);
    });
  });
});
