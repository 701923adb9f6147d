import { describe, it, expect } from 'vitest';
import { DOT_PER_UNIT, MM_PER_UNIT } from '../../src/core/Units.js';
import type { Dot, KeyUnit } from '../../src/core/Units.js';
import { Point, Vector } from '../../src/geometry/Point.js';
import { Rect } from '../../src/geometry/Rect.js';
import { DEFAULT_PROFILE_DEFINITION, Profile, validateProfileDefinition } from '../../src/profile/Profile.js';
import type { ProfileDefinitionInput } from '../../src/profile/Profile.js';

const dot = (x: number, y: number): Point<Dot> => new Point<Dot>(x, y);
const TOL = 1e-9;

describe('Profile', () => {
  describe('Default profile', () => {
    const profile = Profile.default();

    it('should place the top surface above centre', () => {
      const top = profile.topRect();
      expect(top.min.isClose(dot(170, 55), TOL)).toBe(true);
      expect(top.max.isClose(dot(830, 790), TOL)).toBe(true);
      expect(top.radii.isClose(new Vector<Dot>(65, 65), TOL)).toBe(true);
      expect(top.center().isClose(dot(500, 422.5), TOL)).toBe(true);
    });

    it('should centre the bottom surface', () => {
      const bottom = profile.bottomRect();
      expect(bottom.min.isClose(dot(25, 25), TOL)).toBe(true);
      expect(bottom.max.isClose(dot(975, 975), TOL)).toBe(true);
    });

    it('should resolve homing sizes from millimetres', () => {
      expect(profile.homing.default).toBe('bar');
      expect(profile.homing.scoopDepth.value).toBeCloseTo(104.98688, 4);
      expect(profile.homing.barSize.x).toBeCloseTo(200, 9);
      expect(profile.homing.barSize.y).toBeCloseTo(26.77165, 4);
      expect(profile.homing.barYOffset.value).toBeCloseTo(333.33333, 4);
    });

    it('should place the homing bar below the top centre', () => {
      const bar = profile.homingBarRect();
      expect(bar.min.x).toBeCloseTo(400, 9);
      expect(bar.max.x).toBeCloseTo(600, 9);
      expect(bar.center().y).toBeCloseTo(755.83333, 4);
      expect(bar.height().value).toBeCloseTo(26.77165, 4);
    });

    it('should place the homing bump at the top centre', () => {
      const bump = profile.homingBumpCircle();
      expect(bump.center.isClose(dot(500, 422.5), TOL)).toBe(true);
      expect(bump.radius.value).toBeCloseTo(13.38583, 4);
    });

    it('should report the dish depth', () => {
      expect(profile.depth().value).toBeCloseTo(52.49344, 4);
    });

    it('should freeze its definition', () => {
      expect(Object.isFrozen(profile.definition)).toBe(true);
      expect(Object.isFrozen(profile.definition.top)).toBe(true);
      expect(Object.isFrozen(profile.homing)).toBe(true);
      expect(profile.definition.top).toEqual(DEFAULT_PROFILE_DEFINITION.top);
    });
  });

  describe('Sized surfaces', () => {
    const profile = Profile.default();

    it('should grow surfaces right and down', () => {
      const top = profile.topWithSize(new Vector<KeyUnit>(2, 1));
      expect(top.min.isClose(dot(170, 55), TOL)).toBe(true);
      expect(top.max.isClose(dot(1830, 790), TOL)).toBe(true);

      const bottom = profile.bottomWithSize(new Vector<KeyUnit>(1, 2));
      expect(bottom.max.isClose(dot(975, 1975), TOL)).toBe(true);
    });

    it('should keep the template radii', () => {
      const top = profile.topWithSize(new Vector<KeyUnit>(6.25, 1));
      expect(top.radii.isClose(profile.topRect().radii, TOL)).toBe(true);
    });

    it('should place surfaces in a grid rect', () => {
      const rect = new Rect(new Point<KeyUnit>(1, 0), new Point<KeyUnit>(3, 1));
      const top = profile.topWithRect(rect);
      expect(top.min.isClose(dot(1170, 55), TOL)).toBe(true);
      expect(top.max.isClose(dot(2830, 790), TOL)).toBe(true);

      const bottom = profile.bottomWithRect(new Rect(new Point<KeyUnit>(0, 1), new Point<KeyUnit>(1, 3)));
      expect(bottom.min.isClose(dot(25, 1025), TOL)).toBe(true);
      expect(bottom.max.isClose(dot(975, 2975), TOL)).toBe(true);
    });
  });

  describe('Custom profiles', () => {
    it('should merge partial input with the defaults', () => {
      const profile = Profile.create({ type: 'spherical', top: { width: 0.7 } }, DOT_PER_UNIT);

      expect(profile.definition.type).toBe('spherical');
      expect(profile.definition.top.width).toBe(0.7);
      expect(profile.definition.top.height).toBe(0.735);
      expect(profile.definition.bottom).toEqual(DEFAULT_PROFILE_DEFINITION.bottom);
      expect(profile.topRect().min.x).toBeCloseTo(150, 9);
    });

    it('should clamp radii to half the surface size', () => {
      const profile = Profile.create({ top: { radius: 0.5 } }, DOT_PER_UNIT);
      expect(profile.topRect().radii.isClose(new Vector<Dot>(330, 367.5), TOL)).toBe(true);
    });

    it('should have no dish depth when flat', () => {
      const profile = Profile.create({ type: 'flat', depth: 3 }, DOT_PER_UNIT);
      expect(profile.depth().value).toBe(0);
    });

    it('should resolve into any unit space', () => {
      const profile = Profile.create({}, MM_PER_UNIT);

      expect(profile.topRect().min.x).toBeCloseTo(3.2385, 9);
      expect(profile.homing.barSize.x).toBeCloseTo(3.81, 9);
      expect(profile.depth().value).toBeCloseTo(1, 9);
    });

    it('should use the homing default from the input', () => {
      const profile = Profile.create({ homing: { default: 'bump' } }, DOT_PER_UNIT);
      expect(profile.homing.default).toBe('bump');
      expect(profile.definition.homing.barWidth).toBe(3.81);
    });
  });

  describe('Validation', () => {
    it('should reject negative sizes', () => {
      expect(() => Profile.create({ bottom: { radius: -1 } }, DOT_PER_UNIT)).toThrow(
        'Invalid profile: bottom.radius must be non-negative, got -1'
      );
    });

    it('should reject non-finite numbers', () => {
      expect(() => Profile.create({ depth: Number.NaN }, DOT_PER_UNIT)).toThrow(
        'Invalid profile: depth must be a finite number, got NaN'
      );
      expect(() => Profile.create({ top: { yOffset: Number.POSITIVE_INFINITY } }, DOT_PER_UNIT)).toThrow(
        'Invalid profile: top.yOffset must be a finite number, got Infinity'
      );
    });

    it('should reject unknown profile types', () => {
      const input: ProfileDefinitionInput = JSON.parse('{"type":"round"}');
      expect(() => Profile.create(input, DOT_PER_UNIT)).toThrow(
        'Invalid profile: type must be one of cylindrical, spherical, flat, got round'
      );
    });

    it('should reject unknown homing features', () => {
      const input: ProfileDefinitionInput = JSON.parse('{"homing":{"default":"dimple"}}');
      expect(() => Profile.create(input, DOT_PER_UNIT)).toThrow(
        'Invalid profile: homing.default must be one of scoop, bar, bump, got dimple'
      );
    });

    it('should accept the default definition', () => {
      expect(() => validateProfileDefinition(DEFAULT_PROFILE_DEFINITION)).not.toThrow();
    });
  });
});
