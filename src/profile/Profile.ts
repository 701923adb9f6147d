/**
 * Keycap profile templates.
 *
 * A profile describes the top and bottom surfaces of a 1×1 key and the size
 * of its homing features. Surfaces are given in key units and homing features
 * in millimetres; a {@link Profile} resolves both into the caller's unit space
 * once, when it is created.
 */

import { DOT_PER_UNIT, Length, MM_PER_UNIT } from '../core/Units.js';
import type { Dot, KeyUnit, Mm, Unit, UnitConversion } from '../core/Units.js';
import { Circle } from '../geometry/Ellipse.js';
import { Point, Vector } from '../geometry/Point.js';
import { Rect, RoundRect } from '../geometry/Rect.js';
import { HOMING_KINDS } from '../types/key.js';
import type { Homing } from '../types/key.js';

/**
 * Shape of the key-top surface.
 */
export type ProfileType = 'cylindrical' | 'spherical' | 'flat';

export const PROFILE_TYPES: readonly ProfileType[] = ['cylindrical', 'spherical', 'flat'];

/**
 * Top surface of a 1×1 key, in key units, centred on the key and shifted by `yOffset`.
 */
export interface TopSurfaceDefinition {
  width: number;
  height: number;
  radius: number;
  yOffset: number;
}

/**
 * Bottom surface of a 1×1 key, in key units, centred on the key.
 */
export interface BottomSurfaceDefinition {
  width: number;
  height: number;
  radius: number;
}

/**
 * Homing feature geometry, in millimetres.
 */
export interface HomingDefinition {
  /** Feature used when a homing key does not name one */
  default: Homing;
  scoopDepth: number;
  barWidth: number;
  barHeight: number;
  /** Bar offset below the top surface centre */
  barYOffset: number;
  bumpDiameter: number;
  /** Bump offset below the top surface centre */
  bumpYOffset: number;
}

export interface ProfileDefinition {
  type: ProfileType;
  /** Dish depth in millimetres; ignored for flat profiles */
  depth: number;
  top: TopSurfaceDefinition;
  bottom: BottomSurfaceDefinition;
  homing: HomingDefinition;
}

/**
 * Profile definition with every field optional, merged section by section
 * with {@link DEFAULT_PROFILE_DEFINITION}.
 */
export interface ProfileDefinitionInput {
  type?: ProfileType;
  depth?: number;
  top?: Partial<TopSurfaceDefinition>;
  bottom?: Partial<BottomSurfaceDefinition>;
  homing?: Partial<HomingDefinition>;
}

/**
 * Default profile, approximately OEM.
 */
export const DEFAULT_PROFILE_DEFINITION: Readonly<ProfileDefinition> = {
  type: 'cylindrical',
  depth: 1.0,
  top: {
    width: 0.66,
    height: 0.735,
    radius: 0.065,
    yOffset: -0.0775,
  },
  bottom: {
    width: 0.95,
    height: 0.95,
    radius: 0.065,
  },
  homing: {
    default: 'bar',
    // Twice the default dish depth
    scoopDepth: 2.0,
    // 0.15 in × 0.02 in, 0.25 in below centre
    barWidth: 3.81,
    barHeight: 0.51,
    barYOffset: 6.35,
    // 0.02 in
    bumpDiameter: 0.51,
    bumpYOffset: 0,
  },
};

/**
 * Resolved homing geometry in unit space `U`.
 */
export interface HomingGeometry<U extends Unit> {
  default: Homing;
  scoopDepth: Length<U>;
  barSize: Vector<U>;
  barYOffset: Length<U>;
  bumpDiameter: Length<U>;
  bumpYOffset: Length<U>;
}

function mergeDefinition(input: ProfileDefinitionInput): ProfileDefinition {
  const defaults = DEFAULT_PROFILE_DEFINITION;
  return {
    type: input.type ?? defaults.type,
    depth: input.depth ?? defaults.depth,
    top: { ...defaults.top, ...input.top },
    bottom: { ...defaults.bottom, ...input.bottom },
    homing: { ...defaults.homing, ...input.homing },
  };
}

function invalid(field: string, requirement: string, value: unknown): Error {
  return new Error(`Invalid profile: ${field} must be ${requirement}, got ${String(value)}`);
}

function checkFinite(field: string, value: number): void {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw invalid(field, 'a finite number', value);
  }
}

function checkNonNegative(field: string, value: number): void {
  checkFinite(field, value);
  if (value < 0) {
    throw invalid(field, 'non-negative', value);
  }
}

/**
 * Throws an Error naming the first offending field.
 */
export function validateProfileDefinition(definition: ProfileDefinition): void {
  if (!PROFILE_TYPES.includes(definition.type)) {
    throw invalid('type', `one of ${PROFILE_TYPES.join(', ')}`, definition.type);
  }
  checkNonNegative('depth', definition.depth);

  const { top, bottom, homing } = definition;
  checkNonNegative('top.width', top.width);
  checkNonNegative('top.height', top.height);
  checkNonNegative('top.radius', top.radius);
  checkFinite('top.yOffset', top.yOffset);

  checkNonNegative('bottom.width', bottom.width);
  checkNonNegative('bottom.height', bottom.height);
  checkNonNegative('bottom.radius', bottom.radius);

  if (!HOMING_KINDS.includes(homing.default)) {
    throw invalid('homing.default', `one of ${HOMING_KINDS.join(', ')}`, homing.default);
  }
  checkNonNegative('homing.scoopDepth', homing.scoopDepth);
  checkNonNegative('homing.barWidth', homing.barWidth);
  checkNonNegative('homing.barHeight', homing.barHeight);
  checkFinite('homing.barYOffset', homing.barYOffset);
  checkNonNegative('homing.bumpDiameter', homing.bumpDiameter);
  checkFinite('homing.bumpYOffset', homing.bumpYOffset);
}

/**
 * Validated, immutable profile resolved into unit space `U`.
 */
export class Profile<U extends Unit> {
  declare readonly unit: U;
  readonly definition: Readonly<ProfileDefinition>;
  /** Key units to `U` */
  readonly conversion: UnitConversion<KeyUnit, U>;
  readonly homing: Readonly<HomingGeometry<U>>;
  private readonly top: RoundRect<U>;
  private readonly bottom: RoundRect<U>;

  private constructor(definition: ProfileDefinition, conversion: UnitConversion<KeyUnit, U>) {
    this.definition = Object.freeze({
      ...definition,
      top: Object.freeze({ ...definition.top }),
      bottom: Object.freeze({ ...definition.bottom }),
      homing: Object.freeze({ ...definition.homing }),
    });
    this.conversion = conversion;

    const { top, bottom, homing } = this.definition;
    const center = Point.splat<KeyUnit>(0.5);

    this.top = RoundRect.fromCenterSizeAndRadii(
      center.add(new Vector<KeyUnit>(0, top.yOffset)),
      new Vector<KeyUnit>(top.width, top.height),
      Vector.splat<KeyUnit>(top.radius)
    ).convert(conversion);

    this.bottom = RoundRect.fromCenterSizeAndRadii(
      center,
      new Vector<KeyUnit>(bottom.width, bottom.height),
      Vector.splat<KeyUnit>(bottom.radius)
    ).convert(conversion);

    const mm: UnitConversion<Mm, U> = MM_PER_UNIT.inverse().then(conversion);
    this.homing = Object.freeze({
      default: homing.default,
      scoopDepth: new Length<Mm>(homing.scoopDepth).convert(mm),
      barSize: new Vector<Mm>(homing.barWidth, homing.barHeight).convert(mm),
      barYOffset: new Length<Mm>(homing.barYOffset).convert(mm),
      bumpDiameter: new Length<Mm>(homing.bumpDiameter).convert(mm),
      bumpYOffset: new Length<Mm>(homing.bumpYOffset).convert(mm),
    });
  }

  /**
   * Validates a definition and resolves it into the unit space of `conversion`.
   * Missing fields take their values from {@link DEFAULT_PROFILE_DEFINITION}.
   * @throws Error naming the offending field
   */
  static create<U extends Unit>(input: ProfileDefinitionInput, conversion: UnitConversion<KeyUnit, U>): Profile<U> {
    const definition = mergeDefinition(input);
    validateProfileDefinition(definition);
    return new Profile<U>(definition, conversion);
  }

  /**
   * The default profile in drawing units.
   */
  static default(): Profile<Dot> {
    return new Profile<Dot>(DEFAULT_PROFILE_DEFINITION, DOT_PER_UNIT);
  }

  /**
   * Dish depth in `U`; zero for flat profiles.
   */
  depth(): Length<U> {
    const depth = this.definition.type === 'flat' ? 0 : this.definition.depth;
    return new Length<Mm>(depth).convert(MM_PER_UNIT.inverse().then(this.conversion));
  }

  /**
   * Top surface template of a 1×1 key.
   */
  topRect(): RoundRect<U> {
    return this.top;
  }

  /**
   * Bottom surface template of a 1×1 key.
   */
  bottomRect(): RoundRect<U> {
    return this.bottom;
  }

  /**
   * Top surface of a key of the given size, growing right and down.
   */
  topWithSize(size: Vector<KeyUnit>): RoundRect<U> {
    return withSize(this.top, size, this.conversion);
  }

  bottomWithSize(size: Vector<KeyUnit>): RoundRect<U> {
    return withSize(this.bottom, size, this.conversion);
  }

  /**
   * Top surface of a key occupying `rect` of the key grid.
   */
  topWithRect(rect: Rect<KeyUnit>): RoundRect<U> {
    return withRect(this.top, rect, this.conversion);
  }

  bottomWithRect(rect: Rect<KeyUnit>): RoundRect<U> {
    return withRect(this.bottom, rect, this.conversion);
  }

  /**
   * Homing bar, centred horizontally on the top surface.
   */
  homingBarRect(): Rect<U> {
    const center = this.top.center().add(new Vector<U>(0, this.homing.barYOffset.value));
    return Rect.fromCenterAndSize(center, this.homing.barSize);
  }

  homingBumpCircle(): Circle<U> {
    const center = this.top.center().add(new Vector<U>(0, this.homing.bumpYOffset.value));
    return new Circle<U>(center, this.homing.bumpDiameter.div(2));
  }
}

function withSize<U extends Unit>(
  template: RoundRect<U>,
  size: Vector<KeyUnit>,
  conversion: UnitConversion<KeyUnit, U>
): RoundRect<U> {
  const grow = size.sub(Vector.splat<KeyUnit>(1)).convert(conversion);
  return new RoundRect<U>(template.min, template.max.add(grow), template.radii);
}

function withRect<U extends Unit>(
  template: RoundRect<U>,
  rect: Rect<KeyUnit>,
  conversion: UnitConversion<KeyUnit, U>
): RoundRect<U> {
  const shift = rect.min.toVector().convert(conversion);
  const grow = rect.max.toVector().sub(Vector.splat<KeyUnit>(1)).convert(conversion);
  return new RoundRect<U>(template.min.add(shift), template.max.add(grow), template.radii);
}
