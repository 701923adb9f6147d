/**
 * Assembles key outlines from a profile.
 * Every shape is drawn as a bottom and a top surface, plus a step or a homing
 * feature where the shape has one.
 */

import { Length } from '../core/Units.js';
import type { KeyUnit, Unit } from '../core/Units.js';
import { Angle } from '../geometry/Angle.js';
import { Path, PathBuilder } from '../geometry/PathBuilder.js';
import { Point, Vector } from '../geometry/Point.js';
import { Rect } from '../geometry/Rect.js';
import type { RoundRect } from '../geometry/Rect.js';
import type { Profile } from '../profile/Profile.js';
import { DEFAULT_OUTLINE_OPTIONS } from '../types/options.js';
import type { OutlineOptions, ResolvedOutlineOptions } from '../types/options.js';
import type { Homing, KeyFeature, KeyPath, KeyShape, KeyStyle } from '../types/key.js';
import type { ILogger } from '../utils/Logger.js';
import { createLogger } from '../utils/Logger.js';
import { isoOutline } from './IsoOutline.js';

const ONE_BY_ONE = new Vector<KeyUnit>(1, 1);
const STEPPED_BOTTOM = new Vector<KeyUnit>(1.75, 1);
const STEPPED_TOP = new Vector<KeyUnit>(1.25, 1);

/**
 * Merges options with defaults and builds a logger when none is supplied.
 */
export function resolveOutlineOptions(options?: OutlineOptions): ResolvedOutlineOptions {
  const logLevel = options?.logLevel ?? DEFAULT_OUTLINE_OPTIONS.logLevel;
  return {
    tolerance: options?.tolerance ?? DEFAULT_OUTLINE_OPTIONS.tolerance,
    outlineWidth: options?.outlineWidth ?? DEFAULT_OUTLINE_OPTIONS.outlineWidth,
    logLevel,
    logger: options?.logger ?? createLogger(logLevel),
  };
}

/**
 * Generator for key outline paths in the unit space of its profile.
 */
export class KeyOutlineGenerator<U extends Unit> {
  readonly profile: Profile<U>;
  readonly options: Readonly<ResolvedOutlineOptions>;
  private readonly logger: ILogger;

  constructor(profile: Profile<U>, options?: OutlineOptions) {
    this.profile = profile;
    this.options = resolveOutlineOptions(options);
    this.logger = this.options.logger.child('KeyOutlineGenerator');
  }

  /**
   * Generates every path of a key, bottom first.
   */
  generate(shape: KeyShape, style: KeyStyle = {}): KeyPath<U>[] {
    this.logger.debug('Generating key outline', { shape: shape.type });

    switch (shape.type) {
      case 'none':
        return [];

      case 'normal':
      case 'space':
        return [this.bottom(shape.size, style), this.top(shape.size, style)];

      case 'steppedCaps':
        return [this.bottom(STEPPED_BOTTOM, style), this.top(STEPPED_TOP, style), this.step(style)];

      case 'isoHorizontal':
      case 'isoVertical':
        return [this.isoBottom(style), this.isoTop(style)];

      case 'homing': {
        const paths = [this.bottom(ONE_BY_ONE, style), this.top(ONE_BY_ONE, style)];
        const homing = this.resolveHoming(shape.homing);
        if (homing === 'bar') {
          paths.push(this.homingBar(style));
        } else if (homing === 'bump') {
          paths.push(this.homingBump(style));
        }
        return paths;
      }
    }
  }

  /**
   * Top surface of a key of the given size.
   */
  top(size: Vector<KeyUnit>, style: KeyStyle = {}): KeyPath<U> {
    return this.keyPath('top', this.profile.topWithSize(size).toPath(this.options.tolerance), style);
  }

  bottom(size: Vector<KeyUnit>, style: KeyStyle = {}): KeyPath<U> {
    return this.keyPath('bottom', this.profile.bottomWithSize(size).toPath(this.options.tolerance), style);
  }

  isoTop(style: KeyStyle = {}): KeyPath<U> {
    const { profile } = this;
    return this.keyPath('top', isoOutline(profile.topRect(), profile.conversion, this.options.tolerance), style);
  }

  isoBottom(style: KeyStyle = {}): KeyPath<U> {
    const { profile } = this;
    return this.keyPath('bottom', isoOutline(profile.bottomRect(), profile.conversion, this.options.tolerance), style);
  }

  /**
   * The step of a stepped-caps key, drawn from the average of the top and
   * bottom templates to the right of a 1.25 unit top.
   */
  step(style: KeyStyle = {}): KeyPath<U> {
    const template = this.profile.topRect().lerp(this.profile.bottomRect(), 0.5);
    return this.keyPath('step', this.stepPath(template), style);
  }

  homingBar(style: KeyStyle = {}): KeyPath<U> {
    return this.keyPath('homing', this.profile.homingBarRect().toPath(this.options.tolerance), style);
  }

  homingBump(style: KeyStyle = {}): KeyPath<U> {
    return this.keyPath('homing', this.profile.homingBumpCircle().toPath(this.options.tolerance), style);
  }

  /**
   * The key-top silhouette as a single path: the top surface, joined with the
   * step for stepped caps. Empty for keys without a top.
   */
  topOutline(shape: KeyShape): Path<U> {
    const paths = this.generate(shape)
      .filter((keyPath) => keyPath.feature === 'top' || keyPath.feature === 'step')
      .map((keyPath) => keyPath.path);
    return Path.join(paths);
  }

  private resolveHoming(homing: Homing | undefined): Homing {
    if (homing !== undefined) return homing;
    this.logger.debug('No homing feature given, using profile default', {
      homing: this.profile.homing.default,
    });
    return this.profile.homing.default;
  }

  private stepPath(template: RoundRect<U>): Path<U> {
    const { conversion } = this.profile;
    const r = template.radii;
    const rect = Rect.fromOriginAndSize(
      new Point<U>(conversion.apply(1.25) - template.min.x, template.min.y),
      new Vector<U>(conversion.apply(0.5), template.height().value)
    );

    return new PathBuilder<U>(this.options.tolerance)
      .absMove(rect.min.add(new Vector<U>(0, r.y)))
      .relArc(r, Angle.ZERO, false, false, r.neg())
      .absHorizLine(new Length<U>(rect.max.x - r.x))
      .relArc(r, Angle.ZERO, false, true, r)
      .absVertLine(new Length<U>(rect.max.y - r.y))
      .relArc(r, Angle.ZERO, false, true, r.negX())
      .absHorizLine(new Length<U>(rect.min.x - r.x))
      .relArc(r, Angle.ZERO, false, false, r.negY())
      .close()
      .build();
  }

  private keyPath(feature: KeyFeature, path: Path<U>, style: KeyStyle): KeyPath<U> {
    const keyPath: KeyPath<U> = { feature, path };
    if (style.fill) {
      keyPath.fill = style.fill;
    }
    if (style.outline) {
      keyPath.outline = { color: style.outline, width: this.options.outlineWidth };
    }
    return keyPath;
  }
}

/**
 * Creates a generator for a profile.
 */
export function createKeyOutlineGenerator<U extends Unit>(
  profile: Profile<U>,
  options?: OutlineOptions
): KeyOutlineGenerator<U> {
  return new KeyOutlineGenerator<U>(profile, options);
}
