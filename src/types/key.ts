import type { KeyUnit, Unit } from '../core/Units.js';
import type { Path } from '../geometry/PathBuilder.js';
import type { Vector } from '../geometry/Point.js';
import type { Rgba } from './geometry.js';

/**
 * Tactile feature of a homing key.
 */
export type Homing = 'scoop' | 'bar' | 'bump';

export const HOMING_KINDS: readonly Homing[] = ['scoop', 'bar', 'bump'];

/**
 * Shape classification of a key, as produced by a layout classifier.
 */
export type KeyShape =
  | { type: 'none'; size: Vector<KeyUnit> }
  | { type: 'normal'; size: Vector<KeyUnit> }
  | { type: 'space'; size: Vector<KeyUnit> }
  | { type: 'steppedCaps' }
  | { type: 'isoHorizontal' }
  | { type: 'isoVertical' }
  | { type: 'homing'; homing?: Homing };

export type KeyShapeType = KeyShape['type'];

/**
 * Which part of the key a path draws.
 */
export type KeyFeature = 'bottom' | 'top' | 'step' | 'homing';

/**
 * Stroke attached to a key path.
 */
export interface KeyOutline {
  color: Rgba;
  width: number;
}

/**
 * One drawable outline of a key, with optional paint.
 */
export interface KeyPath<U extends Unit> {
  feature: KeyFeature;
  path: Path<U>;
  fill?: Rgba;
  outline?: KeyOutline;
}

/**
 * Caller-supplied paint for generated paths. Colours are attached unchanged.
 */
export interface KeyStyle {
  /** Fill colour for every generated path */
  fill?: Rgba;
  /** Stroke colour; the stroke width comes from the generator options */
  outline?: Rgba;
}
