/**
 * Shared floating point comparison.
 *
 * All geometry code compares through {@link isClose} so that degenerate-case
 * thresholds stay consistent between modules.
 */

/** Default absolute tolerance */
export const ABS_TOL = 1e-6;

/** Default relative tolerance */
export const REL_TOL = 1e-6;

/**
 * Returns true when `a` and `b` are equal within an absolute or relative tolerance.
 *
 * The relative term is scaled by the larger magnitude of the two values, so
 * comparing against zero only ever uses the absolute tolerance.
 */
export function isClose(a: number, b: number, absTol: number = ABS_TOL, relTol: number = REL_TOL): boolean {
  if (a === b) return true;
  const diff = Math.abs(a - b);
  const scale = Math.max(Math.abs(a), Math.abs(b));
  return diff <= Math.max(relTol * scale, absTol);
}

/**
 * Returns true when `value` lies in `[min, max]`, allowing either bound to be
 * overshot by the absolute tolerance.
 */
export function isWithin(value: number, min: number, max: number, absTol: number = ABS_TOL): boolean {
  return value >= min - absTol && value <= max + absTol;
}
