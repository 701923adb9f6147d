export { ABS_TOL, REL_TOL, isClose, isWithin } from './Tolerance.js';

export {
  UnitConversion,
  Length,
  DOT_PER_UNIT,
  MM_PER_UNIT,
  INCH_PER_UNIT,
  DOT_PER_MM,
  DOT_PER_INCH,
  fontUnitConversion,
} from './Units.js';
export type { KeyUnit, Mm, Inch, Dot, FontUnit, Unit } from './Units.js';
