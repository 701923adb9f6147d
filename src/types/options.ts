import type { ILogger } from '../utils/Logger.js';

/**
 * Logging level for outline generation.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/**
 * Options for generating key outlines.
 * Lengths are in the unit space of the profile the generator is built from.
 */
export interface OutlineOptions {
  /**
   * Arc chords and radii at or below this length are treated as degenerate.
   * @default 1e-3
   */
  tolerance?: number;

  /**
   * Stroke width attached to outlined key paths.
   * @default 10
   */
  outlineWidth?: number;

  /**
   * Logging level for diagnostic output. Ignored when `logger` is given.
   * @default 'warn'
   */
  logLevel?: LogLevel;

  /**
   * Logger to use instead of a console logger built from `logLevel`.
   */
  logger?: ILogger;
}

/**
 * Default outline options.
 */
export const DEFAULT_OUTLINE_OPTIONS: Required<Omit<OutlineOptions, 'logger'>> & { logger: undefined } = {
  tolerance: 1e-3,
  outlineWidth: 10,
  logLevel: 'warn',
  logger: undefined,
};

/**
 * Outline options after merging with defaults.
 */
export interface ResolvedOutlineOptions {
  /** Degenerate length threshold. */
  tolerance: number;
  /** Stroke width for outlined paths. */
  outlineWidth: number;
  /** Logging level. */
  logLevel: LogLevel;
  /** Logger, either supplied or built from the level. */
  logger: ILogger;
}
