/**
 * @lumberline/core - Severity Levels
 *
 * Levels are ordered by severity so that a threshold comparison
 * (`level >= minLevel`) decides whether a record is enabled.
 *
 * @module domain/metadata/Level
 */

/**
 * Record severity, lowest to highest.
 *
 * `Off` is a threshold value only: setting it as the minimum level
 * disables every record, and no record ever carries it.
 */
export enum Level {
  /** Fine-grained debugging information */
  Trace = 0,
  /** Debugging information */
  Debug = 1,
  /** General information */
  Info = 2,
  /** Warning conditions */
  Warn = 3,
  /** Error conditions */
  Error = 4,
  /** Threshold that disables all records */
  Off = 5,
}

/**
 * Levels a record can carry.
 */
export type RecordLevel = Exclude<Level, Level.Off>;

const LEVEL_NAMES: Record<Level, string> = {
  [Level.Trace]: 'TRACE',
  [Level.Debug]: 'DEBUG',
  [Level.Info]: 'INFO',
  [Level.Warn]: 'WARN',
  [Level.Error]: 'ERROR',
  [Level.Off]: 'OFF',
};

const LEVEL_COLORS: Record<Level, string> = {
  [Level.Trace]: '\x1b[35m', // magenta
  [Level.Debug]: '\x1b[36m', // cyan
  [Level.Info]: '\x1b[32m', // green
  [Level.Warn]: '\x1b[33m', // yellow
  [Level.Error]: '\x1b[31m', // red
  [Level.Off]: '',
};

/**
 * ANSI sequence that resets colour attributes.
 */
export const ANSI_RESET = '\x1b[0m';

/**
 * Upper-case name of a level, e.g. `'WARN'`.
 */
export function levelName(level: Level): string {
  return LEVEL_NAMES[level];
}

/**
 * ANSI colour prefix used when rendering a level.
 */
export function levelColor(level: Level): string {
  return LEVEL_COLORS[level];
}

/**
 * Parse a level name.
 *
 * Matching is case-insensitive and `warning` is accepted for `Warn`.
 *
 * @returns The level, or undefined if the text names no level
 *
 * @example
 * ```typescript
 * parseLevel('debug');   // Level.Debug
 * parseLevel('WARNING'); // Level.Warn
 * parseLevel('verbose'); // undefined
 * ```
 */
export function parseLevel(text: string): Level | undefined {
  switch (text.trim().toUpperCase()) {
    case 'TRACE':
      return Level.Trace;
    case 'DEBUG':
      return Level.Debug;
    case 'INFO':
      return Level.Info;
    case 'WARN':
    case 'WARNING':
      return Level.Warn;
    case 'ERROR':
      return Level.Error;
    case 'OFF':
      return Level.Off;
    default:
      return undefined;
  }
}

/**
 * Whether a record at `level` passes the `threshold`.
 */
export function isLevelEnabled(level: RecordLevel, threshold: Level): boolean {
  return level >= threshold;
}
