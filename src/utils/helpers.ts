import { logger, LogLevel, setLevel } from '../logger';

const FALSY_ENV_VALUES = new Set(['', 'undefined', 'null', '0', 'false', 'no']);
export function envToBool(envVar: unknown): boolean {
  const normalized = String(envVar).toLowerCase();
  return !FALSY_ENV_VALUES.has(normalized);
}

/**
 * Checks if the given string names one of the logger's levels
 */
export function isLogLevelName(name: string): name is keyof typeof LogLevel {
  return name in LogLevel && isNaN(Number(name));
}

/**
 * Normalizes a log level name given on the command line, e.g. "debug"
 */
export function toLogLevelName(level: string): keyof typeof LogLevel {
  const name = level.charAt(0).toUpperCase() + level.slice(1).toLowerCase();
  if (!isLogLevelName(name)) {
    throw new Error(`Unknown log level: ${level}`);
  }
  return name;
}

export interface GlobalFlags {
  'no-input': boolean;
  'log-level': keyof typeof LogLevel;
}

const GLOBAL_FLAGS: GlobalFlags = {
  'no-input': false,
  'log-level': 'Info',
};

export function setGlobals(argv: Partial<GlobalFlags>): void {
  GLOBAL_FLAGS['no-input'] = argv['no-input'] ?? GLOBAL_FLAGS['no-input'];
  GLOBAL_FLAGS['log-level'] = argv['log-level'] ?? GLOBAL_FLAGS['log-level'];
  setLevel(LogLevel[GLOBAL_FLAGS['log-level']]);
  logger.trace('Global flags:', GLOBAL_FLAGS);
}

/**
 * Returns true if the user may be prompted for input
 */
export function hasInput(): boolean {
  return !GLOBAL_FLAGS['no-input'];
}
