import { LogLevel } from '@nestjs/common';

export type LogLevelName = Extract<
  LogLevel,
  'error' | 'warn' | 'log' | 'debug' | 'verbose'
>;

/**
 * Log levels from most to least severe
 */
export const LOG_LEVEL_NAMES: LogLevelName[] = [
  'error',
  'warn',
  'log',
  'debug',
  'verbose',
];

export function isLogLevelName(value: unknown): value is LogLevelName {
  return LOG_LEVEL_NAMES.some((name) => name === value);
}

/**
 * Enabled Nest log levels for a threshold: the level itself and every more
 * severe one. Unknown values fall back to `log`.
 */
export function logLevelsFor(threshold: string | undefined): LogLevel[] {
  const level = isLogLevelName(threshold) ? threshold : 'log';
  return LOG_LEVEL_NAMES.slice(0, LOG_LEVEL_NAMES.indexOf(level) + 1);
}
