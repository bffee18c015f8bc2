/**
 * Leveled stderr logger for the CLI. The engine itself never logs; the
 * level only changes what is printed, never the verdict.
 */

export const LOG_LEVELS = [
  'DEBUG',
  'INFO',
  'WARNING',
  'ERROR',
  'CRITICAL',
] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type LogWriter = (text: string) => void;

export interface Logger {
  readonly level: LogLevel;
  debug(message: string): void;
  info(message: string): void;
  warning(message: string): void;
  error(message: string): void;
  critical(message: string): void;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function createLogger(
  level: LogLevel,
  write: LogWriter = (text) => process.stderr.write(text)
): Logger {
  const threshold = LOG_LEVELS.indexOf(level);
  const emit =
    (at: LogLevel) =>
    (message: string): void => {
      if (LOG_LEVELS.indexOf(at) < threshold) return;
      write(`[shapecheck] ${at.toLowerCase()}: ${message}\n`);
    };

  return {
    level,
    debug: emit('DEBUG'),
    info: emit('INFO'),
    warning: emit('WARNING'),
    error: emit('ERROR'),
    critical: emit('CRITICAL'),
  };
}
