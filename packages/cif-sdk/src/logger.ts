export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  fatal(message: string): void;
}

const LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'fatal'];

const ignore = (_message: string): void => undefined;

export const noopLogger: Logger = {
  debug: ignore,
  info: ignore,
  warn: ignore,
  error: ignore,
  fatal: ignore,
};

/**
 * Leveled logger writing to the console. Messages below `level` are dropped.
 */
export function createConsoleLogger(level: LogLevel = 'warn'): Logger {
  const threshold = LEVELS.indexOf(level);
  const enabled = (candidate: LogLevel) => LEVELS.indexOf(candidate) >= threshold;
  const line = (candidate: LogLevel, message: string) =>
    `[cif] ${candidate.toUpperCase()} ${message}`;

  return {
    debug(message) {
      if (enabled('debug')) console.debug(line('debug', message));
    },
    info(message) {
      if (enabled('info')) console.info(line('info', message));
    },
    warn(message) {
      if (enabled('warn')) console.warn(line('warn', message));
    },
    error(message) {
      if (enabled('error')) console.error(line('error', message));
    },
    fatal(message) {
      if (enabled('fatal')) console.error(line('fatal', message));
    },
  };
}

export function isLogLevel(value: string): value is LogLevel {
  return LEVELS.some((level) => level === value);
}

/** Masks the token query parameter so credentials never reach a log line. */
export function redactToken(url: string): string {
  return url.replace(/([?&]token=)[^&]*/g, '$1***');
}
