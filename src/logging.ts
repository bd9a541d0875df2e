export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

type ConsoleTarget = Pick<Console, 'debug' | 'log' | 'info' | 'warn'>;

const noop = (): void => undefined;

/**
 * Silences the console methods below the given level. Errors are always written.
 */
export function applyLogLevel(level: LogLevel, target: ConsoleTarget = console): void {
  const rank = LOG_LEVELS.indexOf(level);
  if (rank > LOG_LEVELS.indexOf('debug')) {
    target.debug = noop;
  }
  if (rank > LOG_LEVELS.indexOf('info')) {
    target.log = noop;
    target.info = noop;
  }
  if (rank > LOG_LEVELS.indexOf('warn')) {
    target.warn = noop;
  }
}
