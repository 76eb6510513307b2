import type { Logger, LogLevel } from '../types.ts';

const SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const noop = () => {};

/**
 * Console-backed logger that drops messages below `level`
 *
 * @example
 * const logger = createLogger('warn');
 * logger.info('ignored');
 * logger.warn('printed');
 */
export function createLogger(level: LogLevel = 'info', output: Logger = console): Logger {
  const threshold = SEVERITY[level];
  return {
    debug: threshold <= SEVERITY.debug ? output.debug.bind(output) : noop,
    info: threshold <= SEVERITY.info ? output.info.bind(output) : noop,
    warn: threshold <= SEVERITY.warn ? output.warn.bind(output) : noop,
    error: threshold <= SEVERITY.error ? output.error.bind(output) : noop,
  };
}
