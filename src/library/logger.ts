import type { LogLevel } from '../types.js';
import { theme } from './ui.js';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

/**
 * Console logger with a level threshold. Messages go through the theme so
 * they line up with spinner and progress output.
 */
export function createLogger(options: { level?: LogLevel } = {}): Logger {
  const threshold = LEVEL_ORDER[options.level ?? 'info'];
  const enabled = (level: LogLevel) => LEVEL_ORDER[level] >= threshold;

  return {
    debug(message) {
      if (enabled('debug')) console.log(`  ${theme.bullet} ${theme.dim(message)}`);
    },
    info(message) {
      if (enabled('info')) console.log(`  ${theme.info} ${message}`);
    },
    warn(message) {
      if (enabled('warn')) console.warn(`  ${theme.warn} ${theme.warning(message)}`);
    },
    error(message) {
      if (enabled('error')) console.error(`  ${theme.cross} ${theme.error(message)}`);
    },
  };
}

export const silentLogger: Logger = createLogger({ level: 'silent' });
