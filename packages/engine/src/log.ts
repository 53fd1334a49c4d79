import type { LogLevel } from './types.js';

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  silent: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

export function createLogger(scope: string, level: LogLevel = 'warn'): Logger {
  const rank = LEVEL_RANK[level];
  const tag = `[${scope}]`;
  const emit = (min: number, method: 'debug' | 'info' | 'warn') => (message: string, meta?: Record<string, unknown>) => {
    if (rank < min) {
      return;
    }
    if (meta) {
      console[method](`${tag} ${message}`, meta);
    } else {
      console[method](`${tag} ${message}`);
    }
  };
  return {
    debug: emit(LEVEL_RANK.debug, 'debug'),
    info: emit(LEVEL_RANK.info, 'info'),
    warn: emit(LEVEL_RANK.warn, 'warn'),
  };
}
