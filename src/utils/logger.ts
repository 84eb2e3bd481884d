import { type LevelWithSilent, type Logger, pino } from 'pino';

/** Name given to the client's default logger. */
export const LOGGER_NAME = 'shipthis-client';

/**
 * Default logger for a client. Silent unless a level is given, since library
 * output belongs to the host application; pass your own pino instance to
 * route it elsewhere.
 */
export function createLogger(level: LevelWithSilent = 'silent'): Logger {
  return pino({ name: LOGGER_NAME, level });
}

export type { Logger };
