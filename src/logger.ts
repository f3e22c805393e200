import pino from 'pino';

import type { EnvVars } from './config.js';

export type Logger = pino.Logger;

/**
 * Logs go to stderr so `show` and `list` output on stdout stays clean.
 */
export function createLogger(env: Pick<EnvVars, 'LOG_LEVEL' | 'NODE_ENV'>): Logger {
  if (env.NODE_ENV === 'production') {
    return pino({ level: env.LOG_LEVEL }, pino.destination(2));
  }
  return pino({
    level: env.LOG_LEVEL,
    transport: {
      options: {
        colorize: true,
        destination: 2,
      },
      target: 'pino-pretty',
    },
  });
}

export const silentLogger: Logger = pino({ level: 'silent' });
