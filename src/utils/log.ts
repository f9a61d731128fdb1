/**
 * Structured logging
 *
 * One root pino logger writing to stderr, so CLI output on stdout stays
 * machine-readable. Modules take a named child via createLogger().
 */

import pino, { type Logger } from 'pino';

const root = pino(
  {
    level: process.env.LOG_LEVEL || 'info',
    base: undefined,
    timestamp: pino.stdTimeFunctions.isoTime,
  },
  pino.destination(2)
);

export type { Logger };

export function createLogger(name: string): Logger {
  return root.child({ module: name });
}
