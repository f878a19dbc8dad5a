/**
 * Engine Logger
 *
 * Structured logging for the pool engine.
 */

import pino from 'pino';

const level = process.env.LOG_LEVEL ?? 'info';

export const logger = pino({
  name: 'singleton-clmm-engine',
  level,
  formatters: {
    level: (label) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
});

export type Logger = pino.Logger;

/**
 * Create a child logger with a specific component name
 */
export function createLogger(component: string, parent: Logger = logger): Logger {
  return parent.child({ component });
}
