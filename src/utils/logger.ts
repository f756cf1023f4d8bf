/**
 * @file Shared pino logger.
 *
 * Level comes from LOG_LEVEL (tests run with 'silent'). Components take a
 * child logger so every line carries a `component` binding.
 */

import pino, { type Logger } from 'pino';

export type { Logger };

export const logger: Logger = pino({
  name: 'affect-fusion-core',
  level: process.env.LOG_LEVEL || 'info',
  base: { service: 'affect-fusion-core' },
  timestamp: pino.stdTimeFunctions.isoTime,
  formatters: {
    level: (label) => ({ level: label }),
  },
});

export function createLogger(component: string): Logger {
  return logger.child({ component });
}
