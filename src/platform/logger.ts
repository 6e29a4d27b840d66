/**
 * Structured logging with pino.
 *
 * Logs go to stderr as JSON lines so that stdout stays free for CLI output.
 * The level comes from LOG_LEVEL; an unknown level falls back to `info`.
 */

import { pino, destination, stdTimeFunctions, type Logger } from 'pino';
import { resolveLogLevel } from '../core/config.js';

export type { Logger };

export const logger: Logger = pino(
  {
    name: 'killfeed',
    level: resolveLogLevel(),
    formatters: {
      level: (label) => ({ level: label })
    },
    timestamp: stdTimeFunctions.isoTime
  },
  destination(2)
);

export function createLogger(component: string): Logger {
  return logger.child({ component });
}
