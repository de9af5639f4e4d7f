/**
 * @lapcut/core — structured logging
 *
 * Only the extraction pipeline logs; the codecs themselves are silent and
 * report through thrown errors. Output is pino's JSON on stdout.
 */

import pino from 'pino';
import type { LogLevel } from './config';

export type Logger = pino.Logger;

/**
 * Logger for one pipeline component.
 *
 * Usage:
 *   const log = createLogger('extract', 'debug');
 *   log.debug({ laps: 3 }, 'markers parsed');
 */
export function createLogger(component: string, level: LogLevel = 'warn'): Logger {
  return pino({
    name: 'lapcut',
    level,
    base: { component },
    formatters: {
      level: (label: string) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}
