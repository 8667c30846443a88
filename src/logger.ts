/**
 * Structured logging
 *
 * JSON lines on stderr so that stdout stays free for CLI output.
 * Level comes from LOG_LEVEL (default: info; 'silent' disables logging).
 */

import pino, { type Logger } from 'pino';

const baseLogger: Logger = pino(
  {
    name: 'bulk-mail-verifier',
    level: process.env.LOG_LEVEL ?? 'info',
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  },
  pino.destination(2)
);

/**
 * Creates a child logger tagged with the module name
 */
export function createLogger(module: string, parent: Logger = baseLogger): Logger {
  return parent.child({ module });
}

export { baseLogger as logger };
