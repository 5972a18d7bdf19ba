/**
 * Shared winston logger.
 *
 * Every module takes a child logger tagged with its module name and logs
 * structured metadata alongside the message. Everything goes to stderr;
 * stdout carries only prompts and the final summary.
 */

import { createLogger, format, transports, type Logger } from 'winston';

export const logger = createLogger({
  level: process.env.LOG_LEVEL || 'info',
  format: format.combine(
    format.timestamp(),
    format.json()
  ),
  transports: [
    new transports.Console({
      stderrLevels: ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'],
    })
  ]
});

export function getLogger(module: string): Logger {
  return logger.child({ module });
}

export type { Logger };
