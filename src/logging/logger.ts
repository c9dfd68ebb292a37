/**
 * Logger
 *
 * Pino logger writing JSON lines to stderr. Stdout is reserved for CLI
 * output and the MCP stdio transport, so nothing here may write to it.
 *
 * Level comes from LOG_LEVEL (default: info).
 */

import pino from 'pino';

const LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

type LogLevel = (typeof LEVELS)[number];

function resolveLevel(): LogLevel {
  const env = process.env['LOG_LEVEL']?.toLowerCase();
  return LEVELS.find((level) => level === env) ?? 'info';
}

export const logger = pino(
  {
    name: 'ticket-pulse',
    level: resolveLevel(),
    base: undefined,
    timestamp: pino.stdTimeFunctions.isoTime,
  },
  pino.destination(2)
);

export type Logger = pino.Logger;

/** Child logger bound to a module name. */
export function moduleLogger(module: string): Logger {
  return logger.child({ module });
}
