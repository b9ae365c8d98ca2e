/**
 * Structured JSON logger.
 *
 * Uses Pino so discovery and allocation progress can be piped into any log
 * collector alongside the printed report.
 */

import pino from 'pino';

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

function toLogLevel(value: string | undefined): LogLevel | undefined {
  const normalized = value?.toLowerCase();
  if (normalized === 'debug' || normalized === 'info' || normalized === 'warn' || normalized === 'error') {
    return normalized;
  }
  return undefined;
}

/**
 * Create and configure a Pino logger instance.
 *
 * Reads LOG_LEVEL from environment variable (supports both lowercase and uppercase).
 * Defaults to 'info' if not specified or not one of debug, info, warn, error.
 *
 * @param name - Logger name
 * @param level - Optional log level override
 * @returns Configured Pino logger
 */
export function setupLogger(name: string = 'dh-cost', level?: string): pino.Logger {
  const logLevel: LogLevel = toLogLevel(level) ?? toLogLevel(process.env.LOG_LEVEL) ?? 'info';

  return pino({
    name,
    level: logLevel,
    formatters: {
      level: (label) => ({ level: label.toUpperCase() }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}
