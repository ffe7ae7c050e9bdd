import pino from 'pino';
import type { Logger } from 'pino';
import { z } from 'zod';

const LogLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

export type LogLevel = z.infer<typeof LogLevelSchema>;

/**
 * Resolve the log level from the environment.
 * Tests run silent unless LOG_LEVEL says otherwise.
 */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const parsed = LogLevelSchema.safeParse(env.LOG_LEVEL?.toLowerCase());
  if (parsed.success) {
    return parsed.data;
  }
  return env.NODE_ENV === 'test' ? 'silent' : 'info';
}

/**
 * Create logger instance writing JSON lines to stderr.
 * stdout stays reserved for the report.
 */
function createLogger(): Logger {
  return pino(
    {
      level: resolveLogLevel(),
      base: {
        env: process.env.NODE_ENV || 'development',
        service: 'time-usage',
      },
      formatters: {
        level: (label) => {
          return { level: label };
        },
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.destination(2)
  );
}

/**
 * Main logger instance
 */
export const logger = createLogger();

/**
 * Create a child logger with additional context
 */
export function createChildLogger(additionalContext: Record<string, unknown>): Logger {
  return logger.child(additionalContext);
}
