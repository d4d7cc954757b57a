/**
 * Logger Utility
 * Structured logging with pino, always on stderr so the stdio transport
 * keeps stdout for protocol messages.
 */

import pino from 'pino';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Get log level from environment variable
 */
function getLogLevel(): LogLevel {
  const level = process.env.LOG_LEVEL?.toLowerCase();
  if (level && isLogLevel(level)) {
    return level;
  }
  return 'info';
}

function isDevelopment(): boolean {
  return process.env.NODE_ENV === 'development';
}

function createRootLogger(): pino.Logger {
  const level = getLogLevel();

  if (isDevelopment()) {
    return pino({
      level,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
          destination: 2,
        },
      },
    });
  }

  return pino({ level }, pino.destination(2));
}

/**
 * Default logger instance
 * Uses pino-pretty in development, JSON otherwise
 */
export const logger = createRootLogger();

/**
 * Create a child logger with a specific component name
 */
export function createLogger(component: string): pino.Logger {
  return logger.child({ component });
}

/**
 * Pre-configured loggers for common components
 */
export const mcpLogger = createLogger('mcp');
export const httpLogger = createLogger('http');
export const cliLogger = createLogger('cli');
export const priorityLogger = createLogger('priority');
export const searchLogger = createLogger('search');
export const updaterLogger = createLogger('updater');
