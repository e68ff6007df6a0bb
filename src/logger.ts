/**
 * Logging for the Surge SDK
 */

import pino from 'pino';
import type { Logger } from 'pino';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = typeof LOG_LEVELS[number];

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

// Unknown levels are left for loadConfig to report
const envLevel = process.env.SURGE_LOG_LEVEL?.trim();

const rootLogger = pino({
  name: 'surge',
  level: isLogLevel(envLevel) ? envLevel : 'info',
});

// Children copy the level at creation, so keep them for setLogLevel
const moduleLoggers: Logger[] = [];

/**
 * Get a child logger tagged with a module name
 */
export function createLogger(module: string): Logger {
  const logger = rootLogger.child({ module });
  moduleLoggers.push(logger);
  return logger;
}

/**
 * Change the level of every SDK logger
 */
export function setLogLevel(level: LogLevel): void {
  rootLogger.level = level;
  for (const logger of moduleLoggers) {
    logger.level = level;
  }
}
