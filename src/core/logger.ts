/**
 * core/logger.ts
 *
 * Singleton pino logger. Every module does:
 *     const log = scopedLogger('elevation/privilege_broker');
 *
 * Child loggers are scoped with a `module` field so logs
 * can be filtered per-module.
 */

import pino from 'pino';
import { LogLevel } from './types';

let instance: pino.Logger | null = null;

export function initLogger(config: { logLevel?: LogLevel }): pino.Logger {
  instance = pino({
    level: config.logLevel ?? 'info'
  });
  return instance;
}

export function getLogger(): pino.Logger {
  if (!instance) {
    // Fallback for early imports before initLogger is called
    instance = pino({ level: process.env.LOG_LEVEL ?? 'info' });
  }
  return instance;
}

/**
 * Returns a child logger scoped to a specific module.
 * Child loggers created before initLogger() keep the fallback level.
 */
export function scopedLogger(moduleName: string): pino.Logger {
  return getLogger().child({ module: moduleName });
}
