import type { Logger } from 'pino';
import { pino } from 'pino';

export type { Logger };

const levels = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

/**
 * Creates the logger used when a registry build or an execution is not handed
 * one. The level is read from `LOG_LEVEL` and defaults to `silent`.
 */
export function createLogger(level = process.env.LOG_LEVEL): Logger {
  if (level !== undefined && !levels.includes(level)) {
    throw new Error(
      `Invalid LOG_LEVEL "${level}". Must be one of: ${levels.join(', ')}`,
    );
  }
  return pino({ name: 'typegraph-executor', level: level ?? 'silent' });
}

let defaultLogger: Logger | undefined;

export function getDefaultLogger(): Logger {
  return (defaultLogger ??= createLogger());
}
