/**
 * Root pino logger.
 *
 * - LOG_LEVEL overrides the level; tests default to silent
 * - LOG_PRETTY=true routes through pino-pretty for local runs
 * - createLogger(module) tags every line with the owning module
 */

import pino from 'pino';
import type { Logger } from 'pino';

const NODE_ENV = process.env.NODE_ENV || 'development';
const IS_TEST = NODE_ENV === 'test' || process.env.VITEST !== undefined;

function defaultLevel(): string {
  if (IS_TEST) return 'silent';
  return NODE_ENV === 'production' ? 'info' : 'debug';
}

const LOG_LEVEL = process.env.LOG_LEVEL || defaultLevel();
const LOG_PRETTY = process.env.LOG_PRETTY === 'true';

const baseLoggerOptions: pino.LoggerOptions = {
  level: LOG_LEVEL,
  base: {
    env: NODE_ENV,
    service: 'position-scheduler',
  },
  timestamp: pino.stdTimeFunctions.isoTime,
};

export const logger: Logger = LOG_PRETTY
  ? pino({
      ...baseLoggerOptions,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname,env,service',
        },
      },
    })
  : pino(baseLoggerOptions);

/**
 * Create a tagged logger for a specific module.
 *
 *   const log = createLogger('FixScheduler');
 *   log.info({ requestId }, 'Fix request submitted');
 */
export function createLogger(module: string, parent: Logger = logger): Logger {
  return parent.child({ module });
}

/**
 * Safely extract an error message from an unknown catch value.
 */
export function getErrorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === 'string') return err;
  return String(err);
}

export type { Logger };
