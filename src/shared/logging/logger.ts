/**
 * Logger Configuration
 *
 * Configures the pino logger with environment-aware formatting:
 * - Production: JSON output for log aggregation
 * - Development: Pretty-printed colorized output through pino-pretty
 * - Test: silent unless LOG_LEVEL is set explicitly
 *
 * Usage:
 *   import { createComponentLogger } from './logger';
 *   const log = createComponentLogger('selector');
 *   log.info({ variant: 'backend' }, 'Content selected');
 */

import pino, { Logger, LoggerOptions } from 'pino';

// =============================================================================
// Configuration
// =============================================================================

const NODE_ENV = process.env.NODE_ENV || 'development';
const IS_DEVELOPMENT = NODE_ENV === 'development';
const IS_TEST = NODE_ENV === 'test';

function resolveLogLevel(): string {
  if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
  if (IS_TEST) return 'silent';
  return IS_DEVELOPMENT ? 'debug' : 'info';
}

/**
 * Base logger options shared across environments
 */
const baseOptions: LoggerOptions = {
  level: resolveLogLevel(),
  base: {
    pid: process.pid,
    env: NODE_ENV,
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  // Prompts and keys never reach the log
  redact: {
    paths: [
      'apiKey',
      'prompt',
      '*.apiKey',
      '*.prompt',
    ],
    remove: true,
  },
};

const developmentOptions: LoggerOptions = {
  ...baseOptions,
  transport: {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'SYS:HH:MM:ss.l',
      ignore: 'pid,hostname,env',
      messageFormat: '{msg}',
    },
  },
};

const productionOptions: LoggerOptions = {
  ...baseOptions,
  formatters: {
    level: (label) => ({ level: label }),
  },
};

// =============================================================================
// Logger Instance
// =============================================================================

/**
 * Root application logger
 */
export const logger: Logger = pino(
  IS_DEVELOPMENT ? developmentOptions : productionOptions
);

/**
 * Create a child logger for a specific component/module
 *
 * @example
 * const judgeLogger = createComponentLogger('judge');
 * judgeLogger.debug({ candidates: 3 }, 'Scoring candidates');
 */
export function createComponentLogger(component: string): Logger {
  return logger.child({ component });
}

/**
 * Create a child logger scoped to one generation run
 */
export function createRunLogger(runId: string, variant: string): Logger {
  return logger.child({ component: 'orchestrator', runId, variant });
}

export default logger;
