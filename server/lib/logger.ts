import pino from 'pino';
import { RulesEngineError } from '../services/ruleErrors';

/**
 * Structured Logger Configuration
 *
 * Uses pino for JSON logging in production and pino-pretty for
 * human-readable output in development. Silent under test.
 *
 * Log Levels:
 * - fatal: System is unusable
 * - error: Error conditions
 * - warn: Warning conditions
 * - info: Normal operational messages
 * - debug: Debugging messages
 * - trace: Fine-grained debugging
 */

const isDevelopment = process.env.NODE_ENV !== 'production';
const isTest = process.env.NODE_ENV === 'test';

const logLevel = process.env.LOG_LEVEL || (isDevelopment ? 'debug' : 'info');

const transport = isDevelopment && !isTest
  ? {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss.l',
        ignore: 'pid,hostname',
        singleLine: false,
      },
    }
  : undefined;

export const logger = pino({
  level: isTest ? 'silent' : logLevel,
  transport,
  base: {
    env: process.env.NODE_ENV,
  },
  formatters: {
    level: (label) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
});

export type Logger = pino.Logger;

/**
 * Create a child logger with additional context
 *
 * @example
 * const rulesLogger = createLogger({ module: 'rules' });
 * rulesLogger.info({ ruleCount: 7 }, 'Rule set loaded');
 */
export function createLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}

/**
 * Pre-configured loggers for common modules
 */
export const loggers = {
  rules: createLogger({ module: 'rules' }),
  engine: createLogger({ module: 'engine' }),
  llm: createLogger({ module: 'llm' }),
  api: createLogger({ module: 'api' }),
  config: createLogger({ module: 'config' }),
};

/**
 * Log an error with its stack. Rules engine errors also contribute their
 * code, rule id and formula so failures can be traced to the rule.
 */
export function logError(
  loggerInstance: Logger,
  error: unknown,
  message: string,
  context?: Record<string, unknown>
): void {
  const err = error instanceof Error ? error : new Error(String(error));
  const ruleContext = err instanceof RulesEngineError
    ? {
        code: err.code,
        ...(err.ruleId !== undefined ? { ruleId: err.ruleId } : {}),
        ...(err.formula !== undefined ? { formula: err.formula } : {}),
      }
    : {};

  loggerInstance.error(
    {
      err: {
        message: err.message,
        stack: err.stack,
        name: err.name,
      },
      ...ruleContext,
      ...context,
    },
    message
  );
}

/**
 * Performance timing helper
 */
export function logTiming(
  loggerInstance: Logger,
  operation: string,
  startTime: number,
  context?: Record<string, unknown>
): void {
  const duration = Date.now() - startTime;
  loggerInstance.info(
    {
      operation,
      durationMs: duration,
      ...context,
    },
    `${operation} completed in ${duration}ms`
  );
}

export default logger;
