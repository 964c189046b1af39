/**
 * Structured logging API.
 *
 * Thin wrapper over a shared pino logger so that every module logs with the
 * same field conventions. Outside production the pino-pretty transport is
 * used for readable output.
 *
 * Environment:
 * - PATHWALK_LOG_LEVEL: trace, debug, info, warn, error, silent (default: info)
 * - PATHWALK_ENV: development, test, production
 */

import { type Logger, type LoggerOptions, pino } from 'pino';

/**
 * Structured logging fields.
 *
 * All fields are optional. Common fields include:
 * - component: Component/subsystem identifier (e.g., "resolver", "site")
 * - operation: Operation being performed (e.g., "bind_arguments")
 * - resource: Name of the resource being traversed
 * - segment: Path segment under consideration
 * - error_message: Error message for error logs
 * - duration_ms: Execution duration for timed operations
 */
export interface LogFields {
  [key: string]: string | number | boolean | null | undefined;
}

/** Levels accepted by the logging API. */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

function buildRootLogger(): Logger {
  const env = process.env.PATHWALK_ENV;
  const options: LoggerOptions = {
    name: 'pathwalk',
    level: process.env.PATHWALK_LOG_LEVEL ?? 'info',
  };

  if (env !== 'production' && env !== 'test') {
    options.transport = {
      target: 'pino-pretty',
      options: { colorize: true },
    };
  }

  return pino(options);
}

let rootLogger: Logger | null = null;

/**
 * Get the shared pino logger, creating it on first use.
 */
export function getRootLogger(): Logger {
  if (!rootLogger) {
    rootLogger = buildRootLogger();
  }
  return rootLogger;
}

/**
 * Replace the shared pino logger.
 *
 * Useful for embedding applications that already own a pino instance, and
 * for tests that want to capture output.
 */
export function setRootLogger(logger: Logger): void {
  rootLogger = logger;
}

function compactFields(fields?: LogFields): Record<string, string | number | boolean | null> {
  const result: Record<string, string | number | boolean | null> = {};
  if (!fields) {
    return result;
  }
  for (const [key, value] of Object.entries(fields)) {
    if (value !== undefined) {
      result[key] = value;
    }
  }
  return result;
}

function write(level: LogLevel, message: string, fields?: LogFields): void {
  getRootLogger()[level](compactFields(fields), message);
}

/**
 * Log an ERROR level message with structured fields.
 *
 * Use this for application errors that escape a page body.
 *
 * @example
 * logError('Page body failed', {
 *   component: 'site',
 *   error_message: 'connection refused',
 * });
 */
export function logError(message: string, fields?: LogFields): void {
  write('error', message, fields);
}

/**
 * Log a WARN level message with structured fields.
 */
export function logWarn(message: string, fields?: LogFields): void {
  write('warn', message, fields);
}

/**
 * Log an INFO level message with structured fields.
 */
export function logInfo(message: string, fields?: LogFields): void {
  write('info', message, fields);
}

/**
 * Log a DEBUG level message with structured fields.
 *
 * Misses and binding failures are logged at this level: they are expected
 * traffic, not faults.
 */
export function logDebug(message: string, fields?: LogFields): void {
  write('debug', message, fields);
}

/**
 * Log a TRACE level message with structured fields.
 */
export function logTrace(message: string, fields?: LogFields): void {
  write('trace', message, fields);
}

/**
 * Component logger returned by {@link createLogger}.
 */
export interface ComponentLogger {
  error(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  debug(message: string, fields?: LogFields): void;
  trace(message: string, fields?: LogFields): void;
}

/**
 * Create a logger with preset fields.
 *
 * @example
 * const logger = createLogger({ component: 'resolver' });
 * logger.debug('Segment not matched', { segment: 'abc' });
 * // Logs: { component: 'resolver', segment: 'abc' }
 */
export function createLogger(defaultFields: LogFields): ComponentLogger {
  const mergeFields = (fields?: LogFields): LogFields => ({
    ...defaultFields,
    ...fields,
  });

  return {
    error: (message, fields) => logError(message, mergeFields(fields)),
    warn: (message, fields) => logWarn(message, mergeFields(fields)),
    info: (message, fields) => logInfo(message, mergeFields(fields)),
    debug: (message, fields) => logDebug(message, mergeFields(fields)),
    trace: (message, fields) => logTrace(message, mergeFields(fields)),
  };
}
