/**
 * Logger helpers
 *
 * pino loggers for provisioner components, plus lazy evaluation of log
 * contexts so per-poll debug objects are only built when debug is enabled.
 */

import { pino, type Logger } from 'pino';

type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';
type LogContext = Record<string, unknown>;
type ContextBuilder = () => LogContext;

export const DEFAULT_LOG_LEVEL = process.env.PROVISIONER_LOG_LEVEL ?? 'info';

/**
 * Create a component logger.
 *
 * @example
 * const logger = createLogger('registry-client');
 * logger.warn({ task, status }, 'Registry query failed');
 */
export function createLogger(component: string, level: string = DEFAULT_LOG_LEVEL): Logger {
  return pino({ name: component, level });
}

/**
 * Lazy log helper that only evaluates context when log level is enabled
 *
 * @example
 * // Context only created if debug is enabled
 * lazyLog(logger, 'debug', () => ({ modelId, attempt }), 'Model not listed yet');
 */
export function lazyLog(
  logger: Logger | undefined,
  level: LogLevel,
  contextBuilder: ContextBuilder,
  message: string
): void {
  if (!logger || !logger.isLevelEnabled(level)) {
    return;
  }

  logger[level](contextBuilder(), message);
}
