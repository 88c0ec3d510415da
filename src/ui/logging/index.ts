/**
 * Logging for niri-action.
 *
 * All log output goes to stderr so stdout stays reserved for command
 * results (and --json envelopes). Debug lines are dropped unless
 * `--debug` was passed.
 */

import { getErrorMessage } from '@/utils/errors.js';

export interface Logger {
  debug(message: string): void;
  error(message: string): void;
}

let debugEnabled = false;

/**
 * Turn on debug-level output for every logger.
 */
export function enableDebugLogging(): void {
  debugEnabled = true;
}

/**
 * Create a logger that prefixes every line with its context.
 *
 * @param context - Short module tag, e.g. 'ipc' or 'picker'
 *
 * @example
 * ```typescript
 * const log = createLogger('ipc');
 * log.debug('Connected to /run/user/1000/niri.sock');
 * // [ipc] Connected to /run/user/1000/niri.sock
 * ```
 */
export function createLogger(context: string): Logger {
  const prefix = `[${context}]`;
  return {
    debug: (message) => {
      if (debugEnabled) {
        console.error(`${prefix} ${message}`);
      }
    },
    error: (message) => console.error(`${prefix} ${message}`),
  };
}

/**
 * Log a failed best-effort operation at debug level.
 *
 * @param log - Logger to write to
 * @param operation - What was attempted, e.g. "read workspace dirs file"
 * @param error - Caught value
 */
export function logDebugError(log: Logger, operation: string, error: unknown): void {
  log.debug(`Failed to ${operation}: ${getErrorMessage(error)}`);
}
