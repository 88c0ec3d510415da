/**
 * Dispatcher-level errors.
 */

/**
 * The daemon refused a request, or answered an action with data.
 *
 * Carries either the daemon's own error text or a description of the
 * unexpected payload.
 */
export class UnhandledError extends Error {
  readonly detail: string;

  constructor(detail: string) {
    super(`Not handled: ${detail}`);
    this.name = 'UnhandledError';
    this.detail = detail;
  }
}
