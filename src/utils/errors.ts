/**
 * Error message helpers.
 */

/**
 * Extract a printable message from any thrown value.
 *
 * @param error - Caught value of unknown type
 * @returns Error message for Error instances, String(value) otherwise
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
