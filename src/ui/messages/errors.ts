/**
 * Common error messages and suggestions.
 */

import { NIRI_SOCKET_ENV_VAR } from '@/constants.js';
import type { ErrorMetadata } from '@/ui/errors/index.js';
import { joinLines } from '@/ui/formatting.js';

/**
 * Suggestion shown when the niri socket cannot be reached.
 */
export function niriUnreachableContext(): ErrorMetadata {
  return {
    suggestions: [
      'Check that niri is running',
      `Check ${NIRI_SOCKET_ENV_VAR}, or pass --socket <path>`,
    ],
  };
}

/**
 * Render an error with its metadata for stderr.
 *
 * @example
 * ```typescript
 * formatErrorText('NIRI_SOCKET is not set', { suggestion: 'Pass --socket <path>' });
 * // 'Error: NIRI_SOCKET is not set\n  Suggestion: Pass --socket <path>'
 * ```
 */
export function formatErrorText(message: string, context: ErrorMetadata = {}): string {
  return joinLines(
    `Error: ${message}`,
    context.suggestion !== undefined && `  Suggestion: ${context.suggestion}`,
    ...(context.suggestions ?? []).map((suggestion) => `  Suggestion: ${suggestion}`),
    context.note !== undefined && `  Note: ${context.note}`
  );
}
