/**
 * Centralized error-to-exit code mapping.
 *
 * Single source of truth for turning anything thrown below a command
 * handler into a semantic exit code.
 */

import { UnhandledError } from '@/ipc/errors.js';
import {
  IPCBusyError,
  IPCConnectionError,
  IPCEarlyCloseError,
  IPCParseError,
} from '@/ipc/transport/IPCError.js';
import { JSONLBufferOverflowError } from '@/ipc/transport/jsonl.js';
import { CommandError } from '@/ui/errors/index.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';

/**
 * Map an error to its exit code.
 *
 * @example
 * ```typescript
 * getExitCodeForError(new UnhandledError('workspace not found')); // 106
 * getExitCodeForError(new TypeError('oops')); // 110
 * ```
 */
export function getExitCodeForError(error: unknown): number {
  if (error instanceof CommandError) {
    return error.exitCode;
  }

  if (error instanceof IPCConnectionError || error instanceof IPCEarlyCloseError) {
    return EXIT_CODES.IPC_CONNECTION_FAILURE;
  }

  if (
    error instanceof UnhandledError ||
    error instanceof IPCParseError ||
    error instanceof IPCBusyError ||
    error instanceof JSONLBufferOverflowError
  ) {
    return EXIT_CODES.IPC_PROTOCOL_ERROR;
  }

  return EXIT_CODES.SOFTWARE_ERROR;
}

/**
 * Check whether an error means niri could not be reached at all.
 */
export function isNiriUnreachableError(error: unknown): boolean {
  return error instanceof IPCConnectionError || error instanceof IPCEarlyCloseError;
}
