/**
 * Command execution wrapper.
 *
 * Every subcommand runs its handler through runCommand so output and exit
 * codes look the same everywhere: results go to stdout (text or a JSON
 * envelope), errors to stderr (or a JSON envelope on stdout with --json),
 * and the exit code is set from the error's semantic code.
 */

import type { BaseOptions } from '@/commands/shared/optionTypes.js';
import type { ErrorMetadata } from '@/ui/errors/index.js';
import { CommandError } from '@/ui/errors/index.js';
import { createLogger } from '@/ui/logging/index.js';
import { formatErrorText, niriUnreachableContext } from '@/ui/messages/errors.js';
import { buildErrorResponse, buildSuccessResponse } from '@/ui/OutputBuilder.js';
import { getExitCodeForError, isNiriUnreachableError } from '@/utils/errorMapping.js';
import { getErrorMessage } from '@/utils/errors.js';

const log = createLogger('niri-action');

export type CommandResult<T> =
  | { success: true; data: T }
  | { success: false; error: string; exitCode: number; errorContext?: ErrorMetadata };

export type CommandHandler<TOptions, TResult> = (options: TOptions) => Promise<CommandResult<TResult>>;

function errorToResult(error: unknown): CommandResult<never> {
  if (error instanceof Error && error.stack) {
    log.debug(error.stack);
  }

  let errorContext: ErrorMetadata | undefined;
  if (error instanceof CommandError) {
    errorContext = error.metadata;
  } else if (isNiriUnreachableError(error)) {
    errorContext = niriUnreachableContext();
  }

  return {
    success: false,
    error: getErrorMessage(error),
    exitCode: getExitCodeForError(error),
    ...(errorContext && { errorContext }),
  };
}

/**
 * Run a command handler and report its result.
 *
 * @param handler - Command logic; may return a failure result or throw
 * @param options - Parsed command options (`json` selects JSON output)
 * @param formatter - Turns result data into text; empty text prints nothing
 *
 * @example
 * ```typescript
 * await runCommand(
 *   async () => ({ success: true, data: await focusContainer(context) }),
 *   options,
 *   formatOperationOutcome
 * );
 * ```
 */
export async function runCommand<TOptions extends BaseOptions, TResult>(
  handler: CommandHandler<TOptions, TResult>,
  options: TOptions,
  formatter?: (data: TResult) => string
): Promise<void> {
  let result: CommandResult<TResult>;
  try {
    result = await handler(options);
  } catch (error: unknown) {
    result = errorToResult(error);
  }

  if (result.success) {
    if (options.json) {
      console.log(JSON.stringify(buildSuccessResponse(result.data), null, 2));
      return;
    }
    const text = formatter ? formatter(result.data) : '';
    if (text) {
      console.log(text);
    }
    return;
  }

  if (options.json) {
    console.log(
      JSON.stringify(buildErrorResponse(result.error, result.exitCode, result.errorContext), null, 2)
    );
  } else {
    console.error(formatErrorText(result.error, result.errorContext));
  }
  process.exitCode = result.exitCode;
}
