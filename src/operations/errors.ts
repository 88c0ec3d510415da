/**
 * Operation errors.
 */

import type { Action } from '@/ipc/protocol/messages.js';
import { CommandError } from '@/ui/errors/index.js';
import { getErrorMessage } from '@/utils/errors.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';

/**
 * A two-step operation stopped after its first step.
 *
 * niri offers no transactions, so the applied steps stay applied. For the
 * focus-then-rename case the workspace is focused and keeps its old name.
 */
export class PartialActionError extends CommandError {
  readonly completedActions: readonly Action[];
  readonly failedAction: Action;
  readonly failure: unknown;

  constructor(
    summary: string,
    completedActions: readonly Action[],
    failedAction: Action,
    failure: unknown
  ) {
    super(
      `${summary}: ${getErrorMessage(failure)}`,
      { note: `Applied: ${completedActions.map((action) => action.type).join(', ')}` },
      EXIT_CODES.PARTIAL_ACTION
    );
    this.name = 'PartialActionError';
    this.completedActions = completedActions;
    this.failedAction = failedAction;
    this.failure = failure;
  }
}

/**
 * The command handed to workspace-exec could not be started.
 */
export class CommandLaunchError extends CommandError {
  constructor(command: string, detail: string) {
    super(`Failed to launch "${command}": ${detail}`, {}, EXIT_CODES.COMMAND_LAUNCH_FAILURE);
    this.name = 'CommandLaunchError';
  }
}
