import type { Command } from 'commander';

import { registerOperationCommand } from '@/commands/shared/operationContext.js';
import { focusWorkspace, moveToWorkspace, moveWorkspaceToOutput } from '@/operations/index.js';

/**
 * Register the workspace subcommands.
 *
 * @param program - Commander.js Command instance to register commands on
 */
export function registerWorkspaceCommands(program: Command): void {
  registerOperationCommand(
    program,
    'focus-workspace',
    'Focus a workspace picked by name; a new name renames the last workspace',
    focusWorkspace
  );
  registerOperationCommand(
    program,
    'move-to-workspace',
    'Move the focused window to a picked workspace',
    moveToWorkspace
  );
  registerOperationCommand(
    program,
    'move-workspace-to-output',
    'Move the focused workspace to a picked output',
    moveWorkspaceToOutput
  );
}
