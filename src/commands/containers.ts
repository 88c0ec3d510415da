import type { Command } from 'commander';

import { registerOperationCommand } from '@/commands/shared/operationContext.js';
import { focusContainer, stealContainer } from '@/operations/index.js';

/**
 * Register focus-container and steal-container.
 *
 * @param program - Commander.js Command instance to register commands on
 */
export function registerContainerCommands(program: Command): void {
  registerOperationCommand(
    program,
    'focus-container',
    'Focus a window picked by title',
    focusContainer
  );
  registerOperationCommand(
    program,
    'steal-container',
    'Move a picked window into the current workspace',
    stealContainer
  );
}
