/**
 * Session and picker setup shared by the pick-and-act subcommands.
 */

import type { Command } from 'commander';

import { runCommand } from '@/commands/shared/CommandRunner.js';
import {
  collectOptions,
  jsonOption,
  pickerOption,
  socketOption,
} from '@/commands/shared/commonOptions.js';
import type { GlobalOptions, OperationCommandOptions } from '@/commands/shared/optionTypes.js';
import { resolvePickerCommand, resolveSocketPath } from '@/config/settings.js';
import { NiriClient, withSession } from '@/ipc/index.js';
import type { OperationContext, OperationOutcome } from '@/operations/index.js';
import { createProcessPicker, parsePickerCommand } from '@/picker/index.js';
import { formatOperationOutcome } from '@/ui/formatters/outcome.js';

/**
 * Connect to niri, build the picker, and run `fn` with both. The session is
 * closed when `fn` settles.
 */
export async function withOperationContext<T>(
  globals: GlobalOptions,
  fn: (context: OperationContext) => Promise<T>
): Promise<T> {
  const socketPath = resolveSocketPath(globals.socket);
  const pick = createProcessPicker(parsePickerCommand(resolvePickerCommand(globals.picker)));
  return withSession(socketPath, (session) => fn({ client: new NiriClient(session), pick }));
}

/**
 * Register a subcommand that runs one pick-and-act operation.
 *
 * @param program - Root program
 * @param name - Subcommand name, e.g. 'focus-container'
 * @param description - Help text
 * @param operation - Operation to run against the invocation's context
 */
export function registerOperationCommand(
  program: Command,
  name: string,
  description: string,
  operation: (context: OperationContext) => Promise<OperationOutcome>
): void {
  program
    .command(name)
    .description(description)
    .addOption(socketOption())
    .addOption(pickerOption())
    .addOption(jsonOption())
    .action(async (_options: OperationCommandOptions, command: Command) => {
      const options = collectOptions<OperationCommandOptions>(command);
      await runCommand<OperationCommandOptions, OperationOutcome>(
        async (opts) => ({ success: true, data: await withOperationContext(opts, operation) }),
        options,
        formatOperationOutcome
      );
    });
}
