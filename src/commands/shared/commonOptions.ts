import { type Command, Option, type OptionValues } from 'commander';

import { WORKSPACE_DIRS_ENV_VAR } from '@/constants.js';

/**
 * `-j, --json`: print the result as a JSON envelope on stdout.
 *
 * A fresh Option per call; commander keeps state on the instance, so one
 * Option cannot be shared between subcommands.
 */
export function jsonOption(): Option {
  return new Option('-j, --json', 'Output as JSON').default(false);
}

/**
 * `--socket <path>`. Declared on the root program and again on each
 * subcommand, since positional options stop the root from seeing flags
 * written after the subcommand name.
 */
export function socketOption(): Option {
  return new Option('--socket <path>', 'niri IPC socket (default: $NIRI_SOCKET)');
}

/**
 * `--picker <command>`, declared like socketOption().
 */
export function pickerOption(): Option {
  return new Option(
    '--picker <command>',
    'Picker command (default: $NIRI_ACTION_PICKER or "fuzzel --dmenu")'
  );
}

/**
 * `--dirs-file <path>`: workspace directory mapping file for workspace-exec.
 */
export function dirsFileOption(): Option {
  return new Option('--dirs-file <path>', 'Workspace directory mapping file').env(
    WORKSPACE_DIRS_ENV_VAR
  );
}

/**
 * Options of `command` merged over those of its ancestors. A flag given
 * after the subcommand name wins over the same flag given before it.
 */
export function collectOptions<T extends OptionValues>(command: Command): T {
  return { ...command.optsWithGlobals<T>(), ...command.opts<T>() };
}
