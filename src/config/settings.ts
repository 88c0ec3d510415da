/**
 * Settings resolution: command-line flag, then environment, then default.
 */

import * as os from 'os';
import * as path from 'path';

import {
  CONFIG_DIR_NAME,
  DEFAULT_PICKER_COMMAND,
  NIRI_SOCKET_ENV_VAR,
  PICKER_ENV_VAR,
  WORKSPACE_DIRS_ENV_VAR,
  WORKSPACE_DIRS_FILE_NAME,
} from '@/constants.js';
import { CommandError } from '@/ui/errors/index.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';

type Environment = Readonly<Record<string, string | undefined>>;

function nonEmpty(value: string | undefined): string | undefined {
  return value !== undefined && value.trim() !== '' ? value : undefined;
}

/**
 * Path of the niri IPC socket.
 *
 * @throws CommandError if neither --socket nor NIRI_SOCKET is set
 */
export function resolveSocketPath(flag: string | undefined, env: Environment = process.env): string {
  const socketPath = nonEmpty(flag) ?? nonEmpty(env[NIRI_SOCKET_ENV_VAR]);
  if (!socketPath) {
    throw new CommandError(
      `${NIRI_SOCKET_ENV_VAR} is not set`,
      {
        suggestion: `Run inside a niri session, or pass --socket <path>`,
      },
      EXIT_CODES.RESOURCE_NOT_FOUND
    );
  }
  return socketPath;
}

/**
 * Picker command string.
 */
export function resolvePickerCommand(
  flag: string | undefined,
  env: Environment = process.env
): string {
  return nonEmpty(flag) ?? nonEmpty(env[PICKER_ENV_VAR]) ?? DEFAULT_PICKER_COMMAND;
}

/**
 * Location of the workspace directory mapping file.
 *
 * Falls back to $XDG_CONFIG_HOME/niri-action/workspace-dirs, then
 * ~/.config/niri-action/workspace-dirs.
 */
export function resolveWorkspaceDirsPath(
  flag: string | undefined,
  env: Environment = process.env,
  homeDir: string = os.homedir()
): string {
  const explicit = nonEmpty(flag) ?? nonEmpty(env[WORKSPACE_DIRS_ENV_VAR]);
  if (explicit) {
    return explicit;
  }
  const configHome = nonEmpty(env['XDG_CONFIG_HOME']) ?? path.join(homeDir, '.config');
  return path.join(configHome, CONFIG_DIR_NAME, WORKSPACE_DIRS_FILE_NAME);
}
