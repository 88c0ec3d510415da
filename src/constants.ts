/**
 * Shared constants for niri-action.
 */

/** Environment variable niri exports with the path of its IPC socket. */
export const NIRI_SOCKET_ENV_VAR = 'NIRI_SOCKET';

/** Environment variable overriding the picker command. */
export const PICKER_ENV_VAR = 'NIRI_ACTION_PICKER';

/** Environment variable overriding the workspace directory mapping file. */
export const WORKSPACE_DIRS_ENV_VAR = 'NIRI_ACTION_WORKSPACE_DIRS';

/** Picker invoked when nothing else is configured. */
export const DEFAULT_PICKER_COMMAND = 'fuzzel --dmenu';

/** Directory name under the XDG config home. */
export const CONFIG_DIR_NAME = 'niri-action';

/** File name of the workspace directory mapping inside the config directory. */
export const WORKSPACE_DIRS_FILE_NAME = 'workspace-dirs';

/**
 * Upper bound, in characters, for a single buffered reply frame.
 *
 * Window listings on busy sessions stay far below this.
 */
export const MAX_JSONL_BUFFER_SIZE = 16 * 1024 * 1024;
