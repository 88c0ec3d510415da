/**
 * Composable command option types.
 */

/**
 * Base options available to all subcommands.
 */
export interface BaseOptions {
  /** Output as JSON instead of human-readable format */
  json?: boolean;
}

/**
 * Options accepted on the root program and again on each subcommand.
 */
export interface GlobalOptions {
  /** niri socket path (overrides NIRI_SOCKET) */
  socket?: string;
  /** Picker command line (overrides NIRI_ACTION_PICKER) */
  picker?: string;
  /** Enable debug logging */
  debug?: boolean;
}

/** Options for the pick-and-act subcommands */
export type OperationCommandOptions = BaseOptions & GlobalOptions;

/** Options for workspace-exec */
export type WorkspaceExecCommandOptions = BaseOptions &
  GlobalOptions & {
    /** Workspace directory mapping file */
    dirsFile?: string;
  };
