/**
 * Semantic exit codes.
 *
 * Exit codes follow semantic ranges so key bindings and scripts can react:
 * - **0**: Success (including a cancelled pick)
 * - **1**: Generic failure
 * - **80-99**: User errors (invalid input, missing configuration)
 * - **100-119**: Software errors (IPC, picker, invariant violations)
 */

/**
 * Exit code constants following semantic ranges.
 */
export const EXIT_CODES = {
  SUCCESS: 0,
  GENERIC_FAILURE: 1,
  INVALID_ARGUMENTS: 81,
  RESOURCE_NOT_FOUND: 83,
  INVALID_SELECTION: 88,
  IPC_CONNECTION_FAILURE: 101,
  IPC_PROTOCOL_ERROR: 106,
  PICKER_FAILURE: 107,
  INVARIANT_VIOLATION: 108,
  PARTIAL_ACTION: 109,
  SOFTWARE_ERROR: 110,
  COMMAND_LAUNCH_FAILURE: 111,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/**
 * Exit code registry entry with code, name, and description.
 */
interface ExitCodeEntry {
  readonly code: ExitCode;
  readonly name: keyof typeof EXIT_CODES;
  readonly description: string;
}

/**
 * Exit code registry, printed in the CLI's help footer.
 */
export const EXIT_CODE_REGISTRY: readonly ExitCodeEntry[] = [
  { code: EXIT_CODES.SUCCESS, name: 'SUCCESS', description: 'Action issued, or pick cancelled' },
  { code: EXIT_CODES.GENERIC_FAILURE, name: 'GENERIC_FAILURE', description: 'Generic failure' },
  {
    code: EXIT_CODES.INVALID_ARGUMENTS,
    name: 'INVALID_ARGUMENTS',
    description: 'Invalid command-line arguments or options',
  },
  {
    code: EXIT_CODES.RESOURCE_NOT_FOUND,
    name: 'RESOURCE_NOT_FOUND',
    description: 'niri socket not configured',
  },
  {
    code: EXIT_CODES.INVALID_SELECTION,
    name: 'INVALID_SELECTION',
    description: 'Picked line does not name a listed entity',
  },
  {
    code: EXIT_CODES.IPC_CONNECTION_FAILURE,
    name: 'IPC_CONNECTION_FAILURE',
    description: 'Could not reach the niri socket, or it closed mid-exchange',
  },
  {
    code: EXIT_CODES.IPC_PROTOCOL_ERROR,
    name: 'IPC_PROTOCOL_ERROR',
    description: 'niri rejected a request or replied with an unexpected payload',
  },
  {
    code: EXIT_CODES.PICKER_FAILURE,
    name: 'PICKER_FAILURE',
    description: 'Picker could not be started',
  },
  {
    code: EXIT_CODES.INVARIANT_VIOLATION,
    name: 'INVARIANT_VIOLATION',
    description: 'Session state lacks a workspace that must exist',
  },
  {
    code: EXIT_CODES.PARTIAL_ACTION,
    name: 'PARTIAL_ACTION',
    description: 'First step of a two-step action applied, second failed',
  },
  {
    code: EXIT_CODES.SOFTWARE_ERROR,
    name: 'SOFTWARE_ERROR',
    description: 'Unexpected internal error',
  },
  {
    code: EXIT_CODES.COMMAND_LAUNCH_FAILURE,
    name: 'COMMAND_LAUNCH_FAILURE',
    description: 'workspace-exec could not start the command',
  },
];
