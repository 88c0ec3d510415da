export { focusContainer } from './focusContainer.js';
export { stealContainer } from './stealContainer.js';
export { focusWorkspace } from './focusWorkspace.js';
export { moveToWorkspace } from './moveToWorkspace.js';
export { moveWorkspaceToOutput } from './moveWorkspaceToOutput.js';
export {
  workspaceExec,
  detachedLauncher,
  type Launcher,
  type LaunchOutcome,
  type WorkspaceExecOptions,
} from './workspaceExec.js';
export { PartialActionError, CommandLaunchError } from './errors.js';
export * from './types.js';
