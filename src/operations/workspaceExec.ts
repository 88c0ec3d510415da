/**
 * Launch a command in the focused workspace's directory.
 */

import { spawn } from 'child_process';

import type { WorkspaceDirs } from '@/config/workspaceDirs.js';
import { lookupWorkspaceDir } from '@/config/workspaceDirs.js';
import type { NiriClient } from '@/ipc/client.js';
import { focusedWorkspace } from '@/selection/resolver.js';
import { CommandError } from '@/ui/errors/index.js';
import { createLogger } from '@/ui/logging/index.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';

import { CommandLaunchError } from './errors.js';

const log = createLogger('exec');

/**
 * Starts `program` in `cwd`; resolves once it is running.
 */
export type Launcher = (program: string, args: readonly string[], cwd: string) => Promise<void>;

export interface WorkspaceExecOptions {
  /** Program followed by its arguments */
  command: readonly string[];
  dirs: WorkspaceDirs;
  /** Directory for unnamed or unmapped workspaces */
  defaultDir: string;
  launch?: Launcher;
}

export interface LaunchOutcome {
  status: 'launched';
  command: string[];
  cwd: string;
  workspace: string | null;
}

/**
 * Spawn detached with stdio ignored so the command outlives this process.
 */
export const detachedLauncher: Launcher = (program, args, cwd) =>
  new Promise<void>((resolve, reject) => {
    const child = spawn(program, [...args], { cwd, detached: true, stdio: 'ignore' });
    child.once('error', (error) => {
      reject(new CommandLaunchError(program, error.message));
    });
    child.once('spawn', () => {
      child.unref();
      resolve();
    });
  });

export async function workspaceExec(
  client: NiriClient,
  options: WorkspaceExecOptions
): Promise<LaunchOutcome> {
  const [program, ...args] = options.command;
  if (program === undefined || program === '') {
    throw new CommandError(
      'No command given',
      { suggestion: 'Usage: niri-action workspace-exec <command> [args...]' },
      EXIT_CODES.INVALID_ARGUMENTS
    );
  }

  const workspace = focusedWorkspace(await client.listWorkspaces());
  const cwd = lookupWorkspaceDir(options.dirs, workspace.name, options.defaultDir);
  log.debug(`Launching ${program} in ${cwd} for workspace ${workspace.name ?? workspace.id}`);

  const launch = options.launch ?? detachedLauncher;
  await launch(program, args, cwd);

  return { status: 'launched', command: [program, ...args], cwd, workspace: workspace.name };
}
