import * as os from 'os';

import type { Command } from 'commander';

import { runCommand } from '@/commands/shared/CommandRunner.js';
import {
  collectOptions,
  dirsFileOption,
  jsonOption,
  socketOption,
} from '@/commands/shared/commonOptions.js';
import type { WorkspaceExecCommandOptions } from '@/commands/shared/optionTypes.js';
import { resolveSocketPath, resolveWorkspaceDirsPath } from '@/config/settings.js';
import { loadWorkspaceDirs } from '@/config/workspaceDirs.js';
import { NiriClient, withSession } from '@/ipc/index.js';
import { workspaceExec, type LaunchOutcome } from '@/operations/index.js';
import { formatLaunchOutcome } from '@/ui/formatters/outcome.js';

/**
 * Register workspace-exec
 *
 * @param program - Commander.js Command instance to register commands on
 */
export function registerWorkspaceExecCommand(program: Command): void {
  program
    .command('workspace-exec')
    .description("Run a command in the focused workspace's directory")
    .argument('<args...>', 'Command and its arguments')
    .addOption(socketOption())
    .addOption(dirsFileOption())
    .addOption(jsonOption())
    .passThroughOptions()
    .addHelpText(
      'after',
      '\nMapping file lines look like "name: /path/to/dir".\n' +
        'Default: $XDG_CONFIG_HOME/niri-action/workspace-dirs'
    )
    .action(async (args: string[], _options: WorkspaceExecCommandOptions, command: Command) => {
      const options = collectOptions<WorkspaceExecCommandOptions>(command);
      await runCommand<WorkspaceExecCommandOptions, LaunchOutcome>(
        async (opts) => {
          const homeDir = os.homedir();
          const dirs = loadWorkspaceDirs(resolveWorkspaceDirsPath(opts.dirsFile), homeDir);
          const outcome = await withSession(resolveSocketPath(opts.socket), (session) =>
            workspaceExec(new NiriClient(session), { command: args, dirs, defaultDir: homeDir })
          );
          return { success: true, data: outcome };
        },
        options,
        formatLaunchOutcome
      );
    });
}
