/**
 * Subcommand registry.
 */

import type { Command } from 'commander';

import { registerContainerCommands } from '@/commands/containers.js';
import { registerWorkspaceExecCommand } from '@/commands/workspaceExec.js';
import { registerWorkspaceCommands } from '@/commands/workspaces.js';

export const commandRegistry: ReadonlyArray<(program: Command) => void> = [
  registerContainerCommands,
  registerWorkspaceCommands,
  registerWorkspaceExecCommand,
];
