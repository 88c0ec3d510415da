#!/usr/bin/env node

import { Command } from 'commander';

import { commandRegistry } from '@/commands.js';
import { pickerOption, socketOption } from '@/commands/shared/commonOptions.js';
import { createLogger, enableDebugLogging } from '@/ui/logging/index.js';
import { getErrorMessage } from '@/utils/errors.js';
import { EXIT_CODE_REGISTRY, EXIT_CODES } from '@/utils/exitCodes.js';
import { VERSION } from '@/utils/version.js';

const CLI_NAME = 'niri-action';
const CLI_DESCRIPTION = 'Pick niri windows, workspaces and outputs through fuzzel and act on them';

const log = createLogger(CLI_NAME);

/**
 * Exit code table for the help footer.
 */
function exitCodeHelp(): string {
  const rows = EXIT_CODE_REGISTRY.map(
    (entry) => `  ${String(entry.code).padStart(3)}  ${entry.description}`
  );
  return ['', 'Exit codes:', ...rows].join('\n');
}

/**
 * Entry point.
 *
 * Each invocation handles exactly one subcommand: one niri connection, at
 * most one picker round-trip, then exit. Subcommands report their own
 * failures through CommandRunner; anything escaping here is a bug.
 */
async function main(): Promise<void> {
  if (process.argv.includes('--debug')) {
    enableDebugLogging();
  }

  const program = new Command()
    .name(CLI_NAME)
    .description(CLI_DESCRIPTION)
    .version(VERSION)
    .addOption(socketOption())
    .addOption(pickerOption())
    .option('--debug', 'Enable debug logging (verbose output)')
    .enablePositionalOptions()
    .addHelpText('after', exitCodeHelp());

  commandRegistry.forEach((register) => register(program));

  await program.parseAsync();
}

main().catch((error: unknown) => {
  log.error(`Unexpected failure: ${getErrorMessage(error)}`);
  process.exitCode = EXIT_CODES.SOFTWARE_ERROR;
});
