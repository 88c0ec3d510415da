/**
 * Picker bridge.
 *
 * Hands candidate lines to an external dmenu-style picker and returns the
 * line it prints. The picker owns all interaction; this module only feeds
 * stdin and collects stdout.
 */

import { spawn } from 'child_process';

import { DEFAULT_PICKER_COMMAND } from '@/constants.js';
import { createLogger } from '@/ui/logging/index.js';

import { PickerLaunchError } from './errors.js';

export { PickerLaunchError } from './errors.js';

const log = createLogger('picker');

/**
 * Present lines, resolve with the picked text ('' when cancelled).
 */
export type Picker = (lines: readonly string[]) => Promise<string>;

/**
 * Split a picker command string on whitespace. Quoting is not interpreted.
 *
 * @example
 * ```typescript
 * parsePickerCommand('fuzzel --dmenu --width 60');
 * // ['fuzzel', '--dmenu', '--width', '60']
 * ```
 */
export function parsePickerCommand(command: string = DEFAULT_PICKER_COMMAND): string[] {
  return command.split(/\s+/).filter((part) => part.length > 0);
}

/**
 * Create a picker that runs `command` once per call.
 *
 * A non-zero exit is treated as cancellation: fuzzel and dmenu exit non-zero
 * when the user dismisses them.
 *
 * @param command - Program followed by its arguments
 * @throws PickerLaunchError (from the returned picker) if the process cannot start
 */
export function createProcessPicker(command: readonly string[]): Picker {
  const [program, ...args] = command;
  const commandText = command.join(' ');

  return (lines) =>
    new Promise<string>((resolve, reject) => {
      if (program === undefined) {
        reject(new PickerLaunchError(commandText, 'empty command'));
        return;
      }

      log.debug(`Presenting ${lines.length} lines via ${commandText}`);
      const child = spawn(program, args, { stdio: ['pipe', 'pipe', 'inherit'] });

      let output = '';
      child.stdout.setEncoding('utf-8');
      child.stdout.on('data', (chunk: string) => {
        output += chunk;
      });

      // A picker that exits without reading all of stdin yields EPIPE here.
      child.stdin.on('error', (error) => {
        log.debug(`Picker stdin closed early: ${error.message}`);
      });

      child.once('error', (error) => {
        reject(new PickerLaunchError(commandText, error.message));
      });

      child.once('close', (code, signal) => {
        if (code !== 0) {
          log.debug(`Picker exited with ${code ?? signal ?? 'unknown status'}, treating as cancel`);
          resolve('');
          return;
        }
        resolve(output);
      });

      child.stdin.end(lines.join('\n'));
    });
}
