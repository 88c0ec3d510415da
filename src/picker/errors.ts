import { CommandError } from '@/ui/errors/index.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';

/**
 * The picker process could not be started.
 */
export class PickerLaunchError extends CommandError {
  constructor(command: string, detail: string) {
    super(
      `Failed to start picker "${command}": ${detail}`,
      { suggestion: 'Install fuzzel or choose another picker with --picker "<command>"' },
      EXIT_CODES.PICKER_FAILURE
    );
    this.name = 'PickerLaunchError';
  }
}
