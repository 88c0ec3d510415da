/**
 * Selection errors.
 */

import { CommandError } from '@/ui/errors/index.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';

/**
 * Picked line does not carry an identifier of the expected kind.
 */
export class SelectionParseError extends CommandError {
  readonly selection: string;

  constructor(selection: string, expected: string) {
    super(
      `Cannot read ${expected} from selection "${selection}"`,
      { suggestion: 'Pick one of the listed entries' },
      EXIT_CODES.INVALID_SELECTION
    );
    this.name = 'SelectionParseError';
    this.selection = selection;
  }
}

/**
 * Picked identifier parses but is not in the listing it was picked from.
 */
export class UnknownSelectionError extends CommandError {
  constructor(kind: string, identifier: string | number) {
    super(
      `No ${kind} with identifier ${identifier} in the current listing`,
      { suggestion: 'Pick one of the listed entries' },
      EXIT_CODES.INVALID_SELECTION
    );
    this.name = 'UnknownSelectionError';
  }
}

/**
 * Session state lacks something niri always provides, such as a focused
 * workspace.
 */
export class InvariantViolationError extends CommandError {
  constructor(message: string) {
    super(message, {}, EXIT_CODES.INVARIANT_VIOLATION);
    this.name = 'InvariantViolationError';
  }
}
