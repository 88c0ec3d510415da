import { EXIT_CODES } from '@/utils/exitCodes.js';

/**
 * Extra context printed below a command error.
 */
export interface ErrorMetadata {
  /** Single next step for the user */
  suggestion?: string;
  /** Several next steps */
  suggestions?: string[];
  /** Free-form note */
  note?: string;
}

/**
 * User-facing command failure with a semantic exit code.
 *
 * Thrown anywhere below a command handler; CommandRunner turns it into
 * printed output and the process exit code.
 */
export class CommandError extends Error {
  readonly metadata: ErrorMetadata;
  readonly exitCode: number;

  constructor(
    message: string,
    metadata: ErrorMetadata = {},
    exitCode: number = EXIT_CODES.GENERIC_FAILURE
  ) {
    super(message);
    this.name = 'CommandError';
    this.metadata = metadata;
    this.exitCode = exitCode;
  }
}
