/**
 * JSON envelopes for --json output.
 */

import type { ErrorMetadata } from '@/ui/errors/index.js';
import { VERSION } from '@/utils/version.js';

export interface SuccessEnvelope<T> {
  version: string;
  success: true;
  data: T;
}

export interface ErrorEnvelope extends ErrorMetadata {
  version: string;
  success: false;
  error: string;
  exitCode: number;
}

export function buildSuccessResponse<T>(data: T): SuccessEnvelope<T> {
  return { version: VERSION, success: true, data };
}

export function buildErrorResponse(
  error: string,
  exitCode: number,
  context: ErrorMetadata = {}
): ErrorEnvelope {
  return { version: VERSION, success: false, error, exitCode, ...context };
}
