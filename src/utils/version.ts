/**
 * Package version lookup.
 *
 * Reads package.json relative to this module; the file sits two levels up
 * from both src/utils and dist/utils.
 */

import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';

const FALLBACK_VERSION = '0.0.0';

function readPackageVersion(): string {
  try {
    const packageJsonPath = fileURLToPath(new URL('../../package.json', import.meta.url));
    const parsed: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
    if (typeof parsed === 'object' && parsed !== null && 'version' in parsed) {
      return typeof parsed.version === 'string' ? parsed.version : FALLBACK_VERSION;
    }
    return FALLBACK_VERSION;
  } catch {
    return FALLBACK_VERSION;
  }
}

export const VERSION = readPackageVersion();
