/**
 * Workspace to working-directory mapping.
 *
 * File format, one entry per line:
 *
 * ```
 * # comment
 * mail: ~/Mail
 * code: /home/me/src
 * ```
 *
 * The name ends at the first `:`. Later entries override earlier ones.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

import { createLogger, logDebugError } from '@/ui/logging/index.js';

const log = createLogger('config');

export type WorkspaceDirs = ReadonlyMap<string, string>;

/**
 * Expand a leading `~` to the home directory.
 */
export function expandHome(value: string, homeDir: string = os.homedir()): string {
  if (value === '~') {
    return homeDir;
  }
  if (value.startsWith('~/')) {
    return path.join(homeDir, value.slice(2));
  }
  return value;
}

/**
 * Parse mapping file contents.
 *
 * Lines without a `:`, or with an empty name or path, are skipped.
 */
export function parseWorkspaceDirs(content: string, homeDir: string = os.homedir()): WorkspaceDirs {
  const dirs = new Map<string, string>();

  content.split(/\r?\n/).forEach((rawLine, lineIndex) => {
    const line = rawLine.trim();
    if (line === '' || line.startsWith('#')) {
      return;
    }

    const separator = line.indexOf(':');
    const name = separator === -1 ? '' : line.slice(0, separator).trim();
    const dir = separator === -1 ? '' : line.slice(separator + 1).trim();
    if (name === '' || dir === '') {
      log.debug(`Skipping malformed workspace dirs line ${lineIndex + 1}: ${rawLine}`);
      return;
    }

    dirs.set(name, expandHome(dir, homeDir));
  });

  return dirs;
}

/**
 * Read the mapping file. A missing or unreadable file is an empty mapping.
 */
export function loadWorkspaceDirs(filePath: string, homeDir: string = os.homedir()): WorkspaceDirs {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    logDebugError(log, `read workspace dirs file ${filePath}`, error);
    return new Map();
  }
  return parseWorkspaceDirs(content, homeDir);
}

/**
 * Directory for a workspace name, or `fallback` for unnamed or unmapped
 * workspaces.
 */
export function lookupWorkspaceDir(
  dirs: WorkspaceDirs,
  name: string | null,
  fallback: string
): string {
  if (name === null) {
    return fallback;
  }
  return dirs.get(name) ?? fallback;
}
