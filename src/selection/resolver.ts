/**
 * Selection resolution.
 *
 * Turns the raw line a picker returned back into a target. Picker lines are
 * built by ui/formatters/entities.ts: the identifier is everything before the
 * first `:`. An empty pick means the user cancelled.
 *
 * Two modes:
 * - strict: the line must name a listed entity (windows, outputs, moving to a
 *   workspace)
 * - id-or-new-entry: a line with a `:` names a listed workspace, a line
 *   without one is a new workspace name typed by the user
 */

import type { WorkspaceInfo } from '@/ipc/protocol/messages.js';
import { sortWorkspaces } from '@/ui/formatters/entities.js';
import { createLogger } from '@/ui/logging/index.js';

import { InvariantViolationError, SelectionParseError, UnknownSelectionError } from './errors.js';

const log = createLogger('selection');

const NUMERIC_ID_PATTERN = /^\d+$/;

/**
 * Outcome of an id-or-new-entry pick.
 */
export type Selection =
  | { kind: 'none' }
  | { kind: 'identified'; id: number }
  | { kind: 'freeText'; text: string };

/**
 * Strip the picker's line terminator and surrounding whitespace.
 */
export function normalizeSelection(raw: string): string {
  return raw.trim();
}

/**
 * Text before the first `:`, or the whole line when there is none.
 */
export function extractIdentifier(line: string): string {
  const separator = line.indexOf(':');
  return separator === -1 ? line : line.slice(0, separator);
}

function parseNumericId(line: string, kind: string): number {
  const identifier = extractIdentifier(line);
  if (!NUMERIC_ID_PATTERN.test(identifier)) {
    throw new SelectionParseError(line, `${kind} id`);
  }
  const id = Number(identifier);
  if (!Number.isSafeInteger(id)) {
    throw new SelectionParseError(line, `${kind} id`);
  }
  return id;
}

/**
 * Resolve a strict pick against numeric ids.
 *
 * @param raw - Picker output
 * @param knownIds - Ids of the entities that were offered
 * @param kind - Entity name used in error messages
 * @returns The picked id, or null if nothing was picked
 * @throws SelectionParseError if the identifier is not a decimal id
 * @throws UnknownSelectionError if the id was not offered
 *
 * @example
 * ```typescript
 * resolveNumericId('42: Inbox - Mail\n', [7, 42], 'window'); // 42
 * resolveNumericId('', [7, 42], 'window'); // null
 * ```
 */
export function resolveNumericId(
  raw: string,
  knownIds: Iterable<number>,
  kind: string
): number | null {
  const line = normalizeSelection(raw);
  if (line === '') {
    return null;
  }

  const id = parseNumericId(line, kind);
  if (!new Set(knownIds).has(id)) {
    throw new UnknownSelectionError(kind, id);
  }
  return id;
}

/**
 * Resolve a strict pick against output names.
 *
 * @returns The picked output name, or null if nothing was picked
 * @throws SelectionParseError if no name precedes the first `:`
 * @throws UnknownSelectionError if the output was not offered
 */
export function resolveOutputName(raw: string, knownNames: Iterable<string>): string | null {
  const line = normalizeSelection(raw);
  if (line === '') {
    return null;
  }

  const name = extractIdentifier(line);
  if (name === '') {
    throw new SelectionParseError(line, 'output name');
  }
  if (!new Set(knownNames).has(name)) {
    throw new UnknownSelectionError('output', name);
  }
  return name;
}

/**
 * Resolve a workspace pick that may be a new name.
 *
 * @throws SelectionParseError / UnknownSelectionError when a line with a `:`
 *   does not name a listed workspace
 *
 * @example
 * ```typescript
 * resolveWorkspaceSelection('3: mail (1)', workspaces); // { kind: 'identified', id: 3 }
 * resolveWorkspaceSelection('scratch', workspaces);     // { kind: 'freeText', text: 'scratch' }
 * ```
 */
export function resolveWorkspaceSelection(
  raw: string,
  workspaces: readonly WorkspaceInfo[]
): Selection {
  const line = normalizeSelection(raw);
  if (line === '') {
    return { kind: 'none' };
  }

  if (!line.includes(':')) {
    return { kind: 'freeText', text: line };
  }

  const id = parseNumericId(line, 'workspace');
  if (!workspaces.some((workspace) => workspace.id === id)) {
    throw new UnknownSelectionError('workspace', id);
  }
  return { kind: 'identified', id };
}

/**
 * Highest-index workspace; the target of a new-name pick.
 *
 * @throws InvariantViolationError if there are no workspaces
 */
export function lastWorkspace(workspaces: readonly WorkspaceInfo[]): WorkspaceInfo {
  const last = sortWorkspaces(workspaces).at(-1);
  if (!last) {
    throw new InvariantViolationError('niri reported no workspaces');
  }
  return last;
}

/**
 * The focused workspace. When several claim focus the first listed wins.
 *
 * @throws InvariantViolationError if no workspace is focused
 */
export function focusedWorkspace(workspaces: readonly WorkspaceInfo[]): WorkspaceInfo {
  const focused = workspaces.filter((workspace) => workspace.isFocused);
  const [first] = focused;
  if (!first) {
    throw new InvariantViolationError(
      workspaces.length === 0
        ? 'niri reported no workspaces'
        : 'niri reported no focused workspace'
    );
  }
  if (focused.length > 1) {
    log.debug(
      `${focused.length} workspaces report focus (${focused.map((w) => w.id).join(', ')}), using ${first.id}`
    );
  }
  return first;
}
