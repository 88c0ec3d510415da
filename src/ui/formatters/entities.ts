/**
 * Picker lines for niri entities.
 *
 * Every line starts with the entity's identifier followed by `": "`; the
 * selection resolver reads the identifier back from that prefix. Window and
 * workspace ids are numeric and output names never contain a colon, so the
 * first `:` always ends the identifier.
 */

import type { OutputInfo, WindowInfo, WorkspaceInfo } from '@/ipc/protocol/messages.js';

/** Separator between the identifier and the rest of a picker line. */
export const IDENTIFIER_SEPARATOR = ': ';

const UNKNOWN_TITLE = 'Unknown';
const UNNAMED_WORKSPACE = '<unnamed>';
const UNKNOWN_SERIAL = '<unknown>';

/**
 * Sort workspaces ascending by index. Stable for equal indices.
 */
export function sortWorkspaces(workspaces: readonly WorkspaceInfo[]): WorkspaceInfo[] {
  return [...workspaces].sort((a, b) => a.idx - b.idx);
}

/**
 * Format one window, e.g. `42: Inbox - Mail`.
 */
export function formatWindow(window: WindowInfo): string {
  return `${window.id}${IDENTIFIER_SEPARATOR}${window.title ?? UNKNOWN_TITLE}`;
}

/**
 * Format one workspace, e.g. `3: mail (2)`.
 */
export function formatWorkspace(workspace: WorkspaceInfo): string {
  const name = workspace.name ?? UNNAMED_WORKSPACE;
  return `${workspace.id}${IDENTIFIER_SEPARATOR}${name} (${workspace.idx})`;
}

/**
 * Format one output, e.g. `DP-1: Dell Inc. U2720Q <unknown>`.
 */
export function formatOutput(output: OutputInfo): string {
  const serial = output.serial ?? UNKNOWN_SERIAL;
  return `${output.name}${IDENTIFIER_SEPARATOR}${output.make} ${output.model} ${serial}`;
}

/**
 * Windows in the order niri listed them.
 */
export function formatWindows(windows: readonly WindowInfo[]): string[] {
  return windows.map(formatWindow);
}

/**
 * Workspaces sorted by index.
 */
export function formatWorkspaces(workspaces: readonly WorkspaceInfo[]): string[] {
  return sortWorkspaces(workspaces).map(formatWorkspace);
}

/**
 * Outputs in the map's iteration order.
 */
export function formatOutputs(outputs: Readonly<Record<string, OutputInfo>>): string[] {
  return Object.values(outputs).map(formatOutput);
}
