/**
 * Human-readable summaries of what a command did.
 */

import type { Action, WorkspaceReference } from '@/ipc/protocol/messages.js';
import type { LaunchOutcome, OperationOutcome } from '@/operations/index.js';
import { joinLines } from '@/ui/formatting.js';

function describeReference(reference: WorkspaceReference): string {
  return reference.type === 'Id' ? `workspace ${reference.id}` : `workspace #${reference.index}`;
}

/**
 * One line per action, e.g. `Focused window 42`.
 */
export function describeAction(action: Action): string {
  switch (action.type) {
    case 'FocusWindow':
      return `Focused window ${action.id}`;
    case 'MoveWindowToWorkspace': {
      const window = action.windowId === null ? 'focused window' : `window ${action.windowId}`;
      return `Moved ${window} to ${describeReference(action.reference)}`;
    }
    case 'FocusWorkspace':
      return `Focused ${describeReference(action.reference)}`;
    case 'MoveWorkspaceToMonitor': {
      const workspace =
        action.reference === null ? 'focused workspace' : describeReference(action.reference);
      return `Moved ${workspace} to output ${action.output}`;
    }
    case 'SetWorkspaceName': {
      const workspace =
        action.workspace === null ? 'focused workspace' : describeReference(action.workspace);
      return `Renamed ${workspace} to "${action.name}"`;
    }
  }
}

/**
 * Summary of a pick-and-act operation; empty when the pick was cancelled.
 */
export function formatOperationOutcome(outcome: OperationOutcome): string {
  if (outcome.status === 'cancelled') {
    return '';
  }
  return joinLines(...outcome.actions.map(describeAction));
}

/**
 * Summary of a workspace-exec launch.
 */
export function formatLaunchOutcome(outcome: LaunchOutcome): string {
  return `Launched ${outcome.command.join(' ')} in ${outcome.cwd}`;
}
