import { workspaceById } from '@/ipc/protocol/messages.js';
import { resolveNumericId } from '@/selection/resolver.js';
import { formatWorkspaces } from '@/ui/formatters/entities.js';

import { CANCELLED, issueActions, type OperationContext, type OperationOutcome } from './types.js';

/**
 * Pick a workspace and send the focused window there, staying put.
 */
export async function moveToWorkspace(context: OperationContext): Promise<OperationOutcome> {
  const workspaces = await context.client.listWorkspaces();

  const picked = await context.pick(formatWorkspaces(workspaces));
  const id = resolveNumericId(
    picked,
    workspaces.map((workspace) => workspace.id),
    'workspace'
  );
  if (id === null) {
    return CANCELLED;
  }

  return issueActions(context, {
    type: 'MoveWindowToWorkspace',
    windowId: null,
    reference: workspaceById(id),
    focus: false,
  });
}
