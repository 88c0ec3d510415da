import { workspaceById } from '@/ipc/protocol/messages.js';
import { focusedWorkspace, resolveNumericId } from '@/selection/resolver.js';
import { formatWindows } from '@/ui/formatters/entities.js';

import { CANCELLED, issueActions, type OperationContext, type OperationOutcome } from './types.js';

/**
 * Pick a window and pull it into the focused workspace without following it.
 *
 * The focused workspace is looked up before the picker opens, so a session
 * without one fails before asking the user anything.
 */
export async function stealContainer(context: OperationContext): Promise<OperationOutcome> {
  const windows = await context.client.listWindows();
  const current = focusedWorkspace(await context.client.listWorkspaces());

  const picked = await context.pick(formatWindows(windows));
  const windowId = resolveNumericId(
    picked,
    windows.map((window) => window.id),
    'window'
  );
  if (windowId === null) {
    return CANCELLED;
  }

  return issueActions(context, {
    type: 'MoveWindowToWorkspace',
    windowId,
    reference: workspaceById(current.id),
    focus: false,
  });
}
