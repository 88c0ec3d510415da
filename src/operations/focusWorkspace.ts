import type { Action } from '@/ipc/protocol/messages.js';
import { workspaceById } from '@/ipc/protocol/messages.js';
import { lastWorkspace, resolveWorkspaceSelection } from '@/selection/resolver.js';
import { formatWorkspaces } from '@/ui/formatters/entities.js';

import { PartialActionError } from './errors.js';
import { CANCELLED, issueActions, type OperationContext, type OperationOutcome } from './types.js';

/**
 * Pick a workspace and focus it, or type a new name.
 *
 * A typed name that matches no listed entry takes over the last workspace
 * (highest index): it is focused first, then renamed. The two steps are
 * separate requests. If the rename fails the workspace stays focused under
 * its old name and the operation fails with PartialActionError.
 */
export async function focusWorkspace(context: OperationContext): Promise<OperationOutcome> {
  const workspaces = await context.client.listWorkspaces();

  const picked = await context.pick(formatWorkspaces(workspaces));
  const selection = resolveWorkspaceSelection(picked, workspaces);

  switch (selection.kind) {
    case 'none':
      return CANCELLED;

    case 'identified':
      return issueActions(context, {
        type: 'FocusWorkspace',
        reference: workspaceById(selection.id),
      });

    case 'freeText': {
      const target = lastWorkspace(workspaces);
      const focus: Action = { type: 'FocusWorkspace', reference: workspaceById(target.id) };
      const rename: Action = {
        type: 'SetWorkspaceName',
        name: selection.text,
        workspace: workspaceById(target.id),
      };

      await context.client.runAction(focus);
      try {
        await context.client.runAction(rename);
      } catch (error) {
        throw new PartialActionError(
          `Workspace ${target.id} focused but renaming it to "${selection.text}" failed`,
          [focus],
          rename,
          error
        );
      }
      return { status: 'completed', actions: [focus, rename] };
    }
  }
}
