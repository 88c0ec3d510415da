import { resolveOutputName } from '@/selection/resolver.js';
import { formatOutputs } from '@/ui/formatters/entities.js';

import { CANCELLED, issueActions, type OperationContext, type OperationOutcome } from './types.js';

/**
 * Pick an output and move the focused workspace onto it.
 */
export async function moveWorkspaceToOutput(
  context: OperationContext
): Promise<OperationOutcome> {
  const outputs = await context.client.listOutputs();

  const picked = await context.pick(formatOutputs(outputs));
  const output = resolveOutputName(
    picked,
    Object.values(outputs).map((info) => info.name)
  );
  if (output === null) {
    return CANCELLED;
  }

  return issueActions(context, { type: 'MoveWorkspaceToMonitor', output, reference: null });
}
