import { resolveNumericId } from '@/selection/resolver.js';
import { formatWindows } from '@/ui/formatters/entities.js';

import { CANCELLED, issueActions, type OperationContext, type OperationOutcome } from './types.js';

/**
 * Pick a window and focus it.
 */
export async function focusContainer(context: OperationContext): Promise<OperationOutcome> {
  const windows = await context.client.listWindows();

  const picked = await context.pick(formatWindows(windows));
  const id = resolveNumericId(
    picked,
    windows.map((window) => window.id),
    'window'
  );
  if (id === null) {
    return CANCELLED;
  }

  return issueActions(context, { type: 'FocusWindow', id });
}
