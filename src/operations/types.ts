/**
 * Shared operation types.
 */

import type { NiriClient } from '@/ipc/client.js';
import type { Action } from '@/ipc/protocol/messages.js';
import type { Picker } from '@/picker/index.js';

/**
 * What every pick-and-act operation needs: a dispatcher over the invocation's
 * single session, and a picker.
 */
export interface OperationContext {
  client: NiriClient;
  pick: Picker;
}

/**
 * Result of a pick-and-act operation. `actions` lists what niri handled, in
 * the order it was issued.
 */
export type OperationOutcome = { status: 'cancelled' } | { status: 'completed'; actions: Action[] };

export const CANCELLED: OperationOutcome = { status: 'cancelled' };

/**
 * Issue actions one after another, stopping at the first failure.
 */
export async function issueActions(
  context: OperationContext,
  ...actions: Action[]
): Promise<OperationOutcome> {
  for (const action of actions) {
    await context.client.runAction(action);
  }
  return { status: 'completed', actions };
}
