/**
 * Query/action dispatcher.
 *
 * niri answers both questions and commands on the same success channel: a
 * command comes back as `Handled`, a question as a payload. NiriClient
 * restores the distinction the operations rely on. Queries treat `Handled` as
 * "no data"; actions accept nothing but `Handled`.
 */

import { UnhandledError } from '@/ipc/errors.js';
import {
  actionRequest,
  OUTPUTS_REQUEST,
  WINDOWS_REQUEST,
  WORKSPACES_REQUEST,
  type Action,
  type OutputInfo,
  type QueryRequest,
  type Response,
  type ResponseType,
  type WindowInfo,
  type WorkspaceInfo,
} from '@/ipc/protocol/messages.js';
import type { Transport } from '@/ipc/session.js';
import { createLogger } from '@/ui/logging/index.js';

const log = createLogger('ipc');

type PayloadOf<T extends ResponseType> = Extract<Response, { type: T }>;

export class NiriClient {
  constructor(private readonly transport: Transport) {}

  /**
   * Ask niri a question.
   *
   * @returns The payload, or null when niri answered with a bare `Handled`
   * @throws UnhandledError if niri replied with an error
   */
  async query(request: QueryRequest): Promise<Response | null> {
    const reply = await this.transport.send(request);
    if (!reply.ok) {
      throw new UnhandledError(reply.error);
    }
    return reply.response.type === 'Handled' ? null : reply.response;
  }

  /**
   * Ask niri to change something.
   *
   * @throws UnhandledError if niri replied with an error, or with any payload
   *   other than `Handled`
   */
  async runAction(action: Action): Promise<void> {
    const reply = await this.transport.send(actionRequest(action));
    if (!reply.ok) {
      throw new UnhandledError(reply.error);
    }
    if (reply.response.type !== 'Handled') {
      throw new UnhandledError(
        `Unexpected ${reply.response.type} response to ${action.type} action`
      );
    }
    log.debug(`${action.type} handled`);
  }

  async listWindows(): Promise<WindowInfo[]> {
    const response = await this.queryFor(WINDOWS_REQUEST, 'Windows');
    return response?.windows ?? [];
  }

  async listWorkspaces(): Promise<WorkspaceInfo[]> {
    const response = await this.queryFor(WORKSPACES_REQUEST, 'Workspaces');
    return response?.workspaces ?? [];
  }

  async listOutputs(): Promise<Record<string, OutputInfo>> {
    const response = await this.queryFor(OUTPUTS_REQUEST, 'Outputs');
    return response?.outputs ?? {};
  }

  /**
   * Run a query and keep the payload only if it is the expected variant.
   *
   * A bare ack or a payload of another kind reads as an empty listing.
   */
  private async queryFor<T extends ResponseType>(
    request: QueryRequest,
    expected: T
  ): Promise<PayloadOf<T> | null> {
    const response = await this.query(request);
    if (response === null) {
      log.debug(`${request.type} query answered with Handled, treating as empty`);
      return null;
    }
    if (!isResponseOfType(response, expected)) {
      log.debug(`${request.type} query answered with ${response.type}, treating as empty`);
      return null;
    }
    return response;
  }
}

function isResponseOfType<T extends ResponseType>(
  response: Response,
  type: T
): response is PayloadOf<T> {
  return response.type === type;
}
