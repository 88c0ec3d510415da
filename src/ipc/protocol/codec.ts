/**
 * Conversion between protocol types and niri's JSON encoding.
 *
 * niri serializes its enums externally tagged: unit variants become bare
 * strings (`"Windows"`), struct variants become single-key objects
 * (`{"FocusWindow":{"id":42}}`), and field names are snake_case. Replies wrap
 * the response in `{"Ok": ...}` or carry the error text in `{"Err": "..."}`.
 */

import { IPCParseError } from '@/ipc/transport/IPCError.js';

import {
  isRecord,
  isWireOutput,
  isWireWindow,
  isWireWorkspace,
  type WireOutput,
  type WireWindow,
  type WireWorkspace,
} from './guards.js';
import type {
  Action,
  OutputInfo,
  Reply,
  Request,
  Response,
  WindowInfo,
  WorkspaceInfo,
  WorkspaceReference,
} from './messages.js';

function encodeReference(reference: WorkspaceReference): Record<string, number> {
  switch (reference.type) {
    case 'Id':
      return { Id: reference.id };
    case 'Index':
      return { Index: reference.index };
  }
}

function encodeOptionalReference(
  reference: WorkspaceReference | null
): Record<string, number> | null {
  return reference === null ? null : encodeReference(reference);
}

/**
 * Encode an action to its wire object, e.g. `{"FocusWindow":{"id":42}}`.
 */
export function encodeAction(action: Action): Record<string, Record<string, unknown>> {
  switch (action.type) {
    case 'FocusWindow':
      return { FocusWindow: { id: action.id } };
    case 'MoveWindowToWorkspace':
      return {
        MoveWindowToWorkspace: {
          window_id: action.windowId,
          reference: encodeReference(action.reference),
          focus: action.focus,
        },
      };
    case 'FocusWorkspace':
      return { FocusWorkspace: { reference: encodeReference(action.reference) } };
    case 'MoveWorkspaceToMonitor':
      return {
        MoveWorkspaceToMonitor: {
          output: action.output,
          reference: encodeOptionalReference(action.reference),
        },
      };
    case 'SetWorkspaceName':
      return {
        SetWorkspaceName: {
          name: action.name,
          workspace: encodeOptionalReference(action.workspace),
        },
      };
  }
}

/**
 * Encode a request to the value niri expects on the wire.
 *
 * @example
 * ```typescript
 * encodeRequest({ type: 'Windows' });
 * // 'Windows'
 * encodeRequest(actionRequest({ type: 'FocusWindow', id: 42 }));
 * // { Action: { FocusWindow: { id: 42 } } }
 * ```
 */
export function encodeRequest(request: Request): unknown {
  switch (request.type) {
    case 'Outputs':
    case 'Windows':
    case 'Workspaces':
      return request.type;
    case 'Action':
      return { Action: encodeAction(request.action) };
  }
}

function toWindowInfo(wire: WireWindow): WindowInfo {
  return {
    id: wire.id,
    title: wire.title ?? null,
    appId: wire.app_id ?? null,
    workspaceId: wire.workspace_id ?? null,
    isFocused: wire.is_focused ?? false,
  };
}

function toWorkspaceInfo(wire: WireWorkspace): WorkspaceInfo {
  return {
    id: wire.id,
    idx: wire.idx,
    name: wire.name ?? null,
    output: wire.output ?? null,
    isActive: wire.is_active ?? false,
    isFocused: wire.is_focused ?? false,
  };
}

function toOutputInfo(wire: WireOutput): OutputInfo {
  return {
    name: wire.name,
    make: wire.make,
    model: wire.model,
    serial: wire.serial ?? null,
  };
}

function decodeWindows(payload: unknown): WindowInfo[] {
  if (!Array.isArray(payload)) {
    throw new IPCParseError('Windows payload is not an array');
  }
  return payload.map((entry: unknown, position) => {
    if (!isWireWindow(entry)) {
      throw new IPCParseError(`malformed window at position ${position}`);
    }
    return toWindowInfo(entry);
  });
}

function decodeWorkspaces(payload: unknown): WorkspaceInfo[] {
  if (!Array.isArray(payload)) {
    throw new IPCParseError('Workspaces payload is not an array');
  }
  return payload.map((entry: unknown, position) => {
    if (!isWireWorkspace(entry)) {
      throw new IPCParseError(`malformed workspace at position ${position}`);
    }
    return toWorkspaceInfo(entry);
  });
}

function decodeOutputs(payload: unknown): Record<string, OutputInfo> {
  if (!isRecord(payload)) {
    throw new IPCParseError('Outputs payload is not an object');
  }
  const outputs: Record<string, OutputInfo> = {};
  for (const [key, entry] of Object.entries(payload)) {
    if (!isWireOutput(entry)) {
      throw new IPCParseError(`malformed output "${key}"`);
    }
    outputs[key] = toOutputInfo(entry);
  }
  return outputs;
}

/**
 * Decode the value inside `Ok` into a response.
 */
export function decodeResponse(value: unknown): Response {
  if (value === 'Handled') {
    return { type: 'Handled' };
  }
  if (typeof value === 'string') {
    throw new IPCParseError(`unsupported response variant "${value}"`);
  }
  if (!isRecord(value)) {
    throw new IPCParseError('response is neither a variant name nor an object');
  }

  const keys = Object.keys(value);
  const [variant] = keys;
  if (keys.length !== 1 || variant === undefined) {
    throw new IPCParseError(`expected exactly one response variant, got ${keys.length}`);
  }

  const payload = value[variant];
  switch (variant) {
    case 'Windows':
      return { type: 'Windows', windows: decodeWindows(payload) };
    case 'Workspaces':
      return { type: 'Workspaces', workspaces: decodeWorkspaces(payload) };
    case 'Outputs':
      return { type: 'Outputs', outputs: decodeOutputs(payload) };
    default:
      throw new IPCParseError(`unsupported response variant "${variant}"`);
  }
}

/**
 * Decode one reply line.
 *
 * @param line - One JSONL frame from the socket, without its newline
 * @throws IPCParseError if the line is not a well-formed reply
 */
export function decodeReply(line: string): Reply {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    throw new IPCParseError('reply is not valid JSON');
  }

  if (!isRecord(parsed)) {
    throw new IPCParseError('reply is not an object');
  }
  if ('Ok' in parsed) {
    return { ok: true, response: decodeResponse(parsed['Ok']) };
  }
  if ('Err' in parsed) {
    const error = parsed['Err'];
    if (typeof error !== 'string') {
      throw new IPCParseError('Err reply does not carry a message');
    }
    return { ok: false, error };
  }
  throw new IPCParseError('reply has neither Ok nor Err');
}

/**
 * Short description of a request for log and error lines.
 */
export function describeRequest(request: Request): string {
  return request.type === 'Action' ? request.action.type : request.type;
}
