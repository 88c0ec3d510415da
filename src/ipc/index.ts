/**
 * IPC Module
 *
 * Public API for talking to the niri socket.
 *
 * Organized into layers:
 * - Client (query/action dispatcher used by operations)
 * - Session (single Unix-socket connection)
 * - Protocol (message types, wire codec and type guards)
 * - Transport (JSONL framing and transport errors)
 */

export * from './client.js';

export * from './session.js';

export * from './protocol/index.js';

export { UnhandledError } from './errors.js';

export {
  IPCError,
  IPCBusyError,
  IPCConnectionError,
  IPCEarlyCloseError,
  IPCParseError,
} from './transport/IPCError.js';
