/**
 * Transport-level IPC errors.
 *
 * Every failure to complete one request/reply exchange with the niri socket
 * is one of these. They are fatal for the invocation; nothing retries.
 */

/**
 * Base class for IPC transport failures.
 */
export class IPCError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'IPCError';
  }
}

/**
 * Socket unreachable, or a socket error during an exchange.
 */
export class IPCConnectionError extends IPCError {
  readonly socketPath: string;

  constructor(socketPath: string, detail: string) {
    super(`IPC connection error on ${socketPath}: ${detail}`);
    this.name = 'IPCConnectionError';
    this.socketPath = socketPath;
  }
}

/**
 * The daemon closed the connection before replying.
 */
export class IPCEarlyCloseError extends IPCError {
  constructor(requestType: string) {
    super(`Connection closed before ${requestType} reply received`);
    this.name = 'IPCEarlyCloseError';
  }
}

/**
 * A reply line that is not a well-formed niri reply.
 */
export class IPCParseError extends IPCError {
  constructor(detail: string) {
    super(`Failed to parse niri reply: ${detail}`);
    this.name = 'IPCParseError';
  }
}

/**
 * A request was sent while another was still awaiting its reply.
 */
export class IPCBusyError extends IPCError {
  constructor(pendingType: string, requestType: string) {
    super(`Cannot send ${requestType} request while ${pendingType} request is awaiting a reply`);
    this.name = 'IPCBusyError';
  }
}
