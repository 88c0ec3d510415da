/**
 * niri IPC session.
 *
 * One Unix-socket connection per invocation. Each `send` writes one JSONL
 * request and resolves with the next reply line; only one exchange may be in
 * flight at a time. There is no timeout.
 */

import * as net from 'net';

import { describeRequest, decodeReply, encodeRequest } from '@/ipc/protocol/codec.js';
import type { Reply, Request } from '@/ipc/protocol/messages.js';
import {
  IPCBusyError,
  IPCConnectionError,
  IPCEarlyCloseError,
  IPCError,
} from '@/ipc/transport/IPCError.js';
import { JSONLBuffer, toJSONLFrame } from '@/ipc/transport/jsonl.js';
import { createLogger } from '@/ui/logging/index.js';
import { getErrorMessage } from '@/utils/errors.js';

const log = createLogger('ipc');

/**
 * Anything that can carry one request to niri and bring back its reply.
 */
export interface Transport {
  send(request: Request): Promise<Reply>;
}

interface PendingExchange {
  requestType: string;
  resolve: (reply: Reply) => void;
  reject: (error: Error) => void;
}

export class NiriSession implements Transport {
  private readonly buffer = new JSONLBuffer();
  private pending: PendingExchange | null = null;
  private closed = false;
  private failure: Error | null = null;

  private constructor(
    private readonly socket: net.Socket,
    readonly socketPath: string
  ) {
    socket.setEncoding('utf-8');
    socket.on('data', (chunk: string) => this.handleData(chunk));
    socket.on('error', (error) => {
      this.fail(new IPCConnectionError(socketPath, error.message));
    });
    socket.on('close', () => this.handleClose());
  }

  /**
   * Connect to the niri socket.
   *
   * @throws IPCConnectionError if the socket cannot be reached
   */
  static connect(socketPath: string): Promise<NiriSession> {
    return new Promise((resolve, reject) => {
      const socket = net.createConnection(socketPath);

      const onError = (error: Error): void => {
        socket.destroy();
        reject(new IPCConnectionError(socketPath, error.message));
      };

      socket.once('error', onError);
      socket.once('connect', () => {
        socket.off('error', onError);
        log.debug(`Connected to ${socketPath}`);
        resolve(new NiriSession(socket, socketPath));
      });
    });
  }

  /**
   * Send one request and wait for its reply.
   *
   * @throws IPCBusyError if another request is still awaiting its reply
   * @throws IPCConnectionError if the session is closed or the socket fails
   * @throws IPCEarlyCloseError if niri closes the connection before replying
   * @throws IPCParseError if the reply is not a well-formed niri reply
   */
  send(request: Request): Promise<Reply> {
    const requestType = describeRequest(request);

    if (this.pending) {
      return Promise.reject(new IPCBusyError(this.pending.requestType, requestType));
    }
    if (this.closed) {
      return Promise.reject(
        this.failure ?? new IPCConnectionError(this.socketPath, 'session is closed')
      );
    }

    return new Promise<Reply>((resolve, reject) => {
      this.pending = { requestType, resolve, reject };
      log.debug(`Sending ${requestType} request`);
      this.socket.write(toJSONLFrame(encodeRequest(request)));
    });
  }

  /**
   * Close the connection. Safe to call more than once.
   */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.socket.destroy();
  }

  isClosed(): boolean {
    return this.closed;
  }

  private handleData(chunk: string): void {
    let lines: string[];
    try {
      lines = this.buffer.process(chunk);
    } catch (error) {
      this.fail(error instanceof Error ? error : new IPCError(getErrorMessage(error)));
      this.socket.destroy();
      return;
    }

    for (const line of lines) {
      const exchange = this.pending;
      if (!exchange) {
        log.debug(`Dropping unsolicited frame: ${line}`);
        continue;
      }

      this.pending = null;
      try {
        const reply = decodeReply(line);
        log.debug(`Received ${exchange.requestType} reply (${reply.ok ? 'Ok' : 'Err'})`);
        exchange.resolve(reply);
      } catch (error) {
        exchange.reject(error instanceof Error ? error : new IPCError(getErrorMessage(error)));
      }
    }
  }

  private handleClose(): void {
    this.closed = true;
    this.buffer.clear();

    const exchange = this.pending;
    if (exchange) {
      this.pending = null;
      exchange.reject(new IPCEarlyCloseError(exchange.requestType));
    }
    log.debug('Connection closed');
  }

  private fail(error: Error): void {
    this.failure = error;
    const exchange = this.pending;
    if (exchange) {
      this.pending = null;
      exchange.reject(error);
    }
  }
}

/**
 * Run `fn` with a connected session, closing it afterwards.
 *
 * @example
 * ```typescript
 * await withSession(socketPath, (session) => focusContainer({ client: new NiriClient(session), pick }));
 * ```
 */
export async function withSession<T>(
  socketPath: string,
  fn: (session: NiriSession) => Promise<T>
): Promise<T> {
  const session = await NiriSession.connect(socketPath);
  try {
    return await fn(session);
  } finally {
    session.close();
  }
}
