import WebSocket from 'ws';
import { logger } from '../lib/logger.js';
import type { ClientConnection, SendStatus, ServerMessage } from '../types.js';

export const DEFAULT_MAX_BUFFERED_BYTES = 4 * 1024 * 1024;

export interface SocketLike {
  readonly readyState: number;
  readonly bufferedAmount: number;
  send: WebSocket['send'];
  terminate(): void;
}

export function send(
  socket: SocketLike,
  message: ServerMessage,
  onError?: (err: Error) => void,
): void {
  sendRaw(socket, JSON.stringify(message), onError);
}

/** Queues `payload` on the socket. Write errors surface through `onError`. */
export function sendRaw(socket: SocketLike, payload: string, onError?: (err: Error) => void): void {
  if (socket.readyState !== WebSocket.OPEN) {
    throw new Error('SOCKET_NOT_OPEN');
  }
  socket.send(payload, (err) => {
    if (err) onError?.(err);
  });
}

export class SocketConnection implements ClientConnection {
  readonly id: string;
  private socket: SocketLike;
  private maxBufferedBytes: number;

  constructor(id: string, socket: SocketLike, maxBufferedBytes = DEFAULT_MAX_BUFFERED_BYTES) {
    this.id = id;
    this.socket = socket;
    this.maxBufferedBytes = maxBufferedBytes;
  }

  send(payload: string): SendStatus {
    if (this.socket.bufferedAmount > this.maxBufferedBytes) {
      return 'skipped';
    }
    sendRaw(this.socket, payload, (err) => {
      logger.warn({ err, clientId: this.id }, 'ws_write_failed');
      this.close();
    });
    return 'queued';
  }

  close(): void {
    this.socket.terminate();
  }
}
