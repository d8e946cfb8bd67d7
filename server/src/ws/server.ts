import type { IncomingMessage, Server } from 'node:http';
import WebSocket, { WebSocketServer } from 'ws';
import { v4 as uuid } from 'uuid';
import { logger } from '../lib/logger.js';
import type { StreamSession } from '../lib/streamSession.js';
import { parseClientMessage } from './schemas.js';
import { send, SocketConnection } from './utils.js';

export interface WebSocketOptions {
  path: string;
  heartbeatMs: number;
  maxBufferedBytes?: number;
}

export function registerWebSocketServer(
  httpServer: Server,
  session: StreamSession,
  options: WebSocketOptions,
): WebSocketServer {
  const wss = new WebSocketServer({ noServer: true });
  const alive = new WeakMap<WebSocket, boolean>();

  httpServer.on('upgrade', (request, socket, head) => {
    if (upgradePath(request.url) !== options.path) {
      socket.destroy();
      return;
    }
    wss.handleUpgrade(request, socket, head, (client) => {
      wss.emit('connection', client, request);
    });
  });

  wss.on('connection', (socket: WebSocket, request: IncomingMessage) => {
    const connection = new SocketConnection(uuid(), socket, options.maxBufferedBytes);
    alive.set(socket, true);
    session.registry.add(connection);

    logger.info(
      { id: connection.id, ip: request.socket.remoteAddress, viewers: session.registry.size },
      'ws_connected',
    );

    const onMetaError = (err: unknown) => {
      logger.warn({ err, clientId: connection.id }, 'ws_meta_failed');
    };
    try {
      send(socket, session.describe(), onMetaError);
    } catch (err) {
      onMetaError(err);
    }

    socket.on('pong', () => {
      alive.set(socket, true);
    });

    socket.on('message', (raw) => {
      handleMessage(raw.toString(), connection.id, session);
    });

    socket.on('close', () => {
      session.registry.remove(connection);
      logger.info({ id: connection.id, viewers: session.registry.size }, 'ws_disconnected');
    });

    socket.on('error', (err) => {
      logger.error({ err, clientId: connection.id }, 'ws_error');
      session.registry.remove(connection);
      socket.close();
    });
  });

  const heartbeatInterval = setInterval(() => {
    for (const client of wss.clients) {
      if (!alive.get(client)) {
        logger.warn('ws_heartbeat_missed');
        client.terminate();
        continue;
      }
      alive.set(client, false);
      client.ping();
    }
  }, options.heartbeatMs);

  wss.on('close', () => clearInterval(heartbeatInterval));

  return wss;
}

function upgradePath(url: string | undefined): string {
  return (url ?? '/').split('?')[0];
}

export function handleMessage(raw: string, clientId: string, session: StreamSession): void {
  const message = parseClientMessage(raw);
  switch (message.kind) {
    case 'invalid':
      logger.warn({ clientId, reason: message.reason }, 'ws_invalid_message');
      return;
    case 'ignored':
      logger.debug({ clientId, type: message.type }, 'ws_unhandled_type');
      return;
    case 'event':
      session.pipeline.submit(message.event, clientId);
      return;
  }
}
