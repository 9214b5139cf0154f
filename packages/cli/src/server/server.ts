import { createServer, type Server as HttpServer, type ServerResponse } from 'node:http';
import { WebSocketServer, WebSocket, type RawData } from 'ws';
import type { RelayEngine } from '@relaywatch/core';
import type { Logger } from '../logger.js';
import {
  parseClientMessage,
  parsePublishFrame,
  type ClientMessage,
  type ServerMessage,
} from './protocol.js';

export interface RelayServerOptions {
  engine: RelayEngine;
  version: string;
  host: string;
  port: number;
  logger?: Logger;
}

export interface RelayServer {
  server: HttpServer;
  /** Resolves once listening; rejects if the port cannot be bound. */
  ready: Promise<void>;
  /** Bound port, which differs from the requested one when that was 0. */
  port: () => number;
  close: () => Promise<void>;
}

function sendJson(res: ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(body));
}

function rawToString(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf-8');
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString('utf-8');
  return data.toString('utf-8');
}

/**
 * HTTP + WebSocket front for a RelayEngine.
 *
 * - `/publish` takes `{ topic, payload }` frames from producers.
 * - `/feed` pushes session state to UIs and accepts history mutations.
 * - `GET /health`, `/sessions`, `/history`, `/metrics` answer one-off queries.
 */
export function startRelayServer(options: RelayServerOptions): RelayServer {
  const { engine, version, host, port, logger } = options;
  const monitor = engine.monitor;

  const server = createServer((req, res) => {
    const url = new URL(req.url ?? '/', 'http://localhost');

    if (req.method !== 'GET') {
      sendJson(res, 405, { error: 'Method Not Allowed' });
      return;
    }

    switch (url.pathname) {
      case '/health':
        sendJson(res, 200, { status: 'ok', version });
        return;
      case '/sessions':
        sendJson(res, 200, monitor.snapshot());
        return;
      case '/history': {
        const session = url.searchParams.get('session') ?? undefined;
        sendJson(res, 200, monitor.history({ sessionName: session }));
        return;
      }
      case '/metrics':
        sendJson(res, 200, { ...monitor.metrics(), unreadCount: monitor.unreadCount() });
        return;
      default:
        res.writeHead(404, { 'Content-Type': 'text/plain' });
        res.end('Not Found');
    }
  });

  const publishWss = new WebSocketServer({ noServer: true });
  const feedWss = new WebSocketServer({ noServer: true });

  const send = (ws: WebSocket, msg: ServerMessage): void => {
    if (ws.readyState === WebSocket.OPEN) {
      ws.send(JSON.stringify(msg));
    }
  };

  publishWss.on('connection', (ws: WebSocket) => {
    logger?.debug('Publisher connected');

    ws.on('message', (data: RawData) => {
      const message = parsePublishFrame(rawToString(data));
      if (!message) {
        send(ws, { type: 'error', message: 'Expected {"topic": string, "payload": string | object}', code: 'PARSE_ERROR' });
        return;
      }
      if (!engine.publish(message)) {
        send(ws, { type: 'error', message: 'Ingestion queue is full', code: 'QUEUE_FULL' });
      }
    });

    ws.on('error', (err: Error) => {
      logger?.warn(`Publisher connection error: ${err.message}`);
    });
  });

  const handleFeedMessage = (ws: WebSocket, msg: ClientMessage): void => {
    switch (msg.type) {
      case 'mark_read': {
        if (!monitor.getNotification(msg.id)) {
          send(ws, { type: 'error', message: `Notification ${msg.id} not found`, code: 'NOT_FOUND' });
          return;
        }
        send(ws, { type: 'ack', action: 'mark_read', changed: monitor.markRead(msg.id) ? 1 : 0 });
        return;
      }
      case 'mark_all_read':
        send(ws, { type: 'ack', action: 'mark_all_read', changed: monitor.markAllRead() });
        return;
      case 'clear_history':
        send(ws, { type: 'ack', action: 'clear_history', changed: monitor.clearHistory() });
        return;
      case 'get_history':
        send(ws, {
          type: 'history',
          session: msg.session,
          entries: monitor.history({ sessionName: msg.session }),
        });
        return;
    }
  };

  feedWss.on('connection', (ws: WebSocket) => {
    send(ws, {
      type: 'init',
      version,
      sessions: monitor.snapshot(),
      history: monitor.history(),
      unreadCount: monitor.unreadCount(),
      metrics: monitor.metrics(),
    });

    const unsubscribe = monitor.subscribe(signal => {
      send(ws, {
        type: 'state',
        seq: signal.seq,
        reasons: signal.reasons,
        sessions: monitor.snapshot(),
        unreadCount: monitor.unreadCount(),
        metrics: monitor.metrics(),
      });
    });

    ws.on('message', (data: RawData) => {
      const msg = parseClientMessage(rawToString(data));
      if (!msg) {
        send(ws, { type: 'error', message: 'Invalid message format', code: 'PARSE_ERROR' });
        return;
      }
      handleFeedMessage(ws, msg);
    });

    ws.on('close', unsubscribe);
    ws.on('error', (err: Error) => {
      logger?.warn(`Feed connection error: ${err.message}`);
      unsubscribe();
    });
  });

  server.on('upgrade', (req, socket, head) => {
    const pathname = new URL(req.url ?? '/', 'http://localhost').pathname;

    if (pathname === '/publish') {
      publishWss.handleUpgrade(req, socket, head, ws => {
        publishWss.emit('connection', ws, req);
      });
    } else if (pathname === '/feed') {
      feedWss.handleUpgrade(req, socket, head, ws => {
        feedWss.emit('connection', ws, req);
      });
    } else {
      socket.destroy();
    }
  });

  const ready = new Promise<void>((resolve, reject) => {
    const onError = (err: Error): void => reject(err);
    server.once('error', onError);
    server.listen(port, host, () => {
      server.off('error', onError);
      logger?.info(`Listening on http://${host}:${boundPort()}`);
      logger?.info(`Publish to ws://${host}:${boundPort()}/publish, watch ws://${host}:${boundPort()}/feed`);
      resolve();
    });
  });

  function boundPort(): number {
    const address = server.address();
    return address !== null && typeof address === 'object' ? address.port : port;
  }

  const close = async (): Promise<void> => {
    for (const client of [...publishWss.clients, ...feedWss.clients]) {
      client.terminate();
    }
    await new Promise<void>(resolve => publishWss.close(() => resolve()));
    await new Promise<void>(resolve => feedWss.close(() => resolve()));
    if (!server.listening) return;
    await new Promise<void>((resolve, reject) => {
      server.close(err => (err ? reject(err) : resolve()));
    });
  };

  return { server, ready, port: boundPort, close };
}
