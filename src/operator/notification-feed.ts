import * as http from 'http';
import WebSocket, { WebSocketServer } from 'ws';
import { NotificationEvent } from '../event-store/types';
import { describeError, logger } from '../observability/structured-logger';

const MAX_REPLAY = 1000;

/**
 * Pushes committed notifications to WebSocket subscribers.
 *
 * Subscribers may send { type: 'replay', fromSequence } to receive the
 * backlog (up to MAX_REPLAY events per request) from the log.
 */
export class NotificationFeed {
  private wss: WebSocketServer;
  private subscribers: Map<WebSocket, { connectedAt: number; ip?: string }> = new Map();

  constructor(
    server: http.Server,
    private readRange: (fromSequence: number, toSequence: number) => NotificationEvent[]
  ) {
    this.wss = new WebSocketServer({ server, path: '/notifications' });

    this.wss.on('connection', (ws: WebSocket, req: http.IncomingMessage) => {
      const ip = req.socket.remoteAddress;
      this.subscribers.set(ws, { connectedAt: Date.now(), ip });
      logger.debug('NotificationFeed', 'Subscriber connected', { ip });

      ws.on('message', (data: WebSocket.RawData) => this.handleMessage(ws, data));

      ws.on('close', () => {
        this.subscribers.delete(ws);
      });

      ws.on('error', (error) => {
        logger.warn('NotificationFeed', 'Subscriber socket error', { ip, error: error.message });
        this.subscribers.delete(ws);
      });
    });
  }

  broadcast(events: NotificationEvent[]): void {
    if (events.length === 0) return;
    for (const ws of this.subscribers.keys()) {
      this.send(ws, events);
    }
  }

  get subscriberCount(): number {
    return this.subscribers.size;
  }

  close(): Promise<void> {
    for (const ws of this.subscribers.keys()) {
      ws.terminate();
    }
    this.subscribers.clear();
    return new Promise((resolve) => this.wss.close(() => resolve()));
  }

  private handleMessage(ws: WebSocket, data: WebSocket.RawData): void {
    let message: unknown;
    try {
      message = JSON.parse(data.toString());
    } catch (err) {
      logger.debug('NotificationFeed', 'Ignoring malformed message', { error: describeError(err) });
      return;
    }

    if (message === null || typeof message !== 'object' || !('type' in message) || message.type !== 'replay') {
      return;
    }

    const from = 'fromSequence' in message && typeof message.fromSequence === 'number' ? message.fromSequence : 1;
    this.send(ws, this.readRange(from, from + MAX_REPLAY - 1));
  }

  private send(ws: WebSocket, events: NotificationEvent[]): void {
    if (ws.readyState !== WebSocket.OPEN || events.length === 0) return;
    ws.send(JSON.stringify({ type: 'notifications', events }));
  }
}
