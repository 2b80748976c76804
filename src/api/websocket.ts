/**
 * WebSocket live event feed.
 * Broadcasts pipeline events (action.queued, action.approved, action.executed, etc.)
 * to all connected WebSocket clients.
 */

import type { FastifyInstance } from 'fastify';
import { eventBus, EventType } from '../infra/eventBus.js';
import { isoNow } from '../utils/time.js';

interface WSLike {
  readyState: number;
  send(data: string): void;
  on(event: string, cb: () => void): void;
}

const OPEN = 1;

const clients = new Set<WSLike>();

/** Number of currently connected WebSocket clients. */
export function connectedClients(): number {
  return clients.size;
}

/**
 * Register the WebSocket endpoint and subscribe to the event bus.
 * Must be called AFTER @fastify/websocket is registered on the Fastify instance.
 * Returns the bus unsubscribe so the app can detach on close.
 */
export async function registerWebSocket(app: FastifyInstance): Promise<() => void> {
  const unsubscribe = eventBus.on('*', (event: EventType, data: unknown) => {
    const message = JSON.stringify({ type: event, data, ts: isoNow() });

    for (const ws of clients) {
      if (ws.readyState === OPEN) {
        ws.send(message);
      }
    }
  });

  app.get('/ws', { websocket: true }, (socket: WSLike) => {
    clients.add(socket);

    socket.send(JSON.stringify({
      type: 'connected',
      data: { clients: clients.size },
      ts: isoNow(),
    }));

    socket.on('close', () => {
      clients.delete(socket);
    });

    socket.on('error', () => {
      clients.delete(socket);
    });
  });

  return unsubscribe;
}
