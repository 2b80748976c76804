/**
 * Simple in-memory pub/sub event bus.
 * The gate and the engine emit lifecycle events; the WebSocket handler broadcasts them.
 */

import { errorMessage } from '../errors/taxonomy.js';

export type EventType =
  | 'action.proposed'
  | 'action.queued'
  | 'action.approved'
  | 'action.partially_approved'
  | 'action.rejected'
  | 'action.notification'
  | 'action.executed'
  | 'action.failed'
  | 'action.rolled_back';

export type EventCallback = (event: EventType, data: unknown) => void;

export type ListenerErrorHandler = (event: EventType, error: unknown) => void;

const reportToStderr: ListenerErrorHandler = (event, error) => {
  console.error(`[eventBus] listener for ${event} failed: ${errorMessage(error)}`);
};

class EventBus {
  private listeners: Map<string, Set<EventCallback>> = new Map();
  private wildcardListeners: Set<EventCallback> = new Set();
  private onListenerError: ListenerErrorHandler = reportToStderr;

  /**
   * Subscribe to a specific event type, or '*' for all events.
   */
  on(event: EventType | '*', callback: EventCallback): () => void {
    if (event === '*') {
      this.wildcardListeners.add(callback);
      return () => {
        this.wildcardListeners.delete(callback);
      };
    }

    const existing = this.listeners.get(event) ?? new Set<EventCallback>();
    existing.add(callback);
    this.listeners.set(event, existing);

    return () => {
      this.listeners.get(event)?.delete(callback);
    };
  }

  /**
   * Emit an event to all matching subscribers. A failing listener does not
   * stop delivery to the others.
   */
  emit(event: EventType, data: unknown): void {
    const targets = [...(this.listeners.get(event) ?? []), ...this.wildcardListeners];
    for (const cb of targets) {
      try {
        cb(event, data);
      } catch (error) {
        this.onListenerError(event, error);
      }
    }
  }

  setListenerErrorHandler(handler: ListenerErrorHandler): void {
    this.onListenerError = handler;
  }

  /**
   * Remove all listeners and restore the default error handler. Useful for tests.
   */
  clear(): void {
    this.listeners.clear();
    this.wildcardListeners.clear();
    this.onListenerError = reportToStderr;
  }
}

/** Singleton event bus instance for the application. */
export const eventBus = new EventBus();
