/**
 * Event Bus
 *
 * Fans sync events out to listeners and keeps a short history.
 * A failing listener is reported and never reaches the emitter.
 */

import type { EmittedEvent, EventListener, SyncEvent, SyncEventOf, SyncEventType } from './types.js';

export class EventBus {
  private listeners: Set<EventListener> = new Set();
  private history: EmittedEvent[] = [];
  private maxHistory: number;

  constructor(maxHistory = 100) {
    this.maxHistory = maxHistory;
  }

  /**
   * Listen to every event. Returns an unsubscribe function.
   */
  on(listener: EventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Listen to one event type
   */
  onType<T extends SyncEventType>(
    type: T,
    listener: (event: SyncEventOf<T> & { timestamp: Date }) => void
  ): () => void {
    return this.on((event) => {
      if (isType(event, type)) {
        listener(event);
      }
    });
  }

  emit(event: SyncEvent): void {
    const emitted: EmittedEvent = { ...event, timestamp: new Date() };

    this.history.push(emitted);
    if (this.history.length > this.maxHistory) {
      this.history.splice(0, this.history.length - this.maxHistory);
    }

    for (const listener of this.listeners) {
      try {
        listener(emitted);
      } catch (error) {
        console.error(`[Events] Listener failed on ${event.type}:`, error);
      }
    }
  }

  /**
   * Most recent events, oldest first
   */
  getRecent(limit = 20): EmittedEvent[] {
    return this.history.slice(-limit);
  }

  listenerCount(): number {
    return this.listeners.size;
  }
}

function isType<T extends SyncEventType>(
  event: EmittedEvent,
  type: T
): event is SyncEventOf<T> & { timestamp: Date } {
  return event.type === type;
}
