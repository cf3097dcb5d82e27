/**
 * Simple in-memory pub/sub event bus.
 * Used by services to emit events and by the WebSocket handler to broadcast them.
 */

export type EventType =
  | 'tender.created'
  | 'tender.approval_voted'
  | 'tender.phase_changed'
  | 'tender.admin_updated'
  | 'tender.awarded'
  | 'proposal.submitted'
  | 'proposal.voted'
  | 'registry.company_registered'
  | 'ledger.deposited';

export type EventCallback = (event: EventType, data: unknown) => void;

class EventBus {
  private listeners: Map<string, Set<EventCallback>> = new Map();
  private wildcardListeners: Set<EventCallback> = new Set();

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

    let specific = this.listeners.get(event);
    if (!specific) {
      specific = new Set();
      this.listeners.set(event, specific);
    }
    specific.add(callback);

    return () => {
      this.listeners.get(event)?.delete(callback);
    };
  }

  /**
   * Emit an event to all matching subscribers. A throwing listener does not
   * stop delivery to the others; its error is reported on stderr.
   */
  emit(event: EventType, data: unknown): void {
    const targets = [...(this.listeners.get(event) ?? []), ...this.wildcardListeners];
    for (const cb of targets) {
      try {
        cb(event, data);
      } catch (error) {
        console.error(`event listener for ${event} failed`, error);
      }
    }
  }

  /**
   * Remove all listeners. Useful for tests.
   */
  clear(): void {
    this.listeners.clear();
    this.wildcardListeners.clear();
  }
}

/** Singleton event bus instance for the application. */
export const eventBus = new EventBus();
