// ============================================
// Event Bus - Type-Safe Local Pub/Sub
// Session → renderer notifications
// ============================================

import type { SessionEventMap, SessionEventType } from '#shared';

type EventHandler<K extends SessionEventType> = (event: SessionEventMap[K]) => void;

type HandlerSets = { [K in SessionEventType]: Set<EventHandler<K>> };

export class EventBus {
  private handlers: HandlerSets = {
    levelShown: new Set(),
    enemiesSpawned: new Set(),
    gameOver: new Set(),
  };

  /**
   * Subscribe to an event (type-safe)
   * @returns unsubscribe function
   */
  on<K extends SessionEventType>(type: K, handler: EventHandler<K>): () => void {
    const handlers: Set<EventHandler<K>> = this.handlers[type];
    handlers.add(handler);
    return () => this.off(type, handler);
  }

  off<K extends SessionEventType>(type: K, handler: EventHandler<K>): void {
    const handlers: Set<EventHandler<K>> = this.handlers[type];
    handlers.delete(handler);
  }

  emit<K extends SessionEventType>(type: K, event: SessionEventMap[K]): void {
    const handlers: Set<EventHandler<K>> = this.handlers[type];
    // Snapshot so handlers may unsubscribe while we iterate
    for (const handler of [...handlers]) {
      handler(event);
    }
  }
}
