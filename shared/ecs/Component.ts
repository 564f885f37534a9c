// ============================================
// Component Store
// ============================================

import type { EntityId } from './types';

/**
 * ComponentStore - per-type storage of component data, Map<EntityId, T>.
 */
export class ComponentStore<T> {
  private data = new Map<EntityId, T>();

  // Overwrites existing data if present
  set(entity: EntityId, value: T): void {
    this.data.set(entity, value);
  }

  get(entity: EntityId): T | undefined {
    return this.data.get(entity);
  }

  has(entity: EntityId): boolean {
    return this.data.has(entity);
  }
}
