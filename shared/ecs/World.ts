// ============================================
// ECS World
// ============================================

import { ComponentStore } from './Component';
import type { ComponentMap } from './components';
import type { EntityId, ComponentType, Tag } from './types';

type ComponentStores = { [K in ComponentType]: ComponentStore<ComponentMap[K]> };

function createStores(): ComponentStores {
  return {
    Position: new ComponentStore(),
    Renderable: new ComponentStore(),
    Player: new ComponentStore(),
    Home: new ComponentStore(),
    Waypoint: new ComponentStore(),
    Enemy: new ComponentStore(),
  };
}

/**
 * World - the central ECS container.
 *
 * Entities live as long as the world: a session builds its world once and
 * never removes entities from it. One component store per ComponentMap key;
 * queries and tag lookups return entities in creation order.
 */
export class World {
  private nextEntityId = 1;
  private entities = new Set<EntityId>();
  private stores: ComponentStores = createStores();
  private entityTags = new Map<EntityId, Set<Tag>>();

  // ============================================
  // Entities
  // ============================================

  /**
   * Create a new entity.
   * Returns the entity ID (just a number).
   */
  createEntity(): EntityId {
    const id = this.nextEntityId++;
    this.entities.add(id);
    return id;
  }

  // ============================================
  // Component Management
  // ============================================

  /**
   * Add a component to an entity. Overwrites existing data.
   */
  addComponent<K extends ComponentType>(entity: EntityId, type: K, data: ComponentMap[K]): void {
    const store: ComponentStore<ComponentMap[K]> = this.stores[type];
    store.set(entity, data);
  }

  /**
   * Get a component from an entity.
   * Returns undefined if entity doesn't have the component.
   */
  getComponent<K extends ComponentType>(entity: EntityId, type: K): ComponentMap[K] | undefined {
    const store: ComponentStore<ComponentMap[K]> = this.stores[type];
    return store.get(entity);
  }

  hasComponent(entity: EntityId, type: ComponentType): boolean {
    return this.stores[type].has(entity);
  }

  // ============================================
  // Queries
  // ============================================

  /**
   * Query: get all entities with ALL specified components, in creation order.
   *
   * Example: world.query('Position', 'Enemy')
   */
  query(...types: ComponentType[]): EntityId[] {
    const result: EntityId[] = [];

    for (const entity of this.entities) {
      if (types.every((type) => this.hasComponent(entity, type))) {
        result.push(entity);
      }
    }

    return result;
  }

  // ============================================
  // Tags
  // ============================================

  addTag(entity: EntityId, tag: Tag): void {
    let tags = this.entityTags.get(entity);
    if (!tags) {
      tags = new Set();
      this.entityTags.set(entity, tags);
    }
    tags.add(tag);
  }

  hasTag(entity: EntityId, tag: Tag): boolean {
    return this.entityTags.get(entity)?.has(tag) ?? false;
  }

  /**
   * Get all entities with a specific tag, in creation order.
   */
  getEntitiesWithTag(tag: Tag): EntityId[] {
    const result: EntityId[] = [];
    for (const entity of this.entities) {
      if (this.hasTag(entity, tag)) {
        result.push(entity);
      }
    }
    return result;
  }
}
