// ============================================
// ECS Core Types
// ============================================

import type { ComponentMap } from './components';

/**
 * Entity ID - just a number.
 * Entities have no data themselves, they're just IDs that
 * components are attached to.
 */
export type EntityId = number;

/**
 * Component type identifier - a key of ComponentMap.
 */
export type ComponentType = keyof ComponentMap;

/**
 * Standard component types used throughout the ECS.
 * Using const object for type safety while keeping string values.
 */
export const Components = {
  Position: 'Position',
  Renderable: 'Renderable',
  Player: 'Player',
  Home: 'Home',
  Waypoint: 'Waypoint',
  Enemy: 'Enemy',
} as const satisfies { [K in ComponentType]: K };

/**
 * Entity tags for quick type identification.
 * Tags are lightweight - just a Set<string> per entity.
 */
export const Tags = {
  Player: 'player',
  Home: 'home',
  Waypoint: 'waypoint',
  Enemy: 'enemy',
} as const;

export type Tag = (typeof Tags)[keyof typeof Tags];
