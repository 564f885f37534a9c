// ============================================
// ECS System Types
// ============================================

import type { World } from '#shared';
import type { SessionContext } from './GameContext';

/**
 * Base System interface
 * All game systems implement this interface
 */
export interface System {
  /** System name for debugging/logging */
  readonly name: string;

  /**
   * Called every game tick
   * @param world The ECS World containing all entities and components
   * @param ctx Read-only view of the session plus the endGame signal
   */
  update(world: World, ctx: SessionContext): void;
}

/**
 * System priority - determines update order
 * Lower numbers run first
 *
 * The player always moves before any enemy, so enemies chase and
 * hit-test against the player's position for this tick, never last tick's.
 * Home sits between them in the order but is static and has no system.
 */
export const SystemPriority = {
  PLAYER_NAVIGATION: 100,
  ENEMY_AI: 300,
} as const;
