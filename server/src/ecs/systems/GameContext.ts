// ============================================
// Session Context
// Minimal context passed to all ECS systems
// ============================================

import type { Outcome } from '#shared';
import type { EnemyUpdateContext } from '../enemies';

/**
 * SessionContext - what a system may see of the session that runs it.
 *
 * Systems get the player's live position, the arena bounds and a way to end
 * the game, never the GameSession itself.
 */
export interface SessionContext extends EnemyUpdateContext {
  readonly level: number;

  // Tick number being processed (1 on the first tick)
  readonly tick: number;

  // True once a terminal signal has been raised
  isOver(): boolean;

  // Raise a terminal signal. The first one wins; later calls are ignored.
  endGame(outcome: Outcome): void;
}
