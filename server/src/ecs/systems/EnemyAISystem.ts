// ============================================
// Enemy AI System
// Runs every enemy's motion policy in spawn order
// ============================================

import { Tags, type World } from '#shared';
import type { System } from './types';
import type { SessionContext } from './GameContext';
import { requireEnemy, requirePosition } from '../factories';
import { updateEnemy } from '../enemies';

/**
 * EnemyAISystem - hit test then move, one enemy at a time
 *
 * Enemies run in the order they were spawned. The first enemy that
 * catches the player ends the game and the rest skip this tick.
 *
 * Priority: 300 (after player navigation)
 */
export class EnemyAISystem implements System {
  readonly name = 'EnemyAISystem';

  update(world: World, ctx: SessionContext): void {
    for (const entity of world.getEntitiesWithTag(Tags.Enemy)) {
      if (ctx.isOver()) return;

      const outcome = updateEnemy(requirePosition(world, entity), requireEnemy(world, entity), ctx);
      if (outcome) {
        ctx.endGame(outcome);
        return;
      }
    }
  }
}
