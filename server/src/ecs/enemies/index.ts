// ============================================
// Enemy Motion Policies
// One module per enemy kind, dispatched on the behavior tag
// ============================================

import type { EnemyComponent, Outcome, PositionComponent } from '#shared';
import type { EnemyUpdateContext } from './types';
import { updateChasing } from './chasing';
import { updateFencing } from './fencing';
import { updateRandomWalk } from './randomWalk';
import { updateGateGuard } from './gateGuard';

export type { EnemyUpdateContext } from './types';
export { hitsPlayer } from './collision';
export { getGateBounds } from './gateGuard';

/**
 * Advance one enemy by one tick.
 * @returns 'lose' if it caught the player (motion is skipped), otherwise null
 */
export function updateEnemy(
  position: PositionComponent,
  enemy: EnemyComponent,
  ctx: EnemyUpdateContext
): Outcome | null {
  const behavior = enemy.behavior;
  switch (behavior.kind) {
    case 'chasing':
      return updateChasing(position, enemy, behavior, ctx);
    case 'fencing':
      return updateFencing(position, enemy, behavior, ctx);
    case 'random':
      return updateRandomWalk(position, enemy, behavior, ctx);
    case 'gateGuard':
      return updateGateGuard(position, enemy, behavior, ctx);
    default: {
      const unknown: never = behavior;
      throw new Error(`Unknown enemy behavior: ${JSON.stringify(unknown)}`);
    }
  }
}
