import { GAME_CONFIG, advance, outsideRange } from '#shared';
import type { EnemyPolicy } from './types';
import { hitsPlayer } from './collision';

/**
 * Bounce around the whole arena. The heading is mirrored after a step that
 * leaves [0, width] (x) or [0, height] (y); both can flip in the same tick.
 * Position is never clamped, so the walker may sit up to one step outside.
 */
export const updateRandomWalk: EnemyPolicy<'random'> = (position, enemy, behavior, ctx) => {
  if (hitsPlayer(position, enemy.size, ctx.player)) {
    return 'lose';
  }

  advance(position, behavior.angle, GAME_CONFIG.RANDOM_WALK_SPEED);

  const { width, height } = ctx.arena;
  if (outsideRange(position.x, 0, width)) {
    behavior.angle = Math.PI - behavior.angle;
  }
  if (outsideRange(position.y, 0, height)) {
    behavior.angle = -behavior.angle;
  }

  return null;
};
