import { GAME_CONFIG, advance, angleTo, distance } from '#shared';
import type { EnemyPolicy } from './types';

/**
 * Pure pursuit: step straight at the player's current position.
 * Uses a circular catch radius equal to the enemy's size instead of the box test.
 */
export const updateChasing: EnemyPolicy<'chasing'> = (position, enemy, _behavior, ctx) => {
  if (distance(position, ctx.player) < enemy.size) {
    return 'lose';
  }

  advance(position, angleTo(position, ctx.player), GAME_CONFIG.CHASING_SPEED);
  return null;
};
