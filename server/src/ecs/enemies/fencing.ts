import { GAME_CONFIG } from '#shared';
import type { EnemyPolicy } from './types';
import { hitsPlayer } from './collision';

/**
 * Walk the patrol square around home clockwise (on screen):
 * right along the top edge, down the right edge, left along the bottom,
 * up the left edge, then start over.
 */
export const updateFencing: EnemyPolicy<'fencing'> = (position, enemy, behavior, ctx) => {
  if (hitsPlayer(position, enemy.size, ctx.player)) {
    return 'lose';
  }

  const speed = GAME_CONFIG.FENCING_SPEED;
  const [topLeft, topRight, bottomRight, bottomLeft] = behavior.corners;

  switch (behavior.step) {
    case 0:
      position.x += speed;
      if (position.x >= topRight.x) behavior.step = 1;
      break;
    case 1:
      position.y += speed;
      if (position.y >= bottomRight.y) behavior.step = 2;
      break;
    case 2:
      position.x -= speed;
      if (position.x <= bottomLeft.x) behavior.step = 3;
      break;
    case 3:
      position.y -= speed;
      if (position.y <= topLeft.y) behavior.step = 0;
      break;
  }

  return null;
};
