import { GAME_CONFIG, advance, outsideRange, type ArenaSize } from '#shared';
import type { EnemyPolicy } from './types';
import { hitsPlayer } from './collision';

/**
 * The gate: rightmost quarter of the arena, middle third vertically.
 */
export function getGateBounds({ width, height }: ArenaSize): {
  minX: number;
  maxX: number;
  minY: number;
  maxY: number;
} {
  return {
    minX: width - Math.floor(width / 4),
    maxX: width,
    minY: Math.floor(height / 3),
    maxY: height - Math.floor(height / 3),
  };
}

/**
 * Random walk reflected off the gate rectangle in front of home
 * instead of the arena walls.
 */
export const updateGateGuard: EnemyPolicy<'gateGuard'> = (position, enemy, behavior, ctx) => {
  if (hitsPlayer(position, enemy.size, ctx.player)) {
    return 'lose';
  }

  advance(position, behavior.angle, GAME_CONFIG.GATE_GUARD_SPEED);

  const gate = getGateBounds(ctx.arena);
  if (outsideRange(position.x, gate.minX, gate.maxX)) {
    behavior.angle = Math.PI - behavior.angle;
  }
  if (outsideRange(position.y, gate.minY, gate.maxY)) {
    behavior.angle = -behavior.angle;
  }

  return null;
};
