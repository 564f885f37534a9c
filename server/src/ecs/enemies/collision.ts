import { squareOverlapsPoint, type Position } from '#shared';

/**
 * Box hit test shared by every enemy except the chaser.
 * The enemy's square of side `size` is centered on it; a player exactly
 * on the edge is not hit.
 */
export function hitsPlayer(enemy: Position, size: number, player: Position): boolean {
  return squareOverlapsPoint(enemy, size, player);
}
