// ============================================
// Player Navigation System
// Walks the player toward the active waypoint and detects arrival home
// ============================================

import { advance, angleTo, distance, type World } from '#shared';
import type { System } from './types';
import type { SessionContext } from './GameContext';
import {
  requirePlayerEntity,
  requirePosition,
  requirePlayer,
  homeContains,
  getWaypointTarget,
  deactivateWaypoint,
} from '../factories';

/**
 * PlayerNavigationSystem - one step of waypoint seeking per tick
 *
 * - Player already inside home: win, and no movement this tick
 * - Waypoint inactive: player stays put
 * - Otherwise step exactly `speed` toward the waypoint. If the target was
 *   closer than one step before moving, the waypoint is deactivated; the
 *   player may overshoot it by up to one step.
 *
 * Priority: 100 (before enemies)
 */
export class PlayerNavigationSystem implements System {
  readonly name = 'PlayerNavigationSystem';

  update(world: World, ctx: SessionContext): void {
    const entity = requirePlayerEntity(world);
    const pos = requirePosition(world, entity);

    if (homeContains(world, pos.x, pos.y)) {
      ctx.endGame('win');
      return;
    }

    const target = getWaypointTarget(world);
    if (!target) return;

    const { speed } = requirePlayer(world, entity);
    const remaining = distance(pos, target);
    advance(pos, angleTo(pos, target), speed);

    if (remaining < speed) {
      deactivateWaypoint(world);
    }
  }
}
