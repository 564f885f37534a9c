// ============================================
// Enemy Generator
// Populates the arena with one wave of enemies after a delay
// ============================================

import { GAME_CONFIG, getEnemySpawnPoints, requireNonNegative } from '#shared';
import type { EntityId, EnemyKind, HostMessage } from '#shared';
import type { Scheduler } from '../host/Scheduler';
import type { GameSession } from './GameSession';
import { logEnemiesSpawned } from '../logger';

// Spawn order, which is also the order enemies update in
const WAVE: readonly EnemyKind[] = ['random', 'chasing', 'fencing', 'gateGuard'];

/**
 * EnemyGenerator - time-scheduled enemy factory.
 *
 * schedule() queues a single spawnEnemies message; the host dispatches it
 * back to createEnemies() on the same queue as ticks, so spawns always land
 * between ticks. Level and arena come from the session; the level is
 * reported with the wave but does not change it yet.
 */
export class EnemyGenerator {
  readonly initialDelayMs: number;

  constructor(
    private readonly session: GameSession,
    initialDelayMs: number = GAME_CONFIG.ENEMY_SPAWN_DELAY_MS
  ) {
    this.initialDelayMs = requireNonNegative('spawnDelayMs', initialDelayMs);
  }

  /**
   * Queue the spawn trigger
   */
  schedule(scheduler: Scheduler<HostMessage>): void {
    scheduler.schedule(this.initialDelayMs, { type: 'spawnEnemies' });
  }

  /**
   * Create one enemy of each kind at its spawn point.
   * Does nothing once the session has ended.
   * @returns the created entities, in update order
   */
  createEnemies(): EntityId[] {
    if (this.session.isOver()) return [];

    const { level, arena } = this.session;
    const spawnPoints = getEnemySpawnPoints(arena.width, arena.height);
    const created: EntityId[] = [];
    for (const kind of WAVE) {
      const entity = this.session.addEnemy(kind, spawnPoints[kind], { size: GAME_CONFIG.ENEMY_SIZE });
      if (entity !== null) created.push(entity);
    }

    logEnemiesSpawned(level, [...WAVE]);
    this.session.events.emit('enemiesSpawned', { level, count: created.length });
    return created;
  }
}
