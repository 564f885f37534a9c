// ============================================
// Game Session
// Owns the world and runs the per-tick update protocol
// ============================================

import {
  GAME_CONFIG,
  getHomePosition,
  getPlayerStartPosition,
  requirePositive,
} from '#shared';
import type {
  World,
  EntityId,
  ArenaSize,
  EnemyKind,
  Outcome,
  Position,
  PositionComponent,
  RenderSnapshot,
  SessionStatus,
} from '#shared';
import {
  createWorld,
  createWaypoint,
  createHome,
  createPlayer,
  createEnemy,
  activateWaypoint,
  requirePlayerEntity,
  requirePosition,
  getEnemyCount,
  SystemRunner,
  SystemPriority,
  PlayerNavigationSystem,
  EnemyAISystem,
  buildEntityViews,
  type EnemyOptions,
  type SessionContext,
} from '../ecs';
import { EventBus } from '../events/EventBus';
import { logGameOver, logSessionStarted, logWaypointSet } from '../logger';

export interface SessionOptions {
  width: number;
  height: number;
  level?: number;
  playerSpeed?: number;
  homeSize?: number;
  // Defaults: home HOME_OFFSET_X in from the right edge, player at PLAYER_START_X; both vertically centered
  homePosition?: Position;
  playerStart?: Position;
}

/**
 * GameSession - one round from start to win or lose.
 *
 * Lifecycle: running → won | lost. Terminal states are final: ticks, clicks
 * and spawns after the end change nothing.
 *
 * Each tick runs the player first, then enemies in spawn order. Home is
 * static and has no per-tick work. The first terminal signal stops the tick.
 */
export class GameSession {
  readonly world: World;
  readonly level: number;
  readonly arena: Readonly<ArenaSize>;
  readonly events: EventBus;

  private readonly runner = new SystemRunner();
  private readonly playerPosition: PositionComponent;
  private status: SessionStatus = 'running';
  private tick = 0;
  private started = false;

  constructor(options: SessionOptions, events: EventBus = new EventBus()) {
    const width = requirePositive('arena.width', options.width);
    const height = requirePositive('arena.height', options.height);
    this.level = requirePositive('level', options.level ?? GAME_CONFIG.DEFAULT_LEVEL);
    this.arena = { width, height };
    this.events = events;

    this.world = createWorld();
    createWaypoint(this.world);
    createHome(this.world, options.homePosition ?? getHomePosition(width, height), options.homeSize);
    createPlayer(this.world, options.playerStart ?? getPlayerStartPosition(height), options.playerSpeed);
    this.playerPosition = requirePosition(this.world, requirePlayerEntity(this.world));

    this.runner.register(new PlayerNavigationSystem(), SystemPriority.PLAYER_NAVIGATION);
    this.runner.register(new EnemyAISystem(), SystemPriority.ENEMY_AI);
  }

  /**
   * Announce the level. Safe to call more than once.
   */
  start(): void {
    if (this.started) return;
    this.started = true;
    logSessionStarted(this.level, this.arena.width, this.arena.height);
    this.events.emit('levelShown', { level: this.level });
  }

  /**
   * Run one simulation step. A no-op once the session has ended.
   * @returns status after the step
   */
  advanceTick(): SessionStatus {
    if (this.isOver()) return this.status;

    this.tick++;
    this.runner.update(this.world, this.createContext());
    return this.status;
  }

  /**
   * Player clicked at (x, y): retarget the waypoint.
   * @returns false if the session has already ended
   */
  handleClick(x: number, y: number): boolean {
    if (this.isOver()) return false;
    activateWaypoint(this.world, x, y);
    logWaypointSet(x, y);
    return true;
  }

  /**
   * Add an enemy between ticks.
   * @returns the new entity, or null if the session has already ended
   */
  addEnemy(kind: EnemyKind, position: Position, options?: EnemyOptions): EntityId | null {
    if (this.isOver()) return null;
    return createEnemy(this.world, kind, position, options);
  }

  getStatus(): SessionStatus {
    return this.status;
  }

  getOutcome(): Outcome | null {
    switch (this.status) {
      case 'won':
        return 'win';
      case 'lost':
        return 'lose';
      case 'running':
        return null;
    }
  }

  getTick(): number {
    return this.tick;
  }

  isOver(): boolean {
    return this.status !== 'running';
  }

  getEnemyCount(): number {
    return getEnemyCount(this.world);
  }

  /**
   * Everything the renderer needs for the current frame
   */
  getRenderSnapshot(): RenderSnapshot {
    return {
      tick: this.tick,
      level: this.level,
      status: this.status,
      arena: { ...this.arena },
      entities: buildEntityViews(this.world),
    };
  }

  private createContext(): SessionContext {
    return {
      level: this.level,
      tick: this.tick,
      arena: this.arena,
      player: this.playerPosition,
      isOver: () => this.isOver(),
      endGame: (outcome) => this.finish(outcome),
    };
  }

  private finish(outcome: Outcome): void {
    if (this.isOver()) return;
    this.status = outcome === 'win' ? 'won' : 'lost';
    logGameOver(outcome, this.level, this.tick);
    this.events.emit('gameOver', { outcome, level: this.level });
  }
}
