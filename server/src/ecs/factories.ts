// ============================================
// ECS Entity Factories
// Functions to create entities with proper components
// ============================================

import {
  GAME_CONFIG,
  ENEMY_COLORS,
  World,
  Components,
  Tags,
  requirePositive,
  squareContains,
} from '#shared';
import type {
  Position,
  EntityId,
  EnemyKind,
  PositionComponent,
  PlayerComponent,
  HomeComponent,
  WaypointComponent,
  EnemyComponent,
  EnemyBehavior,
  PatrolCorners,
} from '#shared';

// ============================================
// World Setup
// ============================================

/**
 * Create an empty ECS World for one session.
 */
export function createWorld(): World {
  return new World();
}

// ============================================
// Entity Creation
// ============================================

/**
 * Create the home square. Never moves after this.
 * Throws InvalidConfigurationError if size is not positive.
 */
export function createHome(world: World, position: Position, size: number = GAME_CONFIG.HOME_SIZE): EntityId {
  requirePositive('home.size', size);

  const entity = world.createEntity();
  world.addComponent(entity, Components.Position, { x: position.x, y: position.y });
  world.addComponent(entity, Components.Home, { size });
  world.addComponent(entity, Components.Renderable, { shape: 'rectangle', color: GAME_CONFIG.HOME_COLOR });
  world.addTag(entity, Tags.Home);
  return entity;
}

/**
 * Create the player token.
 * Throws InvalidConfigurationError if speed is not positive.
 */
export function createPlayer(
  world: World,
  position: Position,
  speed: number = GAME_CONFIG.PLAYER_SPEED
): EntityId {
  requirePositive('player.speed', speed);

  const entity = world.createEntity();
  world.addComponent(entity, Components.Position, { x: position.x, y: position.y });
  world.addComponent(entity, Components.Player, { speed });
  world.addComponent(entity, Components.Renderable, { shape: 'turtle', color: GAME_CONFIG.PLAYER_COLOR });
  world.addTag(entity, Tags.Player);
  return entity;
}

/**
 * Create the waypoint. Starts inactive at the origin.
 */
export function createWaypoint(world: World): EntityId {
  const entity = world.createEntity();
  world.addComponent(entity, Components.Position, { x: 0, y: 0 });
  world.addComponent(entity, Components.Waypoint, { active: false });
  world.addComponent(entity, Components.Renderable, { shape: 'cross', color: GAME_CONFIG.WAYPOINT_COLOR });
  world.addTag(entity, Tags.Waypoint);
  return entity;
}

/**
 * Corners of the square patrol path centered on home.
 * Order: top-left, top-right, bottom-right, bottom-left.
 */
export function computePatrolCorners(
  home: Position,
  side: number = GAME_CONFIG.FENCING_PATROL_SIDE
): PatrolCorners {
  const half = side / 2;
  return [
    { x: home.x - half, y: home.y - half },
    { x: home.x + half, y: home.y - half },
    { x: home.x + half, y: home.y + half },
    { x: home.x - half, y: home.y + half },
  ];
}

export interface EnemyOptions {
  size?: number;
  color?: string;
  // Starting heading for random and gate guard walkers
  angle?: number;
}

/**
 * Initial behavior state for an enemy kind.
 * Fencing enemies read home's position once, here.
 */
function initialBehavior(world: World, kind: EnemyKind, angle: number): EnemyBehavior {
  switch (kind) {
    case 'chasing':
      return { kind };
    case 'fencing':
      return { kind, step: 0, corners: computePatrolCorners(requirePosition(world, requireHomeEntity(world))) };
    case 'random':
    case 'gateGuard':
      return { kind, angle };
  }
}

/**
 * Create an enemy of the given kind at a position.
 * Throws InvalidConfigurationError if size is not positive.
 */
export function createEnemy(
  world: World,
  kind: EnemyKind,
  position: Position,
  options: EnemyOptions = {}
): EntityId {
  const size = requirePositive('enemy.size', options.size ?? GAME_CONFIG.ENEMY_SIZE);
  const color = options.color ?? ENEMY_COLORS[kind];
  const behavior = initialBehavior(world, kind, options.angle ?? GAME_CONFIG.RANDOM_WALK_INITIAL_ANGLE);

  const entity = world.createEntity();
  world.addComponent(entity, Components.Position, { x: position.x, y: position.y });
  world.addComponent(entity, Components.Enemy, { size, color, behavior });
  world.addComponent(entity, Components.Renderable, { shape: 'circle', color });
  world.addTag(entity, Tags.Enemy);
  return entity;
}

// ============================================
// Lookups
// ============================================

function requireSingleton(world: World, tag: typeof Tags.Player | typeof Tags.Home | typeof Tags.Waypoint): EntityId {
  const [entity] = world.getEntitiesWithTag(tag);
  if (entity === undefined) {
    throw new Error(`EntityMissing: no ${tag} entity in world`);
  }
  return entity;
}

export function requirePlayerEntity(world: World): EntityId {
  return requireSingleton(world, Tags.Player);
}

export function requireHomeEntity(world: World): EntityId {
  return requireSingleton(world, Tags.Home);
}

export function requireWaypointEntity(world: World): EntityId {
  return requireSingleton(world, Tags.Waypoint);
}

// ============================================
// Component Accessors
// Throw if component is missing (invariant violation)
// ============================================

export function requirePosition(world: World, entity: EntityId): PositionComponent {
  const comp = world.getComponent(entity, Components.Position);
  if (!comp) {
    throw new Error(`EntityMissingComponent: Position missing on entity ${entity}`);
  }
  return comp;
}

export function requirePlayer(world: World, entity: EntityId): PlayerComponent {
  const comp = world.getComponent(entity, Components.Player);
  if (!comp) {
    throw new Error(`EntityMissingComponent: Player missing on entity ${entity}`);
  }
  return comp;
}

export function requireHome(world: World, entity: EntityId): HomeComponent {
  const comp = world.getComponent(entity, Components.Home);
  if (!comp) {
    throw new Error(`EntityMissingComponent: Home missing on entity ${entity}`);
  }
  return comp;
}

export function requireWaypoint(world: World, entity: EntityId): WaypointComponent {
  const comp = world.getComponent(entity, Components.Waypoint);
  if (!comp) {
    throw new Error(`EntityMissingComponent: Waypoint missing on entity ${entity}`);
  }
  return comp;
}

export function requireEnemy(world: World, entity: EntityId): EnemyComponent {
  const comp = world.getComponent(entity, Components.Enemy);
  if (!comp) {
    throw new Error(`EntityMissingComponent: Enemy missing on entity ${entity}`);
  }
  return comp;
}

// ============================================
// Waypoint
// ============================================

/**
 * Point the waypoint at (x, y) and mark it active.
 * Reactivating simply overwrites the previous target.
 */
export function activateWaypoint(world: World, x: number, y: number): void {
  const entity = requireWaypointEntity(world);
  const pos = requirePosition(world, entity);
  pos.x = x;
  pos.y = y;
  requireWaypoint(world, entity).active = true;
}

/**
 * Mark the waypoint inactive. Its stored coordinates are left as they were.
 */
export function deactivateWaypoint(world: World): void {
  requireWaypoint(world, requireWaypointEntity(world)).active = false;
}

export function isWaypointActive(world: World): boolean {
  return requireWaypoint(world, requireWaypointEntity(world)).active;
}

/**
 * Current navigation target, or null while the waypoint is inactive.
 */
export function getWaypointTarget(world: World): Position | null {
  const entity = requireWaypointEntity(world);
  if (!requireWaypoint(world, entity).active) return null;
  const pos = requirePosition(world, entity);
  return { x: pos.x, y: pos.y };
}

// ============================================
// Home
// ============================================

/**
 * Does home contain (x, y)? Edges count as inside.
 */
export function homeContains(world: World, x: number, y: number): boolean {
  const entity = requireHomeEntity(world);
  return squareContains(requirePosition(world, entity), requireHome(world, entity).size, { x, y });
}

// ============================================
// Enemies
// ============================================

export function getEnemyCount(world: World): number {
  return world.getEntitiesWithTag(Tags.Enemy).length;
}
