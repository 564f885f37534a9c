// ============================================
// Game Constants & Configuration
// ============================================

import type { Position } from './types';

export const GAME_CONFIG = {
  // Arena
  ARENA_WIDTH: 800,
  ARENA_HEIGHT: 600,
  DEFAULT_LEVEL: 1,

  // Host loop
  TICK_RATE: 60, // ticks per second when driven in real time
  ENEMY_SPAWN_DELAY_MS: 100, // one wave, this long after the session starts

  // Player
  PLAYER_SPEED: 5, // world units per tick
  PLAYER_START_X: 50, // y starts at half the arena height
  PLAYER_COLOR: 'green',

  // Waypoint
  WAYPOINT_MARKER_SIZE: 20,
  WAYPOINT_COLOR: 'green',

  // Home (placed HOME_OFFSET_X from the right edge, vertically centered)
  HOME_SIZE: 20,
  HOME_OFFSET_X: 100,
  HOME_COLOR: 'brown',

  // Enemies
  ENEMY_SIZE: 20,
  CHASING_SPEED: 3,
  FENCING_SPEED: 2,
  RANDOM_WALK_SPEED: 3,
  GATE_GUARD_SPEED: 3,
  FENCING_PATROL_SIDE: 100, // side of the patrol square centered on home
  RANDOM_WALK_INITIAL_ANGLE: 45, // radians, kept as the game has always used it
} as const;

// Enemy colors by kind
export const ENEMY_COLORS = {
  random: 'red',
  chasing: 'blue',
  fencing: 'orange',
  gateGuard: 'pink',
} as const;

/**
 * Spawn points for one enemy wave.
 * Fencing starts on the top-left corner of its patrol square,
 * gate guard starts on home's row just in front of it.
 */
export function getEnemySpawnPoints(width: number, height: number): {
  random: Position;
  chasing: Position;
  fencing: Position;
  gateGuard: Position;
} {
  const midY = Math.floor(height / 2);
  return {
    random: { x: 100, y: 100 },
    chasing: { x: 200, y: 200 },
    fencing: { x: width - 150, y: midY - 50 },
    gateGuard: { x: width - 100, y: midY },
  };
}

/**
 * Where home sits in an arena of the given size
 */
export function getHomePosition(width: number, height: number): Position {
  return { x: width - GAME_CONFIG.HOME_OFFSET_X, y: Math.floor(height / 2) };
}

/**
 * Where the player starts in an arena of the given size
 */
export function getPlayerStartPosition(height: number): Position {
  return { x: GAME_CONFIG.PLAYER_START_X, y: Math.floor(height / 2) };
}
