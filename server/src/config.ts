// ============================================
// Host Configuration
// GAME_CONFIG defaults with environment overrides
// ============================================

import {
  GAME_CONFIG,
  InvalidConfigurationError,
  requireNonNegative,
  requirePositive,
} from '#shared';

export interface GameConfig {
  width: number;
  height: number;
  level: number;
  tickIntervalMs: number;
  spawnDelayMs: number;
  playerSpeed: number;
}

type Env = Record<string, string | undefined>;

/**
 * Read a numeric variable. Unset or empty falls back; anything else must parse.
 */
function readNumber(env: Env, key: string, fallback: number, parse: (raw: string) => number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = parse(raw);
  if (Number.isNaN(value)) {
    throw new InvalidConfigurationError(key, raw, 'must be a number');
  }
  return value;
}

/**
 * Resolve the game configuration.
 *
 * Recognized variables: ARENA_WIDTH, ARENA_HEIGHT, GAME_LEVEL,
 * TICK_INTERVAL_MS, SPAWN_DELAY_MS, PLAYER_SPEED.
 * Throws InvalidConfigurationError for unparseable or out-of-range values.
 */
export function loadConfig(env: Env = process.env): GameConfig {
  const int = (raw: string) => parseInt(raw, 10);

  return {
    width: requirePositive('ARENA_WIDTH', readNumber(env, 'ARENA_WIDTH', GAME_CONFIG.ARENA_WIDTH, int)),
    height: requirePositive('ARENA_HEIGHT', readNumber(env, 'ARENA_HEIGHT', GAME_CONFIG.ARENA_HEIGHT, int)),
    level: requirePositive('GAME_LEVEL', readNumber(env, 'GAME_LEVEL', GAME_CONFIG.DEFAULT_LEVEL, int)),
    tickIntervalMs: requirePositive(
      'TICK_INTERVAL_MS',
      readNumber(env, 'TICK_INTERVAL_MS', 1000 / GAME_CONFIG.TICK_RATE, parseFloat)
    ),
    spawnDelayMs: requireNonNegative(
      'SPAWN_DELAY_MS',
      readNumber(env, 'SPAWN_DELAY_MS', GAME_CONFIG.ENEMY_SPAWN_DELAY_MS, parseFloat)
    ),
    playerSpeed: requirePositive('PLAYER_SPEED', readNumber(env, 'PLAYER_SPEED', GAME_CONFIG.PLAYER_SPEED, parseFloat)),
  };
}
