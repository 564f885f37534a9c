// ============================================
// Configuration Loading Tests
// ============================================

import { describe, it, expect } from 'vitest';
import { InvalidConfigurationError } from '#shared';
import { loadConfig } from '../config';

describe('loadConfig', () => {
  it('falls back to the defaults', () => {
    expect(loadConfig({})).toEqual({
      width: 800,
      height: 600,
      level: 1,
      tickIntervalMs: 1000 / 60,
      spawnDelayMs: 100,
      playerSpeed: 5,
    });
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig({
      ARENA_WIDTH: '1024',
      ARENA_HEIGHT: '768',
      GAME_LEVEL: '3',
      TICK_INTERVAL_MS: '20',
      SPAWN_DELAY_MS: '0',
      PLAYER_SPEED: '2.5',
    });

    expect(config).toEqual({
      width: 1024,
      height: 768,
      level: 3,
      tickIntervalMs: 20,
      spawnDelayMs: 0,
      playerSpeed: 2.5,
    });
  });

  it('treats empty values as unset', () => {
    expect(loadConfig({ ARENA_WIDTH: '  ' }).width).toBe(800);
  });

  it('rejects values that do not parse', () => {
    expect(() => loadConfig({ ARENA_WIDTH: 'wide' })).toThrow(
      'Invalid configuration: ARENA_WIDTH must be a number (got wide)'
    );
  });

  it('rejects out-of-range values', () => {
    expect(() => loadConfig({ PLAYER_SPEED: '0' })).toThrow(InvalidConfigurationError);
    expect(() => loadConfig({ SPAWN_DELAY_MS: '-1' })).toThrow(
      'Invalid configuration: SPAWN_DELAY_MS must be a finite number of 0 or more (got -1)'
    );
  });
});
