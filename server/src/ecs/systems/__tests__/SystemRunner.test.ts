// ============================================
// SystemRunner Unit Tests
// ============================================

import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { World } from '#shared';
import { SystemRunner } from '../SystemRunner';
import type { System } from '../types';
import type { SessionContext } from '../GameContext';
import { createTestWorld, createTestContext } from './testUtils';
import { logger } from '../../../logger';

function recordingSystem(name: string, calls: string[], action?: (ctx: SessionContext) => void): System {
  return {
    name,
    update(_world: World, ctx: SessionContext) {
      calls.push(name);
      action?.(ctx);
    },
  };
}

describe('SystemRunner', () => {
  let runner: SystemRunner;
  let calls: string[];

  beforeEach(() => {
    vi.clearAllMocks();
    runner = new SystemRunner();
    calls = [];
  });

  it('runs systems in priority order, lowest first', () => {
    runner.register(recordingSystem('Enemies', calls), 300);
    runner.register(recordingSystem('Player', calls), 100);
    const world = createTestWorld();

    runner.update(world, createTestContext(world));

    expect(calls).toEqual(['Player', 'Enemies']);
  });

  it('keeps registration order for equal priorities', () => {
    runner.register(recordingSystem('A', calls), 200);
    runner.register(recordingSystem('B', calls), 200);
    const world = createTestWorld();

    runner.update(world, createTestContext(world));

    expect(calls).toEqual(['A', 'B']);
  });

  it('skips the remaining systems once the game ends', () => {
    runner.register(recordingSystem('Player', calls, (ctx) => ctx.endGame('win')), 100);
    runner.register(recordingSystem('Enemies', calls), 300);
    const world = createTestWorld();
    const ctx = createTestContext(world);

    runner.update(world, ctx);

    expect(calls).toEqual(['Player']);
    expect(ctx.ended).toEqual(['win']);
  });

  it('logs a throwing system and carries on with the next one', () => {
    runner.register(
      recordingSystem('Broken', calls, () => {
        throw new Error('boom');
      }),
      100
    );
    runner.register(recordingSystem('Enemies', calls), 300);
    const world = createTestWorld();

    runner.update(world, createTestContext(world, 7));

    expect(calls).toEqual(['Broken', 'Enemies']);
    expect(logger.error).toHaveBeenCalledTimes(1);
    expect(logger.error).toHaveBeenCalledWith(
      expect.objectContaining({ event: 'system_error', system: 'Broken', tick: 7, error: 'boom' }),
      'System Broken threw an error'
    );
  });
});
