// ============================================
// EnemyAISystem Unit Tests
// ============================================

import { describe, it, expect } from 'vitest';
import { EnemyAISystem } from '../EnemyAISystem';
import { createTestWorld, createTestContext, createTestEnemy } from './testUtils';
import { requirePosition } from '../../factories';

describe('EnemyAISystem', () => {
  const system = new EnemyAISystem();

  it('ends the game when a chaser is within its size of the player', () => {
    const world = createTestWorld({ player: { x: 205, y: 205 } });
    const chaser = createTestEnemy(world, 'chasing', { x: 200, y: 200 });
    const ctx = createTestContext(world);

    system.update(world, ctx);

    expect(ctx.ended).toEqual(['lose']);
    // Caught, so it does not move
    expect(requirePosition(world, chaser)).toEqual({ x: 200, y: 200 });
  });

  it('moves a chaser three units toward the player', () => {
    const world = createTestWorld({ player: { x: 50, y: 300 } });
    const chaser = createTestEnemy(world, 'chasing', { x: 200, y: 300 });
    const ctx = createTestContext(world);

    system.update(world, ctx);

    const pos = requirePosition(world, chaser);
    expect(pos.x).toBeCloseTo(197);
    expect(pos.y).toBeCloseTo(300);
    expect(ctx.ended).toEqual([]);
  });

  it('stops at the first enemy that catches the player', () => {
    const world = createTestWorld({ player: { x: 50, y: 300 } });
    createTestEnemy(world, 'random', { x: 55, y: 305 });
    const later = createTestEnemy(world, 'chasing', { x: 200, y: 300 });
    const ctx = createTestContext(world);

    system.update(world, ctx);

    expect(ctx.ended).toEqual(['lose']);
    expect(requirePosition(world, later)).toEqual({ x: 200, y: 300 });
  });

  it('updates every enemy when nobody is caught', () => {
    const world = createTestWorld({ player: { x: 50, y: 300 } });
    const walker = createTestEnemy(world, 'random', { x: 400, y: 300 }, { angle: 0 });
    const chaser = createTestEnemy(world, 'chasing', { x: 200, y: 300 });

    system.update(world, createTestContext(world));

    expect(requirePosition(world, walker).x).toBeCloseTo(403);
    expect(requirePosition(world, chaser).x).toBeCloseTo(197);
  });

  it('does nothing once the game is already over', () => {
    const world = createTestWorld({ player: { x: 50, y: 300 } });
    const chaser = createTestEnemy(world, 'chasing', { x: 200, y: 300 });
    const ctx = createTestContext(world);
    ctx.endGame('win');

    system.update(world, ctx);

    expect(requirePosition(world, chaser)).toEqual({ x: 200, y: 300 });
    expect(ctx.ended).toEqual(['win']);
  });
});
