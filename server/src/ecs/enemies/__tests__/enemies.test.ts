// ============================================
// Enemy Motion Policy Tests
// ============================================

import { describe, it, expect } from 'vitest';
import { GAME_CONFIG } from '#shared';
import type { EnemyBehavior, EnemyComponent, PositionComponent } from '#shared';
import { updateEnemy, hitsPlayer, getGateBounds, type EnemyUpdateContext } from '..';
import {
  computePatrolCorners,
  createEnemy,
  createWorld,
  requireEnemy,
  requirePosition,
} from '../../factories';

const ARENA = { width: 800, height: 600 };
const FAR_AWAY = { x: -1000, y: -1000 };

function context(player = FAR_AWAY): EnemyUpdateContext {
  return { player, arena: ARENA };
}

function enemy(behavior: EnemyBehavior, size = 20): EnemyComponent {
  return { size, color: 'red', behavior };
}

describe('hitsPlayer', () => {
  it('hits a player strictly inside the square', () => {
    expect(hitsPlayer({ x: 100, y: 100 }, 20, { x: 109.9, y: 90.1 })).toBe(true);
  });

  it('misses a player exactly on the edge', () => {
    expect(hitsPlayer({ x: 100, y: 100 }, 20, { x: 110, y: 100 })).toBe(false);
    expect(hitsPlayer({ x: 100, y: 100 }, 20, { x: 100, y: 90 })).toBe(false);
  });

  it('depends only on the offset between enemy and player', () => {
    const offsets = [
      { x: 3, y: -4 },
      { x: 9, y: 9 },
      { x: 12, y: 0 },
    ];
    for (const offset of offsets) {
      const atOrigin = hitsPlayer({ x: 0, y: 0 }, 20, offset);
      const shifted = hitsPlayer({ x: 250, y: 40 }, 20, { x: 250 + offset.x, y: 40 + offset.y });
      expect(shifted).toBe(atOrigin);
    }
  });
});

describe('chasing', () => {
  it('catches a player closer than its size', () => {
    const position: PositionComponent = { x: 200, y: 200 };
    const outcome = updateEnemy(position, enemy({ kind: 'chasing' }), context({ x: 205, y: 205 }));

    expect(outcome).toBe('lose');
    expect(position).toEqual({ x: 200, y: 200 });
  });

  it('does not catch at exactly its size and keeps closing in', () => {
    const position: PositionComponent = { x: 200, y: 200 };
    const outcome = updateEnemy(position, enemy({ kind: 'chasing' }), context({ x: 220, y: 200 }));

    expect(outcome).toBeNull();
    expect(position.x).toBeCloseTo(203);
    expect(position.y).toBeCloseTo(200);
  });
});

describe('random walk', () => {
  it('keeps its heading inside the arena', () => {
    const position: PositionComponent = { x: 400, y: 300 };
    const behavior: EnemyBehavior = { kind: 'random', angle: 0 };

    expect(updateEnemy(position, enemy(behavior), context())).toBeNull();

    expect(position).toEqual({ x: 403, y: 300 });
    expect(behavior.angle).toBe(0);
  });

  it('mirrors the heading horizontally past the right wall', () => {
    const position: PositionComponent = { x: 801, y: 300 };
    const behavior: EnemyBehavior = { kind: 'random', angle: 0 };

    updateEnemy(position, enemy(behavior), context());

    expect(position).toEqual({ x: 804, y: 300 });
    expect(behavior.angle).toBe(Math.PI);
  });

  it('mirrors both components in a corner', () => {
    const position: PositionComponent = { x: 801, y: 601 };
    const behavior: EnemyBehavior = { kind: 'random', angle: Math.PI / 4 };

    updateEnemy(position, enemy(behavior), context());

    expect(behavior.angle).toBeCloseTo((-3 * Math.PI) / 4);
  });

  it('catches a player inside its square before moving', () => {
    const position: PositionComponent = { x: 100, y: 100 };
    const behavior: EnemyBehavior = { kind: 'random', angle: 0 };

    expect(updateEnemy(position, enemy(behavior), context({ x: 105, y: 95 }))).toBe('lose');
    expect(position).toEqual({ x: 100, y: 100 });
  });
});

describe('gate guard', () => {
  it('derives the gate from the arena', () => {
    expect(getGateBounds(ARENA)).toEqual({ minX: 600, maxX: 800, minY: 200, maxY: 400 });
    expect(getGateBounds({ width: 801, height: 601 })).toEqual({ minX: 601, maxX: 801, minY: 200, maxY: 401 });
  });

  it('walks freely inside the gate', () => {
    const position: PositionComponent = { x: 700, y: 300 };
    const behavior: EnemyBehavior = { kind: 'gateGuard', angle: 0 };

    updateEnemy(position, enemy(behavior), context());

    expect(position).toEqual({ x: 703, y: 300 });
    expect(behavior.angle).toBe(0);
  });

  it('bounces off the right side of the gate', () => {
    const position: PositionComponent = { x: 799, y: 300 };
    const behavior: EnemyBehavior = { kind: 'gateGuard', angle: 0 };

    updateEnemy(position, enemy(behavior), context());

    expect(behavior.angle).toBe(Math.PI);
  });

  it('bounces off the bottom of the gate, not the arena', () => {
    const position: PositionComponent = { x: 700, y: 399 };
    const behavior: EnemyBehavior = { kind: 'gateGuard', angle: Math.PI / 2 };

    updateEnemy(position, enemy(behavior), context());

    expect(position.y).toBeCloseTo(402);
    expect(behavior.angle).toBe(-Math.PI / 2);
  });

  it('bounces off the left side of the gate', () => {
    const position: PositionComponent = { x: 601, y: 300 };
    const behavior: EnemyBehavior = { kind: 'gateGuard', angle: Math.PI };

    updateEnemy(position, enemy(behavior), context());

    expect(position.x).toBeCloseTo(598);
    expect(behavior.angle).toBe(0);
  });
});

describe('default heading', () => {
  it('is 45 taken as radians', () => {
    expect(GAME_CONFIG.RANDOM_WALK_INITIAL_ANGLE).toBe(45);
  });

  it.each([
    ['random', { x: 400, y: 300 }],
    ['gateGuard', { x: 700, y: 300 }],
  ] as const)('starts a %s walker on a heading of 45 radians', (kind, start) => {
    const world = createWorld();
    const entity = createEnemy(world, kind, start);
    const position = requirePosition(world, entity);

    expect(updateEnemy(position, requireEnemy(world, entity), context())).toBeNull();

    expect(position.x).toBeCloseTo(start.x + 3 * Math.cos(45), 10);
    expect(position.y).toBeCloseTo(start.y + 3 * Math.sin(45), 10);
  });
});

describe('fencing', () => {
  const home = { x: 700, y: 300 };

  function fencer(): { position: PositionComponent; behavior: EnemyBehavior & { kind: 'fencing' } } {
    return {
      position: { x: 650, y: 250 },
      behavior: { kind: 'fencing', step: 0, corners: computePatrolCorners(home) },
    };
  }

  it('uses a patrol square of side 100 centered on home', () => {
    expect(computePatrolCorners(home)).toEqual([
      { x: 650, y: 250 },
      { x: 750, y: 250 },
      { x: 750, y: 350 },
      { x: 650, y: 350 },
    ]);
  });

  it('turns at each corner and closes the loop', () => {
    const { position, behavior } = fencer();
    const component = enemy(behavior);

    const expectedCorners = [
      { at: { x: 750, y: 250 }, step: 1 },
      { at: { x: 750, y: 350 }, step: 2 },
      { at: { x: 650, y: 350 }, step: 3 },
      { at: { x: 650, y: 250 }, step: 0 },
    ];

    for (const corner of expectedCorners) {
      // 100 units per edge at speed 2
      for (let i = 0; i < 50; i++) {
        expect(updateEnemy(position, component, context())).toBeNull();
      }
      expect(position).toEqual(corner.at);
      expect(behavior.step).toBe(corner.step);
    }
  });

  it('moves along the top edge on the first tick', () => {
    const { position, behavior } = fencer();

    updateEnemy(position, enemy(behavior), context());

    expect(position).toEqual({ x: 652, y: 250 });
    expect(behavior.step).toBe(0);
  });

  it('catches a player inside its square', () => {
    const { position, behavior } = fencer();

    expect(updateEnemy(position, enemy(behavior), context({ x: 655, y: 255 }))).toBe('lose');
    expect(position).toEqual({ x: 650, y: 250 });
  });
});
