import type {
  ArenaSize,
  EnemyBehavior,
  EnemyComponent,
  EnemyKind,
  Outcome,
  Position,
  PositionComponent,
} from '#shared';

/**
 * What an enemy may read while it updates.
 * player is the position after this tick's player update.
 */
export interface EnemyUpdateContext {
  readonly player: Readonly<Position>;
  readonly arena: Readonly<ArenaSize>;
}

export type BehaviorOf<K extends EnemyKind> = Extract<EnemyBehavior, { kind: K }>;

/**
 * One motion policy. Mutates position and behavior state in place and
 * returns 'lose' when the enemy caught the player, null otherwise.
 */
export type EnemyPolicy<K extends EnemyKind> = (
  position: PositionComponent,
  enemy: EnemyComponent,
  behavior: BehaviorOf<K>,
  ctx: EnemyUpdateContext
) => Outcome | null;
