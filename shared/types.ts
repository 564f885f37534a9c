// ============================================
// Shared Types & Interfaces
// Game entities, enums, and type definitions
// ============================================

// Position in the arena (origin top-left, y grows downward)
export interface Position {
  x: number;
  y: number;
}

// Arena bounds in world units
export interface ArenaSize {
  width: number;
  height: number;
}

// How a session ended
export type Outcome = 'win' | 'lose';

// Session lifecycle: running until the first terminal signal, then frozen
export type SessionStatus = 'running' | 'won' | 'lost';

// Enemy motion policies
export type EnemyKind = 'chasing' | 'fencing' | 'random' | 'gateGuard';

// Which entity an element of a render snapshot describes
export type EntityKind = 'home' | 'player' | 'waypoint' | 'enemy';

// Visual shape the renderer should draw for an entity
// cross = waypoint marker, rectangle = home, turtle = player icon, circle = enemy
export type RenderShape = 'cross' | 'rectangle' | 'turtle' | 'circle';

/**
 * One entity as seen by the rendering boundary.
 * The core never draws; the host mirrors these values onto its own handles.
 */
export interface EntityView {
  id: number;
  kind: EntityKind;
  shape: RenderShape;
  position: Position;
  size: number;
  color: string;
  visible: boolean;
  enemyKind?: EnemyKind;
}

// Full frame handed to the renderer after each tick
export interface RenderSnapshot {
  tick: number;
  level: number;
  status: SessionStatus;
  arena: ArenaSize;
  entities: EntityView[];
}
