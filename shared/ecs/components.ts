// ============================================
// ECS Component Interfaces
// All component data shapes for the ECS
// ============================================

import type { Position, RenderShape } from '../types';

// ============================================
// Core Components
// ============================================

/**
 * Position - where an entity sits in the arena.
 * Used by: every entity. Each entity owns its own object.
 */
export interface PositionComponent {
  x: number;
  y: number;
}

/**
 * Renderable - what the renderer should draw for this entity.
 * Cosmetic only, no system reads it.
 */
export interface RenderableComponent {
  shape: RenderShape;
  color: string;
}

// ============================================
// Entity-Type Components
// ============================================

/**
 * Player - the token the user steers with waypoints.
 * speed is in world units per tick and always > 0.
 */
export interface PlayerComponent {
  speed: number;
}

/**
 * Home - goal square. size is the full side length.
 */
export interface HomeComponent {
  size: number;
}

/**
 * Waypoint - player's navigation target.
 * Position is only meaningful while active.
 */
export interface WaypointComponent {
  active: boolean;
}

// Fencing patrol phase: 0 → +x, 1 → +y, 2 → -x, 3 → -y
export type FencingStep = 0 | 1 | 2 | 3;

// Patrol square corners: top-left, top-right, bottom-right, bottom-left
export type PatrolCorners = readonly [Position, Position, Position, Position];

/**
 * Per-kind enemy state. Closed union so the dispatcher can check it exhaustively.
 */
export type EnemyBehavior =
  | { kind: 'chasing' }
  | { kind: 'fencing'; step: FencingStep; corners: PatrolCorners }
  | { kind: 'random'; angle: number }
  | { kind: 'gateGuard'; angle: number };

/**
 * Enemy - hostile entity. size is the side of its collision square.
 */
export interface EnemyComponent {
  size: number;
  color: string;
  behavior: EnemyBehavior;
}

// ============================================
// Component Map
// ============================================

/**
 * Component type → data shape. World stores are keyed by this map,
 * so every lookup is typed without casts.
 */
export interface ComponentMap {
  Position: PositionComponent;
  Renderable: RenderableComponent;
  Player: PlayerComponent;
  Home: HomeComponent;
  Waypoint: WaypointComponent;
  Enemy: EnemyComponent;
}
