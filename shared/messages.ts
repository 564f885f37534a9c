// ============================================
// Host & Session Messages
// Host → core inputs and core → renderer events
// ============================================

import type { Outcome } from './types';

// ============================================
// Host Messages (host loop → core)
// Everything the core reacts to arrives as one of these on the scheduler queue
// ============================================

// Periodic simulation step
export interface TickMessage {
  type: 'tick';
}

// Delayed trigger for the enemy generator
export interface SpawnEnemiesMessage {
  type: 'spawnEnemies';
}

// Player clicked on the arena
export interface ClickMessage {
  type: 'click';
  x: number;
  y: number;
}

export type HostMessage = TickMessage | SpawnEnemiesMessage | ClickMessage;

// ============================================
// Session Events (core → renderer)
// ============================================

export interface LevelShownEvent {
  level: number;
}

export interface EnemiesSpawnedEvent {
  level: number;
  count: number;
}

export interface GameOverEvent {
  outcome: Outcome;
  level: number;
}

export interface SessionEventMap {
  levelShown: LevelShownEvent;
  enemiesSpawned: EnemiesSpawnedEvent;
  gameOver: GameOverEvent;
}

export type SessionEventType = keyof SessionEventMap;
