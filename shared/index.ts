// ============================================
// Shared Types & Constants
// Pure code used by the simulation core and any host
// ============================================

// ECS Module - Entity Component System
export * from './ecs';

// Math utilities - geometry and hit tests
export * from './math';

// Game constants (GAME_CONFIG, spawn points)
export * from './constants';

// Type definitions (Position, EntityView, etc.)
export * from './types';

// Host messages and session events
export * from './messages';

// Error types
export * from './errors';
