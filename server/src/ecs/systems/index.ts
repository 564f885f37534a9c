// ============================================
// ECS Systems - Index
// ============================================

// Types
export type { System } from './types';
export { SystemPriority } from './types';
export type { SessionContext } from './GameContext';

// Runner
export { SystemRunner } from './SystemRunner';

// Player Systems
export { PlayerNavigationSystem } from './PlayerNavigationSystem';

// AI Systems
export { EnemyAISystem } from './EnemyAISystem';
