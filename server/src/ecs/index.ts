// ============================================
// ECS - Entity Component System
// What a session needs to build and run its world
// ============================================

// Factories and World Setup
export {
  createWorld,
  createHome,
  createPlayer,
  createWaypoint,
  createEnemy,
  requirePlayerEntity,
  requirePosition,
  activateWaypoint,
  getEnemyCount,
} from './factories';
export type { EnemyOptions } from './factories';

// Systems
export { SystemRunner, SystemPriority, PlayerNavigationSystem, EnemyAISystem } from './systems';
export type { SessionContext } from './systems';

// Serialization
export { buildEntityViews } from './serialization/renderSerializer';
