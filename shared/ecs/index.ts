// ============================================
// ECS Package Exports
// ============================================

// Core ECS classes
export { World } from './World';

// Types and constants
export { Components, Tags } from './types';
export type { EntityId, ComponentType, Tag } from './types';

// Component interfaces
export type {
  PositionComponent,
  RenderableComponent,
  PlayerComponent,
  HomeComponent,
  WaypointComponent,
  EnemyComponent,
  EnemyBehavior,
  FencingStep,
  PatrolCorners,
  ComponentMap,
} from './components';
