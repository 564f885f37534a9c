// ============================================
// Render Serialization
// Convert entities to the views the rendering boundary draws
// ============================================

import { Components, GAME_CONFIG } from '#shared';
import type { World, EntityId, EntityView, EntityKind } from '#shared';

function kindOf(world: World, entity: EntityId): EntityKind | null {
  if (world.hasComponent(entity, Components.Player)) return 'player';
  if (world.hasComponent(entity, Components.Home)) return 'home';
  if (world.hasComponent(entity, Components.Waypoint)) return 'waypoint';
  if (world.hasComponent(entity, Components.Enemy)) return 'enemy';
  return null;
}

/**
 * Build the view of one entity.
 * Returns null if the entity has no position or renderable.
 */
function buildEntityView(world: World, entity: EntityId): EntityView | null {
  const pos = world.getComponent(entity, Components.Position);
  const renderable = world.getComponent(entity, Components.Renderable);
  const kind = kindOf(world, entity);
  if (!pos || !renderable || !kind) return null;

  const view: EntityView = {
    id: entity,
    kind,
    shape: renderable.shape,
    position: { x: pos.x, y: pos.y },
    size: 0,
    color: renderable.color,
    visible: true,
  };

  switch (kind) {
    case 'home':
      view.size = world.getComponent(entity, Components.Home)?.size ?? 0;
      break;
    case 'waypoint':
      view.size = GAME_CONFIG.WAYPOINT_MARKER_SIZE;
      view.visible = world.getComponent(entity, Components.Waypoint)?.active ?? false;
      break;
    case 'enemy': {
      const enemy = world.getComponent(entity, Components.Enemy);
      if (enemy) {
        view.size = enemy.size;
        view.enemyKind = enemy.behavior.kind;
      }
      break;
    }
    case 'player':
      break;
  }

  return view;
}

/**
 * Views for every drawable entity, in creation order.
 */
export function buildEntityViews(world: World): EntityView[] {
  const views: EntityView[] = [];
  for (const entity of world.query(Components.Position, Components.Renderable)) {
    const view = buildEntityView(world, entity);
    if (view) views.push(view);
  }
  return views;
}
