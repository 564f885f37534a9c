// ============================================
// ECS System Runner
// Manages and executes all game systems in priority order
// ============================================

import type { World } from '#shared';
import type { System } from './types';
import type { SessionContext } from './GameContext';
import { logger, perfLogger } from '../../logger';

/**
 * Registered system with its priority
 */
interface RegisteredSystem {
  system: System;
  priority: number;
}

// Log a breakdown when a single tick takes longer than this
const SLOW_TICK_MS = 10;

/**
 * SystemRunner - Manages and executes all game systems
 *
 * Systems are executed in priority order (lower numbers first).
 * Equal priorities keep registration order. Once a system ends the game,
 * the remaining systems are skipped for that tick.
 */
export class SystemRunner {
  private systems: RegisteredSystem[] = [];

  /**
   * Register a system with a priority
   * @param priority Lower numbers run first
   */
  register(system: System, priority: number): void {
    this.systems.push({ system, priority });
    // Array.prototype.sort is stable, so ties keep registration order
    this.systems.sort((a, b) => a.priority - b.priority);
  }

  /**
   * Run all systems in priority order
   * Tracks per-system timing and logs when tick is slow
   */
  update(world: World, ctx: SessionContext): void {
    const tickStart = performance.now();
    const timings: { name: string; ms: number }[] = [];

    for (const { system } of this.systems) {
      if (ctx.isOver()) break;

      const systemStart = performance.now();
      try {
        system.update(world, ctx);
      } catch (error) {
        logger.error({
          event: 'system_error',
          system: system.name,
          tick: ctx.tick,
          error: error instanceof Error ? error.message : String(error),
          stack: error instanceof Error ? error.stack : undefined,
        }, `System ${system.name} threw an error`);
        // Continue with next system - don't crash the game loop
      }
      timings.push({ name: system.name, ms: performance.now() - systemStart });
    }

    const totalMs = performance.now() - tickStart;
    if (totalMs > SLOW_TICK_MS) {
      const sorted = [...timings].sort((a, b) => b.ms - a.ms);
      perfLogger.info({
        event: 'slow_tick_breakdown',
        tick: ctx.tick,
        totalMs: totalMs.toFixed(1),
        breakdown: sorted.map(t => ({ name: t.name, ms: parseFloat(t.ms.toFixed(2)) })),
      }, `Slow tick ${totalMs.toFixed(1)}ms: ${sorted.map(t => `${t.name}:${t.ms.toFixed(1)}`).join(' ')}`);
    }
  }
}
