import pino from 'pino';
import type { EnemyKind, Outcome } from '#shared';

// ============================================
// Logger Configuration
// ============================================

const LOG_DIR = process.env.LOG_DIR || 'logs';
const LOG_LEVEL = process.env.LOG_LEVEL || 'info';
const IS_DEV = process.env.NODE_ENV !== 'production';

/**
 * Create a logger with console + rotating file output
 * pino-roll is used as a Pino transport for file rotation
 * @param filename - Log file name (e.g., 'game.log')
 * @param component - Component name for filtering (e.g., 'game', 'perf')
 */
function createLogger(filename: string, component: string) {
  const targets: pino.TransportTargetOptions[] = [];

  // Console stream with pretty printing (development only)
  if (IS_DEV) {
    targets.push({
      level: LOG_LEVEL,
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss.l',
        ignore: 'pid,hostname',
      },
    });
  }

  // Rotating file stream with JSON (always enabled)
  targets.push({
    level: 'info',
    target: 'pino-roll',
    options: {
      file: `${LOG_DIR}/${filename}`,
      size: '10m',
      limit: { count: 5 },
      mkdir: true,
    },
  });

  return pino(
    {
      level: LOG_LEVEL,
      base: { component },
    },
    pino.transport({ targets })
  );
}

// ============================================
// Logger Instances
// ============================================

// Game events (session lifecycle, spawns, outcomes)
export const logger = createLogger('game.log', 'game');

// Tick timings from the real-time host loop
export const perfLogger = createLogger('performance.log', 'perf');

// ============================================
// Convenience Methods for Game Events
// ============================================

export function logSessionStarted(level: number, width: number, height: number) {
  logger.info({ level, width, height, event: 'session_started' }, `Level ${level} started (${width}x${height})`);
}

export function logWaypointSet(x: number, y: number) {
  logger.debug({ x, y, event: 'waypoint_set' }, `Waypoint set to (${x}, ${y})`);
}

/**
 * Log an enemy wave appearing in the arena
 */
export function logEnemiesSpawned(level: number, kinds: EnemyKind[]) {
  logger.info(
    { level, kinds, count: kinds.length, event: 'enemies_spawned' },
    `Spawned ${kinds.length} enemies: ${kinds.join(', ')}`
  );
}

/**
 * Log the end of a session. Emitted once per session.
 */
export function logGameOver(outcome: Outcome, level: number, tick: number) {
  logger.info(
    { outcome, level, tick, event: 'game_over' },
    outcome === 'win' ? `You Win (level ${level}, tick ${tick})` : `You Lose (level ${level}, tick ${tick})`
  );
}

export function logHostStopped(reason: string, pendingCancelled: number) {
  logger.info(
    { reason, pendingCancelled, event: 'host_stopped' },
    `Host loop stopped: ${reason}`
  );
}
