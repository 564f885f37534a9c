// ============================================
// Game Host
// Dispatches host messages to the session and drives it in real time
// ============================================

import type { HostMessage, Outcome } from '#shared';
import { Scheduler } from './Scheduler';
import { GameSession } from '../session/GameSession';
import { EnemyGenerator } from '../session/EnemyGenerator';
import type { GameConfig } from '../config';
import { logger, perfLogger, logHostStopped } from '../logger';

/**
 * GameHost - the single-threaded loop around one GameSession.
 *
 * Ticks, the delayed enemy spawn and clicks all travel through one
 * Scheduler, so they are handled strictly one after another. When the
 * session ends every pending entry is cancelled and the real-time interval
 * is cleared.
 */
export class GameHost {
  readonly session: GameSession;
  readonly generator: EnemyGenerator;
  readonly scheduler = new Scheduler<HostMessage>();

  private readonly tickIntervalMs: number;
  private started = false;
  private stopped = false;
  private interval: ReturnType<typeof setInterval> | null = null;
  private resolveRun: ((outcome: Outcome | null) => void) | null = null;

  constructor(config: GameConfig) {
    this.tickIntervalMs = config.tickIntervalMs;
    this.session = new GameSession({
      width: config.width,
      height: config.height,
      level: config.level,
      playerSpeed: config.playerSpeed,
    });
    this.generator = new EnemyGenerator(this.session, config.spawnDelayMs);

    this.session.events.on('gameOver', ({ outcome }) => {
      this.halt('game_over', outcome);
    });
  }

  /**
   * Show the level and queue the recurring tick and the enemy spawn.
   */
  start(): void {
    if (this.started || this.stopped) return;
    this.started = true;

    this.session.start();
    this.scheduler.schedule(this.tickIntervalMs, { type: 'tick' }, this.tickIntervalMs);
    this.generator.schedule(this.scheduler);
  }

  /**
   * Queue a click; it is applied on the next pump, in order with ticks.
   */
  click(x: number, y: number): void {
    if (this.stopped) return;
    this.scheduler.schedule(0, { type: 'click', x, y });
  }

  /**
   * Handle one message immediately
   */
  dispatch(message: HostMessage): void {
    switch (message.type) {
      case 'tick':
        this.session.advanceTick();
        break;
      case 'spawnEnemies':
        this.generator.createEnemies();
        break;
      case 'click':
        this.session.handleClick(message.x, message.y);
        break;
    }
  }

  /**
   * Advance virtual time by ms and dispatch everything that comes due.
   * @returns number of messages dispatched
   */
  pump(ms: number): number {
    if (this.stopped) return 0;
    return this.scheduler.advance(ms, (message) => this.dispatch(message));
  }

  /**
   * Drive the session from a real interval until it ends or stop() is called.
   * Resolves with the outcome, or null when stopped early.
   */
  run(): Promise<Outcome | null> {
    if (this.stopped) return Promise.resolve(this.session.getOutcome());
    this.start();

    return new Promise((resolve) => {
      this.resolveRun = resolve;
      let lastTickTime = performance.now();

      this.interval = setInterval(() => {
        const now = performance.now();
        const actualDelta = now - lastTickTime;
        lastTickTime = now;

        if (actualDelta > this.tickIntervalMs * 1.5) {
          perfLogger.info(
            {
              event: 'tick_variance',
              tick: this.session.getTick(),
              actualDeltaMs: actualDelta.toFixed(1),
              expectedMs: this.tickIntervalMs.toFixed(1),
            },
            `Tick variance: ${actualDelta.toFixed(1)}ms`
          );
        }

        try {
          this.pump(this.tickIntervalMs);
        } catch (error) {
          logger.error(
            {
              event: 'interval_error',
              error: error instanceof Error ? error.message : String(error),
              stack: error instanceof Error ? error.stack : undefined,
            },
            'Host loop threw an error'
          );
          this.halt('error', null);
        }
      }, this.tickIntervalMs);
    });
  }

  /**
   * Stop the loop without ending the session
   */
  stop(reason = 'stopped'): void {
    this.halt(reason, null);
  }

  isStopped(): boolean {
    return this.stopped;
  }

  private halt(reason: string, outcome: Outcome | null): void {
    if (this.stopped) return;
    this.stopped = true;

    const cancelled = this.scheduler.cancelAll();
    if (this.interval !== null) {
      clearInterval(this.interval);
      this.interval = null;
    }
    logHostStopped(reason, cancelled);

    const resolve = this.resolveRun;
    this.resolveRun = null;
    resolve?.(outcome);
  }
}
