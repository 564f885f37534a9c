// ============================================
// Scheduler
// Virtual-time event queue shared by ticks, spawns and input
// ============================================

import { requireNonNegative, requirePositive } from '#shared';

interface ScheduledEntry<T> {
  dueAt: number;
  // Insertion sequence, breaks ties between equal due times
  seq: number;
  message: T;
  repeatEveryMs: number | null;
}

/**
 * Scheduler - one ordered queue of timed messages.
 *
 * Time only moves when advance() is called, so the same inputs always
 * dispatch in the same order. Entries fire by due time, then by the order
 * they were scheduled. Messages are dispatched one at a time, so nothing a
 * handler does can interleave with another handler.
 */
export class Scheduler<T> {
  private now = 0;
  private nextSeq = 0;
  private entries: ScheduledEntry<T>[] = [];

  /** Virtual time in milliseconds since the scheduler was created */
  get currentTime(): number {
    return this.now;
  }

  get pendingCount(): number {
    return this.entries.length;
  }

  /**
   * Queue a message to fire after delayMs.
   * With repeatEveryMs it fires again every repeatEveryMs after that.
   */
  schedule(delayMs: number, message: T, repeatEveryMs?: number): void {
    requireNonNegative('scheduler.delayMs', delayMs);
    if (repeatEveryMs !== undefined) {
      requirePositive('scheduler.repeatEveryMs', repeatEveryMs);
    }

    this.entries.push({
      dueAt: this.now + delayMs,
      seq: this.nextSeq++,
      message,
      repeatEveryMs: repeatEveryMs ?? null,
    });
  }

  /**
   * Drop every pending entry.
   * @returns how many were dropped
   */
  cancelAll(): number {
    const count = this.entries.length;
    this.entries = [];
    return count;
  }

  /**
   * Move virtual time forward by ms, dispatching every entry that comes due.
   * Repeating entries may fire several times in one call.
   * @returns number of messages dispatched
   */
  advance(ms: number, dispatch: (message: T) => void): number {
    requireNonNegative('scheduler.advanceMs', ms);
    const target = this.now + ms;
    let dispatched = 0;

    for (let entry = this.takeDue(target); entry; entry = this.takeDue(target)) {
      this.now = entry.dueAt;
      if (entry.repeatEveryMs !== null) {
        this.entries.push({
          ...entry,
          dueAt: entry.dueAt + entry.repeatEveryMs,
          seq: this.nextSeq++,
        });
      }
      dispatch(entry.message);
      dispatched++;
    }

    this.now = target;
    return dispatched;
  }

  /**
   * Remove and return the earliest entry due at or before `until`
   */
  private takeDue(until: number): ScheduledEntry<T> | null {
    let bestIndex = -1;
    for (let i = 0; i < this.entries.length; i++) {
      const entry = this.entries[i];
      if (entry.dueAt > until) continue;
      const best = bestIndex === -1 ? null : this.entries[bestIndex];
      if (!best || entry.dueAt < best.dueAt || (entry.dueAt === best.dueAt && entry.seq < best.seq)) {
        bestIndex = i;
      }
    }
    if (bestIndex === -1) return null;
    const [entry] = this.entries.splice(bestIndex, 1);
    return entry;
  }
}
