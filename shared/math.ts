// ============================================
// Shared Math Helpers
// Pure geometry for arena movement and hit tests
// ============================================

import type { Position } from './types';

/**
 * Calculate distance between two positions
 */
export function distance(p1: Position, p2: Position): number {
  const dx = p1.x - p2.x;
  const dy = p1.y - p2.y;
  return Math.sqrt(dx * dx + dy * dy);
}

/**
 * Heading in radians from one position toward another.
 * Coincident points give 0 (Math.atan2(0, 0) === 0).
 */
export function angleTo(from: Position, to: Position): number {
  return Math.atan2(to.y - from.y, to.x - from.x);
}

/**
 * Move a position in place along a heading
 */
export function advance(pos: Position, angle: number, step: number): void {
  pos.x += step * Math.cos(angle);
  pos.y += step * Math.sin(angle);
}

/**
 * Inclusive square test: is point inside the square of side `size` centered on `center`?
 * Points on the edge count as inside.
 */
export function squareContains(center: Position, size: number, point: Position): boolean {
  const half = size / 2;
  return (
    center.x - half <= point.x &&
    point.x <= center.x + half &&
    center.y - half <= point.y &&
    point.y <= center.y + half
  );
}

/**
 * Strict square test: points exactly on the edge do not count.
 */
export function squareOverlapsPoint(center: Position, size: number, point: Position): boolean {
  const half = size / 2;
  return (
    center.x - half < point.x &&
    point.x < center.x + half &&
    center.y - half < point.y &&
    point.y < center.y + half
  );
}

/**
 * Is value outside the closed range [min, max]?
 */
export function outsideRange(value: number, min: number, max: number): boolean {
  return value < min || value > max;
}
