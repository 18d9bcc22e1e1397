/**
 * Movement geometry
 * Shoppers walk in straight lines at a fixed speed
 */

import type { Vector2 } from '../core/types.js';

/**
 * Calculate distance between two points
 */
export function distance(a: Vector2, b: Vector2): number {
  const dx = b.x - a.x;
  const dy = b.y - a.y;
  return Math.sqrt(dx * dx + dy * dy);
}

/**
 * Heading angle (radians) from `from` towards `to`
 */
export function headingTowards(from: Vector2, to: Vector2): number {
  return Math.atan2(to.y - from.y, to.x - from.x);
}

/**
 * Advance one full step along the heading to `to`.
 * Steps are never shortened, so a walker can pass the target point.
 */
export function stepTowards(from: Vector2, to: Vector2, speed: number): Vector2 {
  const angle = headingTowards(from, to);
  return {
    x: from.x + speed * Math.cos(angle),
    y: from.y + speed * Math.sin(angle),
  };
}
