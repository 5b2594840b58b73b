import type { Point } from '../types/index.js';

export const DRAG_STEP_PAUSE_MS = 10;
export const DOUBLE_CLICK_PAUSE_MS = 50;

/**
 * Intermediate pointer positions for a drag, ending exactly at `to`.
 */
export function interpolateDrag(from: Point, to: Point, steps: number): Point[] {
  const count = Number.isFinite(steps) ? Math.max(0, Math.floor(steps)) : 0;
  const points: Point[] = [];
  for (let i = 1; i <= count; i += 1) {
    const t = i / count;
    points.push({
      x: from.x + (to.x - from.x) * t,
      y: from.y + (to.y - from.y) * t,
    });
  }
  return points;
}
