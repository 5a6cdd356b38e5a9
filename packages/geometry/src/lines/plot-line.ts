// ---------------------------------------------------------------------------
// Grid ray casting: N-dimensional Bresenham line between two cells.
// ---------------------------------------------------------------------------

import type { Point } from '@scanline/types';
import { assertDimension } from '../vector.js';

/**
 * Walk the integer cells on the segment from `start` to `end`.
 *
 * Coordinates are rounded to the nearest cell first. The dominant axis
 * advances one cell per step; every other axis carries an integer error
 * term and steps when it turns positive. The result always begins with
 * `start`, ends with `end`, and holds `max_i |Δ_i| + 1` cells.
 *
 * https://en.wikipedia.org/wiki/Bresenham's_line_algorithm
 */
export function plotLine(start: Point, end: Point): number[][] {
  assertDimension(end, start.length);
  const from = start.map((c) => Math.round(c));
  const to = end.map((c) => Math.round(c));
  const n = from.length;

  const deltas = from.map((c, i) => Math.abs(to[i]! - c));
  const steps = from.map((c, i) => (to[i]! >= c ? 1 : -1));

  let primary = 0;
  for (let axis = 1; axis < n; axis++) {
    if (deltas[axis]! > deltas[primary]!) primary = axis;
  }
  const major = deltas[primary]!;

  // D = 2·d_minor − d_major per secondary axis.
  const errors = deltas.map((d) => 2 * d - major);
  const current = [...from];
  const cells: number[][] = [];

  for (let step = 0; step < major; step++) {
    cells.push([...current]);
    for (let axis = 0; axis < n; axis++) {
      if (axis === primary) continue;
      const d = deltas[axis]!;
      let e = errors[axis]!;
      if (e > 0) {
        current[axis] = current[axis]! + steps[axis]!;
        e -= 2 * major;
      }
      errors[axis] = e + 2 * d;
    }
    current[primary] = current[primary]! + steps[primary]!;
  }

  cells.push(to);
  return cells;
}
