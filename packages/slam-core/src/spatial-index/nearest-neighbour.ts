import type { Point, PointCloud } from '@scanline/types';
import { distanceSquared } from '@scanline/geometry';

/** Exhaustive nearest-neighbour scan; the first of equally close points wins. */
export function findNearestNeighbourNaive(target: Point, points: PointCloud): Point | undefined {
  let best: Point | undefined;
  let bestDist = Number.POSITIVE_INFINITY;
  for (const p of points) {
    const d = distanceSquared(p, target);
    if (d < bestDist) {
      best = p;
      bestDist = d;
    }
  }
  return best;
}
