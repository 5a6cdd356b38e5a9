// ---------------------------------------------------------------------------
// Point cloud utilities: generation, transformation, centroid, voxel
// downsampling and lexicographic sorting.
// ---------------------------------------------------------------------------

import type { Point, PointCloud } from '@scanline/types';
import { NonFiniteCoordinateError } from './errors.js';
import { type PRNG, createPRNG, uniformSample } from './prng.js';
import type { RigidTransform } from './transform.js';
import { assertDimension, isFinitePoint } from './vector.js';

/** Inclusive `[min, max]` range for one axis. */
export type AxisRange = readonly [min: number, max: number];

export const DEFAULT_POINT_CLOUD_SEED = 0x5eed;

/**
 * Generate `count` points uniformly inside the given per-axis ranges.
 * Deterministic for a given seed.
 */
export function generatePointCloud(
  count: number,
  ranges: readonly AxisRange[],
  seed: number | PRNG = DEFAULT_POINT_CLOUD_SEED,
): number[][] {
  const rng = typeof seed === 'function' ? seed : createPRNG(seed);
  const points: number[][] = [];
  for (let i = 0; i < count; i++) {
    points.push(ranges.map(([min, max]) => uniformSample(rng, min, max)));
  }
  return points;
}

/** Transformed copy of the cloud; the input is not mutated. */
export function transformPointCloud(points: PointCloud, transform: RigidTransform): number[][] {
  return points.map((p) => transform.transformPoint(p));
}

/** Mean of the points, or `undefined` for an empty cloud. */
export function pointCloudCentroid(points: PointCloud): number[] | undefined {
  const first = points[0];
  if (!first) return undefined;

  const sum = new Array<number>(first.length).fill(0);
  for (const p of points) {
    assertDimension(p, first.length);
    for (let i = 0; i < sum.length; i++) sum[i] = sum[i]! + p[i]!;
  }
  return sum.map((s) => s / points.length);
}

/**
 * Replace all points that fall in the same cubic voxel by their mean.
 *
 * @param points    Input cloud.
 * @param voxelSize Side length of each voxel. Non-positive sizes return a copy of the input.
 * @returns One point per occupied voxel, in the order voxels were first seen.
 */
export function voxelDownsample(points: PointCloud, voxelSize: number): number[][] {
  if (!(voxelSize > 0) || points.length === 0) return points.map((p) => [...p]);

  const invSize = 1 / voxelSize;
  const voxels = new Map<string, { sum: number[]; count: number }>();

  for (const p of points) {
    const key = p.map((c) => Math.floor(c * invSize)).join(',');
    let entry = voxels.get(key);
    if (!entry) {
      entry = { sum: new Array<number>(p.length).fill(0), count: 0 };
      voxels.set(key, entry);
    }
    for (let i = 0; i < p.length; i++) {
      entry.sum[i] = entry.sum[i]! + p[i]!;
    }
    entry.count++;
  }

  return Array.from(voxels.values(), ({ sum, count }) => sum.map((s) => s / count));
}

/** Compare by first coordinate, then second, and so on. */
export function compareLexicographic(a: Point, b: Point): number {
  const n = Math.min(a.length, b.length);
  for (let i = 0; i < n; i++) {
    const d = a[i]! - b[i]!;
    if (d !== 0) return d < 0 ? -1 : 1;
  }
  return a.length - b.length;
}

/**
 * Sorted copy of the cloud in lexicographic coordinate order.
 *
 * @throws {NonFiniteCoordinateError} if any coordinate is NaN or infinite.
 */
export function lexSort(points: PointCloud): Point[] {
  for (const p of points) {
    if (!isFinitePoint(p)) throw new NonFiniteCoordinateError(p);
  }
  return [...points].sort(compareLexicographic);
}
