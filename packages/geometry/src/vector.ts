// ---------------------------------------------------------------------------
// N-dimensional point / vector operations on plain number arrays.
// ---------------------------------------------------------------------------

import type { Point } from '@scanline/types';
import { DimensionError } from './errors.js';

/** The origin of the given dimension. */
export function zeros(dimension: number): number[] {
  return new Array<number>(dimension).fill(0);
}

/** Throw a {@link DimensionError} unless `p` has exactly `dimension` components. */
export function assertDimension(p: Point, dimension: number, what = 'point'): void {
  if (p.length !== dimension) {
    throw new DimensionError(dimension, p.length, what);
  }
}

/** Element-wise addition. */
export function add(a: Point, b: Point): number[] {
  assertDimension(b, a.length, 'vector');
  return a.map((v, i) => v + b[i]!);
}

/** Element-wise subtraction `a - b`. */
export function sub(a: Point, b: Point): number[] {
  assertDimension(b, a.length, 'vector');
  return a.map((v, i) => v - b[i]!);
}

export function scale(v: Point, s: number): number[] {
  return v.map((c) => c * s);
}

export function negate(v: Point): number[] {
  return v.map((c) => -c);
}

export function dot(a: Point, b: Point): number {
  assertDimension(b, a.length, 'vector');
  let acc = 0;
  for (let i = 0; i < a.length; i++) {
    acc += a[i]! * b[i]!;
  }
  return acc;
}

export function norm(v: Point): number {
  return Math.sqrt(dot(v, v));
}

/** Squared Euclidean distance. */
export function distanceSquared(a: Point, b: Point): number {
  assertDimension(b, a.length);
  let acc = 0;
  for (let i = 0; i < a.length; i++) {
    const d = a[i]! - b[i]!;
    acc += d * d;
  }
  return acc;
}

export function isFinitePoint(p: Point): boolean {
  return p.every((c) => Number.isFinite(c));
}

/** Exact coordinate equality. */
export function pointsEqual(a: Point, b: Point): boolean {
  return a.length === b.length && a.every((v, i) => v === b[i]);
}
