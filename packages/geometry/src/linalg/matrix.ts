// ---------------------------------------------------------------------------
// Small dense matrices (row-major Float64Array storage).
// ---------------------------------------------------------------------------

import type { Point } from '@scanline/types';
import { DimensionError } from '../errors.js';

/** Row-major dense matrix. */
export interface Matrix {
  rows: number;
  cols: number;
  data: Float64Array;
}

export function matZeros(rows: number, cols = rows): Matrix {
  return { rows, cols, data: new Float64Array(rows * cols) };
}

export function matIdentity(n: number): Matrix {
  const m = matZeros(n, n);
  for (let i = 0; i < n; i++) m.data[i * n + i] = 1;
  return m;
}

/** Build a matrix from nested row arrays. */
export function matFromRows(rows: readonly (readonly number[])[]): Matrix {
  const r = rows.length;
  const c = rows[0]?.length ?? 0;
  const m = matZeros(r, c);
  rows.forEach((row, i) => {
    if (row.length !== c) throw new DimensionError(c, row.length, 'matrix row');
    row.forEach((v, j) => {
      m.data[i * c + j] = v;
    });
  });
  return m;
}

export function matToRows(m: Matrix): number[][] {
  const out: number[][] = [];
  for (let i = 0; i < m.rows; i++) {
    out.push(Array.from(m.data.subarray(i * m.cols, (i + 1) * m.cols)));
  }
  return out;
}

export function matGet(m: Matrix, row: number, col: number): number {
  return m.data[row * m.cols + col]!;
}

export function matSet(m: Matrix, row: number, col: number, val: number): void {
  m.data[row * m.cols + col] = val;
}

export function matClone(m: Matrix): Matrix {
  return { rows: m.rows, cols: m.cols, data: Float64Array.from(m.data) };
}

export function matTranspose(m: Matrix): Matrix {
  const out = matZeros(m.cols, m.rows);
  for (let i = 0; i < m.rows; i++) {
    for (let j = 0; j < m.cols; j++) {
      out.data[j * m.rows + i] = matGet(m, i, j);
    }
  }
  return out;
}

/** C = A * B */
export function matMultiply(a: Matrix, b: Matrix): Matrix {
  if (a.cols !== b.rows) throw new DimensionError(a.cols, b.rows, 'matrix');
  const c = matZeros(a.rows, b.cols);
  for (let i = 0; i < a.rows; i++) {
    for (let j = 0; j < b.cols; j++) {
      let sum = 0;
      for (let k = 0; k < a.cols; k++) {
        sum += matGet(a, i, k) * matGet(b, k, j);
      }
      c.data[i * b.cols + j] = sum;
    }
  }
  return c;
}

/** y = M * v */
export function matVec(m: Matrix, v: Point): number[] {
  if (v.length !== m.cols) throw new DimensionError(m.cols, v.length, 'vector');
  const out = new Array<number>(m.rows).fill(0);
  for (let i = 0; i < m.rows; i++) {
    let sum = 0;
    for (let j = 0; j < m.cols; j++) {
      sum += matGet(m, i, j) * v[j]!;
    }
    out[i] = sum;
  }
  return out;
}

/** M += a ⊗ b (outer product accumulation, in place). */
export function matAddOuter(m: Matrix, a: Point, b: Point): void {
  if (a.length !== m.rows) throw new DimensionError(m.rows, a.length, 'vector');
  if (b.length !== m.cols) throw new DimensionError(m.cols, b.length, 'vector');
  for (let i = 0; i < m.rows; i++) {
    const ai = a[i]!;
    for (let j = 0; j < m.cols; j++) {
      m.data[i * m.cols + j] = m.data[i * m.cols + j]! + ai * b[j]!;
    }
  }
}

/** Determinant of a square matrix. Closed form up to 3x3, LU with partial pivoting above. */
export function matDeterminant(m: Matrix): number {
  if (m.rows !== m.cols) throw new DimensionError(m.rows, m.cols, 'square matrix');
  const n = m.rows;
  const g = (i: number, j: number) => matGet(m, i, j);

  if (n === 0) return 1;
  if (n === 1) return g(0, 0);
  if (n === 2) return g(0, 0) * g(1, 1) - g(0, 1) * g(1, 0);
  if (n === 3) {
    return (
      g(0, 0) * (g(1, 1) * g(2, 2) - g(1, 2) * g(2, 1)) -
      g(0, 1) * (g(1, 0) * g(2, 2) - g(1, 2) * g(2, 0)) +
      g(0, 2) * (g(1, 0) * g(2, 1) - g(1, 1) * g(2, 0))
    );
  }

  const a = matClone(m);
  let det = 1;
  for (let col = 0; col < n; col++) {
    let pivot = col;
    for (let row = col + 1; row < n; row++) {
      if (Math.abs(matGet(a, row, col)) > Math.abs(matGet(a, pivot, col))) pivot = row;
    }
    const p = matGet(a, pivot, col);
    if (p === 0) return 0;
    if (pivot !== col) {
      for (let j = 0; j < n; j++) {
        const tmp = matGet(a, col, j);
        matSet(a, col, j, matGet(a, pivot, j));
        matSet(a, pivot, j, tmp);
      }
      det = -det;
    }
    det *= p;
    for (let row = col + 1; row < n; row++) {
      const f = matGet(a, row, col) / p;
      for (let j = col; j < n; j++) {
        matSet(a, row, j, matGet(a, row, j) - f * matGet(a, col, j));
      }
    }
  }
  return det;
}

export function matIsFinite(m: Matrix): boolean {
  return m.data.every((v) => Number.isFinite(v));
}
