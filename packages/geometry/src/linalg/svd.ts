// ---------------------------------------------------------------------------
// Singular value decomposition for small square matrices (one-sided Jacobi).
// ---------------------------------------------------------------------------

import { SvdConvergenceError } from '../errors.js';
import {
  type Matrix,
  matClone,
  matGet,
  matIdentity,
  matIsFinite,
  matSet,
  matZeros,
} from './matrix.js';

/** M = U * diag(S) * V^T, singular values sorted in descending order. */
export interface SvdResult {
  u: Matrix;
  s: Float64Array;
  v: Matrix;
}

const MAX_SWEEPS = 64;
/** Relative orthogonality tolerance between two columns. */
const ORTHOGONALITY_TOLERANCE = 1e-12;

/**
 * Decompose a square matrix with Hestenes' one-sided Jacobi method.
 *
 * Columns of a working copy of M are orthogonalised pairwise by plane
 * rotations which are accumulated into V. Once all column pairs are
 * orthogonal, the column norms are the singular values and the normalised
 * columns are U. Columns belonging to zero singular values are completed
 * to an orthonormal basis so U is always orthogonal, which matters for
 * collinear or coplanar clouds whose covariance is rank deficient.
 *
 * @throws {SvdConvergenceError} on non-finite input or when the sweeps run out.
 */
export function svd(m: Matrix): SvdResult {
  if (m.rows !== m.cols) {
    throw new SvdConvergenceError(0, `expected a square matrix, got ${m.rows}x${m.cols}`);
  }
  if (!matIsFinite(m)) {
    throw new SvdConvergenceError(0, 'matrix has non-finite entries');
  }

  const n = m.rows;
  const a = matClone(m);
  const v = matIdentity(n);

  // Columns below this squared norm are numerically zero and never rotated.
  const frobeniusSq = m.data.reduce((acc, x) => acc + x * x, 0);
  const negligible = frobeniusSq * (n * Number.EPSILON) ** 2;

  let sweep = 0;
  let rotated = true;
  while (rotated) {
    if (sweep >= MAX_SWEEPS) {
      throw new SvdConvergenceError(sweep);
    }
    rotated = false;

    for (let p = 0; p < n - 1; p++) {
      for (let q = p + 1; q < n; q++) {
        let alpha = 0;
        let beta = 0;
        let gamma = 0;
        for (let i = 0; i < n; i++) {
          const aip = matGet(a, i, p);
          const aiq = matGet(a, i, q);
          alpha += aip * aip;
          beta += aiq * aiq;
          gamma += aip * aiq;
        }

        if (
          gamma === 0 ||
          alpha <= negligible ||
          beta <= negligible ||
          Math.abs(gamma) <= ORTHOGONALITY_TOLERANCE * Math.sqrt(alpha * beta)
        ) {
          continue;
        }
        rotated = true;

        const zeta = (beta - alpha) / (2 * gamma);
        const t = (zeta >= 0 ? 1 : -1) / (Math.abs(zeta) + Math.sqrt(1 + zeta * zeta));
        const c = 1 / Math.sqrt(1 + t * t);
        const s = c * t;

        rotateColumns(a, p, q, c, s);
        rotateColumns(v, p, q, c, s);
      }
    }
    sweep++;
  }

  // Singular values are the column norms of the orthogonalised matrix.
  const sigma = new Float64Array(n);
  for (let j = 0; j < n; j++) {
    let acc = 0;
    for (let i = 0; i < n; i++) acc += matGet(a, i, j) ** 2;
    sigma[j] = Math.sqrt(acc);
  }

  const order = Array.from({ length: n }, (_, j) => j).sort(
    (x, y) => sigma[y]! - sigma[x]!,
  );

  const tiny = 4 * Math.sqrt(negligible);

  const u = matZeros(n, n);
  const vSorted = matZeros(n, n);
  const s = new Float64Array(n);
  const filled: boolean[] = [];

  order.forEach((src, dst) => {
    const sv = sigma[src]!;
    s[dst] = sv;
    for (let i = 0; i < n; i++) {
      matSet(vSorted, i, dst, matGet(v, i, src));
    }
    if (sv > tiny) {
      for (let i = 0; i < n; i++) {
        matSet(u, i, dst, matGet(a, i, src) / sv);
      }
      filled[dst] = true;
    } else {
      filled[dst] = false;
    }
  });

  completeOrthonormalBasis(u, filled);

  return { u, s, v: vSorted };
}

/** Apply the plane rotation (c, s) to columns p and q in place. */
function rotateColumns(m: Matrix, p: number, q: number, c: number, s: number): void {
  for (let i = 0; i < m.rows; i++) {
    const mp = matGet(m, i, p);
    const mq = matGet(m, i, q);
    matSet(m, i, p, c * mp - s * mq);
    matSet(m, i, q, s * mp + c * mq);
  }
}

/**
 * Fill the columns of `u` not marked in `filled` with unit vectors
 * orthogonal to every other column (Gram-Schmidt against the standard basis).
 */
function completeOrthonormalBasis(u: Matrix, filled: boolean[]): void {
  const n = u.rows;
  for (let col = 0; col < n; col++) {
    if (filled[col]) continue;

    for (let e = 0; e < n; e++) {
      const candidate = new Array<number>(n).fill(0);
      candidate[e] = 1;

      for (let other = 0; other < n; other++) {
        if (!filled[other]) continue;
        let proj = 0;
        for (let i = 0; i < n; i++) proj += matGet(u, i, other) * candidate[i]!;
        for (let i = 0; i < n; i++) {
          candidate[i] = candidate[i]! - proj * matGet(u, i, other);
        }
      }

      const len = Math.sqrt(candidate.reduce((acc, c) => acc + c * c, 0));
      if (len > 1e-6) {
        for (let i = 0; i < n; i++) matSet(u, i, col, candidate[i]! / len);
        filled[col] = true;
        break;
      }
    }
  }
}
