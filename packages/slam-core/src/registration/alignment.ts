// ---------------------------------------------------------------------------
// Rigid alignment of matched point sets (Kabsch / orthogonal Procrustes).
// ---------------------------------------------------------------------------

import type { PointCloud } from '@scanline/types';
import {
  type Matrix,
  RigidTransform,
  matAddOuter,
  matDeterminant,
  matMultiply,
  matSet,
  matGet,
  matTranspose,
  matVec,
  matZeros,
  pointCloudCentroid,
  rotationRepresentation,
  sub,
  svd,
  toDimension,
} from '@scanline/geometry';

export interface CrossCovariance {
  /** `Σ (aᵢ − ā) ⊗ (bᵢ − b̄)`, N×N. */
  covariance: Matrix;
  meanMoved: number[];
  meanMatched: number[];
}

/**
 * Cross-covariance and centroids of two equally long, index-matched sets.
 *
 * @throws {RangeError} when the sets are empty or differ in length.
 */
export function crossCovarianceAndCentroids(
  moved: PointCloud,
  matched: PointCloud,
): CrossCovariance {
  if (moved.length !== matched.length) {
    throw new RangeError(
      `Correspondence sets differ in length: ${moved.length} vs ${matched.length}`,
    );
  }
  const meanMoved = pointCloudCentroid(moved);
  const meanMatched = pointCloudCentroid(matched);
  if (!meanMoved || !meanMatched) {
    throw new RangeError('Cannot align empty correspondence sets');
  }

  const covariance = matZeros(meanMoved.length);
  moved.forEach((a, i) => {
    matAddOuter(covariance, sub(a, meanMoved), sub(matched[i]!, meanMatched));
  });
  return { covariance, meanMoved, meanMatched };
}

/**
 * Rotation `R = V·Uᵀ` from the SVD `M = U·Σ·Vᵀ` of a cross-covariance
 * matrix. When the product is a reflection, the column of V belonging to
 * the smallest singular value is negated, so `det(R) = +1` always.
 *
 * @throws {SvdConvergenceError} if the decomposition fails.
 */
export function properRotationFromCovariance(covariance: Matrix): Matrix {
  const { u, v } = svd(covariance);
  const ut = matTranspose(u);
  const rotation = matMultiply(v, ut);
  if (matDeterminant(rotation) >= 0) return rotation;

  // Singular values are sorted descending, so the smallest is the last column.
  const last = v.cols - 1;
  for (let i = 0; i < v.rows; i++) {
    matSet(v, i, last, -matGet(v, i, last));
  }
  return matMultiply(v, ut);
}

/**
 * Fold the best rigid update for one set of correspondences into the
 * accumulated transform: `update ∘ accumulated`, where
 * `update(p) = R·p + (meanB − R·meanA)`.
 */
export function estimateRigidUpdate(
  covariance: Matrix,
  meanA: readonly number[],
  meanB: readonly number[],
  accumulated: RigidTransform,
): RigidTransform {
  const rotationMatrix = properRotationFromCovariance(covariance);
  const rep = rotationRepresentation(toDimension(rotationMatrix.rows));
  const translation = sub(meanB, matVec(rotationMatrix, meanA));
  const update = new RigidTransform(translation, rep.fromMatrix(rotationMatrix));
  return update.compose(accumulated);
}
