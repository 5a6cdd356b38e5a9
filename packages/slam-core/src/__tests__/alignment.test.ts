import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import {
  RigidTransform,
  UnitComplex,
  UnitQuaternion,
  matDeterminant,
  matFromRows,
  matIdentity,
  matMultiply,
  matToRows,
  matTranspose,
  svd,
  transformPointCloud,
  type Matrix,
} from '@scanline/geometry';
import {
  crossCovarianceAndCentroids,
  estimateRigidUpdate,
  properRotationFromCovariance,
} from '../registration/alignment.js';

function expectMatrixClose(a: Matrix, b: Matrix, tol = 1e-9): void {
  const ra = matToRows(a);
  const rb = matToRows(b);
  ra.forEach((row, i) => {
    row.forEach((v, j) => {
      expect(Math.abs(v - (rb[i]?.[j] ?? Number.NaN))).toBeLessThan(tol);
    });
  });
}

function expectVecClose(actual: readonly number[], expected: readonly number[], digits = 9): void {
  expect(actual).toHaveLength(expected.length);
  expected.forEach((e, i) => {
    expect(actual[i]).toBeCloseTo(e, digits);
  });
}

// ---------------------------------------------------------------------------
// crossCovarianceAndCentroids
// ---------------------------------------------------------------------------

describe('crossCovarianceAndCentroids', () => {
  it('sums outer products of centred pairs', () => {
    const { covariance, meanMoved, meanMatched } = crossCovarianceAndCentroids(
      [
        [0, 0],
        [2, 0],
      ],
      [
        [1, 1],
        [1, 3],
      ],
    );
    expect(meanMoved).toEqual([1, 0]);
    expect(meanMatched).toEqual([1, 2]);
    expect(matToRows(covariance)).toEqual([
      [0, 2],
      [0, 0],
    ]);
  });

  it('rejects sets of different length', () => {
    expect(() => crossCovarianceAndCentroids([[0, 0]], [])).toThrow(RangeError);
  });

  it('rejects empty sets', () => {
    expect(() => crossCovarianceAndCentroids([], [])).toThrow(RangeError);
  });
});

// ---------------------------------------------------------------------------
// properRotationFromCovariance
// ---------------------------------------------------------------------------

describe('properRotationFromCovariance', () => {
  it('corrects a reflection into a proper rotation', () => {
    // The raw product V·Uᵀ for this covariance is diag(1, 1, -1).
    const m = matFromRows([
      [1, 0, 0],
      [0, 1, 0],
      [0, 0, -1],
    ]);
    const { u, v } = svd(m);
    expect(matDeterminant(matMultiply(v, matTranspose(u)))).toBeCloseTo(-1, 12);

    const r = properRotationFromCovariance(m);
    expect(matDeterminant(r)).toBeCloseTo(1, 12);
    expectMatrixClose(r, matIdentity(3));
  });

  it('returns a proper rotation for a mirrored 2D point set', () => {
    const a = [
      [1, 0],
      [0, 2],
      [-3, 1],
    ];
    const mirrored = a.map(([x = 0, y = 0]) => [-x, y]);
    const { covariance } = crossCovarianceAndCentroids(a, mirrored);
    const r = properRotationFromCovariance(covariance);
    expect(matDeterminant(r)).toBeCloseTo(1, 10);
    expectMatrixClose(matMultiply(matTranspose(r), r), matIdentity(2));
  });

  it('is always orthonormal with determinant +1', () => {
    const entry = fc.double({ min: -10, max: 10, noNaN: true, noDefaultInfinity: true });
    fc.assert(
      fc.property(fc.array(entry, { minLength: 9, maxLength: 9 }), (values) => {
        const m: Matrix = { rows: 3, cols: 3, data: new Float64Array(values) };
        const r = properRotationFromCovariance(m);
        expect(matDeterminant(r)).toBeCloseTo(1, 8);
        expectMatrixClose(matMultiply(matTranspose(r), r), matIdentity(3), 1e-8);
      }),
      { numRuns: 200 },
    );
  });
});

// ---------------------------------------------------------------------------
// estimateRigidUpdate
// ---------------------------------------------------------------------------

describe('estimateRigidUpdate', () => {
  const source2 = [
    [0, 0],
    [4, 0],
    [4, 1],
    [-1, 3],
  ];

  it('recovers an exact 2D rigid motion in one step', () => {
    const truth = new RigidTransform([1, -2], UnitComplex.fromAngle(0.3));
    const target = transformPointCloud(source2, truth);
    const { covariance, meanMoved, meanMatched } = crossCovarianceAndCentroids(source2, target);

    const estimate = estimateRigidUpdate(covariance, meanMoved, meanMatched, RigidTransform.identity(2));
    expectVecClose(estimate.translation, [1, -2]);
    expect(estimate.rotation.angle()).toBeCloseTo(0.3, 9);
    source2.forEach((p, i) => expectVecClose(estimate.transformPoint(p), target[i] ?? []));
  });

  it('recovers an exact 3D rigid motion', () => {
    const source3 = [
      [0, 0, 0],
      [3, 0, 0],
      [0, 2, 0],
      [0, 0, 5],
      [1, 1, 1],
    ];
    const truth = new RigidTransform([-0.8, 1.3, 0.2], UnitQuaternion.fromScaledAxis([0.1, 0.5, -0.21]));
    const target = transformPointCloud(source3, truth);
    const { covariance, meanMoved, meanMatched } = crossCovarianceAndCentroids(source3, target);

    const estimate = estimateRigidUpdate(covariance, meanMoved, meanMatched, RigidTransform.identity(3));
    expectVecClose(estimate.translation, [-0.8, 1.3, 0.2]);
    source3.forEach((p, i) => expectVecClose(estimate.transformPoint(p), target[i] ?? []));
  });

  it('pre-multiplies the update onto the accumulated transform', () => {
    const accumulated = new RigidTransform([0.5, 0.5], UnitComplex.fromAngle(-0.2));
    const moved = transformPointCloud(source2, accumulated);
    const step = new RigidTransform([2, 0], UnitComplex.fromAngle(0.1));
    const target = transformPointCloud(moved, step);
    const { covariance, meanMoved, meanMatched } = crossCovarianceAndCentroids(moved, target);

    const combined = estimateRigidUpdate(covariance, meanMoved, meanMatched, accumulated);
    source2.forEach((p, i) => expectVecClose(combined.transformPoint(p), target[i] ?? []));
  });
});
