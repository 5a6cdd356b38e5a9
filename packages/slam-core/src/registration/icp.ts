// ---------------------------------------------------------------------------
// Iterative Closest Point registration.
// ---------------------------------------------------------------------------

import { type Point, type PointCloud, type Result, err, ok } from '@scanline/types';
import { type Logger, createLogger } from '@scanline/config';
import {
  RigidTransform,
  distanceSquared,
  toDimension,
  transformPointCloud,
} from '@scanline/geometry';
import { KDTree } from '../spatial-index/kd-tree.js';
import { findNearestNeighbourNaive } from '../spatial-index/nearest-neighbour.js';
import { crossCovarianceAndCentroids, estimateRigidUpdate } from './alignment.js';
import type { ICPConfiguration, ICPError, ICPSuccess } from './types.js';

const defaultLogger = createLogger('slam-core:icp');

type DidNotConverge = Extract<ICPError, { code: 'DidNotConverge' }>;

export interface ICPOptions {
  logger?: Logger;
}

/** Mutable working state shared by consecutive {@link icpIteration} calls. */
export interface ICPState {
  readonly source: PointCloud;
  readonly target: PointCloud;
  /** Index over `target`, when the configuration asks for one. */
  readonly tree: KDTree | undefined;
  /** `source` under the current transform. */
  transformed: number[][];
  /** Target point matched to each transformed source point in the last iteration. */
  correspondences: Point[];
  transform: RigidTransform;
  previousMse: number;
}

/**
 * Start state for registering `source` onto `target`: identity transform
 * and a previous MSE of `Number.MAX_VALUE`, so the first iteration can only
 * converge through the absolute threshold.
 *
 * @throws {DimensionError} when the clouds are empty or not 2D or 3D.
 */
export function createICPState(
  source: PointCloud,
  target: PointCloud,
  config: Pick<ICPConfiguration, 'useKdTree'>,
): ICPState {
  const first = source[0] ?? target[0] ?? [];
  return {
    source,
    target,
    tree: config.useKdTree ? KDTree.from(target) : undefined,
    transformed: source.map((p) => [...p]),
    correspondences: [],
    transform: RigidTransform.identity(toDimension(first.length)),
    previousMse: Number.MAX_VALUE,
  };
}

/**
 * Mean of the squared distances between index-matched points.
 *
 * @throws {RangeError} when the clouds differ in length.
 */
export function meanSquaredError(moved: PointCloud, matched: PointCloud): number {
  if (moved.length !== matched.length) {
    throw new RangeError(`Cannot pair ${moved.length} points with ${matched.length}`);
  }
  let acc = 0;
  moved.forEach((p, i) => {
    acc += distanceSquared(p, matched[i]!);
  });
  return acc / moved.length;
}

/**
 * One ICP step: match every transformed source point to its nearest target
 * point, fold the best rigid update into `state.transform`, re-transform
 * the source and measure the MSE against those matches.
 *
 * @returns The new MSE when the convergence test passes. Otherwise a
 *          `DidNotConverge` error carrying this step's centroids, or
 *          `NoNearestNeighbourFound` if a point had no match.
 */
export function icpIteration(state: ICPState, config: ICPConfiguration): Result<number, ICPError> {
  const matches: Point[] = [];
  for (const p of state.transformed) {
    const nearest = state.tree?.nearest(p) ?? findNearestNeighbourNaive(p, state.target);
    if (!nearest) {
      return err<ICPError>({
        code: 'NoNearestNeighbourFound',
        message: `No nearest neighbour found for [${p.join(', ')}]`,
        point: p,
      });
    }
    matches.push(nearest);
  }

  const { covariance, meanMoved, meanMatched } = crossCovarianceAndCentroids(
    state.transformed,
    matches,
  );
  state.transform = estimateRigidUpdate(covariance, meanMoved, meanMatched, state.transform);
  state.transformed = transformPointCloud(state.source, state.transform);
  state.correspondences = matches;

  const mse = meanSquaredError(state.transformed, matches);
  const belowAbsolute =
    config.mseAbsoluteThreshold !== undefined && mse < config.mseAbsoluteThreshold;
  if (belowAbsolute || Math.abs(state.previousMse - mse) < config.mseIntervalThreshold) {
    return ok(mse);
  }

  state.previousMse = mse;
  return err<ICPError>({
    code: 'DidNotConverge',
    message: `MSE ${mse} has not converged`,
    centroids: [meanMoved, meanMatched],
    mse,
  });
}

function checkPreconditions(
  source: PointCloud,
  target: PointCloud,
  config: ICPConfiguration,
): ICPError | undefined {
  const sourcePoint = source[0];
  const targetPoint = target[0];
  if (!sourcePoint) {
    return { code: 'SourceCloudEmpty', message: 'Source point cloud is empty' };
  }
  if (!targetPoint) {
    return { code: 'TargetCloudEmpty', message: 'Target point cloud is empty' };
  }
  if (!(config.maxIterations >= 1)) {
    return { code: 'IterationBudgetIsZero', message: 'maxIterations must be at least 1' };
  }
  if (!(config.mseIntervalThreshold > Number.EPSILON)) {
    return {
      code: 'IntervalThresholdTooLow',
      message: `mseIntervalThreshold must exceed machine epsilon, got ${config.mseIntervalThreshold}`,
      threshold: config.mseIntervalThreshold,
    };
  }
  const absolute = config.mseAbsoluteThreshold;
  if (absolute !== undefined && !(absolute > Number.EPSILON)) {
    return {
      code: 'AbsoluteThresholdTooLow',
      message: `mseAbsoluteThreshold must exceed machine epsilon, got ${absolute}`,
      threshold: absolute,
    };
  }
  const mismatched =
    source.find((p) => p.length !== sourcePoint.length) ??
    target.find((p) => p.length !== sourcePoint.length);
  if (mismatched || (sourcePoint.length !== 2 && sourcePoint.length !== 3)) {
    return {
      code: 'DimensionMismatch',
      message: `Clouds must share one dimension of 2 or 3, got ${sourcePoint.length} and ${(mismatched ?? targetPoint).length}`,
      source: sourcePoint.length,
      target: (mismatched ?? targetPoint).length,
    };
  }
  return undefined;
}

/**
 * Register `source` onto `target`.
 *
 * Preconditions are checked in order (empty source, empty target, zero
 * budget, interval threshold, absolute threshold, dimensions) before any
 * iteration runs. A converged result does not guarantee the alignment is
 * correct, only that another iteration would not improve it.
 */
export function icp(
  source: PointCloud,
  target: PointCloud,
  config: ICPConfiguration,
  options: ICPOptions = {},
): Result<ICPSuccess, ICPError> {
  const log = options.logger ?? defaultLogger;

  const invalid = checkPreconditions(source, target, config);
  if (invalid) return err(invalid);

  log.debug('icp started', {
    sourcePoints: source.length,
    targetPoints: target.length,
    useKdTree: config.useKdTree,
    maxIterations: config.maxIterations,
  });

  const state = createICPState(source, target, config);
  let last: DidNotConverge | undefined;

  for (let iteration = 0; iteration < config.maxIterations; iteration++) {
    const step = icpIteration(state, config);
    if (step.ok) {
      log.debug('icp converged', { iterations: iteration, mse: step.value });
      return ok({ transform: state.transform, mse: step.value, iterations: iteration });
    }
    const failure = step.error;
    if (failure.code !== 'DidNotConverge') return err(failure);

    log.trace('icp iteration', { iteration, mse: failure.mse });
    last = failure;
  }

  log.warn('icp did not converge', { maxIterations: config.maxIterations, mse: last?.mse });
  return err<ICPError>(
    last ?? {
      code: 'DidNotConverge',
      message: 'Iteration budget exhausted',
      centroids: [[], []],
      mse: Number.NaN,
    },
  );
}
