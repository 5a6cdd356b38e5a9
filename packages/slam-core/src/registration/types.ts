// ---------------------------------------------------------------------------
// ICP configuration, success and error types.
// ---------------------------------------------------------------------------

import type { Point } from '@scanline/types';
import type { RigidTransform } from '@scanline/geometry';

export interface ICPConfiguration {
  /** Build a k-d tree over the target for correspondence search. */
  useKdTree: boolean;
  /** Upper bound on iterations; must be positive. */
  maxIterations: number;
  /** Converge once the MSE drops below this value, if set. */
  mseAbsoluteThreshold?: number;
  /** Converge once the MSE changes by less than this between iterations. */
  mseIntervalThreshold: number;
}

export interface ICPSuccess {
  /** Maps the source cloud onto the target. */
  transform: RigidTransform;
  mse: number;
  /** Zero-based index of the iteration that converged. */
  iterations: number;
}

export type ICPError =
  | { code: 'SourceCloudEmpty'; message: string }
  | { code: 'TargetCloudEmpty'; message: string }
  | { code: 'IterationBudgetIsZero'; message: string }
  | { code: 'IntervalThresholdTooLow'; message: string; threshold: number }
  | { code: 'AbsoluteThresholdTooLow'; message: string; threshold: number }
  | { code: 'DimensionMismatch'; message: string; source: number; target: number }
  | { code: 'NoNearestNeighbourFound'; message: string; point: Point }
  | {
      code: 'DidNotConverge';
      message: string;
      /** Centroids of the moved source and its matches in the last iteration. */
      centroids: readonly [moved: Point, matched: Point];
      mse: number;
    };
