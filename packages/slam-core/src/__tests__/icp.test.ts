import { describe, it, expect } from 'vitest';
import { createLogger, type Logger } from '@scanline/config';
import {
  RigidTransform,
  UnitComplex,
  UnitQuaternion,
  generatePointCloud,
  transformPointCloud,
} from '@scanline/geometry';
import {
  createICPState,
  icp,
  icpIteration,
  meanSquaredError,
} from '../registration/icp.js';
import {
  createICPConfiguration,
  icpConfigurationSchema,
  parseICPConfiguration,
} from '../registration/config.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const SPACING = 0.005;

/**
 * 100 points in four tight 5x5 clusters at the corners of a 10x10 square.
 * Clusters are far apart relative to the test motions, so every match lands
 * in the right cluster and each ICP step is within a cluster width of exact.
 */
function clusteredSquare(): number[][] {
  const points: number[][] = [];
  for (const [cx, cy] of [
    [-5, -5],
    [5, -5],
    [5, 5],
    [-5, 5],
  ] as const) {
    for (let i = -2; i <= 2; i++) {
      for (let j = -2; j <= 2; j++) points.push([cx + i * SPACING, cy + j * SPACING]);
    }
  }
  return points;
}

/** 216 points in eight 3x3x3 clusters at the corners of a 10-unit cube. */
function clusteredCube(): number[][] {
  const points: number[][] = [];
  for (const cx of [-5, 5]) {
    for (const cy of [-5, 5]) {
      for (const cz of [-5, 5]) {
        for (let i = -1; i <= 1; i++) {
          for (let j = -1; j <= 1; j++) {
            for (let k = -1; k <= 1; k++) {
              points.push([cx + i * SPACING, cy + j * SPACING, cz + k * SPACING]);
            }
          }
        }
      }
    }
  }
  return points;
}

function captureLogger(): { logger: Logger; entries: () => unknown[] } {
  const lines: string[] = [];
  const logger = createLogger('test', { level: 'trace', sink: (line) => lines.push(line) });
  return { logger, entries: () => lines.map((line): unknown => JSON.parse(line)) };
}

const quiet = { logger: createLogger('test', { level: 'silent' }) };

const truth2 = new RigidTransform([-0.8, 1.3], UnitComplex.fromAngle(0.1));

// 100 points drawn uniformly from a 30x30 square.
const SQUARE_SEED = 7;
const square = generatePointCloud(
  100,
  [
    [-15, 15],
    [-15, 15],
  ],
  SQUARE_SEED,
);
const squareTarget = transformPointCloud(square, truth2);

const source2 = clusteredSquare();
const target2 = transformPointCloud(source2, truth2);

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

describe('ICP configuration', () => {
  it('defaults to an exhaustive search with 20 iterations', () => {
    expect(createICPConfiguration()).toEqual({
      useKdTree: false,
      maxIterations: 20,
      mseIntervalThreshold: 0.01,
    });
  });

  it('keeps an absolute threshold only when given', () => {
    expect(createICPConfiguration({ mseAbsoluteThreshold: 0.5 }).mseAbsoluteThreshold).toBe(0.5);
    expect('mseAbsoluteThreshold' in createICPConfiguration()).toBe(false);
  });

  it('parses untrusted input with defaults', () => {
    expect(parseICPConfiguration({ useKdTree: true })).toEqual({
      useKdTree: true,
      maxIterations: 20,
      mseIntervalThreshold: 0.01,
    });
  });

  it('rejects malformed input', () => {
    expect(icpConfigurationSchema.safeParse({ maxIterations: 1.5 }).success).toBe(false);
    expect(icpConfigurationSchema.safeParse({ useKdTree: 'yes' }).success).toBe(false);
  });
});

// ---------------------------------------------------------------------------
// Preconditions
// ---------------------------------------------------------------------------

describe('icp preconditions', () => {
  const config = createICPConfiguration();
  const cloud = generatePointCloud(10, [
    [-15, 15],
    [-15, 15],
  ]);

  function errorCode(...args: Parameters<typeof icp>): string | undefined {
    const res = icp(...args);
    return res.ok ? undefined : res.error.code;
  }

  it('reports an empty source before anything else, without iterating', () => {
    const { logger, entries } = captureLogger();
    expect(errorCode([], [], { ...config, maxIterations: 0 }, { logger })).toBe('SourceCloudEmpty');
    expect(errorCode([], cloud, config, { logger })).toBe('SourceCloudEmpty');
    expect(entries()).toEqual([]);
  });

  it('reports an empty target', () => {
    expect(errorCode(cloud, [], config, quiet)).toBe('TargetCloudEmpty');
  });

  it('reports a zero iteration budget', () => {
    expect(errorCode(cloud, cloud, { ...config, maxIterations: 0 }, quiet)).toBe(
      'IterationBudgetIsZero',
    );
  });

  it('reports interval thresholds at or below epsilon', () => {
    for (const threshold of [Number.EPSILON, 0, -1, Number.NaN]) {
      expect(errorCode(cloud, cloud, { ...config, mseIntervalThreshold: threshold }, quiet)).toBe(
        'IntervalThresholdTooLow',
      );
    }
  });

  it('reports absolute thresholds at or below epsilon', () => {
    for (const threshold of [Number.EPSILON, 0, Number.NaN]) {
      expect(errorCode(cloud, cloud, { ...config, mseAbsoluteThreshold: threshold }, quiet)).toBe(
        'AbsoluteThresholdTooLow',
      );
    }
  });

  it('checks the interval threshold before the absolute one', () => {
    expect(
      errorCode(
        cloud,
        cloud,
        { ...config, mseIntervalThreshold: 0, mseAbsoluteThreshold: 0 },
        quiet,
      ),
    ).toBe('IntervalThresholdTooLow');
  });

  it('reports clouds of different or unsupported dimension', () => {
    expect(errorCode(cloud, [[0, 0, 0]], config, quiet)).toBe('DimensionMismatch');
    expect(errorCode([[0, 0, 0, 0]], [[0, 0, 0, 0]], config, quiet)).toBe('DimensionMismatch');
  });
});

// ---------------------------------------------------------------------------
// Registration
// ---------------------------------------------------------------------------

describe('icp', () => {
  it('aligns a rotated and offset square in 2D', () => {
    const res = icp(
      square,
      squareTarget,
      { useKdTree: false, maxIterations: 50, mseIntervalThreshold: 0.01 },
      quiet,
    );
    expect(res.ok).toBe(true);
    if (!res.ok) return;

    expect(res.value.mse).toBeLessThan(0.01);
    const [tx = Number.NaN, ty = Number.NaN] = res.value.transform.translation;
    expect(Math.abs(tx - -0.8)).toBeLessThan(0.05);
    expect(Math.abs(ty - 1.3)).toBeLessThan(0.05);
    expect(Math.abs(res.value.transform.rotation.angle() - 0.1)).toBeLessThan(0.01);

    // The inverse carries the target back onto the source.
    const back = transformPointCloud(squareTarget, res.value.transform.inverse());
    expect(meanSquaredError(back, square)).toBeLessThan(0.01);
  });

  it('aligns with the k-d tree as well', () => {
    const res = icp(
      square,
      squareTarget,
      { useKdTree: true, maxIterations: 50, mseIntervalThreshold: 0.01 },
      quiet,
    );
    expect(res.ok).toBe(true);
    if (res.ok) expect(res.value.mse).toBeLessThan(0.01);
  });

  it('aligns a rotated and offset cube in 3D', () => {
    const truth = new RigidTransform(
      [-0.8, 1.3, 0.2],
      UnitQuaternion.fromScaledAxis([0.05, 0.05, -0.02]),
    );
    const source = clusteredCube();
    const target = transformPointCloud(source, truth);
    const res = icp(source, target, createICPConfiguration({ useKdTree: true }), quiet);
    expect(res.ok).toBe(true);
    if (!res.ok) return;

    expect(res.value.mse).toBeLessThan(0.01);
    expect(res.value.transform.dimension).toBe(3);
    res.value.transform.translation.forEach((c, i) => {
      expect(Math.abs(c - (truth.translation[i] ?? Number.NaN))).toBeLessThan(0.05);
    });
  });

  it('converges at once on identical clouds', () => {
    const res = icp(source2, source2, createICPConfiguration(), quiet);
    expect(res.ok).toBe(true);
    if (!res.ok) return;
    expect(res.value.iterations).toBe(1);
    expect(res.value.mse).toBeLessThan(1e-20);
  });

  it('stays put when restarted from its own result', () => {
    const config = createICPConfiguration({ maxIterations: 50 });
    const first = icp(square, squareTarget, config, quiet);
    expect(first.ok).toBe(true);
    if (!first.ok) return;

    const moved = transformPointCloud(square, first.value.transform);
    const second = icp(moved, squareTarget, config, quiet);
    expect(second.ok).toBe(true);
    if (!second.ok) return;
    expect(second.value.iterations).toBeLessThanOrEqual(1);
    expect(Math.abs(second.value.mse - first.value.mse)).toBeLessThan(1e-3);
  });

  it('converges on the first iteration through the absolute threshold', () => {
    const res = icp(
      source2,
      target2,
      createICPConfiguration({ maxIterations: 1, mseAbsoluteThreshold: 0.01 }),
      quiet,
    );
    expect(res.ok).toBe(true);
    if (res.ok) expect(res.value.iterations).toBe(0);
  });

  it('reports the last centroids and MSE when the budget runs out', () => {
    const { logger, entries } = captureLogger();
    const res = icp(source2, target2, createICPConfiguration({ maxIterations: 1 }), { logger });
    expect(res.ok).toBe(false);
    if (res.ok || res.error.code !== 'DidNotConverge') return;

    const [moved, matched] = res.error.centroids;
    expect(moved[0]).toBeCloseTo(0, 9);
    expect(moved[1]).toBeCloseTo(0, 9);
    expect(Math.abs((matched[0] ?? Number.NaN) - -0.8)).toBeLessThan(0.05);
    expect(Math.abs((matched[1] ?? Number.NaN) - 1.3)).toBeLessThan(0.05);
    expect(res.error.mse).toBeLessThan(0.01);
    expect(entries()).toMatchObject([
      { level: 'debug', msg: 'icp started' },
      { level: 'trace', msg: 'icp iteration', iteration: 0 },
      { level: 'warn', msg: 'icp did not converge', maxIterations: 1 },
    ]);
  });

  it('logs the start, each iteration and convergence', () => {
    const { logger, entries } = captureLogger();
    icp(source2, target2, createICPConfiguration(), { logger });
    expect(entries()).toMatchObject([
      { level: 'debug', msg: 'icp started', sourcePoints: 100, targetPoints: 100 },
      { level: 'trace', msg: 'icp iteration', iteration: 0 },
      { level: 'debug', msg: 'icp converged', iterations: 1 },
    ]);
  });
});

// ---------------------------------------------------------------------------
// Single iterations
// ---------------------------------------------------------------------------

describe('icpIteration', () => {
  it('reports an MSE that re-measures from its transform and matches', () => {
    const config = createICPConfiguration({ useKdTree: true });
    const state = createICPState(source2, target2, config);

    let step = icpIteration(state, config);
    for (let i = 0; i < config.maxIterations && !step.ok; i++) {
      step = icpIteration(state, config);
    }
    expect(step.ok).toBe(true);
    if (!step.ok) return;

    const reapplied = transformPointCloud(source2, state.transform);
    expect(meanSquaredError(reapplied, state.correspondences)).toBeCloseTo(step.value, 12);
    expect(state.correspondences).toHaveLength(source2.length);
  });

  it('keeps the previous MSE for the next interval test', () => {
    const config = createICPConfiguration();
    const state = createICPState(source2, target2, config);
    expect(state.previousMse).toBe(Number.MAX_VALUE);

    const step = icpIteration(state, config);
    expect(step.ok).toBe(false);
    if (step.ok || step.error.code !== 'DidNotConverge') return;
    expect(state.previousMse).toBe(step.error.mse);
  });
});

describe('meanSquaredError', () => {
  it('averages squared distances between paired points', () => {
    expect(
      meanSquaredError(
        [
          [0, 0],
          [1, 1],
        ],
        [
          [3, 4],
          [1, 2],
        ],
      ),
    ).toBe(13);
  });

  it('refuses clouds of different length', () => {
    expect(() => meanSquaredError([[0, 0]], [])).toThrow(RangeError);
  });
});
