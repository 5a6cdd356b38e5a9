// ---------------------------------------------------------------------------
// Errors thrown for precondition violations and numerical faults.
// ---------------------------------------------------------------------------

/** A point, vector or matrix had the wrong number of components. */
export class DimensionError extends Error {
  constructor(
    public readonly expected: number,
    public readonly actual: number,
    what = 'point',
  ) {
    super(`Expected a ${expected}-dimensional ${what}, got ${actual} components`);
    this.name = 'DimensionError';
  }
}

/** A coordinate was NaN or infinite where ordering by coordinate is required. */
export class NonFiniteCoordinateError extends Error {
  constructor(public readonly point: readonly number[]) {
    super(`Point has a non-finite coordinate: [${point.join(', ')}]`);
    this.name = 'NonFiniteCoordinateError';
  }
}

/**
 * Singular value decomposition did not converge. Not expected for finite
 * input; treated as an internal fault rather than a recoverable error.
 */
export class SvdConvergenceError extends Error {
  constructor(public readonly sweeps: number, reason?: string) {
    super(
      reason
        ? `SVD failed: ${reason}`
        : `SVD did not converge after ${sweeps} Jacobi sweeps`,
    );
    this.name = 'SvdConvergenceError';
  }
}
