// ---------------------------------------------------------------------------
// @scanline/geometry: vectors, small matrices, rotations, transforms,
// ray casting and point cloud utilities.
// ---------------------------------------------------------------------------

export * from './errors.js';
export * from './prng.js';
export * from './vector.js';
export * from './linalg/matrix.js';
export * from './linalg/svd.js';
export * from './rotation.js';
export * from './transform.js';
export * from './lines/plot-line.js';
export * from './point-cloud.js';
