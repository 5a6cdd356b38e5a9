// Shared point, cloud and result types used across the scanline packages.

/** Number of spatial dimensions a cloud lives in. */
export type Dimension = 2 | 3

/** An N-component coordinate. Treated as an immutable value. */
export type Point = readonly number[]

/** Ordered sequence of points. May contain duplicates. */
export type PointCloud = readonly Point[]

export { ok, err, type Result } from './result.js'
