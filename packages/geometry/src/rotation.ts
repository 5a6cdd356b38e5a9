// ---------------------------------------------------------------------------
// Rotation representations: unit complex numbers (2D) and unit quaternions (3D)
// behind one capability interface, selected by dimension.
// ---------------------------------------------------------------------------

import type { Dimension, Point } from '@scanline/types';
import { DimensionError } from './errors.js';
import { type Matrix, matFromRows, matGet } from './linalg/matrix.js';
import { assertDimension, norm } from './vector.js';

/** A proper rotation (orthogonal, determinant +1) in 2 or 3 dimensions. */
export interface Rotation {
  readonly dimension: Dimension;
  /** Rotate a vector about the origin. */
  transformVector(v: Point): number[];
  /** `this ∘ other`: applies `other` first. */
  compose(other: Rotation): Rotation;
  inverse(): Rotation;
  toMatrix(): Matrix;
  /** Rotation magnitude in radians, in [0, π]. */
  angle(): number;
}

/** Constructors for one rotation type. */
export interface RotationRepresentation {
  readonly dimension: Dimension;
  identity(): Rotation;
  /** Build from a rotation matrix; the matrix is assumed orthonormal with det +1. */
  fromMatrix(m: Matrix): Rotation;
}

// ---------------------------------------------------------------------------
// UnitComplex (2D)
// ---------------------------------------------------------------------------

export class UnitComplex implements Rotation {
  readonly dimension = 2 as const;
  readonly re: number;
  readonly im: number;

  private constructor(re: number, im: number) {
    const len = Math.hypot(re, im);
    this.re = len > 0 ? re / len : 1;
    this.im = len > 0 ? im / len : 0;
  }

  static identity(): UnitComplex {
    return new UnitComplex(1, 0);
  }

  static fromAngle(theta: number): UnitComplex {
    return new UnitComplex(Math.cos(theta), Math.sin(theta));
  }

  static fromMatrix(m: Matrix): UnitComplex {
    if (m.rows !== 2 || m.cols !== 2) throw new DimensionError(2, m.rows, 'rotation matrix');
    return UnitComplex.fromAngle(Math.atan2(matGet(m, 1, 0), matGet(m, 0, 0)));
  }

  /** Signed rotation angle in (-π, π]. */
  get theta(): number {
    return Math.atan2(this.im, this.re);
  }

  transformVector(v: Point): number[] {
    assertDimension(v, 2, 'vector');
    const [x = 0, y = 0] = v;
    return [this.re * x - this.im * y, this.im * x + this.re * y];
  }

  compose(other: Rotation): UnitComplex {
    if (!(other instanceof UnitComplex)) {
      throw new DimensionError(2, other.dimension, 'rotation');
    }
    return new UnitComplex(
      this.re * other.re - this.im * other.im,
      this.re * other.im + this.im * other.re,
    );
  }

  inverse(): UnitComplex {
    return new UnitComplex(this.re, -this.im);
  }

  toMatrix(): Matrix {
    return matFromRows([
      [this.re, -this.im],
      [this.im, this.re],
    ]);
  }

  angle(): number {
    return Math.abs(this.theta);
  }
}

// ---------------------------------------------------------------------------
// UnitQuaternion (3D)
// ---------------------------------------------------------------------------

export class UnitQuaternion implements Rotation {
  readonly dimension = 3 as const;
  readonly w: number;
  readonly x: number;
  readonly y: number;
  readonly z: number;

  private constructor(w: number, x: number, y: number, z: number) {
    const len = Math.sqrt(w * w + x * x + y * y + z * z);
    if (len > 0) {
      this.w = w / len;
      this.x = x / len;
      this.y = y / len;
      this.z = z / len;
    } else {
      this.w = 1;
      this.x = 0;
      this.y = 0;
      this.z = 0;
    }
  }

  static identity(): UnitQuaternion {
    return new UnitQuaternion(1, 0, 0, 0);
  }

  /** Normalises the given components. */
  static fromComponents(w: number, x: number, y: number, z: number): UnitQuaternion {
    return new UnitQuaternion(w, x, y, z);
  }

  static fromAxisAngle(axis: Point, angle: number): UnitQuaternion {
    assertDimension(axis, 3, 'axis');
    const len = norm(axis);
    if (len === 0 || angle === 0) return UnitQuaternion.identity();
    const half = angle / 2;
    const s = Math.sin(half) / len;
    const [ax = 0, ay = 0, az = 0] = axis;
    return new UnitQuaternion(Math.cos(half), ax * s, ay * s, az * s);
  }

  /** Rotation vector: direction is the axis, length is the angle. */
  static fromScaledAxis(v: Point): UnitQuaternion {
    return UnitQuaternion.fromAxisAngle(v, norm(v));
  }

  /** Roll about x, then pitch about y, then yaw about z. */
  static fromEulerAngles(roll: number, pitch: number, yaw: number): UnitQuaternion {
    const [cr, sr] = [Math.cos(roll / 2), Math.sin(roll / 2)];
    const [cp, sp] = [Math.cos(pitch / 2), Math.sin(pitch / 2)];
    const [cy, sy] = [Math.cos(yaw / 2), Math.sin(yaw / 2)];
    return new UnitQuaternion(
      cr * cp * cy + sr * sp * sy,
      sr * cp * cy - cr * sp * sy,
      cr * sp * cy + sr * cp * sy,
      cr * cp * sy - sr * sp * cy,
    );
  }

  /** Shepperd's method: branch on the largest of trace and diagonal for stability. */
  static fromMatrix(m: Matrix): UnitQuaternion {
    if (m.rows !== 3 || m.cols !== 3) throw new DimensionError(3, m.rows, 'rotation matrix');
    const g = (i: number, j: number) => matGet(m, i, j);
    const trace = g(0, 0) + g(1, 1) + g(2, 2);

    if (trace > 0) {
      const s = Math.sqrt(trace + 1) * 2;
      return new UnitQuaternion(
        0.25 * s,
        (g(2, 1) - g(1, 2)) / s,
        (g(0, 2) - g(2, 0)) / s,
        (g(1, 0) - g(0, 1)) / s,
      );
    }
    if (g(0, 0) > g(1, 1) && g(0, 0) > g(2, 2)) {
      const s = Math.sqrt(1 + g(0, 0) - g(1, 1) - g(2, 2)) * 2;
      return new UnitQuaternion(
        (g(2, 1) - g(1, 2)) / s,
        0.25 * s,
        (g(0, 1) + g(1, 0)) / s,
        (g(0, 2) + g(2, 0)) / s,
      );
    }
    if (g(1, 1) > g(2, 2)) {
      const s = Math.sqrt(1 + g(1, 1) - g(0, 0) - g(2, 2)) * 2;
      return new UnitQuaternion(
        (g(0, 2) - g(2, 0)) / s,
        (g(0, 1) + g(1, 0)) / s,
        0.25 * s,
        (g(1, 2) + g(2, 1)) / s,
      );
    }
    const s = Math.sqrt(1 + g(2, 2) - g(0, 0) - g(1, 1)) * 2;
    return new UnitQuaternion(
      (g(1, 0) - g(0, 1)) / s,
      (g(0, 2) + g(2, 0)) / s,
      (g(1, 2) + g(2, 1)) / s,
      0.25 * s,
    );
  }

  transformVector(v: Point): number[] {
    assertDimension(v, 3, 'vector');
    const [vx = 0, vy = 0, vz = 0] = v;
    // t = 2 * (q.xyz × v); v' = v + w t + q.xyz × t
    const tx = 2 * (this.y * vz - this.z * vy);
    const ty = 2 * (this.z * vx - this.x * vz);
    const tz = 2 * (this.x * vy - this.y * vx);
    return [
      vx + this.w * tx + (this.y * tz - this.z * ty),
      vy + this.w * ty + (this.z * tx - this.x * tz),
      vz + this.w * tz + (this.x * ty - this.y * tx),
    ];
  }

  compose(other: Rotation): UnitQuaternion {
    if (!(other instanceof UnitQuaternion)) {
      throw new DimensionError(3, other.dimension, 'rotation');
    }
    const { w: aw, x: ax, y: ay, z: az } = this;
    const { w: bw, x: bx, y: by, z: bz } = other;
    return new UnitQuaternion(
      aw * bw - ax * bx - ay * by - az * bz,
      aw * bx + ax * bw + ay * bz - az * by,
      aw * by - ax * bz + ay * bw + az * bx,
      aw * bz + ax * by - ay * bx + az * bw,
    );
  }

  inverse(): UnitQuaternion {
    return new UnitQuaternion(this.w, -this.x, -this.y, -this.z);
  }

  toMatrix(): Matrix {
    const { w, x, y, z } = this;
    return matFromRows([
      [1 - 2 * (y * y + z * z), 2 * (x * y - w * z), 2 * (x * z + w * y)],
      [2 * (x * y + w * z), 1 - 2 * (x * x + z * z), 2 * (y * z - w * x)],
      [2 * (x * z - w * y), 2 * (y * z + w * x), 1 - 2 * (x * x + y * y)],
    ]);
  }

  angle(): number {
    return 2 * Math.acos(Math.min(1, Math.abs(this.w)));
  }
}

// ---------------------------------------------------------------------------
// Representation selection
// ---------------------------------------------------------------------------

export const UNIT_COMPLEX: RotationRepresentation = {
  dimension: 2,
  identity: () => UnitComplex.identity(),
  fromMatrix: (m) => UnitComplex.fromMatrix(m),
};

export const UNIT_QUATERNION: RotationRepresentation = {
  dimension: 3,
  identity: () => UnitQuaternion.identity(),
  fromMatrix: (m) => UnitQuaternion.fromMatrix(m),
};

export function rotationRepresentation(dimension: Dimension): RotationRepresentation {
  return dimension === 2 ? UNIT_COMPLEX : UNIT_QUATERNION;
}

/** Narrow an arbitrary component count to a supported dimension. */
export function toDimension(n: number): Dimension {
  if (n === 2 || n === 3) return n;
  throw new DimensionError(n < 2 ? 2 : 3, n, 'point (only 2D and 3D are supported)');
}
