// ---------------------------------------------------------------------------
// Rigid (isometry) and similarity transforms over a rotation representation.
// ---------------------------------------------------------------------------

import type { Dimension, Point } from '@scanline/types';
import { DimensionError } from './errors.js';
import type { Matrix } from './linalg/matrix.js';
import { type Rotation, rotationRepresentation, toDimension } from './rotation.js';
import { add, assertDimension, negate, scale, zeros } from './vector.js';

/**
 * Rotation followed by translation: `p ↦ R·p + t`.
 *
 * Immutable. {@link compose} pre-multiplies, so `newer.compose(accumulated)`
 * applies `accumulated` first.
 */
export class RigidTransform {
  readonly translation: readonly number[];
  readonly rotation: Rotation;

  constructor(translation: Point, rotation: Rotation) {
    assertDimension(translation, rotation.dimension, 'translation');
    this.translation = [...translation];
    this.rotation = rotation;
  }

  static identity(dimension: Dimension): RigidTransform {
    return new RigidTransform(zeros(dimension), rotationRepresentation(dimension).identity());
  }

  /** From a rotation matrix and translation vector; the matrix size selects the representation. */
  static fromMatrix(rotation: Matrix, translation: Point): RigidTransform {
    if (rotation.rows !== rotation.cols) {
      throw new DimensionError(rotation.rows, rotation.cols, 'square rotation matrix');
    }
    const rep = rotationRepresentation(toDimension(rotation.rows));
    return new RigidTransform(translation, rep.fromMatrix(rotation));
  }

  get dimension(): Dimension {
    return this.rotation.dimension;
  }

  transformPoint(p: Point): number[] {
    return add(this.rotation.transformVector(p), this.translation);
  }

  /** Rotation only; vectors are not translated. */
  transformVector(v: Point): number[] {
    return this.rotation.transformVector(v);
  }

  /** `this ∘ other`: the result applies `other`, then `this`. */
  compose(other: RigidTransform): RigidTransform {
    return new RigidTransform(
      add(this.rotation.transformVector(other.translation), this.translation),
      this.rotation.compose(other.rotation),
    );
  }

  inverse(): RigidTransform {
    const inv = this.rotation.inverse();
    return new RigidTransform(negate(inv.transformVector(this.translation)), inv);
  }

  /** Translate after this transform. */
  appendTranslation(t: Point): RigidTransform {
    return new RigidTransform(add(this.translation, t), this.rotation);
  }

  /** Rotate about the current translation (the frame's centre); the translation is kept. */
  appendRotationWrtCenter(r: Rotation): RigidTransform {
    return new RigidTransform(this.translation, r.compose(this.rotation));
  }
}

/**
 * A rigid transform applied after a uniform scale: `p ↦ R·(s·p) + t`.
 * Used to map world coordinates into grid cells (s = cells per world unit).
 */
export class SimilarityTransform {
  constructor(
    readonly isometry: RigidTransform,
    readonly scaling: number,
  ) {
    if (!(scaling > 0) || !Number.isFinite(scaling)) {
      throw new RangeError(`Similarity scale must be a positive finite number, got ${scaling}`);
    }
  }

  static fromParts(translation: Point, rotation: Rotation, scaling: number): SimilarityTransform {
    return new SimilarityTransform(new RigidTransform(translation, rotation), scaling);
  }

  get dimension(): Dimension {
    return this.isometry.dimension;
  }

  get translation(): readonly number[] {
    return this.isometry.translation;
  }

  get rotation(): Rotation {
    return this.isometry.rotation;
  }

  transformPoint(p: Point): number[] {
    return this.isometry.transformPoint(scale(p, this.scaling));
  }

  appendTranslation(t: Point): SimilarityTransform {
    return new SimilarityTransform(this.isometry.appendTranslation(t), this.scaling);
  }

  appendRotationWrtCenter(r: Rotation): SimilarityTransform {
    return new SimilarityTransform(this.isometry.appendRotationWrtCenter(r), this.scaling);
  }
}
