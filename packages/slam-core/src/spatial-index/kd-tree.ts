// ---------------------------------------------------------------------------
// k-d tree over N-dimensional points with nearest-neighbour search.
// ---------------------------------------------------------------------------

import type { Point, PointCloud } from '@scanline/types';
import {
  NonFiniteCoordinateError,
  assertDimension,
  distanceSquared,
  isFinitePoint,
  pointsEqual,
} from '@scanline/geometry';

/** One stored point and its exclusively owned children. */
interface KDNode {
  point: Point;
  left: KDNode | null;
  right: KDNode | null;
}

function createNode(point: Point): KDNode {
  return { point: [...point], left: null, right: null };
}

/**
 * Binary space partition cycling through the axes by depth. At depth `d`
 * the split axis is `d mod N`; strictly smaller coordinates go left and
 * ties go right.
 *
 * An exact duplicate is rejected when it reaches a node it equals on the
 * split axis and the right slot there is still empty. A duplicate that
 * meets an occupied right slot keeps descending and may be stored again.
 */
export class KDTree {
  private root: KDNode | null = null;
  private count = 0;
  private dim: number | undefined;

  /** Build a tree by inserting the points in order. */
  static from(points: PointCloud): KDTree {
    const tree = new KDTree();
    for (const p of points) tree.insert(p);
    return tree;
  }

  get size(): number {
    return this.count;
  }

  isEmpty(): boolean {
    return this.count === 0;
  }

  /** Dimension fixed by the first inserted point. */
  get dimension(): number | undefined {
    return this.dim;
  }

  /**
   * Store a copy of `point`.
   *
   * @returns `false` when the point was rejected as a duplicate.
   * @throws {NonFiniteCoordinateError} for NaN or infinite coordinates.
   * @throws {DimensionError} when the point's length differs from the tree's.
   */
  insert(point: Point): boolean {
    if (!isFinitePoint(point)) throw new NonFiniteCoordinateError(point);
    if (this.dim === undefined) {
      this.dim = point.length;
    } else {
      assertDimension(point, this.dim);
    }

    if (!this.root) {
      this.root = createNode(point);
      this.count = 1;
      return true;
    }

    const n = this.dim;
    let node = this.root;
    let depth = 0;
    for (;;) {
      const axis = depth % n;
      const c = point[axis]!;
      const split = node.point[axis]!;
      const goLeft = c < split;
      const next = goLeft ? node.left : node.right;

      if (next) {
        node = next;
        depth++;
        continue;
      }
      if (c === split && pointsEqual(point, node.point)) return false;

      if (goLeft) node.left = createNode(point);
      else node.right = createNode(point);
      this.count++;
      return true;
    }
  }

  /**
   * Closest stored point to `target` by Euclidean distance, or `undefined`
   * when the tree is empty. The far branch is only searched when the
   * squared distance to the splitting plane is below the best so far.
   */
  nearest(target: Point): Point | undefined {
    if (!this.root) return undefined;
    if (this.dim !== undefined) assertDimension(target, this.dim, 'query point');
    return nearestInBranch(this.root, target, 0, target.length);
  }

  /** In-order visit (left, node, right). */
  traverse(visitor: (point: Point) => void): void {
    walk(this.root, visitor);
  }

  /**
   * In-order visit that replaces each stored point with the visitor's
   * return value. The tree is not rebalanced, so moving a point across a
   * splitting plane leaves it where later searches may not find it.
   *
   * @throws {DimensionError} when the visitor returns a point of another dimension.
   */
  traverseMut(visitor: (point: Point) => Point): void {
    if (this.dim !== undefined) walkMut(this.root, visitor, this.dim);
  }

  toArray(): Point[] {
    const out: Point[] = [];
    this.traverse((p) => out.push(p));
    return out;
  }
}

function nearestInBranch(node: KDNode, target: Point, depth: number, n: number): Point {
  const axis = depth % n;
  const axisDistance = target[axis]! - node.point[axis]!;
  const [near, far] = axisDistance < 0 ? [node.left, node.right] : [node.right, node.left];

  let best = near ? nearestInBranch(near, target, depth + 1, n) : node.point;
  let bestDist = distanceSquared(best, target);

  const own = distanceSquared(node.point, target);
  if (own < bestDist) {
    best = node.point;
    bestDist = own;
  }

  if (far && axisDistance * axisDistance < bestDist) {
    const candidate = nearestInBranch(far, target, depth + 1, n);
    if (distanceSquared(candidate, target) < bestDist) return candidate;
  }
  return best;
}

function walk(node: KDNode | null, visitor: (point: Point) => void): void {
  if (!node) return;
  walk(node.left, visitor);
  visitor(node.point);
  walk(node.right, visitor);
}

function walkMut(
  node: KDNode | null,
  visitor: (point: Point) => Point,
  dimension: number,
): void {
  if (!node) return;
  walkMut(node.left, visitor, dimension);
  const replacement = visitor(node.point);
  assertDimension(replacement, dimension);
  node.point = [...replacement];
  walkMut(node.right, visitor, dimension);
}
