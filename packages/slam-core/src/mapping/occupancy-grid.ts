// ---------------------------------------------------------------------------
// Dense N-dimensional log-odds occupancy grid with per-frame update dedup.
// ---------------------------------------------------------------------------

import type { Point } from '@scanline/types';

/** Frame index stored in cells that have never been updated. */
export const NEVER_UPDATED_FRAME = 0;
export const MAX_FRAME_INDEX = 255;

export interface OccupancyGridOptions {
  /** Cell count along each axis. */
  dimensions: readonly number[];
  /** Confidence multiplier for hits; must be greater than 1. */
  occupiedFactor: number;
  /** Confidence multiplier for pass-throughs; must be greater than 1. */
  freeFactor: number;
  /** Occupied updates stop once a cell's log-odds reach this value. */
  maxConfidence: number;
}

export class GridConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GridConfigError';
  }
}

function assertFrame(frame: number): void {
  if (!Number.isInteger(frame) || frame <= NEVER_UPDATED_FRAME || frame > MAX_FRAME_INDEX) {
    throw new RangeError(`Frame index must be an integer in 1..${MAX_FRAME_INDEX}, got ${frame}`);
  }
}

/** `ln(f − 1/f)`: the log-odds step for a confidence multiplier `f`. */
export function logOddsFactor(factor: number): number {
  return Math.log(factor - 1 / factor);
}

/**
 * Occupancy grid storing one log-odds value and one 8-bit frame tag per
 * cell. Cells are addressed by integer coordinates; the first axis varies
 * fastest in memory. The grid is never resized.
 *
 * Occupied evidence is capped at `maxConfidence`; free evidence has no floor.
 */
export class OccupancyGrid {
  readonly positiveFactor: number;
  readonly negativeFactor: number;
  readonly maxConfidence: number;

  private readonly dims: readonly number[];
  private readonly strides: readonly number[];
  private readonly odds: Float64Array;
  private readonly frames: Uint8Array;

  constructor(options: OccupancyGridOptions) {
    const { dimensions, occupiedFactor, freeFactor, maxConfidence } = options;
    if (dimensions.length === 0 || !dimensions.every((d) => Number.isInteger(d) && d > 0)) {
      throw new GridConfigError(
        `Grid dimensions must be positive integers, got [${dimensions.join(', ')}]`,
      );
    }
    if (!(occupiedFactor > 1)) {
      throw new GridConfigError(`occupiedFactor must be greater than 1, got ${occupiedFactor}`);
    }
    if (!(freeFactor > 1)) {
      throw new GridConfigError(`freeFactor must be greater than 1, got ${freeFactor}`);
    }
    if (Number.isNaN(maxConfidence)) {
      throw new GridConfigError('maxConfidence must be a number');
    }

    this.dims = [...dimensions];
    let cells = 1;
    this.strides = this.dims.map((d) => {
      const stride = cells;
      cells *= d;
      return stride;
    });
    this.odds = new Float64Array(cells);
    this.frames = new Uint8Array(cells);

    this.positiveFactor = logOddsFactor(occupiedFactor);
    this.negativeFactor = logOddsFactor(freeFactor);
    this.maxConfidence = maxConfidence;
  }

  get dimensions(): readonly number[] {
    return this.dims;
  }

  get cellCount(): number {
    return this.odds.length;
  }

  /** True when every coordinate is an integer inside the grid. */
  contains(cell: Point): boolean {
    return (
      cell.length === this.dims.length &&
      cell.every((c, i) => Number.isInteger(c) && c >= 0 && c < this.dims[i]!)
    );
  }

  /** Flat storage index of `cell`, or `undefined` outside the grid. */
  cellIndex(cell: Point): number | undefined {
    if (!this.contains(cell)) return undefined;
    let index = 0;
    cell.forEach((c, i) => {
      index += c * this.strides[i]!;
    });
    return index;
  }

  /**
   * Record a hit. A cell already tagged with `frame` was freed by an
   * earlier ray of the same frame, so that decrement is cancelled along
   * with adding the hit. The result is clamped to max confidence.
   */
  occupiedUpdate(cell: Point, frame: number): void {
    assertFrame(frame);
    const i = this.cellIndex(cell);
    if (i === undefined) return;
    const current = this.odds[i]!;
    if (current >= this.maxConfidence) return;

    if (this.frames[i] === frame) {
      this.odds[i] = Math.min(
        this.maxConfidence,
        current + this.positiveFactor + this.negativeFactor,
      );
      return;
    }
    this.frames[i] = frame;
    this.odds[i] = Math.min(this.maxConfidence, current + this.positiveFactor);
  }

  /** Record a pass-through, at most once per cell per frame. */
  freeUpdate(cell: Point, frame: number): void {
    assertFrame(frame);
    const i = this.cellIndex(cell);
    if (i === undefined || this.frames[i] === frame) return;
    this.odds[i] = this.odds[i]! - this.negativeFactor;
    this.frames[i] = frame;
  }

  logOdds(cell: Point): number | undefined {
    const i = this.cellIndex(cell);
    return i === undefined ? undefined : this.odds[i];
  }

  lastUpdateFrame(cell: Point): number | undefined {
    const i = this.cellIndex(cell);
    return i === undefined ? undefined : this.frames[i];
  }

  /** Occupancy probability `e^l / (1 + e^l)`, or `undefined` outside the grid. */
  probability(cell: Point): number | undefined {
    const l = this.logOdds(cell);
    if (l === undefined) return undefined;
    const odds = Math.exp(l);
    return odds / (1 + odds);
  }
}
