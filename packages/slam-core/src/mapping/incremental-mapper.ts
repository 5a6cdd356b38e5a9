// ---------------------------------------------------------------------------
// Incremental occupancy mapper: scan-to-scan odometry plus ray-cast updates.
// ---------------------------------------------------------------------------

import type { PointCloud } from '@scanline/types';
import { type Logger, createLogger } from '@scanline/config';
import {
  type RigidTransform,
  SimilarityTransform,
  plotLine,
  rotationRepresentation,
  scale,
  toDimension,
  voxelDownsample,
} from '@scanline/geometry';
import { icp } from '../registration/icp.js';
import type { ICPConfiguration } from '../registration/types.js';
import { type MapperConfig, MapperConfigBuilder } from './config.js';
import { MAX_FRAME_INDEX, NEVER_UPDATED_FRAME, OccupancyGrid } from './occupancy-grid.js';

const defaultLogger = createLogger('slam-core:mapper');

/** Registration settings used between consecutive frames. */
export const ODOMETRY_ICP_CONFIGURATION: Readonly<ICPConfiguration> = {
  useKdTree: true,
  maxIterations: 20,
  mseIntervalThreshold: 0.01,
};

export interface IncrementalMapperOptions {
  logger?: Logger;
}

export interface PushSummary {
  /** Whether registration against the previous cloud succeeded for this call. */
  registered: boolean;
  /** Frame index the grid updates were tagged with. */
  frameIndex: number;
  raysCast: number;
}

/**
 * Tracks a pose by registering each new frame against the previous one and
 * writes every scan into a log-odds grid.
 *
 * The pose is a similarity whose scale is the grid resolution, so it maps
 * sensor coordinates straight to grid cells. It starts at the grid centre.
 */
export class IncrementalMapper {
  readonly config: MapperConfig;
  private readonly grid: OccupancyGrid;
  private readonly log: Logger;
  private pose: SimilarityTransform;
  private lastCloud: number[][] = [];
  private frameIndex: number = NEVER_UPDATED_FRAME;

  constructor(config: MapperConfig, options: IncrementalMapperOptions = {}) {
    this.config = config;
    this.log = options.logger ?? defaultLogger;
    this.grid = new OccupancyGrid({
      dimensions: config.dimensions,
      occupiedFactor: config.occupiedFactor,
      freeFactor: config.freeFactor,
      maxConfidence: config.maxConfidence,
    });
    const rep = rotationRepresentation(toDimension(config.dimensions.length));
    this.pose = SimilarityTransform.fromParts(
      config.dimensions.map((d) => d / 2),
      rep.identity(),
      config.resolution,
    );
  }

  static builder(options: IncrementalMapperOptions = {}): MapperConfigBuilder<IncrementalMapper> {
    return new MapperConfigBuilder((config) => new IncrementalMapper(config, options));
  }

  /**
   * Integrate one scan given in sensor coordinates.
   *
   * Frame indices run 1..255 and wrap back to 1; 0 marks grid cells that
   * were never updated.
   *
   * On a new frame with odometry enabled, the previous cloud is registered
   * onto this one and the result is appended to the pose. A failed
   * registration is logged and the previous pose is kept. Every point is
   * then ray-cast from the pose's cell: cells along the ray are freed and
   * the end cell is marked occupied.
   */
  pushPointCloud(cloud: PointCloud, isNewFrame: boolean): PushSummary {
    const points =
      this.config.downsampleVoxelSize === undefined
        ? cloud.map((p) => [...p])
        : voxelDownsample(cloud, this.config.downsampleVoxelSize);

    let registered = false;
    if (this.config.withOdometry && isNewFrame && this.lastCloud.length > 0) {
      registered = this.updatePose(points);
    }
    this.lastCloud = points;

    // The first scan always opens frame 1, whatever the caller says.
    if (isNewFrame || this.frameIndex === NEVER_UPDATED_FRAME) {
      this.frameIndex = this.frameIndex === MAX_FRAME_INDEX ? 1 : this.frameIndex + 1;
    }

    const origin = this.pose.translation;
    for (const p of points) {
      const ray = plotLine(origin, this.pose.transformPoint(p));
      const end = ray.length - 1;
      ray.forEach((cell, i) => {
        if (i < end) this.grid.freeUpdate(cell, this.frameIndex);
        else this.grid.occupiedUpdate(cell, this.frameIndex);
      });
    }

    const summary: PushSummary = {
      registered,
      frameIndex: this.frameIndex,
      raysCast: points.length,
    };
    this.log.debug('point cloud integrated', { ...summary, isNewFrame });
    return summary;
  }

  private updatePose(points: PointCloud): boolean {
    const result = icp(this.lastCloud, points, ODOMETRY_ICP_CONFIGURATION, {
      logger: this.log.child('icp'),
    });
    if (!result.ok) {
      this.log.warn('odometry registration failed, keeping previous pose', {
        code: result.error.code,
        frameIndex: this.frameIndex,
      });
      return false;
    }

    const { translation, rotation } = result.value.transform;
    this.pose = this.pose
      .appendTranslation(scale(translation, this.config.resolution))
      .appendRotationWrtCenter(rotation);
    return true;
  }

  /** Rigid part of the pose; its translation is in grid cells. */
  getCurrentPose(): RigidTransform {
    return this.pose.isometry;
  }

  getGrid(): OccupancyGrid {
    return this.grid;
  }

  getFrameIndex(): number {
    return this.frameIndex;
  }
}
