// ---------------------------------------------------------------------------
// @scanline/slam-core: k-d tree, ICP registration and incremental
// occupancy mapping.
// ---------------------------------------------------------------------------

export { KDTree } from './spatial-index/kd-tree.js';
export { findNearestNeighbourNaive } from './spatial-index/nearest-neighbour.js';

export type {
  ICPConfiguration,
  ICPError,
  ICPSuccess,
} from './registration/types.js';
export {
  DEFAULT_MAX_ITERATIONS,
  DEFAULT_MSE_INTERVAL_THRESHOLD,
  createICPConfiguration,
  icpConfigurationSchema,
  parseICPConfiguration,
  type ICPConfigurationInput,
} from './registration/config.js';
export {
  crossCovarianceAndCentroids,
  estimateRigidUpdate,
  properRotationFromCovariance,
  type CrossCovariance,
} from './registration/alignment.js';
export {
  createICPState,
  icp,
  icpIteration,
  meanSquaredError,
  type ICPOptions,
  type ICPState,
} from './registration/icp.js';

export {
  GridConfigError,
  MAX_FRAME_INDEX,
  NEVER_UPDATED_FRAME,
  OccupancyGrid,
  logOddsFactor,
  type OccupancyGridOptions,
} from './mapping/occupancy-grid.js';
export {
  DEFAULT_FREE_FACTOR,
  DEFAULT_MAX_CONFIDENCE,
  DEFAULT_OCCUPIED_FACTOR,
  DEFAULT_RESOLUTION,
  MapperConfigBuilder,
  MapperConfigError,
  mapperConfigSchema,
  parseMapperConfig,
  type MapperConfig,
  type MapperConfigInput,
} from './mapping/config.js';
export {
  IncrementalMapper,
  ODOMETRY_ICP_CONFIGURATION,
  type IncrementalMapperOptions,
  type PushSummary,
} from './mapping/incremental-mapper.js';
