import { z } from 'zod';

export const DEFAULT_RESOLUTION = 20;
export const DEFAULT_OCCUPIED_FACTOR = 2.5;
export const DEFAULT_FREE_FACTOR = 2;
export const DEFAULT_MAX_CONFIDENCE = 3.5;

export const mapperConfigSchema = z.object({
  withOdometry: z.boolean({ required_error: 'Odometry calculation must be enabled or disabled' }),
  dimensions: z
    .array(z.number().int().positive(), { required_error: 'Grid dimensions are required' })
    .min(2, 'Only 2D and 3D grids are supported')
    .max(3, 'Only 2D and 3D grids are supported'),
  /** Grid cells per world unit. */
  resolution: z.number().positive().finite().default(DEFAULT_RESOLUTION),
  occupiedFactor: z.number().gt(1).finite().default(DEFAULT_OCCUPIED_FACTOR),
  freeFactor: z.number().gt(1).finite().default(DEFAULT_FREE_FACTOR),
  maxConfidence: z.number().finite().default(DEFAULT_MAX_CONFIDENCE),
  /** Voxel edge length for downsampling each cloud before use; off when unset. */
  downsampleVoxelSize: z.number().positive().finite().optional(),
});

export type MapperConfig = z.infer<typeof mapperConfigSchema>;
export type MapperConfigInput = z.input<typeof mapperConfigSchema>;

export class MapperConfigError extends Error {
  constructor(readonly issues: z.ZodIssue[]) {
    super(
      `Invalid mapper configuration: ${issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ')}`,
    );
    this.name = 'MapperConfigError';
  }
}

/**
 * Validate a mapper configuration and fill in defaults.
 *
 * @throws {MapperConfigError} listing every failing field.
 */
export function parseMapperConfig(input: unknown): MapperConfig {
  const result = mapperConfigSchema.safeParse(input);
  if (!result.success) throw new MapperConfigError(result.error.issues);
  return result.data;
}

/**
 * Collects mapper settings; `build` validates them once and hands the
 * result to the factory the builder was created with.
 */
export class MapperConfigBuilder<T> {
  private readonly draft: Partial<MapperConfigInput> = {};

  constructor(private readonly create: (config: MapperConfig) => T) {}

  withOdometryCalculation(enabled: boolean): this {
    this.draft.withOdometry = enabled;
    return this;
  }

  withDimensions(dimensions: readonly number[]): this {
    this.draft.dimensions = [...dimensions];
    return this;
  }

  /** Cells per world unit, e.g. 20 for 5 cm cells. */
  withResolution(resolution: number): this {
    this.draft.resolution = resolution;
    return this;
  }

  withOccupiedConfidenceFactor(factor: number): this {
    this.draft.occupiedFactor = factor;
    return this;
  }

  withFreeConfidenceFactor(factor: number): this {
    this.draft.freeFactor = factor;
    return this;
  }

  withMaximumConfidence(maxConfidence: number): this {
    this.draft.maxConfidence = maxConfidence;
    return this;
  }

  withDownsampleVoxelSize(voxelSize: number): this {
    this.draft.downsampleVoxelSize = voxelSize;
    return this;
  }

  /** @throws {MapperConfigError} when a required field is missing or a value is invalid. */
  build(): T {
    return this.create(parseMapperConfig(this.draft));
  }
}
