import { z } from 'zod';
import type { ICPConfiguration } from './types.js';

export const DEFAULT_MAX_ITERATIONS = 20;
export const DEFAULT_MSE_INTERVAL_THRESHOLD = 0.01;

/**
 * Structural check for configurations arriving from outside the library.
 * Threshold lower bounds are enforced by `icp` itself, which reports them
 * as distinct error codes rather than parse failures.
 */
export const icpConfigurationSchema = z.object({
  useKdTree: z.boolean().default(false),
  maxIterations: z.number().int().nonnegative().default(DEFAULT_MAX_ITERATIONS),
  mseAbsoluteThreshold: z.number().optional(),
  mseIntervalThreshold: z.number().default(DEFAULT_MSE_INTERVAL_THRESHOLD),
});

export type ICPConfigurationInput = z.input<typeof icpConfigurationSchema>;

/** Fill in defaults: no k-d tree, 20 iterations, no absolute threshold, 0.01 interval. */
export function createICPConfiguration(overrides: ICPConfigurationInput = {}): ICPConfiguration {
  const config: ICPConfiguration = {
    useKdTree: overrides.useKdTree ?? false,
    maxIterations: overrides.maxIterations ?? DEFAULT_MAX_ITERATIONS,
    mseIntervalThreshold: overrides.mseIntervalThreshold ?? DEFAULT_MSE_INTERVAL_THRESHOLD,
  };
  if (overrides.mseAbsoluteThreshold !== undefined) {
    config.mseAbsoluteThreshold = overrides.mseAbsoluteThreshold;
  }
  return config;
}

/**
 * Parse an untrusted configuration object.
 *
 * @throws {z.ZodError} when a field has the wrong type.
 */
export function parseICPConfiguration(input: unknown): ICPConfiguration {
  return createICPConfiguration(icpConfigurationSchema.parse(input));
}
