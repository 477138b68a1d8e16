/**
 * Sky Outlines Configuration
 *
 * Defaults for the outline pipeline, validation of caller overrides, and
 * environment variable loading for the CLI.
 *
 * TYPE SAFETY: All configuration is strongly typed and immutable.
 */

import { z } from 'zod';
import { InputContractError } from './errors.js';

// ============================================================================
// Outline Configuration
// ============================================================================

/**
 * How loops are oriented before they are returned
 * - region-left: region lies left of travel, seen from outside the sphere
 * - as-traced: whatever order line assembly and closure produced
 */
export type LoopWinding = 'region-left' | 'as-traced';

export interface OutlineConfig {
  /**
   * Angular thresholds (degrees) tried in order when stitching lines.
   * 'auto' derives them from the tessellation's cell radius.
   */
  readonly toleranceLevels: readonly number[] | 'auto';

  /** Join/close rounds allowed per tolerance level before giving up */
  readonly maxIterations: number;

  /** Label of cells belonging to no region; never traced, still bounds regions */
  readonly noRegionLabel: string;

  /** Reject cell sides no neighbouring cell shares instead of dropping them */
  readonly strictAdjacency: boolean;

  readonly winding: LoopWinding;

  /** Regions to trace, in output order. Defaults to every label present. */
  readonly regions?: readonly string[];
}

/**
 * Fixed steps (degrees) appended after the cell-scale threshold
 */
export const DEFAULT_TOLERANCE_STEPS_DEG: readonly number[] = [1, 2, 4, 5, 6];

export const DEFAULT_MAX_ITERATIONS = 100;

/**
 * Default outline configuration
 */
export function getDefaultOutlineConfig(): OutlineConfig {
  return {
    toleranceLevels: 'auto',
    maxIterations: DEFAULT_MAX_ITERATIONS,
    noRegionLabel: '',
    strictAdjacency: false,
    winding: 'region-left',
  };
}

// ============================================================================
// Validation
// ============================================================================

const ToleranceLevelsSchema = z.union([
  z.literal('auto'),
  z
    .array(z.number().finite().nonnegative('Tolerance levels must be >= 0'))
    .min(1, 'At least one tolerance level is required'),
]);

export const OutlineConfigSchema = z.object({
  toleranceLevels: ToleranceLevelsSchema,
  maxIterations: z.number().int().positive(),
  noRegionLabel: z.string(),
  strictAdjacency: z.boolean(),
  winding: z.enum(['region-left', 'as-traced']),
  regions: z.array(z.string()).optional(),
});

/**
 * Merge overrides onto the defaults and validate the result
 *
 * @throws InputContractError with reason 'invalid_config'
 */
export function resolveOutlineConfig(overrides: Partial<OutlineConfig> = {}): OutlineConfig {
  const defaults = getDefaultOutlineConfig();
  const merged = {
    toleranceLevels: overrides.toleranceLevels ?? defaults.toleranceLevels,
    maxIterations: overrides.maxIterations ?? defaults.maxIterations,
    noRegionLabel: overrides.noRegionLabel ?? defaults.noRegionLabel,
    strictAdjacency: overrides.strictAdjacency ?? defaults.strictAdjacency,
    winding: overrides.winding ?? defaults.winding,
    regions: overrides.regions,
  };
  const parsed = OutlineConfigSchema.safeParse(merged);

  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`
    );
    throw new InputContractError(`Invalid outline configuration: ${issues.join('; ')}`, {
      reason: 'invalid_config',
      issues,
    });
  }

  return parsed.data;
}

/**
 * Turn the configured levels into the concrete escalation sequence.
 *
 * 'auto' yields {0, cell radius, 1, 2, 4, 5, 6} sorted ascending with
 * duplicates removed, so coarse rasters still escalate monotonically.
 * Explicit levels are used exactly as given.
 */
export function resolveToleranceLevels(
  levels: OutlineConfig['toleranceLevels'],
  maxCellRadiusDeg: number
): readonly number[] {
  if (levels !== 'auto') {
    return [...levels];
  }

  const candidates = [0, maxCellRadiusDeg, ...DEFAULT_TOLERANCE_STEPS_DEG];
  return [...new Set(candidates)].sort((a, b) => a - b);
}

// ============================================================================
// Environment
// ============================================================================

const EnvSchema = z.object({
  OUTLINES_MAX_ITERATIONS: z.coerce.number().int().positive().optional(),
  OUTLINES_TOLERANCES: z.string().optional(),
  OUTLINES_STRICT_ADJACENCY: z.enum(['true', 'false']).optional(),
});

/**
 * Read configuration overrides from environment variables
 *
 * Environment variables:
 * - OUTLINES_MAX_ITERATIONS: positive integer
 * - OUTLINES_TOLERANCES: comma-separated degrees, e.g. "0,0.5,2"
 * - OUTLINES_STRICT_ADJACENCY: "true" or "false"
 */
export function loadOutlineConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env
): Partial<OutlineConfig> {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new InputContractError(`Invalid environment: ${issues.join('; ')}`, {
      reason: 'invalid_config',
      issues,
    });
  }

  const { OUTLINES_MAX_ITERATIONS, OUTLINES_TOLERANCES, OUTLINES_STRICT_ADJACENCY } = parsed.data;

  return {
    ...(OUTLINES_MAX_ITERATIONS !== undefined && { maxIterations: OUTLINES_MAX_ITERATIONS }),
    ...(OUTLINES_TOLERANCES !== undefined && {
      toleranceLevels: parseToleranceList(OUTLINES_TOLERANCES),
    }),
    ...(OUTLINES_STRICT_ADJACENCY !== undefined && {
      strictAdjacency: OUTLINES_STRICT_ADJACENCY === 'true',
    }),
  };
}

/**
 * Parse "0,0.5,2" into [0, 0.5, 2]
 */
export function parseToleranceList(value: string): number[] {
  return value
    .split(',')
    .map((part) => part.trim())
    .filter((part) => part.length > 0)
    .map((part) => Number(part));
}
