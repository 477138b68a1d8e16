/**
 * Raster input checks
 *
 * Reads every cell's corners from the tessellation and rejects rasters that
 * break the input contract before any tracing starts.
 */

import type { Vec3 } from '../core/types.js';
import { InputContractError } from '../core/errors.js';
import type { SphereTessellation } from '../tessellation/types.js';

export const MIN_CELL_CORNERS = 3;

/**
 * Collect corners for every cell, validating them against the label array
 *
 * @throws InputContractError label_count | corner_count | non_finite_corner
 */
export function readRasterCorners(
  tessellation: SphereTessellation,
  labels: readonly string[]
): readonly (readonly Vec3[])[] {
  if (labels.length !== tessellation.cellCount) {
    throw new InputContractError(
      `Label array has ${labels.length} entries for ${tessellation.cellCount} cells`,
      { reason: 'label_count' }
    );
  }

  const cellCorners: (readonly Vec3[])[] = [];
  for (let cellId = 0; cellId < tessellation.cellCount; cellId++) {
    const corners = tessellation.cellCorners(cellId);

    if (corners.length < MIN_CELL_CORNERS) {
      throw new InputContractError(
        `Cell ${cellId} has ${corners.length} corners, need at least ${MIN_CELL_CORNERS}`,
        { reason: 'corner_count', cellId }
      );
    }

    for (const corner of corners) {
      if (!corner.every((component) => Number.isFinite(component))) {
        throw new InputContractError(`Cell ${cellId} has a non-finite corner`, {
          reason: 'non_finite_corner',
          cellId,
        });
      }
    }

    cellCorners.push(corners);
  }

  return cellCorners;
}
