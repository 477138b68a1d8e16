/**
 * Tessellation Provider Interface
 *
 * A raster over the whole sphere. The outline pipeline only needs each
 * cell's ordered corners; neighbouring cells are paired by the sides they
 * share, so corners common to two cells must be bit-identical.
 */

import type { Vec3 } from '../core/types.js';

export interface SphereTessellation {
  /** Provider-specific resolution parameter */
  readonly resolution: number;

  readonly cellCount: number;

  /** Ordered corners of one cell, walking its perimeter */
  cellCorners(cellId: number): readonly Vec3[];

  /** Largest centre-to-corner angle of any cell, in degrees */
  maxCellRadius(): number;
}
