/**
 * Edge Extraction
 *
 * Derives every cell side, pairs the two cells flanking it, keeps the sides
 * whose cells carry different labels, and groups them per region.
 */

import type { BoundaryEdge, EdgeKey } from '../core/types.js';
import { InputContractError } from '../core/errors.js';
import { createLogger } from '../core/utils/logger.js';

const log = createLogger({ module: 'edge-extraction' });

export interface EdgeExtractionOptions {
  /** Label excluded from grouping; still separates regions */
  readonly noRegionLabel: string;
  /** Throw on sides found in only one cell instead of dropping them */
  readonly strictAdjacency: boolean;
  /** Regions to group edges for; defaults to every label present, sorted */
  readonly regions?: readonly string[];
}

export interface EdgeExtraction {
  /** Every boundary edge, ascending by (lower, higher) */
  readonly boundaryEdges: readonly BoundaryEdge[];
  /** Boundary edges touching each region, same order as `boundaryEdges` */
  readonly byRegion: ReadonlyMap<string, readonly BoundaryEdge[]>;
  /** Distinct sides across the raster */
  readonly sideCount: number;
  /** Sides only one cell owns */
  readonly unmatchedSides: number;
}

/**
 * Canonical form of the side between two vertices
 */
export function edgeKeyOf(a: number, b: number): EdgeKey {
  return a < b ? { lower: a, higher: b } : { lower: b, higher: a };
}

export function edgeKeyString({ lower, higher }: EdgeKey): string {
  return `${lower}:${higher}`;
}

/**
 * Sides of one cell as consecutive corner pairs, wrapping last to first.
 * Zero-length sides (a corner repeated) are skipped.
 */
export function cellSides(vertexIds: readonly number[]): EdgeKey[] {
  const sides: EdgeKey[] = [];
  for (let i = 0; i < vertexIds.length; i++) {
    const a = vertexIds[i];
    const b = vertexIds[(i + 1) % vertexIds.length];
    if (a !== b) sides.push(edgeKeyOf(a, b));
  }
  return sides;
}

/**
 * Sorted distinct labels, without the no-region sentinel
 */
export function regionsOf(labels: readonly string[], noRegionLabel: string): string[] {
  return [...new Set(labels)].filter((label) => label !== noRegionLabel).sort();
}

/**
 * Find boundary edges and group them per region
 *
 * @throws InputContractError non_manifold_side, or unmatched_side when strict
 */
export function extractBoundaryEdges(
  cellVertexIds: readonly (readonly number[])[],
  labels: readonly string[],
  options: EdgeExtractionOptions
): EdgeExtraction {
  const sides = new Map<string, { edge: EdgeKey; cells: number[] }>();

  cellVertexIds.forEach((vertexIds, cellId) => {
    for (const edge of cellSides(vertexIds)) {
      const key = edgeKeyString(edge);
      const entry = sides.get(key);
      if (!entry) {
        sides.set(key, { edge, cells: [cellId] });
      } else if (!entry.cells.includes(cellId)) {
        entry.cells.push(cellId);
      }
    }
  });

  const boundaryEdges: BoundaryEdge[] = [];
  let unmatchedSides = 0;

  for (const { edge, cells } of sides.values()) {
    if (cells.length > 2) {
      throw new InputContractError(
        `Side ${edge.lower}-${edge.higher} is shared by ${cells.length} cells`,
        { reason: 'non_manifold_side', edge, cellId: cells[0] }
      );
    }

    if (cells.length === 1) {
      if (options.strictAdjacency) {
        throw new InputContractError(
          `Side ${edge.lower}-${edge.higher} of cell ${cells[0]} has no neighbouring cell`,
          { reason: 'unmatched_side', edge, cellId: cells[0] }
        );
      }
      unmatchedSides++;
      continue;
    }

    const cellLower = Math.min(cells[0], cells[1]);
    const cellHigher = Math.max(cells[0], cells[1]);
    const regionLower = labels[cellLower];
    const regionHigher = labels[cellHigher];

    if (regionLower !== regionHigher) {
      boundaryEdges.push({ ...edge, cellLower, cellHigher, regionLower, regionHigher });
    }
  }

  boundaryEdges.sort((a, b) => a.lower - b.lower || a.higher - b.higher);

  const regions = (options.regions ?? regionsOf(labels, options.noRegionLabel)).filter(
    (region) => region !== options.noRegionLabel
  );
  const byRegion = new Map<string, BoundaryEdge[]>(regions.map((region) => [region, []]));

  for (const edge of boundaryEdges) {
    byRegion.get(edge.regionLower)?.push(edge);
    byRegion.get(edge.regionHigher)?.push(edge);
  }

  if (unmatchedSides > 0) {
    log.debug('Dropped sides without a neighbouring cell', { unmatchedSides });
  }

  return { boundaryEdges, byRegion, sideCount: sides.size, unmatchedSides };
}
