/**
 * Region Outlines
 *
 * Converts a labelled sphere raster into closed boundary loops per region:
 *
 *   corners → vertex table → boundary edges → lines → loops
 *
 * Regions are traced independently; nothing mutable is shared between them.
 * A region whose lines never all close still returns the loops it found,
 * with a warning on the result.
 */

import type {
  BoundaryEdge,
  OutlinePoint,
  OutlineResult,
  OutlineWarning,
  RegionLoop,
  RegionOutline,
  Vec3,
  Vertex,
} from '../core/types.js';
import {
  resolveOutlineConfig,
  resolveToleranceLevels,
  type OutlineConfig,
} from '../core/config.js';
import { cross, dot } from '../core/geo-utils.js';
import { createLogger } from '../core/utils/logger.js';
import { cellCenter } from '../tessellation/cube-sphere.js';
import type { SphereTessellation } from '../tessellation/types.js';
import { edgeKeyOf, edgeKeyString, extractBoundaryEdges } from './edge-extraction.js';
import { assembleLines, type Line } from './line-assembly.js';
import { closeLoops } from './loop-closure.js';
import { readRasterCorners } from './raster.js';
import { buildVertexTable, type VertexTable } from './vertex-table.js';

const log = createLogger({ module: 'region-outlines' });

function toOutlinePoint(vertex: Vertex): OutlinePoint {
  return {
    vertexId: vertex.id,
    lon: vertex.lon,
    lat: vertex.lat,
    x: vertex.x,
    y: vertex.y,
    z: vertex.z,
  };
}

/**
 * Reverse a loop if needed so `region` lies left of travel.
 *
 * Uses the first step that is a real boundary edge; steps that bridge a
 * tolerance gap have no flanking cell. Loops with no such step are
 * returned unchanged.
 */
function orientRegionLeft(
  loop: Line,
  region: string,
  edges: ReadonlyMap<string, BoundaryEdge>,
  table: VertexTable,
  cellCorners: readonly (readonly Vec3[])[]
): Line {
  for (let i = 0; i < loop.length - 1; i++) {
    const a = loop[i];
    const b = loop[i + 1];
    const edge = edges.get(edgeKeyString(edgeKeyOf(a, b)));
    if (!edge) continue;

    const cellId = edge.regionLower === region ? edge.cellLower : edge.cellHigher;
    const side = dot(cross(table.position(a), table.position(b)), cellCenter(cellCorners[cellId]));
    return side < 0 ? [...loop].reverse() : loop;
  }
  return loop;
}

/**
 * Trace the boundary loops of every region in a sphere raster
 *
 * @param tessellation - Raster geometry
 * @param labels - Region label per cell id; `noRegionLabel` marks unassigned cells
 * @param options - Overrides for the default outline configuration
 * @throws InputContractError when the raster or options are malformed
 */
export function findRegionOutlines(
  tessellation: SphereTessellation,
  labels: readonly string[],
  options: Partial<OutlineConfig> = {}
): OutlineResult {
  const config = resolveOutlineConfig(options);
  const cellCorners = readRasterCorners(tessellation, labels);
  const { table, cellVertexIds } = buildVertexTable(cellCorners);

  const extraction = extractBoundaryEdges(cellVertexIds, labels, {
    noRegionLabel: config.noRegionLabel,
    strictAdjacency: config.strictAdjacency,
    regions: config.regions,
  });

  const toleranceLevels = resolveToleranceLevels(
    config.toleranceLevels,
    config.toleranceLevels === 'auto' ? tessellation.maxCellRadius() : 0
  );

  const regions = new Map<string, RegionOutline>();
  const warnings: OutlineWarning[] = [];

  for (const [region, edges] of extraction.byRegion) {
    const lines = assembleLines(edges);
    const closure = closeLoops(lines, table, {
      toleranceLevels,
      maxIterations: config.maxIterations,
    });

    let loops = closure.loops;
    if (config.winding === 'region-left') {
      const edgeIndex = new Map(edges.map((edge) => [edgeKeyString(edge), edge]));
      loops = loops.map((loop) => orientRegionLeft(loop, region, edgeIndex, table, cellCorners));
    }

    const regionLoops: RegionLoop[] = loops.map((vertexIds, index) => ({
      region,
      index,
      vertexIds,
      points: vertexIds.map((id) => toOutlinePoint(table.get(id))),
    }));

    regions.set(region, {
      region,
      loops: regionLoops,
      openLines: closure.openLines.length,
      stabilized: closure.stabilized,
    });

    if (!closure.stabilized) {
      const message = closure.reachedFixedPoint
        ? `Loop finding could not stabilize: ${closure.openLines.length} line(s) left open`
        : 'Loop finding could not stabilize: iteration limit reached';
      warnings.push({
        type: 'stabilization_failed',
        region,
        message,
        openLines: closure.openLines.length,
        reachedFixedPoint: closure.reachedFixedPoint,
      });
      log.warn(message, { region, openLines: closure.openLines.length, rounds: closure.rounds });
    }

    log.debug('Traced region', {
      region,
      edges: edges.length,
      lines: lines.length,
      loops: regionLoops.length,
    });
  }

  return {
    regions,
    warnings,
    diagnostics: {
      cellCount: tessellation.cellCount,
      vertexCount: table.size,
      boundaryEdgeCount: extraction.boundaryEdges.length,
      unmatchedSides: extraction.unmatchedSides,
      toleranceLevels,
    },
  };
}
