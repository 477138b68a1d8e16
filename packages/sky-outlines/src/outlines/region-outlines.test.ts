/**
 * Region Outlines Tests
 *
 * End-to-end tracing over cube-sphere rasters.
 *
 * COVERAGE:
 * - Two hemispheres sharing one equator loop
 * - A single-cell island inside a sea
 * - Requested regions with no cells
 * - Seams that only close under angular tolerance
 * - Edge conservation, closure, idempotence and tolerance monotonicity
 */

import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { findRegionOutlines } from './region-outlines.js';
import { extractBoundaryEdges } from './edge-extraction.js';
import { buildVertexTable } from './vertex-table.js';
import { readRasterCorners } from './raster.js';
import { CubeSphereTessellation } from '../tessellation/cube-sphere.js';
import { hemisphereLabels, labelCells } from '../tessellation/labelers.js';
import { vecToLonLat } from '../core/geo-utils.js';
import { InputContractError } from '../core/errors.js';
import type { OutlineResult, RegionOutline } from '../core/types.js';
import {
  JitteredCubeSphere,
  captureError,
  loopEdgeKeys,
  rotateToMin,
} from '../__tests__/utils/fixtures.js';

function outlineOf(result: OutlineResult, region: string): RegionOutline {
  const outline = result.regions.get(region);
  if (!outline) throw new Error(`No outline for ${region}`);
  return outline;
}

/** z component of a x b, for two points on the equator */
function equatorTurn(outline: RegionOutline): number {
  const [a, b] = outline.loops[0].points;
  return a.x * b.y - a.y * b.x;
}

describe('findRegionOutlines', () => {
  const sphere = new CubeSphereTessellation(2);

  describe('two hemispheres', () => {
    const result = findRegionOutlines(sphere, hemisphereLabels(sphere));

    it('traces one closed equator loop per hemisphere', () => {
      expect([...result.regions.keys()]).toEqual(['north', 'south']);

      for (const outline of result.regions.values()) {
        expect(outline.loops).toHaveLength(1);
        expect(outline.stabilized).toBe(true);
        expect(outline.openLines).toBe(0);

        const [loop] = outline.loops;
        expect(loop.vertexIds).toHaveLength(9);
        expect(loop.vertexIds[0]).toBe(loop.vertexIds[8]);
        expect(loop.points.every((point) => point.z === 0)).toBe(true);
      }
    });

    it('winds each loop with its region on the left', () => {
      expect(equatorTurn(outlineOf(result, 'north'))).toBeGreaterThan(0);
      expect(equatorTurn(outlineOf(result, 'south'))).toBeLessThan(0);
    });

    it('gives the two hemispheres the same cycle in opposite directions', () => {
      const north = outlineOf(result, 'north').loops[0].vertexIds;
      const south = outlineOf(result, 'south').loops[0].vertexIds;
      expect(rotateToMin(north)).toEqual(rotateToMin([...south].reverse()));
    });

    it('reports diagnostics without warnings', () => {
      expect(result.warnings).toEqual([]);
      expect(result.diagnostics.cellCount).toBe(24);
      expect(result.diagnostics.vertexCount).toBe(26);
      expect(result.diagnostics.boundaryEdgeCount).toBe(8);
      expect(result.diagnostics.unmatchedSides).toBe(0);

      const levels = result.diagnostics.toleranceLevels;
      expect(levels[0]).toBe(0);
      expect(levels).toEqual([...levels].sort((a, b) => a - b));
      expect(levels).toContain(sphere.maxCellRadius());
    });

    it('keeps loops as traced when asked', () => {
      const asTraced = findRegionOutlines(sphere, hemisphereLabels(sphere), {
        winding: 'as-traced',
      });
      // both regions see the same edges, so they trace the same cycle
      expect(outlineOf(asTraced, 'north').loops[0].vertexIds).toEqual(
        outlineOf(asTraced, 'south').loops[0].vertexIds
      );
    });
  });

  describe('single-cell island', () => {
    const labels = Array.from({ length: sphere.cellCount }, (_, cellId) =>
      cellId === 0 ? 'island' : 'sea'
    );
    const result = findRegionOutlines(sphere, labels);

    it('outlines the island cell with one four-sided loop', () => {
      const island = outlineOf(result, 'island');
      expect(island.loops).toHaveLength(1);
      expect(island.loops[0].vertexIds).toHaveLength(5);

      const { cellVertexIds } = buildVertexTable(readRasterCorners(sphere, labels));
      expect(new Set(island.loops[0].vertexIds)).toEqual(new Set(cellVertexIds[0]));
    });

    it('outlines the sea along the same ring, reversed', () => {
      const island = outlineOf(result, 'island').loops[0].vertexIds;
      const sea = outlineOf(result, 'sea');
      expect(sea.loops).toHaveLength(1);
      expect(rotateToMin(sea.loops[0].vertexIds)).toEqual(rotateToMin([...island].reverse()));
    });
  });

  describe('region selection', () => {
    it('returns an empty outline for a requested region with no cells', () => {
      const result = findRegionOutlines(sphere, hemisphereLabels(sphere), {
        regions: ['north', 'desert'],
      });
      expect([...result.regions.keys()]).toEqual(['north', 'desert']);
      expect(outlineOf(result, 'desert')).toEqual({
        region: 'desert',
        loops: [],
        openLines: 0,
        stabilized: true,
      });
      expect(result.warnings).toEqual([]);
    });

    it('returns no loops for a sphere with a single label', () => {
      const result = findRegionOutlines(sphere, new Array<string>(24).fill('sky'));
      expect(outlineOf(result, 'sky').loops).toEqual([]);
      expect(result.diagnostics.boundaryEdgeCount).toBe(0);
    });

    it('never traces the no-region label', () => {
      const labels = hemisphereLabels(sphere, { north: 'north', south: '' });
      const result = findRegionOutlines(sphere, labels);
      expect([...result.regions.keys()]).toEqual(['north']);
      expect(outlineOf(result, 'north').loops).toHaveLength(1);
    });

    it('honours a custom no-region label', () => {
      const result = findRegionOutlines(sphere, hemisphereLabels(sphere), {
        noRegionLabel: 'south',
      });
      expect([...result.regions.keys()]).toEqual(['north']);
    });
  });

  describe('contract violations', () => {
    it('rejects a label array of the wrong length', () => {
      const error = captureError(() => findRegionOutlines(sphere, ['north']));
      expect(error instanceof InputContractError && error.reason).toBe('label_count');
    });

    it('rejects invalid options before reading the raster', () => {
      const error = captureError(() => findRegionOutlines(sphere, [], { maxIterations: -1 }));
      expect(error instanceof InputContractError && error.reason).toBe('invalid_config');
    });
  });

  describe('seams that need tolerance', () => {
    const jittered = new JitteredCubeSphere(2);
    const labels = hemisphereLabels(jittered);

    beforeEach(() => {
      vi.spyOn(console, 'warn').mockImplementation(() => {});
    });

    afterEach(() => {
      vi.restoreAllMocks();
    });

    it('closes each hemisphere by escalating tolerance', () => {
      const result = findRegionOutlines(jittered, labels);

      expect(result.diagnostics.unmatchedSides).toBe(16);
      expect(result.diagnostics.vertexCount).toBe(34);
      expect(result.warnings).toEqual([]);
      for (const outline of result.regions.values()) {
        expect(outline.loops).toHaveLength(1);
        // 8 edges plus two bridged gaps, closed
        expect(outline.loops[0].vertexIds).toHaveLength(11);
        expect(outline.stabilized).toBe(true);
      }
      expect(console.warn).not.toHaveBeenCalled();
    });

    it('warns and drops open lines when only exact matches are allowed', () => {
      const result = findRegionOutlines(jittered, labels, { toleranceLevels: [0] });

      for (const outline of result.regions.values()) {
        expect(outline.loops).toEqual([]);
        expect(outline.openLines).toBe(2);
        expect(outline.stabilized).toBe(false);
      }
      expect(result.warnings).toEqual([
        {
          type: 'stabilization_failed',
          region: 'north',
          message: 'Loop finding could not stabilize: 2 line(s) left open',
          openLines: 2,
          reachedFixedPoint: true,
        },
        {
          type: 'stabilization_failed',
          region: 'south',
          message: 'Loop finding could not stabilize: 2 line(s) left open',
          openLines: 2,
          reachedFixedPoint: true,
        },
      ]);
      expect(console.warn).toHaveBeenCalledTimes(2);
    });

    it('reports an iteration limit separately from open lines', () => {
      // one round per level: the gaps get joined but never closed
      const result = findRegionOutlines(jittered, labels, {
        toleranceLevels: [0, 1],
        maxIterations: 1,
      });
      expect(result.warnings.map((warning) => warning.message)).toEqual([
        'Loop finding could not stabilize: iteration limit reached',
        'Loop finding could not stabilize: iteration limit reached',
      ]);
      expect(result.warnings.every((warning) => !warning.reachedFixedPoint)).toBe(true);
    });

    it('rejects the seams under strict adjacency', () => {
      const error = captureError(() =>
        findRegionOutlines(jittered, labels, { strictAdjacency: true })
      );
      expect(error instanceof InputContractError && error.reason).toBe('unmatched_side');
    });
  });

  describe('properties', () => {
    const fine = new CubeSphereTessellation(4);
    const labels = labelCells(fine, (center) => {
      const { lon, lat } = vecToLonLat(center);
      if (lat > 40) return 'cap';
      if (lon < 90 && lat > -30) return 'wedge';
      return '';
    });
    const result = findRegionOutlines(fine, labels);

    it('traces both labelled regions and nothing else', () => {
      expect([...result.regions.keys()]).toEqual(['cap', 'wedge']);
      expect(result.warnings).toEqual([]);
    });

    it('uses every boundary edge of a region exactly once', () => {
      const { cellVertexIds } = buildVertexTable(readRasterCorners(fine, labels));
      const { byRegion } = extractBoundaryEdges(cellVertexIds, labels, {
        noRegionLabel: '',
        strictAdjacency: false,
      });

      for (const [region, outline] of result.regions) {
        const expected = (byRegion.get(region) ?? [])
          .map((edge) => `${edge.lower}:${edge.higher}`)
          .sort();
        expect(loopEdgeKeys(outline.loops.map((loop) => loop.vertexIds))).toEqual(expected);
      }
    });

    it('closes every loop with at least three distinct vertices', () => {
      for (const outline of result.regions.values()) {
        for (const loop of outline.loops) {
          expect(loop.vertexIds[0]).toBe(loop.vertexIds[loop.vertexIds.length - 1]);
          expect(loop.vertexIds.length).toBeGreaterThanOrEqual(4);
        }
      }
    });

    it('keeps points inside their coordinate ranges', () => {
      for (const outline of result.regions.values()) {
        for (const point of outline.loops.flatMap((loop) => loop.points)) {
          expect(point.lon).toBeGreaterThanOrEqual(0);
          expect(point.lon).toBeLessThan(360);
          expect(Math.abs(point.lat)).toBeLessThanOrEqual(90);
        }
      }
    });

    it('returns the same result on every run', () => {
      const again = findRegionOutlines(fine, labels);
      expect([...again.regions.entries()]).toEqual([...result.regions.entries()]);
    });

    it('needs no tolerance when every shared corner matches exactly', () => {
      const exact = findRegionOutlines(fine, labels, { toleranceLevels: [0] });
      expect([...exact.regions.entries()]).toEqual([...result.regions.entries()]);
    });
  });
});
