/**
 * Cube-Sphere Tessellation Tests
 *
 * Cell addressing, corner geometry, and the bit-identical shared corners
 * the outline pipeline depends on.
 */

import { describe, it, expect } from 'vitest';
import { CubeSphereTessellation, resolutionForCellCount } from './cube-sphere.js';
import { hemisphereLabels, polarCapLabels } from './labelers.js';
import { InputContractError } from '../core/errors.js';

describe('CubeSphereTessellation', () => {
  const sphere = new CubeSphereTessellation(2);

  it('has 6 * n^2 cells', () => {
    expect(sphere.cellCount).toBe(24);
    expect(new CubeSphereTessellation(5).cellCount).toBe(150);
  });

  it('round-trips cell ids through addresses', () => {
    expect(sphere.address(13)).toEqual({ face: 3, row: 0, column: 1 });
    for (let cellId = 0; cellId < sphere.cellCount; cellId++) {
      expect(sphere.cellId(sphere.address(cellId))).toBe(cellId);
    }
  });

  it('rejects out-of-range cell ids', () => {
    expect(() => sphere.cellCorners(24)).toThrow(RangeError);
    expect(() => sphere.address(-1)).toThrow(RangeError);
  });

  it('rejects invalid resolutions', () => {
    expect(() => new CubeSphereTessellation(0)).toThrow(InputContractError);
    expect(() => new CubeSphereTessellation(1.5)).toThrow(/positive integer/);
  });

  it('puts four unit-length corners on every cell', () => {
    for (let cellId = 0; cellId < sphere.cellCount; cellId++) {
      const corners = sphere.cellCorners(cellId);
      expect(corners).toHaveLength(4);
      for (const [x, y, z] of corners) {
        expect(Math.hypot(x, y, z)).toBeCloseTo(1, 12);
      }
    }
  });

  it('computes the same corner bits on every face meeting at a cube vertex', () => {
    // (+1, +1, +1) is corner 2 of the last cell on +X, +Y and +Z
    const fromX = sphere.cellCorners(3)[2];
    const fromY = sphere.cellCorners(11)[2];
    const fromZ = sphere.cellCorners(19)[2];

    expect(fromY).toEqual(fromX);
    expect(fromZ).toEqual(fromX);
    expect(fromX[0]).toBe(fromX[1]);
    expect(fromX[1]).toBe(fromX[2]);
  });

  it('measures the cell radius of a single-cell face', () => {
    // Face centre to cube corner
    const expected = (Math.acos(1 / Math.sqrt(3)) * 180) / Math.PI;
    expect(new CubeSphereTessellation(1).maxCellRadius()).toBeCloseTo(expected, 8);
  });

  it('shrinks the cell radius as the resolution grows', () => {
    const radius = sphere.maxCellRadius();
    expect(radius).toBeGreaterThan(25);
    expect(radius).toBeLessThan(35);
    expect(new CubeSphereTessellation(4).maxCellRadius()).toBeLessThan(radius);
  });
});

describe('resolutionForCellCount', () => {
  it('inverts the cell count', () => {
    expect(resolutionForCellCount(6)).toBe(1);
    expect(resolutionForCellCount(24)).toBe(2);
    expect(resolutionForCellCount(600)).toBe(10);
  });

  it('rejects counts that are not cube-sphere sizes', () => {
    expect(() => resolutionForCellCount(25)).toThrow(InputContractError);
    expect(() => resolutionForCellCount(0)).toThrow(InputContractError);
  });
});

describe('labelers', () => {
  it('splits the sphere at the equator', () => {
    const labels = hemisphereLabels(new CubeSphereTessellation(1));
    expect(labels).toEqual(['south', 'south', 'south', 'south', 'north', 'south']);
  });

  it('labels a polar cap and leaves the rest unassigned', () => {
    const labels = polarCapLabels(new CubeSphereTessellation(1), 45);
    expect(labels).toEqual(['', '', '', '', 'cap', '']);
  });

  it('gives each hemisphere half the cells', () => {
    const labels = hemisphereLabels(new CubeSphereTessellation(4));
    expect(labels.filter((label) => label === 'north')).toHaveLength(48);
  });
});
