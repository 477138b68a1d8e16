/**
 * Cube-Sphere Tessellation
 *
 * Tiles the sphere with 6 * n * n quadrilateral cells by projecting a grid on
 * each face of the cube [-1, 1]^3 onto the unit sphere.
 *
 * Every corner is derived from an integer lattice triple (i, j, k), each in
 * [0, n], so cells on different faces that meet along a cube edge compute
 * their shared corners from the same three integers and agree bit for bit.
 */

import type { Vec3 } from '../core/types.js';
import { InputContractError } from '../core/errors.js';
import { angularSeparationDeg, normalize } from '../core/geo-utils.js';
import type { SphereTessellation } from './types.js';

type Axis = 0 | 1 | 2;

interface CubeFace {
  readonly name: string;
  /** Axis held at +1 or -1 across the face */
  readonly axis: Axis;
  readonly positive: boolean;
}

/**
 * Face order fixes cell ids: cellId = face * n * n + row * n + column
 */
export const CUBE_FACES: readonly CubeFace[] = [
  { name: '+X', axis: 0, positive: true },
  { name: '-X', axis: 0, positive: false },
  { name: '+Y', axis: 1, positive: true },
  { name: '-Y', axis: 1, positive: false },
  { name: '+Z', axis: 2, positive: true },
  { name: '-Z', axis: 2, positive: false },
];

/**
 * Position of a cell within the cube-sphere grid
 */
export interface CubeCellAddress {
  readonly face: number;
  readonly row: number;
  readonly column: number;
}

export class CubeSphereTessellation implements SphereTessellation {
  readonly resolution: number;
  readonly cellCount: number;
  private cachedMaxRadius: number | null = null;

  constructor(resolution: number) {
    if (!Number.isInteger(resolution) || resolution < 1) {
      throw new InputContractError(
        `Cube-sphere resolution must be a positive integer, got ${resolution}`,
        { reason: 'invalid_resolution' }
      );
    }
    this.resolution = resolution;
    this.cellCount = 6 * resolution * resolution;
  }

  /**
   * Face, row and column of a cell
   */
  address(cellId: number): CubeCellAddress {
    if (!Number.isInteger(cellId) || cellId < 0 || cellId >= this.cellCount) {
      throw new RangeError(`Cell id ${cellId} outside [0, ${this.cellCount})`);
    }
    const n = this.resolution;
    const face = Math.floor(cellId / (n * n));
    const within = cellId - face * n * n;
    return { face, row: Math.floor(within / n), column: within % n };
  }

  cellId({ face, row, column }: CubeCellAddress): number {
    const n = this.resolution;
    return face * n * n + row * n + column;
  }

  cellCorners(cellId: number): readonly Vec3[] {
    const { face, row, column } = this.address(cellId);
    return [
      this.latticePoint(face, column, row),
      this.latticePoint(face, column + 1, row),
      this.latticePoint(face, column + 1, row + 1),
      this.latticePoint(face, column, row + 1),
    ];
  }

  maxCellRadius(): number {
    if (this.cachedMaxRadius === null) {
      let max = 0;
      for (let cellId = 0; cellId < this.cellCount; cellId++) {
        const corners = this.cellCorners(cellId);
        const center = cellCenter(corners);
        for (const corner of corners) {
          max = Math.max(max, angularSeparationDeg(center, corner));
        }
      }
      this.cachedMaxRadius = max;
    }
    return this.cachedMaxRadius;
  }

  /**
   * Unit vector for grid position (u, v) on a face.
   * u runs along axis + 1, v along axis + 2 (mod 3).
   */
  private latticePoint(face: number, u: number, v: number): Vec3 {
    const { axis, positive } = CUBE_FACES[face];
    const n = this.resolution;
    const lattice: [number, number, number] = [0, 0, 0];
    lattice[axis] = positive ? n : 0;
    lattice[(axis + 1) % 3] = u;
    lattice[(axis + 2) % 3] = v;

    const toCube = (k: number): number => (2 * k - n) / n;
    return normalize([toCube(lattice[0]), toCube(lattice[1]), toCube(lattice[2])]);
  }
}

/**
 * Direction of the mean of a cell's corners
 */
export function cellCenter(corners: readonly Vec3[]): Vec3 {
  let x = 0;
  let y = 0;
  let z = 0;
  for (const corner of corners) {
    x += corner[0];
    y += corner[1];
    z += corner[2];
  }
  return normalize([x, y, z]);
}

/**
 * Inverse of cellCount = 6 * n * n
 *
 * @throws InputContractError when the count is not a cube-sphere size
 */
export function resolutionForCellCount(cellCount: number): number {
  const n = Math.round(Math.sqrt(cellCount / 6));
  if (n < 1 || 6 * n * n !== cellCount) {
    throw new InputContractError(
      `${cellCount} cells do not form a cube-sphere (expected 6 * n^2)`,
      { reason: 'invalid_resolution' }
    );
  }
  return n;
}
