/**
 * Test fixtures for the outline pipeline
 *
 * Hand-built tessellations and cycle helpers shared across test files.
 */

import type { Vec3 } from '../../core/types.js';
import { CubeSphereTessellation } from '../../tessellation/cube-sphere.js';
import type { SphereTessellation } from '../../tessellation/types.js';
import { edgeKeyOf } from '../../outlines/edge-extraction.js';

/** Relative nudge applied to jittered corners */
export const JITTER = 1e-12;

/**
 * Cube-sphere whose +X face computes its border corners slightly
 * differently from the neighbouring faces. Sides along that border no
 * longer match, so boundaries crossing it need tolerance to close.
 */
export class JitteredCubeSphere implements SphereTessellation {
  private readonly inner: CubeSphereTessellation;

  constructor(resolution: number) {
    this.inner = new CubeSphereTessellation(resolution);
  }

  get resolution(): number {
    return this.inner.resolution;
  }

  get cellCount(): number {
    return this.inner.cellCount;
  }

  cellCorners(cellId: number): readonly Vec3[] {
    const corners = this.inner.cellCorners(cellId);
    if (this.inner.address(cellId).face !== 0) return corners;

    return corners.map(([x, y, z]): Vec3 => {
      const onBorder = Math.abs(y) === x || Math.abs(z) === x;
      return onBorder ? [x * (1 + JITTER), y, z] : [x, y, z];
    });
  }

  maxCellRadius(): number {
    return this.inner.maxCellRadius();
  }
}

/**
 * Tessellation built from explicit corner lists
 */
export class ListTessellation implements SphereTessellation {
  readonly resolution = 0;

  constructor(
    private readonly cells: readonly (readonly Vec3[])[],
    private readonly radius = 1
  ) {}

  get cellCount(): number {
    return this.cells.length;
  }

  cellCorners(cellId: number): readonly Vec3[] {
    return this.cells[cellId];
  }

  maxCellRadius(): number {
    return this.radius;
  }
}

/**
 * Drop the closing vertex and rotate so the smallest id comes first.
 * Two loops describe the same directed cycle iff their results are equal.
 */
export function rotateToMin(loop: readonly number[]): number[] {
  const open = loop.slice(0, -1);
  const start = open.indexOf(Math.min(...open));
  return [...open.slice(start), ...open.slice(0, start)];
}

/**
 * Canonical "lower:higher" keys of consecutive vertex pairs, sorted
 */
export function loopEdgeKeys(loops: readonly (readonly number[])[]): string[] {
  const keys: string[] = [];
  for (const loop of loops) {
    for (let i = 0; i < loop.length - 1; i++) {
      const { lower, higher } = edgeKeyOf(loop[i], loop[i + 1]);
      keys.push(`${lower}:${higher}`);
    }
  }
  return keys.sort();
}

/**
 * Capture a thrown value for assertions on its fields
 */
export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected function to throw');
}
