/**
 * Vertex Deduplication
 *
 * Collapses per-cell corner coordinates into one indexed vertex set.
 * Corners match only when their coordinates are exactly equal; tolerance is
 * applied later, during loop closure.
 */

import type { Vec3, Vertex } from '../core/types.js';
import { angularSeparationDeg, vecToLonLat } from '../core/geo-utils.js';

/**
 * Exact coordinate key. Number-to-string conversion round-trips, so two
 * keys are equal exactly when the coordinates compare equal.
 */
function coordinateKey([x, y, z]: Vec3): string {
  return `${x},${y},${z}`;
}

/**
 * Read-only lookup of unique vertices by id or by exact coordinate
 */
export class VertexTable {
  private readonly vertices: readonly Vertex[];
  private readonly idsByKey: ReadonlyMap<string, number>;

  constructor(vertices: readonly Vertex[]) {
    this.vertices = vertices;
    this.idsByKey = new Map(vertices.map((v) => [coordinateKey([v.x, v.y, v.z]), v.id]));
  }

  get size(): number {
    return this.vertices.length;
  }

  all(): readonly Vertex[] {
    return this.vertices;
  }

  get(id: number): Vertex {
    const vertex = this.vertices[id];
    if (vertex === undefined) {
      throw new RangeError(`Unknown vertex id ${id}`);
    }
    return vertex;
  }

  position(id: number): Vec3 {
    const { x, y, z } = this.get(id);
    return [x, y, z];
  }

  /**
   * Id of the vertex at exactly this coordinate
   */
  lookup(position: Vec3): number | undefined {
    return this.idsByKey.get(coordinateKey(position));
  }

  /**
   * Great-circle separation of two vertices, in degrees
   */
  angularSeparation(a: number, b: number): number {
    return angularSeparationDeg(this.position(a), this.position(b));
  }
}

export interface VertexTableBuild {
  readonly table: VertexTable;
  /** Per cell, the vertex id of each corner in corner order */
  readonly cellVertexIds: readonly (readonly number[])[];
}

/**
 * Deduplicate every cell corner into a vertex table.
 *
 * Ids are assigned in ascending (x, y, z) order, so they depend only on the
 * set of coordinates and not on cell order.
 */
export function buildVertexTable(cellCorners: readonly (readonly Vec3[])[]): VertexTableBuild {
  const unique = new Map<string, { position: Vec3; refCount: number }>();

  for (const corners of cellCorners) {
    for (const corner of corners) {
      const key = coordinateKey(corner);
      const entry = unique.get(key);
      if (entry) {
        entry.refCount++;
      } else {
        unique.set(key, { position: corner, refCount: 1 });
      }
    }
  }

  const sorted = [...unique.values()].sort(
    ({ position: a }, { position: b }) => a[0] - b[0] || a[1] - b[1] || a[2] - b[2]
  );

  const vertices: Vertex[] = sorted.map(({ position, refCount }, id) => {
    const { lon, lat } = vecToLonLat(position);
    return { id, x: position[0], y: position[1], z: position[2], lon, lat, refCount };
  });

  const table = new VertexTable(vertices);
  const cellVertexIds = cellCorners.map((corners) =>
    corners.map((corner) => {
      const id = table.lookup(corner);
      if (id === undefined) {
        throw new Error(`Corner ${coordinateKey(corner)} missing from vertex table`);
      }
      return id;
    })
  );

  return { table, cellVertexIds };
}
