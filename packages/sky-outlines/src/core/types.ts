/**
 * Sky Outlines Core Types
 *
 * Shared data model for tracing region boundaries on a tessellated sphere:
 * vertices, boundary edges, traced loops and the pipeline result.
 *
 * TYPE SAFETY: All structures are readonly once produced by a pipeline stage.
 */

// ============================================================================
// Geometry
// ============================================================================

/**
 * Cartesian unit vector on the sphere
 */
export type Vec3 = readonly [number, number, number];

/**
 * Unique point on the sphere shared by one or more cell corners
 */
export interface Vertex {
  /** Stable id, assigned in ascending (x, y, z) order */
  readonly id: number;
  readonly x: number;
  readonly y: number;
  readonly z: number;
  /** Longitude in degrees, [0, 360) */
  readonly lon: number;
  /** Latitude in degrees, [-90, 90] */
  readonly lat: number;
  /** Number of cell corners that collapsed onto this vertex */
  readonly refCount: number;
}

// ============================================================================
// Edges
// ============================================================================

/**
 * Canonical cell side, `lower < higher`
 */
export interface EdgeKey {
  readonly lower: number;
  readonly higher: number;
}

/**
 * Cell side separating two cells with different region labels
 */
export interface BoundaryEdge extends EdgeKey {
  /** Lower of the two flanking cell ids */
  readonly cellLower: number;
  readonly cellHigher: number;
  /** Label of `cellLower` */
  readonly regionLower: string;
  /** Label of `cellHigher` */
  readonly regionHigher: string;
}

// ============================================================================
// Output
// ============================================================================

/**
 * One vertex of a traced loop, as handed to renderers
 */
export interface OutlinePoint {
  readonly vertexId: number;
  readonly lon: number;
  readonly lat: number;
  readonly x: number;
  readonly y: number;
  readonly z: number;
}

/**
 * Closed outline of one connected component of a region's boundary.
 * `vertexIds[0] === vertexIds[vertexIds.length - 1]`.
 */
export interface RegionLoop {
  readonly region: string;
  /** Position within the region's loop group, 0..n */
  readonly index: number;
  readonly vertexIds: readonly number[];
  readonly points: readonly OutlinePoint[];
}

export interface RegionOutline {
  readonly region: string;
  readonly loops: readonly RegionLoop[];
  /** Lines that never closed; dropped from `loops` */
  readonly openLines: number;
  readonly stabilized: boolean;
}

/**
 * Non-fatal problem reported alongside a usable result
 */
export interface OutlineWarning {
  readonly type: 'stabilization_failed';
  readonly region: string;
  readonly message: string;
  readonly openLines: number;
  readonly reachedFixedPoint: boolean;
}

export interface OutlineDiagnostics {
  readonly cellCount: number;
  readonly vertexCount: number;
  readonly boundaryEdgeCount: number;
  /** Cell sides no other cell shares; dropped before tracing */
  readonly unmatchedSides: number;
  /** Angular thresholds in degrees, in the order they were applied */
  readonly toleranceLevels: readonly number[];
}

export interface OutlineResult {
  /** Keyed by region label, in tracing order */
  readonly regions: ReadonlyMap<string, RegionOutline>;
  readonly warnings: readonly OutlineWarning[];
  readonly diagnostics: OutlineDiagnostics;
}
