/**
 * Sky Outlines
 *
 * Traces the boundaries of labelled regions on a tessellated sphere into
 * closed vector loops.
 *
 * @example
 * ```typescript
 * import { CubeSphereTessellation, hemisphereLabels, findRegionOutlines } from 'sky-outlines';
 *
 * const sphere = new CubeSphereTessellation(8);
 * const result = findRegionOutlines(sphere, hemisphereLabels(sphere));
 * for (const [region, outline] of result.regions) {
 *   console.log(region, outline.loops.length);
 * }
 * ```
 */

export type {
  BoundaryEdge,
  EdgeKey,
  OutlineDiagnostics,
  OutlinePoint,
  OutlineResult,
  OutlineWarning,
  RegionLoop,
  RegionOutline,
  Vec3,
  Vertex,
} from './core/types.js';
export {
  InputContractError,
  isInputContractError,
  type InputContractDetails,
  type InputContractReason,
} from './core/errors.js';
export {
  DEFAULT_MAX_ITERATIONS,
  DEFAULT_TOLERANCE_STEPS_DEG,
  getDefaultOutlineConfig,
  loadOutlineConfigFromEnv,
  resolveOutlineConfig,
  resolveToleranceLevels,
  type LoopWinding,
  type OutlineConfig,
} from './core/config.js';
export { angularSeparationDeg, vecToLonLat, wrapLongitude } from './core/geo-utils.js';
export { logger, createLogger, type LogLevel } from './core/utils/logger.js';

export type { SphereTessellation } from './tessellation/types.js';
export {
  CUBE_FACES,
  CubeSphereTessellation,
  cellCenter,
  resolutionForCellCount,
  type CubeCellAddress,
} from './tessellation/cube-sphere.js';
export { hemisphereLabels, labelCells, polarCapLabels } from './tessellation/labelers.js';

export { buildVertexTable, VertexTable, type VertexTableBuild } from './outlines/vertex-table.js';
export {
  cellSides,
  edgeKeyOf,
  extractBoundaryEdges,
  regionsOf,
  type EdgeExtraction,
  type EdgeExtractionOptions,
} from './outlines/edge-extraction.js';
export { assembleLines, type Line } from './outlines/line-assembly.js';
export {
  closeLoops,
  joinLines,
  separateLoops,
  type LoopClosureOptions,
  type LoopClosureResult,
  type VertexSeparation,
} from './outlines/loop-closure.js';
export { readRasterCorners } from './outlines/raster.js';
export { findRegionOutlines } from './outlines/region-outlines.js';
export { toFeatureCollection, loopRing, type LoopProperties } from './outlines/geojson.js';
