/**
 * Region labelers for building demo and test rasters
 */

import type { Vec3 } from '../core/types.js';
import { vecToLonLat } from '../core/geo-utils.js';
import { cellCenter } from './cube-sphere.js';
import type { SphereTessellation } from './types.js';

/**
 * Label every cell from the direction of its centre
 */
export function labelCells(
  tessellation: SphereTessellation,
  classify: (center: Vec3, cellId: number) => string
): string[] {
  const labels: string[] = [];
  for (let cellId = 0; cellId < tessellation.cellCount; cellId++) {
    labels.push(classify(cellCenter(tessellation.cellCorners(cellId)), cellId));
  }
  return labels;
}

/**
 * 'north' where the cell centre has z > 0, 'south' elsewhere
 */
export function hemisphereLabels(
  tessellation: SphereTessellation,
  names: { readonly north: string; readonly south: string } = { north: 'north', south: 'south' }
): string[] {
  return labelCells(tessellation, ([, , z]) => (z > 0 ? names.north : names.south));
}

/**
 * `capLabel` north of `minLatitude` (degrees), `restLabel` elsewhere
 */
export function polarCapLabels(
  tessellation: SphereTessellation,
  minLatitude: number,
  capLabel = 'cap',
  restLabel = ''
): string[] {
  return labelCells(tessellation, (center) =>
    vecToLonLat(center).lat > minLatitude ? capLabel : restLabel
  );
}
