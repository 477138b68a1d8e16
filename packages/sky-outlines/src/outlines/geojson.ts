/**
 * GeoJSON export of traced outlines
 *
 * One Polygon feature per loop, [lon, lat] positions with longitude wrapped
 * to [-180, 180). Winding is whatever the pipeline produced.
 */

import { featureCollection, polygon } from '@turf/helpers';
import type { Feature, FeatureCollection, Polygon, Position } from 'geojson';
import type { OutlineResult, RegionLoop } from '../core/types.js';
import { wrapLongitude } from '../core/geo-utils.js';
import { createLogger } from '../core/utils/logger.js';

const log = createLogger({ module: 'geojson' });

/** A linear ring needs at least 4 positions, the last repeating the first */
const MIN_RING_POSITIONS = 4;

export type LoopProperties = {
  region: string;
  loop: number;
};

export function loopRing(loop: RegionLoop): Position[] {
  return loop.points.map((point) => [wrapLongitude(point.lon), point.lat]);
}

/**
 * Convert every loop of every region into a FeatureCollection
 */
export function toFeatureCollection(
  result: OutlineResult
): FeatureCollection<Polygon, LoopProperties> {
  const features: Feature<Polygon, LoopProperties>[] = [];

  for (const outline of result.regions.values()) {
    for (const loop of outline.loops) {
      if (loop.points.length < MIN_RING_POSITIONS) {
        log.debug('Skipping loop too short for a linear ring', {
          region: loop.region,
          loop: loop.index,
          positions: loop.points.length,
        });
        continue;
      }
      features.push(polygon([loopRing(loop)], { region: loop.region, loop: loop.index }));
    }
  }

  return featureCollection(features);
}
