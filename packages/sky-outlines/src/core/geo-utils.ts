/**
 * Spherical Geometry Utilities
 *
 * Small vector helpers shared by the tessellation and the outline pipeline.
 * All inputs are Cartesian unit vectors unless stated otherwise.
 */

import type { Vec3 } from './types.js';

const RAD_TO_DEG = 180 / Math.PI;

export function dot(a: Vec3, b: Vec3): number {
  return a[0] * b[0] + a[1] * b[1] + a[2] * b[2];
}

export function cross(a: Vec3, b: Vec3): Vec3 {
  return [
    a[1] * b[2] - a[2] * b[1],
    a[2] * b[0] - a[0] * b[2],
    a[0] * b[1] - a[1] * b[0],
  ];
}

/**
 * Scale a vector to unit length.
 * Components are always summed x, y, z so equal inputs give bit-identical outputs.
 */
export function normalize([x, y, z]: Vec3): Vec3 {
  const r = Math.sqrt(x * x + y * y + z * z);
  return [x / r, y / r, z / r];
}

/**
 * Convert a unit vector to longitude/latitude in degrees.
 * Longitude is wrapped to [0, 360).
 */
export function vecToLonLat([x, y, z]: Vec3): { lon: number; lat: number } {
  let lon = Math.atan2(y, x) * RAD_TO_DEG;
  if (lon < 0) lon += 360;
  if (lon >= 360) lon -= 360;
  const lat = Math.asin(Math.max(-1, Math.min(1, z))) * RAD_TO_DEG;
  return { lon, lat };
}

/**
 * Wrap a longitude into [-180, 180)
 */
export function wrapLongitude(lon: number): number {
  return ((((lon + 180) % 360) + 360) % 360) - 180;
}

/**
 * Great-circle separation in degrees, from the chord length.
 *
 * `2 * asin(chord / 2)` stays well conditioned for small angles, where
 * `acos(a . b)` loses all precision.
 */
export function angularSeparationDeg(a: Vec3, b: Vec3): number {
  const dx = a[0] - b[0];
  const dy = a[1] - b[1];
  const dz = a[2] - b[2];
  const halfChord = Math.sqrt(dx * dx + dy * dy + dz * dz) / 2;
  return 2 * Math.asin(Math.min(1, halfChord)) * RAD_TO_DEG;
}
