/**
 * Line Assembly
 *
 * Greedily walks one region's boundary edges into open polylines. Each edge
 * is consumed by exactly one line. The walk is deterministic: seeds are the
 * lowest-numbered endpoint still unused, and at a vertex with several unused
 * edges the lowest edge index wins.
 */

import type { EdgeKey } from '../core/types.js';

/**
 * Ordered vertex ids of a connected chain of edges
 */
export type Line = readonly number[];

/**
 * Walk edges into maximal lines. The edge list is read, never modified;
 * the used/unused bookkeeping stays local to this call.
 */
export function assembleLines(edges: readonly EdgeKey[]): number[][] {
  const used = new Array<boolean>(edges.length).fill(false);
  const incidence = new Map<number, number[]>();

  edges.forEach(({ lower, higher }, index) => {
    for (const vertex of [lower, higher]) {
      const incident = incidence.get(vertex);
      if (incident) {
        incident.push(index);
      } else {
        incidence.set(vertex, [index]);
      }
    }
  });

  let remaining = edges.length;

  // Follow unused edges from `start` until stuck; returns the vertices reached
  const walk = (start: number): number[] => {
    const reached: number[] = [];
    let current = start;
    for (;;) {
      const next = incidence.get(current)?.find((index) => !used[index]);
      if (next === undefined) return reached;

      used[next] = true;
      remaining--;
      const { lower, higher } = edges[next];
      current = lower === current ? higher : lower;
      reached.push(current);
    }
  };

  const lowestUnusedEndpoint = (): number => {
    let lowest = Infinity;
    edges.forEach(({ lower }, index) => {
      if (!used[index] && lower < lowest) lowest = lower;
    });
    return lowest;
  };

  const lines: number[][] = [];
  while (remaining > 0) {
    const seed = lowestUnusedEndpoint();
    const tail = walk(seed);
    const head = walk(seed);
    lines.push([...head.reverse(), seed, ...tail]);
  }

  return lines;
}
