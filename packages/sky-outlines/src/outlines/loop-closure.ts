/**
 * Loop Closure
 *
 * Stitches the open lines of one region into closed loops. At each
 * tolerance level two passes alternate until a fixed point:
 *
 * - separate: a line whose ends coincide (or lie within tolerance) is closed
 *   and moved to the loop list
 * - join: the first pair of lines (outer index ascending, inner ascending)
 *   with touching ends is spliced into one line, then the scan restarts
 *
 * Exact matches drop the shared vertex; tolerance matches keep both
 * vertices, so the gap becomes a short segment of the loop.
 */

import type { Line } from './line-assembly.js';
import { createLogger } from '../core/utils/logger.js';

const log = createLogger({ module: 'loop-closure' });

/**
 * Anything that can measure the angle between two vertex ids
 */
export interface VertexSeparation {
  angularSeparation(a: number, b: number): number;
}

export interface LoopClosureOptions {
  /** Degrees, applied in order */
  readonly toleranceLevels: readonly number[];
  /** Rounds allowed per level */
  readonly maxIterations: number;
}

export interface LoopClosureResult {
  /** Closed loops, first id repeated as last */
  readonly loops: readonly Line[];
  /** Lines still open after the last level */
  readonly openLines: readonly Line[];
  /** Whether the last level applied ended at a fixed point */
  readonly reachedFixedPoint: boolean;
  /** Fixed point reached and no open lines left */
  readonly stabilized: boolean;
  /** Separate/join rounds run across all levels */
  readonly rounds: number;
}

interface Splice {
  readonly line: number[];
  /** Which slot of the pair the spliced line replaces */
  readonly keep: 'first' | 'second';
}

/**
 * Splice two lines if one end of `a` meets one end of `b`
 */
function spliceLines(
  a: readonly number[],
  b: readonly number[],
  tolerance: number,
  separation: VertexSeparation
): Splice | null {
  const aFirst = a[0];
  const aLast = a[a.length - 1];
  const bFirst = b[0];
  const bLast = b[b.length - 1];

  if (aFirst === bFirst) return { line: [...a.slice(1).reverse(), ...b], keep: 'second' };
  if (aFirst === bLast) return { line: [...b, ...a.slice(1)], keep: 'second' };
  if (aLast === bFirst) return { line: [...a, ...b.slice(1)], keep: 'first' };
  if (aLast === bLast) return { line: [...a, ...b.slice(0, -1).reverse()], keep: 'first' };

  if (tolerance <= 0) return null;

  const near = (u: number, v: number): boolean => separation.angularSeparation(u, v) < tolerance;

  if (near(aFirst, bFirst)) return { line: [...[...a].reverse(), ...b], keep: 'second' };
  if (near(aFirst, bLast)) return { line: [...b, ...a], keep: 'second' };
  if (near(aLast, bFirst)) return { line: [...a, ...b], keep: 'first' };
  if (near(aLast, bLast)) return { line: [...a, ...[...b].reverse()], keep: 'first' };

  return null;
}

/**
 * Move closed (or nearly closed) lines into `loops`; returns the lines left open
 */
export function separateLoops(
  lines: readonly Line[],
  loops: Line[],
  tolerance: number,
  separation: VertexSeparation
): number[][] {
  const open: number[][] = [];

  for (const line of lines) {
    const first = line[0];
    const last = line[line.length - 1];

    if (line.length > 1 && first === last) {
      loops.push([...line]);
    } else if (
      tolerance > 0 &&
      line.length > 1 &&
      separation.angularSeparation(first, last) < tolerance
    ) {
      loops.push([...line, first]);
    } else {
      open.push([...line]);
    }
  }

  return open;
}

/**
 * Splice lines pairwise until no two lines touch, first match wins
 */
export function joinLines(
  lines: readonly Line[],
  tolerance: number,
  separation: VertexSeparation
): number[][] {
  const joined = lines.map((line) => [...line]);

  const joinOnce = (): boolean => {
    for (let i = 0; i < joined.length - 1; i++) {
      for (let j = i + 1; j < joined.length; j++) {
        const splice = spliceLines(joined[i], joined[j], tolerance, separation);
        if (splice) {
          joined[splice.keep === 'first' ? i : j] = splice.line;
          joined.splice(splice.keep === 'first' ? j : i, 1);
          return true;
        }
      }
    }
    return false;
  };

  while (joinOnce()) {
    // restart the pair scan after every splice
  }

  return joined;
}

/**
 * Close lines into loops with escalating tolerance
 */
export function closeLoops(
  lines: readonly Line[],
  separation: VertexSeparation,
  options: LoopClosureOptions
): LoopClosureResult {
  const loops: Line[] = [];
  let open: readonly Line[] = lines;
  let reachedFixedPoint = false;
  let rounds = 0;

  for (const tolerance of options.toleranceLevels) {
    reachedFixedPoint = false;

    for (let round = 0; round < options.maxIterations; round++) {
      rounds++;
      const lineCount = open.length;
      const loopCount = loops.length;

      open = joinLines(separateLoops(open, loops, tolerance, separation), tolerance, separation);

      if (open.length === lineCount && loops.length === loopCount) {
        reachedFixedPoint = true;
        break;
      }
    }

    if (reachedFixedPoint && open.length === 0) break;
  }

  log.debug('Loop closure finished', {
    loops: loops.length,
    openLines: open.length,
    rounds,
    reachedFixedPoint,
  });

  return {
    loops,
    openLines: open,
    reachedFixedPoint,
    stabilized: reachedFixedPoint && open.length === 0,
    rounds,
  };
}
