/**
 * Pattern Command
 *
 * Print a demo label file for a cube-sphere raster.
 *
 * Usage:
 *   sky-outlines pattern --resolution 8 --kind cap --cap-latitude 45 > labels.json
 */

import type { Command } from 'commander';
import { CubeSphereTessellation } from '../../tessellation/cube-sphere.js';
import { hemisphereLabels, polarCapLabels } from '../../tessellation/labelers.js';
import type { SphereTessellation } from '../../tessellation/types.js';
import { EXIT_CODES, type ExitCode } from '../lib/exit-codes.js';

export const PATTERN_KINDS = ['hemispheres', 'cap'] as const;

export type PatternKind = (typeof PATTERN_KINDS)[number];

export interface PatternInput {
  readonly resolution: number;
  readonly kind: PatternKind;
  /** Southern edge of the cap, degrees */
  readonly capLatitude?: number;
}

const PATTERNS: Readonly<Record<PatternKind, (sphere: SphereTessellation, input: PatternInput) => string[]>> = {
  hemispheres: (sphere) => hemisphereLabels(sphere),
  cap: (sphere, input) => polarCapLabels(sphere, input.capLatitude ?? 45),
};

function isPatternKind(value: string): value is PatternKind {
  return PATTERN_KINDS.some((kind) => kind === value);
}

/**
 * Build a label file for the requested pattern
 */
export function runPattern(input: PatternInput): string {
  const sphere = new CubeSphereTessellation(input.resolution);
  const labels = PATTERNS[input.kind](sphere, input);
  return JSON.stringify({ resolution: input.resolution, labels });
}

interface PatternOptions {
  readonly resolution: number;
  readonly kind: string;
  readonly capLatitude?: number;
}

/**
 * Register the pattern command
 */
export function registerPatternCommand(program: Command): void {
  program
    .command('pattern')
    .description('Print a demo label file')
    .requiredOption('-r, --resolution <n>', 'Cube-sphere resolution', (value: string) =>
      Number.parseInt(value, 10)
    )
    .option('-k, --kind <kind>', `Pattern: ${PATTERN_KINDS.join('|')}`, 'hemispheres')
    .option('--cap-latitude <deg>', 'Southern edge of the polar cap', (value: string) =>
      Number.parseFloat(value)
    )
    .action((options: PatternOptions) => {
      process.exitCode = executePattern(options);
    });
}

function executePattern(options: PatternOptions): ExitCode {
  const { kind } = options;
  if (!isPatternKind(kind)) {
    console.error(`Error: unknown pattern "${kind}" (${PATTERN_KINDS.join('|')})`);
    return EXIT_CODES.CONFIG_ERROR;
  }

  try {
    console.log(runPattern({ resolution: options.resolution, kind, capLatitude: options.capLatitude }));
    return EXIT_CODES.SUCCESS;
  } catch (error) {
    console.error(`\nError: ${error instanceof Error ? error.message : String(error)}`);
    return EXIT_CODES.CONFIG_ERROR;
  }
}
