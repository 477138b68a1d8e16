/**
 * Trace Command
 *
 * Trace region outlines for a label file over a cube-sphere raster.
 *
 * Usage:
 *   sky-outlines trace <labels.json> [options]
 *
 * Options:
 *   -r, --resolution <n>     Cube-sphere resolution (default: from label count)
 *   -f, --format <format>    table|json|ndjson|geojson (default: table)
 *   --regions <list>         Comma-separated regions to trace
 *   --tolerances <list>      Comma-separated tolerance levels in degrees
 *   --strict-adjacency       Reject sides without a neighbouring cell
 *   --winding <mode>         region-left|as-traced
 */

import { readFileSync } from 'node:fs';
import type { Command } from 'commander';
import {
  loadOutlineConfigFromEnv,
  parseToleranceList,
  type LoopWinding,
  type OutlineConfig,
} from '../../core/config.js';
import { isInputContractError } from '../../core/errors.js';
import type { OutlineResult } from '../../core/types.js';
import { findRegionOutlines } from '../../outlines/region-outlines.js';
import { CubeSphereTessellation, resolutionForCellCount } from '../../tessellation/cube-sphere.js';
import { EXIT_CODES, type ExitCode } from '../lib/exit-codes.js';
import { parseLabelFile, type LabelFile } from '../lib/labels.js';
import { formatOutlines, isOutputFormat, OUTPUT_FORMATS, type OutputFormat } from '../lib/output.js';

/**
 * Trace options from CLI
 */
interface TraceOptions {
  readonly resolution?: number;
  readonly format: string;
  readonly regions?: string;
  readonly tolerances?: number[];
  readonly strictAdjacency?: boolean;
  readonly winding?: string;
}

export interface TraceInput {
  readonly labelFile: LabelFile;
  readonly format: OutputFormat;
  readonly resolution?: number;
  readonly regions?: readonly string[];
  readonly tolerances?: readonly number[];
  readonly strictAdjacency?: boolean;
  readonly winding?: LoopWinding;
  /** Environment overrides, applied beneath the CLI options */
  readonly env?: NodeJS.ProcessEnv;
}

export interface TraceOutcome {
  readonly result: OutlineResult;
  readonly output: string;
  readonly exitCode: ExitCode;
}

function isLoopWinding(value: string): value is LoopWinding {
  return value === 'region-left' || value === 'as-traced';
}

/**
 * Run the pipeline for a parsed label file and format the result
 */
export function runTrace(input: TraceInput): TraceOutcome {
  const resolution =
    input.resolution ??
    input.labelFile.resolution ??
    resolutionForCellCount(input.labelFile.labels.length);
  const tessellation = new CubeSphereTessellation(resolution);

  const overrides: Partial<OutlineConfig> = {
    ...loadOutlineConfigFromEnv(input.env ?? process.env),
    ...(input.tolerances !== undefined && { toleranceLevels: input.tolerances }),
    ...(input.strictAdjacency !== undefined && { strictAdjacency: input.strictAdjacency }),
    ...(input.winding !== undefined && { winding: input.winding }),
    ...(input.regions !== undefined && { regions: input.regions }),
  };

  const result = findRegionOutlines(tessellation, input.labelFile.labels, overrides);

  return {
    result,
    output: formatOutlines(result, input.format),
    exitCode: result.warnings.length > 0 ? EXIT_CODES.WARNINGS : EXIT_CODES.SUCCESS,
  };
}

/**
 * Register the trace command
 */
export function registerTraceCommand(program: Command): void {
  program
    .command('trace')
    .description('Trace region outlines from a label file')
    .argument('<labels>', 'JSON label file (array, or { resolution, labels })')
    .option('-r, --resolution <n>', 'Cube-sphere resolution', (value: string) =>
      Number.parseInt(value, 10)
    )
    .option('-f, --format <format>', `Output format: ${OUTPUT_FORMATS.join('|')}`, 'table')
    .option('--regions <list>', 'Comma-separated regions to trace')
    .option('--tolerances <list>', 'Comma-separated tolerance levels (degrees)', parseToleranceList)
    .option('--strict-adjacency', 'Reject cell sides without a neighbouring cell')
    .option('--winding <mode>', 'Loop winding: region-left|as-traced')
    .action((labelsPath: string, options: TraceOptions) => {
      process.exitCode = executeTrace(labelsPath, options);
    });
}

/**
 * Execute the trace command
 */
function executeTrace(labelsPath: string, options: TraceOptions): ExitCode {
  const { format, winding } = options;
  if (!isOutputFormat(format)) {
    console.error(`Error: unknown format "${format}" (${OUTPUT_FORMATS.join('|')})`);
    return EXIT_CODES.CONFIG_ERROR;
  }
  if (winding !== undefined && !isLoopWinding(winding)) {
    console.error(`Error: unknown winding "${winding}" (region-left|as-traced)`);
    return EXIT_CODES.CONFIG_ERROR;
  }

  try {
    const labelFile = parseLabelFile(readFileSync(labelsPath, 'utf-8'));
    const { output, exitCode, result } = runTrace({
      labelFile,
      format,
      resolution: options.resolution,
      regions: options.regions?.split(',').map((region) => region.trim()),
      tolerances: options.tolerances,
      strictAdjacency: options.strictAdjacency,
      winding,
    });

    console.log(output);
    for (const warning of result.warnings) {
      console.error(`Warning [${warning.region}]: ${warning.message}`);
    }
    return exitCode;
  } catch (error) {
    if (isInputContractError(error)) {
      console.error(error.toLogString());
      return error.reason === 'invalid_config'
        ? EXIT_CODES.CONFIG_ERROR
        : EXIT_CODES.DATA_INTEGRITY_ERROR;
    }
    console.error(`\nError: ${error instanceof Error ? error.message : String(error)}`);
    return EXIT_CODES.ERRORS;
  }
}
