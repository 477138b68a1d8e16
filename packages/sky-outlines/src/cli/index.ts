/**
 * Sky Outlines CLI
 *
 * @module cli
 */

import { Command } from 'commander';
import { registerPatternCommand } from './commands/pattern.js';
import { registerTraceCommand } from './commands/trace.js';

export { runTrace, type TraceInput, type TraceOutcome } from './commands/trace.js';
export { runPattern, PATTERN_KINDS, type PatternInput, type PatternKind } from './commands/pattern.js';
export { EXIT_CODES, type ExitCode } from './lib/exit-codes.js';
export { parseLabelFile, type LabelFile } from './lib/labels.js';
export { formatOutlines, formatTable, FORMATTERS, OUTPUT_FORMATS, type OutputFormat } from './lib/output.js';

export const CLI_NAME = 'sky-outlines';

export function createProgram(version: string): Command {
  const program = new Command();

  program
    .name(CLI_NAME)
    .description('Trace region boundaries on a tessellated sphere into closed loops')
    .version(version, '-V, --version', 'Output the version number');

  registerTraceCommand(program);
  registerPatternCommand(program);

  return program;
}
