/**
 * Output Formatting for CLI Commands
 *
 * Each output format maps to one formatter through a fixed table, so adding
 * a format means adding one entry to FORMATTERS.
 *
 * @module cli/lib/output
 */

import type { OutlineResult } from '../../core/types.js';
import { toFeatureCollection } from '../../outlines/geojson.js';

export const OUTPUT_FORMATS = ['table', 'json', 'ndjson', 'geojson'] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

/**
 * Column definition for table output
 */
export interface TableColumn {
  readonly key: string;
  readonly header: string;
  readonly align?: 'left' | 'right';
}

/**
 * Format rows as an aligned table
 */
export function formatTable<T extends Record<string, unknown>>(
  data: readonly T[],
  columns: readonly TableColumn[]
): string {
  if (data.length === 0) {
    return 'No regions traced.';
  }

  const widths = columns.map((col) =>
    Math.max(col.header.length, ...data.map((row) => String(row[col.key] ?? '').length))
  );

  const headerRow = columns
    .map((col, i) => padCell(col.header, widths[i], col.align ?? 'left'))
    .join(' | ');

  const separator = widths.map((w) => '-'.repeat(w)).join('-+-');

  const dataRows = data.map((row) =>
    columns
      .map((col, i) => padCell(String(row[col.key] ?? ''), widths[i], col.align ?? 'left'))
      .join(' | ')
  );

  return [headerRow, separator, ...dataRows].join('\n');
}

function padCell(value: string, width: number, align: 'left' | 'right'): string {
  return align === 'right' ? value.padStart(width) : value.padEnd(width);
}

const SUMMARY_COLUMNS: readonly TableColumn[] = [
  { key: 'region', header: 'Region' },
  { key: 'loops', header: 'Loops', align: 'right' },
  { key: 'points', header: 'Points', align: 'right' },
  { key: 'open', header: 'Open', align: 'right' },
];

function formatSummaryTable(result: OutlineResult): string {
  const rows = [...result.regions.values()].map((outline) => ({
    region: outline.region,
    loops: outline.loops.length,
    points: outline.loops.reduce((sum, loop) => sum + loop.points.length, 0),
    open: outline.openLines,
  }));
  return formatTable(rows, SUMMARY_COLUMNS);
}

function formatJsonResult(result: OutlineResult): string {
  return JSON.stringify(
    {
      regions: [...result.regions.values()].map((outline) => ({
        region: outline.region,
        stabilized: outline.stabilized,
        openLines: outline.openLines,
        loops: outline.loops.map((loop) => ({ index: loop.index, points: loop.points })),
      })),
      warnings: result.warnings,
      diagnostics: result.diagnostics,
    },
    null,
    2
  );
}

/**
 * One JSON object per loop vertex
 */
function formatNdjsonResult(result: OutlineResult): string {
  const lines: string[] = [];
  for (const outline of result.regions.values()) {
    for (const loop of outline.loops) {
      for (const point of loop.points) {
        lines.push(JSON.stringify({ region: loop.region, loop: loop.index, ...point }));
      }
    }
  }
  return lines.join('\n');
}

export const FORMATTERS: Readonly<Record<OutputFormat, (result: OutlineResult) => string>> = {
  table: formatSummaryTable,
  json: formatJsonResult,
  ndjson: formatNdjsonResult,
  geojson: (result) => JSON.stringify(toFeatureCollection(result), null, 2),
};

export function formatOutlines(result: OutlineResult, format: OutputFormat): string {
  return FORMATTERS[format](result);
}
