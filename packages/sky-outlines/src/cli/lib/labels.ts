/**
 * Label File Parsing
 *
 * A label file is either a JSON array of region labels indexed by cell id,
 * or an object carrying the labels and the raster resolution.
 *
 * @module cli/lib/labels
 */

import { z } from 'zod';

const LabelArraySchema = z.array(z.string());

export const LabelFileSchema = z.union([
  LabelArraySchema,
  z.object({
    resolution: z.number().int().positive().optional(),
    labels: LabelArraySchema,
  }),
]);

export interface LabelFile {
  readonly labels: readonly string[];
  readonly resolution?: number;
}

/**
 * Parse and validate label file contents
 *
 * @throws Error when the text is not JSON or does not match the schema
 */
export function parseLabelFile(text: string): LabelFile {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new Error(
      `Invalid label file: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const parsed = LabelFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join('.') || 'root'}: ${issue.message}`
    );
    throw new Error(`Invalid label file: ${issues.join('; ')}`);
  }

  return Array.isArray(parsed.data) ? { labels: parsed.data } : parsed.data;
}
