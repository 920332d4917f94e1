/**
 * Field schemas for raw layer values.
 *
 * Layers arrive as untyped nested mappings; each known field is checked
 * against its schema before it may override an accumulated value.
 */

import { z } from 'zod';
import {
  ANALYSIS_BASES,
  EXPERIMENTS_COLUMN_TYPES,
  METRIC_TYPES,
  RELATIONSHIPS,
} from './records.js';

export const textSchema = z.string();

export const booleanSchema = z.boolean();

export const integerSchema = z.number().int();

export const isoDateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'must be a YYYY-MM-DD date');

export const relationshipSchema = z.string().toLowerCase().pipe(z.enum(RELATIONSHIPS));

export const experimentsColumnTypeSchema = z.string().toLowerCase().pipe(z.enum(EXPERIMENTS_COLUMN_TYPES));

export const metricTypeSchema = z.enum(METRIC_TYPES);

export const analysisBasesSchema = z.array(z.enum(ANALYSIS_BASES)).nonempty();

export const scalarParamSchema = z.union([z.string(), z.number(), z.boolean()]);

export const namedParamSchema = z.object({ name: z.string() }).catchall(scalarParamSchema);

export const statisticParamSchema = z.union([
  scalarParamSchema,
  z.array(z.union([scalarParamSchema, namedParamSchema])),
]);

export const parameterValueSchema = z.union([scalarParamSchema, z.record(scalarParamSchema)]);

/** A TOML table: any plain mapping */
export const tableSchema = z.record(z.unknown());

export const slugListSchema = z.array(z.string());

export type Table = z.infer<typeof tableSchema>;

/** Narrow an unknown value to a table, or null */
export function asTable(value: unknown): Table | null {
  const result = tableSchema.safeParse(value);
  return result.success && !Array.isArray(value) ? result.data : null;
}

/** First issue of a failed parse, phrased for an error message */
export function describeIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  return issue ? `has invalid value: ${issue.message}` : 'has invalid value';
}
