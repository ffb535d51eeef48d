/**
 * Zod schemas for BigQuery table schemas read from JSON
 */

import { z } from 'zod';
import { ConversionError } from '@rowbridge/core';
import type { TableFieldSchema, TableSchema } from './types.js';

export const tableFieldModeSchema = z.enum(['REQUIRED', 'NULLABLE', 'REPEATED']);

export const tableFieldSchemaSchema: z.ZodType<TableFieldSchema> = z.lazy(() =>
  z.object({
    name: z.string().min(1, 'Field name is required'),
    type: z.string().min(1, 'Field type is required').transform((type) => type.toUpperCase()),
    mode: tableFieldModeSchema.optional(),
    fields: z.array(tableFieldSchemaSchema).optional(),
    description: z.string().optional(),
  })
);

export const tableSchemaSchema: z.ZodType<TableSchema> = z.object({
  fields: z.array(tableFieldSchemaSchema),
});

/**
 * Validate JSON as a TableSchema. Accepts either `{ fields: [...] }` or the
 * bare field list that `bq show --schema` prints.
 */
export function parseTableSchema(json: unknown): TableSchema {
  const input = Array.isArray(json) ? { fields: json } : json;
  const result = tableSchemaSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConversionError({
      code: 'SCHEMA_MISMATCH',
      message: `Invalid table schema: ${issues}`,
      context: { issues: result.error.issues },
    });
  }
  return result.data;
}
