/**
 * Utility functions for moving between positional rows and name-keyed records
 */

import { ConversionError } from '../errors/conversion-error.js';
import type { CanonicalRow, CanonicalValue, Record } from '../types/index.js';
import type { Schema } from '../types/schema.js';

/**
 * Key a positional row by field name. Nested rows stay positional.
 */
export function rowToRecord(schema: Schema, row: CanonicalRow): Record {
  if (row.length !== schema.fields.length) {
    throw new ConversionError({
      code: 'SCHEMA_MISMATCH',
      message: `Row has ${row.length} values but the schema has ${schema.fields.length} fields`,
    });
  }
  const record: Record = {};
  schema.fields.forEach((f, i) => {
    record[f.name] = row[i];
  });
  return record;
}

/**
 * Order a record's values by the schema. Missing fields become null; fields
 * the schema does not know are ignored.
 */
export function recordToRow(
  schema: Schema,
  record: { [key: string]: CanonicalValue | undefined }
): CanonicalRow {
  return schema.fields.map((f) => record[f.name] ?? null);
}

/**
 * Extract all unique field names from an array of records
 */
export function extractFieldNames(records: Record[]): string[] {
  const fields = new Set<string>();
  for (const record of records) {
    for (const key of Object.keys(record)) {
      fields.add(key);
    }
  }
  return Array.from(fields);
}

/** Array.isArray for canonical arrays and rows, which are readonly */
export function isCanonicalArray(value: CanonicalValue): value is readonly CanonicalValue[] {
  return Array.isArray(value);
}

export function isCanonicalMap(
  value: CanonicalValue
): value is ReadonlyMap<CanonicalValue, CanonicalValue> {
  return value instanceof Map;
}
