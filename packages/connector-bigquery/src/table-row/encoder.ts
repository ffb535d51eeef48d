/**
 * Canonical row to JSON TableRow
 *
 * Types JSON represents exactly (int16, int32, float32, float64, boolean) are
 * still printed as strings, as are int64 and decimal so that no JSON encoder
 * downstream rounds them through a double.
 *
 * @see https://cloud.google.com/bigquery/docs/loading-data-cloud-storage-json#details_of_loading_json_data
 */

import {
  ConversionError,
  Decimal,
  LocalDate,
  LocalDateTime,
  LocalTime,
  describeFieldType,
  describeValueType,
  isCanonicalArray,
  isCanonicalMap,
  wrapError,
  type CanonicalRow,
  type CanonicalValue,
  type FieldType,
  type LogicalType,
  type Schema,
} from '@rowbridge/core';
import type { TableRow, TableRowValue } from '../types.js';
import { MAP_KEY_FIELD_NAME, MAP_VALUE_FIELD_NAME } from '../schema/type-mapping.js';
import { formatDateTime, formatFloat32, formatTime, formatTimestamp } from './format.js';

function unsupported(fieldType: FieldType, value: CanonicalValue): ConversionError {
  return new ConversionError({
    code: 'UNSUPPORTED_CONVERSION',
    message: `Cannot encode a ${describeValueType(value)} as ${describeFieldType(fieldType)}`,
    fieldType: describeFieldType(fieldType),
    valueType: describeValueType(value),
  });
}

/** The default text form of a value */
function toText(value: CanonicalValue): string {
  if (value instanceof Date) return value.toISOString();
  return String(value);
}

function fromLogicalField(fieldType: LogicalType, value: CanonicalValue): TableRowValue {
  switch (fieldType.representation) {
    case 'date':
      if (!(value instanceof LocalDate)) throw unsupported(fieldType, value);
      return value.toString();
    case 'time':
      // BigQuery TIME requires seconds; the fraction is optional and dropped
      // when zero to conserve bytes.
      if (!(value instanceof LocalTime)) throw unsupported(fieldType, value);
      return formatTime(value);
    case 'datetime':
      if (!(value instanceof LocalDateTime)) throw unsupported(fieldType, value);
      return formatDateTime(value);
    case 'enum': {
      const label = typeof value === 'number' ? fieldType.values?.[value] : undefined;
      if (label === undefined) {
        throw new ConversionError({
          code: 'INVALID_VALUE',
          message: `${toText(value)} is not an ordinal of enum ${describeFieldType(fieldType)}`,
          fieldType: describeFieldType(fieldType),
          valueType: describeValueType(value),
        });
      }
      return label;
    }
    case 'time-with-local-tz':
    case 'pass-through':
    case 'custom':
      return toText(value);
    default: {
      const exhaustive: never = fieldType.representation;
      throw new Error(`Unknown logical representation: ${String(exhaustive)}`);
    }
  }
}

/**
 * Encode one canonical value as a TableRow value.
 *
 * @param nullable - whether null is an acceptable value at this position
 */
export function fromCanonicalField(
  fieldType: FieldType,
  value: CanonicalValue,
  nullable = false
): TableRowValue {
  if (value === null) {
    if (!nullable) {
      throw new ConversionError({
        code: 'NON_NULLABLE_NULL',
        message: 'Field is not nullable.',
        fieldType: describeFieldType(fieldType),
        valueType: 'null',
      });
    }
    return null;
  }

  switch (fieldType.kind) {
    case 'array': {
      if (!isCanonicalArray(value)) throw unsupported(fieldType, value);
      const elementNullable = fieldType.elementNullable ?? false;
      return value.map((item) =>
        fromCanonicalField(fieldType.elementType, item, elementNullable)
      );
    }
    case 'map': {
      if (!isCanonicalMap(value)) throw unsupported(fieldType, value);
      const pairs: TableRow[] = [];
      for (const [key, entryValue] of value) {
        pairs.push({
          [MAP_KEY_FIELD_NAME]: fromCanonicalField(fieldType.keyType, key, false),
          [MAP_VALUE_FIELD_NAME]: fromCanonicalField(
            fieldType.valueType,
            entryValue,
            fieldType.valueNullable ?? false
          ),
        });
      }
      return pairs;
    }
    case 'row':
      if (!isCanonicalArray(value)) throw unsupported(fieldType, value);
      return toTableRow(value, fieldType.schema);
    case 'datetime':
      if (!(value instanceof Date)) throw unsupported(fieldType, value);
      return formatTimestamp(value);
    case 'int16':
    case 'int32':
    case 'float64':
    case 'boolean':
      return toText(value);
    case 'float32':
      return typeof value === 'number' ? formatFloat32(value) : toText(value);
    case 'string':
    case 'int64':
      return toText(value);
    case 'decimal':
      return value instanceof Decimal ? value.toString() : toText(value);
    case 'bytes':
      if (!(value instanceof Uint8Array)) throw unsupported(fieldType, value);
      return Buffer.from(value.buffer, value.byteOffset, value.byteLength).toString('base64');
    case 'logical':
      return fromLogicalField(fieldType, value);
    case 'byte':
      return toText(value);
    default: {
      const exhaustive: never = fieldType;
      throw new Error(`Unknown field type: ${JSON.stringify(exhaustive)}`);
    }
  }
}

/** Convert a canonical row to a JSON TableRow, in schema field order. */
export function toTableRow(row: CanonicalRow, schema: Schema): TableRow {
  if (row.length !== schema.fields.length) {
    throw new ConversionError({
      code: 'SCHEMA_MISMATCH',
      message: `Row has ${row.length} values but the schema has ${schema.fields.length} fields`,
    });
  }
  const output: TableRow = {};
  schema.fields.forEach((field, i) => {
    try {
      output[field.name] = fromCanonicalField(field.type, row[i] ?? null, field.nullable);
    } catch (error) {
      throw wrapError(error).withField(field.name);
    }
  });
  return output;
}
