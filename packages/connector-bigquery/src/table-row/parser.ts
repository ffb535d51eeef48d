/**
 * JSON TableRow to canonical row
 *
 * Two entry points: `tableRowToRow` reads fields by name and needs only the
 * canonical schema, which travels through a pipeline more easily than a
 * TableSchema. `tableDataRowToRow` reads the positional `{ f: [{ v }] }`
 * rows of the tabledata API and needs the TableSchema to find positions.
 */

import {
  ConversionError,
  LocalDate,
  LocalTime,
  describeFieldType,
  describeValueType,
  isPrimitiveType,
  wrapError,
  type CanonicalRow,
  type CanonicalValue,
  type FieldType,
  type MapType,
  type Schema,
} from '@rowbridge/core';
import type { TableDataRow, TableRow, TableRowValue, TableSchema } from '../types.js';
import {
  MAP_KEY_FIELD_NAME,
  MAP_VALUE_FIELD_NAME,
  textValueParser,
} from '../schema/type-mapping.js';
import { parseDateTime } from './format.js';

function isTableRow(value: TableRowValue | undefined): value is TableRow {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** `{ "v": x }` with no other keys is the cell envelope around x */
function unwrapCell(value: TableRowValue | undefined): TableRowValue | undefined {
  if (isTableRow(value)) {
    const keys = Object.keys(value);
    if (keys.length === 1 && keys[0] === 'v') return value.v;
  }
  return value;
}

/**
 * Unwrap a list element. A row whose only field is `v` looks like an envelope,
 * so for row elements the envelope is only taken when it holds an object.
 */
function unwrapElement(elementType: FieldType, item: TableRowValue): TableRowValue | undefined {
  const unwrapped = unwrapCell(item);
  if (elementType.kind === 'row' && !isTableRow(unwrapped)) return item;
  return unwrapped;
}

function unsupported(fieldType: FieldType, value: TableRowValue): ConversionError {
  return new ConversionError({
    code: 'UNSUPPORTED_CONVERSION',
    message: `Converting BigQuery value of type '${describeValueType(value)}' to '${describeFieldType(fieldType)}' is not supported`,
    fieldType: describeFieldType(fieldType),
    valueType: describeValueType(value),
  });
}

function nonNullableNull(fieldType: FieldType): ConversionError {
  return new ConversionError({
    code: 'NON_NULLABLE_NULL',
    message: 'Received null value for non-nullable field',
    fieldType: describeFieldType(fieldType),
    valueType: 'null',
  });
}

function duplicateMapKey(fieldType: MapType, key: CanonicalValue): ConversionError {
  return new ConversionError({
    code: 'INVALID_VALUE',
    message: `Duplicate map key "${String(key)}"`,
    fieldType: describeFieldType(fieldType),
    valueType: describeValueType(key),
  });
}

function parseScalar(fieldType: FieldType, text: string): CanonicalValue | undefined {
  if (isPrimitiveType(fieldType)) {
    const parser = textValueParser(fieldType.kind);
    if (parser) return parser(text);
  }
  if (fieldType.kind !== 'logical') return undefined;

  switch (fieldType.representation) {
    case 'datetime':
      return parseDateTime(text);
    case 'date':
      return LocalDate.parse(text);
    case 'time':
      return LocalTime.parse(text);
    case 'pass-through':
      return parseScalar(fieldType.baseType, text);
    case 'enum': {
      const ordinal = fieldType.values?.indexOf(text) ?? -1;
      if (ordinal < 0) {
        throw new ConversionError({
          code: 'INVALID_VALUE',
          message: `"${text}" is not a label of enum ${describeFieldType(fieldType)}`,
          fieldType: describeFieldType(fieldType),
          valueType: 'string',
        });
      }
      return ordinal;
    }
    case 'time-with-local-tz':
    case 'custom':
      return undefined;
    default: {
      const exhaustive: never = fieldType.representation;
      throw new Error(`Unknown logical representation: ${String(exhaustive)}`);
    }
  }
}

function parseMapEntries(fieldType: MapType, items: TableRowValue[]): CanonicalValue {
  const entries = new Map<CanonicalValue, CanonicalValue>();
  for (const item of items) {
    const entry = unwrapCell(item);
    if (!isTableRow(entry)) throw unsupported(fieldType, entry ?? null);
    const key = toCanonicalValue(fieldType.keyType, entry[MAP_KEY_FIELD_NAME], false);
    if (entries.has(key)) throw duplicateMapKey(fieldType, key);
    entries.set(
      key,
      toCanonicalValue(fieldType.valueType, entry[MAP_VALUE_FIELD_NAME], fieldType.valueNullable ?? false)
    );
  }
  return entries;
}

/**
 * Convert one JSON value to the canonical value of `fieldType`.
 *
 * @param nullable - whether null is an acceptable value at this position
 */
export function toCanonicalValue(
  fieldType: FieldType,
  value: TableRowValue | undefined,
  nullable = false
): CanonicalValue {
  if (value === null || value === undefined) {
    if (nullable) return null;
    throw nonNullableNull(fieldType);
  }

  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    const parsed = parseScalar(fieldType, String(value));
    if (parsed === null) {
      if (nullable) return null;
      throw nonNullableNull(fieldType);
    }
    if (parsed !== undefined) return parsed;
  }

  if (Array.isArray(value)) {
    if (fieldType.kind === 'array') {
      const elementNullable = fieldType.elementNullable ?? false;
      const { elementType } = fieldType;
      return value.map((item) =>
        toCanonicalValue(elementType, unwrapElement(elementType, item), elementNullable)
      );
    }
    if (fieldType.kind === 'map') {
      return parseMapEntries(fieldType, value);
    }
  }

  if (isTableRow(value) && fieldType.kind === 'row') {
    return tableRowToRow(fieldType.schema, value);
  }

  throw unsupported(fieldType, value);
}

/**
 * Convert a JSON TableRow to a canonical row, reading each field by name.
 */
export function tableRowToRow(schema: Schema, tableRow: TableRow): CanonicalRow {
  return schema.fields.map((field) => {
    try {
      return toCanonicalValue(field.type, tableRow[field.name], field.nullable);
    } catch (error) {
      throw wrapError(error).withField(field.name);
    }
  });
}

/**
 * Convert a tabledata row to a canonical row. Cells are positional in
 * TableSchema order, which need not match the canonical schema's order.
 */
export function tableDataRowToRow(
  schema: Schema,
  tableSchema: TableSchema,
  dataRow: TableDataRow
): CanonicalRow {
  const indices = new Map<string, number>();
  tableSchema.fields.forEach((f, i) => indices.set(f.name, i));

  return schema.fields.map((field) => {
    const index = indices.get(field.name);
    if (index === undefined) {
      throw new ConversionError({
        code: 'SCHEMA_MISMATCH',
        message: `Field "${field.name}" is not part of the table schema`,
        field: field.name,
        fieldType: describeFieldType(field.type),
      });
    }
    try {
      return toCanonicalValue(field.type, dataRow.f[index]?.v, field.nullable);
    } catch (error) {
      throw wrapError(error).withField(field.name);
    }
  });
}
