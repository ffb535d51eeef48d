/**
 * Avro Record Decoder
 *
 * Maps values produced by an Avro decoder for BigQuery exports and read
 * sessions onto the canonical model. The binary decoding itself happens
 * upstream; this module only interprets the decoded values.
 *
 * @see https://cloud.google.com/bigquery/docs/exporting-data#avro_export_details
 */

import {
  ConversionError,
  DEFAULT_CONVERSION_OPTIONS,
  Decimal,
  LocalDate,
  LocalDateTime,
  LocalTime,
  describeFieldType,
  describeValueType,
  wrapError,
  type CanonicalRow,
  type CanonicalValue,
  type ConversionOptions,
  type FieldType,
  type LogicalType,
  type MapType,
  type PrimitiveKind,
  type Schema,
} from '@rowbridge/core';
import type { AvroRecord, AvroValue } from '../types.js';

/** BigQuery NUMERIC has precision 38 and scale 9 */
export const NUMERIC_PRECISION = 38;
export const NUMERIC_SCALE = 9;

const utf8 = new TextDecoder('utf-8');

function unsupported(fieldType: FieldType, value: AvroValue): ConversionError {
  return new ConversionError({
    code: 'UNSUPPORTED_CONVERSION',
    message: `Does not support converting Avro value of type ${describeValueType(value)} to ${describeFieldType(fieldType)}`,
    fieldType: describeFieldType(fieldType),
    valueType: describeValueType(value),
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

function isAvroRecord(value: AvroValue): value is AvroRecord {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Uint8Array) &&
    !(value instanceof ArrayBuffer)
  );
}

function toLong(fieldType: FieldType, value: AvroValue): bigint {
  if (typeof value === 'bigint') return value;
  if (typeof value === 'number' && Number.isInteger(value)) return BigInt(value);
  throw unsupported(fieldType, value);
}

function toBytes(fieldType: FieldType, value: AvroValue): Uint8Array {
  if (value instanceof Uint8Array) return Uint8Array.from(value);
  if (value instanceof ArrayBuffer) return new Uint8Array(value.slice(0));
  throw unsupported(fieldType, value);
}

function toText(fieldType: FieldType, value: AvroValue): string {
  if (typeof value === 'string') return value;
  if (value instanceof Uint8Array) return utf8.decode(value);
  throw unsupported(fieldType, value);
}

/**
 * Convert a timestamp in microseconds to a millisecond Date, honouring the
 * truncation policy.
 */
function timestampMicrosToDate(
  fieldType: FieldType,
  value: AvroValue,
  options: ConversionOptions
): Date {
  const micros = toLong(fieldType, value);
  switch (options.truncateTimestamps) {
    case 'truncate':
      break;
    case 'reject':
      if (micros % 1000n !== 0n) {
        throw new ConversionError({
          code: 'PRECISION_LOSS',
          message:
            `BigQuery data contained value ${micros} with sub-millisecond precision, which is not supported. ` +
            `You can enable truncating timestamps to millisecond precision with truncateTimestamps: 'truncate'`,
          fieldType: describeFieldType(fieldType),
          valueType: describeValueType(value),
          suggestion: "Set ConversionOptions.truncateTimestamps to 'truncate' and retry the conversion",
        });
      }
      break;
    default: {
      const exhaustive: never = options.truncateTimestamps;
      throw new Error(`Unknown timestamp truncation option: ${String(exhaustive)}`);
    }
  }
  return new Date(Number(micros / 1000n));
}

function convertAvroPrimitive(
  kind: PrimitiveKind,
  fieldType: FieldType,
  value: AvroValue
): CanonicalValue {
  switch (kind) {
    case 'byte':
      return Number(BigInt.asIntN(8, toLong(fieldType, value)));
    case 'int16':
      return Number(BigInt.asIntN(16, toLong(fieldType, value)));
    case 'int32':
      return Number(BigInt.asIntN(32, toLong(fieldType, value)));
    case 'int64':
      return BigInt.asIntN(64, toLong(fieldType, value));
    case 'float32':
      if (typeof value !== 'number') throw unsupported(fieldType, value);
      return Math.fround(value);
    case 'float64':
      if (typeof value !== 'number') throw unsupported(fieldType, value);
      return value;
    case 'boolean':
      if (typeof value !== 'boolean') throw unsupported(fieldType, value);
      return value;
    case 'string':
      return toText(fieldType, value);
    case 'bytes':
      return toBytes(fieldType, value);
    case 'decimal':
      return Decimal.fromUnscaledBytes(toBytes(fieldType, value), NUMERIC_SCALE);
    case 'datetime':
      // Handled by the caller, which knows the truncation policy
      throw unsupported(fieldType, value);
    default: {
      const exhaustive: never = kind;
      throw new Error(`${String(exhaustive)} is not a primitive type`);
    }
  }
}

function convertAvroLogical(
  fieldType: LogicalType,
  value: AvroValue,
  options: ConversionOptions,
  nullable: boolean
): CanonicalValue {
  switch (fieldType.representation) {
    case 'date':
      if (typeof value !== 'number' || !Number.isInteger(value)) {
        throw unsupported(fieldType, value);
      }
      return LocalDate.ofEpochDay(value);
    case 'time':
      return LocalTime.ofNanoOfDay(Number(toLong(fieldType, value) * 1000n));
    case 'datetime':
      return LocalDateTime.parse(toText(fieldType, value));
    case 'time-with-local-tz':
      return timestampMicrosToDate(fieldType, value, options);
    case 'pass-through':
      return convertAvroFormat(fieldType.baseType, value, options, nullable);
    case 'enum':
    case 'custom':
      throw new ConversionError({
        code: 'UNKNOWN_LOGICAL_TYPE',
        message: `Unknown logical type ${fieldType.identifier}`,
        fieldType: describeFieldType(fieldType),
        valueType: describeValueType(value),
      });
    default: {
      const exhaustive: never = fieldType.representation;
      throw new Error(`Unknown logical representation: ${String(exhaustive)}`);
    }
  }
}

/**
 * Convert a decoded Avro value to the canonical value of `fieldType`.
 *
 * @param nullable - whether null is an acceptable value at this position
 */
export function convertAvroFormat(
  fieldType: FieldType,
  value: AvroValue,
  options: ConversionOptions = DEFAULT_CONVERSION_OPTIONS,
  nullable = false
): CanonicalValue {
  if (value === null || value === undefined) {
    if (nullable) return null;
    throw new ConversionError({
      code: 'NON_NULLABLE_NULL',
      message: `Field ${describeFieldType(fieldType)} not nullable`,
      fieldType: describeFieldType(fieldType),
      valueType: 'null',
    });
  }

  switch (fieldType.kind) {
    case 'datetime':
      // Expecting value in microseconds
      return timestampMicrosToDate(fieldType, value, options);
    case 'array': {
      if (!Array.isArray(value)) throw unsupported(fieldType, value);
      const elementNullable = fieldType.elementNullable ?? false;
      return value.map((v) => convertAvroFormat(fieldType.elementType, v, options, elementNullable));
    }
    case 'map': {
      if (!Array.isArray(value)) throw unsupported(fieldType, value);
      const entries = new Map<CanonicalValue, CanonicalValue>();
      for (const record of value) {
        if (!isAvroRecord(record)) throw unsupported(fieldType, record);
        const [rawKey, entryValue] = Object.values(record);
        const key = convertAvroFormat(fieldType.keyType, rawKey, options, false);
        if (entries.has(key)) throw duplicateMapKey(fieldType, key);
        entries.set(
          key,
          convertAvroFormat(fieldType.valueType, entryValue, options, fieldType.valueNullable ?? false)
        );
      }
      return entries;
    }
    case 'row':
      if (!isAvroRecord(value)) throw unsupported(fieldType, value);
      return avroRecordToRow(value, fieldType.schema, options);
    case 'logical':
      return convertAvroLogical(fieldType, value, options, nullable);
    default:
      return convertAvroPrimitive(fieldType.kind, fieldType, value);
  }
}

/**
 * Convert a decoded Avro record to a canonical row, field by field in schema
 * order. Native fields are matched by name; a missing field reads as null.
 */
export function avroRecordToRow(
  record: AvroRecord,
  schema: Schema,
  options: ConversionOptions = DEFAULT_CONVERSION_OPTIONS
): CanonicalRow {
  return schema.fields.map((field) => {
    try {
      return convertAvroFormat(field.type, record[field.name], options, field.nullable);
    } catch (error) {
      throw wrapError(error).withField(field.name);
    }
  });
}
