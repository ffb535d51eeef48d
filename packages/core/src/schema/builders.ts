/**
 * Builders for canonical schemas and field types
 */

import { ConversionError } from '../errors/conversion-error.js';
import type {
  ArrayType,
  Field,
  FieldType,
  LogicalType,
  MapType,
  PrimitiveKind,
  PrimitiveType,
  RowType,
  Schema,
} from '../types/schema.js';

/** Well-known logical type identifiers */
export const LogicalTypeIds = {
  DATE: 'rowbridge:logical_type:date:v1',
  TIME: 'rowbridge:logical_type:time:v1',
  DATETIME: 'rowbridge:logical_type:datetime:v1',
  TIME_WITH_LOCAL_TZ: 'SqlTimeWithLocalTzType',
  ENUM: 'Enum',
} as const;

function primitive(kind: PrimitiveKind): PrimitiveType {
  return Object.freeze({ kind });
}

export const FieldTypes = {
  byte: () => primitive('byte'),
  int16: () => primitive('int16'),
  int32: () => primitive('int32'),
  int64: () => primitive('int64'),
  float32: () => primitive('float32'),
  float64: () => primitive('float64'),
  decimal: () => primitive('decimal'),
  boolean: () => primitive('boolean'),
  string: () => primitive('string'),
  bytes: () => primitive('bytes'),
  datetime: () => primitive('datetime'),
  array: (elementType: FieldType, elementNullable = false): ArrayType =>
    elementNullable
      ? { kind: 'array', elementType, elementNullable }
      : { kind: 'array', elementType },
  map: (keyType: FieldType, valueType: FieldType, valueNullable = false): MapType =>
    valueNullable
      ? { kind: 'map', keyType, valueType, valueNullable }
      : { kind: 'map', keyType, valueType },
  row: (schema: Schema): RowType => ({ kind: 'row', schema }),
};

export const LogicalTypes = {
  date: (): LogicalType => ({
    kind: 'logical',
    identifier: LogicalTypeIds.DATE,
    baseType: FieldTypes.int64(),
    representation: 'date',
  }),
  time: (): LogicalType => ({
    kind: 'logical',
    identifier: LogicalTypeIds.TIME,
    baseType: FieldTypes.int64(),
    representation: 'time',
  }),
  datetime: (): LogicalType => ({
    kind: 'logical',
    identifier: LogicalTypeIds.DATETIME,
    baseType: FieldTypes.string(),
    representation: 'datetime',
  }),
  timeWithLocalTz: (): LogicalType => ({
    kind: 'logical',
    identifier: LogicalTypeIds.TIME_WITH_LOCAL_TZ,
    baseType: FieldTypes.datetime(),
    representation: 'time-with-local-tz',
  }),
  enumeration: (values: readonly string[]): LogicalType => ({
    kind: 'logical',
    identifier: LogicalTypeIds.ENUM,
    baseType: FieldTypes.int32(),
    representation: 'enum',
    values: Object.freeze([...values]),
  }),
  /** A named type stored exactly as its base type */
  passThrough: (identifier: string, baseType: FieldType): LogicalType => ({
    kind: 'logical',
    identifier,
    baseType,
    representation: 'pass-through',
  }),
  custom: (identifier: string, baseType: FieldType): LogicalType => ({
    kind: 'logical',
    identifier,
    baseType,
    representation: 'custom',
  }),
};

export function field(
  name: string,
  type: FieldType,
  options: { nullable?: boolean; description?: string } = {}
): Field {
  const out: Field = { name, type, nullable: options.nullable ?? false };
  if (options.description) {
    out.description = options.description;
  }
  return out;
}

export function nullableField(name: string, type: FieldType, description?: string): Field {
  return field(name, type, { nullable: true, description });
}

export function createSchema(fields: readonly Field[]): Schema {
  const seen = new Set<string>();
  for (const f of fields) {
    if (seen.has(f.name)) {
      throw new ConversionError({
        code: 'SCHEMA_MISMATCH',
        message: `Duplicate field name: ${f.name}`,
        field: f.name,
      });
    }
    seen.add(f.name);
  }
  return Object.freeze({ fields: Object.freeze([...fields]) });
}
