/**
 * Translates between canonical schemas and BigQuery table schemas.
 *
 * The round trip is lossy: narrow integer and float widths widen to INT64 and
 * FLOAT64, REPEATED fields come back non-nullable, and maps only come back
 * as maps when `inferMaps` is set.
 */

import {
  ConversionError,
  DEFAULT_SCHEMA_CONVERSION_OPTIONS,
  FieldTypes,
  LogicalTypes,
  createSchema,
  describeFieldType,
  type Field,
  type FieldType,
  type Schema,
  type SchemaConversionOptions,
} from '@rowbridge/core';
import type { TableFieldSchema, TableSchema } from '../types.js';
import {
  MAP_KEY_FIELD_NAME,
  MAP_VALUE_FIELD_NAME,
  standardSqlTypeOfKind,
  standardSqlTypeOfLogical,
  type StandardSqlTypeName,
} from './type-mapping.js';

/**
 * Get the BigQuery type keyword for a canonical type.
 *
 * A logical type missing from the lookup falls back to its base type only when
 * it is a pass-through type.
 */
export function toStandardSqlTypeName(fieldType: FieldType): StandardSqlTypeName {
  switch (fieldType.kind) {
    case 'logical': {
      const mapped = standardSqlTypeOfLogical(fieldType.identifier);
      if (mapped) return mapped;
      if (fieldType.representation === 'pass-through') {
        return toStandardSqlTypeName(fieldType.baseType);
      }
      throw new ConversionError({
        code: 'UNSUPPORTED_TYPE',
        message: `Cannot convert logical type ${fieldType.identifier} to a BigQuery type`,
        fieldType: describeFieldType(fieldType),
      });
    }
    case 'map':
      throw new ConversionError({
        code: 'UNSUPPORTED_TYPE',
        message: 'A map has no BigQuery type of its own; it is written as a REPEATED STRUCT',
        fieldType: describeFieldType(fieldType),
      });
    default: {
      const mapped = standardSqlTypeOfKind(fieldType.kind);
      if (!mapped) {
        throw new ConversionError({
          code: 'UNSUPPORTED_TYPE',
          message: `Cannot convert type ${fieldType.kind} to a BigQuery type`,
          fieldType: describeFieldType(fieldType),
        });
      }
      return mapped;
    }
  }
}

/**
 * Resolve a BigQuery type keyword (standard or legacy SQL) to a canonical type.
 */
function fromTableFieldSchemaType(
  typeName: string,
  nestedFields: readonly TableFieldSchema[],
  options: SchemaConversionOptions
): FieldType {
  switch (typeName) {
    case 'STRING':
      return FieldTypes.string();
    case 'BYTES':
      return FieldTypes.bytes();
    case 'INT64':
    case 'INTEGER':
      return FieldTypes.int64();
    case 'FLOAT64':
    case 'FLOAT':
      return FieldTypes.float64();
    case 'BOOL':
    case 'BOOLEAN':
      return FieldTypes.boolean();
    case 'NUMERIC':
      return FieldTypes.decimal();
    case 'TIMESTAMP':
      return FieldTypes.datetime();
    case 'TIME':
      return LogicalTypes.time();
    case 'DATE':
      return LogicalTypes.date();
    case 'DATETIME':
      return LogicalTypes.datetime();
    case 'STRUCT':
    case 'RECORD': {
      const [key, value] = nestedFields;
      if (
        options.inferMaps &&
        nestedFields.length === 2 &&
        key?.name === MAP_KEY_FIELD_NAME &&
        value?.name === MAP_VALUE_FIELD_NAME
      ) {
        return FieldTypes.map(
          fromTableFieldSchemaType(key.type, key.fields ?? [], options),
          fromTableFieldSchemaType(value.type, value.fields ?? [], options)
        );
      }
      return FieldTypes.row(fromTableFieldSchema(nestedFields, options));
    }
    default:
      throw new ConversionError({
        code: 'UNSUPPORTED_TYPE',
        message: `Converting BigQuery type ${typeName} to a canonical type is unsupported`,
        fieldType: typeName,
      });
  }
}

function fromTableFieldSchema(
  tableFields: readonly TableFieldSchema[],
  options: SchemaConversionOptions
): Schema {
  const fields = tableFields.map((tableField): Field => {
    let type: FieldType;
    try {
      type = fromTableFieldSchemaType(tableField.type, tableField.fields ?? [], options);
    } catch (error) {
      throw error instanceof ConversionError ? error.withField(tableField.name) : error;
    }

    if (tableField.mode === 'REPEATED' && type.kind !== 'map') {
      type = FieldTypes.array(type);
    }

    // An unset mode means NULLABLE
    const nullable = tableField.mode === undefined || tableField.mode === 'NULLABLE';
    const field: Field = { name: tableField.name, type, nullable };
    if (tableField.description) {
      field.description = tableField.description;
    }
    return field;
  });
  return createSchema(fields);
}

function toTableFieldSchema(schema: Schema): TableFieldSchema[] {
  return schema.fields.map((schemaField) => {
    let type = schemaField.type;
    const field: TableFieldSchema = { name: schemaField.name, type: '' };
    if (schemaField.description) {
      field.description = schemaField.description;
    }

    if (!schemaField.nullable) {
      field.mode = 'REQUIRED';
    }
    if (type.kind === 'array') {
      type = type.elementType;
      if (type.kind === 'array') {
        throw new ConversionError({
          code: 'STRUCTURAL_MISMATCH',
          message: 'Array of collection is not supported in BigQuery',
          field: schemaField.name,
          fieldType: describeFieldType(schemaField.type),
        });
      }
      field.mode = 'REPEATED';
    }
    if (type.kind === 'row') {
      field.fields = toTableFieldSchema(type.schema);
    }
    if (type.kind === 'map') {
      const mapSchema = createSchema([
        { name: MAP_KEY_FIELD_NAME, type: type.keyType, nullable: false },
        { name: MAP_VALUE_FIELD_NAME, type: type.valueType, nullable: type.valueNullable ?? false },
      ]);
      type = FieldTypes.row(mapSchema);
      field.fields = toTableFieldSchema(mapSchema);
      field.mode = 'REPEATED';
    }

    try {
      field.type = toStandardSqlTypeName(type);
    } catch (error) {
      throw error instanceof ConversionError ? error.withField(schemaField.name) : error;
    }
    return field;
  });
}

/** Convert a canonical Schema to a BigQuery TableSchema. */
export function toTableSchema(schema: Schema): TableSchema {
  return { fields: toTableFieldSchema(schema) };
}

/** Convert a BigQuery TableSchema (or its field list) to a canonical Schema. */
export function fromTableSchema(
  tableSchema: TableSchema | readonly TableFieldSchema[],
  options: SchemaConversionOptions = DEFAULT_SCHEMA_CONVERSION_OPTIONS
): Schema {
  const fields = 'fields' in tableSchema ? tableSchema.fields : tableSchema;
  return fromTableFieldSchema(fields, options);
}
