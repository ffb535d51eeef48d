/**
 * Avro schema for a BigQuery table, as BigQuery writes it in Avro exports
 *
 * @see https://cloud.google.com/bigquery/docs/exporting-data#avro_export_details
 * @see https://avro.apache.org/docs/current/specification/
 */

import { ConversionError } from '@rowbridge/core';
import type { TableFieldSchema } from '../types.js';
import { NUMERIC_PRECISION, NUMERIC_SCALE } from '../avro/decoder.js';

// ============================================================================
// Avro Schema Types
// ============================================================================

export type AvroPrimitiveSchema = 'null' | 'boolean' | 'int' | 'long' | 'double' | 'bytes' | 'string';

export interface AvroLogicalSchema {
  type: 'int' | 'long' | 'bytes';
  logicalType: 'date' | 'time-micros' | 'timestamp-micros' | 'decimal';
  precision?: number;
  scale?: number;
}

/** A string annotated with the BigQuery type it carries */
export interface AvroSqlTypeSchema {
  type: 'string';
  sqlType: 'DATETIME';
}

export interface AvroArraySchema {
  type: 'array';
  items: AvroSchema;
}

export interface AvroFieldSchema {
  name: string;
  type: AvroSchema;
  doc?: string;
  default?: null;
}

export interface AvroRecordSchema {
  type: 'record';
  name: string;
  namespace?: string;
  doc?: string;
  fields: AvroFieldSchema[];
}

export type AvroUnionSchema = AvroSchema[];

export type AvroSchema =
  | AvroPrimitiveSchema
  | AvroLogicalSchema
  | AvroSqlTypeSchema
  | AvroArraySchema
  | AvroRecordSchema
  | AvroUnionSchema;

// ============================================================================
// Builder
// ============================================================================

function toAvroType(field: TableFieldSchema, namespace: string | undefined): AvroSchema {
  switch (field.type) {
    case 'STRING':
      return 'string';
    case 'BYTES':
      return 'bytes';
    case 'INT64':
    case 'INTEGER':
      return 'long';
    case 'FLOAT64':
    case 'FLOAT':
      return 'double';
    case 'BOOL':
    case 'BOOLEAN':
      return 'boolean';
    case 'NUMERIC':
      return {
        type: 'bytes',
        logicalType: 'decimal',
        precision: NUMERIC_PRECISION,
        scale: NUMERIC_SCALE,
      };
    case 'TIMESTAMP':
      return { type: 'long', logicalType: 'timestamp-micros' };
    case 'DATE':
      return { type: 'int', logicalType: 'date' };
    case 'TIME':
      return { type: 'long', logicalType: 'time-micros' };
    case 'DATETIME':
      return { type: 'string', sqlType: 'DATETIME' };
    case 'STRUCT':
    case 'RECORD':
      return toAvroSchema(field.name, field.fields ?? [], namespace, field.description);
    default:
      throw new ConversionError({
        code: 'UNSUPPORTED_TYPE',
        message: `BigQuery type ${field.type} has no Avro representation`,
        fieldType: field.type,
      });
  }
}

function toAvroField(field: TableFieldSchema, namespace: string | undefined): AvroFieldSchema {
  let type: AvroSchema;
  try {
    type = toAvroType(field, namespace);
  } catch (error) {
    throw error instanceof ConversionError ? error.withField(field.name) : error;
  }

  const avroField: AvroFieldSchema = { name: field.name, type };
  if (field.mode === 'REPEATED') {
    avroField.type = { type: 'array', items: type };
  } else if (field.mode === undefined || field.mode === 'NULLABLE') {
    avroField.type = ['null', type];
    avroField.default = null;
  }
  if (field.description) {
    avroField.doc = field.description;
  }
  return avroField;
}

/**
 * Build the Avro record schema for a list of BigQuery columns. STRUCT
 * columns become nested records named after the column.
 */
export function toAvroSchema(
  name: string,
  fields: readonly TableFieldSchema[],
  namespace?: string,
  doc?: string
): AvroRecordSchema {
  const record: AvroRecordSchema = {
    type: 'record',
    name,
    fields: fields.map((field) => toAvroField(field, namespace)),
  };
  if (namespace) {
    record.namespace = namespace;
  }
  if (doc) {
    record.doc = doc;
  }
  return record;
}
