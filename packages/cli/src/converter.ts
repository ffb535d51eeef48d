/**
 * Converter facade with the configured options bound in
 */

import type { CanonicalRow, Schema } from '@rowbridge/core';
import {
  avroRecordToRow,
  avroRecordToTableRow,
  fromTableSchema,
  hashSchemaDescriptorDeterministic,
  tableRowToRow,
  tableSchemaToDescriptor,
  toAvroSchema,
  toTableRow,
  toTableSchema,
  type AvroRecord,
  type AvroRecordSchema,
  type TableRow,
  type TableSchema,
} from '@rowbridge/connector-bigquery';
import { resolveOptions, type ResolvedOptions } from './config.js';

export interface Converter {
  fromTableSchema(tableSchema: TableSchema): Schema;
  toTableSchema(schema: Schema): TableSchema;
  toTableRow(row: CanonicalRow, schema: Schema): TableRow;
  tableRowToRow(schema: Schema, tableRow: TableRow): CanonicalRow;
  avroRecordToRow(record: AvroRecord, schema: Schema): CanonicalRow;
  avroRecordToTableRow(record: AvroRecord, tableSchema: TableSchema): TableRow;
  toAvroSchema(name: string, tableSchema: TableSchema, namespace?: string): AvroRecordSchema;
  fingerprint(tableSchema: TableSchema): bigint;
}

export type ConverterOperation = keyof Converter;

export function createConverter(options: ResolvedOptions = resolveOptions()): Converter {
  return {
    fromTableSchema: (tableSchema) => fromTableSchema(tableSchema, options.schema),
    toTableSchema: (schema) => toTableSchema(schema),
    toTableRow: (row, schema) => toTableRow(row, schema),
    tableRowToRow: (schema, tableRow) => tableRowToRow(schema, tableRow),
    avroRecordToRow: (record, schema) => avroRecordToRow(record, schema, options.conversion),
    avroRecordToTableRow: (record, tableSchema) =>
      avroRecordToTableRow(record, tableSchema, options.conversion),
    toAvroSchema: (name, tableSchema, namespace) =>
      toAvroSchema(name, tableSchema.fields, namespace),
    fingerprint: (tableSchema) =>
      hashSchemaDescriptorDeterministic(tableSchemaToDescriptor(tableSchema)),
  };
}
