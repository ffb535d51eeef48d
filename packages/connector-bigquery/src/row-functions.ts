/**
 * Reusable row converters for pipeline stages
 *
 * Each factory closes over its schema so a stage can hold one function and
 * apply it to every element.
 */

import {
  DEFAULT_CONVERSION_OPTIONS,
  type CanonicalRow,
  type ConversionOptions,
  type Schema,
} from '@rowbridge/core';
import type { AvroRecord, TableRow, TableSchema } from './types.js';
import { avroRecordToRow } from './avro/decoder.js';
import { fromTableSchema } from './schema/translator.js';
import { toTableRow } from './table-row/encoder.js';
import { tableRowToRow } from './table-row/parser.js';

export type RowFunction<I, O> = (input: I) => O;

/** Parse JSON TableRows into canonical rows of `schema`. */
export function tableRowToRowFunction(schema: Schema): RowFunction<TableRow, CanonicalRow> {
  return (tableRow) => tableRowToRow(schema, tableRow);
}

/** Encode canonical rows of `schema` as JSON TableRows. */
export function rowToTableRowFunction(schema: Schema): RowFunction<CanonicalRow, TableRow> {
  return (row) => toTableRow(row, schema);
}

/**
 * Chain a user function producing canonical rows with the TableRow encoder.
 */
export function composeToTableRow<T>(
  toRow: RowFunction<T, CanonicalRow>,
  schema: Schema
): RowFunction<T, TableRow> {
  return (input) => toTableRow(toRow(input), schema);
}

/** Decode Avro records into canonical rows of `schema`. */
export function avroRecordToRowFunction(
  schema: Schema,
  options: ConversionOptions = DEFAULT_CONVERSION_OPTIONS
): RowFunction<AvroRecord, CanonicalRow> {
  return (record) => avroRecordToRow(record, schema, options);
}

/**
 * Convert an Avro export record of a table straight to a JSON TableRow.
 */
export function avroRecordToTableRow(
  record: AvroRecord,
  tableSchema: TableSchema,
  options: ConversionOptions = DEFAULT_CONVERSION_OPTIONS
): TableRow {
  const schema = fromTableSchema(tableSchema);
  return toTableRow(avroRecordToRow(record, schema, options), schema);
}

/** Like `avroRecordToTableRow`, translating the table schema once. */
export function avroRecordToTableRowFunction(
  tableSchema: TableSchema,
  options: ConversionOptions = DEFAULT_CONVERSION_OPTIONS
): RowFunction<AvroRecord, TableRow> {
  const schema = fromTableSchema(tableSchema);
  return (record) => toTableRow(avroRecordToRow(record, schema, options), schema);
}
