/**
 * Shapes exchanged with BigQuery and its Avro export format
 *
 * None of these own a canonical Schema; the schema always travels next to
 * them.
 */

export type TableFieldMode = 'REQUIRED' | 'NULLABLE' | 'REPEATED';

/** One column of a BigQuery table schema. An unset mode means NULLABLE. */
export interface TableFieldSchema {
  name: string;
  /** Standard or legacy SQL type keyword: STRING, INT64, INTEGER, RECORD ... */
  type: string;
  mode?: TableFieldMode;
  /** Nested fields for STRUCT/RECORD columns */
  fields?: TableFieldSchema[];
  description?: string;
}

export interface TableSchema {
  fields: TableFieldSchema[];
}

/** A value inside a JSON TableRow */
export type TableRowValue = string | number | boolean | null | TableRowValue[] | TableRow;

/** Row in the JSON shape used by streaming inserts and JSON exports */
export interface TableRow {
  [field: string]: TableRowValue;
}

/** Cell envelope of the tabledata API: `{ "v": value }` */
export interface TableCell {
  v: TableRowValue;
}

/** Row as returned by tabledata.list: positional cells in TableSchema order */
export interface TableDataRow {
  f: TableCell[];
}

/**
 * A native value produced by an Avro decoder.
 *
 * Longs may arrive as `number` or `bigint`; strings as JS strings or as raw
 * UTF-8 bytes; `bytes`/`decimal` as Uint8Array (Buffer included) or
 * ArrayBuffer.
 */
export type AvroValue =
  | null
  | undefined
  | boolean
  | number
  | bigint
  | string
  | Uint8Array
  | ArrayBuffer
  | AvroValue[]
  | AvroRecord;

/** A decoded Avro record; key order follows the record schema. */
export interface AvroRecord {
  [field: string]: AvroValue;
}
