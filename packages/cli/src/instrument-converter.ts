import { ConversionError, type Schema } from '@rowbridge/core';
import type { TableSchema } from '@rowbridge/connector-bigquery';
import type { Converter, ConverterOperation } from './converter.js';
import type { Logger } from './logger.js';

function summarizeSchema(schema: Schema | TableSchema): Record<string, unknown> {
  return { field_count: schema.fields.length };
}

/**
 * Wrap a converter so every call is logged: a debug line with the duration on
 * success, a warn line with the error code and field path on failure. Errors
 * are re-thrown unchanged.
 */
export function instrumentConverter(converter: Converter, logger: Logger): Converter {
  function instrument<A extends unknown[], R>(
    operation: ConverterOperation,
    fn: (...args: A) => R,
    summarize: (...args: A) => Record<string, unknown>
  ): (...args: A) => R {
    return (...args: A): R => {
      const start = Date.now();
      try {
        const result = fn(...args);
        logger.debug('Converter call succeeded', {
          operation,
          durationMs: Date.now() - start,
          ...summarize(...args),
        });
        return result;
      } catch (err) {
        logger.warn('Converter call failed', {
          operation,
          durationMs: Date.now() - start,
          ...summarize(...args),
          ...(err instanceof ConversionError
            ? { code: err.code, field: err.field, recoverable: err.recoverable }
            : {}),
          error: err,
        });
        throw err;
      }
    };
  }

  const c = converter;
  return {
    fromTableSchema: instrument('fromTableSchema', c.fromTableSchema.bind(c), summarizeSchema),
    toTableSchema: instrument('toTableSchema', c.toTableSchema.bind(c), summarizeSchema),
    toTableRow: instrument('toTableRow', c.toTableRow.bind(c), (row, schema) => ({
      value_count: row.length,
      ...summarizeSchema(schema),
    })),
    tableRowToRow: instrument('tableRowToRow', c.tableRowToRow.bind(c), (schema) =>
      summarizeSchema(schema)
    ),
    avroRecordToRow: instrument('avroRecordToRow', c.avroRecordToRow.bind(c), (_record, schema) =>
      summarizeSchema(schema)
    ),
    avroRecordToTableRow: instrument(
      'avroRecordToTableRow',
      c.avroRecordToTableRow.bind(c),
      (_record, tableSchema) => summarizeSchema(tableSchema)
    ),
    toAvroSchema: instrument('toAvroSchema', c.toAvroSchema.bind(c), (name, tableSchema) => ({
      name,
      ...summarizeSchema(tableSchema),
    })),
    fingerprint: instrument('fingerprint', c.fingerprint.bind(c), summarizeSchema),
  };
}
