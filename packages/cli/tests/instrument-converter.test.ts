import { describe, expect, it } from 'vitest';
import { ConversionError, FieldTypes, createSchema, field } from '@rowbridge/core';
import { Logger, createConverter, instrumentConverter } from '../src/index.js';

const schema = createSchema([field('id', FieldTypes.int64())]);

function setup(level: 'debug' | 'info') {
  const lines: string[] = [];
  const logger = new Logger({ level, format: 'json', write: (line) => lines.push(line) });
  const converter = instrumentConverter(createConverter(), logger);
  const records = () => lines.map((line): unknown => JSON.parse(line));
  return { converter, records };
}

describe('instrumentConverter', () => {
  it('logs successful calls at debug level', () => {
    const { converter, records } = setup('debug');
    expect(converter.toTableSchema(schema)).toEqual({
      fields: [{ name: 'id', type: 'INT64', mode: 'REQUIRED' }],
    });
    expect(records()).toHaveLength(1);
    expect(records()[0]).toMatchObject({
      level: 'debug',
      msg: 'Converter call succeeded',
      operation: 'toTableSchema',
      field_count: 1,
    });
  });

  it('logs composed Avro to TableRow calls', () => {
    const { converter, records } = setup('debug');
    const tableSchema = { fields: [{ name: 'id', type: 'INT64', mode: 'REQUIRED' as const }] };
    expect(converter.avroRecordToTableRow({ id: 1n }, tableSchema)).toEqual({ id: '1' });
    expect(records()[0]).toMatchObject({
      level: 'debug',
      operation: 'avroRecordToTableRow',
      field_count: 1,
    });
  });

  it('stays quiet on success at info level', () => {
    const { converter, records } = setup('info');
    converter.toTableRow([1n], schema);
    expect(records()).toEqual([]);
  });

  it('logs and re-throws failures', () => {
    const { converter, records } = setup('info');
    expect(() => converter.toTableRow([null], schema)).toThrow(ConversionError);
    expect(records()).toHaveLength(1);
    expect(records()[0]).toMatchObject({
      level: 'warn',
      msg: 'Converter call failed',
      operation: 'toTableRow',
      code: 'NON_NULLABLE_NULL',
      field: 'id',
      recoverable: true,
      value_count: 1,
      field_count: 1,
    });
  });
});
