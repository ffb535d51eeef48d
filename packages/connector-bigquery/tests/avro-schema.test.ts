import { describe, expect, it } from 'vitest';
import { toAvroSchema } from '../src/index.js';
import { thrown } from './helpers.js';

describe('toAvroSchema', () => {
  it('maps BigQuery columns to Avro types', () => {
    const schema = toAvroSchema('events', [
      { name: 'id', type: 'INT64', mode: 'REQUIRED' },
      { name: 'name', type: 'STRING', description: 'display name' },
      { name: 'amount', type: 'NUMERIC', mode: 'REQUIRED' },
      { name: 'ts', type: 'TIMESTAMP', mode: 'REQUIRED' },
      { name: 'day', type: 'DATE', mode: 'REQUIRED' },
      { name: 'at', type: 'TIME', mode: 'REQUIRED' },
      { name: 'local', type: 'DATETIME', mode: 'REQUIRED' },
      { name: 'tags', type: 'STRING', mode: 'REPEATED' },
    ]);

    expect(schema).toEqual({
      type: 'record',
      name: 'events',
      fields: [
        { name: 'id', type: 'long' },
        { name: 'name', type: ['null', 'string'], default: null, doc: 'display name' },
        { name: 'amount', type: { type: 'bytes', logicalType: 'decimal', precision: 38, scale: 9 } },
        { name: 'ts', type: { type: 'long', logicalType: 'timestamp-micros' } },
        { name: 'day', type: { type: 'int', logicalType: 'date' } },
        { name: 'at', type: { type: 'long', logicalType: 'time-micros' } },
        { name: 'local', type: { type: 'string', sqlType: 'DATETIME' } },
        { name: 'tags', type: { type: 'array', items: 'string' } },
      ],
    });
  });

  it('nests records named after their column', () => {
    const schema = toAvroSchema(
      'root',
      [{ name: 'inner', type: 'RECORD', mode: 'REQUIRED', fields: [{ name: 'ok', type: 'BOOL', mode: 'REQUIRED' }] }],
      'example.rows'
    );
    expect(schema).toEqual({
      type: 'record',
      name: 'root',
      namespace: 'example.rows',
      fields: [
        {
          name: 'inner',
          type: {
            type: 'record',
            name: 'inner',
            namespace: 'example.rows',
            fields: [{ name: 'ok', type: 'boolean' }],
          },
        },
      ],
    });
  });

  it('rejects types without an Avro form', () => {
    expect(thrown(() => toAvroSchema('t', [{ name: 'span', type: 'INTERVAL' }]))).toMatchObject({
      code: 'UNSUPPORTED_TYPE',
      field: 'span',
    });
  });
});
