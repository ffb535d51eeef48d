import { describe, expect, it } from 'vitest';
import {
  ConversionError,
  FieldTypes,
  LogicalTypes,
  createSchema,
  field,
  nullableField,
  schemaConversionOptions,
  schemasEqual,
} from '@rowbridge/core';
import {
  fromTableSchema,
  toStandardSqlTypeName,
  toTableSchema,
  type TableFieldSchema,
} from '../src/index.js';
import { thrown } from './helpers.js';

describe('toTableSchema', () => {
  it('maps fields, modes and nested structures', () => {
    const schema = createSchema([
      field('id', FieldTypes.int64(), { description: 'primary key' }),
      nullableField('name', FieldTypes.string()),
      field('scores', FieldTypes.array(FieldTypes.float32())),
      field('day', LogicalTypes.date()),
      field('attrs', FieldTypes.map(FieldTypes.string(), FieldTypes.int64())),
      nullableField('inner', FieldTypes.row(createSchema([nullableField('flag', FieldTypes.boolean())]))),
    ]);

    expect(toTableSchema(schema)).toEqual({
      fields: [
        { name: 'id', type: 'INT64', mode: 'REQUIRED', description: 'primary key' },
        { name: 'name', type: 'STRING' },
        { name: 'scores', type: 'FLOAT64', mode: 'REPEATED' },
        { name: 'day', type: 'DATE', mode: 'REQUIRED' },
        {
          name: 'attrs',
          type: 'STRUCT',
          mode: 'REPEATED',
          fields: [
            { name: 'key', type: 'STRING', mode: 'REQUIRED' },
            { name: 'value', type: 'INT64', mode: 'REQUIRED' },
          ],
        },
        { name: 'inner', type: 'STRUCT', fields: [{ name: 'flag', type: 'BOOL' }] },
      ],
    });
  });

  it('maps logical types through the lookup table', () => {
    const schema = createSchema([
      field('status', LogicalTypes.enumeration(['NEW', 'DONE'])),
      field('local', LogicalTypes.timeWithLocalTz()),
      field('at', LogicalTypes.datetime()),
      field('code', LogicalTypes.passThrough('example:code', FieldTypes.string())),
    ]);
    expect(toTableSchema(schema).fields.map((f) => f.type)).toEqual([
      'STRING',
      'TIME',
      'DATETIME',
      'STRING',
    ]);
  });

  it('rejects arrays of arrays', () => {
    const schema = createSchema([
      field('matrix', FieldTypes.array(FieldTypes.array(FieldTypes.int64()))),
    ]);
    const error = thrown(() => toTableSchema(schema));
    expect(error).toBeInstanceOf(ConversionError);
    expect(error).toMatchObject({
      code: 'STRUCTURAL_MISMATCH',
      message: 'Array of collection is not supported in BigQuery',
      field: 'matrix',
    });
  });

  it('writes an array of maps as a repeated key/value struct', () => {
    const schema = createSchema([
      field('pairs', FieldTypes.array(FieldTypes.map(FieldTypes.string(), FieldTypes.string()))),
    ]);
    expect(toTableSchema(schema).fields[0]).toMatchObject({ type: 'STRUCT', mode: 'REPEATED' });
  });

  it('rejects logical types it does not know', () => {
    const schema = createSchema([field('f', LogicalTypes.custom('example:unknown', FieldTypes.string()))]);
    expect(thrown(() => toTableSchema(schema))).toMatchObject({
      code: 'UNSUPPORTED_TYPE',
      field: 'f',
      message: 'Error converting field "f": Cannot convert logical type example:unknown to a BigQuery type',
    });
  });

  it('has no keyword for a bare map', () => {
    expect(() => toStandardSqlTypeName(FieldTypes.map(FieldTypes.string(), FieldTypes.string()))).toThrow(
      ConversionError
    );
  });
});

describe('fromTableSchema', () => {
  it('reads standard and legacy keywords', () => {
    const schema = fromTableSchema({
      fields: [
        { name: 'id', type: 'INTEGER', mode: 'REQUIRED' },
        { name: 'name', type: 'STRING' },
        { name: 'tags', type: 'STRING', mode: 'REPEATED' },
        { name: 'ts', type: 'TIMESTAMP', mode: 'NULLABLE' },
        { name: 'ratio', type: 'FLOAT' },
      ],
    });

    const expected = createSchema([
      field('id', FieldTypes.int64()),
      nullableField('name', FieldTypes.string()),
      field('tags', FieldTypes.array(FieldTypes.string())),
      nullableField('ts', FieldTypes.datetime()),
      nullableField('ratio', FieldTypes.float64()),
    ]);
    expect(schemasEqual(schema, expected)).toBe(true);
  });

  it('names the field whose type is unsupported', () => {
    const error = thrown(() =>
      fromTableSchema([{ name: 'outer', type: 'RECORD', fields: [{ name: 'geo', type: 'GEOGRAPHY' }] }])
    );
    expect(error).toMatchObject({ code: 'UNSUPPORTED_TYPE', field: 'outer.geo' });
  });

  it('infers maps only when asked to', () => {
    const fields: TableFieldSchema[] = [
      {
        name: 'attrs',
        type: 'RECORD',
        mode: 'REPEATED',
        fields: [
          { name: 'key', type: 'STRING', mode: 'REQUIRED' },
          { name: 'value', type: 'INT64' },
        ],
      },
    ];

    const inferred = fromTableSchema(fields, schemaConversionOptions({ inferMaps: true }));
    expect(
      schemasEqual(
        inferred,
        createSchema([field('attrs', FieldTypes.map(FieldTypes.string(), FieldTypes.int64()))])
      )
    ).toBe(true);

    const plain = fromTableSchema(fields);
    const entry = createSchema([
      field('key', FieldTypes.string()),
      nullableField('value', FieldTypes.int64()),
    ]);
    expect(
      schemasEqual(plain, createSchema([field('attrs', FieldTypes.array(FieldTypes.row(entry)))]))
    ).toBe(true);
  });

  it('reads back a schema made only of widened types', () => {
    const schema = createSchema([
      field('id', FieldTypes.int64()),
      nullableField('amount', FieldTypes.decimal()),
      nullableField('ratio', FieldTypes.float64()),
      nullableField('payload', FieldTypes.bytes()),
      nullableField('ok', FieldTypes.boolean()),
      nullableField('ts', FieldTypes.datetime()),
      nullableField('day', LogicalTypes.date()),
      nullableField('time', LogicalTypes.time()),
      nullableField('local', LogicalTypes.datetime()),
      field('labels', FieldTypes.array(FieldTypes.string())),
      nullableField(
        'inner',
        FieldTypes.row(createSchema([field('n', FieldTypes.int64(), { description: 'count' })]))
      ),
    ]);
    expect(schemasEqual(fromTableSchema(toTableSchema(schema)), schema)).toBe(true);
  });
});
