import { describe, expect, it } from 'vitest';
import {
  Decimal,
  FieldTypes,
  LocalDate,
  LocalDateTime,
  LocalTime,
  LogicalTypes,
  createSchema,
  field,
  nullableField,
  type CanonicalRow,
} from '@rowbridge/core';
import { tableRowToRow, toTableRow } from '../src/index.js';

const schema = createSchema([
  field('small', FieldTypes.int16()),
  field('big', FieldTypes.int64()),
  field('ratio', FieldTypes.float32()),
  field('amount', FieldTypes.decimal()),
  field('ok', FieldTypes.boolean()),
  field('payload', FieldTypes.bytes()),
  field('ts', FieldTypes.datetime()),
  field('day', LogicalTypes.date()),
  field('time', LogicalTypes.time()),
  field('local', LogicalTypes.datetime()),
  field('status', LogicalTypes.enumeration(['NEW', 'DONE'])),
  field('tags', FieldTypes.array(FieldTypes.string(), true)),
  field('attrs', FieldTypes.map(FieldTypes.string(), FieldTypes.float64())),
  nullableField('inner', FieldTypes.row(createSchema([nullableField('note', FieldTypes.string())]))),
]);

describe('TableRow round trip', () => {
  it('reads back what it writes', () => {
    const row: CanonicalRow = [
      -12,
      -9223372036854775808n,
      Math.fround(0.1),
      Decimal.parse('-12.345000000'),
      true,
      Uint8Array.of(0, 255, 16),
      new Date(1565920327123),
      LocalDate.of(1999, 12, 31),
      LocalTime.of(23, 59, 59, 999_999_000),
      LocalDateTime.of(LocalDate.of(2020, 1, 2), LocalTime.of(3, 4)),
      1,
      ['a', null],
      new Map([['x', 1.25]]),
      [null],
    ];

    const json: unknown = JSON.parse(JSON.stringify(toTableRow(row, schema)));
    expect(json).toMatchObject({ ts: '2019-08-16 01:52:07.123 UTC', status: 'DONE' });
    expect(tableRowToRow(schema, toTableRow(row, schema))).toEqual(row);
  });

  it('reads back rows whose only field is named v', () => {
    const vSchema = createSchema([
      field('xs', FieldTypes.array(FieldTypes.row(createSchema([field('v', FieldTypes.string())])))),
    ]);
    const row: CanonicalRow = [[['x'], ['y']]];

    expect(toTableRow(row, vSchema)).toEqual({ xs: [{ v: 'x' }, { v: 'y' }] });
    expect(tableRowToRow(vSchema, toTableRow(row, vSchema))).toEqual(row);
  });
});
