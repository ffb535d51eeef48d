import { describe, expect, it } from 'vitest';
import {
  ConversionError,
  Decimal,
  FieldTypes,
  LocalDate,
  LocalDateTime,
  LocalTime,
  LogicalTypes,
  conversionOptions,
  createSchema,
  field,
  nullableField,
} from '@rowbridge/core';
import { avroRecordToRow, convertAvroFormat } from '../src/index.js';
import { thrown } from './helpers.js';

const truncate = conversionOptions({ truncateTimestamps: 'truncate' });
const reject = conversionOptions({ truncateTimestamps: 'reject' });

describe('convertAvroFormat', () => {
  describe('timestamps', () => {
    const schema = createSchema([field('ts', FieldTypes.datetime())]);

    it('truncates sub-millisecond precision when allowed', () => {
      const [ts] = avroRecordToRow({ ts: 1565920327123456n }, schema, truncate);
      expect(ts).toEqual(new Date(1565920327123));
    });

    it('rejects sub-millisecond precision by default', () => {
      const error = thrown(() => avroRecordToRow({ ts: 1565920327123456n }, schema, reject));
      expect(error).toBeInstanceOf(ConversionError);
      expect(error).toMatchObject({ code: 'PRECISION_LOSS', field: 'ts' });
    });

    it('accepts whole milliseconds under either policy', () => {
      expect(avroRecordToRow({ ts: 1565920327123000 }, schema, reject)).toEqual([
        new Date(1565920327123),
      ]);
      expect(avroRecordToRow({ ts: 1565920327123000n }, schema, truncate)).toEqual([
        new Date(1565920327123),
      ]);
    });
  });

  it('narrows integers to their declared width', () => {
    expect(convertAvroFormat(FieldTypes.int64(), 5)).toBe(5n);
    expect(convertAvroFormat(FieldTypes.int32(), 7n)).toBe(7);
    expect(convertAvroFormat(FieldTypes.int16(), -3)).toBe(-3);
  });

  it('reads floats, booleans and strings', () => {
    expect(convertAvroFormat(FieldTypes.float32(), 0.1)).toBe(Math.fround(0.1));
    expect(convertAvroFormat(FieldTypes.float64(), 0.1)).toBe(0.1);
    expect(convertAvroFormat(FieldTypes.boolean(), true)).toBe(true);
    expect(convertAvroFormat(FieldTypes.string(), 'plain')).toBe('plain');
    expect(convertAvroFormat(FieldTypes.string(), new TextEncoder().encode('héllo'))).toBe('héllo');
  });

  it('copies bytes', () => {
    const input = Uint8Array.of(1, 2, 3);
    const output = convertAvroFormat(FieldTypes.bytes(), input);
    expect(output).toEqual(Uint8Array.of(1, 2, 3));
    expect(output).not.toBe(input);
  });

  it('reads NUMERIC at scale 9', () => {
    const value = convertAvroFormat(FieldTypes.decimal(), Uint8Array.of(0x00, 0x80));
    expect(value).toBeInstanceOf(Decimal);
    expect(String(value)).toBe('0.000000128');
  });

  it('reads DATE, TIME and DATETIME logical values', () => {
    expect(convertAvroFormat(LogicalTypes.date(), 18321)).toEqual(LocalDate.of(2020, 2, 29));
    expect(convertAvroFormat(LogicalTypes.time(), 3_723_000_001n)).toEqual(LocalTime.of(1, 2, 3, 1000));
    expect(convertAvroFormat(LogicalTypes.datetime(), '2020-01-02T03:04:05.123456')).toEqual(
      LocalDateTime.of(LocalDate.of(2020, 1, 2), LocalTime.of(3, 4, 5, 123_456_000))
    );
  });

  it('reads a time with local time zone as an instant', () => {
    expect(convertAvroFormat(LogicalTypes.timeWithLocalTz(), 1_000_000n)).toEqual(new Date(1000));
  });

  it('reads pass-through types as their base type', () => {
    expect(convertAvroFormat(LogicalTypes.passThrough('example:id', FieldTypes.int64()), 5)).toBe(5n);
  });

  it('fails on logical types without an Avro form', () => {
    const error = thrown(() => convertAvroFormat(LogicalTypes.enumeration(['A']), 0));
    expect(error).toBeInstanceOf(ConversionError);
    expect(error).toMatchObject({ code: 'UNKNOWN_LOGICAL_TYPE' });
    expect(error instanceof ConversionError && error.recoverable).toBe(false);
  });

  it('reads arrays and maps', () => {
    expect(convertAvroFormat(FieldTypes.array(FieldTypes.string()), ['a', 'b'])).toEqual(['a', 'b']);
    expect(
      convertAvroFormat(FieldTypes.map(FieldTypes.string(), FieldTypes.int64()), [
        { key: 'a', value: 1 },
        { key: 'b', value: 2n },
      ])
    ).toEqual(
      new Map([
        ['a', 1n],
        ['b', 2n],
      ])
    );
  });

  it('rejects duplicate map keys', () => {
    const type = FieldTypes.map(FieldTypes.string(), FieldTypes.int64());
    expect(
      thrown(() =>
        convertAvroFormat(type, [
          { key: 'a', value: 1 },
          { key: 'a', value: 2 },
        ])
      )
    ).toMatchObject({
      code: 'INVALID_VALUE',
      message: 'Duplicate map key "a"',
      valueType: 'string',
    });
  });

  it('compares long map keys by value', () => {
    const type = FieldTypes.map(FieldTypes.int64(), FieldTypes.string());
    expect(
      thrown(() =>
        convertAvroFormat(type, [
          { key: 1, value: 'x' },
          { key: 1n, value: 'y' },
        ])
      )
    ).toMatchObject({ code: 'INVALID_VALUE', message: 'Duplicate map key "1"' });
  });

  it('rejects a value of the wrong shape', () => {
    expect(thrown(() => convertAvroFormat(FieldTypes.int64(), 'five'))).toMatchObject({
      code: 'UNSUPPORTED_CONVERSION',
      fieldType: 'INT64',
      valueType: 'string',
    });
  });
});

describe('avroRecordToRow', () => {
  const inner = createSchema([field('flag', FieldTypes.boolean())]);
  const schema = createSchema([
    field('id', FieldTypes.int64()),
    nullableField('note', FieldTypes.string()),
    nullableField('inner', FieldTypes.row(inner)),
  ]);

  it('converts fields in schema order', () => {
    expect(avroRecordToRow({ inner: { flag: true }, note: 'x', id: 1 }, schema)).toEqual([
      1n,
      'x',
      [true],
    ]);
  });

  it('reads missing and null fields as null when nullable', () => {
    expect(avroRecordToRow({ id: 1n, note: null }, schema)).toEqual([1n, null, null]);
  });

  it('reports the full path of a null in a required nested field', () => {
    const error = thrown(() => avroRecordToRow({ id: 1n, inner: { flag: null } }, schema));
    expect(error).toMatchObject({
      code: 'NON_NULLABLE_NULL',
      field: 'inner.flag',
      message: 'Error converting field "inner.flag": Field BOOLEAN not nullable',
    });
  });
});
