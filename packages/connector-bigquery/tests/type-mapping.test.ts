import { describe, expect, it } from 'vitest';
import { LogicalTypeIds } from '@rowbridge/core';
import * as typeMapping from '../src/schema/type-mapping.js';
import { standardSqlTypeOfKind, standardSqlTypeOfLogical, textValueParser } from '../src/index.js';

describe('type mapping lookups', () => {
  it('maps canonical kinds and logical identifiers', () => {
    expect(standardSqlTypeOfKind('int16')).toBe('INT64');
    expect(standardSqlTypeOfKind('float32')).toBe('FLOAT64');
    expect(standardSqlTypeOfKind('row')).toBe('STRUCT');
    expect(standardSqlTypeOfLogical(LogicalTypeIds.TIME_WITH_LOCAL_TZ)).toBe('TIME');
    expect(standardSqlTypeOfLogical('com.example:unknown')).toBeUndefined();
  });

  it('returns the text parser of a primitive kind', () => {
    expect(textValueParser('int64')?.('5')).toBe(5n);
    expect(textValueParser('boolean')?.('TRUE')).toBe(true);
  });

  it('keeps the lookup tables out of the module exports', () => {
    expect(Object.keys(typeMapping).sort()).toEqual([
      'MAP_KEY_FIELD_NAME',
      'MAP_VALUE_FIELD_NAME',
      'standardSqlTypeOfKind',
      'standardSqlTypeOfLogical',
      'textValueParser',
    ]);
  });
});
