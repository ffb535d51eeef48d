/**
 * Static lookup tables between canonical types and BigQuery type keywords,
 * plus the text parsers used when reading JSON TableRows.
 *
 * The tables are module-private and only read through the lookup functions.
 */

import {
  ConversionError,
  Decimal,
  LogicalTypeIds,
  type CanonicalValue,
  type PrimitiveKind,
} from '@rowbridge/core';
import { parseEpochSeconds, parseTimestamp } from '../table-row/format.js';

export type StandardSqlTypeName =
  | 'STRING'
  | 'BYTES'
  | 'INT64'
  | 'FLOAT64'
  | 'NUMERIC'
  | 'BOOL'
  | 'TIMESTAMP'
  | 'DATE'
  | 'TIME'
  | 'DATETIME'
  | 'STRUCT'
  | 'ARRAY';

const CANONICAL_TO_STANDARD_SQL: ReadonlyMap<
  PrimitiveKind | 'array' | 'row',
  StandardSqlTypeName
> = new Map<PrimitiveKind | 'array' | 'row', StandardSqlTypeName>([
  ['byte', 'INT64'],
  ['int16', 'INT64'],
  ['int32', 'INT64'],
  ['int64', 'INT64'],
  ['float32', 'FLOAT64'],
  ['float64', 'FLOAT64'],
  ['decimal', 'NUMERIC'],
  ['boolean', 'BOOL'],
  ['array', 'ARRAY'],
  ['row', 'STRUCT'],
  ['datetime', 'TIMESTAMP'],
  ['string', 'STRING'],
  ['bytes', 'BYTES'],
]);

const LOGICAL_TO_STANDARD_SQL: ReadonlyMap<string, StandardSqlTypeName> = new Map<
  string,
  StandardSqlTypeName
>([
  [LogicalTypeIds.DATE, 'DATE'],
  [LogicalTypeIds.TIME, 'TIME'],
  [LogicalTypeIds.DATETIME, 'DATETIME'],
  [LogicalTypeIds.TIME_WITH_LOCAL_TZ, 'TIME'],
  [LogicalTypeIds.ENUM, 'STRING'],
]);

/** BigQuery type of a canonical kind; maps have none */
export function standardSqlTypeOfKind(
  kind: PrimitiveKind | 'array' | 'row'
): StandardSqlTypeName | undefined {
  return CANONICAL_TO_STANDARD_SQL.get(kind);
}

/** BigQuery type of a known logical type identifier */
export function standardSqlTypeOfLogical(identifier: string): StandardSqlTypeName | undefined {
  return LOGICAL_TO_STANDARD_SQL.get(identifier);
}

export const MAP_KEY_FIELD_NAME = 'key';
export const MAP_VALUE_FIELD_NAME = 'value';

const INTEGER_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

function invalid(text: string, kind: PrimitiveKind): ConversionError {
  return new ConversionError({
    code: 'INVALID_VALUE',
    message: `Cannot parse "${text}" as ${kind.toUpperCase()}`,
    fieldType: kind.toUpperCase(),
    valueType: 'string',
  });
}

function parseBoundedInt(kind: PrimitiveKind, bits: number): (text: string) => number {
  const max = 2 ** (bits - 1) - 1;
  const min = -(2 ** (bits - 1));
  return (text) => {
    const value = INTEGER_PATTERN.test(text) ? Number(text) : Number.NaN;
    if (!Number.isInteger(value) || value < min || value > max) throw invalid(text, kind);
    return value;
  };
}

function parseInt64(text: string): bigint {
  if (!INTEGER_PATTERN.test(text)) throw invalid(text, 'int64');
  const value = BigInt(text);
  if (BigInt.asIntN(64, value) !== value) throw invalid(text, 'int64');
  return value;
}

function parseFloatText(kind: PrimitiveKind): (text: string) => number {
  return (text) => {
    const trimmed = text.replace(/^\+/, '');
    let value: number;
    if (trimmed === 'NaN') value = Number.NaN;
    else if (trimmed === 'Infinity') value = Number.POSITIVE_INFINITY;
    else if (trimmed === '-Infinity') value = Number.NEGATIVE_INFINITY;
    else if (FLOAT_PATTERN.test(text)) value = Number(text);
    else throw invalid(text, kind);
    return kind === 'float32' ? Math.fround(value) : value;
  };
}

function parseBase64(text: string): Uint8Array {
  if (!BASE64_PATTERN.test(text)) throw invalid(text, 'bytes');
  return new Uint8Array(Buffer.from(text, 'base64'));
}

/**
 * An empty TIMESTAMP reads as null. Text ending in "UTC" is the fixed
 * TIMESTAMP format; anything else is fractional epoch seconds.
 */
function parseTimestampText(text: string): Date | null {
  if (text.length === 0) return null;
  return text.endsWith('UTC') ? parseTimestamp(text) : parseEpochSeconds(text);
}

const TEXT_VALUE_PARSERS: ReadonlyMap<PrimitiveKind, (text: string) => CanonicalValue> =
  new Map<PrimitiveKind, (text: string) => CanonicalValue>([
    ['byte', parseBoundedInt('byte', 8)],
    ['int16', parseBoundedInt('int16', 16)],
    ['int32', parseBoundedInt('int32', 32)],
    ['int64', parseInt64],
    ['float32', parseFloatText('float32')],
    ['float64', parseFloatText('float64')],
    ['decimal', (text) => Decimal.parse(text)],
    ['boolean', (text) => text.toLowerCase() === 'true'],
    ['string', (text) => text],
    ['datetime', parseTimestampText],
    ['bytes', parseBase64],
  ]);

/** Parser for a primitive value that arrives as a JSON scalar */
export function textValueParser(kind: PrimitiveKind): ((text: string) => CanonicalValue) | undefined {
  return TEXT_VALUE_PARSERS.get(kind);
}
