/**
 * Value types for data exchange between converters
 */

import type { Decimal } from '../values/decimal.js';
import type { LocalDate, LocalDateTime, LocalTime } from '../values/local-date-time.js';

/**
 * A value in the canonical model. Which shape a value takes is decided by the
 * FieldType it is paired with, never by inspecting the value:
 *
 * - byte, int16, int32, float32, float64, enum ordinals: `number`
 * - int64: `bigint`
 * - datetime: `Date` (millisecond precision)
 * - arrays and nested rows: arrays
 */
export type CanonicalValue =
  | null
  | boolean
  | number
  | bigint
  | string
  | Uint8Array
  | Date
  | Decimal
  | LocalDate
  | LocalTime
  | LocalDateTime
  | readonly CanonicalValue[]
  | ReadonlyMap<CanonicalValue, CanonicalValue>;

/** Positional values, one per schema field, in schema order */
export type CanonicalRow = readonly CanonicalValue[];

/** Generic name-keyed record - a row of data */
export type Record = {
  [key: string]: unknown;
};
