/**
 * Fixed text formats of BigQuery TIMESTAMP, DATETIME and TIME values
 *
 * TIMESTAMP is printed as `yyyy-MM-dd HH:mm:ss.SSS UTC` and read back with 0
 * to 6 fractional digits. TIME and DATETIME always print seconds; the
 * fraction is printed with 6 digits, and only when it is non-zero.
 */

import { ConversionError, LocalDate, LocalDateTime, LocalTime } from '@rowbridge/core';

const TIMESTAMP_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})(?:\.(\d{1,6}))? UTC$/;
const DATETIME_PATTERN = /^(\d{4}-\d{2}-\d{2})T(\d{2}:\d{2}:\d{2}(?:\.\d{6})?)$/;

function pad(value: number, width: number): string {
  return String(value).padStart(width, '0');
}

function invalidText(text: string, format: string): ConversionError {
  return new ConversionError({
    code: 'INVALID_VALUE',
    message: `Cannot parse "${text}" as ${format}`,
    valueType: 'string',
  });
}

export function formatTimestamp(value: Date): string {
  if (Number.isNaN(value.getTime())) {
    throw new ConversionError({
      code: 'INVALID_VALUE',
      message: 'Cannot format an invalid Date as a TIMESTAMP',
      valueType: 'Date',
    });
  }
  const date = `${pad(value.getUTCFullYear(), 4)}-${pad(value.getUTCMonth() + 1, 2)}-${pad(value.getUTCDate(), 2)}`;
  const time = `${pad(value.getUTCHours(), 2)}:${pad(value.getUTCMinutes(), 2)}:${pad(value.getUTCSeconds(), 2)}`;
  return `${date} ${time}.${pad(value.getUTCMilliseconds(), 3)} UTC`;
}

/**
 * Parse `yyyy-MM-dd HH:mm:ss[.f] UTC`. Digits past the millisecond are
 * dropped.
 */
export function parseTimestamp(text: string): Date {
  const match = TIMESTAMP_PATTERN.exec(text);
  if (!match) throw invalidText(text, 'a TIMESTAMP');

  const [year, month, day, hour, minute, second] = match.slice(1, 7).map(Number);
  const millis = Number((match[7] ?? '').padEnd(3, '0').slice(0, 3));
  if (
    year === undefined || month === undefined || day === undefined ||
    hour === undefined || minute === undefined || second === undefined ||
    hour > 23 || minute > 59 || second > 59
  ) {
    throw invalidText(text, 'a TIMESTAMP');
  }

  const result = new Date(0);
  result.setUTCFullYear(year, month - 1, day);
  result.setUTCHours(hour, minute, second, millis);
  if (result.getUTCMonth() !== month - 1 || result.getUTCDate() !== day) {
    throw invalidText(text, 'a TIMESTAMP');
  }
  return result;
}

/**
 * Fractional seconds since the epoch, as JSON exports print TIMESTAMP
 * columns. Milliseconds are truncated toward zero.
 */
export function parseEpochSeconds(text: string): Date {
  const seconds = text.trim() === '' ? Number.NaN : Number(text);
  if (!Number.isFinite(seconds)) throw invalidText(text, 'epoch seconds');
  return new Date(Math.trunc(seconds * 1000));
}

export function formatTime(value: LocalTime): string {
  const base = `${pad(value.hour, 2)}:${pad(value.minute, 2)}:${pad(value.second, 2)}`;
  return value.nano === 0 ? base : `${base}.${pad(Math.floor(value.nano / 1000), 6)}`;
}

export function formatDateTime(value: LocalDateTime): string {
  return `${value.date.toString()}T${formatTime(value.time)}`;
}

/** Parse `uuuu-MM-dd'T'HH:mm:ss[.SSSSSS]` */
export function parseDateTime(text: string): LocalDateTime {
  const match = DATETIME_PATTERN.exec(text);
  if (!match || match[1] === undefined || match[2] === undefined) {
    throw invalidText(text, 'a DATETIME');
  }
  return LocalDateTime.of(LocalDate.parse(match[1]), LocalTime.parse(match[2]));
}

/**
 * Shortest decimal text that reads back as the same 32-bit float, so that
 * `Math.fround(0.1)` prints as "0.1" instead of "0.10000000149011612".
 */
export function formatFloat32(value: number): string {
  if (!Number.isFinite(value)) return String(value);
  for (let digits = 1; digits <= 9; digits++) {
    const candidate = Number(value.toPrecision(digits));
    if (Math.fround(candidate) === value) return String(candidate);
  }
  return String(value);
}
