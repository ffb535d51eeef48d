/**
 * Calendar values without a time zone
 *
 * `LocalDate`, `LocalTime` and `LocalDateTime` carry the warehouse DATE, TIME
 * and DATETIME columns. `toString()` prints ISO-8601, dropping zero seconds
 * and trimming the fraction to 3, 6 or 9 digits.
 */

import { ConversionError } from '../errors/conversion-error.js';

const MILLIS_PER_DAY = 86_400_000;
const NANOS_PER_SECOND = 1_000_000_000;
const NANOS_PER_DAY = 86_400 * NANOS_PER_SECOND;

const DATE_PATTERN = /^(-?\d{4,})-(\d{2})-(\d{2})$/;
const TIME_PATTERN = /^(\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?$/;

function pad(value: number, width: number): string {
  return String(value).padStart(width, '0');
}

function invalid(kind: string, text: string): ConversionError {
  return new ConversionError({
    code: 'INVALID_VALUE',
    message: `Cannot parse "${text}" as a ${kind}`,
    valueType: 'string',
  });
}

export class LocalDate {
  private constructor(
    readonly year: number,
    readonly month: number,
    readonly day: number
  ) {}

  static of(year: number, month: number, day: number): LocalDate {
    const check = new Date(0);
    check.setUTCFullYear(year, month - 1, day);
    if (
      check.getUTCFullYear() !== year ||
      check.getUTCMonth() !== month - 1 ||
      check.getUTCDate() !== day
    ) {
      throw new ConversionError({
        code: 'INVALID_VALUE',
        message: `Invalid date: ${year}-${month}-${day}`,
      });
    }
    return new LocalDate(year, month, day);
  }

  static ofEpochDay(epochDay: number): LocalDate {
    const date = new Date(epochDay * MILLIS_PER_DAY);
    return new LocalDate(date.getUTCFullYear(), date.getUTCMonth() + 1, date.getUTCDate());
  }

  static parse(text: string): LocalDate {
    const match = DATE_PATTERN.exec(text);
    if (!match) throw invalid('date', text);
    try {
      return LocalDate.of(Number(match[1]), Number(match[2]), Number(match[3]));
    } catch {
      throw invalid('date', text);
    }
  }

  toEpochDay(): number {
    const date = new Date(0);
    date.setUTCFullYear(this.year, this.month - 1, this.day);
    return Math.floor(date.getTime() / MILLIS_PER_DAY);
  }

  equals(other: unknown): boolean {
    return (
      other instanceof LocalDate &&
      other.year === this.year &&
      other.month === this.month &&
      other.day === this.day
    );
  }

  toString(): string {
    const year = this.year < 0 ? `-${pad(-this.year, 4)}` : pad(this.year, 4);
    return `${year}-${pad(this.month, 2)}-${pad(this.day, 2)}`;
  }

  toJSON(): string {
    return this.toString();
  }
}

export class LocalTime {
  private constructor(
    readonly hour: number,
    readonly minute: number,
    readonly second: number,
    readonly nano: number
  ) {}

  static of(hour: number, minute: number, second = 0, nano = 0): LocalTime {
    const inRange =
      Number.isInteger(hour) && hour >= 0 && hour < 24 &&
      Number.isInteger(minute) && minute >= 0 && minute < 60 &&
      Number.isInteger(second) && second >= 0 && second < 60 &&
      Number.isInteger(nano) && nano >= 0 && nano < NANOS_PER_SECOND;
    if (!inRange) {
      throw new ConversionError({
        code: 'INVALID_VALUE',
        message: `Invalid time: ${hour}:${minute}:${second}.${nano}`,
      });
    }
    return new LocalTime(hour, minute, second, nano);
  }

  static ofNanoOfDay(nanoOfDay: number): LocalTime {
    if (!Number.isSafeInteger(nanoOfDay) || nanoOfDay < 0 || nanoOfDay >= NANOS_PER_DAY) {
      throw new ConversionError({
        code: 'INVALID_VALUE',
        message: `Nano of day out of range: ${nanoOfDay}`,
      });
    }
    const totalSeconds = Math.floor(nanoOfDay / NANOS_PER_SECOND);
    return new LocalTime(
      Math.floor(totalSeconds / 3600),
      Math.floor(totalSeconds / 60) % 60,
      totalSeconds % 60,
      nanoOfDay % NANOS_PER_SECOND
    );
  }

  static parse(text: string): LocalTime {
    const match = TIME_PATTERN.exec(text);
    if (!match) throw invalid('time', text);
    const fraction = match[4] ?? '';
    try {
      return LocalTime.of(
        Number(match[1]),
        Number(match[2]),
        match[3] ? Number(match[3]) : 0,
        fraction ? Number(fraction.padEnd(9, '0')) : 0
      );
    } catch {
      throw invalid('time', text);
    }
  }

  toNanoOfDay(): number {
    return (
      (this.hour * 3600 + this.minute * 60 + this.second) * NANOS_PER_SECOND + this.nano
    );
  }

  equals(other: unknown): boolean {
    return other instanceof LocalTime && other.toNanoOfDay() === this.toNanoOfDay();
  }

  /**
   * ISO form that drops a zero seconds field and prints the fraction in
   * groups of 3, 6 or 9 digits: "10:15", "10:15:30", "10:15:30.120".
   */
  toString(): string {
    let out = `${pad(this.hour, 2)}:${pad(this.minute, 2)}`;
    if (this.second > 0 || this.nano > 0) {
      out += `:${pad(this.second, 2)}`;
      if (this.nano > 0) {
        if (this.nano % 1_000_000 === 0) {
          out += `.${pad(this.nano / 1_000_000, 3)}`;
        } else if (this.nano % 1000 === 0) {
          out += `.${pad(this.nano / 1000, 6)}`;
        } else {
          out += `.${pad(this.nano, 9)}`;
        }
      }
    }
    return out;
  }

  toJSON(): string {
    return this.toString();
  }
}

export class LocalDateTime {
  private constructor(
    readonly date: LocalDate,
    readonly time: LocalTime
  ) {}

  static of(date: LocalDate, time: LocalTime): LocalDateTime {
    return new LocalDateTime(date, time);
  }

  static parse(text: string): LocalDateTime {
    const separator = text.indexOf('T');
    if (separator < 0) throw invalid('date-time', text);
    return new LocalDateTime(
      LocalDate.parse(text.slice(0, separator)),
      LocalTime.parse(text.slice(separator + 1))
    );
  }

  equals(other: unknown): boolean {
    return (
      other instanceof LocalDateTime &&
      other.date.equals(this.date) &&
      other.time.equals(this.time)
    );
  }

  toString(): string {
    return `${this.date.toString()}T${this.time.toString()}`;
  }

  toJSON(): string {
    return this.toString();
  }
}
