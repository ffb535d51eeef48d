/**
 * Arbitrary-precision fixed-point decimal: an unscaled integer and a scale.
 *
 * `Decimal.of(12345n, 2)` is 123.45. Equality follows the unscaled/scale
 * pair, so 1.5 and 1.50 are different values with `compareTo() === 0`.
 */

import { ConversionError } from '../errors/conversion-error.js';

const DECIMAL_PATTERN = /^([+-])?(\d*)(?:\.(\d*))?(?:[eE]([+-]?\d+))?$/;

export class Decimal {
  private constructor(
    readonly unscaled: bigint,
    readonly scale: number
  ) {}

  static of(unscaled: bigint, scale: number): Decimal {
    if (!Number.isInteger(scale)) {
      throw new ConversionError({
        code: 'INVALID_VALUE',
        message: `Decimal scale must be an integer, got ${scale}`,
      });
    }
    return new Decimal(unscaled, scale);
  }

  static parse(text: string): Decimal {
    const match = DECIMAL_PATTERN.exec(text.trim());
    const intPart = match?.[2] ?? '';
    const fracPart = match?.[3] ?? '';
    if (!match || intPart.length + fracPart.length === 0) {
      throw new ConversionError({
        code: 'INVALID_VALUE',
        message: `Cannot parse "${text}" as a decimal`,
        valueType: 'string',
      });
    }

    const sign = match[1] === '-' ? -1n : 1n;
    const exponent = match[4] ? Number.parseInt(match[4], 10) : 0;
    return new Decimal(sign * BigInt(intPart + fracPart), fracPart.length - exponent);
  }

  /**
   * Decode a big-endian two's complement unscaled value, the byte layout of
   * the Avro `decimal` logical type.
   */
  static fromUnscaledBytes(bytes: Uint8Array, scale: number): Decimal {
    let value = 0n;
    for (const byte of bytes) {
      value = (value << 8n) | BigInt(byte);
    }
    const first = bytes[0];
    if (first !== undefined && (first & 0x80) !== 0) {
      value -= 1n << BigInt(bytes.length * 8);
    }
    return Decimal.of(value, scale);
  }

  /** Minimal big-endian two's complement encoding of the unscaled value. */
  toUnscaledBytes(): Uint8Array {
    const bytes: number[] = [];
    let value = this.unscaled;
    for (;;) {
      const byte = Number(BigInt.asUintN(8, value));
      bytes.unshift(byte);
      value >>= 8n;
      const signBit = (byte & 0x80) !== 0;
      if ((value === 0n && !signBit) || (value === -1n && signBit)) break;
    }
    return Uint8Array.from(bytes);
  }

  /**
   * Change the scale. Raising it is always exact; lowering it only succeeds
   * when the dropped digits are zero.
   */
  setScale(scale: number): Decimal {
    if (scale === this.scale) return this;
    if (scale > this.scale) {
      return Decimal.of(this.unscaled * 10n ** BigInt(scale - this.scale), scale);
    }
    const divisor = 10n ** BigInt(this.scale - scale);
    if (this.unscaled % divisor !== 0n) {
      throw new ConversionError({
        code: 'PRECISION_LOSS',
        message: `Decimal ${this.toString()} cannot be represented with scale ${scale}`,
      });
    }
    return Decimal.of(this.unscaled / divisor, scale);
  }

  compareTo(other: Decimal): number {
    const scale = Math.max(this.scale, other.scale);
    const a = this.setScale(scale).unscaled;
    const b = other.setScale(scale).unscaled;
    return a === b ? 0 : a < b ? -1 : 1;
  }

  equals(other: unknown): boolean {
    return (
      other instanceof Decimal &&
      other.unscaled === this.unscaled &&
      other.scale === this.scale
    );
  }

  toNumber(): number {
    return Number(this.toString());
  }

  /** Plain notation, never exponential: `Decimal.of(0n, 9)` is "0.000000000". */
  toString(): string {
    if (this.scale <= 0) {
      return (this.unscaled * 10n ** BigInt(-this.scale)).toString();
    }
    const negative = this.unscaled < 0n;
    const digits = (negative ? -this.unscaled : this.unscaled)
      .toString()
      .padStart(this.scale + 1, '0');
    const point = digits.length - this.scale;
    return `${negative ? '-' : ''}${digits.slice(0, point)}.${digits.slice(point)}`;
  }

  toJSON(): string {
    return this.toString();
  }
}
