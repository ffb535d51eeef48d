/**
 * Options accepted by the value and schema converters
 */

/**
 * What to do with a timestamp carrying more than millisecond precision.
 * - `reject`: fail the conversion
 * - `truncate`: drop the sub-millisecond digits
 */
export type TruncateTimestamps = 'reject' | 'truncate';

export interface ConversionOptions {
  readonly truncateTimestamps: TruncateTimestamps;
}

export interface SchemaConversionOptions {
  /**
   * Treat a struct with exactly the fields `key` and `value` as a map instead
   * of a row (or an array of rows when REPEATED).
   */
  readonly inferMaps: boolean;
}

export const DEFAULT_CONVERSION_OPTIONS: ConversionOptions = Object.freeze({
  truncateTimestamps: 'reject',
});

export const DEFAULT_SCHEMA_CONVERSION_OPTIONS: SchemaConversionOptions = Object.freeze({
  inferMaps: false,
});

export function conversionOptions(overrides: Partial<ConversionOptions> = {}): ConversionOptions {
  return Object.freeze({ ...DEFAULT_CONVERSION_OPTIONS, ...overrides });
}

export function schemaConversionOptions(
  overrides: Partial<SchemaConversionOptions> = {}
): SchemaConversionOptions {
  return Object.freeze({ ...DEFAULT_SCHEMA_CONVERSION_OPTIONS, ...overrides });
}
