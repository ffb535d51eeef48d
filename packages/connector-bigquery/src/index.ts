/**
 * @rowbridge/connector-bigquery
 *
 * Schema and value converters between the canonical row model and BigQuery
 */

// Types
export * from './types.js';

// Schemas
export * from './schema/type-mapping.js';
export * from './schema/translator.js';
export * from './schema/fingerprint.js';
export * from './schema/avro-schema.js';
export { murmur3Hash32, murmur3HashInt, murmur3HashString } from './schema/murmur3.js';

// Values
export * from './avro/decoder.js';
export * from './table-row/encoder.js';
export * from './table-row/parser.js';
export {
  formatDateTime,
  formatFloat32,
  formatTime,
  formatTimestamp,
  parseDateTime,
  parseEpochSeconds,
  parseTimestamp,
} from './table-row/format.js';

// Pipeline adapters
export * from './row-functions.js';

// Validation
export * from './validation.js';
