/**
 * Schema Fingerprint
 *
 * A deterministic 64-bit hash of a proto-style message descriptor. The value
 * is embedded in messages written by running pipelines, so the algorithm must
 * never change: a different hash makes updated pipelines reject in-flight data.
 */

import { ConversionError } from '@rowbridge/core';
import type { TableFieldSchema, TableSchema } from '../types.js';
import { murmur3HashInt, murmur3HashString } from './murmur3.js';

/** Protobuf field types, in the declaration order their ordinals follow */
export const PROTO_FIELD_TYPE_ORDER = [
  'DOUBLE',
  'FLOAT',
  'INT64',
  'UINT64',
  'INT32',
  'FIXED64',
  'FIXED32',
  'BOOL',
  'STRING',
  'GROUP',
  'MESSAGE',
  'BYTES',
  'UINT32',
  'ENUM',
  'SFIXED32',
  'SFIXED64',
  'SINT32',
  'SINT64',
] as const;

export type ProtoFieldType = (typeof PROTO_FIELD_TYPE_ORDER)[number];

export type ProtoFieldLabel = 'OPTIONAL' | 'REQUIRED' | 'REPEATED';

export interface ProtoFieldDescriptor {
  name: string;
  type: ProtoFieldType;
  label: ProtoFieldLabel;
  /** Nested message, set when type is MESSAGE or GROUP */
  messageType?: ProtoMessageDescriptor;
}

export interface ProtoMessageDescriptor {
  fields: ProtoFieldDescriptor[];
}

const PROTO_TYPE_BY_TABLE_TYPE: ReadonlyMap<string, ProtoFieldType> = new Map<string, ProtoFieldType>([
  ['INT64', 'INT64'],
  ['INTEGER', 'INT64'],
  ['FLOAT64', 'DOUBLE'],
  ['FLOAT', 'DOUBLE'],
  ['BOOL', 'BOOL'],
  ['BOOLEAN', 'BOOL'],
  ['STRING', 'STRING'],
  ['BYTES', 'BYTES'],
  ['NUMERIC', 'BYTES'],
  ['BIGNUMERIC', 'BYTES'],
  ['TIMESTAMP', 'INT64'],
  ['DATE', 'INT32'],
  ['TIME', 'INT64'],
  ['DATETIME', 'INT64'],
  ['GEOGRAPHY', 'STRING'],
  ['JSON', 'STRING'],
  ['STRUCT', 'MESSAGE'],
  ['RECORD', 'MESSAGE'],
]);

function ordinalOf(type: ProtoFieldType): number {
  return PROTO_FIELD_TYPE_ORDER.indexOf(type);
}

/**
 * Hash a message descriptor, nested messages included, to a signed 64-bit
 * value. Per-field hashes are summed, so field order does not affect it.
 */
export function hashSchemaDescriptorDeterministic(descriptor: ProtoMessageDescriptor): bigint {
  let hashCode = 0n;
  for (const field of descriptor.fields) {
    hashCode += BigInt(murmur3HashString(field.name));
    hashCode += BigInt(murmur3HashInt(field.label === 'REPEATED' ? 1 : 0));
    hashCode += BigInt(murmur3HashInt(field.label === 'REQUIRED' ? 1 : 0));
    hashCode += BigInt(murmur3HashInt(ordinalOf(field.type)));
    if (field.type === 'MESSAGE' && field.messageType) {
      hashCode += hashSchemaDescriptorDeterministic(field.messageType);
    }
    hashCode = BigInt.asIntN(64, hashCode);
  }
  return hashCode;
}

function toProtoField(field: TableFieldSchema): ProtoFieldDescriptor {
  const type = PROTO_TYPE_BY_TABLE_TYPE.get(field.type);
  if (!type) {
    throw new ConversionError({
      code: 'UNSUPPORTED_TYPE',
      message: `BigQuery type ${field.type} has no storage write representation`,
      field: field.name,
      fieldType: field.type,
    });
  }

  const descriptor: ProtoFieldDescriptor = {
    // The write protocol's descriptors use lower-case column names
    name: field.name.toLowerCase(),
    type,
    label: field.mode === 'REQUIRED' ? 'REQUIRED' : field.mode === 'REPEATED' ? 'REPEATED' : 'OPTIONAL',
  };
  if (type === 'MESSAGE') {
    try {
      descriptor.messageType = tableSchemaToDescriptor(field.fields ?? []);
    } catch (error) {
      throw error instanceof ConversionError ? error.withField(field.name) : error;
    }
  }
  return descriptor;
}

/**
 * Derive the message descriptor the storage write protocol uses for a table
 * schema.
 */
export function tableSchemaToDescriptor(
  tableSchema: TableSchema | readonly TableFieldSchema[]
): ProtoMessageDescriptor {
  const fields = 'fields' in tableSchema ? tableSchema.fields : tableSchema;
  return { fields: fields.map(toProtoField) };
}
