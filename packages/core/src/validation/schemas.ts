/**
 * Zod schemas for validating converter inputs that arrive as JSON
 */

import { z } from 'zod';
import { createSchema } from '../schema/builders.js';
import type { Field, FieldType, PrimitiveKind, Schema } from '../types/schema.js';

/** Primitive kind enum */
export const primitiveKindSchema = z.enum([
  'byte',
  'int16',
  'int32',
  'int64',
  'float32',
  'float64',
  'decimal',
  'boolean',
  'string',
  'bytes',
  'datetime',
]);

export const logicalRepresentationSchema = z.enum([
  'date',
  'time',
  'datetime',
  'time-with-local-tz',
  'enum',
  'pass-through',
  'custom',
]);

/** JSON form of a FieldType (recursive through arrays, maps, rows and logical bases) */
export type FieldTypeDefinition =
  | { kind: PrimitiveKind }
  | { kind: 'array'; elementType: FieldTypeDefinition; elementNullable?: boolean }
  | {
      kind: 'map';
      keyType: FieldTypeDefinition;
      valueType: FieldTypeDefinition;
      valueNullable?: boolean;
    }
  | { kind: 'row'; fields: FieldDefinition[] }
  | {
      kind: 'logical';
      identifier: string;
      baseType: FieldTypeDefinition;
      representation: z.infer<typeof logicalRepresentationSchema>;
      values?: string[];
    };

export interface FieldDefinition {
  name: string;
  type: FieldTypeDefinition;
  nullable?: boolean;
  description?: string;
}

export const fieldTypeSchema: z.ZodType<FieldTypeDefinition> = z.lazy(() =>
  z.union([
    z.object({ kind: primitiveKindSchema }).strict(),
    z
      .object({
        kind: z.literal('array'),
        elementType: fieldTypeSchema,
        elementNullable: z.boolean().optional(),
      })
      .strict(),
    z
      .object({
        kind: z.literal('map'),
        keyType: fieldTypeSchema,
        valueType: fieldTypeSchema,
        valueNullable: z.boolean().optional(),
      })
      .strict(),
    z
      .object({
        kind: z.literal('row'),
        fields: z.array(fieldDefinitionSchema),
      })
      .strict(),
    z
      .object({
        kind: z.literal('logical'),
        identifier: z.string().min(1),
        baseType: fieldTypeSchema,
        representation: logicalRepresentationSchema,
        values: z.array(z.string()).optional(),
      })
      .strict(),
  ])
);

/** Field definition (recursive for nested rows) */
export const fieldDefinitionSchema: z.ZodType<FieldDefinition> = z.lazy(() =>
  z
    .object({
      name: z.string().min(1),
      type: fieldTypeSchema,
      nullable: z.boolean().optional(),
      description: z.string().optional(),
    })
    .strict()
);

/** Schema definition */
export const schemaDefinitionSchema = z
  .object({
    fields: z.array(fieldDefinitionSchema),
  })
  .strict();

export type SchemaDefinition = z.infer<typeof schemaDefinitionSchema>;

export const truncateTimestampsSchema = z.enum(['reject', 'truncate']);

export const conversionOptionsSchema = z
  .object({
    truncateTimestamps: truncateTimestampsSchema.default('reject'),
  })
  .strict();

export const schemaConversionOptionsSchema = z
  .object({
    inferMaps: z.boolean().default(false),
  })
  .strict();

function toFieldType(def: FieldTypeDefinition): FieldType {
  switch (def.kind) {
    case 'array':
      return def.elementNullable
        ? { kind: 'array', elementType: toFieldType(def.elementType), elementNullable: true }
        : { kind: 'array', elementType: toFieldType(def.elementType) };
    case 'map':
      return def.valueNullable
        ? {
            kind: 'map',
            keyType: toFieldType(def.keyType),
            valueType: toFieldType(def.valueType),
            valueNullable: true,
          }
        : { kind: 'map', keyType: toFieldType(def.keyType), valueType: toFieldType(def.valueType) };
    case 'row':
      return { kind: 'row', schema: toSchema(def.fields) };
    case 'logical':
      return {
        kind: 'logical',
        identifier: def.identifier,
        baseType: toFieldType(def.baseType),
        representation: def.representation,
        ...(def.values ? { values: def.values } : {}),
      };
    default:
      return { kind: def.kind };
  }
}

function toSchema(fields: FieldDefinition[]): Schema {
  return createSchema(
    fields.map((f): Field => {
      const out: Field = { name: f.name, type: toFieldType(f.type), nullable: f.nullable ?? false };
      if (f.description) out.description = f.description;
      return out;
    })
  );
}

/**
 * Validate the JSON form of a schema and build the canonical Schema from it.
 * Throws a ZodError on malformed input.
 */
export function parseSchemaDefinition(json: unknown): Schema {
  return toSchema(schemaDefinitionSchema.parse(json).fields);
}

function toFieldTypeDefinition(type: FieldType): FieldTypeDefinition {
  switch (type.kind) {
    case 'array':
      return {
        kind: 'array',
        elementType: toFieldTypeDefinition(type.elementType),
        ...(type.elementNullable ? { elementNullable: true } : {}),
      };
    case 'map':
      return {
        kind: 'map',
        keyType: toFieldTypeDefinition(type.keyType),
        valueType: toFieldTypeDefinition(type.valueType),
        ...(type.valueNullable ? { valueNullable: true } : {}),
      };
    case 'row':
      return { kind: 'row', fields: toSchemaDefinition(type.schema).fields };
    case 'logical':
      return {
        kind: 'logical',
        identifier: type.identifier,
        baseType: toFieldTypeDefinition(type.baseType),
        representation: type.representation,
        ...(type.values ? { values: [...type.values] } : {}),
      };
    default:
      return { kind: type.kind };
  }
}

/** JSON form of a canonical Schema, the inverse of parseSchemaDefinition */
export function toSchemaDefinition(schema: Schema): SchemaDefinition {
  return {
    fields: schema.fields.map((f) => ({
      name: f.name,
      type: toFieldTypeDefinition(f.type),
      nullable: f.nullable,
      ...(f.description ? { description: f.description } : {}),
    })),
  };
}
