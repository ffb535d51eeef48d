/**
 * Inspection helpers for canonical schemas
 */

import type { Field, FieldType, Schema } from '../types/schema.js';

/**
 * Render a field type for messages: `ARRAY<ROW<id INT64, tags ARRAY<STRING>>>`
 */
export function describeFieldType(type: FieldType): string {
  switch (type.kind) {
    case 'array':
      return `ARRAY<${describeFieldType(type.elementType)}>`;
    case 'map':
      return `MAP<${describeFieldType(type.keyType)}, ${describeFieldType(type.valueType)}>`;
    case 'row':
      return `ROW<${type.schema.fields
        .map((f) => `${f.name} ${describeFieldType(f.type)}`)
        .join(', ')}>`;
    case 'logical':
      return `LOGICAL<${type.identifier}>`;
    default:
      return type.kind.toUpperCase();
  }
}

export function getField(schema: Schema, name: string): Field | undefined {
  return schema.fields.find((f) => f.name === name);
}

export function indexOfField(schema: Schema, name: string): number {
  return schema.fields.findIndex((f) => f.name === name);
}

export function fieldTypesEqual(a: FieldType, b: FieldType): boolean {
  switch (a.kind) {
    case 'array':
      return (
        b.kind === 'array' &&
        (a.elementNullable ?? false) === (b.elementNullable ?? false) &&
        fieldTypesEqual(a.elementType, b.elementType)
      );
    case 'map':
      return (
        b.kind === 'map' &&
        (a.valueNullable ?? false) === (b.valueNullable ?? false) &&
        fieldTypesEqual(a.keyType, b.keyType) &&
        fieldTypesEqual(a.valueType, b.valueType)
      );
    case 'row':
      return b.kind === 'row' && schemasEqual(a.schema, b.schema);
    case 'logical':
      return (
        b.kind === 'logical' &&
        a.identifier === b.identifier &&
        a.representation === b.representation &&
        fieldTypesEqual(a.baseType, b.baseType) &&
        (a.values ?? []).join('\u0000') === (b.values ?? []).join('\u0000')
      );
    default:
      return a.kind === b.kind;
  }
}

/** Structural equality: names, order, nullability, types and descriptions */
export function schemasEqual(a: Schema, b: Schema): boolean {
  if (a.fields.length !== b.fields.length) return false;
  return a.fields.every((fa, i) => {
    const fb = b.fields[i];
    return (
      fb !== undefined &&
      fa.name === fb.name &&
      fa.nullable === fb.nullable &&
      (fa.description ?? '') === (fb.description ?? '') &&
      fieldTypesEqual(fa.type, fb.type)
    );
  });
}
