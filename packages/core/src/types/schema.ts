/**
 * Canonical schema types shared by every converter
 *
 * A schema is an ordered list of fields. Field order is significant: it is the
 * positional order of the values in a CanonicalRow.
 */

export type PrimitiveKind =
  | 'byte'
  | 'int16'
  | 'int32'
  | 'int64'
  | 'float32'
  | 'float64'
  | 'decimal'
  | 'boolean'
  | 'string'
  | 'bytes'
  /** An instant at millisecond precision (warehouse TIMESTAMP) */
  | 'datetime';

export interface PrimitiveType {
  kind: PrimitiveKind;
}

export interface ArrayType {
  kind: 'array';
  elementType: FieldType;
  /** Whether individual elements may be null. Defaults to false. */
  elementNullable?: boolean;
}

export interface MapType {
  kind: 'map';
  keyType: FieldType;
  valueType: FieldType;
  /** Whether map values may be null. Keys never are. */
  valueNullable?: boolean;
}

export interface RowType {
  kind: 'row';
  schema: Schema;
}

/**
 * How a logical type is represented on the wire and in text.
 *
 * `custom` marks a logical type the converters know nothing about; it can only
 * cross the schema boundary, never the value boundary.
 */
export type LogicalRepresentation =
  | 'date'
  | 'time'
  | 'datetime'
  | 'time-with-local-tz'
  | 'enum'
  | 'pass-through'
  | 'custom';

export interface LogicalType {
  kind: 'logical';
  identifier: string;
  baseType: FieldType;
  representation: LogicalRepresentation;
  /** Enum labels, indexed by ordinal. Only set for `enum`. */
  values?: readonly string[];
}

export type FieldType = PrimitiveType | ArrayType | MapType | RowType | LogicalType;

export type FieldKind = FieldType['kind'];

export interface Field {
  name: string;
  type: FieldType;
  nullable: boolean;
  description?: string;
}

export interface Schema {
  readonly fields: readonly Field[];
}

export function isPrimitiveType(type: FieldType): type is PrimitiveType {
  return (
    type.kind !== 'array' &&
    type.kind !== 'map' &&
    type.kind !== 'row' &&
    type.kind !== 'logical'
  );
}

/** Arrays and maps are both collections at the warehouse boundary. */
export function isCollectionType(type: FieldType): type is ArrayType | MapType {
  return type.kind === 'array' || type.kind === 'map';
}
