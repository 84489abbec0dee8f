// Semantic type kinds shared by the resolver, the model, the FFI deriver,
// the oracle and the runtime codec.

export type IntegerKind = 'i8' | 'u8' | 'i16' | 'u16' | 'i32' | 'u32' | 'i64' | 'u64';
export type FloatKind = 'f32' | 'f64';
export type ScalarKind = 'boolean' | IntegerKind | FloatKind;

export interface ScalarType {
  kind: 'scalar';
  scalar: ScalarKind;
}

export interface StringType {
  kind: 'string';
}

export interface BytesType {
  kind: 'bytes';
}

export interface TimestampType {
  kind: 'timestamp';
}

export interface DurationType {
  kind: 'duration';
}

export interface OptionalType {
  kind: 'optional';
  inner: TypeKind;
}

export interface SequenceType {
  kind: 'sequence';
  element: TypeKind;
}

export interface MapType {
  kind: 'map';
  key: TypeKind;
  value: TypeKind;
}

export interface EnumType {
  kind: 'enum';
  name: string;
}

export interface RecordType {
  kind: 'record';
  name: string;
}

export interface ObjectType {
  kind: 'object';
  name: string;
}

export interface CallbackInterfaceType {
  kind: 'callbackInterface';
  name: string;
}

export interface ErrorType {
  kind: 'error';
  name: string;
}

export type TypeKind =
  | ScalarType
  | StringType
  | BytesType
  | TimestampType
  | DurationType
  | OptionalType
  | SequenceType
  | MapType
  | EnumType
  | RecordType
  | ObjectType
  | CallbackInterfaceType
  | ErrorType;

export type NamedType = EnumType | RecordType | ObjectType | CallbackInterfaceType | ErrorType;

export interface IntegerRange {
  min: bigint;
  max: bigint;
  bits: 8 | 16 | 32 | 64;
  signed: boolean;
}

export const INTEGER_RANGES: Readonly<Record<IntegerKind, IntegerRange>> = {
  i8: { min: -128n, max: 127n, bits: 8, signed: true },
  u8: { min: 0n, max: 255n, bits: 8, signed: false },
  i16: { min: -32768n, max: 32767n, bits: 16, signed: true },
  u16: { min: 0n, max: 65535n, bits: 16, signed: false },
  i32: { min: -2147483648n, max: 2147483647n, bits: 32, signed: true },
  u32: { min: 0n, max: 4294967295n, bits: 32, signed: false },
  i64: { min: -9223372036854775808n, max: 9223372036854775807n, bits: 64, signed: true },
  u64: { min: 0n, max: 18446744073709551615n, bits: 64, signed: false }
};

export function isIntegerKind(scalar: ScalarKind): scalar is IntegerKind {
  return scalar !== 'boolean' && scalar !== 'f32' && scalar !== 'f64';
}

export function isFloatKind(scalar: ScalarKind): scalar is FloatKind {
  return scalar === 'f32' || scalar === 'f64';
}

/** Reference types cross the boundary by handle and are never embedded by value. */
export function isReferenceType(type: TypeKind): type is ObjectType | CallbackInterfaceType {
  return type.kind === 'object' || type.kind === 'callbackInterface';
}

// Helper constructors
export const scalarType = (scalar: ScalarKind): ScalarType => ({ kind: 'scalar', scalar });
export const stringType = (): StringType => ({ kind: 'string' });
export const optionalType = (inner: TypeKind): OptionalType => ({ kind: 'optional', inner });
export const sequenceType = (element: TypeKind): SequenceType => ({ kind: 'sequence', element });
export const mapType = (key: TypeKind, value: TypeKind): MapType => ({ kind: 'map', key, value });

/** Direct children of a type, i.e. the types it is parameterised by. */
export function typeArguments(type: TypeKind): TypeKind[] {
  switch (type.kind) {
    case 'optional':
      return [type.inner];
    case 'sequence':
      return [type.element];
    case 'map':
      return [type.key, type.value];
    default:
      return [];
  }
}

/**
 * Identifier-safe name that is unique per type, used to name per-type helpers
 * (`Optionalstring`, `Sequenceu32`, `MapstringRecordPoint`).
 */
export function canonicalName(type: TypeKind): string {
  switch (type.kind) {
    case 'scalar':
      return type.scalar;
    case 'string':
    case 'bytes':
    case 'timestamp':
    case 'duration':
      return type.kind;
    case 'optional':
      return `Optional${canonicalName(type.inner)}`;
    case 'sequence':
      return `Sequence${canonicalName(type.element)}`;
    case 'map':
      return `Map${canonicalName(type.key)}${canonicalName(type.value)}`;
    case 'enum':
      return `Enum${type.name}`;
    case 'record':
      return `Record${type.name}`;
    case 'object':
      return `Object${type.name}`;
    case 'callbackInterface':
      return `CallbackInterface${type.name}`;
    case 'error':
      return `Error${type.name}`;
  }
}

/** Schema spelling of a type, for diagnostics. */
export function typeToString(type: TypeKind): string {
  switch (type.kind) {
    case 'scalar':
      return type.scalar;
    case 'string':
    case 'bytes':
    case 'timestamp':
    case 'duration':
      return type.kind;
    case 'optional':
      return `${typeToString(type.inner)}?`;
    case 'sequence':
      return `sequence<${typeToString(type.element)}>`;
    case 'map':
      return `record<${typeToString(type.key)}, ${typeToString(type.value)}>`;
    case 'enum':
    case 'record':
    case 'object':
    case 'callbackInterface':
    case 'error':
      return type.name;
  }
}

/**
 * Visits `type` and every type nested inside it, outermost first. Named types
 * are not expanded into their fields.
 */
export function walkType(type: TypeKind, visit: (type: TypeKind) => void): void {
  visit(type);
  for (const child of typeArguments(type)) {
    walkType(child, visit);
  }
}
