// Type-directed lowering and lifting of values. Every value is checked
// against its declared type on the way out; bytes are checked on the way in.

import { DefaultValue, EnumDefinition, isFlatEnum, RecordDefinition } from '../interface/model';
import { INTEGER_RANGES, IntegerKind, ScalarKind, TypeKind, typeToString, walkType } from '../interface/type-kind';
import { BufferReader, BufferWriter } from './buffer-codec';
import { BufferFormatError, LoweringError } from './errors';
import { FfiBuffer, isFfiBuffer } from './foreign-buffer';
import { ForeignValue, isMapKey, isPlainObject, MapKey, RecordValue } from './values';

/** Lookups the codec needs; `ComponentInterface` provides them. */
export interface TypeRegistry {
  getEnum(name: string): EnumDefinition | undefined;
  getRecord(name: string): RecordDefinition | undefined;
}

/** How buffers reach the other side: allocate for arguments, consume (read, then free) for results. */
export interface BufferTransport {
  allocate(bytes: Uint8Array): FfiBuffer;
  consume(buffer: FfiBuffer): Uint8Array;
}

/** A value in an FFI argument or return slot. */
export type FfiSlotValue = number | bigint | FfiBuffer;

type NarrowIntegerKind = Exclude<IntegerKind, 'i64' | 'u64'>;

const MAX_HANDLE = INTEGER_RANGES.u64.max;

function describe(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  if (value instanceof Map) return 'Map';
  if (value instanceof Uint8Array) return 'Uint8Array';
  if (typeof value === 'bigint') return `${value}n`;
  if (typeof value === 'string') return JSON.stringify(value);
  if (typeof value === 'object') return 'object';
  return String(value);
}

function mismatch(type: TypeKind | string, value: unknown, path: string): LoweringError {
  const expected = typeof type === 'string' ? type : typeToString(type);
  return new LoweringError(`${path}: expected ${expected}, got ${describe(value)}`);
}

function expectInteger(value: unknown, kind: NarrowIntegerKind, path: string): number {
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw mismatch(kind, value, path);
  }
  const range = INTEGER_RANGES[kind];
  if (BigInt(value) < range.min || BigInt(value) > range.max) {
    throw new LoweringError(`${path}: ${value} is out of range for ${kind}`);
  }
  return value;
}

function expectBigInt(value: unknown, kind: 'i64' | 'u64', path: string): bigint {
  if (typeof value !== 'bigint') {
    throw mismatch(kind, value, path);
  }
  const range = INTEGER_RANGES[kind];
  if (value < range.min || value > range.max) {
    throw new LoweringError(`${path}: ${value} is out of range for ${kind}`);
  }
  return value;
}

function expectFloat(value: unknown, kind: 'f32' | 'f64', path: string): number {
  if (typeof value !== 'number') {
    throw mismatch(kind, value, path);
  }
  return value;
}

function expectHandle(value: unknown, path: string): bigint {
  if (typeof value !== 'bigint' || value <= 0n || value > MAX_HANDLE) {
    throw mismatch('handle', value, path);
  }
  return value;
}

function requireEnum(types: TypeRegistry, name: string): EnumDefinition {
  const definition = types.getEnum(name);
  if (!definition) {
    throw new LoweringError(`Unknown enum '${name}'`);
  }
  return definition;
}

function requireRecord(types: TypeRegistry, name: string): RecordDefinition {
  const definition = types.getRecord(name);
  if (!definition) {
    throw new LoweringError(`Unknown record '${name}'`);
  }
  return definition;
}

function writeScalar(writer: BufferWriter, scalar: ScalarKind, value: unknown, path: string): void {
  switch (scalar) {
    case 'boolean':
      if (typeof value !== 'boolean') {
        throw mismatch('boolean', value, path);
      }
      writer.writeBool(value);
      return;
    case 'i8':
      writer.writeI8(expectInteger(value, scalar, path));
      return;
    case 'u8':
      writer.writeU8(expectInteger(value, scalar, path));
      return;
    case 'i16':
      writer.writeI16(expectInteger(value, scalar, path));
      return;
    case 'u16':
      writer.writeU16(expectInteger(value, scalar, path));
      return;
    case 'i32':
      writer.writeI32(expectInteger(value, scalar, path));
      return;
    case 'u32':
      writer.writeU32(expectInteger(value, scalar, path));
      return;
    case 'i64':
      writer.writeI64(expectBigInt(value, scalar, path));
      return;
    case 'u64':
      writer.writeU64(expectBigInt(value, scalar, path));
      return;
    case 'f32':
      writer.writeF32(expectFloat(value, scalar, path));
      return;
    case 'f64':
      writer.writeF64(expectFloat(value, scalar, path));
      return;
  }
}

function readScalar(reader: BufferReader, scalar: ScalarKind): ForeignValue {
  switch (scalar) {
    case 'boolean':
      return reader.readBool();
    case 'i8':
      return reader.readI8();
    case 'u8':
      return reader.readU8();
    case 'i16':
      return reader.readI16();
    case 'u16':
      return reader.readU16();
    case 'i32':
      return reader.readI32();
    case 'u32':
      return reader.readU32();
    case 'i64':
      return reader.readI64();
    case 'u64':
      return reader.readU64();
    case 'f32':
      return reader.readF32();
    case 'f64':
      return reader.readF64();
  }
}

function rejectUnknownKeys(value: Record<string, unknown>, known: readonly string[], owner: string, path: string): void {
  for (const key of Object.keys(value)) {
    if (!known.includes(key)) {
      throw new LoweringError(`${path}: '${key}' is not a field of ${owner}`);
    }
  }
}

/** Resolves a value of an enum type to its variant and the fields given for it. */
function selectVariant(definition: EnumDefinition, value: unknown, path: string) {
  let variantName: string;
  let fields: Record<string, unknown> = {};

  if (typeof value === 'string') {
    variantName = value;
  } else if (isPlainObject(value)) {
    const { variant: tag, fields: given } = value;
    if (typeof tag !== 'string') {
      throw mismatch(definition.name, value, path);
    }
    variantName = tag;
    if (given !== undefined) {
      if (!isPlainObject(given)) {
        throw new LoweringError(`${path}.fields: expected an object, got ${describe(given)}`);
      }
      fields = given;
    }
  } else {
    throw mismatch(definition.name, value, path);
  }

  const variant = definition.variants.find(candidate => candidate.name === variantName);
  if (!variant) {
    throw new LoweringError(`${path}: '${variantName}' is not a variant of ${definition.name}`);
  }
  return { variant, fields };
}

export function writeValue(writer: BufferWriter, type: TypeKind, value: unknown, types: TypeRegistry, path: string = 'value'): void {
  switch (type.kind) {
    case 'scalar':
      writeScalar(writer, type.scalar, value, path);
      return;

    case 'string':
      if (typeof value !== 'string') {
        throw mismatch(type, value, path);
      }
      writer.writeString(value);
      return;

    case 'bytes':
      if (!(value instanceof Uint8Array)) {
        throw mismatch(type, value, path);
      }
      writer.writeBytes(value);
      return;

    case 'timestamp':
      writer.writeI64(expectBigInt(value, 'i64', path));
      return;

    case 'duration':
      writer.writeU64(expectBigInt(value, 'u64', path));
      return;

    case 'optional':
      if (value === null || value === undefined) {
        writer.writeI8(0);
        return;
      }
      writer.writeI8(1);
      writeValue(writer, type.inner, value, types, path);
      return;

    case 'sequence':
      if (!Array.isArray(value)) {
        throw mismatch(type, value, path);
      }
      writer.writeI32(value.length);
      value.forEach((element: unknown, index) => writeValue(writer, type.element, element, types, `${path}[${index}]`));
      return;

    case 'map':
      if (!(value instanceof Map)) {
        throw mismatch(type, value, path);
      }
      writer.writeI32(value.size);
      for (const [key, entry] of value) {
        writeValue(writer, type.key, key, types, `${path}.key(${describe(key)})`);
        writeValue(writer, type.value, entry, types, `${path}[${describe(key)}]`);
      }
      return;

    case 'record': {
      const definition = requireRecord(types, type.name);
      if (!isPlainObject(value)) {
        throw mismatch(type, value, path);
      }
      rejectUnknownKeys(value, definition.fields.map(field => field.name), type.name, path);
      for (const field of definition.fields) {
        let fieldValue = value[field.name];
        if (fieldValue === undefined) {
          if (!field.defaultValue) {
            throw new LoweringError(`${path}: missing field '${field.name}' of ${type.name}`);
          }
          fieldValue = literalToValue(field.defaultValue, field.type);
        }
        writeValue(writer, field.type, fieldValue, types, `${path}.${field.name}`);
      }
      return;
    }

    case 'enum':
    case 'error': {
      const definition = requireEnum(types, type.name);
      const { variant, fields } = selectVariant(definition, value, path);
      writer.writeI32(variant.discriminant);
      rejectUnknownKeys(fields, variant.fields.map(field => field.name), `${type.name}.${variant.name}`, path);
      for (const field of variant.fields) {
        if (fields[field.name] === undefined) {
          throw new LoweringError(`${path}: missing field '${field.name}' of ${type.name}.${variant.name}`);
        }
        writeValue(writer, field.type, fields[field.name], types, `${path}.${field.name}`);
      }
      return;
    }

    case 'object':
    case 'callbackInterface':
      writer.writeU64(expectHandle(value, path));
      return;
  }
}

export function readValue(reader: BufferReader, type: TypeKind, types: TypeRegistry): ForeignValue {
  switch (type.kind) {
    case 'scalar':
      return readScalar(reader, type.scalar);
    case 'string':
      return reader.readString();
    case 'bytes':
      return reader.readBytes();
    case 'timestamp':
      return reader.readI64();
    case 'duration':
      return reader.readU64();

    case 'optional': {
      const flag = reader.readI8();
      if (flag === 0) {
        return null;
      }
      if (flag !== 1) {
        throw new BufferFormatError(`Invalid optional presence byte ${flag}`);
      }
      return readValue(reader, type.inner, types);
    }

    case 'sequence': {
      const count = reader.readLength();
      const result: ForeignValue[] = [];
      for (let i = 0; i < count; i++) {
        result.push(readValue(reader, type.element, types));
      }
      return result;
    }

    case 'map': {
      const count = reader.readLength();
      const result = new Map<MapKey, ForeignValue>();
      for (let i = 0; i < count; i++) {
        const key = readValue(reader, type.key, types);
        if (!isMapKey(key)) {
          throw new BufferFormatError(`Invalid map key of type ${typeToString(type.key)}`);
        }
        result.set(key, readValue(reader, type.value, types));
      }
      return result;
    }

    case 'record': {
      const definition = requireRecord(types, type.name);
      const result: RecordValue = {};
      for (const field of definition.fields) {
        result[field.name] = readValue(reader, field.type, types);
      }
      return result;
    }

    case 'enum':
    case 'error': {
      const definition = requireEnum(types, type.name);
      const discriminant = reader.readI32();
      const variant = definition.variants.find(candidate => candidate.discriminant === discriminant);
      if (!variant) {
        throw new BufferFormatError(`Invalid discriminant ${discriminant} for ${type.name}`);
      }
      if (isFlatEnum(definition)) {
        return variant.name;
      }
      const fields: RecordValue = {};
      for (const field of variant.fields) {
        fields[field.name] = readValue(reader, field.type, types);
      }
      return { variant: variant.name, fields };
    }

    case 'object':
    case 'callbackInterface': {
      const handle = reader.readU64();
      if (handle === 0n) {
        throw new BufferFormatError(`Null handle for ${type.name}`);
      }
      return handle;
    }
  }
}

export function lowerValue(type: TypeKind, value: unknown, types: TypeRegistry, path?: string): Uint8Array {
  const writer = new BufferWriter();
  writeValue(writer, type, value, types, path);
  return writer.finish();
}

/** Reads one value of `type`; the bytes must hold exactly that value. */
export function liftValue(type: TypeKind, bytes: Uint8Array, types: TypeRegistry): ForeignValue {
  const reader = new BufferReader(bytes);
  const value = readValue(reader, type, types);
  reader.ensureExhausted();
  return value;
}

/** Converts one object found while walking a value; `path` names where it was found. */
export type ObjectConverter = (objectName: string, value: unknown, path: string) => unknown;

function holdsObjects(type: TypeKind): boolean {
  let found = false;
  walkType(type, inner => {
    found = found || inner.kind === 'object';
  });
  return found;
}

/**
 * Rebuilds `value` with every object in it passed through `convert`: the
 * object itself, or one inside an optional, a sequence or a map. Values that
 * do not fit their type come back as they are for the codec to reject.
 */
export function mapObjects(type: TypeKind, value: unknown, convert: ObjectConverter, path: string = 'value'): unknown {
  switch (type.kind) {
    case 'object':
      return convert(type.name, value, path);
    case 'optional':
      return value === null || value === undefined ? value : mapObjects(type.inner, value, convert, path);
    case 'sequence':
      if (!Array.isArray(value) || !holdsObjects(type.element)) {
        return value;
      }
      return value.map((element: unknown, index) => mapObjects(type.element, element, convert, `${path}[${index}]`));
    case 'map': {
      if (!(value instanceof Map) || !holdsObjects(type.value)) {
        return value;
      }
      const converted = new Map<unknown, unknown>();
      for (const [key, entry] of value) {
        converted.set(key, mapObjects(type.value, entry, convert, `${path}[${describe(key)}]`));
      }
      return converted;
    }
    default:
      return value;
  }
}

/** Whether values of `type` travel in a buffer rather than directly in the slot. */
export function passesAsBuffer(type: TypeKind, types: TypeRegistry): boolean {
  switch (type.kind) {
    case 'scalar':
    case 'timestamp':
    case 'duration':
    case 'object':
    case 'callbackInterface':
      return false;
    case 'enum':
      return !isFlatEnum(requireEnum(types, type.name));
    default:
      return true;
  }
}

/** Lowers a top-level argument or return value into its FFI slot. */
export function lowerArgument(
  type: TypeKind,
  value: unknown,
  types: TypeRegistry,
  transport: BufferTransport,
  path: string = 'value'
): FfiSlotValue {
  switch (type.kind) {
    case 'scalar':
      switch (type.scalar) {
        case 'boolean':
          if (typeof value !== 'boolean') {
            throw mismatch('boolean', value, path);
          }
          return value ? 1 : 0;
        case 'i64':
        case 'u64':
          return expectBigInt(value, type.scalar, path);
        case 'f32':
          return Math.fround(expectFloat(value, type.scalar, path));
        case 'f64':
          return expectFloat(value, type.scalar, path);
        default:
          return expectInteger(value, type.scalar, path);
      }
    case 'timestamp':
      return expectBigInt(value, 'i64', path);
    case 'duration':
      return expectBigInt(value, 'u64', path);
    case 'object':
    case 'callbackInterface':
      return expectHandle(value, path);
    default:
      if (type.kind === 'enum' && !passesAsBuffer(type, types)) {
        return selectVariant(requireEnum(types, type.name), value, path).variant.discriminant;
      }
      return transport.allocate(lowerValue(type, value, types, path));
  }
}

function expectSlotNumber(slot: unknown, type: TypeKind): number {
  if (typeof slot !== 'number') {
    throw new BufferFormatError(`Expected a numeric slot for ${typeToString(type)}, got ${describe(slot)}`);
  }
  return slot;
}

function expectSlotBigInt(slot: unknown, type: TypeKind): bigint {
  if (typeof slot !== 'bigint') {
    throw new BufferFormatError(`Expected a 64-bit slot for ${typeToString(type)}, got ${describe(slot)}`);
  }
  return slot;
}

/** Lifts a value out of its FFI slot; buffers are consumed (read, then freed). */
export function liftReturn(type: TypeKind, slot: unknown, types: TypeRegistry, transport: BufferTransport): ForeignValue {
  switch (type.kind) {
    case 'scalar':
      switch (type.scalar) {
        case 'boolean': {
          const byte = expectSlotNumber(slot, type);
          if (byte !== 0 && byte !== 1) {
            throw new BufferFormatError(`Invalid boolean slot ${byte}`);
          }
          return byte === 1;
        }
        case 'i64':
        case 'u64':
          return expectSlotBigInt(slot, type);
        default:
          return expectSlotNumber(slot, type);
      }
    case 'timestamp':
    case 'duration':
    case 'object':
    case 'callbackInterface':
      return expectSlotBigInt(slot, type);
    default: {
      if (type.kind === 'enum' && !passesAsBuffer(type, types)) {
        const discriminant = expectSlotNumber(slot, type);
        const variant = requireEnum(types, type.name).variants.find(candidate => candidate.discriminant === discriminant);
        if (!variant) {
          throw new BufferFormatError(`Invalid discriminant ${discriminant} for ${type.name}`);
        }
        return variant.name;
      }
      if (!isFfiBuffer(slot)) {
        throw new BufferFormatError(`Expected a buffer slot for ${typeToString(type)}, got ${describe(slot)}`);
      }
      return liftValue(type, transport.consume(slot), types);
    }
  }
}

/** Run-time value of a declared default. */
export function literalToValue(literal: DefaultValue, type: TypeKind): ForeignValue {
  if (type.kind === 'optional') {
    return literal.kind === 'null' ? null : literalToValue(literal, type.inner);
  }
  switch (literal.kind) {
    case 'boolean':
    case 'float':
    case 'string':
      return literal.value;
    case 'integer':
      if (type.kind !== 'scalar') {
        throw new LoweringError(`Integer default for non-numeric type ${typeToString(type)}`);
      }
      return type.scalar === 'i64' || type.scalar === 'u64' ? BigInt(literal.value) : Number(literal.value);
    case 'null':
      return null;
    case 'emptySequence':
      return [];
    case 'emptyMap':
      return new Map();
  }
}
