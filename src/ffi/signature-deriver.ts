// Derives the exported scaffolding signature of every callable

import { DuplicateDefinitionError, MissingErrorTypeError } from '../errors';
import { ComponentInterface } from '../interface/component-interface';
import { Callable, callableReturnType, CallbackMethodDefinition, isFlatEnum, qualifiedName } from '../interface/model';
import { ScalarKind, TypeKind } from '../interface/type-kind';
import { logger } from '../logger';
import { FFIArgument, FFIFunction, FFIType } from './ffi-types';

const SCALAR_FFI_TYPES: Record<ScalarKind, FFIType> = {
  boolean: 'int8',
  i8: 'int8',
  u8: 'uint8',
  i16: 'int16',
  u16: 'uint16',
  i32: 'int32',
  u32: 'uint32',
  i64: 'int64',
  u64: 'uint64',
  f32: 'float32',
  f64: 'float64'
};

/** Name of the receiver argument prepended to instance methods. */
export const RECEIVER_ARGUMENT = 'self';

export interface DeriveOptions {
  /** Overrides the whole symbol prefix. */
  ffiPrefix?: string;
  /** Append the first 8 hex digits of the interface checksum to the namespace prefix. */
  checksumSymbols?: boolean;
}

export interface BufferEntryPoints {
  alloc: FFIFunction;
  fromBytes: FFIFunction;
  reserve: FFIFunction;
  free: FFIFunction;
}

export interface CallableSignature {
  callable: Callable;
  ffi: FFIFunction;
}

export interface FfiSignatureSet {
  prefix: string;
  buffer: BufferEntryPoints;
  callables: CallableSignature[];
  objectFrees: { objectName: string; ffi: FFIFunction }[];
  callbackInits: { callbackName: string; ffi: FFIFunction }[];
}

export function lowerTypeToFfi(type: TypeKind, ci: ComponentInterface): FFIType {
  switch (type.kind) {
    case 'scalar':
      return SCALAR_FFI_TYPES[type.scalar];
    case 'timestamp':
      return 'int64';
    case 'duration':
      return 'uint64';
    case 'enum': {
      const definition = ci.getEnum(type.name);
      return definition && isFlatEnum(definition) ? 'int32' : 'buffer';
    }
    case 'object':
      return 'handle';
    case 'callbackInterface':
      return 'callbackHandle';
    case 'string':
    case 'bytes':
    case 'optional':
    case 'sequence':
    case 'map':
    case 'record':
    case 'error':
      return 'buffer';
  }
}

export function computeFfiPrefix(ci: ComponentInterface, options: DeriveOptions = {}): string {
  if (options.ffiPrefix) {
    return options.ffiPrefix;
  }
  const namespace = ci.namespace.name;
  return options.checksumSymbols === false ? namespace : `${namespace}_${ci.checksum().slice(0, 8)}`;
}

function requireErrorType(callable: Callable | CallbackMethodDefinition, owner?: string): string | undefined {
  if (callable.fallible && !callable.throws) {
    throw new MissingErrorTypeError(
      `'${qualifiedName(callable, owner)}' is marked [Throws] but names no error type and the namespace declares no default`,
      { declaration: qualifiedName(callable, owner) }
    );
  }
  return callable.throws;
}

export function callableSymbol(callable: Callable, prefix: string): string {
  return callable.kind === 'function'
    ? `${prefix}_${callable.name}`
    : `${prefix}_${callable.objectName}_${callable.name}`;
}

/** Lowers one callable. Pure: the result depends only on its inputs. */
export function deriveCallableSignature(callable: Callable, ci: ComponentInterface, prefix: string): FFIFunction {
  const errorType = requireErrorType(callable);

  const args: FFIArgument[] = [];
  if (callable.kind === 'method' && !callable.isStatic) {
    args.push({ name: RECEIVER_ARGUMENT, type: 'handle' });
  }
  for (const arg of callable.arguments) {
    args.push({ name: arg.name, type: lowerTypeToFfi(arg.type, ci) });
  }

  const returnType = callableReturnType(callable);
  const ffi: FFIFunction = {
    name: callableSymbol(callable, prefix),
    arguments: args,
    callStatus: errorType ? { errorType } : {}
  };
  if (returnType) {
    ffi.returnType = lowerTypeToFfi(returnType, ci);
  }
  return ffi;
}

function builtin(name: string, args: FFIArgument[], returnType?: FFIType): FFIFunction {
  return returnType ? { name, arguments: args, returnType, callStatus: {} } : { name, arguments: args, callStatus: {} };
}

/** Fails when two declarations derive the same exported symbol. */
function checkUniqueSymbols(entries: { ffi: FFIFunction; label: string; declaration: string }[]): void {
  const seen = new Map<string, string>();
  for (const { ffi, label, declaration } of entries) {
    const previous = seen.get(ffi.name);
    if (previous !== undefined) {
      throw new DuplicateDefinitionError(`Symbol '${ffi.name}' of ${label} clashes with ${previous}`, { declaration });
    }
    seen.set(ffi.name, label);
  }
}

export function deriveSignatures(ci: ComponentInterface, options: DeriveOptions = {}): FfiSignatureSet {
  const prefix = computeFfiPrefix(ci, options);

  // Trampolines need a typed error channel just like exported callables
  for (const callback of ci.callbackInterfaces) {
    callback.methods.forEach(method => requireErrorType(method, callback.name));
  }

  const callables = ci.callables().map(callable => ({
    callable,
    ffi: deriveCallableSignature(callable, ci, prefix)
  }));

  const objectFrees = ci.objects.map(object => ({
    objectName: object.name,
    ffi: builtin(`${prefix}_${object.name}_object_free`, [{ name: 'handle', type: 'handle' }])
  }));

  const callbackInits = ci.callbackInterfaces.map(callback => ({
    callbackName: callback.name,
    ffi: builtin(`${prefix}_${callback.name}_init_callback`, [{ name: 'callback', type: 'foreignCallback' }])
  }));

  const buffer: BufferEntryPoints = {
    alloc: builtin(`${prefix}_buffer_alloc`, [{ name: 'size', type: 'int32' }], 'buffer'),
    fromBytes: builtin(`${prefix}_buffer_from_bytes`, [{ name: 'bytes', type: 'foreignBytes' }], 'buffer'),
    reserve: builtin(
      `${prefix}_buffer_reserve`,
      [{ name: 'buf', type: 'buffer' }, { name: 'additional', type: 'int32' }],
      'buffer'
    ),
    free: builtin(`${prefix}_buffer_free`, [{ name: 'buf', type: 'buffer' }])
  };

  checkUniqueSymbols([
    ...Object.entries(buffer).map(([name, ffi]) => ({ ffi, label: `the built-in buffer ${name} function`, declaration: ffi.name })),
    ...callables.map(({ callable, ffi }) => ({ ffi, label: `'${qualifiedName(callable)}'`, declaration: qualifiedName(callable) })),
    ...objectFrees.map(({ objectName, ffi }) => ({ ffi, label: `the free function of '${objectName}'`, declaration: objectName })),
    ...callbackInits.map(({ callbackName, ffi }) => ({ ffi, label: `the init function of '${callbackName}'`, declaration: callbackName }))
  ]);

  logger.debug(`Derived ${callables.length} callable signatures with prefix '${prefix}'`);

  return { prefix, buffer, callables, objectFrees, callbackInits };
}

/** Every exported function in header order: buffer entry points, callables, frees, callback inits. */
export function allSignatures(set: FfiSignatureSet): FFIFunction[] {
  return [
    set.buffer.alloc,
    set.buffer.fromBytes,
    set.buffer.reserve,
    set.buffer.free,
    ...set.callables.map(entry => entry.ffi),
    ...set.objectFrees.map(entry => entry.ffi),
    ...set.callbackInits.map(entry => entry.ffi)
  ];
}

export function signatureFor(set: FfiSignatureSet, callable: Callable): FFIFunction {
  const entry = set.callables.find(candidate => candidate.callable === callable)
    ?? set.callables.find(candidate => qualifiedName(candidate.callable) === qualifiedName(callable));
  if (!entry) {
    throw new Error(`No signature derived for '${qualifiedName(callable)}'`);
  }
  return entry.ffi;
}
