// Callback interfaces: foreign implementations called from native code.
//
// The foreign side keeps each implementation in a handle table and exports
// one trampoline per callback interface. Native code holds only the handle
// and calls `trampoline(handle, methodIndex, args)`:
//
// - method index 0 releases the handle
// - `args` is every argument serialized into one buffer; the foreign side frees it
// - the returned buffer holds the return value, the declared error or a
//   message, and is freed by the native side

import { CallbackInterfaceDefinition, CallbackMethodDefinition } from '../interface/model';
import { TypeKind } from '../interface/type-kind';
import { logger } from '../logger';
import { BufferReader, BufferWriter } from './buffer-codec';
import { decodeMessage, encodeMessage } from './call-status';
import {
  DeclaredCallError,
  LoweringError,
  ScaffoldingError,
  StaleHandleError,
  UnexpectedCallbackError
} from './errors';
import { EMPTY_BUFFER, FfiBuffer, isFfiBuffer } from './foreign-buffer';
import { HandleMap } from './handle-map';
import { BufferTransport, liftValue, lowerValue, mapObjects, readValue, TypeRegistry, writeValue } from './lowering';
import { ForeignValue } from './values';

export enum CallbackResultCode {
  Success = 0,
  /** The buffer holds a value of the method's declared error type. */
  Error = 1,
  /** The buffer holds a message. */
  UnexpectedError = 2
}

export interface TrampolineResult {
  code: CallbackResultCode;
  buffer: FfiBuffer;
}

export type ForeignCallback = (handle: bigint, method: number, args: FfiBuffer) => TrampolineResult;

export type CallbackMethod = (...args: unknown[]) => unknown;

/** A foreign implementation of a callback interface: one function per method name. */
export type CallbackImplementation = Record<string, CallbackMethod>;

/**
 * Conversions applied to the objects in values crossing a callback, so each
 * side sees its own representation of an object.
 */
export interface ObjectHooks {
  exportObject?(objectName: string, value: unknown, path: string): unknown;
  importObject?(objectName: string, handle: unknown, path: string): unknown;
}

/** Callback interfaces the registry serves; `ComponentInterface` provides it. */
export interface CallbackTypeRegistry extends TypeRegistry {
  getCallbackInterface(name: string): CallbackInterfaceDefinition | undefined;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function exportObjects(type: TypeKind, value: unknown, hooks: ObjectHooks, path: string): unknown {
  const { exportObject } = hooks;
  return exportObject ? mapObjects(type, value, exportObject, path) : value;
}

function importObjects(type: TypeKind, value: ForeignValue, hooks: ObjectHooks, path: string): unknown {
  const { importObject } = hooks;
  return importObject ? mapObjects(type, value, importObject, path) : value;
}

/** Serializes every argument of a callback method into one byte string. */
export function lowerCallbackArguments(
  method: CallbackMethodDefinition,
  args: readonly unknown[],
  types: TypeRegistry,
  hooks: ObjectHooks = {}
): Uint8Array {
  if (args.length !== method.arguments.length) {
    throw new LoweringError(`${method.name} expects ${method.arguments.length} arguments, got ${args.length}`);
  }
  const writer = new BufferWriter();
  method.arguments.forEach((arg, index) => {
    writeValue(writer, arg.type, exportObjects(arg.type, args[index], hooks, arg.name), types, arg.name);
  });
  return writer.finish();
}

export function liftCallbackArguments(
  method: CallbackMethodDefinition,
  bytes: Uint8Array,
  types: TypeRegistry,
  hooks: ObjectHooks = {}
): unknown[] {
  const reader = new BufferReader(bytes);
  const values = method.arguments.map(arg => importObjects(arg.type, readValue(reader, arg.type, types), hooks, arg.name));
  reader.ensureExhausted();
  return values;
}

function isThenable(value: unknown): value is PromiseLike<unknown> {
  return value !== null && typeof value === 'object' && 'then' in value && typeof value.then === 'function';
}

export function isTrampolineResult(value: unknown): value is TrampolineResult {
  return value !== null
    && typeof value === 'object'
    && 'code' in value
    && (value.code === CallbackResultCode.Success
      || value.code === CallbackResultCode.Error
      || value.code === CallbackResultCode.UnexpectedError)
    && 'buffer' in value
    && isFfiBuffer(value.buffer);
}

interface RegisteredCallback {
  interfaceName: string;
  implementation: CallbackImplementation;
}

/** Foreign-side table of callback implementations and their trampolines. */
export class CallbackRegistry {
  private tables = new Map<string, HandleMap<RegisteredCallback>>();
  private trampolines = new Map<string, ForeignCallback>();

  constructor(
    private readonly types: CallbackTypeRegistry,
    private readonly transport: BufferTransport,
    private readonly hooks: ObjectHooks = {}
  ) {}

  register(interfaceName: string, implementation: unknown): bigint {
    const definition = this.definition(interfaceName);
    if (implementation === null || typeof implementation !== 'object') {
      throw new LoweringError(`Expected an implementation of ${interfaceName}`);
    }
    const methods: CallbackImplementation = {};
    for (const method of definition.methods) {
      const candidate: unknown = Reflect.get(implementation, method.name);
      if (typeof candidate !== 'function') {
        throw new LoweringError(`Implementation of ${interfaceName} is missing method '${method.name}'`);
      }
      methods[method.name] = (...args: unknown[]): unknown => Reflect.apply(candidate, implementation, args);
    }
    return this.table(interfaceName).insert({ interfaceName, implementation: methods });
  }

  /** Drops the foreign side's reference without a trip through native code. */
  release(interfaceName: string, handle: bigint): void {
    this.table(interfaceName).remove(handle);
  }

  liveCount(interfaceName?: string): number {
    if (interfaceName) {
      return this.tables.get(interfaceName)?.size ?? 0;
    }
    let total = 0;
    for (const table of this.tables.values()) {
      total += table.size;
    }
    return total;
  }

  trampolineFor(interfaceName: string): ForeignCallback {
    const existing = this.trampolines.get(interfaceName);
    if (existing) {
      return existing;
    }
    const definition = this.definition(interfaceName);
    const trampoline: ForeignCallback = (handle, method, args) => this.dispatch(definition, handle, method, args);
    this.trampolines.set(interfaceName, trampoline);
    return trampoline;
  }

  private dispatch(definition: CallbackInterfaceDefinition, handle: bigint, index: number, args: FfiBuffer): TrampolineResult {
    const label = `${definition.name}#${index}`;
    let bytes: Uint8Array;
    try {
      bytes = this.transport.consume(args);
    } catch (error) {
      return this.unexpected(`${label}: ${errorMessage(error)}`);
    }

    if (index === 0) {
      try {
        this.table(definition.name).remove(handle);
        return { code: CallbackResultCode.Success, buffer: EMPTY_BUFFER };
      } catch (error) {
        return this.unexpected(`${definition.name}: ${errorMessage(error)}`);
      }
    }

    const method = definition.methods.find(candidate => candidate.index === index);
    if (!method) {
      return this.unexpected(`${definition.name} has no method with index ${index}`);
    }
    const name = `${definition.name}.${method.name}`;

    let result: unknown;
    try {
      const { implementation } = this.table(definition.name).get(handle);
      const values = liftCallbackArguments(method, bytes, this.types, this.hooks);
      result = implementation[method.name](...values);
    } catch (error) {
      return this.failure(name, method, error);
    }

    if (isThenable(result)) {
      Promise.resolve(result).catch(error => logger.warn(`${name} rejected after returning: ${errorMessage(error)}`));
      return this.unexpected(`${name} returned a promise; callback methods are synchronous`);
    }

    if (!method.returnType) {
      return { code: CallbackResultCode.Success, buffer: EMPTY_BUFFER };
    }
    try {
      const value = exportObjects(method.returnType, result, this.hooks, `${name} result`);
      return {
        code: CallbackResultCode.Success,
        buffer: this.transport.allocate(lowerValue(method.returnType, value, this.types, `${name} result`))
      };
    } catch (error) {
      return this.unexpected(`${name}: ${errorMessage(error)}`);
    }
  }

  private failure(name: string, method: CallbackMethodDefinition, error: unknown): TrampolineResult {
    if (error instanceof DeclaredCallError && method.throws && error.errorType === method.throws) {
      try {
        const bytes = lowerValue({ kind: 'error', name: method.throws }, error.value, this.types);
        return { code: CallbackResultCode.Error, buffer: this.transport.allocate(bytes) };
      } catch (loweringError) {
        return this.unexpected(`${name}: ${errorMessage(loweringError)}`);
      }
    }
    return this.unexpected(`${name}: ${errorMessage(error)}`);
  }

  private unexpected(message: string): TrampolineResult {
    logger.debug(`Callback failed unexpectedly: ${message}`);
    return { code: CallbackResultCode.UnexpectedError, buffer: this.transport.allocate(encodeMessage(message)) };
  }

  private definition(interfaceName: string): CallbackInterfaceDefinition {
    const definition = this.types.getCallbackInterface(interfaceName);
    if (!definition) {
      throw new LoweringError(`Unknown callback interface '${interfaceName}'`);
    }
    return definition;
  }

  private table(interfaceName: string): HandleMap<RegisteredCallback> {
    let table = this.tables.get(interfaceName);
    if (!table) {
      table = new HandleMap(`${interfaceName} callback`);
      this.tables.set(interfaceName, table);
    }
    return table;
  }
}

/**
 * What native code holds for a callback argument. Calls go through the
 * trampoline; `release()` gives the handle back. The scaffolding releases a
 * proxy when the call it arrived with returns, unless it was kept.
 */
export class CallbackProxy {
  private kept = false;
  private released = false;

  constructor(
    readonly definition: CallbackInterfaceDefinition,
    readonly handle: bigint,
    private readonly trampoline: ForeignCallback,
    private readonly types: TypeRegistry,
    private readonly transport: BufferTransport,
    private readonly hooks: ObjectHooks = {}
  ) {}

  get isReleased(): boolean {
    return this.released;
  }

  call(methodName: string, ...args: unknown[]): unknown {
    if (this.released) {
      throw new StaleHandleError(`${this.definition.name} callback ${this.handle} has been released`);
    }
    const method = this.definition.methods.find(candidate => candidate.name === methodName);
    if (!method) {
      throw new ScaffoldingError(`${this.definition.name} has no method '${methodName}'`);
    }
    const name = `${this.definition.name}.${method.name}`;

    const argsBuffer = this.transport.allocate(lowerCallbackArguments(method, args, this.types, this.hooks));
    const result = this.invoke(method.index, argsBuffer);

    switch (result.code) {
      case CallbackResultCode.Success: {
        const bytes = this.transport.consume(result.buffer);
        if (!method.returnType) {
          return undefined;
        }
        return importObjects(method.returnType, liftValue(method.returnType, bytes, this.types), this.hooks, `${name} result`);
      }
      case CallbackResultCode.Error: {
        const bytes = this.transport.consume(result.buffer);
        if (!method.throws) {
          throw new UnexpectedCallbackError(`${name} returned an error but declares none`);
        }
        throw new DeclaredCallError(method.throws, liftValue({ kind: 'error', name: method.throws }, bytes, this.types));
      }
      case CallbackResultCode.UnexpectedError:
        throw new UnexpectedCallbackError(decodeMessage(this.transport.consume(result.buffer)) || `${name} failed`);
    }
  }

  /** Keeps the handle alive past the call it arrived with. */
  keep(): this {
    this.kept = true;
    return this;
  }

  release(): void {
    if (this.released) {
      return;
    }
    this.released = true;
    const result = this.invoke(0, EMPTY_BUFFER);
    if (result.code !== CallbackResultCode.Success) {
      const message = decodeMessage(this.transport.consume(result.buffer));
      throw new UnexpectedCallbackError(`Releasing ${this.definition.name} callback ${this.handle} failed: ${message}`);
    }
    this.transport.consume(result.buffer);
  }

  releaseUnlessKept(): void {
    if (!this.kept) {
      this.release();
    }
  }

  private invoke(index: number, args: FfiBuffer): TrampolineResult {
    const result: unknown = this.trampoline(this.handle, index, args);
    if (!isTrampolineResult(result)) {
      throw new UnexpectedCallbackError(`${this.definition.name} trampoline returned a malformed result`);
    }
    return result;
  }
}
