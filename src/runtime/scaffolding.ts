/**
 * In-process native library: the exported surface described by an
 * `FfiSignatureSet`, implemented over plain TypeScript functions.
 *
 * Every exported symbol is reached through `call(symbol, args, status)`.
 * Arguments arrive in their FFI slots; buffers passed in are owned (and
 * freed) here, buffers returned are owned by the caller. Implementations fail
 * a call with a declared error by throwing `DeclaredCallError`; anything else
 * they throw becomes a `Panic`.
 */
import { ComponentInterface } from '../interface/component-interface';
import { Callable, callableReturnType, qualifiedName } from '../interface/model';
import { FFIFunction, FFIType, isWideFfiType } from '../ffi/ffi-types';
import { FfiSignatureSet } from '../ffi/signature-deriver';
import { logger } from '../logger';
import { CallStatus, CallStatusCode, setCallError, setCallPanic } from './call-status';
import { CallbackProxy, ForeignCallback, isTrampolineResult, TrampolineResult } from './callbacks';
import { DeclaredCallError, ScaffoldingError, UnexpectedCallbackError } from './errors';
import { BufferHeap, EMPTY_BUFFER, FfiBuffer, heapTransport, isFfiBuffer } from './foreign-buffer';
import { HandleMap } from './handle-map';
import { BufferTransport, FfiSlotValue, liftReturn, lowerArgument, lowerValue, mapObjects } from './lowering';

export type NativeCallable = (...args: unknown[]) => unknown;

/** A live native object: its instance methods by name. */
export type NativeObject = Record<string, NativeCallable>;

export interface NativeObjectImplementation {
  constructors: Record<string, (...args: unknown[]) => NativeObject>;
  staticMethods?: Record<string, NativeCallable>;
}

export interface NativeImplementation {
  functions?: Record<string, NativeCallable>;
  objects?: Record<string, NativeObjectImplementation>;
}

export interface NativeLibrary {
  readonly prefix: string;
  readonly symbols: readonly string[];
  call(symbol: string, args: readonly unknown[], status: CallStatus): unknown;
  /** Reads a buffer's bytes through its pointer, as foreign code does. */
  read(buffer: FfiBuffer): Uint8Array;
  liveObjects(objectName?: string): number;
}

type SymbolHandler = (args: readonly unknown[], status: CallStatus) => unknown;

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function isNativeObject(value: unknown): value is NativeObject {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return false;
  }
  return Object.values(value).every(member => typeof member === 'function');
}

function zeroSlot(type: FFIType | undefined): FfiSlotValue | undefined {
  if (!type) {
    return undefined;
  }
  if (type === 'buffer') {
    return EMPTY_BUFFER;
  }
  return isWideFfiType(type) ? 0n : 0;
}

function expectArity(ffi: FFIFunction, args: readonly unknown[]): void {
  if (args.length !== ffi.arguments.length) {
    throw new ScaffoldingError(`${ffi.name} takes ${ffi.arguments.length} arguments, got ${args.length}`);
  }
}

function expectNumber(value: unknown, what: string): number {
  if (typeof value !== 'number') {
    throw new ScaffoldingError(`${what}: expected a number`);
  }
  return value;
}

function expectBuffer(value: unknown, what: string): FfiBuffer {
  if (!isFfiBuffer(value)) {
    throw new ScaffoldingError(`${what}: expected a buffer`);
  }
  return value;
}

function expectHandle(value: unknown, what: string): bigint {
  if (typeof value !== 'bigint') {
    throw new ScaffoldingError(`${what}: expected a handle`);
  }
  return value;
}

/** Checks a foreign trampoline's results, whatever the foreign side hands over. */
function wrapTrampoline(candidate: unknown, interfaceName: string): ForeignCallback {
  if (typeof candidate !== 'function') {
    throw new ScaffoldingError(`${interfaceName}_init_callback: expected a function`);
  }
  const callback = candidate;
  return (handle, method, args): TrampolineResult => {
    const result: unknown = Reflect.apply(callback, undefined, [handle, method, args]);
    if (!isTrampolineResult(result)) {
      throw new UnexpectedCallbackError(`${interfaceName} trampoline returned a malformed result`);
    }
    return result;
  };
}

class Scaffolding implements NativeLibrary {
  readonly prefix: string;
  private readonly handlers = new Map<string, SymbolHandler>();
  private readonly objects = new Map<string, HandleMap<NativeObject>>();
  private readonly trampolines = new Map<string, ForeignCallback>();
  private readonly transport: BufferTransport;

  constructor(
    private readonly ci: ComponentInterface,
    signatures: FfiSignatureSet,
    private readonly implementation: NativeImplementation,
    private readonly heap: BufferHeap
  ) {
    this.prefix = signatures.prefix;
    this.transport = heapTransport(heap);

    this.defineBufferEntryPoints(signatures);
    for (const { callable, ffi } of signatures.callables) {
      this.handlers.set(ffi.name, (args, status) => this.invoke(callable, ffi, args, status));
    }
    for (const { objectName, ffi } of signatures.objectFrees) {
      this.objects.set(objectName, new HandleMap(objectName));
      this.handlers.set(ffi.name, args => {
        expectArity(ffi, args);
        this.objectTable(objectName).remove(expectHandle(args[0], ffi.name));
      });
    }
    for (const { callbackName, ffi } of signatures.callbackInits) {
      this.handlers.set(ffi.name, args => {
        expectArity(ffi, args);
        this.trampolines.set(callbackName, wrapTrampoline(args[0], callbackName));
      });
    }
  }

  get symbols(): readonly string[] {
    return [...this.handlers.keys()];
  }

  call(symbol: string, args: readonly unknown[], status: CallStatus): unknown {
    const handler = this.handlers.get(symbol);
    if (!handler) {
      throw new ScaffoldingError(`Library does not export '${symbol}'`);
    }
    status.code = CallStatusCode.Ok;
    status.errorBuffer = EMPTY_BUFFER;
    try {
      return handler(args, status);
    } catch (error) {
      logger.debug(`${symbol} panicked: ${errorMessage(error)}`);
      setCallPanic(status, errorMessage(error), this.transport);
      return undefined;
    }
  }

  read(buffer: FfiBuffer): Uint8Array {
    return this.heap.read(buffer);
  }

  liveObjects(objectName?: string): number {
    if (objectName) {
      return this.objectTable(objectName).size;
    }
    let total = 0;
    for (const table of this.objects.values()) {
      total += table.size;
    }
    return total;
  }

  /** Checks that every callable the interface declares has an implementation. */
  verifyImplementation(): void {
    const missing: string[] = [];
    for (const fn of this.ci.functions) {
      if (typeof this.implementation.functions?.[fn.name] !== 'function') {
        missing.push(fn.name);
      }
    }
    for (const object of this.ci.objects) {
      const impl = this.implementation.objects?.[object.name];
      for (const ctor of object.constructors) {
        if (typeof impl?.constructors[ctor.name] !== 'function') {
          missing.push(qualifiedName(ctor));
        }
      }
      for (const method of object.methods.filter(candidate => candidate.isStatic)) {
        if (typeof impl?.staticMethods?.[method.name] !== 'function') {
          missing.push(qualifiedName(method));
        }
      }
    }
    if (missing.length > 0) {
      throw new ScaffoldingError(`No implementation for ${missing.join(', ')}`);
    }
  }

  private defineBufferEntryPoints(signatures: FfiSignatureSet): void {
    const { alloc, fromBytes, reserve, free } = signatures.buffer;
    this.handlers.set(alloc.name, args => {
      expectArity(alloc, args);
      return this.heap.alloc(expectNumber(args[0], alloc.name));
    });
    this.handlers.set(fromBytes.name, args => {
      expectArity(fromBytes, args);
      const bytes = args[0];
      if (!(bytes instanceof Uint8Array)) {
        throw new ScaffoldingError(`${fromBytes.name}: expected bytes`);
      }
      return this.heap.fromBytes(bytes);
    });
    this.handlers.set(reserve.name, args => {
      expectArity(reserve, args);
      return this.heap.reserve(expectBuffer(args[0], reserve.name), expectNumber(args[1], reserve.name));
    });
    this.handlers.set(free.name, args => {
      expectArity(free, args);
      this.heap.free(expectBuffer(args[0], free.name));
    });
  }

  private invoke(callable: Callable, ffi: FFIFunction, args: readonly unknown[], status: CallStatus): unknown {
    let receiver: NativeObject | undefined;
    try {
      expectArity(ffi, args);
      if (callable.kind === 'method' && !callable.isStatic) {
        receiver = this.objectTable(callable.objectName).get(expectHandle(args[0], 'self'));
      }
    } catch (error) {
      this.freeBuffers(args);
      throw error;
    }

    const proxies: CallbackProxy[] = [];
    try {
      const values = this.liftArguments(callable, args.slice(receiver ? 1 : 0), proxies);
      const result = this.dispatch(callable, receiver, values);
      return this.lowerResult(callable, result);
    } catch (error) {
      if (error instanceof DeclaredCallError && ffi.callStatus.errorType === error.errorType) {
        setCallError(status, this.transport.allocate(
          lowerValue({ kind: 'error', name: error.errorType }, error.value, this.ci)
        ));
        return zeroSlot(ffi.returnType);
      }
      throw error;
    } finally {
      for (const proxy of proxies) {
        proxy.releaseUnlessKept();
      }
    }
  }

  /**
   * Lifts every argument out of its slot. All argument buffers are freed even
   * when an earlier argument fails to lift.
   */
  private liftArguments(callable: Callable, slots: readonly unknown[], proxies: CallbackProxy[]): unknown[] {
    const values: unknown[] = [];
    let failure: unknown;
    callable.arguments.forEach((arg, index) => {
      const slot = slots[index];
      if (failure !== undefined) {
        this.freeBuffers([slot]);
        return;
      }
      try {
        const value = liftReturn(arg.type, slot, this.ci, this.transport);
        if (arg.type.kind === 'callbackInterface' && typeof value === 'bigint') {
          const proxy = this.callbackProxy(arg.type.name, value);
          proxies.push(proxy);
          values.push(proxy);
        } else {
          values.push(mapObjects(
            arg.type,
            value,
            (objectName, handle, path) => this.importObject(objectName, handle, path),
            arg.name
          ));
        }
      } catch (error) {
        failure = error;
      }
    });
    if (failure !== undefined) {
      throw failure;
    }
    return values;
  }

  private freeBuffers(slots: readonly unknown[]): void {
    for (const slot of slots) {
      if (isFfiBuffer(slot) && slot.pointer !== 0 && this.heap.isLive(slot)) {
        this.heap.free(slot);
      }
    }
  }

  private dispatch(callable: Callable, receiver: NativeObject | undefined, values: unknown[]): unknown {
    const name = qualifiedName(callable);
    switch (callable.kind) {
      case 'function': {
        const fn = this.implementation.functions?.[callable.name];
        if (!fn) {
          throw new ScaffoldingError(`No implementation for ${name}`);
        }
        return fn(...values);
      }
      case 'constructor': {
        const ctor = this.implementation.objects?.[callable.objectName]?.constructors[callable.name];
        if (!ctor) {
          throw new ScaffoldingError(`No implementation for ${name}`);
        }
        return ctor(...values);
      }
      case 'method': {
        const method = receiver
          ? receiver[callable.name]
          : this.implementation.objects?.[callable.objectName]?.staticMethods?.[callable.name];
        if (typeof method !== 'function') {
          throw new ScaffoldingError(`No implementation for ${name}`);
        }
        return method(...values);
      }
    }
  }

  private lowerResult(callable: Callable, result: unknown): unknown {
    const returnType = callableReturnType(callable);
    if (!returnType) {
      return undefined;
    }
    const path = `${qualifiedName(callable)} result`;
    const exported: { objectName: string; handle: bigint }[] = [];
    try {
      const lowered = mapObjects(returnType, result, (objectName, value, where) => {
        const handle = this.exportObject(objectName, value, where);
        exported.push({ objectName, handle });
        return handle;
      }, path);
      return lowerArgument(returnType, lowered, this.ci, this.transport, path);
    } catch (error) {
      // The caller never sees these handles
      for (const { objectName, handle } of exported) {
        this.objectTable(objectName).remove(handle);
      }
      throw error;
    }
  }

  /** Hands a native object across as a new handle owned by the receiver. */
  private exportObject(objectName: string, value: unknown, path: string): bigint {
    if (!isNativeObject(value)) {
      throw new ScaffoldingError(`${path}: expected a ${objectName} object`);
    }
    const definition = this.ci.getObject(objectName);
    const missing = definition?.methods
      .filter(method => !method.isStatic && typeof value[method.name] !== 'function')
      .map(method => method.name) ?? [];
    if (missing.length > 0) {
      throw new ScaffoldingError(`${objectName} object is missing ${missing.join(', ')}`);
    }
    return this.objectTable(objectName).insert(value);
  }

  /** Looks up a borrowed handle; the caller keeps ownership. */
  private importObject(objectName: string, handle: unknown, path: string): NativeObject {
    return this.objectTable(objectName).get(expectHandle(handle, path));
  }

  private callbackProxy(interfaceName: string, handle: bigint): CallbackProxy {
    const definition = this.ci.getCallbackInterface(interfaceName);
    const trampoline = this.trampolines.get(interfaceName);
    if (!definition || !trampoline) {
      throw new ScaffoldingError(`No trampoline registered for callback interface ${interfaceName}`);
    }
    return new CallbackProxy(definition, handle, trampoline, this.ci, this.transport, {
      exportObject: (objectName, value, path) => this.exportObject(objectName, value, path),
      importObject: (objectName, objectHandle, path) => this.importObject(objectName, objectHandle, path)
    });
  }

  private objectTable(objectName: string): HandleMap<NativeObject> {
    const table = this.objects.get(objectName);
    if (!table) {
      throw new ScaffoldingError(`Unknown object type '${objectName}'`);
    }
    return table;
  }
}

/**
 * Builds the native side of an interface. Throws `ScaffoldingError` when the
 * implementation does not cover every function, constructor and static method.
 */
export function createScaffolding(
  ci: ComponentInterface,
  signatures: FfiSignatureSet,
  implementation: NativeImplementation,
  heap: BufferHeap = new BufferHeap()
): NativeLibrary {
  const scaffolding = new Scaffolding(ci, signatures, implementation, heap);
  scaffolding.verifyImplementation();
  logger.debug(`Scaffolding exports ${scaffolding.symbols.length} symbols under '${signatures.prefix}'`);
  return scaffolding;
}
