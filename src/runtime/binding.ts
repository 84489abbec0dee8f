// Binding side of the calling convention: what a generated binding does,
// driven by the Component Interface instead of generated code.

import { ComponentInterface } from '../interface/component-interface';
import { Argument, Callable, callableReturnType, qualifiedName } from '../interface/model';
import { FFIFunction } from '../ffi/ffi-types';
import { FfiSignatureSet, signatureFor } from '../ffi/signature-deriver';
import { logger } from '../logger';
import { checkCallStatus, createCallStatus } from './call-status';
import { CallbackRegistry } from './callbacks';
import { LoweringError, NativePanicError } from './errors';
import { FfiBuffer, isFfiBuffer } from './foreign-buffer';
import { BufferTransport, FfiSlotValue, liftReturn, literalToValue, lowerArgument, mapObjects } from './lowering';
import { ObjectReference } from './object-reference';
import { NativeLibrary } from './scaffolding';

/** What a lowered argument list must undo if lowering stops half way. */
interface PendingArguments {
  slots: FfiSlotValue[];
  buffers: FfiBuffer[];
  callbacks: { interfaceName: string; handle: bigint }[];
}

export class ForeignBinding {
  readonly callbacks: CallbackRegistry;
  private readonly transport: BufferTransport;

  constructor(
    readonly ci: ComponentInterface,
    private readonly signatures: FfiSignatureSet,
    private readonly library: NativeLibrary
  ) {
    this.transport = {
      allocate: bytes => this.allocate(bytes),
      consume: buffer => this.consume(buffer)
    };
    this.callbacks = new CallbackRegistry(ci, this.transport, {
      exportObject: this.objectHandle,
      importObject: this.adoptSlot
    });
    for (const { callbackName, ffi } of signatures.callbackInits) {
      this.invokeBuiltin(ffi, [this.callbacks.trampolineFor(callbackName)]);
    }
  }

  callFunction(name: string, args: readonly unknown[] = []): unknown {
    const fn = this.ci.getFunction(name);
    if (!fn) {
      throw new LoweringError(`Unknown function '${name}'`);
    }
    return this.invoke(fn, [], args);
  }

  construct(objectName: string, args: readonly unknown[] = [], constructorName: string = 'new'): ObjectReference {
    const ctor = this.ci.getObject(objectName)?.constructors.find(candidate => candidate.name === constructorName);
    if (!ctor) {
      throw new LoweringError(`Unknown constructor '${objectName}.${constructorName}'`);
    }
    const result = this.invoke(ctor, [], args);
    if (!(result instanceof ObjectReference)) {
      throw new NativePanicError(`${qualifiedName(ctor)} did not return an object`);
    }
    return result;
  }

  callMethod(target: ObjectReference, methodName: string, args: readonly unknown[] = []): unknown {
    const method = this.findMethod(target.objectName, methodName, false);
    return this.invoke(method, [target.handle], args);
  }

  callStatic(objectName: string, methodName: string, args: readonly unknown[] = []): unknown {
    return this.invoke(this.findMethod(objectName, methodName, true), [], args);
  }

  /**
   * Takes ownership of a handle the native side handed over: a returned
   * object, one inside a returned optional, sequence or map, or one passed to
   * a callback method.
   */
  adopt(objectName: string, handle: bigint): ObjectReference {
    const free = this.signatures.objectFrees.find(entry => entry.objectName === objectName);
    if (!free) {
      throw new LoweringError(`Unknown object type '${objectName}'`);
    }
    return new ObjectReference(objectName, handle, owned => this.invokeBuiltin(free.ffi, [owned]));
  }

  private findMethod(objectName: string, methodName: string, isStatic: boolean): Callable {
    const object = this.ci.getObject(objectName);
    if (!object) {
      throw new LoweringError(`Unknown object type '${objectName}'`);
    }
    const method = object.methods.find(candidate => candidate.name === methodName);
    if (!method || method.isStatic !== isStatic) {
      throw new LoweringError(`${objectName} has no ${isStatic ? 'static' : 'instance'} method '${methodName}'`);
    }
    return method;
  }

  private invoke(callable: Callable, leading: FfiSlotValue[], args: readonly unknown[]): unknown {
    const ffi = signatureFor(this.signatures, callable);
    const name = qualifiedName(callable);
    if (args.length > callable.arguments.length) {
      throw new LoweringError(`${name} takes ${callable.arguments.length} arguments, got ${args.length}`);
    }

    const pending = this.lowerArguments(callable, args);
    const status = createCallStatus();
    // Ownership of every lowered buffer and callback handle passes to the callee here
    const slot = this.library.call(ffi.name, [...leading, ...pending.slots], status);
    checkCallStatus(status, ffi.callStatus.errorType, this.ci, this.transport);

    const returnType = callableReturnType(callable);
    if (!returnType) {
      return undefined;
    }
    const value = liftReturn(returnType, slot, this.ci, this.transport);
    return mapObjects(returnType, value, this.adoptSlot, `${name} result`);
  }

  private lowerArguments(callable: Callable, args: readonly unknown[]): PendingArguments {
    const pending: PendingArguments = { slots: [], buffers: [], callbacks: [] };
    try {
      callable.arguments.forEach((arg, index) => {
        const slot = this.lowerOne(arg, index < args.length ? args[index] : undefined, pending);
        if (isFfiBuffer(slot)) {
          pending.buffers.push(slot);
        }
        pending.slots.push(slot);
      });
    } catch (error) {
      this.unwind(pending);
      throw error;
    }
    return pending;
  }

  private lowerOne(arg: Argument, given: unknown, pending: PendingArguments): FfiSlotValue {
    if (given === undefined && arg.defaultValue) {
      return lowerArgument(arg.type, literalToValue(arg.defaultValue, arg.type), this.ci, this.transport, arg.name);
    }
    switch (arg.type.kind) {
      case 'callbackInterface': {
        const handle = this.callbacks.register(arg.type.name, given);
        pending.callbacks.push({ interfaceName: arg.type.name, handle });
        return handle;
      }
      default: {
        // Objects are borrowed: only their handles cross
        const value = mapObjects(arg.type, given, this.objectHandle, arg.name);
        return lowerArgument(arg.type, value, this.ci, this.transport, arg.name);
      }
    }
  }

  private readonly adoptSlot = (objectName: string, handle: unknown, path: string): ObjectReference => {
    if (typeof handle !== 'bigint') {
      throw new NativePanicError(`${path}: expected a ${objectName} handle`);
    }
    return this.adopt(objectName, handle);
  };

  private readonly objectHandle = (objectName: string, value: unknown, path: string): bigint => {
    if (!(value instanceof ObjectReference)) {
      throw new LoweringError(`${path}: expected a ${objectName} object`);
    }
    if (value.objectName !== objectName) {
      throw new LoweringError(`${path}: expected a ${objectName} object, got ${value.objectName}`);
    }
    return value.handle;
  };

  /** Frees what a failed lowering already produced. */
  private unwind(pending: PendingArguments): void {
    for (const buffer of pending.buffers) {
      this.invokeBuiltin(this.signatures.buffer.free, [buffer]);
    }
    for (const { interfaceName, handle } of pending.callbacks) {
      this.callbacks.release(interfaceName, handle);
    }
    logger.debug(`Released ${pending.buffers.length} buffers and ${pending.callbacks.length} callbacks after a lowering failure`);
  }

  private allocate(bytes: Uint8Array): FfiBuffer {
    const buffer = this.invokeBuiltin(this.signatures.buffer.fromBytes, [bytes]);
    if (!isFfiBuffer(buffer)) {
      throw new NativePanicError(`${this.signatures.buffer.fromBytes.name} did not return a buffer`);
    }
    return buffer;
  }

  private consume(buffer: FfiBuffer): Uint8Array {
    const bytes = this.library.read(buffer);
    this.invokeBuiltin(this.signatures.buffer.free, [buffer]);
    return bytes;
  }

  private invokeBuiltin(ffi: FFIFunction, args: unknown[]): unknown {
    const status = createCallStatus();
    const result = this.library.call(ffi.name, args, status);
    checkCallStatus(status, undefined, this.ci, this.transport);
    return result;
  }
}
