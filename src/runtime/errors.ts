// Run-time failures of the calling convention. These are distinct from the
// build-time `BindgenError`s: they happen while bindings talk to a library.

import type { ForeignValue } from './values';

export class FfiError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** A buffer was freed twice, or used after being freed. */
export class BufferOwnershipError extends FfiError {}

/** Serialized bytes do not match the type they are read as. */
export class BufferFormatError extends FfiError {}

/** A value cannot be lowered as the type it is passed as. */
export class LoweringError extends FfiError {}

export class StaleHandleError extends FfiError {}

export class ObjectDestroyedError extends FfiError {}

/** The native implementation does not match the interface it is exported under. */
export class ScaffoldingError extends FfiError {}

/**
 * `Err` status carrying a value of a declared error enum. Implementations
 * throw it to fail with a declared error; bindings catch it as a normal branch.
 */
export class DeclaredCallError extends FfiError {
  constructor(public readonly errorType: string, public readonly value: ForeignValue) {
    super(`${errorType}: ${describeErrorValue(value)}`);
  }
}

/** `Err` status of a callable that declares no error type. */
export class GenericCallError extends FfiError {}

/** `Panic` status: a broken invariant on the native side. Not retryable. */
export class NativePanicError extends FfiError {}

/** A foreign callback failed with something other than its declared error. */
export class UnexpectedCallbackError extends FfiError {}

function describeErrorValue(value: ForeignValue): string {
  if (typeof value === 'string') {
    return value;
  }
  if (value !== null && typeof value === 'object' && 'variant' in value && typeof value.variant === 'string') {
    return value.variant;
  }
  return String(value);
}
