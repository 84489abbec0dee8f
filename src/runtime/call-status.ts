// The out-of-band result slot passed to every exported call

import { stringType } from '../interface/type-kind';
import { DeclaredCallError, GenericCallError, NativePanicError } from './errors';
import { EMPTY_BUFFER, FfiBuffer } from './foreign-buffer';
import { BufferTransport, liftValue, lowerValue, TypeRegistry } from './lowering';

export enum CallStatusCode {
  Ok = 0,
  /** `errorBuffer` holds a serialized value of the declared error type, or a message. */
  Err = 1,
  /** `errorBuffer` holds a diagnostic message. */
  Panic = 2
}

export interface CallStatus {
  code: CallStatusCode;
  errorBuffer: FfiBuffer;
}

export function createCallStatus(): CallStatus {
  return { code: CallStatusCode.Ok, errorBuffer: EMPTY_BUFFER };
}

const NO_TYPES: TypeRegistry = {
  getEnum: () => undefined,
  getRecord: () => undefined
};

export function encodeMessage(message: string): Uint8Array {
  return lowerValue(stringType(), message, NO_TYPES);
}

export function decodeMessage(bytes: Uint8Array): string {
  if (bytes.length === 0) {
    return '';
  }
  const message = liftValue(stringType(), bytes, NO_TYPES);
  return typeof message === 'string' ? message : String(message);
}

/** Native side: fail the call with a typed error value. */
export function setCallError(status: CallStatus, errorBuffer: FfiBuffer): void {
  status.code = CallStatusCode.Err;
  status.errorBuffer = errorBuffer;
}

/** Native side: fail the call with a panic message. */
export function setCallPanic(status: CallStatus, message: string, transport: BufferTransport): void {
  status.code = CallStatusCode.Panic;
  status.errorBuffer = transport.allocate(encodeMessage(message));
}

/**
 * Binding side: turns a non-`Ok` status into the matching exception. The
 * error buffer is consumed in every case.
 */
export function checkCallStatus(
  status: CallStatus,
  errorType: string | undefined,
  types: TypeRegistry,
  transport: BufferTransport
): void {
  switch (status.code) {
    case CallStatusCode.Ok:
      return;

    case CallStatusCode.Err: {
      const bytes = transport.consume(status.errorBuffer);
      if (errorType) {
        throw new DeclaredCallError(errorType, liftValue({ kind: 'error', name: errorType }, bytes, types));
      }
      throw new GenericCallError(decodeMessage(bytes) || 'Call failed without a declared error type');
    }

    case CallStatusCode.Panic: {
      const message = decodeMessage(transport.consume(status.errorBuffer));
      throw new NativePanicError(message || 'Native code panicked without a message');
    }

    default:
      throw new NativePanicError(`Unknown call status code ${String(status.code)}`);
  }
}
