// Low-level types of the exported native surface

export type FFIType =
  | 'int8'
  | 'uint8'
  | 'int16'
  | 'uint16'
  | 'int32'
  | 'uint32'
  | 'int64'
  | 'uint64'
  | 'float32'
  | 'float64'
  /** `{ pointer, length, capacity }` owned by the receiving side. */
  | 'buffer'
  /** Borrowed `{ length, data }` view of foreign memory; never freed by the callee. */
  | 'foreignBytes'
  | 'handle'
  | 'callbackHandle'
  /** Function pointer of a foreign trampoline. */
  | 'foreignCallback';

export interface FFIArgument {
  name: string;
  type: FFIType;
}

/**
 * Out-of-band result of every call: `Ok`, `Err(buffer)` or `Panic(buffer)`.
 * `errorType` names the error enum an `Err` buffer holds; without one an
 * `Err` carries a generic failure message.
 */
export interface CallStatusSlot {
  errorType?: string;
}

export interface FFIFunction {
  name: string;
  arguments: FFIArgument[];
  /** Absent for `void`. */
  returnType?: FFIType;
  callStatus: CallStatusSlot;
}

/** Whether values of this FFI type are 64 bits wide and surface as bigint. */
export function isWideFfiType(type: FFIType): boolean {
  return type === 'int64' || type === 'uint64' || type === 'handle' || type === 'callbackHandle';
}
