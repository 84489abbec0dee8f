export * from './errors';
export * from './values';
export { BufferHeap, EMPTY_BUFFER, isFfiBuffer, heapTransport } from './foreign-buffer';
export type { FfiBuffer } from './foreign-buffer';
export { BufferReader, BufferWriter } from './buffer-codec';
export {
  lowerValue, liftValue, lowerArgument, liftReturn, passesAsBuffer, literalToValue, writeValue, readValue
} from './lowering';
export type { TypeRegistry, BufferTransport, FfiSlotValue } from './lowering';
export { CallStatusCode, createCallStatus, checkCallStatus, setCallError, setCallPanic } from './call-status';
export type { CallStatus } from './call-status';
export { HandleMap } from './handle-map';
export { ObjectReference } from './object-reference';
export { CallbackRegistry, CallbackProxy, CallbackResultCode } from './callbacks';
export type { ForeignCallback, TrampolineResult, CallbackImplementation } from './callbacks';
export { createScaffolding } from './scaffolding';
export type { NativeLibrary, NativeImplementation, NativeObject, NativeObjectImplementation, NativeCallable } from './scaffolding';
export { ForeignBinding } from './binding';
