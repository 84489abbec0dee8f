import { compileInterface, CompileResult } from '../src/bindgen';
import { BindgenConfig } from '../src/config';
import { BindgenError } from '../src/errors';
import { ForeignBinding } from '../src/runtime/binding';
import { BufferHeap } from '../src/runtime/foreign-buffer';
import { createScaffolding, NativeImplementation, NativeLibrary } from '../src/runtime/scaffolding';

/** Compiles a schema with checksum-free symbols unless the config says otherwise. */
export function compile(source: string, config: Partial<BindgenConfig> = {}): CompileResult {
  return compileInterface(source, 'test.idl', { checksumSymbols: false, ...config });
}

/** Runs `fn` and returns the `BindgenError` it throws; fails if it throws nothing or something else. */
export function expectBindgenError(fn: () => unknown): BindgenError {
  try {
    fn();
  } catch (error) {
    if (error instanceof BindgenError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected a BindgenError to be thrown');
}

export function compileError(source: string): BindgenError {
  return expectBindgenError(() => compile(source));
}

export interface Harness extends CompileResult {
  heap: BufferHeap;
  library: NativeLibrary;
  binding: ForeignBinding;
}

/** Both sides of the boundary for one schema, wired together in process. */
export function createHarness(source: string, implementation: NativeImplementation): Harness {
  const compiled = compile(source);
  const heap = new BufferHeap();
  const library = createScaffolding(compiled.ci, compiled.signatures, implementation, heap);
  const binding = new ForeignBinding(compiled.ci, compiled.signatures, library);
  return { ...compiled, heap, library, binding };
}
