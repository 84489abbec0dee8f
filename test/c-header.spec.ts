import { describe, it, expect } from 'vitest';
import { CHeaderRenderer, cTypeName, declareFunction, defaultHeaderGuard, generateScaffoldingHeader } from '../src/codegen/c-header';
import { compile } from './util';

const { ci, signatures } = compile(`
  [Error] enum MathError { "DivideByZero" };
  interface Counter {
    constructor(u32 start);
    [Throws=MathError] u32 increment();
  };
  callback interface Listener { void tick(u32 count); };
  namespace calc { f64 half(f64 value); };
`);

describe('C header', () => {
  it('maps FFI types to C types', () => {
    expect(cTypeName('int64')).toBe('int64_t');
    expect(cTypeName('float32')).toBe('float');
    expect(cTypeName('buffer')).toBe('PolybindBuffer');
    expect(cTypeName('handle')).toBe('uint64_t');
  });

  it('declares every function with a trailing call status', () => {
    const [half, create, increment] = signatures.callables.map(entry => declareFunction(entry.ffi));
    expect(half).toBe('double calc_half(double value, PolybindCallStatus *out_status);');
    expect(create).toBe('uint64_t calc_Counter_new(uint32_t start, PolybindCallStatus *out_status);');
    expect(increment).toBe('// Err: MathError\nuint32_t calc_Counter_increment(uint64_t self, PolybindCallStatus *out_status);');
  });

  it('declares the built-in entry points', () => {
    expect(declareFunction(signatures.buffer.reserve))
      .toBe('PolybindBuffer calc_buffer_reserve(PolybindBuffer buf, int32_t additional, PolybindCallStatus *out_status);');
    expect(declareFunction(signatures.buffer.free)).toBe('void calc_buffer_free(PolybindBuffer buf, PolybindCallStatus *out_status);');
    expect(declareFunction(signatures.callbackInits[0].ffi))
      .toBe('void calc_Listener_init_callback(PolybindForeignCallback callback, PolybindCallStatus *out_status);');
  });

  it('wraps the declarations in an include guard', () => {
    const header = generateScaffoldingHeader(ci, signatures);
    expect(defaultHeaderGuard(ci)).toBe('CALC_FFI_H');
    expect(header.startsWith(
      '#ifndef CALC_FFI_H\n#define CALC_FFI_H\n\n' +
      `// Exported surface of namespace 'calc'; interface checksum ${ci.checksum()}\n\n` +
      '#include <stdint.h>\n'
    )).toBe(true);
    expect(header.endsWith('#ifdef __cplusplus\n}\n#endif\n\n#endif // CALC_FFI_H\n')).toBe(true);
  });

  it('lists symbols in header order', () => {
    const header = generateScaffoldingHeader(ci, signatures);
    const positions = ['calc_buffer_alloc(', 'calc_buffer_free(', 'calc_half(', 'calc_Counter_increment(', 'calc_Counter_object_free(', 'calc_Listener_init_callback(']
      .map(symbol => header.indexOf(symbol));
    expect(positions.every(position => position > 0)).toBe(true);
    expect([...positions].sort((a, b) => a - b)).toEqual(positions);
  });

  it('takes a custom guard', () => {
    const header = generateScaffoldingHeader(ci, signatures, { headerGuard: 'MY_CALC_H' });
    expect(header.startsWith('#ifndef MY_CALC_H\n#define MY_CALC_H\n')).toBe(true);
  });

  it('renders one file named after the namespace', () => {
    const files = new CHeaderRenderer().render({ ci, signatures });
    expect(files.map(file => file.filename)).toEqual(['calc_ffi.h']);
    expect(files[0].contents).toBe(generateScaffoldingHeader(ci, signatures));
  });
});
