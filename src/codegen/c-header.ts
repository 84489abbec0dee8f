// C declarations of the exported native surface

import { BindingRenderer, RenderedFile, RenderInput } from '../codegen-interface';
import { FFIFunction, FFIType } from '../ffi/ffi-types';
import { allSignatures, FfiSignatureSet } from '../ffi/signature-deriver';
import { ComponentInterface } from '../interface/component-interface';

export interface HeaderOptions {
  /** Include guard; `<NAMESPACE>_FFI_H` when absent. */
  headerGuard?: string;
}

const C_TYPES: Record<FFIType, string> = {
  int8: 'int8_t',
  uint8: 'uint8_t',
  int16: 'int16_t',
  uint16: 'uint16_t',
  int32: 'int32_t',
  uint32: 'uint32_t',
  int64: 'int64_t',
  uint64: 'uint64_t',
  float32: 'float',
  float64: 'double',
  buffer: 'PolybindBuffer',
  foreignBytes: 'PolybindForeignBytes',
  handle: 'uint64_t',
  callbackHandle: 'uint64_t',
  foreignCallback: 'PolybindForeignCallback'
};

// Shared by every generated header, so guarded separately
const SUPPORT_TYPES = `#ifndef POLYBIND_SUPPORT_TYPES
#define POLYBIND_SUPPORT_TYPES

typedef struct PolybindBuffer {
    uint64_t capacity;
    uint64_t len;
    uint8_t *data;
} PolybindBuffer;

typedef struct PolybindForeignBytes {
    int32_t len;
    const uint8_t *data;
} PolybindForeignBytes;

// code: 0 = Ok, 1 = Err (error_buf holds the error), 2 = Panic (error_buf holds a message)
typedef struct PolybindCallStatus {
    int8_t code;
    PolybindBuffer error_buf;
} PolybindCallStatus;

// Returns 0 on success, 1 for a declared error, 2 for anything else; method 0 releases the handle
typedef int32_t (*PolybindForeignCallback)(uint64_t handle, int32_t method, PolybindBuffer args, PolybindBuffer *out_buf);

#endif // POLYBIND_SUPPORT_TYPES
`;

export function cTypeName(type: FFIType): string {
  return C_TYPES[type];
}

export function defaultHeaderGuard(ci: ComponentInterface): string {
  return `${ci.namespace.name.replace(/[^A-Za-z0-9]/g, '_').toUpperCase()}_FFI_H`;
}

export function declareFunction(ffi: FFIFunction): string {
  const params = ffi.arguments.map(arg => `${cTypeName(arg.type)} ${arg.name}`);
  params.push('PolybindCallStatus *out_status');
  const returnType = ffi.returnType ? cTypeName(ffi.returnType) : 'void';
  const declaration = `${returnType} ${ffi.name}(${params.join(', ')});`;
  return ffi.callStatus.errorType ? `// Err: ${ffi.callStatus.errorType}\n${declaration}` : declaration;
}

export function generateScaffoldingHeader(
  ci: ComponentInterface,
  signatures: FfiSignatureSet,
  options: HeaderOptions = {}
): string {
  const guard = options.headerGuard ?? defaultHeaderGuard(ci);
  const declarations = allSignatures(signatures).map(declareFunction);

  let output = `#ifndef ${guard}\n#define ${guard}\n\n`;
  output += `// Exported surface of namespace '${ci.namespace.name}'; interface checksum ${ci.checksum()}\n\n`;
  output += '#include <stdint.h>\n\n';
  output += '#ifdef __cplusplus\nextern "C" {\n#endif\n\n';
  output += SUPPORT_TYPES;
  output += '\n';
  output += declarations.join('\n\n');
  output += '\n\n#ifdef __cplusplus\n}\n#endif\n';
  output += `\n#endif // ${guard}\n`;
  return output;
}

export class CHeaderRenderer implements BindingRenderer {
  readonly name = 'c-header';

  constructor(private readonly options: HeaderOptions = {}) {}

  render(input: RenderInput): RenderedFile[] {
    return [{
      filename: `${input.ci.namespace.name}_ffi.h`,
      contents: generateScaffoldingHeader(input.ci, input.signatures, this.options)
    }];
  }
}
