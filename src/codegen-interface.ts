// Contract between the core and anything that renders source text from it

import { FfiSignatureSet } from './ffi/signature-deriver';
import { ComponentInterface } from './interface/component-interface';
import { TypeOracle } from './oracle/type-oracle';

export interface RenderInput {
  ci: ComponentInterface;
  signatures: FfiSignatureSet;
  // Only language bindings need one; the C header is language-neutral
  oracle?: TypeOracle;
}

export interface RenderedFile {
  /** Relative to the output directory. */
  filename: string;
  contents: string;
}

export interface BindingRenderer {
  readonly name: string;
  render(input: RenderInput): RenderedFile[];
}
