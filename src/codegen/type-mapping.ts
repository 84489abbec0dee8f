import { BindingRenderer, RenderedFile, RenderInput } from '../codegen-interface';
import { ConfigError } from '../errors';
import { describeTypes } from '../oracle/type-oracle';

/**
 * Writes the oracle's mapping of every type the interface uses as JSON, the
 * input a template renderer for that language starts from.
 */
export class TypeMappingRenderer implements BindingRenderer {
  readonly name = 'type-mapping';

  render(input: RenderInput): RenderedFile[] {
    const { ci, oracle } = input;
    if (!oracle) {
      throw new ConfigError('The type mapping needs a type oracle');
    }
    const mapping = {
      namespace: ci.namespace.name,
      language: oracle.language,
      prefix: input.signatures.prefix,
      types: describeTypes(ci, oracle)
    };
    return [{
      filename: `${ci.namespace.name}.${oracle.language}-types.json`,
      contents: `${JSON.stringify(mapping, null, 2)}\n`
    }];
  }
}
