// Main pipeline: schema text to Component Interface and FFI signatures

import { promises as fs } from 'fs';
import path from 'path';
import { CHeaderRenderer } from './codegen/c-header';
import { TypeMappingRenderer } from './codegen/type-mapping';
import { BindingRenderer, RenderedFile } from './codegen-interface';
import { BindgenConfig, DEFAULT_CONFIG } from './config';
import { loadInterfaceDump } from './dump';
import { ConfigError } from './errors';
import { deriveSignatures, FfiSignatureSet } from './ffi/signature-deriver';
import { buildInterface } from './interface/builder';
import { ComponentInterface } from './interface/component-interface';
import { logger } from './logger';
import { loadTypeOracle, OracleLanguage } from './oracle/type-oracle';
import { parseSchema } from './parser/parser';
import { resolveDocument } from './resolver/type-resolver';
import { ResolvedDocument, SchemaDocument } from './types';

export interface CompileResult {
  document: SchemaDocument;
  resolved: ResolvedDocument;
  ci: ComponentInterface;
  signatures: FfiSignatureSet;
}

/**
 * Runs every stage in order. Fails fast: the first `BindgenError` is thrown
 * and nothing partial is returned.
 */
export function compileInterface(
  source: string,
  filename: string = 'input',
  config: Partial<BindgenConfig> = {}
): CompileResult {
  const settings: BindgenConfig = { ...DEFAULT_CONFIG, ...config };

  logger.debug(`Parsing ${filename}`);
  const document = parseSchema(source, filename);

  logger.debug(`Resolving ${document.declarations.length} declarations`);
  const resolved = resolveDocument(document);

  const ci = buildInterface(resolved);
  const signatures = deriveSignatures(ci, {
    ffiPrefix: settings.ffiPrefix,
    checksumSymbols: settings.checksumSymbols
  });

  return { document, resolved, ci, signatures };
}

export async function compileFile(filename: string, config: Partial<BindgenConfig> = {}): Promise<CompileResult> {
  let source: string;
  try {
    source = await fs.readFile(filename, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Failed to read schema ${filename}: ${error instanceof Error ? error.message : String(error)}`);
  }
  return compileInterface(source, path.basename(filename), config);
}

/** Reloads a dumped interface and derives its signatures. */
export async function loadDumpFile(
  filename: string,
  config: Partial<BindgenConfig> = {}
): Promise<Pick<CompileResult, 'ci' | 'signatures'>> {
  let text: string;
  try {
    text = await fs.readFile(filename, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Failed to read interface dump ${filename}: ${error instanceof Error ? error.message : String(error)}`);
  }
  const settings: BindgenConfig = { ...DEFAULT_CONFIG, ...config };
  const ci = loadInterfaceDump(text, path.basename(filename));
  const signatures = deriveSignatures(ci, {
    ffiPrefix: settings.ffiPrefix,
    checksumSymbols: settings.checksumSymbols
  });
  return { ci, signatures };
}

export interface RenderRequest {
  header?: boolean;
  types?: OracleLanguage[];
}

/** Renders the requested outputs of a compiled interface. */
export function renderOutputs(result: Pick<CompileResult, 'ci' | 'signatures'>, request: RenderRequest, config: Partial<BindgenConfig> = {}): RenderedFile[] {
  const files: RenderedFile[] = [];
  const run = (renderer: BindingRenderer, language?: OracleLanguage) => {
    const oracle = language ? loadTypeOracle(language) : undefined;
    logger.debug(`Rendering ${renderer.name}${language ? ` for ${language}` : ''}`);
    files.push(...renderer.render({ ci: result.ci, signatures: result.signatures, oracle }));
  };

  if (request.header) {
    run(new CHeaderRenderer({ headerGuard: config.headerGuard }));
  }
  for (const language of request.types ?? []) {
    run(new TypeMappingRenderer(), language);
  }
  return files;
}
