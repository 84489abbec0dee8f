// Main exports for polybind

export { Lexer, TokenType } from './parser/lexer';
export { Parser, parseSchema } from './parser/parser';
export { TypeResolver, resolveDocument, BUILTIN_TYPES } from './resolver/type-resolver';
export { InterfaceBuilder, buildInterface } from './interface/builder';
export { ComponentInterface } from './interface/component-interface';
export { validateInterfaceData } from './interface/validate';
export * from './interface/model';
export * from './interface/type-kind';
export {
  deriveSignatures, deriveCallableSignature, computeFfiPrefix, lowerTypeToFfi, allSignatures, signatureFor,
  RECEIVER_ARGUMENT
} from './ffi/signature-deriver';
export type { DeriveOptions, FfiSignatureSet, CallableSignature, BufferEntryPoints } from './ffi/signature-deriver';
export * from './ffi/ffi-types';
export {
  loadTypeOracle, parseTypeOracle, nativeTypeName, lowerExpression, liftExpression, describeTypes, ORACLE_LANGUAGES
} from './oracle/type-oracle';
export type { TypeOracle, TypeTemplate, OracleLanguage, TypeDescription } from './oracle/type-oracle';
export type { BindingRenderer, RenderInput, RenderedFile } from './codegen-interface';
export { CHeaderRenderer, generateScaffoldingHeader } from './codegen/c-header';
export { TypeMappingRenderer } from './codegen/type-mapping';
export { compileInterface, compileFile, loadDumpFile, renderOutputs } from './bindgen';
export type { CompileResult, RenderRequest } from './bindgen';
export { dumpInterface, serializeInterface, loadInterfaceDump, DUMP_FORMAT, DUMP_VERSION } from './dump';
export { parseConfig, loadConfig, DEFAULT_CONFIG } from './config';
export type { BindgenConfig } from './config';
export * from './errors';
export { logger, Logger, LogLevel } from './logger';
export * from './runtime';
export * from './types';
