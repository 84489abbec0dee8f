// Build-time error taxonomy for polybind

import { SourceLocation } from './types';

export type BindgenErrorKind =
  | 'SyntaxError'
  | 'UnknownTypeError'
  | 'CyclicTypeError'
  | 'InvalidNestingError'
  | 'DuplicateDefinitionError'
  | 'InvalidDefaultError'
  | 'NotAnErrorTypeError'
  | 'MissingErrorTypeError'
  | 'InvalidDeclarationError'
  | 'DumpFormatError'
  | 'ConfigError';

export interface BindgenErrorContext {
  location?: SourceLocation;
  /** Name of the declaration the error was found in, e.g. `Counter.increment`. */
  declaration?: string;
}

/**
 * Base class of every error the generator reports. None of these are
 * recoverable: the pipeline stops at the first one.
 */
export abstract class BindgenError extends Error {
  abstract readonly kind: BindgenErrorKind;
  readonly location?: SourceLocation;
  readonly declaration?: string;

  constructor(message: string, context: BindgenErrorContext = {}) {
    super(message);
    this.name = new.target.name;
    this.location = context.location;
    this.declaration = context.declaration;
  }
}

export class SchemaSyntaxError extends BindgenError {
  readonly kind = 'SyntaxError';
}

export class UnknownTypeError extends BindgenError {
  readonly kind = 'UnknownTypeError';
}

export class CyclicTypeError extends BindgenError {
  readonly kind = 'CyclicTypeError';

  constructor(message: string, public readonly cycle: string[], context: BindgenErrorContext = {}) {
    super(message, context);
  }
}

export class InvalidNestingError extends BindgenError {
  readonly kind = 'InvalidNestingError';
}

export class DuplicateDefinitionError extends BindgenError {
  readonly kind = 'DuplicateDefinitionError';
}

export class InvalidDefaultError extends BindgenError {
  readonly kind = 'InvalidDefaultError';
}

export class NotAnErrorTypeError extends BindgenError {
  readonly kind = 'NotAnErrorTypeError';
}

export class MissingErrorTypeError extends BindgenError {
  readonly kind = 'MissingErrorTypeError';
}

export class InvalidDeclarationError extends BindgenError {
  readonly kind = 'InvalidDeclarationError';
}

export class DumpFormatError extends BindgenError {
  readonly kind = 'DumpFormatError';
}

export class ConfigError extends BindgenError {
  readonly kind = 'ConfigError';
}

export function formatLocation(location: SourceLocation | undefined): string {
  if (!location) {
    return '';
  }
  const segments: string[] = [];
  if (location.filename) {
    segments.push(location.filename);
  }
  segments.push(String(location.start.line), String(location.start.column));
  return segments.join(':');
}

/**
 * Renders an error as `file:line:col: Kind: message (in Decl)`, dropping the
 * parts that are unknown.
 */
export function formatDiagnostic(error: BindgenError): string {
  const location = formatLocation(error.location);
  const suffix = error.declaration ? ` (in ${error.declaration})` : '';
  const body = `${error.kind}: ${error.message}${suffix}`;
  return location ? `${location}: ${body}` : body;
}
