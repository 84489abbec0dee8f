// Entities of the Component Interface. Everything here is plain data: the
// builder deep-freezes it, the dump serializes it as-is.

import type { Literal } from '../types';
import type { TypeKind } from './type-kind';

export type DefaultValue = Literal;

export interface Argument {
  name: string;
  type: TypeKind;
  /** Borrowed rather than owned on the native side; does not change the wire format. */
  byRef: boolean;
  defaultValue?: DefaultValue;
}

export interface Field {
  name: string;
  type: TypeKind;
  required: boolean;
  defaultValue?: DefaultValue;
}

export interface Variant {
  name: string;
  /** 1-based, from source order. */
  discriminant: number;
  fields: Field[];
}

export interface EnumDefinition {
  name: string;
  isError: boolean;
  variants: Variant[];
}

export interface RecordDefinition {
  name: string;
  fields: Field[];
}

export interface FunctionDefinition {
  kind: 'function';
  name: string;
  arguments: Argument[];
  returnType?: TypeKind;
  /** Name of the error enum a failure lifts to. */
  throws?: string;
  fallible: boolean;
}

export interface ConstructorDefinition {
  kind: 'constructor';
  name: string;
  objectName: string;
  isPrimary: boolean;
  arguments: Argument[];
  throws?: string;
  fallible: boolean;
}

export interface MethodDefinition {
  kind: 'method';
  name: string;
  objectName: string;
  isStatic: boolean;
  requiresExclusiveAccess: boolean;
  arguments: Argument[];
  returnType?: TypeKind;
  throws?: string;
  fallible: boolean;
}

export interface ObjectDefinition {
  name: string;
  threadsafe: boolean;
  constructors: ConstructorDefinition[];
  methods: MethodDefinition[];
}

export interface CallbackMethodDefinition {
  name: string;
  /** Trampoline slot; 0 is reserved for releasing the handle. */
  index: number;
  arguments: Argument[];
  returnType?: TypeKind;
  throws?: string;
  fallible: boolean;
}

export interface CallbackInterfaceDefinition {
  name: string;
  methods: CallbackMethodDefinition[];
}

export interface Namespace {
  name: string;
  defaultError?: string;
  functions: FunctionDefinition[];
}

/** Anything the binding side calls into: free functions, constructors, methods. */
export type Callable = FunctionDefinition | ConstructorDefinition | MethodDefinition;

export interface ComponentInterfaceData {
  namespace: Namespace;
  enums: EnumDefinition[];
  records: RecordDefinition[];
  objects: ObjectDefinition[];
  callbackInterfaces: CallbackInterfaceDefinition[];
}

/** Return type of a callable as seen across the boundary; constructors return their object. */
export function callableReturnType(callable: Callable): TypeKind | undefined {
  return callable.kind === 'constructor' ? { kind: 'object', name: callable.objectName } : callable.returnType;
}

/** `Counter.increment`, `Counter.new`, or the bare function name. */
export function qualifiedName(callable: Callable | CallbackMethodDefinition, owner?: string): string {
  if ('objectName' in callable) {
    return `${callable.objectName}.${callable.name}`;
  }
  return owner ? `${owner}.${callable.name}` : callable.name;
}

export function isFlatEnum(definition: EnumDefinition): boolean {
  return definition.variants.every(variant => variant.fields.length === 0);
}
