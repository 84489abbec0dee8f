// Raw syntax tree produced by the schema parser.
//
// Declarations are generic over the representation of types: the parser fills
// them with `TypeExpression`s, the type resolver re-emits them with `TypeKind`s.

import type { TypeKind } from './interface/type-kind';

export interface Position {
  line: number;
  column: number;
}

export interface SourceLocation {
  start: Position;
  end: Position;
  filename?: string;
}

// Type expressions, exactly as written
export type TypeExpression =
  | NamedTypeExpression
  | SequenceTypeExpression
  | RecordTypeExpression
  | NullableTypeExpression;

export interface NamedTypeExpression {
  kind: 'named';
  name: string;
  location: SourceLocation;
}

export interface SequenceTypeExpression {
  kind: 'sequence';
  elementType: TypeExpression;
  location: SourceLocation;
}

/** `record<K, V>`: the WebIDL spelling of a map. */
export interface RecordTypeExpression {
  kind: 'record';
  keyType: TypeExpression;
  valueType: TypeExpression;
  location: SourceLocation;
}

export interface NullableTypeExpression {
  kind: 'nullable';
  innerType: TypeExpression;
  location: SourceLocation;
}

// Literals used as default values
export type Literal =
  | { kind: 'boolean'; value: boolean }
  | { kind: 'integer'; value: string }
  | { kind: 'float'; value: number }
  | { kind: 'string'; value: string }
  | { kind: 'null' }
  | { kind: 'emptySequence' }
  | { kind: 'emptyMap' };

export interface LiteralNode {
  literal: Literal;
  text: string;
  location: SourceLocation;
}

export interface Attribute {
  name: string;
  value?: string;
  location: SourceLocation;
}

export interface ArgumentNode<T> {
  name: string;
  type: T;
  optional: boolean;
  defaultValue?: LiteralNode;
  attributes: Attribute[];
  location: SourceLocation;
}

export interface OperationNode<T> {
  kind: 'operation';
  name: string;
  /** `undefined` for `void`. */
  returnType?: T;
  arguments: ArgumentNode<T>[];
  attributes: Attribute[];
  isStatic: boolean;
  location: SourceLocation;
}

export interface ConstructorNode<T> {
  kind: 'constructor';
  arguments: ArgumentNode<T>[];
  attributes: Attribute[];
  location: SourceLocation;
}

/** `Variant(args);`: a variant carrying fields, in `[Enum]` and `[Error]` interfaces. */
export interface VariantNode<T> {
  kind: 'variant';
  name: string;
  arguments: ArgumentNode<T>[];
  attributes: Attribute[];
  location: SourceLocation;
}

export type InterfaceMember<T> = OperationNode<T> | ConstructorNode<T> | VariantNode<T>;

export interface DictionaryMember<T> {
  name: string;
  type: T;
  required: boolean;
  defaultValue?: LiteralNode;
  attributes: Attribute[];
  location: SourceLocation;
}

export interface EnumVariantNode {
  name: string;
  location: SourceLocation;
}

export interface NamespaceDeclaration<T> {
  kind: 'namespace';
  name: string;
  functions: OperationNode<T>[];
  attributes: Attribute[];
  location: SourceLocation;
}

export interface EnumDeclaration {
  kind: 'enum';
  name: string;
  variants: EnumVariantNode[];
  attributes: Attribute[];
  location: SourceLocation;
}

export interface DictionaryDeclaration<T> {
  kind: 'dictionary';
  name: string;
  members: DictionaryMember<T>[];
  attributes: Attribute[];
  location: SourceLocation;
}

export interface InterfaceDeclaration<T> {
  kind: 'interface';
  name: string;
  members: InterfaceMember<T>[];
  attributes: Attribute[];
  location: SourceLocation;
}

export interface CallbackInterfaceDeclaration<T> {
  kind: 'callbackInterface';
  name: string;
  members: OperationNode<T>[];
  attributes: Attribute[];
  location: SourceLocation;
}

export interface TypedefDeclaration<T> {
  kind: 'typedef';
  name: string;
  type: T;
  attributes: Attribute[];
  location: SourceLocation;
}

export type Declaration<T = TypeExpression> =
  | NamespaceDeclaration<T>
  | EnumDeclaration
  | DictionaryDeclaration<T>
  | InterfaceDeclaration<T>
  | CallbackInterfaceDeclaration<T>
  | TypedefDeclaration<T>;

export interface SchemaDocument {
  kind: 'document';
  filename: string;
  declarations: Declaration[];
}

/** Declarations after type resolution; typedefs have been inlined away. */
export type ResolvedDeclaration = Exclude<Declaration<TypeKind>, TypedefDeclaration<TypeKind>>;

export interface Redeclaration {
  name: string;
  builtin: boolean;
  location: SourceLocation;
}

export interface ResolvedDocument {
  kind: 'resolvedDocument';
  filename: string;
  declarations: ResolvedDeclaration[];
  /**
   * Type names declared more than once, or shadowing a built-in type, in the
   * order they were seen. Only the first declaration of a name is resolvable.
   */
  redeclarations: Redeclaration[];
}

export function hasAttribute(attributes: readonly Attribute[], name: string): boolean {
  return attributes.some(attribute => attribute.name === name);
}

export function findAttribute(attributes: readonly Attribute[], name: string): Attribute | undefined {
  return attributes.find(attribute => attribute.name === name);
}
