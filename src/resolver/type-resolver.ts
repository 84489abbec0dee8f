// Resolves syntactic type expressions to semantic type kinds

import { CyclicTypeError, InvalidNestingError, UnknownTypeError } from '../errors';
import {
  isReferenceType, mapType, NamedType, optionalType, scalarType, sequenceType, stringType, TypeKind,
  typeToString, walkType
} from '../interface/type-kind';
import {
  ArgumentNode, Declaration, DictionaryMember, hasAttribute, InterfaceMember, OperationNode, Redeclaration,
  ResolvedDeclaration, ResolvedDocument, SchemaDocument, SourceLocation, TypedefDeclaration, TypeExpression
} from '../types';

export const BUILTIN_TYPES: ReadonlyMap<string, TypeKind> = new Map<string, TypeKind>([
  ['boolean', scalarType('boolean')],
  ['i8', scalarType('i8')],
  ['u8', scalarType('u8')],
  ['i16', scalarType('i16')],
  ['u16', scalarType('u16')],
  ['i32', scalarType('i32')],
  ['u32', scalarType('u32')],
  ['i64', scalarType('i64')],
  ['u64', scalarType('u64')],
  ['float', scalarType('f32')],
  ['double', scalarType('f64')],
  ['f32', scalarType('f32')],
  ['f64', scalarType('f64')],
  ['string', stringType()],
  ['bytes', { kind: 'bytes' }],
  ['timestamp', { kind: 'timestamp' }],
  ['duration', { kind: 'duration' }]
]);

type SymbolEntry =
  | { kind: 'type'; type: NamedType; location: SourceLocation }
  | { kind: 'alias'; declaration: TypedefDeclaration<TypeExpression> };

/** Semantic kind a top-level declaration introduces, or undefined for the namespace. */
export function declaredTypeOf(declaration: Declaration<unknown>): NamedType | undefined {
  const name = declaration.name;
  switch (declaration.kind) {
    case 'enum':
      return hasAttribute(declaration.attributes, 'Error') ? { kind: 'error', name } : { kind: 'enum', name };
    case 'dictionary':
      return { kind: 'record', name };
    case 'interface':
      if (hasAttribute(declaration.attributes, 'Error')) {
        return { kind: 'error', name };
      }
      return hasAttribute(declaration.attributes, 'Enum') ? { kind: 'enum', name } : { kind: 'object', name };
    case 'callbackInterface':
      return { kind: 'callbackInterface', name };
    case 'namespace':
    case 'typedef':
      return undefined;
  }
}

/**
 * Two-pass resolver. The first pass fills the symbol table with every
 * top-level name so that forward references need no special casing; the
 * second substitutes every reference and inlines typedefs.
 */
export class TypeResolver {
  private symbols = new Map<string, SymbolEntry>();
  private aliases = new Map<string, TypeKind>();
  private resolvingAliases: string[] = [];
  private redeclarations: Redeclaration[] = [];
  private currentDeclaration?: string;

  resolve(document: SchemaDocument): ResolvedDocument {
    this.declareSymbols(document.declarations);

    const declarations: ResolvedDeclaration[] = [];
    for (const declaration of document.declarations) {
      if (declaration.kind === 'typedef') {
        // Resolved eagerly so that unused aliases still report their errors
        this.currentDeclaration = declaration.name;
        this.resolveAlias(declaration);
        continue;
      }
      declarations.push(this.resolveDeclaration(declaration));
    }
    this.currentDeclaration = undefined;

    this.checkValueCycles(declarations);

    return {
      kind: 'resolvedDocument',
      filename: document.filename,
      declarations,
      redeclarations: this.redeclarations
    };
  }

  /** Looks a type name up after the symbol table has been populated. */
  lookup(name: string): TypeKind | undefined {
    const builtin = BUILTIN_TYPES.get(name);
    if (builtin) {
      return builtin;
    }
    const entry = this.symbols.get(name);
    if (!entry) {
      return undefined;
    }
    return entry.kind === 'type' ? entry.type : this.resolveAlias(entry.declaration);
  }

  private declareSymbols(declarations: readonly Declaration[]): void {
    for (const declaration of declarations) {
      if (declaration.kind === 'namespace') {
        continue;
      }

      const { name, location } = declaration;
      if (BUILTIN_TYPES.has(name) || this.symbols.has(name)) {
        this.redeclarations.push({ name, builtin: BUILTIN_TYPES.has(name), location });
        continue;
      }

      if (declaration.kind === 'typedef') {
        this.symbols.set(name, { kind: 'alias', declaration });
        continue;
      }
      const type = declaredTypeOf(declaration);
      if (type) {
        this.symbols.set(name, { kind: 'type', type, location });
      }
    }
  }

  private resolveAlias(declaration: TypedefDeclaration<TypeExpression>): TypeKind {
    const cached = this.aliases.get(declaration.name);
    if (cached) {
      return cached;
    }

    const cycleStart = this.resolvingAliases.indexOf(declaration.name);
    if (cycleStart !== -1) {
      const cycle = [...this.resolvingAliases.slice(cycleStart), declaration.name];
      throw new CyclicTypeError(`Typedef cycle: ${cycle.join(' -> ')}`, cycle, {
        location: declaration.location,
        declaration: declaration.name
      });
    }

    this.resolvingAliases.push(declaration.name);
    try {
      const type = this.resolveType(declaration.type);
      this.aliases.set(declaration.name, type);
      return type;
    } finally {
      this.resolvingAliases.pop();
    }
  }

  private resolveDeclaration(declaration: Exclude<Declaration, TypedefDeclaration<TypeExpression>>): ResolvedDeclaration {
    this.currentDeclaration = declaration.name;

    switch (declaration.kind) {
      case 'namespace':
        return { ...declaration, functions: declaration.functions.map(fn => this.resolveOperation(fn)) };
      case 'enum':
        return declaration;
      case 'dictionary':
        return {
          ...declaration,
          members: declaration.members.map(member => this.resolveField(member))
        };
      case 'interface': {
        const isVariantCarrier = declaredTypeOf(declaration)?.kind !== 'object';
        return {
          ...declaration,
          members: declaration.members.map(member => this.resolveInterfaceMember(member, isVariantCarrier))
        };
      }
      case 'callbackInterface':
        return { ...declaration, members: declaration.members.map(member => this.resolveOperation(member)) };
    }
  }

  private resolveInterfaceMember(member: InterfaceMember<TypeExpression>, isVariantCarrier: boolean): InterfaceMember<TypeKind> {
    switch (member.kind) {
      case 'operation':
        return this.resolveOperation(member);
      case 'constructor':
        return { ...member, arguments: member.arguments.map(arg => this.resolveArgument(arg)) };
      case 'variant': {
        const args = member.arguments.map(arg => this.resolveArgument(arg));
        if (isVariantCarrier) {
          for (const arg of args) {
            this.checkValueField(arg.type, `${member.name}.${arg.name}`, arg.location);
          }
        }
        return { ...member, arguments: args };
      }
    }
  }

  private resolveOperation(operation: OperationNode<TypeExpression>): OperationNode<TypeKind> {
    return {
      ...operation,
      returnType: operation.returnType ? this.resolveType(operation.returnType) : undefined,
      arguments: operation.arguments.map(arg => this.resolveArgument(arg))
    };
  }

  private resolveArgument(argument: ArgumentNode<TypeExpression>): ArgumentNode<TypeKind> {
    return { ...argument, type: this.resolveType(argument.type) };
  }

  private resolveField(member: DictionaryMember<TypeExpression>): DictionaryMember<TypeKind> {
    const type = this.resolveType(member.type);
    this.checkValueField(type, member.name, member.location);
    return { ...member, type };
  }

  /** Records and variants are values: no handle type may hide anywhere inside their fields. */
  private checkValueField(type: TypeKind, field: string, location: SourceLocation): void {
    walkType(type, nested => {
      if (isReferenceType(nested)) {
        throw new InvalidNestingError(
          `Field '${field}' of type '${typeToString(type)}' embeds the reference type '${nested.name}'`,
          { location, declaration: this.currentDeclaration }
        );
      }
    });
  }

  resolveType(expression: TypeExpression): TypeKind {
    switch (expression.kind) {
      case 'named': {
        const type = this.lookup(expression.name);
        if (!type) {
          throw new UnknownTypeError(`Unknown type '${expression.name}'`, {
            location: expression.location,
            declaration: this.currentDeclaration
          });
        }
        return type;
      }
      case 'sequence':
        return sequenceType(this.resolveType(expression.elementType));
      case 'record': {
        const key = this.resolveType(expression.keyType);
        if (key.kind !== 'string' && key.kind !== 'scalar') {
          throw new InvalidNestingError(`Map keys must be a string or scalar type, not '${typeToString(key)}'`, {
            location: expression.keyType.location,
            declaration: this.currentDeclaration
          });
        }
        return mapType(key, this.resolveType(expression.valueType));
      }
      case 'nullable': {
        const inner = this.resolveType(expression.innerType);
        if (inner.kind === 'optional') {
          throw new InvalidNestingError(`Optional type '${typeToString(inner)}' cannot be made optional again`, {
            location: expression.location,
            declaration: this.currentDeclaration
          });
        }
        return optionalType(inner);
      }
    }
  }

  /**
   * Rejects records and enums that contain themselves by value. Objects and
   * callbacks are never followed: they are held by handle.
   */
  private checkValueCycles(declarations: readonly ResolvedDeclaration[]): void {
    const edges = new Map<string, { target: string; location: SourceLocation }[]>();

    const addEdges = (owner: string, type: TypeKind, location: SourceLocation) => {
      walkType(type, nested => {
        if (nested.kind === 'record' || nested.kind === 'enum' || nested.kind === 'error') {
          const list = edges.get(owner) ?? [];
          list.push({ target: nested.name, location });
          edges.set(owner, list);
        }
      });
    };

    const seen = new Set<string>();
    for (const declaration of declarations) {
      // Repeats are reported by the builder; only the resolvable first declaration counts
      if (declaration.kind === 'namespace' || seen.has(declaration.name) || BUILTIN_TYPES.has(declaration.name)) {
        continue;
      }
      seen.add(declaration.name);
      if (declaration.kind === 'dictionary') {
        for (const member of declaration.members) {
          addEdges(declaration.name, member.type, member.location);
        }
      } else if (declaration.kind === 'interface' && declaredTypeOf(declaration)?.kind !== 'object') {
        for (const member of declaration.members) {
          if (member.kind === 'variant') {
            member.arguments.forEach(arg => addEdges(declaration.name, arg.type, arg.location));
          }
        }
      }
    }

    const done = new Set<string>();
    const path: string[] = [];

    const visit = (name: string): void => {
      if (done.has(name)) {
        return;
      }
      path.push(name);
      for (const edge of edges.get(name) ?? []) {
        const index = path.indexOf(edge.target);
        if (index !== -1) {
          const cycle = [...path.slice(index), edge.target];
          throw new CyclicTypeError(`Type '${edge.target}' contains itself by value: ${cycle.join(' -> ')}`, cycle, {
            location: edge.location,
            declaration: name
          });
        }
        visit(edge.target);
      }
      path.pop();
      done.add(name);
    };

    for (const name of edges.keys()) {
      visit(name);
    }
  }
}

/** Convenience entry point: resolves a parsed document with a fresh symbol table. */
export function resolveDocument(document: SchemaDocument): ResolvedDocument {
  return new TypeResolver().resolve(document);
}
