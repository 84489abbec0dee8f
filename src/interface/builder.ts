// Builds the Component Interface from resolved declarations and validates it
// as a whole. The first failure aborts the build.

import {
  BindgenErrorContext, DuplicateDefinitionError, InvalidDeclarationError, InvalidDefaultError, InvalidNestingError,
  NotAnErrorTypeError, UnknownTypeError
} from '../errors';
import { logger } from '../logger';
import { BUILTIN_TYPES, declaredTypeOf } from '../resolver/type-resolver';
import {
  ArgumentNode, Attribute, CallbackInterfaceDeclaration, DictionaryDeclaration, EnumDeclaration, findAttribute,
  hasAttribute, InterfaceDeclaration, NamespaceDeclaration, OperationNode, ResolvedDeclaration, ResolvedDocument,
  VariantNode
} from '../types';
import { ComponentInterface } from './component-interface';
import { checkDefault } from './defaults';
import {
  Argument, CallbackInterfaceDefinition, CallbackMethodDefinition, ConstructorDefinition, DefaultValue, EnumDefinition, Field,
  FunctionDefinition, MethodDefinition, Namespace, ObjectDefinition, RecordDefinition, Variant
} from './model';
import { NamedType, TypeKind, typeToString, walkType } from './type-kind';

type AttributeSite =
  | 'namespace'
  | 'enum'
  | 'enumInterface'
  | 'dictionary'
  | 'interface'
  | 'callbackInterface'
  | 'function'
  | 'constructor'
  | 'method'
  | 'callbackMethod'
  | 'variant'
  | 'field'
  | 'argument';

const ALLOWED_ATTRIBUTES: Record<AttributeSite, readonly string[]> = {
  namespace: ['Throws'],
  enum: ['Error'],
  enumInterface: ['Enum', 'Error'],
  dictionary: [],
  interface: ['Threadsafe'],
  callbackInterface: [],
  function: ['Throws'],
  constructor: ['Throws', 'Name'],
  method: ['Throws', 'Exclusive'],
  callbackMethod: ['Throws'],
  variant: [],
  field: [],
  argument: ['ByRef']
};

// Whether an attribute takes `=value`
const ATTRIBUTE_VALUES: Record<string, 'required' | 'optional' | 'none'> = {
  Throws: 'optional',
  Name: 'required',
  Enum: 'none',
  Error: 'none',
  Threadsafe: 'none',
  Exclusive: 'none',
  ByRef: 'none'
};

const PRIMARY_CONSTRUCTOR = 'new';

export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/** Tracks names within one scope and rejects the second use of any of them. */
class NameSet {
  private names = new Set<string>();

  constructor(private readonly scope: string) {}

  claim(name: string, what: string, context: BindgenErrorContext): void {
    if (this.names.has(name)) {
      throw new DuplicateDefinitionError(`Duplicate ${what} '${name}' in ${this.scope}`, context);
    }
    this.names.add(name);
  }
}

export class InterfaceBuilder {
  private declaredTypes = new Map<string, NamedType>();
  private enumsByName = new Map<string, EnumDefinition>();
  private defaultError?: string;

  build(document: ResolvedDocument): ComponentInterface {
    this.checkRedeclarations(document);

    for (const declaration of document.declarations) {
      const type = declaredTypeOf(declaration);
      if (type) {
        this.declaredTypes.set(declaration.name, type);
      }
    }

    const namespaceDeclaration = this.findNamespace(document);
    this.defaultError = this.namespaceDefaultError(namespaceDeclaration);

    // Enums first: record defaults may name their variants
    const enums: EnumDefinition[] = [];
    for (const declaration of document.declarations) {
      const definition = this.buildEnumIfAny(declaration);
      if (definition) {
        enums.push(definition);
        this.enumsByName.set(definition.name, definition);
      }
    }

    const records: RecordDefinition[] = [];
    const objects: ObjectDefinition[] = [];
    const callbackInterfaces: CallbackInterfaceDefinition[] = [];
    for (const declaration of document.declarations) {
      if (declaration.kind === 'dictionary') {
        records.push(this.buildRecord(declaration));
      } else if (declaration.kind === 'interface' && declaredTypeOf(declaration)?.kind === 'object') {
        objects.push(this.buildObject(declaration));
      } else if (declaration.kind === 'callbackInterface') {
        callbackInterfaces.push(this.buildCallbackInterface(declaration));
      }
    }

    const namespace = this.buildNamespace(namespaceDeclaration);

    logger.debug(
      `Built interface '${namespace.name}': ${enums.length} enums, ${records.length} records, ` +
      `${objects.length} objects, ${callbackInterfaces.length} callback interfaces, ${namespace.functions.length} functions`
    );

    return new ComponentInterface(deepFreeze({ namespace, enums, records, objects, callbackInterfaces }));
  }

  private checkRedeclarations(document: ResolvedDocument): void {
    const first = document.redeclarations[0];
    if (!first) {
      return;
    }
    const message = first.builtin
      ? `'${first.name}' clashes with a built-in type`
      : `'${first.name}' is already declared`;
    throw new DuplicateDefinitionError(message, { location: first.location, declaration: first.name });
  }

  private findNamespace(document: ResolvedDocument): NamespaceDeclaration<TypeKind> {
    const namespaces = document.declarations.filter(
      (declaration): declaration is NamespaceDeclaration<TypeKind> => declaration.kind === 'namespace'
    );
    if (namespaces.length === 0) {
      throw new InvalidDeclarationError(`'${document.filename}' does not declare a namespace`, {
        location: { start: { line: 1, column: 1 }, end: { line: 1, column: 1 }, filename: document.filename }
      });
    }
    if (namespaces.length > 1) {
      throw new DuplicateDefinitionError(`Only one namespace may be declared; '${namespaces[0].name}' already is`, {
        location: namespaces[1].location,
        declaration: namespaces[1].name
      });
    }
    return namespaces[0];
  }

  private namespaceDefaultError(declaration: NamespaceDeclaration<TypeKind>): string | undefined {
    const context = { location: declaration.location, declaration: declaration.name };
    this.checkAttributes(declaration.attributes, 'namespace', context);
    const throws = findAttribute(declaration.attributes, 'Throws');
    if (!throws) {
      return undefined;
    }
    if (throws.value === undefined) {
      throw new InvalidDeclarationError('A namespace [Throws] must name its default error type', context);
    }
    return this.requireErrorType(throws.value, { location: throws.location, declaration: declaration.name });
  }

  private checkAttributes(attributes: readonly Attribute[], site: AttributeSite, context: BindgenErrorContext): void {
    const seen = new Set<string>();
    for (const attribute of attributes) {
      const location = attribute.location;
      if (!ALLOWED_ATTRIBUTES[site].includes(attribute.name)) {
        throw new InvalidDeclarationError(`Attribute [${attribute.name}] is not allowed on a ${site}`, {
          ...context,
          location
        });
      }
      if (seen.has(attribute.name)) {
        throw new InvalidDeclarationError(`Attribute [${attribute.name}] is given twice`, { ...context, location });
      }
      seen.add(attribute.name);

      const rule = ATTRIBUTE_VALUES[attribute.name];
      if (rule === 'required' && attribute.value === undefined) {
        throw new InvalidDeclarationError(`Attribute [${attribute.name}] needs a value`, { ...context, location });
      }
      if (rule === 'none' && attribute.value !== undefined) {
        throw new InvalidDeclarationError(`Attribute [${attribute.name}] does not take a value`, {
          ...context,
          location
        });
      }
    }
  }

  private requireErrorType(name: string, context: BindgenErrorContext): string {
    const type = this.declaredTypes.get(name);
    if (!type) {
      if (BUILTIN_TYPES.has(name)) {
        throw new NotAnErrorTypeError(`Built-in type '${name}' cannot be thrown`, context);
      }
      throw new UnknownTypeError(`Unknown error type '${name}'`, context);
    }
    if (type.kind !== 'error') {
      throw new NotAnErrorTypeError(`'${name}' is not an enum tagged [Error]`, context);
    }
    return name;
  }

  private resolveThrows(attributes: readonly Attribute[], context: BindgenErrorContext): Pick<FunctionDefinition, 'throws' | 'fallible'> {
    const throws = findAttribute(attributes, 'Throws');
    if (!throws) {
      return { fallible: false };
    }
    if (throws.value === undefined) {
      // Left unset when there is no default; the FFI deriver reports it
      return this.defaultError ? { throws: this.defaultError, fallible: true } : { fallible: true };
    }
    return { throws: this.requireErrorType(throws.value, { ...context, location: throws.location }), fallible: true };
  }

  private checkNotReturningCallback(type: TypeKind | undefined, context: BindgenErrorContext): void {
    if (!type) {
      return;
    }
    walkType(type, nested => {
      if (nested.kind === 'callbackInterface') {
        throw new InvalidNestingError(
          `Callback interface '${nested.name}' can only be passed as an argument, not returned as '${typeToString(type)}'`,
          context
        );
      }
    });
  }

  /** Callback interfaces travel only as a whole argument of an exported callable. */
  private checkCallbackArgument(type: TypeKind, allowCallback: boolean, context: BindgenErrorContext): void {
    walkType(type, nested => {
      if (nested.kind !== 'callbackInterface' || (allowCallback && nested === type)) {
        return;
      }
      throw new InvalidNestingError(
        allowCallback
          ? `Callback interface '${nested.name}' can only be passed as an argument by itself, not as '${typeToString(type)}'`
          : `Callback interface '${nested.name}' cannot be passed to a callback method`,
        context
      );
    });
  }

  private buildArguments(args: readonly ArgumentNode<TypeKind>[], owner: string, allowCallback: boolean = true): Argument[] {
    const names = new NameSet(`'${owner}'`);

    return args.map(arg => {
      const context = { location: arg.location, declaration: owner };
      names.claim(arg.name, 'argument', context);
      this.checkAttributes(arg.attributes, 'argument', context);
      this.checkCallbackArgument(arg.type, allowCallback, context);

      let defaultValue = arg.defaultValue?.literal;
      if (defaultValue) {
        this.checkDefaultValue(defaultValue, arg.type, context);
      } else if (arg.optional) {
        if (arg.type.kind !== 'optional') {
          throw new InvalidDeclarationError(
            `Optional argument '${arg.name}' of non-optional type '${typeToString(arg.type)}' needs a default value`,
            context
          );
        }
        defaultValue = { kind: 'null' };
      }

      const argument: Argument = { name: arg.name, type: arg.type, byRef: hasAttribute(arg.attributes, 'ByRef') };
      if (defaultValue) {
        argument.defaultValue = defaultValue;
      }
      return argument;
    });
  }

  private checkDefaultValue(literal: DefaultValue, type: TypeKind, context: BindgenErrorContext): void {
    const problem = checkDefault(literal, type, name => this.enumsByName.get(name));
    if (problem) {
      throw new InvalidDefaultError(problem, context);
    }
  }

  private buildEnumIfAny(declaration: ResolvedDeclaration): EnumDefinition | undefined {
    if (declaration.kind === 'enum') {
      return this.buildPlainEnum(declaration);
    }
    if (declaration.kind === 'interface' && declaredTypeOf(declaration)?.kind !== 'object') {
      return this.buildEnumInterface(declaration);
    }
    return undefined;
  }

  private buildPlainEnum(declaration: EnumDeclaration): EnumDefinition {
    const context = { location: declaration.location, declaration: declaration.name };
    this.checkAttributes(declaration.attributes, 'enum', context);

    const names = new NameSet(`enum '${declaration.name}'`);
    const variants = declaration.variants.map((variant, index): Variant => {
      names.claim(variant.name, 'variant', { location: variant.location, declaration: declaration.name });
      return { name: variant.name, discriminant: index + 1, fields: [] };
    });

    return { name: declaration.name, isError: hasAttribute(declaration.attributes, 'Error'), variants };
  }

  private buildEnumInterface(declaration: InterfaceDeclaration<TypeKind>): EnumDefinition {
    const context = { location: declaration.location, declaration: declaration.name };
    this.checkAttributes(declaration.attributes, 'enumInterface', context);

    const variantNodes: VariantNode<TypeKind>[] = [];
    for (const member of declaration.members) {
      if (member.kind !== 'variant') {
        const what = member.kind === 'constructor' ? 'a constructor' : `operation '${member.name}'`;
        throw new InvalidDeclarationError(`Enum interface '${declaration.name}' cannot declare ${what}`, {
          location: member.location,
          declaration: declaration.name
        });
      }
      variantNodes.push(member);
    }
    if (variantNodes.length === 0) {
      throw new InvalidDeclarationError(`Enum interface '${declaration.name}' must declare at least one variant`, context);
    }

    const names = new NameSet(`enum '${declaration.name}'`);
    const variants = variantNodes.map((node, index): Variant => {
      const owner = `${declaration.name}.${node.name}`;
      names.claim(node.name, 'variant', { location: node.location, declaration: declaration.name });
      this.checkAttributes(node.attributes, 'variant', { location: node.location, declaration: owner });
      return { name: node.name, discriminant: index + 1, fields: this.buildVariantFields(node, owner) };
    });

    return { name: declaration.name, isError: hasAttribute(declaration.attributes, 'Error'), variants };
  }

  private buildVariantFields(node: VariantNode<TypeKind>, owner: string): Field[] {
    const names = new NameSet(`variant '${owner}'`);
    return node.arguments.map(arg => {
      const context = { location: arg.location, declaration: owner };
      names.claim(arg.name, 'field', context);
      this.checkAttributes(arg.attributes, 'field', context);
      if (arg.defaultValue) {
        throw new InvalidDefaultError(`Variant field '${arg.name}' cannot have a default value`, {
          ...context,
          location: arg.defaultValue.location
        });
      }
      if (arg.optional) {
        throw new InvalidDeclarationError(`Variant field '${arg.name}' cannot be 'optional'`, context);
      }
      return { name: arg.name, type: arg.type, required: false };
    });
  }

  private buildRecord(declaration: DictionaryDeclaration<TypeKind>): RecordDefinition {
    this.checkAttributes(declaration.attributes, 'dictionary', {
      location: declaration.location,
      declaration: declaration.name
    });

    const names = new NameSet(`dictionary '${declaration.name}'`);
    const fields = declaration.members.map((member): Field => {
      const context = { location: member.location, declaration: `${declaration.name}.${member.name}` };
      names.claim(member.name, 'field', context);
      this.checkAttributes(member.attributes, 'field', context);

      const field: Field = { name: member.name, type: member.type, required: member.required };
      if (member.defaultValue) {
        if (member.required) {
          throw new InvalidDefaultError(`Required field '${member.name}' cannot have a default value`, context);
        }
        this.checkDefaultValue(member.defaultValue.literal, member.type, context);
        field.defaultValue = member.defaultValue.literal;
      }
      return field;
    });

    return { name: declaration.name, fields };
  }

  private buildObject(declaration: InterfaceDeclaration<TypeKind>): ObjectDefinition {
    const objectName = declaration.name;
    this.checkAttributes(declaration.attributes, 'interface', { location: declaration.location, declaration: objectName });

    const names = new NameSet(`interface '${objectName}'`);
    const constructors: ConstructorDefinition[] = [];
    const methods: MethodDefinition[] = [];

    for (const member of declaration.members) {
      switch (member.kind) {
        case 'variant':
          throw new InvalidDeclarationError(
            `Variant '${member.name}' is only allowed in [Enum] or [Error] interfaces`,
            { location: member.location, declaration: objectName }
          );

        case 'constructor': {
          const nameAttribute = findAttribute(member.attributes, 'Name');
          const name = nameAttribute?.value ?? PRIMARY_CONSTRUCTOR;
          const context = { location: member.location, declaration: `${objectName}.${name}` };
          this.checkAttributes(member.attributes, 'constructor', context);
          if (nameAttribute && name === PRIMARY_CONSTRUCTOR) {
            throw new InvalidDeclarationError(`'${PRIMARY_CONSTRUCTOR}' is reserved for the primary constructor`, context);
          }
          if (!nameAttribute && constructors.some(existing => existing.isPrimary)) {
            throw new DuplicateDefinitionError(`Interface '${objectName}' declares more than one primary constructor`, context);
          }
          names.claim(name, 'constructor', context);
          constructors.push({
            kind: 'constructor',
            name,
            objectName,
            isPrimary: !nameAttribute,
            arguments: this.buildArguments(member.arguments, context.declaration),
            ...this.resolveThrows(member.attributes, context)
          });
          break;
        }

        case 'operation': {
          const context = { location: member.location, declaration: `${objectName}.${member.name}` };
          this.checkAttributes(member.attributes, 'method', context);
          if (member.name === PRIMARY_CONSTRUCTOR) {
            throw new InvalidDeclarationError(`'${PRIMARY_CONSTRUCTOR}' is reserved for the primary constructor`, context);
          }
          names.claim(member.name, 'method', context);
          this.checkNotReturningCallback(member.returnType, context);
          methods.push({
            kind: 'method',
            name: member.name,
            objectName,
            isStatic: member.isStatic,
            requiresExclusiveAccess: hasAttribute(member.attributes, 'Exclusive'),
            arguments: this.buildArguments(member.arguments, context.declaration),
            ...(member.returnType ? { returnType: member.returnType } : {}),
            ...this.resolveThrows(member.attributes, context)
          });
          break;
        }
      }
    }

    if (constructors.length === 0) {
      constructors.push({
        kind: 'constructor',
        name: PRIMARY_CONSTRUCTOR,
        objectName,
        isPrimary: true,
        arguments: [],
        fallible: false
      });
    }

    return {
      name: objectName,
      threadsafe: hasAttribute(declaration.attributes, 'Threadsafe'),
      constructors,
      methods
    };
  }

  private buildCallbackInterface(declaration: CallbackInterfaceDeclaration<TypeKind>): CallbackInterfaceDefinition {
    this.checkAttributes(declaration.attributes, 'callbackInterface', {
      location: declaration.location,
      declaration: declaration.name
    });

    const names = new NameSet(`callback interface '${declaration.name}'`);
    const methods = declaration.members.map((member, index): CallbackMethodDefinition => {
      const context = { location: member.location, declaration: `${declaration.name}.${member.name}` };
      this.checkAttributes(member.attributes, 'callbackMethod', context);
      this.checkNotStatic(member, context);
      names.claim(member.name, 'method', context);
      this.checkNotReturningCallback(member.returnType, context);
      return {
        name: member.name,
        index: index + 1,
        arguments: this.buildArguments(member.arguments, context.declaration, false),
        ...(member.returnType ? { returnType: member.returnType } : {}),
        ...this.resolveThrows(member.attributes, context)
      };
    });

    return { name: declaration.name, methods };
  }

  private buildNamespace(declaration: NamespaceDeclaration<TypeKind>): Namespace {
    const names = new NameSet(`namespace '${declaration.name}'`);
    const functions = declaration.functions.map((fn): FunctionDefinition => {
      const context = { location: fn.location, declaration: fn.name };
      this.checkAttributes(fn.attributes, 'function', context);
      this.checkNotStatic(fn, context);
      names.claim(fn.name, 'function', context);
      this.checkNotReturningCallback(fn.returnType, context);
      return {
        kind: 'function',
        name: fn.name,
        arguments: this.buildArguments(fn.arguments, fn.name),
        ...(fn.returnType ? { returnType: fn.returnType } : {}),
        ...this.resolveThrows(fn.attributes, context)
      };
    });

    const namespace: Namespace = { name: declaration.name, functions };
    if (this.defaultError) {
      namespace.defaultError = this.defaultError;
    }
    return namespace;
  }

  private checkNotStatic(operation: OperationNode<TypeKind>, context: BindgenErrorContext): void {
    if (operation.isStatic) {
      throw new InvalidDeclarationError(`'${operation.name}' cannot be static outside an interface`, context);
    }
  }
}

export function buildInterface(document: ResolvedDocument): ComponentInterface {
  return new InterfaceBuilder().build(document);
}
