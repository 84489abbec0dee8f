// Whole-interface validation of Component Interface data that did not come
// from the builder, such as a reloaded dump. Errors carry the declaration they
// were found in but no source location.

import {
  CyclicTypeError, DuplicateDefinitionError, InvalidDeclarationError, InvalidDefaultError, InvalidNestingError,
  NotAnErrorTypeError, UnknownTypeError
} from '../errors';
import { BUILTIN_TYPES } from '../resolver/type-resolver';
import { checkDefault } from './defaults';
import { Argument, ComponentInterfaceData, EnumDefinition, Field } from './model';
import { NamedType, TypeKind, typeToString, walkType } from './type-kind';

function claimAll(names: readonly string[], what: string, scope: string): void {
  const seen = new Set<string>();
  for (const name of names) {
    if (seen.has(name)) {
      throw new DuplicateDefinitionError(`Duplicate ${what} '${name}' in ${scope}`, { declaration: scope });
    }
    seen.add(name);
  }
}

class InterfaceValidator {
  private declared = new Map<string, NamedType>();
  private enums = new Map<string, EnumDefinition>();

  constructor(private readonly data: ComponentInterfaceData) {}

  validate(): void {
    this.declareNames();
    this.checkEnums();
    this.checkRecords();
    this.checkObjects();
    this.checkCallbackInterfaces();
    this.checkNamespace();
    this.checkValueCycles();
  }

  private declareNames(): void {
    const { enums, records, objects, callbackInterfaces } = this.data;
    const named: [string, NamedType][] = [
      ...enums.map((definition): [string, NamedType] => [
        definition.name,
        { kind: definition.isError ? 'error' : 'enum', name: definition.name }
      ]),
      ...records.map((definition): [string, NamedType] => [definition.name, { kind: 'record', name: definition.name }]),
      ...objects.map((definition): [string, NamedType] => [definition.name, { kind: 'object', name: definition.name }]),
      ...callbackInterfaces.map((definition): [string, NamedType] => [
        definition.name,
        { kind: 'callbackInterface', name: definition.name }
      ])
    ];
    for (const [name, type] of named) {
      if (BUILTIN_TYPES.has(name)) {
        throw new DuplicateDefinitionError(`'${name}' clashes with a built-in type`, { declaration: name });
      }
      if (this.declared.has(name)) {
        throw new DuplicateDefinitionError(`'${name}' is already declared`, { declaration: name });
      }
      this.declared.set(name, type);
    }
    for (const definition of enums) {
      this.enums.set(definition.name, definition);
    }
  }

  private checkType(type: TypeKind, declaration: string, valueOnly: boolean): void {
    walkType(type, inner => {
      switch (inner.kind) {
        case 'optional':
          if (inner.inner.kind === 'optional') {
            throw new InvalidNestingError(`'${typeToString(inner)}' nests an optional in an optional`, { declaration });
          }
          return;
        case 'map':
          if (inner.key.kind !== 'string' && inner.key.kind !== 'scalar') {
            throw new InvalidNestingError(`Map key '${typeToString(inner.key)}' must be a string or a scalar`, { declaration });
          }
          return;
        case 'enum':
        case 'error':
        case 'record':
        case 'object':
        case 'callbackInterface': {
          const target = this.declared.get(inner.name);
          if (!target || target.kind !== inner.kind) {
            throw new UnknownTypeError(`Unknown ${inner.kind} type '${inner.name}'`, { declaration });
          }
          if (valueOnly && (inner.kind === 'object' || inner.kind === 'callbackInterface')) {
            throw new InvalidNestingError(
              `'${inner.name}' is passed by reference and cannot appear inside a value type`,
              { declaration }
            );
          }
          return;
        }
        default:
          return;
      }
    });
  }

  private checkFields(fields: readonly Field[], owner: string, isVariant: boolean): void {
    claimAll(fields.map(field => field.name), 'field', owner);
    for (const field of fields) {
      const declaration = `${owner}.${field.name}`;
      this.checkType(field.type, declaration, true);
      if (!field.defaultValue) {
        continue;
      }
      if (isVariant) {
        throw new InvalidDefaultError('Variant fields cannot have default values', { declaration });
      }
      if (field.required) {
        throw new InvalidDefaultError('A required field cannot have a default value', { declaration });
      }
      const problem = checkDefault(field.defaultValue, field.type, name => this.enums.get(name));
      if (problem) {
        throw new InvalidDefaultError(problem, { declaration });
      }
    }
  }

  private checkArguments(args: readonly Argument[], owner: string, allowCallback: boolean = true): void {
    claimAll(args.map(arg => arg.name), 'argument', owner);
    for (const arg of args) {
      const declaration = `${owner}(${arg.name})`;
      this.checkType(arg.type, declaration, false);
      walkType(arg.type, inner => {
        if (inner.kind === 'callbackInterface' && (!allowCallback || inner !== arg.type)) {
          throw new InvalidNestingError(`Callback interface '${inner.name}' can only be passed as an argument by itself`, {
            declaration
          });
        }
      });
      if (arg.defaultValue) {
        const problem = checkDefault(arg.defaultValue, arg.type, name => this.enums.get(name));
        if (problem) {
          throw new InvalidDefaultError(problem, { declaration });
        }
      }
    }
  }

  private checkThrows(throws: string | undefined, declaration: string): void {
    if (throws === undefined) {
      return;
    }
    const target = this.declared.get(throws);
    if (!target) {
      throw new UnknownTypeError(`Unknown error type '${throws}'`, { declaration });
    }
    if (target.kind !== 'error') {
      throw new NotAnErrorTypeError(`'${throws}' is not an [Error] type`, { declaration });
    }
  }

  private checkReturn(type: TypeKind | undefined, declaration: string): void {
    if (!type) {
      return;
    }
    this.checkType(type, declaration, false);
    walkType(type, inner => {
      if (inner.kind === 'callbackInterface') {
        throw new InvalidNestingError(`Callback interface '${inner.name}' can only be passed as an argument`, { declaration });
      }
    });
  }

  private checkEnums(): void {
    for (const definition of this.data.enums) {
      if (definition.variants.length === 0) {
        throw new InvalidDeclarationError(`Enum '${definition.name}' has no variants`, { declaration: definition.name });
      }
      claimAll(definition.variants.map(variant => variant.name), 'variant', definition.name);
      definition.variants.forEach((variant, index) => {
        if (variant.discriminant !== index + 1) {
          throw new InvalidDeclarationError(
            `Variant '${variant.name}' has discriminant ${variant.discriminant}, expected ${index + 1}`,
            { declaration: `${definition.name}.${variant.name}` }
          );
        }
        this.checkFields(variant.fields, `${definition.name}.${variant.name}`, true);
      });
    }
  }

  private checkRecords(): void {
    for (const definition of this.data.records) {
      this.checkFields(definition.fields, definition.name, false);
    }
  }

  private checkObjects(): void {
    for (const object of this.data.objects) {
      claimAll(
        [...object.constructors.map(ctor => ctor.name), ...object.methods.map(method => method.name)],
        'member',
        object.name
      );
      const primaries = object.constructors.filter(ctor => ctor.isPrimary);
      if (primaries.length > 1) {
        throw new DuplicateDefinitionError(`'${object.name}' has more than one primary constructor`, {
          declaration: object.name
        });
      }
      for (const ctor of object.constructors) {
        const declaration = `${object.name}.${ctor.name}`;
        if (ctor.objectName !== object.name) {
          throw new InvalidDeclarationError(`Constructor belongs to '${ctor.objectName}'`, { declaration });
        }
        if (ctor.isPrimary !== (ctor.name === 'new')) {
          throw new InvalidDeclarationError(`'new' is reserved for the primary constructor`, { declaration });
        }
        this.checkArguments(ctor.arguments, declaration);
        this.checkThrows(ctor.throws, declaration);
      }
      for (const method of object.methods) {
        const declaration = `${object.name}.${method.name}`;
        if (method.objectName !== object.name) {
          throw new InvalidDeclarationError(`Method belongs to '${method.objectName}'`, { declaration });
        }
        this.checkArguments(method.arguments, declaration);
        this.checkReturn(method.returnType, declaration);
        this.checkThrows(method.throws, declaration);
      }
    }
  }

  private checkCallbackInterfaces(): void {
    for (const callback of this.data.callbackInterfaces) {
      claimAll(callback.methods.map(method => method.name), 'method', callback.name);
      callback.methods.forEach((method, index) => {
        const declaration = `${callback.name}.${method.name}`;
        if (method.index !== index + 1) {
          throw new InvalidDeclarationError(`Callback method has index ${method.index}, expected ${index + 1}`, {
            declaration
          });
        }
        this.checkArguments(method.arguments, declaration, false);
        this.checkReturn(method.returnType, declaration);
        this.checkThrows(method.throws, declaration);
      });
    }
  }

  private checkNamespace(): void {
    const { namespace } = this.data;
    this.checkThrows(namespace.defaultError, namespace.name);
    claimAll(namespace.functions.map(fn => fn.name), 'function', namespace.name);
    for (const fn of namespace.functions) {
      this.checkArguments(fn.arguments, fn.name);
      this.checkReturn(fn.returnType, fn.name);
      this.checkThrows(fn.throws, fn.name);
    }
  }

  private valueEdges(name: string): string[] {
    const fields: Field[] = [];
    const record = this.data.records.find(definition => definition.name === name);
    if (record) {
      fields.push(...record.fields);
    }
    const definition = this.enums.get(name);
    if (definition) {
      definition.variants.forEach(variant => fields.push(...variant.fields));
    }
    const edges: string[] = [];
    for (const field of fields) {
      walkType(field.type, inner => {
        if (inner.kind === 'record' || inner.kind === 'enum' || inner.kind === 'error') {
          edges.push(inner.name);
        }
      });
    }
    return edges;
  }

  private checkValueCycles(): void {
    const done = new Set<string>();
    const path: string[] = [];

    const visit = (name: string): void => {
      const index = path.indexOf(name);
      if (index >= 0) {
        const cycle = [...path.slice(index), name];
        throw new CyclicTypeError(`Type '${name}' contains itself by value: ${cycle.join(' -> ')}`, cycle, {
          declaration: name
        });
      }
      if (done.has(name)) {
        return;
      }
      path.push(name);
      this.valueEdges(name).forEach(visit);
      path.pop();
      done.add(name);
    };

    [...this.data.records.map(record => record.name), ...this.data.enums.map(definition => definition.name)].forEach(visit);
  }
}

/** Validates interface data as a whole; throws the first `BindgenError` found. */
export function validateInterfaceData(data: ComponentInterfaceData): void {
  new InterfaceValidator(data).validate();
}
