import { createHash } from 'crypto';
import {
  Callable, CallbackInterfaceDefinition, ComponentInterfaceData, EnumDefinition, FunctionDefinition, Namespace,
  ObjectDefinition, RecordDefinition
} from './model';
import { canonicalName, TypeKind, walkType } from './type-kind';

/**
 * The validated, language-neutral model of one schema. Built once by
 * `InterfaceBuilder` (or `loadInterfaceDump`) and never mutated afterwards.
 */
export class ComponentInterface {
  private readonly enumsByName: Map<string, EnumDefinition>;
  private readonly recordsByName: Map<string, RecordDefinition>;
  private readonly objectsByName: Map<string, ObjectDefinition>;
  private readonly callbacksByName: Map<string, CallbackInterfaceDefinition>;
  private typeCache?: TypeKind[];

  constructor(private readonly data: ComponentInterfaceData) {
    this.enumsByName = new Map(data.enums.map(definition => [definition.name, definition]));
    this.recordsByName = new Map(data.records.map(definition => [definition.name, definition]));
    this.objectsByName = new Map(data.objects.map(definition => [definition.name, definition]));
    this.callbacksByName = new Map(data.callbackInterfaces.map(definition => [definition.name, definition]));
  }

  get namespace(): Namespace {
    return this.data.namespace;
  }

  get enums(): readonly EnumDefinition[] {
    return this.data.enums;
  }

  get records(): readonly RecordDefinition[] {
    return this.data.records;
  }

  get objects(): readonly ObjectDefinition[] {
    return this.data.objects;
  }

  get callbackInterfaces(): readonly CallbackInterfaceDefinition[] {
    return this.data.callbackInterfaces;
  }

  get functions(): readonly FunctionDefinition[] {
    return this.data.namespace.functions;
  }

  getEnum(name: string): EnumDefinition | undefined {
    return this.enumsByName.get(name);
  }

  getRecord(name: string): RecordDefinition | undefined {
    return this.recordsByName.get(name);
  }

  getObject(name: string): ObjectDefinition | undefined {
    return this.objectsByName.get(name);
  }

  getCallbackInterface(name: string): CallbackInterfaceDefinition | undefined {
    return this.callbacksByName.get(name);
  }

  getFunction(name: string): FunctionDefinition | undefined {
    return this.functions.find(fn => fn.name === name);
  }

  /** Free functions first, then each object's constructors and methods, all in source order. */
  callables(): Callable[] {
    const result: Callable[] = [...this.functions];
    for (const object of this.data.objects) {
      result.push(...object.constructors, ...object.methods);
    }
    return result;
  }

  /**
   * Every distinct type reachable from the interface, sorted by canonical
   * name. Renderers emit per-type helpers for exactly these.
   */
  iterTypes(): readonly TypeKind[] {
    if (this.typeCache) {
      return this.typeCache;
    }

    const seen = new Map<string, TypeKind>();
    const add = (type: TypeKind | undefined) => {
      if (!type) {
        return;
      }
      walkType(type, nested => {
        const key = canonicalName(nested);
        if (!seen.has(key)) {
          seen.set(key, nested);
        }
      });
    };
    const addError = (name: string | undefined) => {
      if (name) {
        add({ kind: 'error', name });
      }
    };

    for (const definition of this.data.enums) {
      add(definition.isError ? { kind: 'error', name: definition.name } : { kind: 'enum', name: definition.name });
      definition.variants.forEach(variant => variant.fields.forEach(field => add(field.type)));
    }
    for (const definition of this.data.records) {
      add({ kind: 'record', name: definition.name });
      definition.fields.forEach(field => add(field.type));
    }
    for (const definition of this.data.objects) {
      add({ kind: 'object', name: definition.name });
    }
    for (const definition of this.data.callbackInterfaces) {
      add({ kind: 'callbackInterface', name: definition.name });
      for (const method of definition.methods) {
        method.arguments.forEach(arg => add(arg.type));
        add(method.returnType);
        addError(method.throws);
      }
    }
    for (const callable of this.callables()) {
      callable.arguments.forEach(arg => add(arg.type));
      if (callable.kind !== 'constructor') {
        add(callable.returnType);
      }
      addError(callable.throws);
    }

    this.typeCache = [...seen.entries()]
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([, type]) => type);
    return this.typeCache;
  }

  hasAnyType(predicate: (type: TypeKind) => boolean): boolean {
    return this.iterTypes().some(predicate);
  }

  /** Plain data behind this interface, as serialized by `dumpInterface`. */
  toData(): ComponentInterfaceData {
    return this.data;
  }

  /** Hex SHA-256 of the interface's data; changes whenever the wire contract can. */
  checksum(): string {
    return createHash('sha256').update(stableStringify(this.data)).digest('hex');
  }
}

/** JSON with object keys sorted, so equal data always hashes equally. */
function stableStringify(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map(stableStringify).join(',')}]`;
  }
  if (value !== null && typeof value === 'object') {
    const entries = Object.entries(value)
      .filter(([, child]) => child !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([key, child]) => `${JSON.stringify(key)}:${stableStringify(child)}`);
    return `{${entries.join(',')}}`;
  }
  return JSON.stringify(value);
}
