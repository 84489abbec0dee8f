import { Literal } from '../types';
import { EnumDefinition, isFlatEnum } from './model';
import { FloatKind, INTEGER_RANGES, isFloatKind, isIntegerKind, TypeKind, typeToString } from './type-kind';

export type EnumLookup = (name: string) => EnumDefinition | undefined;

function describeLiteral(literal: Literal): string {
  switch (literal.kind) {
    case 'boolean':
      return String(literal.value);
    case 'integer':
      return literal.value;
    case 'float':
      return String(literal.value);
    case 'string':
      return JSON.stringify(literal.value);
    case 'null':
      return 'null';
    case 'emptySequence':
      return '[]';
    case 'emptyMap':
      return '{}';
  }
}

function checkFloat(value: number, text: string, kind: FloatKind): string | undefined {
  if (!Number.isFinite(value) || (kind === 'f32' && !Number.isFinite(Math.fround(value)))) {
    return `Default ${text} is out of range for '${kind}'`;
  }
  return undefined;
}

/**
 * Checks that `literal` can be represented in `type`. Returns a description
 * of the mismatch, or undefined when the default is acceptable.
 */
export function checkDefault(literal: Literal, type: TypeKind, lookupEnum: EnumLookup): string | undefined {
  const mismatch = `Default ${describeLiteral(literal)} is not a valid '${typeToString(type)}'`;

  if (type.kind === 'optional') {
    return literal.kind === 'null' ? undefined : checkDefault(literal, type.inner, lookupEnum);
  }

  switch (literal.kind) {
    case 'boolean':
      return type.kind === 'scalar' && type.scalar === 'boolean' ? undefined : mismatch;

    case 'integer': {
      if (type.kind !== 'scalar' || type.scalar === 'boolean') {
        return mismatch;
      }
      if (isFloatKind(type.scalar)) {
        return checkFloat(Number(literal.value), literal.value, type.scalar);
      }
      if (isIntegerKind(type.scalar)) {
        const range = INTEGER_RANGES[type.scalar];
        const value = BigInt(literal.value);
        if (value < range.min || value > range.max) {
          return `Default ${literal.value} is out of range for '${type.scalar}' (${range.min}..${range.max})`;
        }
      }
      return undefined;
    }

    case 'float':
      return type.kind === 'scalar' && isFloatKind(type.scalar)
        ? checkFloat(literal.value, String(literal.value), type.scalar)
        : mismatch;

    case 'string': {
      if (type.kind === 'string') {
        return undefined;
      }
      if (type.kind !== 'enum') {
        return mismatch;
      }
      const definition = lookupEnum(type.name);
      if (!definition || !isFlatEnum(definition)) {
        return `Enum '${type.name}' has variants with fields and cannot take a default`;
      }
      if (!definition.variants.some(variant => variant.name === literal.value)) {
        return `'${literal.value}' is not a variant of enum '${type.name}'`;
      }
      return undefined;
    }

    case 'null':
      return `null is only a valid default for optional types, not '${typeToString(type)}'`;

    case 'emptySequence':
      return type.kind === 'sequence' ? undefined : mismatch;

    case 'emptyMap':
      return type.kind === 'map' ? undefined : mismatch;
  }
}
