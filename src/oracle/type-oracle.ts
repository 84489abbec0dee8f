/**
 * Type Oracle: per-language tables mapping every type kind to a native type
 * name and to the expressions that lower and lift a value of it. The tables
 * are data; this module only validates and expands them.
 *
 * Template placeholders:
 * - `{value}`: the expression being converted (lower/lift only)
 * - `{inner}`: native name of an optional's or sequence's element, or a map's value
 * - `{key}`: native name of a map's key
 * - `{name}`: declared name of an enum, record, object, callback or error
 * - `{canonical}`: canonical name of the type, e.g. `SequenceOptionalstring`
 */
import { z } from 'zod';
import { ConfigError } from '../errors';
import { ComponentInterface } from '../interface/component-interface';
import { canonicalName, TypeKind } from '../interface/type-kind';
import kotlinTable from './tables/kotlin.json';
import pythonTable from './tables/python.json';
import swiftTable from './tables/swift.json';

export const TypeTemplateSchema = z.object({
  type: z.string().min(1),
  lower: z.string().min(1),
  lift: z.string().min(1)
});

/** Every type kind tag must be present; scalars are keyed by their width. */
export const OracleTypesSchema = z.object({
  boolean: TypeTemplateSchema,
  i8: TypeTemplateSchema,
  u8: TypeTemplateSchema,
  i16: TypeTemplateSchema,
  u16: TypeTemplateSchema,
  i32: TypeTemplateSchema,
  u32: TypeTemplateSchema,
  i64: TypeTemplateSchema,
  u64: TypeTemplateSchema,
  f32: TypeTemplateSchema,
  f64: TypeTemplateSchema,
  string: TypeTemplateSchema,
  bytes: TypeTemplateSchema,
  timestamp: TypeTemplateSchema,
  duration: TypeTemplateSchema,
  optional: TypeTemplateSchema,
  sequence: TypeTemplateSchema,
  map: TypeTemplateSchema,
  enum: TypeTemplateSchema,
  record: TypeTemplateSchema,
  object: TypeTemplateSchema,
  callbackInterface: TypeTemplateSchema,
  error: TypeTemplateSchema
}).strict();

export const TypeOracleSchema = z.object({
  language: z.string().min(1),
  fileExtension: z.string().min(1),
  types: OracleTypesSchema
});

export type TypeTemplate = z.infer<typeof TypeTemplateSchema>;
export type OracleTag = keyof z.infer<typeof OracleTypesSchema>;
export type TypeOracle = z.infer<typeof TypeOracleSchema>;

const BUNDLED_TABLES = {
  kotlin: kotlinTable,
  swift: swiftTable,
  python: pythonTable
} as const;

export type OracleLanguage = keyof typeof BUNDLED_TABLES;

export const ORACLE_LANGUAGES: readonly OracleLanguage[] = ['kotlin', 'swift', 'python'];

export function isOracleLanguage(name: string): name is OracleLanguage {
  return ORACLE_LANGUAGES.some(language => language === name);
}

/** Validates a table loaded from anywhere; `source` only labels the error. */
export function parseTypeOracle(json: unknown, source: string): TypeOracle {
  const result = TypeOracleSchema.safeParse(json);
  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid type oracle table '${source}': ${issues}`);
  }
  return result.data;
}

const oracleCache = new Map<OracleLanguage, TypeOracle>();

export function loadTypeOracle(language: OracleLanguage): TypeOracle {
  let oracle = oracleCache.get(language);
  if (!oracle) {
    oracle = parseTypeOracle(BUNDLED_TABLES[language], `${language}.json`);
    oracleCache.set(language, oracle);
  }
  return oracle;
}

export function oracleTag(type: TypeKind): OracleTag {
  return type.kind === 'scalar' ? type.scalar : type.kind;
}

function expand(template: string, type: TypeKind, oracle: TypeOracle, value?: string): string {
  return template.replace(/\{(value|inner|key|name|canonical)\}/g, (placeholder: string, field: string) => {
    switch (field) {
      case 'value':
        return value ?? placeholder;
      case 'canonical':
        return canonicalName(type);
      case 'name':
        return 'name' in type ? type.name : placeholder;
      case 'key':
        return type.kind === 'map' ? nativeTypeName(type.key, oracle) : placeholder;
      case 'inner':
        switch (type.kind) {
          case 'optional':
            return nativeTypeName(type.inner, oracle);
          case 'sequence':
            return nativeTypeName(type.element, oracle);
          case 'map':
            return nativeTypeName(type.value, oracle);
          default:
            return placeholder;
        }
      default:
        return placeholder;
    }
  });
}

export function templateFor(type: TypeKind, oracle: TypeOracle): TypeTemplate {
  return oracle.types[oracleTag(type)];
}

export function nativeTypeName(type: TypeKind, oracle: TypeOracle): string {
  return expand(templateFor(type, oracle).type, type, oracle);
}

export function lowerExpression(type: TypeKind, value: string, oracle: TypeOracle): string {
  return expand(templateFor(type, oracle).lower, type, oracle, value);
}

export function liftExpression(type: TypeKind, value: string, oracle: TypeOracle): string {
  return expand(templateFor(type, oracle).lift, type, oracle, value);
}

export interface TypeDescription {
  canonical: string;
  tag: OracleTag;
  nativeType: string;
  lower: string;
  lift: string;
}

/** The oracle's mapping of every type the interface uses, in `iterTypes()` order. */
export function describeTypes(ci: ComponentInterface, oracle: TypeOracle): TypeDescription[] {
  return ci.iterTypes().map(type => ({
    canonical: canonicalName(type),
    tag: oracleTag(type),
    nativeType: nativeTypeName(type, oracle),
    lower: lowerExpression(type, 'value', oracle),
    lift: liftExpression(type, 'value', oracle)
  }));
}
