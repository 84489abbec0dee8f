/**
 * Versioned JSON form of a Component Interface. A dump is what out-of-process
 * renderers read; `loadInterfaceDump` re-validates it as a whole, since the
 * file may have been produced or edited elsewhere.
 */
import { z } from 'zod';
import { DumpFormatError } from './errors';
import { deepFreeze } from './interface/builder';
import { ComponentInterface } from './interface/component-interface';
import { ComponentInterfaceData } from './interface/model';
import { TypeKind } from './interface/type-kind';
import { validateInterfaceData } from './interface/validate';
import { logger } from './logger';
import { Literal } from './types';

export const DUMP_FORMAT = 'polybind-interface';
export const DUMP_VERSION = 1;

const ScalarKindSchema = z.enum(['boolean', 'i8', 'u8', 'i16', 'u16', 'i32', 'u32', 'i64', 'u64', 'f32', 'f64']);

const NameSchema = z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'Not an identifier');

export const TypeKindSchema: z.ZodType<TypeKind> = z.lazy(() =>
  z.discriminatedUnion('kind', [
    z.object({ kind: z.literal('scalar'), scalar: ScalarKindSchema }).strict(),
    z.object({ kind: z.literal('string') }).strict(),
    z.object({ kind: z.literal('bytes') }).strict(),
    z.object({ kind: z.literal('timestamp') }).strict(),
    z.object({ kind: z.literal('duration') }).strict(),
    z.object({ kind: z.literal('optional'), inner: TypeKindSchema }).strict(),
    z.object({ kind: z.literal('sequence'), element: TypeKindSchema }).strict(),
    z.object({ kind: z.literal('map'), key: TypeKindSchema, value: TypeKindSchema }).strict(),
    z.object({ kind: z.literal('enum'), name: NameSchema }).strict(),
    z.object({ kind: z.literal('record'), name: NameSchema }).strict(),
    z.object({ kind: z.literal('object'), name: NameSchema }).strict(),
    z.object({ kind: z.literal('callbackInterface'), name: NameSchema }).strict(),
    z.object({ kind: z.literal('error'), name: NameSchema }).strict()
  ])
);

export const LiteralSchema: z.ZodType<Literal> = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('boolean'), value: z.boolean() }).strict(),
  z.object({ kind: z.literal('integer'), value: z.string().regex(/^-?[0-9]+$/, 'Not a decimal integer') }).strict(),
  z.object({ kind: z.literal('float'), value: z.number() }).strict(),
  z.object({ kind: z.literal('string'), value: z.string() }).strict(),
  z.object({ kind: z.literal('null') }).strict(),
  z.object({ kind: z.literal('emptySequence') }).strict(),
  z.object({ kind: z.literal('emptyMap') }).strict()
]);

const ArgumentSchema = z.object({
  name: NameSchema,
  type: TypeKindSchema,
  byRef: z.boolean(),
  defaultValue: LiteralSchema.optional()
}).strict();

const FieldSchema = z.object({
  name: NameSchema,
  type: TypeKindSchema,
  required: z.boolean(),
  defaultValue: LiteralSchema.optional()
}).strict();

const VariantSchema = z.object({
  name: NameSchema,
  discriminant: z.number().int().positive(),
  fields: z.array(FieldSchema)
}).strict();

const EnumSchema = z.object({
  name: NameSchema,
  isError: z.boolean(),
  variants: z.array(VariantSchema)
}).strict();

const RecordSchema = z.object({
  name: NameSchema,
  fields: z.array(FieldSchema)
}).strict();

const FunctionSchema = z.object({
  kind: z.literal('function'),
  name: NameSchema,
  arguments: z.array(ArgumentSchema),
  returnType: TypeKindSchema.optional(),
  throws: NameSchema.optional(),
  fallible: z.boolean()
}).strict();

const ConstructorSchema = z.object({
  kind: z.literal('constructor'),
  name: NameSchema,
  objectName: NameSchema,
  isPrimary: z.boolean(),
  arguments: z.array(ArgumentSchema),
  throws: NameSchema.optional(),
  fallible: z.boolean()
}).strict();

const MethodSchema = z.object({
  kind: z.literal('method'),
  name: NameSchema,
  objectName: NameSchema,
  isStatic: z.boolean(),
  requiresExclusiveAccess: z.boolean(),
  arguments: z.array(ArgumentSchema),
  returnType: TypeKindSchema.optional(),
  throws: NameSchema.optional(),
  fallible: z.boolean()
}).strict();

const ObjectSchema = z.object({
  name: NameSchema,
  threadsafe: z.boolean(),
  constructors: z.array(ConstructorSchema),
  methods: z.array(MethodSchema)
}).strict();

const CallbackMethodSchema = z.object({
  name: NameSchema,
  index: z.number().int().positive(),
  arguments: z.array(ArgumentSchema),
  returnType: TypeKindSchema.optional(),
  throws: NameSchema.optional(),
  fallible: z.boolean()
}).strict();

const CallbackInterfaceSchema = z.object({
  name: NameSchema,
  methods: z.array(CallbackMethodSchema)
}).strict();

const NamespaceSchema = z.object({
  name: NameSchema,
  defaultError: NameSchema.optional(),
  functions: z.array(FunctionSchema)
}).strict();

export const InterfaceDumpSchema = z.object({
  format: z.literal(DUMP_FORMAT),
  version: z.literal(DUMP_VERSION),
  checksum: z.string().regex(/^[0-9a-f]{64}$/, 'Not a SHA-256 hex digest').optional(),
  namespace: NamespaceSchema,
  enums: z.array(EnumSchema),
  records: z.array(RecordSchema),
  objects: z.array(ObjectSchema),
  callbackInterfaces: z.array(CallbackInterfaceSchema)
}).strict();

export type InterfaceDump = z.infer<typeof InterfaceDumpSchema>;

export function dumpInterface(ci: ComponentInterface): InterfaceDump {
  const data = ci.toData();
  return {
    format: DUMP_FORMAT,
    version: DUMP_VERSION,
    checksum: ci.checksum(),
    namespace: data.namespace,
    enums: data.enums,
    records: data.records,
    objects: data.objects,
    callbackInterfaces: data.callbackInterfaces
  };
}

/** The dump as pretty-printed JSON with a trailing newline. */
export function serializeInterface(ci: ComponentInterface): string {
  return `${JSON.stringify(dumpInterface(ci), null, 2)}\n`;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Reads a dump back into a Component Interface. Accepts JSON text or an
 * already-parsed value. Structural problems throw `DumpFormatError`; semantic
 * ones throw the same errors the builder would.
 */
export function loadInterfaceDump(input: unknown, source: string = 'interface dump'): ComponentInterface {
  let json = input;
  if (typeof input === 'string') {
    try {
      json = JSON.parse(input);
    } catch (error) {
      throw new DumpFormatError(`${source} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  const result = InterfaceDumpSchema.safeParse(json);
  if (!result.success) {
    throw new DumpFormatError(`Invalid ${source}: ${formatIssues(result.error)}`);
  }

  const { checksum, namespace, enums, records, objects, callbackInterfaces } = result.data;
  const data: ComponentInterfaceData = { namespace, enums, records, objects, callbackInterfaces };
  validateInterfaceData(data);

  const ci = new ComponentInterface(deepFreeze(data));
  if (checksum && checksum !== ci.checksum()) {
    logger.warn(`${source} was modified after it was written (checksum mismatch)`);
  }
  logger.debug(`Loaded ${source} for namespace '${namespace.name}'`);
  return ci;
}
