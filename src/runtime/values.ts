// In-process representation of values crossing the boundary.
//
// - boolean for `boolean`
// - number for integers up to 32 bits, f32 and f64
// - bigint for 64-bit integers, timestamps and durations (nanoseconds) and handles
// - string, Uint8Array, null (absent optional)
// - arrays for sequences, Maps for maps, plain objects for records
// - enums: the variant name when the enum has no fields anywhere, otherwise
//   `{ variant, fields }`

export type MapKey = string | number | bigint | boolean;

export interface RecordValue {
  [field: string]: ForeignValue;
}

export interface EnumValue {
  variant: string;
  fields: RecordValue;
}

export type ForeignValue =
  | boolean
  | number
  | bigint
  | string
  | Uint8Array
  | null
  | ForeignValue[]
  | Map<MapKey, ForeignValue>
  | RecordValue
  | EnumValue;

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== 'object') {
    return false;
  }
  if (Array.isArray(value) || value instanceof Map || value instanceof Uint8Array) {
    return false;
  }
  return true;
}

export function isMapKey(value: unknown): value is MapKey {
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'bigint' || typeof value === 'boolean';
}
