import { describe, test, expect } from 'vitest';
import {
  liftReturn, liftValue, literalToValue, lowerArgument, lowerValue, passesAsBuffer
} from '../src/runtime/lowering';
import { BufferHeap, heapTransport, isFfiBuffer } from '../src/runtime/foreign-buffer';
import { BufferFormatError, LoweringError } from '../src/runtime/errors';
import { mapType, optionalType, scalarType, sequenceType, stringType, TypeKind } from '../src/interface/type-kind';
import { compile } from './util';

const { ci } = compile(`
  [Error] enum StoreError { "NotFound", "Full" };
  [Enum] interface Shape { Circle(double radius); Dot(); };
  enum Color { "Red", "Green" };
  dictionary Point { required i32 x; i32 y = 7; string? label = null; };
  dictionary Layer { required string name; sequence<record<string, Point?>>? groups; };
  [Enum] interface Path { Line(Point start, Point end); Poly(sequence<Point> points, record<u64, i64> weights); };
  namespace n {};
`);

const point: TypeKind = { kind: 'record', name: 'Point' };
const shape: TypeKind = { kind: 'enum', name: 'Shape' };
const color: TypeKind = { kind: 'enum', name: 'Color' };
const layer: TypeKind = { kind: 'record', name: 'Layer' };
const path: TypeKind = { kind: 'enum', name: 'Path' };

describe('lowering', () => {
  describe('records', () => {
    test('fills in declared defaults', () => {
      const bytes = lowerValue(point, { x: 1 }, ci);
      expect([...bytes]).toEqual([0, 0, 0, 1, 0, 0, 0, 7, 0]);
      expect(liftValue(point, bytes, ci)).toEqual({ x: 1, y: 7, label: null });
    });

    test('requires fields without a default', () => {
      expect(() => lowerValue(point, { y: 2 }, ci)).toThrow(new LoweringError("value: missing field 'x' of Point"));
    });

    test('rejects unknown fields', () => {
      expect(() => lowerValue(point, { x: 1, z: 2 }, ci)).toThrow("value: 'z' is not a field of Point");
    });

    test('reports the path of a nested mismatch', () => {
      expect(() => lowerValue(point, { x: 1, label: 5 }, ci)).toThrow('value.label: expected string, got 5');
    });
  });

  describe('enums', () => {
    test('writes the 1-based discriminant before the fields', () => {
      const bytes = lowerValue(shape, { variant: 'Circle', fields: { radius: 2 } }, ci);
      expect([...bytes]).toEqual([0, 0, 0, 1, 0x40, 0, 0, 0, 0, 0, 0, 0]);
      expect(liftValue(shape, bytes, ci)).toEqual({ variant: 'Circle', fields: { radius: 2 } });
    });

    test('accepts a bare variant name for a variant without fields', () => {
      const bytes = lowerValue(shape, 'Dot', ci);
      expect([...bytes]).toEqual([0, 0, 0, 2]);
      expect(liftValue(shape, bytes, ci)).toEqual({ variant: 'Dot', fields: {} });
    });

    test('lifts a flat enum to its variant name', () => {
      expect(liftValue(color, new Uint8Array([0, 0, 0, 2]), ci)).toBe('Green');
    });

    test('rejects unknown variants and discriminants', () => {
      expect(() => lowerValue(color, 'Blue', ci)).toThrow("value: 'Blue' is not a variant of Color");
      expect(() => liftValue(color, new Uint8Array([0, 0, 0, 3]), ci))
        .toThrow(new BufferFormatError('Invalid discriminant 3 for Color'));
    });

    test('requires the fields of the chosen variant', () => {
      expect(() => lowerValue(shape, 'Circle', ci)).toThrow("value: missing field 'radius' of Shape.Circle");
    });
  });

  describe('scalars and containers', () => {
    test('checks integer ranges', () => {
      expect(() => lowerValue(scalarType('u8'), 256, ci)).toThrow('value: 256 is out of range for u8');
      expect(() => lowerValue(scalarType('i32'), 1.5, ci)).toThrow('value: expected i32, got 1.5');
    });

    test('64-bit integers must be bigints', () => {
      expect(() => lowerValue(scalarType('i64'), 5, ci)).toThrow('value: expected i64, got 5');
      expect(() => lowerValue(scalarType('u64'), -1n, ci)).toThrow('value: -1 is out of range for u64');
    });

    test('reports the index of a bad sequence element', () => {
      expect(() => lowerValue(sequenceType(scalarType('i32')), [1, 'a'], ci)).toThrow('value[1]: expected i32, got "a"');
    });

    test('encodes maps as a count followed by entries', () => {
      const type = mapType(stringType(), scalarType('u32'));
      const bytes = lowerValue(type, new Map([['a', 1]]), ci);
      expect([...bytes]).toEqual([0, 0, 0, 1, 0, 0, 0, 1, 0x61, 0, 0, 0, 1]);
      expect(liftValue(type, bytes, ci)).toEqual(new Map([['a', 1]]));
    });

    test('optionals carry a presence byte', () => {
      const type = optionalType(scalarType('u8'));
      expect([...lowerValue(type, null, ci)]).toEqual([0]);
      expect([...lowerValue(type, 9, ci)]).toEqual([1, 9]);
      expect(() => liftValue(type, new Uint8Array([2]), ci)).toThrow('Invalid optional presence byte 2');
    });

    test('handles must be positive bigints', () => {
      expect(() => lowerValue({ kind: 'object', name: 'Widget' }, 0n, ci)).toThrow('value: expected handle, got 0n');
    });
  });

  describe('nested values', () => {
    test('a record holding an optional sequence of maps of optional records', () => {
      const bytes = lowerValue(layer, {
        name: 'L',
        groups: [new Map([['a', { x: 1, y: 2 }], ['b', null]])]
      }, ci);
      expect([...bytes]).toEqual([
        0, 0, 0, 1, 0x4c,
        1, 0, 0, 0, 1,
        0, 0, 0, 2,
        0, 0, 0, 1, 0x61, 1, 0, 0, 0, 1, 0, 0, 0, 2, 0,
        0, 0, 0, 1, 0x62, 0
      ]);
      expect(liftValue(layer, bytes, ci)).toEqual({
        name: 'L',
        groups: [new Map([['a', { x: 1, y: 2, label: null }], ['b', null]])]
      });

      const absent = lowerValue(layer, { name: 'L' }, ci);
      expect([...absent]).toEqual([0, 0, 0, 1, 0x4c, 0]);
      expect(liftValue(layer, absent, ci)).toEqual({ name: 'L', groups: null });
    });

    test('the nested value must use every byte and no more', () => {
      const bytes = lowerValue(layer, { name: 'L', groups: [new Map([['a', { x: 1, y: 2 }], ['b', null]])] }, ci);
      expect(bytes.length).toBe(35);
      expect(() => liftValue(layer, new Uint8Array([...bytes, 0]), ci))
        .toThrow(new BufferFormatError('1 trailing bytes after value'));
      expect(() => liftValue(layer, bytes.subarray(0, 34), ci))
        .toThrow(new BufferFormatError('Buffer underflow: needed 1 bytes at offset 34, 0 left'));
    });

    test('enum variants with record fields', () => {
      const line = { variant: 'Line', fields: { start: { x: 0 }, end: { x: 2, y: 3 } } };
      const bytes = lowerValue(path, line, ci);
      expect([...bytes]).toEqual([
        0, 0, 0, 1,
        0, 0, 0, 0, 0, 0, 0, 7, 0,
        0, 0, 0, 2, 0, 0, 0, 3, 0
      ]);
      expect(liftValue(path, bytes, ci)).toEqual({
        variant: 'Line',
        fields: { start: { x: 0, y: 7, label: null }, end: { x: 2, y: 3, label: null } }
      });
    });

    test('enum variants with a sequence of records and a map keyed by u64', () => {
      const poly = {
        variant: 'Poly',
        fields: {
          points: [{ x: 1 }, { x: -1, y: 0, label: 'p' }],
          weights: new Map([[18446744073709551615n, -5n]])
        }
      };
      const bytes = lowerValue(path, poly, ci);
      expect([...bytes]).toEqual([
        0, 0, 0, 2,
        0, 0, 0, 2,
        0, 0, 0, 1, 0, 0, 0, 7, 0,
        0xff, 0xff, 0xff, 0xff, 0, 0, 0, 0, 1, 0, 0, 0, 1, 0x70,
        0, 0, 0, 1,
        0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff,
        0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xfb
      ]);
      expect(liftValue(path, bytes, ci)).toEqual({
        variant: 'Poly',
        fields: {
          points: [{ x: 1, y: 7, label: null }, { x: -1, y: 0, label: 'p' }],
          weights: new Map([[18446744073709551615n, -5n]])
        }
      });
    });

    test('64-bit map keys keep every bit', () => {
      const type = mapType(scalarType('i64'), stringType());
      const value = new Map([[-1n, 'neg'], [9007199254740993n, 'big']]);
      const bytes = lowerValue(type, value, ci);
      expect([...bytes]).toEqual([
        0, 0, 0, 2,
        0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0, 0, 0, 3, 0x6e, 0x65, 0x67,
        0, 0x20, 0, 0, 0, 0, 0, 1, 0, 0, 0, 3, 0x62, 0x69, 0x67
      ]);
      const lifted = liftValue(type, bytes, ci);
      expect(lifted).toEqual(value);
      expect(lifted instanceof Map && lifted.get(9007199254740993n)).toBe('big');
    });

    test('reports the full path of a deeply nested mismatch', () => {
      expect(() => lowerValue(layer, { name: 'L', groups: [new Map([['a', { x: 'one' }]])] }, ci))
        .toThrow(new LoweringError('value.groups[0]["a"].x: expected i32, got "one"'));
    });
  });

  describe('argument slots', () => {
    test('scalars and flat enums travel directly', () => {
      const transport = heapTransport(new BufferHeap());
      expect(lowerArgument(scalarType('boolean'), true, ci, transport)).toBe(1);
      expect(lowerArgument(color, 'Green', ci, transport)).toBe(2);
      expect(lowerArgument(scalarType('i64'), 10n, ci, transport)).toBe(10n);
      expect(lowerArgument(scalarType('f32'), 0.1, ci, transport)).toBe(Math.fround(0.1));
      expect(lowerArgument({ kind: 'timestamp' }, 1_000n, ci, transport)).toBe(1_000n);
    });

    test('everything else travels in a buffer the receiver consumes', () => {
      const heap = new BufferHeap();
      const transport = heapTransport(heap);
      const slot = lowerArgument(stringType(), 'hi', ci, transport);
      expect(isFfiBuffer(slot)).toBe(true);
      expect(heap.liveCount).toBe(1);

      expect(liftReturn(stringType(), slot, ci, transport)).toBe('hi');
      expect(heap.liveCount).toBe(0);
    });

    test('validates slots on the way back', () => {
      const transport = heapTransport(new BufferHeap());
      expect(() => liftReturn(scalarType('boolean'), 2, ci, transport)).toThrow('Invalid boolean slot 2');
      expect(() => liftReturn(scalarType('u64'), 1, ci, transport)).toThrow('Expected a 64-bit slot for u64, got 1');
      expect(liftReturn(color, 1, ci, transport)).toBe('Red');
    });

    test('knows which types pass as buffers', () => {
      expect(passesAsBuffer(color, ci)).toBe(false);
      expect(passesAsBuffer(shape, ci)).toBe(true);
      expect(passesAsBuffer({ kind: 'error', name: 'StoreError' }, ci)).toBe(true);
      expect(passesAsBuffer({ kind: 'duration' }, ci)).toBe(false);
    });
  });

  test('converts declared defaults to values', () => {
    expect(literalToValue({ kind: 'integer', value: '5' }, scalarType('i64'))).toBe(5n);
    expect(literalToValue({ kind: 'integer', value: '5' }, scalarType('u8'))).toBe(5);
    expect(literalToValue({ kind: 'null' }, optionalType(stringType()))).toBeNull();
    expect(literalToValue({ kind: 'emptyMap' }, mapType(stringType(), stringType()))).toEqual(new Map());
    expect(literalToValue({ kind: 'emptySequence' }, sequenceType(stringType()))).toEqual([]);
  });
});
