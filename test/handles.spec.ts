import { describe, test, expect, vi } from 'vitest';
import { HandleMap } from '../src/runtime/handle-map';
import { ObjectReference } from '../src/runtime/object-reference';
import { ObjectDestroyedError, StaleHandleError } from '../src/runtime/errors';

describe('HandleMap', () => {
  test('issues handles counting up from 1', () => {
    const map = new HandleMap<string>('widget');
    expect(map.insert('a')).toBe(1n);
    expect(map.insert('b')).toBe(2n);
    expect(map.get(2n)).toBe('b');
    expect(map.size).toBe(2);
  });

  test('remove hands back the value and forgets the handle', () => {
    const map = new HandleMap<string>('widget');
    const handle = map.insert('a');
    expect(map.remove(handle)).toBe('a');
    expect(map.has(handle)).toBe(false);
    expect(map.size).toBe(0);
  });

  test('never reuses a handle', () => {
    const map = new HandleMap<string>();
    const first = map.insert('a');
    map.remove(first);
    expect(map.insert('b')).toBe(2n);
  });

  test('tells released handles from ones never issued', () => {
    const map = new HandleMap<string>('widget');
    const handle = map.insert('a');
    map.remove(handle);
    expect(() => map.get(handle)).toThrow(new StaleHandleError('widget 1 has been released'));
    expect(() => map.remove(handle)).toThrow(StaleHandleError);
    expect(() => map.get(99n)).toThrow('widget 99 was never issued');
    expect(() => map.get(0n)).toThrow('widget 0 was never issued');
  });
});

describe('ObjectReference', () => {
  test('releases its handle exactly once', () => {
    const release = vi.fn();
    const reference = new ObjectReference('Widget', 5n, release);
    expect(reference.handle).toBe(5n);
    expect(reference.destroyed).toBe(false);

    reference.destroy();
    reference.destroy();
    expect(release).toHaveBeenCalledTimes(1);
    expect(release).toHaveBeenCalledWith(5n);
    expect(reference.destroyed).toBe(true);
  });

  test('refuses use after destroy', () => {
    const reference = new ObjectReference('Widget', 1n, () => undefined);
    reference.destroy();
    expect(() => reference.handle).toThrow(new ObjectDestroyedError('Widget has already been destroyed'));
  });
});
