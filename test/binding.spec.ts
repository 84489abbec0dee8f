import { describe, test, expect, beforeEach } from 'vitest';
import { createCallStatus, checkCallStatus } from '../src/runtime/call-status';
import { CallbackProxy } from '../src/runtime/callbacks';
import {
  DeclaredCallError, LoweringError, NativePanicError, ObjectDestroyedError, ScaffoldingError
} from '../src/runtime/errors';
import { BufferHeap, heapTransport } from '../src/runtime/foreign-buffer';
import { ObjectReference } from '../src/runtime/object-reference';
import { createScaffolding, NativeImplementation, NativeObject } from '../src/runtime/scaffolding';
import { isPlainObject } from '../src/runtime/values';
import { compile, createHarness, Harness } from './util';

const SCHEMA = `
  [Error] enum StoreError { "NotFound", "Full" };
  [Error] enum ParseError { "Empty", "NotANumber" };
  dictionary Entry { required string key; u32 hits = 0; };
  interface Store {
    constructor(u32 capacity);
    [Name=empty] constructor();
    [Throws=StoreError] Entry get(string key);
    [Throws=StoreError] void put(Entry entry);
    u32 size();
    sequence<string> keys();
    static Store shared();
  };
  callback interface Visitor {
    boolean visit(Entry entry);
    [Throws=StoreError] void fail(string reason);
  };
  namespace kv {
    string greet(string name, optional string greeting = "Hello");
    [Throws=ParseError] u32 parse_count(string text);
    [Throws=ParseError] void wrong_error();
    void explode();
    u32 visit_all(Store store, Visitor visitor);
    [Throws=StoreError] void fail_with(Visitor visitor, string reason);
    void subscribe(Visitor visitor);
    u32 notify(string key);
    void unsubscribe_all();
  };
`;

interface StoredEntry {
  key: string;
  hits: number;
}

function toEntry(value: unknown): StoredEntry {
  if (isPlainObject(value) && typeof value.key === 'string' && typeof value.hits === 'number') {
    return { key: value.key, hits: value.hits };
  }
  throw new Error('Expected an Entry');
}

function toProxy(value: unknown): CallbackProxy {
  if (!(value instanceof CallbackProxy)) {
    throw new Error('Expected a callback');
  }
  return value;
}

function createImplementation(): NativeImplementation {
  const stores = new Map<unknown, Map<string, StoredEntry>>();
  const subscribers: CallbackProxy[] = [];

  const createStore = (capacity: number): NativeObject => {
    const entries = new Map<string, StoredEntry>();
    const store: NativeObject = {
      get: key => {
        const entry = entries.get(String(key));
        if (!entry) {
          throw new DeclaredCallError('StoreError', 'NotFound');
        }
        entry.hits++;
        return { ...entry };
      },
      put: value => {
        const entry = toEntry(value);
        if (!entries.has(entry.key) && entries.size >= capacity) {
          throw new DeclaredCallError('StoreError', 'Full');
        }
        entries.set(entry.key, entry);
      },
      size: () => entries.size,
      keys: () => [...entries.keys()]
    };
    stores.set(store, entries);
    return store;
  };

  return {
    functions: {
      greet: (name, greeting) => `${String(greeting)}, ${String(name)}!`,
      parse_count: text => {
        const value = String(text);
        if (value === '') {
          throw new DeclaredCallError('ParseError', 'Empty');
        }
        const count = Number(value);
        if (!Number.isInteger(count)) {
          throw new DeclaredCallError('ParseError', 'NotANumber');
        }
        return count;
      },
      wrong_error: () => {
        throw new DeclaredCallError('StoreError', 'Full');
      },
      explode: () => {
        throw new Error('kaboom');
      },
      visit_all: (store, visitor) => {
        const entries = stores.get(store);
        if (!entries) {
          throw new Error('Unknown store');
        }
        const proxy = toProxy(visitor);
        let accepted = 0;
        for (const entry of entries.values()) {
          if (proxy.call('visit', { ...entry }) === true) {
            accepted++;
          }
        }
        return accepted;
      },
      fail_with: (visitor, reason) => {
        toProxy(visitor).call('fail', reason);
      },
      subscribe: visitor => {
        subscribers.push(toProxy(visitor).keep());
      },
      notify: key => subscribers.filter(proxy => proxy.call('visit', { key, hits: 0 }) === true).length,
      unsubscribe_all: () => {
        subscribers.splice(0).forEach(proxy => proxy.release());
      }
    },
    objects: {
      Store: {
        constructors: {
          new: capacity => createStore(Number(capacity)),
          empty: () => createStore(0)
        },
        staticMethods: {
          shared: () => createStore(100)
        }
      }
    }
  };
}

/** A foreign Visitor that accepts keys starting with `prefix` and records what it saw. */
function prefixVisitor(prefix: string) {
  const seen: unknown[] = [];
  return {
    seen,
    visit: (entry: unknown) => {
      seen.push(entry);
      return isPlainObject(entry) && typeof entry.key === 'string' && entry.key.startsWith(prefix);
    },
    fail: (reason: unknown) => {
      throw new DeclaredCallError('StoreError', String(reason) === 'full' ? 'Full' : 'NotFound');
    }
  };
}

function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected an error');
}

describe('ForeignBinding over an in-process scaffolding', () => {
  let harness: Harness;

  beforeEach(() => {
    harness = createHarness(SCHEMA, createImplementation());
  });

  describe('functions', () => {
    test('passes strings both ways and applies argument defaults', () => {
      const { binding, heap } = harness;
      expect(binding.callFunction('greet', ['World'])).toBe('Hello, World!');
      expect(binding.callFunction('greet', ['World', 'Hi'])).toBe('Hi, World!');
      expect(heap.liveCount).toBe(0);
    });

    test('lifts a declared error and frees every buffer', () => {
      const { binding, heap } = harness;
      expect(binding.callFunction('parse_count', ['12'])).toBe(12);

      const error = thrown(() => binding.callFunction('parse_count', ['twelve']));
      expect(error).toBeInstanceOf(DeclaredCallError);
      if (!(error instanceof DeclaredCallError)) return;
      expect(error.errorType).toBe('ParseError');
      expect(error.value).toBe('NotANumber');
      expect(heap.liveCount).toBe(0);
    });

    test('turns an implementation crash into a panic', () => {
      const { binding, heap } = harness;
      expect(() => binding.callFunction('explode')).toThrow(new NativePanicError('kaboom'));
      expect(heap.liveCount).toBe(0);
    });

    test('an undeclared error type is a panic', () => {
      expect(() => harness.binding.callFunction('wrong_error')).toThrow(new NativePanicError('StoreError: Full'));
    });

    test('unwinds buffers when a later argument fails to lower', () => {
      const { binding, heap } = harness;
      expect(() => binding.callFunction('greet', ['World', 5]))
        .toThrow(new LoweringError('greeting: expected string, got 5'));
      expect(heap.liveCount).toBe(0);
      expect(heap.allocations).toBe(heap.frees);
    });

    test('rejects extra arguments and unknown functions', () => {
      const { binding } = harness;
      expect(() => binding.callFunction('greet', ['a', 'b', 'c'])).toThrow('greet takes 2 arguments, got 3');
      expect(() => binding.callFunction('nope')).toThrow("Unknown function 'nope'");
    });
  });

  describe('objects', () => {
    test('constructs, calls and destroys', () => {
      const { binding, library, heap } = harness;
      const store = binding.construct('Store', [2]);
      expect(library.liveObjects('Store')).toBe(1);

      binding.callMethod(store, 'put', [{ key: 'apple' }]);
      expect(binding.callMethod(store, 'get', ['apple'])).toEqual({ key: 'apple', hits: 1 });
      expect(binding.callMethod(store, 'get', ['apple'])).toEqual({ key: 'apple', hits: 2 });
      expect(binding.callMethod(store, 'size')).toBe(1);
      expect(binding.callMethod(store, 'keys')).toEqual(['apple']);

      store.destroy();
      expect(library.liveObjects('Store')).toBe(0);
      expect(heap.liveCount).toBe(0);
    });

    test('methods fail with their declared error', () => {
      const { binding } = harness;
      const store = binding.construct('Store', [], 'empty');

      const missing = thrown(() => binding.callMethod(store, 'get', ['nothing']));
      expect(missing).toBeInstanceOf(DeclaredCallError);
      if (!(missing instanceof DeclaredCallError)) return;
      expect(missing.value).toBe('NotFound');

      expect(() => binding.callMethod(store, 'put', [{ key: 'x', hits: 3 }])).toThrow(new DeclaredCallError('StoreError', 'Full'));
      store.destroy();
    });

    test('static methods hand over a new owned object', () => {
      const { binding, library } = harness;
      const shared = binding.callStatic('Store', 'shared');
      expect(shared).toBeInstanceOf(ObjectReference);
      expect(library.liveObjects('Store')).toBe(1);
      if (shared instanceof ObjectReference) {
        shared.destroy();
      }
      expect(library.liveObjects('Store')).toBe(0);
    });

    test('a destroyed object cannot be used', () => {
      const { binding } = harness;
      const store = binding.construct('Store', [1]);
      store.destroy();
      expect(() => binding.callMethod(store, 'size')).toThrow(new ObjectDestroyedError('Store has already been destroyed'));
    });

    test('objects passed as arguments are borrowed', () => {
      const { binding, library } = harness;
      const store = binding.construct('Store', [5]);
      binding.callFunction('visit_all', [store, prefixVisitor('a')]);
      expect(library.liveObjects('Store')).toBe(1);
      expect(store.destroyed).toBe(false);
      store.destroy();
    });

    test('a stale handle reaching native code panics', () => {
      const { library, ci, heap } = harness;
      const status = createCallStatus();
      library.call('kv_Store_size', [99n], status);
      expect(() => checkCallStatus(status, undefined, ci, heapTransport(heap)))
        .toThrow(new NativePanicError('Store 99 was never issued'));
      expect(heap.liveCount).toBe(0);
    });
  });

  describe('callbacks', () => {
    test('native code calls back into a foreign implementation', () => {
      const { binding, heap } = harness;
      const store = binding.construct('Store', [5]);
      binding.callMethod(store, 'put', [{ key: 'apple' }]);
      binding.callMethod(store, 'put', [{ key: 'banana' }]);

      const visitor = prefixVisitor('a');
      expect(binding.callFunction('visit_all', [store, visitor])).toBe(1);
      expect(visitor.seen).toEqual([{ key: 'apple', hits: 0 }, { key: 'banana', hits: 0 }]);

      expect(binding.callbacks.liveCount('Visitor')).toBe(0);
      store.destroy();
      expect(heap.liveCount).toBe(0);
    });

    test('a declared callback error travels back out as the caller\'s error', () => {
      const { binding, heap } = harness;
      const error = thrown(() => binding.callFunction('fail_with', [prefixVisitor(''), 'full']));
      expect(error).toBeInstanceOf(DeclaredCallError);
      if (!(error instanceof DeclaredCallError)) return;
      expect(error.errorType).toBe('StoreError');
      expect(error.value).toBe('Full');
      expect(binding.callbacks.liveCount('Visitor')).toBe(0);
      expect(heap.liveCount).toBe(0);
    });

    test('any other callback failure is a panic', () => {
      const { binding, heap } = harness;
      const visitor = {
        visit: () => true,
        fail: () => {
          throw new Error('bad');
        }
      };
      expect(() => binding.callFunction('fail_with', [visitor, 'x'])).toThrow(new NativePanicError('Visitor.fail: bad'));
      expect(heap.liveCount).toBe(0);
    });

    test('asynchronous callback methods are refused', () => {
      const { binding } = harness;
      const store = binding.construct('Store', [1]);
      binding.callMethod(store, 'put', [{ key: 'apple' }]);
      const visitor = { visit: () => Promise.resolve(true), fail: () => undefined };
      expect(() => binding.callFunction('visit_all', [store, visitor]))
        .toThrow(new NativePanicError('Visitor.visit returned a promise; callback methods are synchronous'));
      store.destroy();
    });

    test('kept callbacks live until native code releases them', () => {
      const { binding, heap } = harness;
      binding.callFunction('subscribe', [prefixVisitor('a')]);
      binding.callFunction('subscribe', [prefixVisitor('b')]);
      expect(binding.callbacks.liveCount('Visitor')).toBe(2);

      expect(binding.callFunction('notify', ['avocado'])).toBe(1);

      binding.callFunction('unsubscribe_all');
      expect(binding.callbacks.liveCount('Visitor')).toBe(0);
      expect(heap.liveCount).toBe(0);
    });

    test('a registered callback is released when a later argument fails to lower', () => {
      const { binding } = harness;
      expect(() => binding.callFunction('fail_with', [prefixVisitor(''), 5]))
        .toThrow('reason: expected string, got 5');
      expect(binding.callbacks.liveCount('Visitor')).toBe(0);
    });

    test('implementations must provide every method', () => {
      expect(() => harness.binding.callFunction('subscribe', [{ visit: () => true }]))
        .toThrow("Implementation of Visitor is missing method 'fail'");
    });
  });
});

const POOL_SCHEMA = `
  interface Counter { constructor(u32 start); u32 value(); };
  callback interface Inspector { u32 inspect(sequence<Counter> counters); };
  namespace pool {
    Counter? find(boolean present);
    sequence<Counter> all();
    record<string, Counter> by_name();
    sequence<Counter> broken();
    u32 total(sequence<Counter> counters);
    u32 peek(Counter? counter);
    u32 inspect_all(Inspector inspector);
  };
`;

function counterValue(value: unknown): number {
  if (isPlainObject(value) && typeof value.value === 'function') {
    return Number(Reflect.apply(value.value, value, []));
  }
  throw new Error('Expected a Counter');
}

function createPool(): NativeImplementation {
  const makeCounter = (start: number): NativeObject => ({ value: () => start });
  const counters = [makeCounter(1), makeCounter(2)];
  return {
    functions: {
      find: present => (present === true ? counters[0] : null),
      all: () => counters,
      by_name: () => new Map([['one', counters[0]], ['two', counters[1]]]),
      broken: () => [counters[0], 'not a counter'],
      total: list => (Array.isArray(list) ? list.reduce((sum: number, counter: unknown) => sum + counterValue(counter), 0) : -1),
      peek: counter => (counter === null ? 0 : counterValue(counter)),
      inspect_all: inspector => toProxy(inspector).call('inspect', counters)
    },
    objects: {
      Counter: { constructors: { new: start => makeCounter(Number(start)) } }
    }
  };
}

function toReferences(value: unknown): ObjectReference[] {
  if (!Array.isArray(value) || !value.every(item => item instanceof ObjectReference)) {
    throw new Error('Expected a list of objects');
  }
  return value.filter((item): item is ObjectReference => item instanceof ObjectReference);
}

describe('objects inside optionals, sequences and maps', () => {
  let harness: Harness;

  beforeEach(() => {
    harness = createHarness(POOL_SCHEMA, createPool());
  });

  test('an optional return hands over an owned object or null', () => {
    const { binding, library, heap } = harness;
    const found = binding.callFunction('find', [true]);
    expect(found).toBeInstanceOf(ObjectReference);
    expect(library.liveObjects('Counter')).toBe(1);
    if (!(found instanceof ObjectReference)) return;
    expect(found.objectName).toBe('Counter');
    expect(binding.callMethod(found, 'value')).toBe(1);
    found.destroy();
    expect(library.liveObjects('Counter')).toBe(0);

    expect(binding.callFunction('find', [false])).toBeNull();
    expect(library.liveObjects('Counter')).toBe(0);
    expect(heap.liveCount).toBe(0);
  });

  test('every object in a returned sequence is owned by the caller', () => {
    const { binding, library, heap } = harness;
    const counters = toReferences(binding.callFunction('all'));
    expect(counters).toHaveLength(2);
    expect(library.liveObjects('Counter')).toBe(2);
    expect(counters.map(counter => binding.callMethod(counter, 'value'))).toEqual([1, 2]);

    counters.forEach(counter => counter.destroy());
    expect(library.liveObjects('Counter')).toBe(0);
    expect(heap.liveCount).toBe(0);
  });

  test('objects in a returned map keep their keys', () => {
    const { binding, library } = harness;
    const named = binding.callFunction('by_name');
    expect(named).toBeInstanceOf(Map);
    if (!(named instanceof Map)) return;
    expect([...named.keys()]).toEqual(['one', 'two']);
    const two: unknown = named.get('two');
    expect(two).toBeInstanceOf(ObjectReference);
    if (!(two instanceof ObjectReference)) return;
    expect(binding.callMethod(two, 'value')).toBe(2);
    expect(library.liveObjects('Counter')).toBe(2);
    toReferences([...named.values()]).forEach(counter => counter.destroy());
    expect(library.liveObjects('Counter')).toBe(0);
  });

  test('a return that fails half way exports nothing', () => {
    const { binding, library, heap } = harness;
    expect(() => binding.callFunction('broken'))
      .toThrow(new NativePanicError('broken result[1]: expected a Counter object'));
    expect(library.liveObjects('Counter')).toBe(0);
    expect(heap.liveCount).toBe(0);
  });

  test('objects inside arguments are borrowed', () => {
    const { binding, library, heap } = harness;
    const five = binding.construct('Counter', [5]);
    const seven = binding.construct('Counter', [7]);

    expect(binding.callFunction('total', [[five, seven]])).toBe(12);
    expect(binding.callFunction('peek', [seven])).toBe(7);
    expect(binding.callFunction('peek', [null])).toBe(0);
    expect(library.liveObjects('Counter')).toBe(2);
    expect(five.destroyed).toBe(false);
    expect(heap.liveCount).toBe(0);

    five.destroy();
    seven.destroy();
    expect(library.liveObjects('Counter')).toBe(0);
  });

  test('a nested argument that is not an object fails to lower', () => {
    const { binding, library, heap } = harness;
    const five = binding.construct('Counter', [5]);
    expect(() => binding.callFunction('total', [[five, 'x']]))
      .toThrow(new LoweringError('counters[1]: expected a Counter object'));
    expect(heap.liveCount).toBe(0);
    expect(library.liveObjects('Counter')).toBe(1);
    five.destroy();
  });

  test('objects passed to a callback method are owned by the foreign side', () => {
    const { binding, library, heap } = harness;
    const inspector = {
      inspect: (counters: unknown) => {
        const references = toReferences(counters);
        const sum = references.reduce((total, counter) => total + Number(binding.callMethod(counter, 'value')), 0);
        references.forEach(counter => counter.destroy());
        return sum;
      }
    };
    expect(binding.callFunction('inspect_all', [inspector])).toBe(3);
    expect(library.liveObjects('Counter')).toBe(0);
    expect(binding.callbacks.liveCount('Inspector')).toBe(0);
    expect(heap.liveCount).toBe(0);
  });
});

describe('createScaffolding', () => {
  test('requires an implementation for every callable', () => {
    const { ci, signatures } = compile(SCHEMA);
    expect(() => createScaffolding(ci, signatures, { functions: { greet: () => '' } })).toThrow(new ScaffoldingError(
      'No implementation for parse_count, wrong_error, explode, visit_all, fail_with, subscribe, notify, ' +
      'unsubscribe_all, Store.new, Store.empty, Store.shared'
    ));
  });

  test('exports every symbol and refuses unknown ones', () => {
    const { ci, signatures } = compile(SCHEMA);
    const library = createScaffolding(ci, signatures, createImplementation(), new BufferHeap());
    expect(library.prefix).toBe('kv');
    expect(library.symbols).toContain('kv_greet');
    expect(library.symbols).toContain('kv_Visitor_init_callback');
    expect(() => library.call('kv_missing', [], createCallStatus())).toThrow("Library does not export 'kv_missing'");
  });

  test('native argument buffers are freed even when lifting fails', () => {
    const { ci, signatures } = compile(SCHEMA);
    const heap = new BufferHeap();
    const library = createScaffolding(ci, signatures, createImplementation(), heap);
    const transport = heapTransport(heap);
    const bad = transport.allocate(new Uint8Array([0, 0, 0, 9]));
    const good = transport.allocate(new Uint8Array([0, 0, 0, 0]));

    const status = createCallStatus();
    library.call('kv_greet', [bad, good], status);
    expect(() => checkCallStatus(status, undefined, ci, transport)).toThrow(NativePanicError);
    expect(heap.liveCount).toBe(0);
  });
});
