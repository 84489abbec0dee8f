import { describe, it, expect, afterEach } from 'vitest';
import { dumpInterface, loadInterfaceDump, serializeInterface } from '../src/dump';
import { DumpFormatError, UnknownTypeError } from '../src/errors';
import { logger, LogSink } from '../src/logger';
import { compile, expectBindgenError } from './util';

const { ci } = compile(`
  [Error] enum MathError { "DivideByZero" };
  dictionary Pair { required i32 left; i32 right = 0; };
  interface Calculator {
    constructor();
    [Throws=MathError] i32 divide(Pair pair);
  };
  namespace calc { u32 version(); };
`);

describe('interface dumps', () => {
  let restoreSink: LogSink | undefined;

  afterEach(() => {
    if (restoreSink) {
      logger.setSink(restoreSink);
      restoreSink = undefined;
    }
  });

  function captureLog(): string[] {
    const lines: string[] = [];
    restoreSink = logger.setSink(line => lines.push(line));
    return lines;
  }

  it('carries a format tag, version and checksum', () => {
    const dump = dumpInterface(ci);
    expect(dump.format).toBe('polybind-interface');
    expect(dump.version).toBe(1);
    expect(dump.checksum).toBe(ci.checksum());
    expect(dump.namespace.name).toBe('calc');
    expect(dump.records.map(record => record.name)).toEqual(['Pair']);
  });

  it('serializes as indented JSON with a trailing newline', () => {
    const text = serializeInterface(ci);
    expect(text.startsWith('{\n  "format": "polybind-interface",\n')).toBe(true);
    expect(text.endsWith('}\n')).toBe(true);
    expect(JSON.parse(text)).toEqual(dumpInterface(ci));
  });

  it('reloads to an identical interface', () => {
    const lines = captureLog();
    const loaded = loadInterfaceDump(serializeInterface(ci));
    expect(loaded.checksum()).toBe(ci.checksum());
    expect(loaded.toData()).toEqual(ci.toData());
    expect(Object.isFrozen(loaded.toData().records)).toBe(true);
    expect(lines).toEqual([]);
  });

  it('accepts an already parsed value', () => {
    expect(loadInterfaceDump(dumpInterface(ci)).getRecord('Pair')?.fields.map(field => field.name)).toEqual(['left', 'right']);
  });

  it('rejects text that is not JSON', () => {
    const error = expectBindgenError(() => loadInterfaceDump('{ nope', 'calc.json'));
    expect(error).toBeInstanceOf(DumpFormatError);
    expect(error.message.startsWith('calc.json is not valid JSON: ')).toBe(true);
  });

  it('rejects another format', () => {
    expect(() => loadInterfaceDump({ ...dumpInterface(ci), format: 'other' }))
      .toThrow(new DumpFormatError('Invalid interface dump: format: Invalid literal value, expected "polybind-interface"'));
  });

  it('rejects unknown keys', () => {
    expect(() => loadInterfaceDump({ ...dumpInterface(ci), extra: true }))
      .toThrow("Invalid interface dump: Unrecognized key(s) in object: 'extra'");
  });

  it('revalidates declarations', () => {
    const dump = dumpInterface(ci);
    const error = expectBindgenError(() => loadInterfaceDump({
      ...dump,
      records: [{ name: 'Pair', fields: [{ name: 'left', type: { kind: 'record', name: 'Missing' }, required: true }] }]
    }));
    expect(error).toBeInstanceOf(UnknownTypeError);
    expect(error.message).toBe("Unknown record type 'Missing'");
    expect(error.declaration).toBe('Pair.left');
  });

  it('rejects duplicate declarations', () => {
    const dump = dumpInterface(ci);
    expect(() => loadInterfaceDump({ ...dump, records: [...dump.records, ...dump.records] }))
      .toThrow("'Pair' is already declared");
  });

  it('warns when the checksum no longer matches', () => {
    const lines = captureLog();
    loadInterfaceDump({ ...dumpInterface(ci), checksum: '0'.repeat(64) }, 'calc.json');
    expect(lines).toEqual(['[WARN] calc.json was modified after it was written (checksum mismatch)']);
  });

  it('loads a dump without a checksum', () => {
    const { checksum, ...rest } = dumpInterface(ci);
    expect(loadInterfaceDump(rest).checksum()).toBe(checksum);
  });
});
