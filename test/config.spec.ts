import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { DEFAULT_CONFIG, findConfig, loadConfig, parseConfig } from '../src/config';
import { ConfigError } from '../src/errors';

describe('parseConfig', () => {
  it('fills in defaults', () => {
    expect(parseConfig({})).toEqual({ checksumSymbols: true, logLevel: 'info' });
    expect(DEFAULT_CONFIG).toEqual({ checksumSymbols: true, logLevel: 'info' });
  });

  it('keeps explicit settings', () => {
    expect(parseConfig({ ffiPrefix: 'geo_v2', checksumSymbols: false, headerGuard: 'GEO_H', logLevel: 'debug' })).toEqual({
      ffiPrefix: 'geo_v2',
      checksumSymbols: false,
      headerGuard: 'GEO_H',
      logLevel: 'debug'
    });
  });

  it('names the offending setting and the file', () => {
    expect(() => parseConfig({ ffiPrefix: '9lives' }))
      .toThrow(new ConfigError('Invalid configuration in polybind.json: ffiPrefix: must be a C identifier'));
    expect(() => parseConfig({ colour: 'blue' }, 'custom.json'))
      .toThrow("Invalid configuration in custom.json: Unrecognized key(s) in object: 'colour'");
  });
});

describe('loading configuration files', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'polybind-config-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true });
  });

  it('loads and validates a file', async () => {
    const configPath = path.join(tempDir, 'settings.json');
    await fs.writeFile(configPath, JSON.stringify({ checksumSymbols: false }));
    await expect(loadConfig(configPath)).resolves.toEqual({ checksumSymbols: false, logLevel: 'info' });
  });

  it('reports unreadable and malformed files', async () => {
    const missing = path.join(tempDir, 'missing.json');
    await expect(loadConfig(missing)).rejects.toThrow(`Cannot read ${missing}: `);

    const broken = path.join(tempDir, 'broken.json');
    await fs.writeFile(broken, '{ "checksumSymbols": ');
    await expect(loadConfig(broken)).rejects.toThrow(`${broken} is not valid JSON: `);
  });

  it('finds polybind.json next to the schema', async () => {
    const schema = path.join(tempDir, 'geo.idl');
    await expect(findConfig(schema)).resolves.toBe(DEFAULT_CONFIG);

    await fs.writeFile(path.join(tempDir, 'polybind.json'), JSON.stringify({ ffiPrefix: 'geo' }));
    await expect(findConfig(schema)).resolves.toEqual({ ffiPrefix: 'geo', checksumSymbols: true, logLevel: 'info' });
  });
});
