// polybind.json: per-project generator settings

import { promises as fs } from 'fs';
import path from 'path';
import { z } from 'zod';
import { ConfigError } from './errors';

export const CONFIG_FILENAME = 'polybind.json';

export const BindgenConfigSchema = z.object({
  /** Replaces the whole exported symbol prefix. */
  ffiPrefix: z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'must be a C identifier').optional(),
  /** Append the first 8 hex digits of the interface checksum to the namespace prefix. */
  checksumSymbols: z.boolean().default(true),
  /** Include guard of the generated C header; derived from the namespace when absent. */
  headerGuard: z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'must be a C identifier').optional(),
  logLevel: z.enum(['error', 'warn', 'info', 'debug']).default('info')
}).strict();

export type BindgenConfig = z.infer<typeof BindgenConfigSchema>;

export const DEFAULT_CONFIG: BindgenConfig = BindgenConfigSchema.parse({});

/** Validates a configuration value; `source` only labels the error. */
export function parseConfig(json: unknown, source: string = CONFIG_FILENAME): BindgenConfig {
  const result = BindgenConfigSchema.safeParse(json);
  if (!result.success) {
    const issues = result.error.issues
      .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw new ConfigError(`Invalid configuration in ${source}: ${issues}`);
  }
  return result.data;
}

export async function loadConfig(configPath: string): Promise<BindgenConfig> {
  let text: string;
  try {
    text = await fs.readFile(configPath, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Cannot read ${configPath}: ${error instanceof Error ? error.message : String(error)}`);
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`${configPath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
  return parseConfig(json, configPath);
}

/**
 * Loads `polybind.json` next to the schema if there is one, the defaults
 * otherwise.
 */
export async function findConfig(schemaPath: string): Promise<BindgenConfig> {
  const candidate = path.join(path.dirname(schemaPath), CONFIG_FILENAME);
  try {
    await fs.access(candidate);
  } catch {
    return DEFAULT_CONFIG;
  }
  return loadConfig(candidate);
}
