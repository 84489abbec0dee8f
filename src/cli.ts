// CLI for polybind

import { existsSync, readFileSync } from 'fs';
import path from 'path';
import { compileFile, loadDumpFile, renderOutputs } from './bindgen';
import { writeRenderedFiles } from './bindgen-writer';
import { BindgenConfig, findConfig, loadConfig } from './config';
import { serializeInterface } from './dump';
import { BindgenError, formatDiagnostic } from './errors';
import { logger, LogLevel } from './logger';
import { isOracleLanguage, ORACLE_LANGUAGES, OracleLanguage } from './oracle/type-oracle';

// Get version from package.json
export function getVersion(): string {
  // Walk up to find package.json (handles both src/ and dist/src/)
  let dir = __dirname;
  for (let i = 0; i < 5; i++) {
    const pkgPath = path.join(dir, 'package.json');
    if (existsSync(pkgPath)) {
      const pkg: unknown = JSON.parse(readFileSync(pkgPath, 'utf-8'));
      if (pkg !== null && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string') {
        return pkg.version;
      }
      return '0.0.0';
    }
    dir = path.dirname(dir);
  }
  return '0.0.0';
}

export interface CliOptions {
  inputs?: string[];
  output?: string;
  dump?: boolean;
  header?: boolean;
  types?: OracleLanguage[];
  config?: string;
  help?: boolean;
  version?: boolean;
  verbose?: boolean;
}

function requireValue(args: string[], index: number, option: string): string {
  if (index + 1 >= args.length || args[index + 1].startsWith('-')) {
    throw new Error(`Option ${option} requires a value`);
  }
  return args[index + 1];
}

export function parseArgs(args: string[]): CliOptions {
  const options: CliOptions = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case '--verbose':
        options.verbose = true;
        logger.setLevel(LogLevel.DEBUG);
        break;
      case '-h':
      case '--help':
        options.help = true;
        break;
      case '-v':
      case '--version':
        options.version = true;
        break;
      case '-o':
      case '--output':
        options.output = requireValue(args, i++, arg);
        break;
      case '--dump':
        options.dump = true;
        break;
      case '--header':
        options.header = true;
        break;
      case '--types': {
        const language = requireValue(args, i++, arg);
        if (!isOracleLanguage(language)) {
          throw new Error(`Invalid language: ${language}. Must be one of ${ORACLE_LANGUAGES.join(', ')}`);
        }
        options.types = [...(options.types ?? []), language];
        break;
      }
      case '--config':
        options.config = requireValue(args, i++, arg);
        break;
      default:
        if (arg.startsWith('-')) {
          throw new Error(`Unknown option: ${arg}`);
        }
        options.inputs = options.inputs || [];
        options.inputs.push(arg);
        break;
    }
  }
  return options;
}

export function showHelp(): void {
  console.log(`
polybind - FFI bindings generator for interface schemas

Usage: polybind [options] <schema>

The schema is an interface definition file, or a JSON dump written by --dump.

Options:
  -h, --help              Show this help message
  -v, --version           Show version number
  -o, --output <dir>      Output directory (default: same as input)
  --header                Write the C header of the exported surface (default when no output is chosen)
  --dump                  Write the Component Interface as JSON
  --types <language>      Write the type mapping for ${ORACLE_LANGUAGES.join(', ')} (can be used multiple times)
  --config <file>         Configuration file (default: polybind.json next to the schema)
  --verbose               Print debug output

Examples:
  polybind arithmetic.idl
  polybind --dump --types kotlin -o ./build arithmetic.idl
  polybind --header ./build/arithmetic.interface.json
`);
}

export function showVersion(): void {
  console.log(`polybind ${getVersion()}`);
}

async function resolveConfig(options: CliOptions, input: string): Promise<BindgenConfig> {
  const config = options.config ? await loadConfig(options.config) : await findConfig(input);
  if (!options.verbose) {
    logger.setLevel(config.logLevel);
  }
  return config;
}

/** Runs the CLI and returns the process exit code. */
export async function runCli(args: string[]): Promise<number> {
  let options: CliOptions;
  try {
    options = parseArgs(args);
  } catch (error) {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    console.error('Use --help for usage information');
    return 1;
  }

  if (options.help) {
    showHelp();
    return 0;
  }

  if (options.version) {
    showVersion();
    return 0;
  }

  if (!options.inputs || options.inputs.length === 0) {
    console.error('Error: No input file specified');
    console.error('Use --help for usage information');
    return 1;
  }
  if (options.inputs.length > 1) {
    console.error('Error: Exactly one input file is accepted');
    return 1;
  }

  const input = options.inputs[0];
  const outputDir = options.output || path.dirname(input);
  const header = options.header || (!options.dump && !options.types);

  try {
    const config = await resolveConfig(options, input);
    const compiled = input.endsWith('.json') ? await loadDumpFile(input, config) : await compileFile(input, config);

    const files = renderOutputs(compiled, { header, types: options.types }, config);
    if (options.dump) {
      files.push({ filename: `${compiled.ci.namespace.name}.interface.json`, contents: serializeInterface(compiled.ci) });
    }

    const { generatedFiles } = await writeRenderedFiles(files, { outputDir });
    for (const file of generatedFiles) {
      console.error(`Generated ${file}`);
    }
    return 0;
  } catch (error) {
    if (error instanceof BindgenError) {
      console.error(formatDiagnostic(error));
    } else {
      console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    }
    return 1;
  }
}
