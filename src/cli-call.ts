#!/usr/bin/env node
/**
 * CLI Call Entry Point
 *
 * Implements main(), parseArgs() and runCall() for the moonbridge-call binary:
 * load a Lua script, call one of its global functions, print the result.
 */

import { readFileSync } from 'node:fs';
import { basename } from 'node:path';
import { fileURLToPath } from 'node:url';
import * as yaml from 'yaml';
import { determineExitCode, formatError, formatOutput } from './cli-shared.js';
import { loadConfig, loadConfigFile, toBridgeOptions } from './config.js';
import { createLuaState } from './engine/fengari.js';
import { callFunction } from './marshal/invoke.js';
import type { LogEvent } from './marshal/context.js';
import { fromNative } from './value/native.js';
import { stringValue, type ScriptValue } from './value/values.js';

/**
 * Parsed command-line arguments
 */
export type ParsedArgs =
  | {
      mode: 'call';
      file: string;
      functionName: string;
      args: string[];
      json: boolean;
      verbose: boolean;
      config?: string | undefined;
    }
  | { mode: 'help' | 'version' };

/**
 * Parse command-line arguments into structured command.
 *
 * Options are recognised up to the function name; everything after it is
 * passed to the function, so negative numbers need no escaping.
 *
 * @param argv - Raw command-line arguments (typically process.argv.slice(2))
 */
export function parseArgs(argv: string[]): ParsedArgs {
  const positionals: string[] = [];
  let json = false;
  let verbose = false;
  let config: string | undefined;

  let i = 0;
  while (positionals.length < 2) {
    const arg = argv[i];
    if (arg === undefined) break;
    i++;

    if (arg === '--help' || arg === '-h') return { mode: 'help' };
    if (arg === '--version' || arg === '-v') return { mode: 'version' };

    if (arg === '--json') {
      json = true;
    } else if (arg === '--verbose') {
      verbose = true;
    } else if (arg === '--config') {
      config = argv[i];
      if (config === undefined) {
        throw new Error('Missing path after --config');
      }
      i++;
    } else if (arg.startsWith('-')) {
      throw new Error(`Unknown option: ${arg}`);
    } else {
      positionals.push(arg);
    }
  }

  const [file, functionName] = positionals;
  if (file === undefined) {
    throw new Error('Missing file argument');
  }
  if (functionName === undefined) {
    throw new Error('Missing function name');
  }

  return {
    mode: 'call',
    file,
    functionName,
    args: argv.slice(i),
    json,
    verbose,
    config,
  };
}

/**
 * Convert one command-line argument to a script value.
 *
 * The text is read as YAML: `3` is a number, `true` a boolean, `~` nil,
 * `[1, 2]` and `{a: 1}` tables. Text that is not valid YAML is passed as
 * a string.
 */
export function parseArgument(text: string): ScriptValue {
  let data: unknown;
  try {
    data = yaml.parse(text);
  } catch {
    return stringValue(text);
  }
  return fromNative(data);
}

/** Result of a CLI call */
export interface CallOutcome {
  output: string;
  code: number;
}

/**
 * Load the script, call the function and format its result.
 *
 * @throws Error if the file is missing, fails to load, or the call fails
 */
export function runCall(
  parsed: Extract<ParsedArgs, { mode: 'call' }>,
  log: (line: string) => void = (line) => console.error(line)
): CallOutcome {
  const config = parsed.config
    ? loadConfigFile(parsed.config)
    : loadConfig(process.cwd());
  const options = toBridgeOptions(config);

  const source = readFileSync(parsed.file, 'utf-8');
  const args = parsed.args.map(parseArgument);

  const stack = createLuaState({ openLibs: config.openLibs });
  try {
    stack.execute(source, basename(parsed.file));
    const value = callFunction(stack, parsed.functionName, args, {
      ...options,
      callbacks: {
        onLogEvent: parsed.verbose
          ? (event: LogEvent) => log(JSON.stringify(event))
          : undefined,
      },
    });

    return {
      output: formatOutput(value, {
        json: parsed.json,
        indentUnit: options.indentUnit ?? '  ',
      }),
      code: determineExitCode(value),
    };
  } finally {
    stack.close();
  }
}

function readVersion(): string {
  const packageJsonPath = fileURLToPath(
    new URL('../package.json', import.meta.url)
  );
  try {
    const packageJson: unknown = JSON.parse(
      readFileSync(packageJsonPath, 'utf-8')
    );
    if (
      typeof packageJson === 'object' &&
      packageJson !== null &&
      'version' in packageJson &&
      typeof packageJson.version === 'string'
    ) {
      return packageJson.version;
    }
  } catch {
    // Fall through to the fallback version
  }
  return '0.1.0';
}

/**
 * Entry point for the moonbridge-call binary
 *
 * Writes results to stdout and errors to stderr.
 * Sets a non-zero exit code on any error.
 */
export function main(argv: string[] = process.argv.slice(2)): void {
  try {
    const parsed = parseArgs(argv);

    switch (parsed.mode) {
      case 'help':
        console.log(`Usage:
  moonbridge-call [options] <script.lua> <function> [args...]

Options:
  --json           Print the result as JSON
  --config <file>  Read configuration from file (default: ./.moonbridge.json)
  --verbose        Print conversion diagnostics to stderr
  --help           Show this help message
  --version        Show version information

Arguments:
  args are read as YAML: 3 is a number, true a boolean, ~ nil,
  "[1, 2]" and "{a: 1}" tables; anything else is a string

Examples:
  moonbridge-call math.lua sum 3 4
  moonbridge-call --json config.lua defaults "{env: prod}"`);
        return;

      case 'version':
        console.log(readVersion());
        return;

      case 'call': {
        const { output, code } = runCall(parsed);
        console.log(output);
        process.exitCode = code;
        return;
      }
    }
  } catch (err) {
    if (err instanceof Error) {
      console.error(formatError(err));
    } else {
      console.error(formatError(new Error(String(err))));
    }
    process.exitCode = 1;
  }
}

// Only run main if not in test environment
const shouldRunMain =
  process.env['NODE_ENV'] !== 'test' &&
  !process.env['VITEST'] &&
  !process.env['VITEST_WORKER_ID'];

if (shouldRunMain) {
  main();
}
