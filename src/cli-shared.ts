/**
 * CLI Shared Utilities
 * Common formatting functions for CLI tools
 */

import {
  BridgeError,
  ConfigError,
  ConversionError,
  InvocationError,
  ScriptLoadError,
} from './error-classes.js';
import { toNative } from './value/native.js';
import type { ScriptValue } from './value/values.js';
import { stringify } from './present/stringify.js';

/**
 * Convert a call result to text for stdout
 *
 * @param value - The value to format
 * @param options - json: print as JSON instead of the indented rendering
 */
export function formatOutput(
  value: ScriptValue,
  options: { json?: boolean; indentUnit?: string } = {}
): string {
  if (options.json) {
    return JSON.stringify(toNative(value), null, 2);
  }
  return stringify(value, 0, { indentUnit: options.indentUnit });
}

/**
 * Format error for stderr output
 *
 * @param err - The error to format
 * @returns Formatted error message
 */
export function formatError(err: Error): string {
  if (err instanceof InvocationError) {
    return `Invocation error: ${err.message}`;
  }

  if (err instanceof ScriptLoadError) {
    return `Load error: ${err.message}`;
  }

  if (err instanceof ConversionError) {
    return `Conversion error: ${err.message}`;
  }

  if (err instanceof ConfigError) {
    return err.path ? `${err.message} (${err.path})` : err.message;
  }

  if (err instanceof BridgeError) {
    return `Error ${err.errorId}: ${err.message}`;
  }

  // Handle file not found errors (ENOENT)
  if ('code' in err && err.code === 'ENOENT' && 'path' in err) {
    return `File not found: ${String(err.path)}`;
  }

  return err.message;
}

/**
 * Determine exit code from a call result: 1 when the result could not be
 * converted, 0 otherwise.
 */
export function determineExitCode(value: ScriptValue): number {
  return value.kind === 'error' ? 1 : 0;
}
