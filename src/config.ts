/**
 * Configuration Loader
 * Loads and validates .moonbridge.json configuration files.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { ConfigError } from './error-classes.js';
import { DEFAULT_MAX_DEPTH, type BridgeOptions } from './marshal/context.js';

// ============================================================
// CONSTANTS
// ============================================================

/** Configuration file name */
export const CONFIG_FILE_NAME = '.moonbridge.json';

/** Resolved configuration */
export interface BridgeConfig {
  /** Maximum table nesting converted */
  readonly maxDepth: number;
  /** Spaces per indentation level in rendered output */
  readonly indent: number;
  /** Open the Lua standard libraries in new states */
  readonly openLibs: boolean;
}

// ============================================================
// DEFAULT CONFIGURATION
// ============================================================

export function createDefaultConfig(): BridgeConfig {
  return { maxDepth: DEFAULT_MAX_DEPTH, indent: 2, openLibs: true };
}

// ============================================================
// VALIDATION
// ============================================================

const KNOWN_FIELDS = new Set(['maxDepth', 'indent', 'openLibs']);

/**
 * Validate configuration structure and values.
 * Throws ConfigError if configuration is invalid.
 */
function validateConfig(
  data: unknown,
  path?: string
): asserts data is Partial<BridgeConfig> {
  if (typeof data !== 'object' || data === null || Array.isArray(data)) {
    throw new ConfigError('must be an object', path);
  }

  for (const [field, value] of Object.entries(data)) {
    if (!KNOWN_FIELDS.has(field)) {
      throw new ConfigError(`unknown field ${field}`, path);
    }

    if (field === 'maxDepth') {
      if (typeof value !== 'number' || !Number.isInteger(value) || value < 1) {
        throw new ConfigError('maxDepth must be a positive integer', path);
      }
    } else if (field === 'indent') {
      if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
        throw new ConfigError('indent must be a non-negative integer', path);
      }
    } else if (typeof value !== 'boolean') {
      throw new ConfigError('openLibs must be a boolean', path);
    }
  }
}

// ============================================================
// LOADING
// ============================================================

/**
 * Load configuration from an explicit file path.
 * Missing fields take their default values.
 *
 * @throws ConfigError if the file is missing, is not JSON, or is invalid
 */
export function loadConfigFile(path: string): BridgeConfig {
  if (!existsSync(path)) {
    throw new ConfigError('file not found', path);
  }

  let data: unknown;
  try {
    data = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`invalid JSON (${reason})`, path);
  }

  validateConfig(data, path);
  return { ...createDefaultConfig(), ...data };
}

/**
 * Load .moonbridge.json from a directory.
 * Returns the default configuration when the directory has none.
 */
export function loadConfig(dir: string): BridgeConfig {
  const path = join(dir, CONFIG_FILE_NAME);
  if (!existsSync(path)) {
    return createDefaultConfig();
  }
  return loadConfigFile(path);
}

/** Conversion options described by a configuration */
export function toBridgeOptions(config: BridgeConfig): BridgeOptions {
  return {
    maxDepth: config.maxDepth,
    indentUnit: ' '.repeat(config.indent),
  };
}
