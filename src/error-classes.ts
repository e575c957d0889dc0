/**
 * Bridge Error Classes and Factory
 * Structured error types with registry-based error codes
 */

import { ERROR_REGISTRY, renderMessage } from './error-registry.js';
import type { ErrorCategory } from './error-registry.js';

// ============================================================
// ERROR DATA
// ============================================================

/** Structured error data for host applications */
export interface BridgeErrorData {
  readonly errorId: string;
  readonly message: string;
  readonly context?: Record<string, unknown> | undefined;
}

// ============================================================
// ERROR FACTORY
// ============================================================

/**
 * Factory function for creating errors from registry.
 *
 * Looks up the error definition, renders its message template with context,
 * and creates a BridgeError carrying the structured metadata.
 *
 * @throws TypeError if errorId is not found in registry
 *
 * @example
 * createError("MOON-R004", { function: "sum" })
 * // BridgeError: "Function sum is not defined"
 */
export function createError(
  errorId: string,
  context: Record<string, unknown>
): BridgeError {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }

  return new BridgeError({
    errorId,
    message: renderMessage(definition.messageTemplate, context),
    context,
  });
}

/**
 * Render the registry template of errorId, rejecting IDs of the wrong category.
 */
function renderFor(
  errorId: string,
  category: ErrorCategory,
  context: Record<string, unknown>
): string {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }
  if (definition.category !== category) {
    throw new TypeError(`Expected ${category} error ID, got: ${errorId}`);
  }
  return renderMessage(definition.messageTemplate, context);
}

// ============================================================
// BASE ERROR CLASS
// ============================================================

/**
 * Base error class for all bridge errors.
 * Provides structured data for host applications to format as needed.
 */
export class BridgeError extends Error {
  readonly errorId: string;
  readonly context?: Record<string, unknown> | undefined;

  constructor(data: BridgeErrorData) {
    if (!data.errorId) {
      throw new TypeError('errorId is required');
    }
    if (!ERROR_REGISTRY.has(data.errorId)) {
      throw new TypeError(`Unknown error ID: ${data.errorId}`);
    }

    super(data.message);
    this.name = 'BridgeError';
    this.errorId = data.errorId;
    this.context = data.context;
  }

  /** Get structured error data for custom formatting */
  toData(): BridgeErrorData {
    return {
      errorId: this.errorId,
      message: this.message,
      context: this.context,
    };
  }

  /** Format error for display (can be overridden by host) */
  format(formatter?: (data: BridgeErrorData) => string): string {
    if (formatter) return formatter(this.toData());
    return this.message;
  }
}

// ============================================================
// SPECIALIZED ERROR CLASSES
// ============================================================

/** Keyed accessor asked for an absent key */
export class MissingKeyError extends BridgeError {
  /** Display form of the key: quoted for string keys, numeric text otherwise */
  readonly key: string;

  constructor(key: string) {
    super({
      errorId: 'MOON-R001',
      message: renderFor('MOON-R001', 'runtime', { key }),
      context: { key },
    });
    this.name = 'MissingKeyError';
    this.key = key;
  }
}

/** Host-side conversion failures (never raised by pull) */
export class ConversionError extends BridgeError {
  constructor(errorId: string, context: Record<string, unknown>) {
    super({
      errorId,
      message: renderFor(errorId, 'runtime', context),
      context,
    });
    this.name = 'ConversionError';
  }
}

/** Status reported by a failed protected call */
export type FaultStatus = 'runtime' | 'memory' | 'gc' | 'handler' | 'undefined';

/** Protected call failures raised by callFunction */
export class InvocationError extends BridgeError {
  readonly functionName: string;
  /** Error message produced by the engine */
  readonly reason: string;
  readonly status: FaultStatus;

  constructor(
    errorId: 'MOON-R003' | 'MOON-R004',
    functionName: string,
    reason: string,
    status: FaultStatus
  ) {
    const context = { function: functionName, reason, status };
    super({
      errorId,
      message: renderFor(errorId, 'runtime', context),
      context,
    });
    this.name = 'InvocationError';
    this.functionName = functionName;
    this.reason = reason;
    this.status = status;
  }
}

/** Chunk failed to compile */
export class ScriptLoadError extends BridgeError {
  readonly chunk: string;
  readonly reason: string;

  constructor(chunk: string, reason: string) {
    const context = { chunk, reason };
    super({
      errorId: 'MOON-R007',
      message: renderFor('MOON-R007', 'runtime', context),
      context,
    });
    this.name = 'ScriptLoadError';
    this.chunk = chunk;
    this.reason = reason;
  }
}

/** Invalid configuration file or options */
export class ConfigError extends BridgeError {
  readonly path: string | undefined;

  constructor(reason: string, path?: string) {
    const context = { reason, path };
    super({
      errorId: 'MOON-C001',
      message: renderFor('MOON-C001', 'config', context),
      context,
    });
    this.name = 'ConfigError';
    this.path = path;
  }
}
