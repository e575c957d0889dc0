/**
 * Marshalling Options and Events
 *
 * Public types for configuring conversions and observing calls.
 * These types are the primary interface for host applications.
 */

import type { ScriptValue } from '../value/values.js';

/** Default nesting limit for table conversion */
export const DEFAULT_MAX_DEPTH = 100;

/** Default indentation unit for stringify */
export const DEFAULT_INDENT_UNIT = '  ';

/** Structured diagnostic event */
export interface LogEvent {
  /** Event name, e.g. "convert:key-skipped" */
  readonly event: string;
  /** Emitting subsystem, e.g. "pull" */
  readonly subsystem: string;
  /** ISO timestamp */
  readonly timestamp: string;
  readonly [key: string]: unknown;
}

/** Log event as emitted by the library, before the timestamp is filled in */
export interface LogEventInput {
  readonly event: string;
  readonly subsystem: string;
  readonly timestamp?: string | undefined;
  readonly [key: string]: unknown;
}

/** I/O callbacks */
export interface BridgeCallbacks {
  /** Receives conversion diagnostics */
  onLogEvent?: ((event: LogEvent) => void) | undefined;
}

/** Event emitted before a script function is invoked */
export interface ScriptCallEvent {
  /** Global function name */
  name: string;
  /** Arguments passed to the function */
  args: readonly ScriptValue[];
}

/** Event emitted after a script function returns */
export interface FunctionReturnEvent {
  /** Global function name */
  name: string;
  /** Converted return value */
  value: ScriptValue;
  /** Execution time in milliseconds */
  durationMs: number;
}

/** Event emitted when an invocation fails */
export interface ErrorEvent {
  /** Global function name */
  name: string;
  /** The error that will be thrown */
  error: Error;
}

/** Event emitted when pull meets a value it cannot convert */
export interface UnsupportedValueEvent {
  /** Engine type tag of the value */
  type: string;
}

/** Observability callbacks for monitoring calls and conversions */
export interface ObservabilityCallbacks {
  /** Called before a script function is invoked */
  onScriptCall?: ((event: ScriptCallEvent) => void) | undefined;
  /** Called after a script function returns */
  onFunctionReturn?: ((event: FunctionReturnEvent) => void) | undefined;
  /** Called when an invocation fails */
  onError?: ((event: ErrorEvent) => void) | undefined;
  /** Called when pull produces an error value */
  onUnsupportedValue?: ((event: UnsupportedValueEvent) => void) | undefined;
}

/** Options accepted by pull, push, callFunction and stringify */
export interface BridgeOptions {
  /** Maximum table nesting converted (default: 100) */
  maxDepth?: number | undefined;
  /** Indentation unit used by stringify (default: two spaces) */
  indentUnit?: string | undefined;
  /** I/O callbacks */
  callbacks?: BridgeCallbacks | undefined;
  /** Observability callbacks */
  observability?: ObservabilityCallbacks | undefined;
}

/** Resolved options threaded through one conversion */
export interface MarshalContext {
  readonly maxDepth: number;
  readonly indentUnit: string;
  readonly callbacks: BridgeCallbacks;
  readonly observability: ObservabilityCallbacks;
}

/**
 * Resolve options into a context, applying defaults.
 * @throws RangeError when maxDepth is not a positive integer
 */
export function createMarshalContext(
  options: BridgeOptions = {}
): MarshalContext {
  const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
  if (!Number.isInteger(maxDepth) || maxDepth < 1) {
    throw new RangeError(
      `maxDepth must be a positive integer, got ${maxDepth}`
    );
  }

  return {
    maxDepth,
    indentUnit: options.indentUnit ?? DEFAULT_INDENT_UNIT,
    callbacks: options.callbacks ?? {},
    observability: options.observability ?? {},
  };
}

/**
 * Emit a log event to the host, filling in the timestamp.
 * Does nothing when no onLogEvent callback is registered.
 *
 * @example
 * emitLogEvent(ctx, { event: 'convert:key-skipped', subsystem: 'pull', keyType: 'boolean' });
 */
export function emitLogEvent(
  ctx: MarshalContext,
  event: LogEventInput
): void {
  const onLogEvent = ctx.callbacks.onLogEvent;
  if (onLogEvent === undefined) return;

  onLogEvent({
    ...event,
    timestamp: event.timestamp ?? new Date().toISOString(),
  });
}
