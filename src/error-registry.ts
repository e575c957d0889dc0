/**
 * Error Registry
 * Central error definition registry with template rendering.
 */

// ============================================================
// ERROR CATEGORIES
// ============================================================

/** Error category determining error ID prefix */
export type ErrorCategory = 'runtime' | 'config';

/** Error registry entry containing all metadata for a single error condition */
export interface ErrorDefinition {
  /** Format: MOON-{category}{3-digit} (e.g., MOON-R001) */
  readonly errorId: string;
  /** Error category (determines ID prefix) */
  readonly category: ErrorCategory;
  /** Human-readable description (max 50 characters) */
  readonly description: string;
  /** Message template with {placeholder} syntax */
  readonly messageTemplate: string;
  /** What causes this error */
  readonly cause?: string | undefined;
  /** How to resolve this error */
  readonly resolution?: string | undefined;
}

// ============================================================
// ERROR REGISTRY
// ============================================================

/**
 * Registry of all error definitions with O(1) lookup.
 * Immutable after initialization.
 */
export interface ErrorRegistry {
  get(errorId: string): ErrorDefinition | undefined;
  has(errorId: string): boolean;
  readonly size: number;
  entries(): IterableIterator<[string, ErrorDefinition]>;
}

class ErrorRegistryImpl implements ErrorRegistry {
  private readonly byId: ReadonlyMap<string, ErrorDefinition>;

  constructor(definitions: ErrorDefinition[]) {
    const idMap = new Map<string, ErrorDefinition>();

    for (const def of definitions) {
      idMap.set(def.errorId, def);
    }

    this.byId = idMap;
  }

  get(errorId: string): ErrorDefinition | undefined {
    return this.byId.get(errorId);
  }

  has(errorId: string): boolean {
    return this.byId.has(errorId);
  }

  get size(): number {
    return this.byId.size;
  }

  entries(): IterableIterator<[string, ErrorDefinition]> {
    return this.byId.entries();
  }
}

/** All error definitions indexed by error ID */
const ERROR_DEFINITIONS: ErrorDefinition[] = [
  // Runtime Errors (MOON-R0xx)
  {
    errorId: 'MOON-R001',
    category: 'runtime',
    description: 'Table key not found',
    messageTemplate: 'Key {key} not found in table',
    cause: 'A keyed accessor was asked for a key the table does not contain.',
    resolution:
      'Check with has() first, or use find() which returns undefined for absent keys. Remember that "3" and 3 are different keys.',
  },
  {
    errorId: 'MOON-R002',
    category: 'runtime',
    description: 'Value conversion failure',
    messageTemplate: 'Cannot convert {value} to {targetType}',
    cause:
      'A host value has no counterpart in the Lua value model, or a script value has no host counterpart.',
    resolution:
      'Pass only nil, booleans, numbers, strings, arrays and plain objects.',
  },
  {
    errorId: 'MOON-R003',
    category: 'runtime',
    description: 'Script function raised an error',
    messageTemplate: 'Call to {function} failed: {reason}',
    cause:
      'The protected call reported a fault: the function raised an error or the global is not callable.',
    resolution:
      'Inspect the Lua error message. Make sure the global holds a function and that its arguments are valid.',
  },
  {
    errorId: 'MOON-R004',
    category: 'runtime',
    description: 'Script function not defined',
    messageTemplate: 'Function {function} is not defined',
    cause: 'No global binding with this name exists in the Lua state.',
    resolution:
      'Load the chunk that defines the function before calling it, and check the spelling of the name.',
  },
  {
    errorId: 'MOON-R005',
    category: 'runtime',
    description: 'Conversion limit exceeded',
    messageTemplate: 'Cannot convert table: {reason}',
    cause:
      'The table is nested deeper than maxDepth, or the engine stack could not grow.',
    resolution: 'Flatten the structure or raise the maxDepth option.',
  },
  {
    errorId: 'MOON-R006',
    category: 'runtime',
    description: 'Invalid table key',
    messageTemplate: 'Table key {key} cannot be stored in a Lua table',
    cause: 'Lua tables do not accept NaN as a key.',
    resolution: 'Remove the NaN key before pushing the table.',
  },
  {
    errorId: 'MOON-R007',
    category: 'runtime',
    description: 'Script failed to load',
    messageTemplate: 'Cannot load chunk {chunk}: {reason}',
    cause: 'The Lua source has a syntax error.',
    resolution: 'Fix the syntax error reported in the message.',
  },
  {
    errorId: 'MOON-R008',
    category: 'runtime',
    description: 'No stack room for call arguments',
    messageTemplate: 'Cannot pass {count} arguments to {function}: {reason}',
    cause: 'The engine stack could not grow to hold the function and its arguments.',
    resolution: 'Pass fewer arguments, or group them in a table.',
  },

  // Configuration Errors (MOON-C0xx)
  {
    errorId: 'MOON-C001',
    category: 'config',
    description: 'Invalid configuration',
    messageTemplate: 'Invalid configuration: {reason}',
    cause: 'The configuration file is not valid JSON or has a field of the wrong type.',
    resolution:
      'Fields are maxDepth (positive integer), indent (non-negative integer) and openLibs (boolean).',
  },
];

/** Global error registry instance */
export const ERROR_REGISTRY: ErrorRegistry = new ErrorRegistryImpl(
  ERROR_DEFINITIONS
);

// ============================================================
// TEMPLATE RENDERING
// ============================================================

/**
 * Renders a message template by replacing {placeholder} tokens with context values.
 *
 * Missing placeholders render as empty strings. `{{` is a literal brace.
 * An unclosed brace returns the template unchanged.
 *
 * @example
 * renderMessage("Function {function} is not defined", { function: "sum" })
 * // Returns: "Function sum is not defined"
 */
export function renderMessage(
  template: string,
  context: Record<string, unknown>
): string {
  let result = '';
  let i = 0;

  while (i < template.length) {
    const char = template.charAt(i);

    if (char === '{') {
      const nextChar = template[i + 1];
      if (nextChar === '{') {
        result += '{';
        i += 2;
        continue;
      }

      let j = i + 1;
      while (j < template.length && template[j] !== '}') {
        j++;
      }

      if (j >= template.length) {
        return template;
      }

      const placeholderName = template.slice(i + 1, j);
      const value = context[placeholderName];

      if (value !== undefined) {
        try {
          result += String(value);
        } catch {
          // String() coercion failed - use default toString behavior
          result += Object.prototype.toString.call(value);
        }
      }

      i = j + 1;
      continue;
    }

    result += char;
    i++;
  }

  return result;
}

/**
 * Render the message template registered for errorId.
 * @throws TypeError if errorId is not found in registry
 */
export function messageFor(
  errorId: string,
  context: Record<string, unknown>
): string {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }
  return renderMessage(definition.messageTemplate, context);
}
