/**
 * Presenter
 *
 * Human-readable rendering of script values for logs and diagnostics.
 * Table entries appear in the table's iteration order, which carries no
 * meaning.
 */

import {
  DEFAULT_INDENT_UNIT,
  type BridgeOptions,
} from '../marshal/context.js';
import type { ScriptValue } from '../value/values.js';

/** Quote text, escaping backslashes and double quotes */
function quote(text: string): string {
  return `"${text.replace(/[\\"]/g, (c) => `\\${c}`)}"`;
}

/**
 * Render value as text.
 *
 * Scalars render on one line. A table renders as a brace block with one
 * `key = value` line per entry, each nesting level indented by one unit;
 * the closing brace sits at the indent the table was rendered at.
 *
 * @example
 * stringify(tableValue([['hi', stringValue('hello')]]))
 * // '{\n  hi = "hello"\n}'
 */
export function stringify(
  value: ScriptValue,
  indent = 0,
  options: Pick<BridgeOptions, 'indentUnit'> = {}
): string {
  const unit = options.indentUnit ?? DEFAULT_INDENT_UNIT;
  return render(value, indent, unit);
}

function render(value: ScriptValue, indent: number, unit: string): string {
  switch (value.kind) {
    case 'nil':
      return 'nil';
    case 'boolean':
      return value.value ? 'true' : 'false';
    case 'number':
      return String(value.value);
    case 'string':
      return quote(value.value);
    case 'error':
      return `[error: ${quote(value.message)}]`;
    case 'table': {
      const childPad = unit.repeat(indent + 1);
      let out = '{\n';
      for (const [key, entry] of value.table) {
        out += `${childPad}${key.toString()} = ${render(entry, indent + 1, unit)}\n`;
      }
      return `${out}${unit.repeat(indent)}}`;
    }
  }
}
