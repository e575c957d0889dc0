/**
 * Pull: engine stack slot → ScriptValue
 *
 * Conversion never throws. Values outside the supported set, tables nested
 * past maxDepth and tables the engine has no stack room to walk all come
 * back as error values.
 */

import type { LuaStack, TypeTag } from '../engine/types.js';
import { messageFor } from '../error-registry.js';
import { ScriptTable } from '../value/table.js';
import { TableKey } from '../value/table-key.js';
import {
  booleanValue,
  errorValue,
  nilValue,
  numberValue,
  stringValue,
  tableValue,
  type ScriptValue,
} from '../value/values.js';
import {
  createMarshalContext,
  emitLogEvent,
  type BridgeOptions,
  type MarshalContext,
} from './context.js';
import { forEachTableEntry } from './iteration.js';

/** Fixed diagnostic for values pull cannot represent */
export function unsupportedTypeMessage(type: TypeTag): string {
  return `Cannot convert ${type} value: only nil, boolean, number, string and table are supported`;
}

function limitMessage(reason: string): string {
  return messageFor('MOON-R005', { reason });
}

/**
 * Convert the value at index into a ScriptValue.
 *
 * Leaves the stack as it found it. The slot at index is not consumed.
 */
export function pull(
  stack: LuaStack,
  index: number,
  options?: BridgeOptions
): ScriptValue {
  const ctx = createMarshalContext(options);
  return pullValue(stack, stack.absIndex(index), ctx, 0);
}

/**
 * Pull with an already resolved context.
 * @internal
 */
export function pullValue(
  stack: LuaStack,
  index: number,
  ctx: MarshalContext,
  depth: number
): ScriptValue {
  const type = stack.typeOf(index);

  switch (type) {
    case 'nil':
      return nilValue();
    case 'boolean':
      return booleanValue(stack.toBoolean(index));
    case 'number':
      return numberValue(stack.toNumber(index));
    case 'string':
      return stringValue(stack.toText(index));
    case 'table':
      return pullTable(stack, index, ctx, depth);
    default:
      ctx.observability.onUnsupportedValue?.({ type });
      return errorValue(unsupportedTypeMessage(type));
  }
}

function pullTable(
  stack: LuaStack,
  index: number,
  ctx: MarshalContext,
  depth: number
): ScriptValue {
  if (depth >= ctx.maxDepth) {
    return errorValue(
      limitMessage(`nesting exceeds maximum depth of ${ctx.maxDepth}`)
    );
  }
  // key + value slots for this level
  if (!stack.checkStack(2)) {
    return errorValue(limitMessage('engine stack exhausted'));
  }

  const entries: [TableKey, ScriptValue][] = [];
  forEachTableEntry(stack, index, (keyIndex, valueIndex) => {
    const key = pullKey(stack, keyIndex);
    if (key === undefined) {
      emitLogEvent(ctx, {
        event: 'convert:key-skipped',
        subsystem: 'pull',
        keyType: stack.typeOf(keyIndex),
      });
      return;
    }
    entries.push([key, pullValue(stack, valueIndex, ctx, depth + 1)]);
  });

  return tableValue(new ScriptTable(entries));
}

/** Key at keyIndex, or undefined for keys that are neither strings nor numbers */
function pullKey(stack: LuaStack, keyIndex: number): TableKey | undefined {
  switch (stack.typeOf(keyIndex)) {
    case 'string':
      return TableKey.string(stack.toText(keyIndex));
    case 'number':
      return TableKey.number(stack.toNumber(keyIndex));
    default:
      return undefined;
  }
}
