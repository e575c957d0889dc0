/**
 * Push: ScriptValue → engine stack slot
 *
 * Every variant grows the stack by exactly one slot. Error values have no
 * Lua counterpart and are pushed as nil.
 */

import type { LuaStack } from '../engine/types.js';
import { ConversionError } from '../error-classes.js';
import type { ScriptTable } from '../value/table.js';
import type { TableKey } from '../value/table-key.js';
import type { ScriptValue } from '../value/values.js';
import {
  createMarshalContext,
  emitLogEvent,
  type BridgeOptions,
  type MarshalContext,
} from './context.js';
import { restoreOnThrow } from './iteration.js';

/**
 * Push value onto the stack as a single slot.
 *
 * Table entries whose value is nil are dropped by the engine, as Lua tables
 * cannot hold nil.
 *
 * @throws ConversionError for NaN keys, tables nested past maxDepth, or an
 * engine stack that cannot grow. The stack is restored before throwing.
 */
export function push(
  stack: LuaStack,
  value: ScriptValue,
  options?: BridgeOptions
): void {
  const ctx = createMarshalContext(options);
  restoreOnThrow(stack, () => pushValue(stack, value, ctx, 0));
}

/**
 * Push with an already resolved context.
 * @internal
 */
export function pushValue(
  stack: LuaStack,
  value: ScriptValue,
  ctx: MarshalContext,
  depth: number
): void {
  switch (value.kind) {
    case 'nil':
      stack.pushNil();
      return;
    case 'boolean':
      stack.pushBoolean(value.value);
      return;
    case 'number':
      stack.pushNumber(value.value);
      return;
    case 'string':
      stack.pushString(value.value);
      return;
    case 'table':
      pushTable(stack, value.table, ctx, depth);
      return;
    case 'error':
      emitLogEvent(ctx, {
        event: 'convert:error-pushed-as-nil',
        subsystem: 'push',
        message: value.message,
      });
      stack.pushNil();
      return;
  }
}

function pushTable(
  stack: LuaStack,
  table: ScriptTable,
  ctx: MarshalContext,
  depth: number
): void {
  if (depth >= ctx.maxDepth) {
    throw new ConversionError('MOON-R005', {
      reason: `nesting exceeds maximum depth of ${ctx.maxDepth}`,
    });
  }
  // table + key + value
  if (!stack.checkStack(3)) {
    throw new ConversionError('MOON-R005', {
      reason: 'engine stack exhausted',
    });
  }

  stack.newTable();
  const tableIndex = stack.getTop();
  for (const [key, entry] of table) {
    pushKey(stack, key);
    pushValue(stack, entry, ctx, depth + 1);
    stack.setTable(tableIndex);
  }
}

function pushKey(stack: LuaStack, key: TableKey): void {
  if (typeof key.value === 'string') {
    stack.pushString(key.value);
    return;
  }
  if (Number.isNaN(key.value)) {
    throw new ConversionError('MOON-R006', { key: 'NaN' });
  }
  stack.pushNumber(key.value);
}
