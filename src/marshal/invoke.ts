/**
 * Invoke: call a Lua global with host arguments
 */

import { describeErrorObject } from '../engine/error-object.js';
import type { LuaStack } from '../engine/types.js';
import { ConversionError, InvocationError } from '../error-classes.js';
import type { ScriptValue } from '../value/values.js';
import { createMarshalContext, type BridgeOptions } from './context.js';
import { pullValue } from './pull.js';
import { pushValue } from './push.js';

/**
 * Call the global function name with args and return its first result.
 *
 * Arguments are pushed in order, so the function sees args[0] as its first
 * parameter. Exactly one result is requested: a function returning nothing
 * yields nil, extra results are discarded. The stack is left at its height
 * on entry, on success and on failure alike.
 *
 * @throws InvocationError (MOON-R004) when the global is nil
 * @throws InvocationError (MOON-R003) when the call raises, the global is
 * not callable, or reading the global raises
 * @throws ConversionError when an argument cannot be pushed, or (MOON-R008)
 * when the stack has no room for the arguments
 *
 * @example
 * ```typescript
 * const L = createLuaState();
 * L.execute('function sum(a, b) return a + b end');
 * callFunction(L, 'sum', [numberValue(3), numberValue(4)]);
 * // { kind: 'number', value: 7 }
 * ```
 */
export function callFunction(
  stack: LuaStack,
  name: string,
  args: readonly ScriptValue[] = [],
  options?: BridgeOptions
): ScriptValue {
  const ctx = createMarshalContext(options);
  const { observability } = ctx;
  const base = stack.getTop();

  const fault = <E extends Error>(error: E): E => {
    stack.setTop(base);
    observability.onError?.({ name, error });
    return error;
  };

  observability.onScriptCall?.({ name, args });
  const startTime = Date.now();

  // function + arguments
  if (!stack.checkStack(args.length + 1)) {
    throw fault(
      new ConversionError('MOON-R008', {
        function: name,
        count: args.length,
        reason: 'engine stack exhausted',
      })
    );
  }

  const lookup = stack.lookupGlobal(name);
  if (lookup !== 'ok') {
    const reason = describeErrorObject(stack);
    throw fault(new InvocationError('MOON-R003', name, reason, lookup));
  }
  const resolved = stack.typeOf(-1);

  try {
    for (const arg of args) {
      pushValue(stack, arg, ctx, 0);
    }
  } catch (error) {
    if (error instanceof ConversionError) throw fault(error);
    stack.setTop(base);
    throw error;
  }

  const status = stack.pcall(args.length, 1);
  if (status !== 'ok') {
    const reason = describeErrorObject(stack);
    throw fault(
      resolved === 'nil'
        ? new InvocationError('MOON-R004', name, reason, 'undefined')
        : new InvocationError('MOON-R003', name, reason, status)
    );
  }

  let value: ScriptValue;
  try {
    value = pullValue(stack, stack.getTop(), ctx, 0);
  } finally {
    stack.setTop(base);
  }

  observability.onFunctionReturn?.({
    name,
    value,
    durationMs: Date.now() - startTime,
  });

  return value;
}
