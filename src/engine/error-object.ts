import type { LuaStack } from './types.js';

/**
 * Message of the error object at index (default: top of the stack).
 * Non-string error objects are described by their type, as lua.c does.
 */
export function describeErrorObject(stack: LuaStack, index = -1): string {
  const tag = stack.typeOf(index);
  if (tag === 'string') return stack.toText(index);
  if (tag === 'number') return String(stack.toNumber(index));
  return `(error object is a ${tag} value)`;
}
