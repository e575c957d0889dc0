/**
 * Scoped Stack Helpers
 *
 * Wrappers around the engine's stack-based protocols that restore the
 * stack height on every exit path.
 */

import type { LuaStack } from '../engine/types.js';

/**
 * Visitor for one table pair. The key sits at keyIndex and the value at
 * valueIndex (both absolute). Return false to stop iterating early.
 * The visitor must leave the stack as it found it and must not convert
 * the key slot in place.
 */
export type TableEntryVisitor = (
  keyIndex: number,
  valueIndex: number
) => boolean | void;

/**
 * Walk the pairs of the table at tableIndex with the engine's next protocol.
 *
 * Each cycle pushes a key/value pair, hands their slots to visit, then pops
 * the value so that the key drives the following next call. Whether the
 * walk runs to completion, is stopped by the visitor, or throws, the stack
 * is left at its height on entry.
 */
export function forEachTableEntry(
  stack: LuaStack,
  tableIndex: number,
  visit: TableEntryVisitor
): void {
  const table = stack.absIndex(tableIndex);
  const base = stack.getTop();

  stack.pushNil();
  try {
    while (stack.next(table)) {
      const valueIndex = stack.getTop();
      const proceed = visit(valueIndex - 1, valueIndex);
      stack.setTop(valueIndex - 1);
      if (proceed === false) break;
    }
  } finally {
    stack.setTop(base);
  }
}

/**
 * Run fn and, if it throws, truncate the stack back to its height on entry
 * before rethrowing.
 */
export function restoreOnThrow<T>(stack: LuaStack, fn: () => T): T {
  const base = stack.getTop();
  try {
    return fn();
  } catch (error) {
    stack.setTop(base);
    throw error;
  }
}
