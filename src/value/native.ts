/**
 * Native Interop
 *
 * Conversion between plain JavaScript data and ScriptValue.
 * Arrays map to tables with consecutive number keys starting at 1,
 * following the Lua sequence convention. Plain objects and Maps map to
 * tables keyed by their own keys.
 */

import { ConversionError } from '../error-classes.js';
import { ScriptTable } from './table.js';
import type { TableKeyLike } from './table.js';
import {
  booleanValue,
  nilValue,
  numberValue,
  stringValue,
  tableValue,
  type ScriptValue,
} from './values.js';

/** Plain data produced by toNative */
export type NativeValue =
  | null
  | boolean
  | number
  | string
  | NativeValue[]
  | { [key: string]: NativeValue };

function describeNative(value: unknown): string {
  if (typeof value !== 'object' || value === null) return typeof value;
  const name = value.constructor?.name;
  return name ? `${name} instance` : 'object';
}

function isPlainObject(value: object): value is Record<string, unknown> {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Convert plain JavaScript data to a ScriptValue.
 *
 * null and undefined become nil.
 *
 * @throws ConversionError for functions, symbols, bigints, class instances
 * and circular structures
 */
export function fromNative(value: unknown): ScriptValue {
  return convertNative(value, new Set());
}

function convertNative(value: unknown, seen: Set<object>): ScriptValue {
  if (value === null || value === undefined) return nilValue();
  if (typeof value === 'boolean') return booleanValue(value);
  if (typeof value === 'number') return numberValue(value);
  if (typeof value === 'string') return stringValue(value);

  if (typeof value !== 'object') {
    throw new ConversionError('MOON-R002', {
      value: typeof value,
      targetType: 'script value',
    });
  }

  if (seen.has(value)) {
    throw new ConversionError('MOON-R002', {
      value: 'circular structure',
      targetType: 'script value',
    });
  }
  seen.add(value);

  const entries: [TableKeyLike, ScriptValue][] = [];
  if (Array.isArray(value)) {
    value.forEach((element: unknown, i) => {
      entries.push([i + 1, convertNative(element, seen)]);
    });
  } else if (value instanceof Map) {
    const map: Map<unknown, unknown> = value;
    for (const [key, element] of map) {
      if (typeof key !== 'string' && typeof key !== 'number') {
        throw new ConversionError('MOON-R002', {
          value: `Map key of type ${typeof key}`,
          targetType: 'table key',
        });
      }
      entries.push([key, convertNative(element, seen)]);
    }
  } else if (isPlainObject(value)) {
    for (const [key, element] of Object.entries(value)) {
      entries.push([key, convertNative(element, seen)]);
    }
  } else {
    throw new ConversionError('MOON-R002', {
      value: describeNative(value),
      targetType: 'script value',
    });
  }

  seen.delete(value);
  return tableValue(new ScriptTable(entries));
}

/** True when the table's keys are exactly the numbers 1..size */
function isSequence(table: ScriptTable): boolean {
  if (table.size === 0) return false;
  for (let i = 1; i <= table.size; i++) {
    if (!table.has(i)) return false;
  }
  return true;
}

/**
 * Convert a ScriptValue to plain JavaScript data.
 *
 * nil becomes null. Non-empty tables whose keys are exactly 1..n become
 * arrays; every other table becomes an object, number keys written in
 * their String() form. An empty table becomes {}.
 *
 * @throws ConversionError for error values, and for tables holding both
 * the string key "1" and the number key 1 (or any such pair)
 */
export function toNative(value: ScriptValue): NativeValue {
  switch (value.kind) {
    case 'nil':
      return null;
    case 'boolean':
    case 'number':
    case 'string':
      return value.value;
    case 'error':
      throw new ConversionError('MOON-R002', {
        value: 'error value',
        targetType: 'native value',
      });
    case 'table': {
      const { table } = value;
      if (isSequence(table)) {
        const list: NativeValue[] = [];
        for (let i = 1; i <= table.size; i++) {
          list.push(toNative(table.getInteger(i)));
        }
        return list;
      }
      const names = new Set<string>();
      const pairs: [string, NativeValue][] = [];
      for (const [key, element] of table) {
        const name = key.toString();
        if (names.has(name)) {
          throw new ConversionError('MOON-R002', {
            value: `table with colliding keys "${name}" and ${name}`,
            targetType: 'object',
          });
        }
        names.add(name);
        pairs.push([name, toNative(element)]);
      }
      // fromEntries defines own properties, so "__proto__" stays a key
      return Object.fromEntries(pairs);
    }
  }
}
