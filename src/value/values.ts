/**
 * Script Value Types and Utilities
 *
 * Closed union of the values that cross the host/Lua boundary.
 * Public API for host applications.
 */

import { ConversionError } from '../error-classes.js';
import { ScriptTable } from './table.js';
import type { TableKeyLike } from './table.js';

export interface NilValue {
  readonly kind: 'nil';
}

export interface BooleanValue {
  readonly kind: 'boolean';
  readonly value: boolean;
}

export interface NumberValue {
  readonly kind: 'number';
  readonly value: number;
}

export interface StringValue {
  readonly kind: 'string';
  readonly value: string;
}

export interface TableValue {
  readonly kind: 'table';
  readonly table: ScriptTable;
}

/**
 * Host-only diagnostic produced when pull meets a value it cannot convert.
 * It has no Lua counterpart: pushing it pushes nil.
 */
export interface ErrorValue {
  readonly kind: 'error';
  readonly message: string;
}

/** Any value that can cross the boundary */
export type ScriptValue =
  | NilValue
  | BooleanValue
  | NumberValue
  | StringValue
  | TableValue
  | ErrorValue;

/** Discriminant of ScriptValue */
export type ScriptValueKind = ScriptValue['kind'];

// ============================================================
// CONSTRUCTORS
// ============================================================

const NIL: NilValue = Object.freeze({ kind: 'nil' });

export function nilValue(): NilValue {
  return NIL;
}

export function booleanValue(value: boolean): BooleanValue {
  return Object.freeze({ kind: 'boolean', value });
}

export function numberValue(value: number): NumberValue {
  return Object.freeze({ kind: 'number', value });
}

export function stringValue(value: string): StringValue {
  return Object.freeze({ kind: 'string', value });
}

/** Table value from a ScriptTable or from key/value pairs */
export function tableValue(
  entries:
    | ScriptTable
    | Iterable<readonly [TableKeyLike, ScriptValue]> = new ScriptTable()
): TableValue {
  const table =
    entries instanceof ScriptTable ? entries : new ScriptTable(entries);
  return Object.freeze({ kind: 'table', table });
}

export function errorValue(message: string): ErrorValue {
  return Object.freeze({ kind: 'error', message });
}

// ============================================================
// TYPE GUARDS
// ============================================================

export function isNil(value: ScriptValue): value is NilValue {
  return value.kind === 'nil';
}

export function isBoolean(value: ScriptValue): value is BooleanValue {
  return value.kind === 'boolean';
}

export function isNumber(value: ScriptValue): value is NumberValue {
  return value.kind === 'number';
}

export function isString(value: ScriptValue): value is StringValue {
  return value.kind === 'string';
}

export function isTable(value: ScriptValue): value is TableValue {
  return value.kind === 'table';
}

export function isError(value: ScriptValue): value is ErrorValue {
  return value.kind === 'error';
}

/**
 * Table of a table value.
 * @throws ConversionError when value is not a table
 */
export function expectTable(value: ScriptValue): ScriptTable {
  if (value.kind !== 'table') {
    throw new ConversionError('MOON-R002', {
      value: value.kind,
      targetType: 'table',
    });
  }
  return value.table;
}

// ============================================================
// EQUALITY
// ============================================================

/**
 * Deep structural equality.
 * - Primitives: same kind and same payload (numbers compare with SameValueZero)
 * - Tables: same keys + recursive value equality (order-independent)
 * - Errors: same message
 */
export function valueEquals(a: ScriptValue, b: ScriptValue): boolean {
  switch (a.kind) {
    case 'nil':
      return b.kind === 'nil';
    case 'boolean':
      return b.kind === 'boolean' && a.value === b.value;
    case 'string':
      return b.kind === 'string' && a.value === b.value;
    case 'number':
      return (
        b.kind === 'number' &&
        (a.value === b.value ||
          (Number.isNaN(a.value) && Number.isNaN(b.value)))
      );
    case 'error':
      return b.kind === 'error' && a.message === b.message;
    case 'table': {
      if (b.kind !== 'table') return false;
      if (a.table.size !== b.table.size) return false;
      for (const [key, aVal] of a.table) {
        const bVal = b.table.find(key);
        if (bVal === undefined || !valueEquals(aVal, bVal)) return false;
      }
      return true;
    }
  }
}
