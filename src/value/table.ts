/**
 * Script Tables
 *
 * Host-side copy of a Lua table: an unordered map from TableKey to
 * ScriptValue. Entries are stored in a Map keyed by TableKey.hash(), so
 * lookups respect the kind-sensitive key identity.
 *
 * Tables are immutable. with() and without() return new tables.
 * Iteration follows insertion order, which callers must not rely on.
 */

import { MissingKeyError } from '../error-classes.js';
import { TableKey } from './table-key.js';
import type { ScriptValue } from './values.js';

/** Anything accepted where a table key is expected */
export type TableKeyLike = TableKey | string | number;

/** Key/value pair of a table */
export type TableEntry = readonly [TableKey, ScriptValue];

function toKey(key: TableKeyLike): TableKey {
  return key instanceof TableKey ? key : TableKey.from(key);
}

/** Display form used in missing-key messages */
function describeKey(key: TableKey): string {
  return typeof key.value === 'string'
    ? JSON.stringify(key.value)
    : String(key.value);
}

export class ScriptTable implements Iterable<TableEntry> {
  private readonly slots: ReadonlyMap<string, TableEntry>;

  /** Later entries replace earlier entries with an equal key */
  constructor(
    entries: Iterable<readonly [TableKeyLike, ScriptValue]> = []
  ) {
    const slots = new Map<string, TableEntry>();
    for (const [rawKey, value] of entries) {
      const key = toKey(rawKey);
      const entry: TableEntry = [key, value];
      slots.set(key.hash(), entry);
    }
    this.slots = slots;
    Object.freeze(this);
  }

  /** Number of entries */
  get size(): number {
    return this.slots.size;
  }

  has(key: TableKeyLike): boolean {
    return this.slots.has(toKey(key).hash());
  }

  /** Value stored under key, or undefined when absent */
  find(key: TableKeyLike): ScriptValue | undefined {
    return this.slots.get(toKey(key).hash())?.[1];
  }

  /**
   * Value stored under key.
   * @throws MissingKeyError when the key is absent
   */
  get(key: TableKey): ScriptValue {
    const entry = this.slots.get(key.hash());
    if (entry === undefined) {
      throw new MissingKeyError(describeKey(key));
    }
    return entry[1];
  }

  /** Lookup by string key */
  getString(key: string): ScriptValue {
    return this.get(TableKey.string(key));
  }

  /** Lookup by number key */
  getNumber(key: number): ScriptValue {
    return this.get(TableKey.number(key));
  }

  /**
   * Lookup by integer key. The integer maps onto the number key domain,
   * so getInteger(1) and getNumber(1.0) find the same entry.
   */
  getInteger(key: number): ScriptValue {
    if (!Number.isInteger(key)) {
      throw new TypeError(`Expected an integer key, got ${key}`);
    }
    return this.get(TableKey.number(key));
  }

  /** Copy of this table with key set to value */
  with(key: TableKeyLike, value: ScriptValue): ScriptTable {
    return new ScriptTable([...this.entries(), [toKey(key), value]]);
  }

  /** Copy of this table without key */
  without(key: TableKeyLike): ScriptTable {
    const hash = toKey(key).hash();
    const kept: TableEntry[] = [];
    for (const [slot, entry] of this.slots) {
      if (slot !== hash) kept.push(entry);
    }
    return new ScriptTable(kept);
  }

  entries(): IterableIterator<TableEntry> {
    return this.slots.values();
  }

  *keys(): IterableIterator<TableKey> {
    for (const [key] of this.slots.values()) {
      yield key;
    }
  }

  *values(): IterableIterator<ScriptValue> {
    for (const [, value] of this.slots.values()) {
      yield value;
    }
  }

  [Symbol.iterator](): IterableIterator<TableEntry> {
    return this.entries();
  }
}
