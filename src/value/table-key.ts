/**
 * Table Keys
 *
 * Identity of a Lua table key on the host side. Only string and number
 * keys are representable. Equality and hashing are kind-sensitive: the
 * string key "3" and the number key 3 are different keys.
 */

/** Kinds of representable table keys */
export type TableKeyKind = 'string' | 'number';

/** Immutable string or number table key */
export class TableKey {
  private constructor(
    readonly kind: TableKeyKind,
    readonly value: string | number
  ) {
    Object.freeze(this);
  }

  /** Key holding a text value */
  static string(value: string): TableKey {
    return new TableKey('string', value);
  }

  /** Key holding a double value */
  static number(value: number): TableKey {
    return new TableKey('number', value);
  }

  /** Key of the kind matching the JS type of value */
  static from(value: string | number): TableKey {
    return typeof value === 'string'
      ? TableKey.string(value)
      : TableKey.number(value);
  }

  /**
   * Kind-then-payload comparison.
   * Numbers compare with SameValueZero so that equality agrees with hash().
   */
  equals(other: TableKey): boolean {
    if (this.kind !== other.kind) return false;
    if (this.value === other.value) return true;
    return (
      typeof this.value === 'number' &&
      typeof other.value === 'number' &&
      Number.isNaN(this.value) &&
      Number.isNaN(other.value)
    );
  }

  /** Hash string; equal keys produce equal hashes */
  hash(): string {
    // String(-0) is "0", matching -0 === 0
    return this.kind === 'string'
      ? `s:${this.value}`
      : `n:${String(this.value)}`;
  }

  /** Bare text for string keys, numeric text for number keys */
  toString(): string {
    return String(this.value);
  }
}
