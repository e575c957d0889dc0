/**
 * Engine Port
 *
 * The stack-oriented surface of a Lua state that the marshalling layer
 * talks to. Indices follow the Lua C API: positive indices count from the
 * bottom of the current frame (1 is the first slot), negative indices
 * count from the top (-1 is the top slot).
 */

/** Runtime type tag of a stack slot */
export type TypeTag =
  | 'none'
  | 'nil'
  | 'boolean'
  | 'lightuserdata'
  | 'number'
  | 'string'
  | 'table'
  | 'function'
  | 'userdata'
  | 'thread';

/** Outcome of a protected call */
export type CallStatus = 'ok' | 'runtime' | 'memory' | 'gc' | 'handler';

export interface LuaStack {
  /** Index of the top slot (0 when the stack is empty) */
  getTop(): number;
  /** Grow (with nils) or shrink the stack to exactly index slots */
  setTop(index: number): void;
  /** Convert an acceptable index into an equivalent absolute index */
  absIndex(index: number): number;
  /** Ensure room for n extra slots; false when the stack cannot grow */
  checkStack(n: number): boolean;
  /** Pop n slots */
  pop(n: number): void;

  typeOf(index: number): TypeTag;
  toBoolean(index: number): boolean;
  toNumber(index: number): number;
  /** Text of a string slot */
  toText(index: number): string;

  pushNil(): void;
  pushBoolean(value: boolean): void;
  pushNumber(value: number): void;
  pushString(value: string): void;
  /** Push a new empty table */
  newTable(): void;

  /**
   * table[key] = value for the table at index, where value is the top slot
   * and key the slot below it. Both are popped.
   */
  setTable(index: number): void;
  /**
   * Pop a key and push the next key/value pair of the table at index.
   * Returns false, pushing nothing, when the table is exhausted.
   */
  next(index: number): boolean;

  /** Push the value of a global; returns its type */
  getGlobal(name: string): TypeTag;
  /**
   * Push the value of a global, reading it in protected mode so that an
   * __index metamethod on the globals table may raise. On failure the
   * error object is pushed in its place.
   */
  lookupGlobal(name: string): CallStatus;
  /** Pop the top slot into a global */
  setGlobal(name: string): void;

  /**
   * Call the function below the top nargs slots, in protected mode.
   * On 'ok' the function and arguments are replaced by exactly nresults
   * slots; on failure they are replaced by one error object.
   */
  pcall(nargs: number, nresults: number): CallStatus;
}
