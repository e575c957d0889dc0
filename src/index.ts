/**
 * moonbridge
 * Marshals values between a Node.js host and an embedded Lua engine.
 */

// ============================================================
// VALUES
// ============================================================
export { TableKey, type TableKeyKind } from './value/table-key.js';
export {
  ScriptTable,
  type TableEntry,
  type TableKeyLike,
} from './value/table.js';
export {
  booleanValue,
  errorValue,
  expectTable,
  isBoolean,
  isError,
  isNil,
  isNumber,
  isString,
  isTable,
  nilValue,
  numberValue,
  stringValue,
  tableValue,
  valueEquals,
  type BooleanValue,
  type ErrorValue,
  type NilValue,
  type NumberValue,
  type ScriptValue,
  type ScriptValueKind,
  type StringValue,
  type TableValue,
} from './value/values.js';
export { fromNative, toNative, type NativeValue } from './value/native.js';

// ============================================================
// ENGINE
// ============================================================
export type { CallStatus, LuaStack, TypeTag } from './engine/types.js';
export { describeErrorObject } from './engine/error-object.js';
export {
  createLuaState,
  FengariStack,
  type LuaStateOptions,
} from './engine/fengari.js';

// ============================================================
// MARSHALLING
// ============================================================
export { pull, unsupportedTypeMessage } from './marshal/pull.js';
export { push } from './marshal/push.js';
export { callFunction } from './marshal/invoke.js';
export {
  forEachTableEntry,
  restoreOnThrow,
  type TableEntryVisitor,
} from './marshal/iteration.js';
export {
  DEFAULT_INDENT_UNIT,
  DEFAULT_MAX_DEPTH,
  type BridgeCallbacks,
  type BridgeOptions,
  type ErrorEvent,
  type FunctionReturnEvent,
  type LogEvent,
  type ObservabilityCallbacks,
  type ScriptCallEvent,
  type UnsupportedValueEvent,
} from './marshal/context.js';
export { stringify } from './present/stringify.js';

// ============================================================
// CONFIGURATION
// ============================================================
export {
  CONFIG_FILE_NAME,
  createDefaultConfig,
  loadConfig,
  loadConfigFile,
  toBridgeOptions,
  type BridgeConfig,
} from './config.js';

// ============================================================
// ERROR TAXONOMY
// ============================================================
export {
  ERROR_REGISTRY,
  messageFor,
  renderMessage,
  type ErrorCategory,
  type ErrorDefinition,
  type ErrorRegistry,
} from './error-registry.js';
export {
  BridgeError,
  ConfigError,
  ConversionError,
  createError,
  InvocationError,
  MissingKeyError,
  ScriptLoadError,
  type BridgeErrorData,
  type FaultStatus,
} from './error-classes.js';
