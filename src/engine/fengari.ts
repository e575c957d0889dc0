/**
 * Fengari Adapter
 *
 * LuaStack implementation over a fengari lua_State (Lua 5.3 in pure JS).
 */

import fengari, { type lua_State } from 'fengari';
import { InvocationError, ScriptLoadError } from '../error-classes.js';
import { describeErrorObject } from './error-object.js';
import type { CallStatus, LuaStack, TypeTag } from './types.js';

// fengari is CommonJS; its members are read off the default export
const { lauxlib, lua, lualib, to_luastring } = fengari;

const TYPE_TAGS: ReadonlyMap<number, TypeTag> = new Map<number, TypeTag>([
  [lua.LUA_TNONE, 'none'],
  [lua.LUA_TNIL, 'nil'],
  [lua.LUA_TBOOLEAN, 'boolean'],
  [lua.LUA_TLIGHTUSERDATA, 'lightuserdata'],
  [lua.LUA_TNUMBER, 'number'],
  [lua.LUA_TSTRING, 'string'],
  [lua.LUA_TTABLE, 'table'],
  [lua.LUA_TFUNCTION, 'function'],
  [lua.LUA_TUSERDATA, 'userdata'],
  [lua.LUA_TTHREAD, 'thread'],
]);

function toTypeTag(type: number): TypeTag {
  return TYPE_TAGS.get(type) ?? 'none';
}

function toCallStatus(status: number): CallStatus {
  switch (status) {
    case lua.LUA_OK:
      return 'ok';
    case lua.LUA_ERRMEM:
      return 'memory';
    case lua.LUA_ERRGCMM:
      return 'gc';
    case lua.LUA_ERRERR:
      return 'handler';
    default:
      return 'runtime';
  }
}

/** Options for createLuaState */
export interface LuaStateOptions {
  /** Open the standard libraries (default: true) */
  openLibs?: boolean | undefined;
}

export class FengariStack implements LuaStack {
  constructor(readonly state: lua_State) {}

  getTop(): number {
    return lua.lua_gettop(this.state);
  }

  setTop(index: number): void {
    lua.lua_settop(this.state, index);
  }

  absIndex(index: number): number {
    return lua.lua_absindex(this.state, index);
  }

  checkStack(n: number): boolean {
    return lua.lua_checkstack(this.state, n);
  }

  pop(n: number): void {
    lua.lua_pop(this.state, n);
  }

  typeOf(index: number): TypeTag {
    return toTypeTag(lua.lua_type(this.state, index));
  }

  toBoolean(index: number): boolean {
    return lua.lua_toboolean(this.state, index);
  }

  toNumber(index: number): number {
    return lua.lua_tonumber(this.state, index);
  }

  toText(index: number): string {
    return lua.lua_tojsstring(this.state, index);
  }

  pushNil(): void {
    lua.lua_pushnil(this.state);
  }

  pushBoolean(value: boolean): void {
    lua.lua_pushboolean(this.state, value);
  }

  pushNumber(value: number): void {
    lua.lua_pushnumber(this.state, value);
  }

  pushString(value: string): void {
    lua.lua_pushstring(this.state, to_luastring(value));
  }

  newTable(): void {
    lua.lua_newtable(this.state);
  }

  setTable(index: number): void {
    lua.lua_settable(this.state, index);
  }

  next(index: number): boolean {
    return lua.lua_next(this.state, index) !== 0;
  }

  getGlobal(name: string): TypeTag {
    return toTypeTag(lua.lua_getglobal(this.state, to_luastring(name)));
  }

  lookupGlobal(name: string): CallStatus {
    const key = to_luastring(name);
    lua.lua_pushcfunction(this.state, (L) => {
      lua.lua_getglobal(L, key);
      return 1;
    });
    return this.pcall(0, 1);
  }

  setGlobal(name: string): void {
    lua.lua_setglobal(this.state, to_luastring(name));
  }

  pcall(nargs: number, nresults: number): CallStatus {
    return toCallStatus(lua.lua_pcall(this.state, nargs, nresults, 0));
  }

  /**
   * Compile and run a chunk, discarding its results.
   *
   * @throws ScriptLoadError when the chunk does not compile
   * @throws InvocationError when running the chunk raises an error
   */
  execute(source: string, chunkName = 'chunk'): void {
    const code = to_luastring(source);
    const base = this.getTop();
    const loaded = lauxlib.luaL_loadbuffer(
      this.state,
      code,
      code.length,
      to_luastring(`=${chunkName}`)
    );
    if (loaded !== lua.LUA_OK) {
      const reason = describeErrorObject(this);
      this.setTop(base);
      throw new ScriptLoadError(chunkName, reason);
    }

    const status = this.pcall(0, 0);
    if (status !== 'ok') {
      const reason = describeErrorObject(this);
      this.setTop(base);
      throw new InvocationError('MOON-R003', chunkName, reason, status);
    }
  }

  /** Release the state; the stack must not be used afterwards */
  close(): void {
    lua.lua_close(this.state);
  }
}

/**
 * Create a fresh Lua state wrapped as a LuaStack.
 * The caller owns the state and closes it with close().
 */
export function createLuaState(options: LuaStateOptions = {}): FengariStack {
  const state = lauxlib.luaL_newstate();
  if (options.openLibs ?? true) {
    lualib.luaL_openlibs(state);
  }
  return new FengariStack(state);
}
