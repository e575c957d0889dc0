/**
 * Type declarations for the parts of the Fengari Lua interpreter used here.
 * Fengari ships no typings.
 *
 * Fengari strings are Uint8Array "lua strings"; to_luastring() converts
 * JS strings before they are handed to the VM.
 */

declare module 'fengari' {
  namespace fengari {
    export type LuaString = Uint8Array;

    export interface lua_State {
      // Opaque type representing Lua state
    }

    export namespace lua {
      export const LUA_OK: number;
      export const LUA_ERRMEM: number;
      export const LUA_ERRGCMM: number;
      export const LUA_ERRERR: number;

      export const LUA_TNONE: number;
      export const LUA_TNIL: number;
      export const LUA_TBOOLEAN: number;
      export const LUA_TLIGHTUSERDATA: number;
      export const LUA_TNUMBER: number;
      export const LUA_TSTRING: number;
      export const LUA_TTABLE: number;
      export const LUA_TFUNCTION: number;
      export const LUA_TUSERDATA: number;
      export const LUA_TTHREAD: number;

      export function lua_close(L: lua_State): void;

      export function lua_gettop(L: lua_State): number;
      export function lua_settop(L: lua_State, idx: number): void;
      export function lua_pop(L: lua_State, n: number): void;
      export function lua_absindex(L: lua_State, idx: number): number;
      export function lua_checkstack(L: lua_State, n: number): boolean;

      export function lua_type(L: lua_State, idx: number): number;

      export function lua_toboolean(L: lua_State, idx: number): boolean;
      export function lua_tonumber(L: lua_State, idx: number): number;
      export function lua_tojsstring(L: lua_State, idx: number): string;

      export function lua_pushnil(L: lua_State): void;
      export function lua_pushboolean(L: lua_State, b: boolean): void;
      export function lua_pushnumber(L: lua_State, n: number): void;
      export function lua_pushstring(L: lua_State, s: LuaString): LuaString;

      export function lua_pushcfunction(
        L: lua_State,
        fn: (L: lua_State) => number
      ): void;

      export function lua_newtable(L: lua_State): void;
      export function lua_settable(L: lua_State, idx: number): void;
      export function lua_next(L: lua_State, idx: number): number;

      export function lua_getglobal(L: lua_State, name: LuaString): number;
      export function lua_setglobal(L: lua_State, name: LuaString): void;

      export function lua_pcall(
        L: lua_State,
        nargs: number,
        nresults: number,
        msgh: number
      ): number;
    }

    export namespace lauxlib {
      export function luaL_newstate(): lua_State;
      export function luaL_loadbuffer(
        L: lua_State,
        buff: LuaString,
        size: number,
        name: LuaString
      ): number;
    }

    export namespace lualib {
      export function luaL_openlibs(L: lua_State): void;
    }

    export function to_luastring(str: string): LuaString;
  }

  export = fengari;
}
