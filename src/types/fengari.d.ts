// Type definitions for fengari
// Fengari is a Lua 5.3 implementation in JavaScript

declare module 'fengari' {
  // Lua string type (Uint8Array)
  export type LuaString = Uint8Array

  // Opaque Lua state handle
  export interface LuaState {
    readonly __luaState: never
  }

  export type LuaCFunction = (L: LuaState) => number

  // Convert between JS and Lua strings. With replacement_char set, invalid
  // UTF-8 decodes to U+FFFD instead of throwing
  export function to_luastring(str: string): LuaString
  export function to_jsstring(
    str: LuaString,
    from?: number,
    to?: number,
    replacement_char?: boolean
  ): string

  // lua module - core Lua functions
  export const lua: {
    // Constants
    LUA_OK: number
    LUA_MULTRET: number

    // Type constants
    LUA_TBOOLEAN: number
    LUA_TNUMBER: number
    LUA_TSTRING: number
    LUA_TTABLE: number
    LUA_TFUNCTION: number

    // Stack manipulation
    lua_gettop(L: LuaState): number
    lua_settop(L: LuaState, idx: number): void
    lua_pop(L: LuaState, n: number): void

    // Type checking
    lua_type(L: LuaState, idx: number): number
    lua_isinteger(L: LuaState, idx: number): boolean

    // Value retrieval
    lua_tonumber(L: LuaState, idx: number): number
    lua_tointeger(L: LuaState, idx: number): number
    lua_toboolean(L: LuaState, idx: number): boolean
    lua_tolstring(L: LuaState, idx: number): LuaString | null

    // Push values
    lua_pushnil(L: LuaState): void
    lua_pushnumber(L: LuaState, n: number): void
    lua_pushinteger(L: LuaState, n: number): void
    lua_pushboolean(L: LuaState, b: boolean | number): void
    lua_pushstring(L: LuaState, s: LuaString): void
    lua_pushcfunction(L: LuaState, fn: LuaCFunction): void

    // Global table
    lua_getglobal(L: LuaState, name: LuaString): number
    lua_setglobal(L: LuaState, name: LuaString): void

    // Function calls
    lua_pcall(L: LuaState, nargs: number, nresults: number, errfunc: number): number

    // Error handling
    lua_error(L: LuaState): number

    // State management
    lua_close(L: LuaState): void
  }

  // lauxlib module - auxiliary library
  export const lauxlib: {
    luaL_newstate(): LuaState
    luaL_loadbuffer(L: LuaState, buff: LuaString, size: number | null, name: LuaString): number
    luaL_tolstring(L: LuaState, idx: number): LuaString
  }

  // lualib module - standard libraries
  export const lualib: {
    luaL_openlibs(L: LuaState): void
  }
}
