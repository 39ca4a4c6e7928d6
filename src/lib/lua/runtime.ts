// ═══════════════════════════════════════════════════════════════════════════
// Lua Runtime - Fengari-based Lua interpreter for script nodes
// ═══════════════════════════════════════════════════════════════════════════

import { lua, lauxlib, lualib, to_jsstring, to_luastring, type LuaState } from 'fengari'

export type LuaValue =
  | { type: 'nil' }
  | { type: 'boolean'; value: boolean }
  | { type: 'integer'; value: number }
  | { type: 'number'; value: number }
  | { type: 'string'; value: string }
  | { type: 'table' }
  | { type: 'function' }

/** Argument passed to a registered host function. */
export interface LuaArgument {
  value: LuaValue
  /** The argument as Lua's tostring() renders it */
  text: string
}

export type LuaHostFunction = (...args: LuaArgument[]) => LuaValue | undefined

export interface LuaRuntimeOptions {
  /** Strip globals that reach the file system, the process or the loader */
  sandbox: boolean
  /** Name reported in error positions, e.g. `script:3: attempt to call a nil value` */
  chunkName: string
}

export const DEFAULT_LUA_RUNTIME_OPTIONS: LuaRuntimeOptions = {
  sandbox: true,
  chunkName: 'script',
}

const SANDBOX_REMOVED_GLOBALS = [
  'io',
  'os',
  'package',
  'require',
  'dofile',
  'loadfile',
  'load',
  'debug',
]

export const LUA_NIL: LuaValue = { type: 'nil' }

/** Decode Lua bytes, replacing invalid UTF-8 sequences with U+FFFD */
function decode(bytes: Uint8Array): string {
  return to_jsstring(bytes, 0, bytes.length, true)
}

export class LuaError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'LuaError'
  }
}

export class LuaRuntime {
  private L: LuaState | null
  private readonly options: LuaRuntimeOptions

  constructor(options: Partial<LuaRuntimeOptions> = {}) {
    this.options = { ...DEFAULT_LUA_RUNTIME_OPTIONS, ...options }
    this.L = lauxlib.luaL_newstate()
    lualib.luaL_openlibs(this.L)

    if (this.options.sandbox) {
      for (const name of SANDBOX_REMOVED_GLOBALS) {
        lua.lua_pushnil(this.L)
        lua.lua_setglobal(this.L, to_luastring(name))
      }
    }
  }

  /**
   * Execute a Lua chunk and return its first result, if any.
   * Throws LuaError on syntax or runtime errors.
   */
  execute(code: string): LuaValue {
    const L = this.state()
    const base = lua.lua_gettop(L)
    const buffer = to_luastring(code)

    const loadStatus = lauxlib.luaL_loadbuffer(
      L,
      buffer,
      buffer.length,
      to_luastring(`=${this.options.chunkName}`)
    )
    if (loadStatus !== lua.LUA_OK) {
      throw new LuaError(this.popError(L))
    }

    const callStatus = lua.lua_pcall(L, 0, lua.LUA_MULTRET, 0)
    if (callStatus !== lua.LUA_OK) {
      throw new LuaError(this.popError(L))
    }

    const result = lua.lua_gettop(L) > base ? this.toValue(L, base + 1) : LUA_NIL
    lua.lua_settop(L, base)
    return result
  }

  /**
   * Set a global variable
   */
  setGlobal(name: string, value: LuaValue): void {
    const L = this.state()
    this.pushValue(L, value)
    lua.lua_setglobal(L, to_luastring(name))
  }

  /**
   * Get a global variable
   */
  getGlobal(name: string): LuaValue {
    const L = this.state()
    lua.lua_getglobal(L, to_luastring(name))
    const result = this.toValue(L, -1)
    lua.lua_pop(L, 1)
    return result
  }

  /**
   * Register a JavaScript function as a Lua global function.
   * An exception thrown by the function is raised as a Lua error.
   */
  registerFunction(name: string, fn: LuaHostFunction): void {
    const L = this.state()
    const wrapper = (state: LuaState): number => {
      const nargs = lua.lua_gettop(state)
      const args: LuaArgument[] = []
      for (let i = 1; i <= nargs; i++) {
        const value = this.toValue(state, i)
        const text = decode(lauxlib.luaL_tolstring(state, i))
        lua.lua_pop(state, 1)
        args.push({ value, text })
      }

      let result: LuaValue | undefined
      try {
        result = fn(...args)
      } catch (e) {
        lua.lua_pushstring(state, to_luastring(e instanceof Error ? e.message : String(e)))
        return lua.lua_error(state)
      }

      if (result === undefined) return 0
      this.pushValue(state, result)
      return 1
    }

    lua.lua_pushcfunction(L, wrapper)
    lua.lua_setglobal(L, to_luastring(name))
  }

  /**
   * Clean up
   */
  close(): void {
    if (this.L) {
      lua.lua_close(this.L)
      this.L = null
    }
  }

  get closed(): boolean {
    return this.L === null
  }

  private state(): LuaState {
    if (!this.L) throw new LuaError('Lua runtime is closed')
    return this.L
  }

  private popError(L: LuaState): string {
    const message = decode(lauxlib.luaL_tolstring(L, -1))
    lua.lua_pop(L, 2)
    return message
  }

  /**
   * Convert Lua value at stack index to a tagged JavaScript value
   */
  private toValue(L: LuaState, index: number): LuaValue {
    const type = lua.lua_type(L, index)

    switch (type) {
      case lua.LUA_TBOOLEAN:
        return { type: 'boolean', value: lua.lua_toboolean(L, index) }

      case lua.LUA_TNUMBER:
        return lua.lua_isinteger(L, index)
          ? { type: 'integer', value: lua.lua_tointeger(L, index) }
          : { type: 'number', value: lua.lua_tonumber(L, index) }

      case lua.LUA_TSTRING: {
        const bytes = lua.lua_tolstring(L, index)
        return { type: 'string', value: bytes ? decode(bytes) : '' }
      }

      case lua.LUA_TTABLE:
        return { type: 'table' }

      case lua.LUA_TFUNCTION:
        return { type: 'function' }

      default:
        return LUA_NIL
    }
  }

  /**
   * Push a tagged value onto the Lua stack. Tables and functions have no
   * JavaScript payload and are pushed as nil.
   */
  private pushValue(L: LuaState, value: LuaValue): void {
    switch (value.type) {
      case 'boolean':
        lua.lua_pushboolean(L, value.value)
        break
      case 'integer':
        lua.lua_pushinteger(L, value.value)
        break
      case 'number':
        lua.lua_pushnumber(L, value.value)
        break
      case 'string':
        lua.lua_pushstring(L, to_luastring(value.value))
        break
      default:
        lua.lua_pushnil(L)
    }
  }
}
