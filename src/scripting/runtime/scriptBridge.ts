// ═══════════════════════════════════════════════════════════════════════════
// Script Bridge - Runs Lua script nodes against a copy of the variable store
// ═══════════════════════════════════════════════════════════════════════════

import { LuaRuntime, LUA_NIL, type LuaArgument, type LuaValue } from '../../lib/lua/runtime'
import {
  boolValue,
  f32Value,
  i32Value,
  isI32,
  stringValue,
  UNIT,
  type Value,
} from '../model/values'

export interface ScriptRunResult {
  /** Store contents after the script ran, including partial writes before an error */
  variables: Map<string, Value>
  /** Text passed to print(), in call order */
  prints: string[]
  /** Error message if loading or running the script failed */
  error?: string
}

export function valueToLua(value: Value): LuaValue {
  switch (value.type) {
    case 'Bool':
      return { type: 'boolean', value: value.value }
    case 'I32':
      return { type: 'integer', value: value.value }
    case 'F32':
      return { type: 'number', value: value.value }
    case 'String':
      return { type: 'string', value: value.value }
    case 'Unit':
      return LUA_NIL
  }
}

/**
 * Convert a Lua value back into a graph value. Integers outside the 32-bit
 * range, tables and functions have no graph counterpart.
 */
export function luaToValue(value: LuaValue): Value | undefined {
  switch (value.type) {
    case 'nil':
      return UNIT
    case 'boolean':
      return boolValue(value.value)
    case 'integer':
      return isI32(value.value) ? i32Value(value.value) : undefined
    case 'number':
      return f32Value(value.value)
    case 'string':
      return stringValue(value.value)
    default:
      return undefined
  }
}

function stringArg(arg: LuaArgument | undefined): string | undefined {
  return arg?.value.type === 'string' ? arg.value.value : undefined
}

/**
 * Evaluate `code` in a fresh sandboxed Lua state exposing get_var, set_var,
 * dt and print. The given store is not modified; the caller copies the
 * returned snapshot back.
 */
export function runScript(
  code: string,
  store: ReadonlyMap<string, Value>,
  deltaTimeVariable: string
): ScriptRunResult {
  const variables = new Map(store)
  const prints: string[] = []
  const runtime = new LuaRuntime()

  runtime.registerFunction('print', (...args) => {
    prints.push(args.map(a => a.text).join('\t'))
    return undefined
  })

  runtime.registerFunction('get_var', name => {
    const key = stringArg(name)
    if (key === undefined) return LUA_NIL
    const value = variables.get(key)
    return value ? valueToLua(value) : LUA_NIL
  })

  runtime.registerFunction('set_var', (name, value) => {
    const key = stringArg(name)
    const converted = value ? luaToValue(value.value) : UNIT
    if (key !== undefined && converted) {
      variables.set(key, converted)
    }
    return undefined
  })

  runtime.registerFunction('dt', () => {
    const dt = variables.get(deltaTimeVariable)
    return { type: 'number', value: dt?.type === 'F32' ? dt.value : 0 }
  })

  try {
    runtime.execute(code)
    return { variables, prints }
  } catch (e) {
    return { variables, prints, error: e instanceof Error ? e.message : String(e) }
  } finally {
    runtime.close()
  }
}
