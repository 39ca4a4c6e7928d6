export * from './scripting'
export { LuaError, LuaRuntime, DEFAULT_LUA_RUNTIME_OPTIONS } from './lib/lua/runtime'
export type { LuaArgument, LuaHostFunction, LuaRuntimeOptions, LuaValue } from './lib/lua/runtime'
