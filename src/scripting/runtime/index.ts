export {
  createOutput,
  DEFAULT_INTERPRETER_CONFIG,
  Interpreter,
  type ExecutionEvent,
  type InterpreterConfig,
  type InterpreterOutput,
} from './Interpreter'
export { handlerFor, NODE_HANDLERS, type NodeHandler } from './handlers'
export { luaToValue, runScript, valueToLua, type ScriptRunResult } from './scriptBridge'
