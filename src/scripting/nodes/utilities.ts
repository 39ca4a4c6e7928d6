// Utility nodes: printing and embedded scripts

import { CONSTRUCTION_GRAPH, EVENT_GRAPH } from '../model/graph'
import { stringValue } from '../model/values'
import { execIn, execOut, input, type NodeDefinition } from './types'

export const DEFAULT_SCRIPT_CODE = [
  '-- Lua snippet examples',
  '--',
  '-- 1) Log',
  '-- print("Hello from Lua")',
  '--',
  '-- 2) Use variables',
  '-- set_var("message", "Hello")',
  '-- print(get_var("message"))',
  '--',
  '-- 3) Read delta time during Tick',
  '-- print("dt = " .. dt())',
  '',
].join('\n')

export const printNode: NodeDefinition = {
  kind: 'Print',
  displayName: 'Print String',
  category: 'Utility',
  description: 'Prints a string to the output log.',
  pins: [execIn(), execOut(), input('text', 'String')],
  properties: [{ name: 'text', defaultValue: stringValue('Hello'), inline: true }],
  isEntry: false,
  isPure: false,
  allowedGraphs: [EVENT_GRAPH, CONSTRUCTION_GRAPH],
}

export const luaScriptNode: NodeDefinition = {
  kind: 'LuaScript',
  displayName: 'Lua Script',
  category: 'Utility',
  description: 'Runs a Lua snippet. Use get_var(name), set_var(name, value), dt(), and print(text).',
  pins: [execIn(), execOut(), input('code', 'String')],
  properties: [{ name: 'code', defaultValue: stringValue(DEFAULT_SCRIPT_CODE), inline: true }],
  isEntry: false,
  isPure: false,
  allowedGraphs: [EVENT_GRAPH, CONSTRUCTION_GRAPH],
}
