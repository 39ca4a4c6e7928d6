import { asString } from '../../model/values'
import type { NodeHandler } from './types'

export const luaScriptHandler: NodeHandler = {
  execute: (interpreter, output, nodeId, node) => {
    const code = interpreter.readStringInput(nodeId, 'code') ?? asString(node.properties.code) ?? ''
    interpreter.executeScript(code, output)
    return interpreter.nextExec(nodeId, 'then')
  },
}
