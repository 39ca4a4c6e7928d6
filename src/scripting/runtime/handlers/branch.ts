import { asBool } from '../../model/values'
import type { NodeHandler } from './types'

// Exactly one of `true` / `false` is followed
export const branchHandler: NodeHandler = {
  execute: (interpreter, _output, nodeId, node) => {
    const condition =
      interpreter.readBoolInput(nodeId, 'condition') ?? asBool(node.properties.condition) ?? false
    return interpreter.nextExec(nodeId, condition ? 'true' : 'false')
  },
}
