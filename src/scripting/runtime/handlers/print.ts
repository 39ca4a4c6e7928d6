import { asString } from '../../model/values'
import type { NodeHandler } from './types'

export const printHandler: NodeHandler = {
  execute: (interpreter, output, nodeId, node) => {
    const text =
      interpreter.readStringInput(nodeId, 'text') ?? asString(node.properties.text) ?? ''
    output.events.push({ type: 'Print', text })
    return interpreter.nextExec(nodeId, 'then')
  },
}
