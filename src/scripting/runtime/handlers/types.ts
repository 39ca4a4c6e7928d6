// =============================================================================
// Node Handlers - Runtime behaviour of each built-in node kind
// =============================================================================

import type { CompiledNode } from '../../compiler/compile'
import type { NodeId, PinId } from '../../model/graph'
import type { Interpreter, InterpreterOutput } from '../Interpreter'

export interface NodeHandler {
  /**
   * Run the node and return the exec input pin to continue at, or undefined
   * to end the chain.
   */
  execute(
    interpreter: Interpreter,
    output: InterpreterOutput,
    nodeId: NodeId,
    node: CompiledNode
  ): PinId | undefined
}
