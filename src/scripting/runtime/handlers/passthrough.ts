import type { NodeHandler } from './types'

/** Continues through `then`. Used by kinds with no runtime effect. */
export const passthroughHandler: NodeHandler = {
  execute: (interpreter, _output, nodeId) => interpreter.nextExec(nodeId, 'then'),
}
