// =============================================================================
// Handler Table - Static dispatch from node kind to behaviour
// =============================================================================

import type { BuiltinNodeKind } from '../../model/graph'
import { branchHandler } from './branch'
import { luaScriptHandler } from './luaScript'
import { passthroughHandler } from './passthrough'
import { printHandler } from './print'
import { setVariableHandler } from './setVariable'
import type { NodeHandler } from './types'

export type { NodeHandler } from './types'
export { branchHandler, luaScriptHandler, passthroughHandler, printHandler, setVariableHandler }

export const NODE_HANDLERS: Record<BuiltinNodeKind, NodeHandler> = {
  BeginPlay: passthroughHandler,
  Tick: passthroughHandler,
  ConstructionScript: passthroughHandler,
  Print: printHandler,
  LuaScript: luaScriptHandler,
  Branch: branchHandler,
  GetVariable: passthroughHandler,
  SetVariable: setVariableHandler,
  Self: passthroughHandler,
  GetActorTransform: passthroughHandler,
  SetActorTransform: passthroughHandler,
  SpawnActor: passthroughHandler,
  GetActorByName: passthroughHandler,
  GetActorName: passthroughHandler,
}

export function handlerFor(kind: BuiltinNodeKind): NodeHandler {
  return NODE_HANDLERS[kind]
}
