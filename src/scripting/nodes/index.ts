// =============================================================================
// Node Catalog - Registry of every built-in node definition
// =============================================================================

import { EVENT_GRAPH, type BuiltinNodeKind, type Node } from '../model/graph'
import { cloneValue, type Value } from '../model/values'
import { beginPlayNode, constructionScriptNode, tickNode } from './events'
import { branchNode } from './flowControl'
import { luaScriptNode, printNode } from './utilities'
import { getVariableNode, setVariableNode } from './variables'
import {
  getActorByNameNode,
  getActorNameNode,
  getActorTransformNode,
  selfNode,
  setActorTransformNode,
  spawnActorNode,
} from './world'
import type { NodeCategory, NodeDefinition } from './types'

export * from './types'
export { DEFAULT_SCRIPT_CODE } from './utilities'
export { VARIABLE_NAME_PROPERTY, VARIABLE_VALUE_PIN } from './variables'

export const NODE_DEFINITIONS: Record<BuiltinNodeKind, NodeDefinition> = {
  BeginPlay: beginPlayNode,
  Tick: tickNode,
  ConstructionScript: constructionScriptNode,
  Print: printNode,
  LuaScript: luaScriptNode,
  Branch: branchNode,
  GetVariable: getVariableNode,
  SetVariable: setVariableNode,
  Self: selfNode,
  GetActorTransform: getActorTransformNode,
  SetActorTransform: setActorTransformNode,
  SpawnActor: spawnActorNode,
  GetActorByName: getActorByNameNode,
  GetActorName: getActorNameNode,
}

/** Palette order: events first, then flow control, utilities, variables, world. */
export function allNodeDefinitions(): NodeDefinition[] {
  return Object.values(NODE_DEFINITIONS)
}

export function getNodeDefinition(kind: BuiltinNodeKind): NodeDefinition {
  return NODE_DEFINITIONS[kind]
}

export function definitionsByCategory(category: NodeCategory): NodeDefinition[] {
  return allNodeDefinitions().filter(def => def.category === category)
}

export function isEntryKind(kind: BuiltinNodeKind): boolean {
  return NODE_DEFINITIONS[kind].isEntry
}

/**
 * Build a node of the given kind from its template. Node and pin ids are
 * placeholders (pin ids are template indices); `BlueprintGraph.addNode`
 * replaces them.
 */
export function createNode(kind: BuiltinNodeKind, graph: string = EVENT_GRAPH): Node {
  const def = NODE_DEFINITIONS[kind]
  const properties: Record<string, Value> = {}
  for (const prop of def.properties) {
    properties[prop.name] = cloneValue(prop.defaultValue)
  }
  return {
    id: 0,
    kind,
    graph,
    position: [0, 0],
    pins: def.pins.map((pin, index) => ({ id: index, ...pin })),
    properties,
  }
}
