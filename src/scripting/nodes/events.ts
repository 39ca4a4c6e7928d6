// Event nodes (entry points)

import { CONSTRUCTION_GRAPH, EVENT_GRAPH } from '../model/graph'
import { execOut, output, type NodeDefinition } from './types'

export const beginPlayNode: NodeDefinition = {
  kind: 'BeginPlay',
  displayName: 'Event BeginPlay',
  category: 'Event',
  description: 'Fires once when the game starts or the actor is spawned.',
  pins: [execOut()],
  properties: [],
  isEntry: true,
  isPure: false,
  allowedGraphs: [EVENT_GRAPH],
}

export const tickNode: NodeDefinition = {
  kind: 'Tick',
  displayName: 'Event Tick',
  category: 'Event',
  description: 'Fires every frame with the frame delta time.',
  pins: [execOut(), output('dt', 'F32')],
  properties: [],
  isEntry: true,
  isPure: false,
  allowedGraphs: [EVENT_GRAPH],
}

export const constructionScriptNode: NodeDefinition = {
  kind: 'ConstructionScript',
  displayName: 'Construction Script',
  category: 'Event',
  description: 'Fires when the actor is constructed. Use for setup logic.',
  pins: [execOut()],
  properties: [],
  isEntry: true,
  isPure: false,
  allowedGraphs: [CONSTRUCTION_GRAPH],
}
