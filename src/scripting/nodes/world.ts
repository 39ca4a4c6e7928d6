// World interaction nodes
//
// Actor handles are plain strings for now. These nodes are typed sources and
// sinks in the graph; their runtime only continues the exec chain.

import { CONSTRUCTION_GRAPH, EVENT_GRAPH } from '../model/graph'
import { execIn, execOut, input, output, type NodeDefinition } from './types'

const ANY_GRAPH = [EVENT_GRAPH, CONSTRUCTION_GRAPH]

export const selfNode: NodeDefinition = {
  kind: 'Self',
  displayName: 'Self',
  category: 'World',
  description: 'Returns the handle of the actor executing this graph.',
  pins: [output('self', 'String')],
  properties: [],
  isEntry: false,
  isPure: true,
  allowedGraphs: ANY_GRAPH,
}

export const getActorTransformNode: NodeDefinition = {
  kind: 'GetActorTransform',
  displayName: 'Get Actor Transform',
  category: 'World',
  description: 'Reads the transform of an actor.',
  pins: [execIn(), execOut(), input('actor', 'String'), output('position', 'String')],
  properties: [],
  isEntry: false,
  isPure: false,
  allowedGraphs: ANY_GRAPH,
}

export const setActorTransformNode: NodeDefinition = {
  kind: 'SetActorTransform',
  displayName: 'Set Actor Transform',
  category: 'World',
  description: 'Moves an actor to a new position.',
  pins: [execIn(), execOut(), input('actor', 'String'), input('position', 'String')],
  properties: [],
  isEntry: false,
  isPure: false,
  allowedGraphs: ANY_GRAPH,
}

export const spawnActorNode: NodeDefinition = {
  kind: 'SpawnActor',
  displayName: 'Spawn Actor',
  category: 'World',
  description: 'Spawns a new actor of the given class.',
  pins: [execIn(), execOut(), input('class', 'String'), output('actor', 'String')],
  properties: [],
  isEntry: false,
  isPure: false,
  allowedGraphs: ANY_GRAPH,
}

export const getActorByNameNode: NodeDefinition = {
  kind: 'GetActorByName',
  displayName: 'Get Actor By Name',
  category: 'World',
  description: 'Finds an actor in the scene by name.',
  pins: [execIn(), execOut(), input('name', 'String'), output('actor', 'String')],
  properties: [],
  isEntry: false,
  isPure: false,
  allowedGraphs: ANY_GRAPH,
}

export const getActorNameNode: NodeDefinition = {
  kind: 'GetActorName',
  displayName: 'Get Actor Name',
  category: 'World',
  description: 'Gets the name of an actor.',
  pins: [input('actor', 'String'), output('name', 'String')],
  properties: [],
  isEntry: false,
  isPure: true,
  allowedGraphs: ANY_GRAPH,
}
