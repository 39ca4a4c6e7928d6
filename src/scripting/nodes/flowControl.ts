// Flow control nodes

import { CONSTRUCTION_GRAPH, EVENT_GRAPH } from '../model/graph'
import { execIn, execOut, input, type NodeDefinition } from './types'

export const branchNode: NodeDefinition = {
  kind: 'Branch',
  displayName: 'Branch',
  category: 'FlowControl',
  description: 'Executes one of two paths based on a boolean condition.',
  pins: [execIn(), input('condition', 'Bool'), execOut('true'), execOut('false')],
  properties: [],
  isEntry: false,
  isPure: false,
  allowedGraphs: [EVENT_GRAPH, CONSTRUCTION_GRAPH],
}
