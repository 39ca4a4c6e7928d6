// Variable nodes
//
// The `value` pin type below is nominal only. The compiler replaces it with
// the type of the variable named by the `name` property.

import { CONSTRUCTION_GRAPH, EVENT_GRAPH } from '../model/graph'
import { stringValue } from '../model/values'
import { execIn, execOut, input, output, type NodeDefinition } from './types'

export const VARIABLE_NAME_PROPERTY = 'name'
export const VARIABLE_VALUE_PIN = 'value'

export const getVariableNode: NodeDefinition = {
  kind: 'GetVariable',
  displayName: 'Get',
  category: 'Variable',
  description: 'Gets the value of a variable.',
  pins: [output(VARIABLE_VALUE_PIN, 'String')],
  properties: [{ name: VARIABLE_NAME_PROPERTY, defaultValue: stringValue(''), inline: true }],
  isEntry: false,
  isPure: true,
  allowedGraphs: [EVENT_GRAPH, CONSTRUCTION_GRAPH],
}

export const setVariableNode: NodeDefinition = {
  kind: 'SetVariable',
  displayName: 'Set',
  category: 'Variable',
  description: 'Sets the value of a variable.',
  pins: [execIn(), execOut(), input(VARIABLE_VALUE_PIN, 'String')],
  properties: [{ name: VARIABLE_NAME_PROPERTY, defaultValue: stringValue(''), inline: true }],
  isEntry: false,
  isPure: false,
  allowedGraphs: [EVENT_GRAPH, CONSTRUCTION_GRAPH],
}
