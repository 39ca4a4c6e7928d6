// =============================================================================
// Node Definitions - Templates used to create nodes of each built-in kind
// =============================================================================

import type { BuiltinNodeKind, PinDirection } from '../model/graph'
import type { DataType, Value } from '../model/values'

export type NodeCategory =
  | 'Event'
  | 'FlowControl'
  | 'Utility'
  | 'Variable'
  | 'World'

export const CATEGORY_LABELS: Record<NodeCategory, string> = {
  Event: 'Events',
  FlowControl: 'Flow Control',
  Utility: 'Utilities',
  Variable: 'Variables',
  World: 'World Interaction',
}

/** Pin template, before the graph assigns an id. */
export interface PinDef {
  name: string
  direction: PinDirection
  dataType: DataType
}

export interface PropertyDef {
  name: string
  defaultValue: Value
  /** Edited directly in the node body rather than in the inspector */
  inline?: boolean
}

export interface NodeDefinition {
  kind: BuiltinNodeKind
  displayName: string
  category: NodeCategory
  description: string
  pins: PinDef[]
  properties: PropertyDef[]
  /** Starts an execution chain instead of being reached through an exec edge */
  isEntry: boolean
  /** No side effects; only read as a data source */
  isPure: boolean
  /** Partitions the palette offers this node in */
  allowedGraphs: string[]
}

export const input = (name: string, dataType: DataType): PinDef => ({
  name,
  direction: 'Input',
  dataType,
})

export const output = (name: string, dataType: DataType): PinDef => ({
  name,
  direction: 'Output',
  dataType,
})

export const execIn = (name = 'exec'): PinDef => input(name, 'Exec')
export const execOut = (name = 'then'): PinDef => output(name, 'Exec')
