// ═══════════════════════════════════════════════════════════════════════════
// Blueprint Graph - Node/pin/link data model
// Pure data: id assignment and lookups, no execution behaviour
// ═══════════════════════════════════════════════════════════════════════════

import { cloneValue, type DataType, type Value } from './values'

// ─────────────────────────────────────────────────────────────────────────────
// Identifiers
// ─────────────────────────────────────────────────────────────────────────────

export type NodeId = number
export type PinId = number

// ─────────────────────────────────────────────────────────────────────────────
// Partitions
// ─────────────────────────────────────────────────────────────────────────────

export const GRAPH_KINDS = ['Event', 'Construction', 'Function', 'Graph'] as const

export type GraphKind = (typeof GRAPH_KINDS)[number]

export interface GraphDef {
  name: string
  kind: GraphKind
}

export const EVENT_GRAPH = 'EventGraph'
export const CONSTRUCTION_GRAPH = 'ConstructionScript'

export function defaultGraphs(): GraphDef[] {
  return [
    { name: EVENT_GRAPH, kind: 'Event' },
    { name: CONSTRUCTION_GRAPH, kind: 'Construction' },
  ]
}

// ─────────────────────────────────────────────────────────────────────────────
// Nodes & Pins
// ─────────────────────────────────────────────────────────────────────────────

export const BUILTIN_NODE_KINDS = [
  'BeginPlay',
  'Tick',
  'ConstructionScript',
  'Print',
  'LuaScript',
  'Branch',
  'GetVariable',
  'SetVariable',
  'Self',
  'GetActorTransform',
  'SetActorTransform',
  'SpawnActor',
  'GetActorByName',
  'GetActorName',
] as const

export type BuiltinNodeKind = (typeof BUILTIN_NODE_KINDS)[number]

export type PinDirection = 'Input' | 'Output'

export interface Pin {
  id: PinId
  name: string
  direction: PinDirection
  dataType: DataType
}

export interface Node {
  id: NodeId
  kind: BuiltinNodeKind
  /** Partition tag: name of the sub-graph this node belongs to */
  graph: string
  position: [number, number]
  pins: Pin[]
  properties: Record<string, Value>
}

export interface Link {
  from: PinId
  to: PinId
}

export interface VariableDef {
  name: string
  dataType: DataType
  defaultValue?: Value
}

export function pinNamed(node: Node, name: string): PinId | undefined {
  return node.pins.find(p => p.name === name)?.id
}

export function setProperty(node: Node, key: string, value: Value): void {
  node.properties[key] = value
}

function cloneNode(node: Node): Node {
  const properties: Record<string, Value> = {}
  for (const [key, value] of Object.entries(node.properties)) {
    properties[key] = cloneValue(value)
  }
  return {
    ...node,
    position: [node.position[0], node.position[1]],
    pins: node.pins.map(pin => ({ ...pin })),
    properties,
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Graph Aggregate
// ─────────────────────────────────────────────────────────────────────────────

export interface BlueprintGraphParts {
  id: string
  graphs: GraphDef[]
  nodes: Node[]
  links: Link[]
  variables: VariableDef[]
  nextNodeId: number
  nextPinId: number
}

export class BlueprintGraph {
  id: string
  graphs: GraphDef[] = defaultGraphs()
  nodes: Map<NodeId, Node> = new Map()
  links: Link[] = []
  variables: VariableDef[] = []

  // Monotonic, never reused even after removals
  private _nextNodeId = 1
  private _nextPinId = 1

  constructor(id: string) {
    this.id = id
  }

  /**
   * Rebuild a graph from stored parts, keeping its id counters as they were.
   */
  static restore(parts: BlueprintGraphParts): BlueprintGraph {
    const graph = new BlueprintGraph(parts.id)
    graph.graphs = parts.graphs.map(g => ({ ...g }))
    for (const node of parts.nodes) {
      graph.nodes.set(node.id, cloneNode(node))
    }
    graph.links = parts.links.map(l => ({ ...l }))
    graph.variables = parts.variables.map(v => ({
      ...v,
      defaultValue: v.defaultValue ? cloneValue(v.defaultValue) : undefined,
    }))
    graph._nextNodeId = parts.nextNodeId
    graph._nextPinId = parts.nextPinId
    return graph
  }

  get nextNodeId(): number {
    return this._nextNodeId
  }

  get nextPinId(): number {
    return this._nextPinId
  }

  toParts(): BlueprintGraphParts {
    return {
      id: this.id,
      graphs: this.graphs,
      nodes: this.sortedNodes(),
      links: this.links,
      variables: this.variables,
      nextNodeId: this._nextNodeId,
      nextPinId: this._nextPinId,
    }
  }

  clone(): BlueprintGraph {
    return BlueprintGraph.restore(this.toParts())
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Partitions
  // ───────────────────────────────────────────────────────────────────────────

  addGraph(name: string, kind: GraphKind): void {
    if (this.graphs.some(g => g.name === name)) return
    this.graphs.push({ name, kind })
  }

  /** Make sure the event and construction partitions exist. */
  ensureBuiltinGraphs(): void {
    for (const builtin of defaultGraphs()) {
      this.addGraph(builtin.name, builtin.kind)
    }
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Nodes
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * Insert a node, assigning it a fresh node id and fresh graph-wide pin ids.
   * Whatever ids the node carried before are discarded.
   */
  addNode(node: Node): NodeId {
    const id = this._nextNodeId++
    const inserted = cloneNode(node)
    inserted.id = id
    for (const pin of inserted.pins) {
      pin.id = this._nextPinId++
    }
    this.nodes.set(id, inserted)
    return id
  }

  /** Remove a node and every link touching one of its pins. */
  removeNode(id: NodeId): boolean {
    const node = this.nodes.get(id)
    if (!node) return false
    const pinIds = new Set(node.pins.map(p => p.id))
    this.links = this.links.filter(l => !pinIds.has(l.from) && !pinIds.has(l.to))
    this.nodes.delete(id)
    return true
  }

  node(id: NodeId): Node | undefined {
    return this.nodes.get(id)
  }

  /** Nodes in ascending id order. */
  sortedNodes(): Node[] {
    return [...this.nodes.values()].sort((a, b) => a.id - b.id)
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Links
  // ───────────────────────────────────────────────────────────────────────────

  addLink(link: Link): void {
    this.links.push({ from: link.from, to: link.to })
  }

  removeLink(from: PinId, to: PinId): boolean {
    const index = this.links.findIndex(l => l.from === from && l.to === to)
    if (index === -1) return false
    this.links.splice(index, 1)
    return true
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Lookups
  // ───────────────────────────────────────────────────────────────────────────

  pin(pinId: PinId): Pin | undefined {
    for (const node of this.nodes.values()) {
      const pin = node.pins.find(p => p.id === pinId)
      if (pin) return pin
    }
    return undefined
  }

  pinOwner(pinId: PinId): NodeId | undefined {
    for (const node of this.nodes.values()) {
      if (node.pins.some(p => p.id === pinId)) return node.id
    }
    return undefined
  }

  variable(name: string): VariableDef | undefined {
    return this.variables.find(v => v.name === name)
  }
}
