// ═══════════════════════════════════════════════════════════════════════════
// Graph Editor Store - Headless authoring state for blueprint graphs
// Every action works on a copy of the graph so subscribers see a new object
// ═══════════════════════════════════════════════════════════════════════════

import { createStore } from 'zustand/vanilla'
import { referencedVariable } from '../compiler/effectiveType'
import {
  BlueprintGraph,
  EVENT_GRAPH,
  type BuiltinNodeKind,
  type GraphKind,
  type Node,
  type NodeId,
  type PinId,
} from '../model/graph'
import { stringValue, zeroValue, type DataType, type Value } from '../model/values'
import { createNode, VARIABLE_NAME_PROPERTY, VARIABLE_VALUE_PIN } from '../nodes'
import { DEFAULT_GRAPH_ID } from '../serialization'

const NEW_VARIABLE_BASE_NAME = 'NewVar'

export interface GraphEditorState {
  graph: BlueprintGraph
  /** Partition new nodes are placed in */
  activeGraph: string
  currentGraphName: string
  currentGraphPath: string | null
  hasUnsavedChanges: boolean
  selectedNodeIds: NodeId[]

  // Nodes
  addNode: (kind: BuiltinNodeKind, position?: [number, number], partition?: string) => NodeId
  addVariableNode: (
    kind: 'GetVariable' | 'SetVariable',
    variable: string,
    position?: [number, number]
  ) => NodeId | null
  removeNode: (id: NodeId) => void
  moveNode: (id: NodeId, position: [number, number]) => void
  setNodeProperty: (id: NodeId, key: string, value: Value) => void

  // Links
  connect: (a: PinId, b: PinId) => boolean
  disconnect: (from: PinId, to: PinId) => void

  // Variables
  addVariable: (name?: string, dataType?: DataType) => string
  removeVariable: (name: string) => void
  setVariableType: (name: string, dataType: DataType) => void
  setVariableDefault: (name: string, value: Value) => boolean
  renameVariable: (from: string, to: string) => boolean

  // Partitions
  addGraph: (name: string, kind: GraphKind) => void
  setActiveGraph: (name: string) => void

  // Document
  setSelectedNodeIds: (ids: NodeId[]) => void
  loadGraph: (graph: BlueprintGraph, name: string, path: string | null) => void
  newGraph: () => void
  markSaved: () => void
}

export type GraphEditorStore = ReturnType<typeof createGraphEditorStore>

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

function setPinType(node: Node, pinName: string, dataType: DataType): void {
  const pin = node.pins.find(p => p.name === pinName)
  if (pin) pin.dataType = dataType
}

/**
 * Mirror variable types onto the `value` pins of the variable nodes that
 * reference them. Display only: the compiler derives these types itself.
 */
function syncVariableNodePinTypes(graph: BlueprintGraph): void {
  for (const node of graph.nodes.values()) {
    const name = referencedVariable(node)
    if (name === undefined) continue
    const variable = graph.variable(name)
    if (!variable) continue
    setPinType(node, VARIABLE_VALUE_PIN, variable.dataType)

    // A literal of the old type would be dropped at runtime anyway
    const literal = node.properties[VARIABLE_VALUE_PIN]
    if (node.kind === 'SetVariable' && literal && literal.type !== variable.dataType) {
      node.properties[VARIABLE_VALUE_PIN] = zeroValue(variable.dataType)
    }
  }
}

/** Type the pin would have once variable overrides apply. */
function actualPinType(graph: BlueprintGraph, pinId: PinId): DataType | undefined {
  const ownerId = graph.pinOwner(pinId)
  const node = ownerId === undefined ? undefined : graph.node(ownerId)
  const pin = node?.pins.find(p => p.id === pinId)
  if (!node || !pin) return undefined
  if (pin.name === VARIABLE_VALUE_PIN) {
    const name = referencedVariable(node)
    const variable = name === undefined ? undefined : graph.variable(name)
    if (variable) return variable.dataType
  }
  return pin.dataType
}

function sameOwnerPartition(graph: BlueprintGraph, a: PinId, b: PinId): boolean {
  const ownerA = graph.pinOwner(a)
  const ownerB = graph.pinOwner(b)
  const nodeA = ownerA === undefined ? undefined : graph.node(ownerA)
  const nodeB = ownerB === undefined ? undefined : graph.node(ownerB)
  return nodeA !== undefined && nodeB !== undefined && nodeA.graph === nodeB.graph
}

/** New documents start with BeginPlay wired to a Print of "Hello". */
export function createDefaultGraph(): BlueprintGraph {
  const graph = new BlueprintGraph(DEFAULT_GRAPH_ID)
  const beginId = graph.addNode(createNode('BeginPlay', EVENT_GRAPH))
  const print = createNode('Print', EVENT_GRAPH)
  print.position = [250, 0]
  const printId = graph.addNode(print)

  const then = graph.node(beginId)?.pins.find(p => p.name === 'then')
  const exec = graph.node(printId)?.pins.find(p => p.name === 'exec')
  if (then && exec) graph.addLink({ from: then.id, to: exec.id })
  return graph
}

function uniqueVariableName(graph: BlueprintGraph, base: string): string {
  let name = base
  let i = 1
  while (graph.variable(name)) {
    name = `${base}${i}`
    i++
  }
  return name
}

// ─────────────────────────────────────────────────────────────────────────────
// Store
// ─────────────────────────────────────────────────────────────────────────────

export function createGraphEditorStore(initial?: BlueprintGraph) {
  return createStore<GraphEditorState>()((set, get) => {
    /** Apply a mutation to a copy of the graph and publish it. */
    const update = <T>(mutate: (graph: BlueprintGraph) => T): T => {
      const graph = get().graph.clone()
      const result = mutate(graph)
      set({ graph, hasUnsavedChanges: true })
      return result
    }

    return {
      graph: initial ? initial.clone() : new BlueprintGraph(DEFAULT_GRAPH_ID),
      activeGraph: EVENT_GRAPH,
      currentGraphName: 'Untitled',
      currentGraphPath: null,
      hasUnsavedChanges: false,
      selectedNodeIds: [],

      // ─────────────────────────────────────────────────────────────────────
      // Nodes
      // ─────────────────────────────────────────────────────────────────────

      addNode: (kind, position = [0, 0], partition) =>
        update(graph => {
          const node = createNode(kind, partition ?? get().activeGraph)
          node.position = [position[0], position[1]]
          return graph.addNode(node)
        }),

      addVariableNode: (kind, variable, position = [0, 0]) => {
        const def = get().graph.variable(variable)
        if (!def) return null
        return update(graph => {
          const node = createNode(kind, get().activeGraph)
          node.position = [position[0], position[1]]
          node.properties[VARIABLE_NAME_PROPERTY] = stringValue(variable)
          if (kind === 'SetVariable') {
            node.properties[VARIABLE_VALUE_PIN] = zeroValue(def.dataType)
          }
          setPinType(node, VARIABLE_VALUE_PIN, def.dataType)
          return graph.addNode(node)
        })
      },

      removeNode: (id) => {
        if (!get().graph.node(id)) return
        update(graph => graph.removeNode(id))
        set(state => ({ selectedNodeIds: state.selectedNodeIds.filter(s => s !== id) }))
      },

      moveNode: (id, position) => {
        if (!get().graph.node(id)) return
        update(graph => {
          const node = graph.node(id)
          if (node) node.position = [position[0], position[1]]
        })
      },

      setNodeProperty: (id, key, value) => {
        if (!get().graph.node(id)) return
        update(graph => {
          const node = graph.node(id)
          if (!node) return
          node.properties[key] = { ...value }
          if (key === VARIABLE_NAME_PROPERTY) syncVariableNodePinTypes(graph)
        })
      },

      // ─────────────────────────────────────────────────────────────────────
      // Links
      // ─────────────────────────────────────────────────────────────────────

      /**
       * Link two pins given in either order. Refused when the directions do
       * not pair up, the owners sit in different partitions or the types differ. Replaces the existing link into the
       * input and, for exec links, out of the output.
       */
      connect: (a, b) => {
        const current = get().graph
        const pinA = current.pin(a)
        const pinB = current.pin(b)
        if (!pinA || !pinB || pinA.direction === pinB.direction) return false

        if (!sameOwnerPartition(current, a, b)) return false

        const [from, to] = pinA.direction === 'Output' ? [a, b] : [b, a]
        const fromType = actualPinType(current, from)
        if (fromType === undefined || fromType !== actualPinType(current, to)) return false

        update(graph => {
          graph.links =
            fromType === 'Exec'
              ? graph.links.filter(l => l.to !== to && l.from !== from)
              : graph.links.filter(l => l.to !== to)
          graph.addLink({ from, to })
        })
        return true
      },

      disconnect: (from, to) => {
        if (!get().graph.links.some(l => l.from === from && l.to === to)) return
        update(graph => graph.removeLink(from, to))
      },

      // ─────────────────────────────────────────────────────────────────────
      // Variables
      // ─────────────────────────────────────────────────────────────────────

      addVariable: (name, dataType = 'String') =>
        update(graph => {
          const unique = uniqueVariableName(graph, name ?? NEW_VARIABLE_BASE_NAME)
          graph.variables.push({ name: unique, dataType, defaultValue: zeroValue(dataType) })
          syncVariableNodePinTypes(graph)
          return unique
        }),

      removeVariable: (name) => {
        if (!get().graph.variable(name)) return
        update(graph => {
          graph.variables = graph.variables.filter(v => v.name !== name)
        })
      },

      setVariableType: (name, dataType) => {
        if (!get().graph.variable(name)) return
        update(graph => {
          const variable = graph.variable(name)
          if (!variable) return
          variable.dataType = dataType
          if (variable.defaultValue && variable.defaultValue.type !== dataType) {
            variable.defaultValue = zeroValue(dataType)
          }
          syncVariableNodePinTypes(graph)
        })
      },

      setVariableDefault: (name, value) => {
        const variable = get().graph.variable(name)
        if (!variable || variable.dataType !== value.type) return false
        update(graph => {
          const target = graph.variable(name)
          if (target) target.defaultValue = { ...value }
        })
        return true
      },

      renameVariable: (from, to) => {
        const current = get().graph
        if (to === '' || !current.variable(from) || current.variable(to)) return false
        update(graph => {
          const variable = graph.variable(from)
          if (variable) variable.name = to
          for (const node of graph.nodes.values()) {
            if (referencedVariable(node) === from) {
              node.properties[VARIABLE_NAME_PROPERTY] = stringValue(to)
            }
          }
        })
        return true
      },

      // ─────────────────────────────────────────────────────────────────────
      // Partitions
      // ─────────────────────────────────────────────────────────────────────

      addGraph: (name, kind) => {
        if (get().graph.graphs.some(g => g.name === name)) return
        update(graph => graph.addGraph(name, kind))
      },

      setActiveGraph: (name) => {
        if (!get().graph.graphs.some(g => g.name === name)) return
        set({ activeGraph: name })
      },

      // ─────────────────────────────────────────────────────────────────────
      // Document
      // ─────────────────────────────────────────────────────────────────────

      setSelectedNodeIds: (ids) => set({ selectedNodeIds: [...ids] }),

      loadGraph: (graph, name, path) => {
        const loaded = graph.clone()
        loaded.ensureBuiltinGraphs()
        syncVariableNodePinTypes(loaded)
        set({
          graph: loaded,
          activeGraph: EVENT_GRAPH,
          currentGraphName: name,
          currentGraphPath: path,
          hasUnsavedChanges: false,
          selectedNodeIds: [],
        })
      },

      newGraph: () =>
        set({
          graph: createDefaultGraph(),
          activeGraph: EVENT_GRAPH,
          currentGraphName: 'Untitled',
          currentGraphPath: null,
          hasUnsavedChanges: false,
          selectedNodeIds: [],
        }),

      markSaved: () => set({ hasUnsavedChanges: false }),
    }
  })
}
