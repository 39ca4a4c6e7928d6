// ═══════════════════════════════════════════════════════════════════════════
// Graph Compiler
// Validates a BlueprintGraph and lowers it into flat lookup tables
// ═══════════════════════════════════════════════════════════════════════════

import type {
  BlueprintGraph,
  BuiltinNodeKind,
  NodeId,
  PinDirection,
  PinId,
} from '../model/graph'
import { cloneValue, zeroValue, type DataType, type Value } from '../model/values'
import { effectiveType } from './effectiveType'
import { CompileError } from './errors'
import { indexPins, validate } from './validate'

// ─────────────────────────────────────────────────────────────────────────────
// Compiled Form
// ─────────────────────────────────────────────────────────────────────────────

export interface CompiledPin {
  id: PinId
  direction: PinDirection
  /** Effective type, with the variable override already applied */
  dataType: DataType
}

export interface CompiledNode {
  id: NodeId
  kind: BuiltinNodeKind
  properties: Record<string, Value>
  pins: Map<string, CompiledPin>
}

/**
 * Executable form of a graph. Treated as immutable once built.
 */
export interface CompiledGraph {
  beginPlayEntry?: NodeId
  constructionEntry?: NodeId
  tickEntry?: NodeId

  /** Initial variable values */
  variables: Map<string, Value>

  nodes: Map<NodeId, CompiledNode>
  /** Exec output pin -> exec input pin */
  execEdges: Map<PinId, PinId>
  /** Data input pin -> data output pin. Keyed by input: outputs may fan out */
  dataEdges: Map<PinId, PinId>
  pinOwners: Map<PinId, NodeId>
}

export type CompileResult =
  | { ok: true; compiled: CompiledGraph }
  | { ok: false; error: CompileError }

// ─────────────────────────────────────────────────────────────────────────────
// Compilation
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Validate and lower a graph. Throws CompileError on the first invalid rule.
 */
export function compile(graph: BlueprintGraph): CompiledGraph {
  validate(graph)

  const variables = new Map<string, Value>()
  for (const variable of graph.variables) {
    variables.set(
      variable.name,
      variable.defaultValue ? cloneValue(variable.defaultValue) : zeroValue(variable.dataType)
    )
  }

  const nodes = new Map<NodeId, CompiledNode>()
  const pinOwners = new Map<PinId, NodeId>()
  for (const node of graph.sortedNodes()) {
    const pins = new Map<string, CompiledPin>()
    for (const pin of node.pins) {
      pins.set(pin.name, {
        id: pin.id,
        direction: pin.direction,
        dataType: effectiveType(graph.variables, node, pin),
      })
      pinOwners.set(pin.id, node.id)
    }
    const properties: Record<string, Value> = {}
    for (const [key, value] of Object.entries(node.properties)) {
      properties[key] = cloneValue(value)
    }
    nodes.set(node.id, { id: node.id, kind: node.kind, properties, pins })
  }

  const pinIndex = indexPins(graph)
  const execEdges = new Map<PinId, PinId>()
  const dataEdges = new Map<PinId, PinId>()
  for (const link of graph.links) {
    const from = pinIndex.get(link.from)
    if (!from) throw new CompileError('UnknownPin', { pinId: link.from })
    if (!pinIndex.has(link.to)) throw new CompileError('UnknownPin', { pinId: link.to })

    if (effectiveType(graph.variables, from.node, from.pin) === 'Exec') {
      execEdges.set(link.from, link.to)
    } else {
      dataEdges.set(link.to, link.from)
    }
  }

  return {
    beginPlayEntry: findEntry(graph, 'BeginPlay'),
    constructionEntry: findEntry(graph, 'ConstructionScript'),
    tickEntry: findEntry(graph, 'Tick'),
    variables,
    nodes,
    execEdges,
    dataEdges,
    pinOwners,
  }
}

/**
 * Non-throwing variant for hosts that report errors instead of catching.
 */
export function tryCompile(graph: BlueprintGraph): CompileResult {
  try {
    return { ok: true, compiled: compile(graph) }
  } catch (e) {
    if (e instanceof CompileError) return { ok: false, error: e }
    throw e
  }
}

function findEntry(graph: BlueprintGraph, kind: BuiltinNodeKind): NodeId | undefined {
  return graph.sortedNodes().find(n => n.kind === kind)?.id
}

export function compiledPin(node: CompiledNode, name: string): CompiledPin | undefined {
  return node.pins.get(name)
}
