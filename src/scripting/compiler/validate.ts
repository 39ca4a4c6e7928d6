// ═══════════════════════════════════════════════════════════════════════════
// Graph Validation
// Structural and type checks run before lowering. First failing rule wins.
// ═══════════════════════════════════════════════════════════════════════════

import type { BlueprintGraph, Node, NodeId, Pin, PinId } from '../model/graph'
import { effectiveType, referencedVariable } from './effectiveType'
import { CompileError } from './errors'

export interface PinEntry {
  pin: Pin
  node: Node
}

/** Graph-wide pin index: pin id -> pin and owning node. */
export function indexPins(graph: BlueprintGraph): Map<PinId, PinEntry> {
  const index = new Map<PinId, PinEntry>()
  for (const node of graph.sortedNodes()) {
    for (const pin of node.pins) {
      index.set(pin.id, { pin, node })
    }
  }
  return index
}

/**
 * Check every rule in order and throw a CompileError for the first violation.
 */
export function validate(graph: BlueprintGraph): void {
  checkVariableNames(graph)

  const pins = indexPins(graph)
  checkLinks(graph, pins)
  checkFanIn(graph, pins)
  checkVariableReferences(graph)
  checkExecCycles(graph, pins)
}

// ─────────────────────────────────────────────────────────────────────────────
// Rules
// ─────────────────────────────────────────────────────────────────────────────

function checkVariableNames(graph: BlueprintGraph): void {
  const seen = new Set<string>()
  for (const variable of graph.variables) {
    if (seen.has(variable.name)) {
      throw new CompileError('DuplicateVariable')
    }
    seen.add(variable.name)
  }
}

function checkLinks(graph: BlueprintGraph, pins: Map<PinId, PinEntry>): void {
  for (const link of graph.links) {
    const from = pins.get(link.from)
    if (!from) throw new CompileError('UnknownPin', { pinId: link.from })
    const to = pins.get(link.to)
    if (!to) throw new CompileError('UnknownPin', { pinId: link.to })

    if (from.node.graph !== to.node.graph) {
      throw new CompileError('CrossGraphLink', { nodeId: to.node.id, pinId: link.to })
    }

    if (from.pin.direction !== 'Output' || to.pin.direction !== 'Input') {
      throw new CompileError('DirectionMismatch', { nodeId: to.node.id, pinId: link.to })
    }

    const fromType = effectiveType(graph.variables, from.node, from.pin)
    const toType = effectiveType(graph.variables, to.node, to.pin)
    if (fromType !== toType) {
      throw new CompileError('TypeMismatch', { nodeId: to.node.id, pinId: link.to })
    }
  }
}

/**
 * Exec inputs and data inputs take one source. Outputs may fan out; a second
 * link out of an exec output replaces the first when lowered.
 */
function checkFanIn(graph: BlueprintGraph, pins: Map<PinId, PinEntry>): void {
  // Links were checked above, so both ends exist and share one effective type
  const isExec = (pinId: PinId): boolean => {
    const entry = pins.get(pinId)
    return entry !== undefined && effectiveType(graph.variables, entry.node, entry.pin) === 'Exec'
  }
  const ownerOf = (pinId: PinId): NodeId | undefined => pins.get(pinId)?.node.id

  const execIn = new Set<PinId>()
  for (const link of graph.links) {
    if (!isExec(link.to)) continue
    if (execIn.has(link.to)) {
      throw new CompileError('MultipleExecInputs', { nodeId: ownerOf(link.to), pinId: link.to })
    }
    execIn.add(link.to)
  }

  const dataIn = new Set<PinId>()
  for (const link of graph.links) {
    if (isExec(link.to)) continue
    if (dataIn.has(link.to)) {
      throw new CompileError('MultipleDataInputs', { nodeId: ownerOf(link.to), pinId: link.to })
    }
    dataIn.add(link.to)
  }
}

function checkVariableReferences(graph: BlueprintGraph): void {
  for (const node of graph.sortedNodes()) {
    if (node.kind !== 'GetVariable' && node.kind !== 'SetVariable') continue
    const name = referencedVariable(node)
    if (name === undefined || !graph.variable(name)) {
      throw new CompileError('UnknownVariable', { nodeId: node.id })
    }
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Cycle Detection
// ─────────────────────────────────────────────────────────────────────────────

/** Node-level adjacency of the exec flow graph. */
export function execAdjacency(
  graph: BlueprintGraph,
  pins: Map<PinId, PinEntry>
): Map<NodeId, NodeId[]> {
  const adjacency = new Map<NodeId, NodeId[]>()
  for (const link of graph.links) {
    const from = pins.get(link.from)
    const to = pins.get(link.to)
    if (!from || !to) continue
    if (effectiveType(graph.variables, from.node, from.pin) !== 'Exec') continue
    const targets = adjacency.get(from.node.id) ?? []
    targets.push(to.node.id)
    adjacency.set(from.node.id, targets)
  }
  return adjacency
}

interface DfsFrame {
  node: NodeId
  next: number
}

/**
 * Iterative depth-first search with an on-stack (gray) set. A neighbour that
 * is still on the stack closes a cycle; it is reported as the offending node.
 */
function checkExecCycles(graph: BlueprintGraph, pins: Map<PinId, PinEntry>): void {
  const adjacency = execAdjacency(graph, pins)
  const visited = new Set<NodeId>()
  const onStack = new Set<NodeId>()

  for (const root of graph.sortedNodes()) {
    if (visited.has(root.id)) continue

    const stack: DfsFrame[] = [{ node: root.id, next: 0 }]
    visited.add(root.id)
    onStack.add(root.id)

    while (stack.length > 0) {
      const frame = stack[stack.length - 1]
      const neighbours = adjacency.get(frame.node) ?? []

      if (frame.next < neighbours.length) {
        const target = neighbours[frame.next++]
        if (onStack.has(target)) {
          throw new CompileError('ExecCycle', { nodeId: target })
        }
        if (!visited.has(target)) {
          visited.add(target)
          onStack.add(target)
          stack.push({ node: target, next: 0 })
        }
      } else {
        onStack.delete(frame.node)
        stack.pop()
      }
    }
  }
}
