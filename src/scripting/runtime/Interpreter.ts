// ═══════════════════════════════════════════════════════════════════════════
// Interpreter - Runs compiled blueprint graphs
// One pass per trigger: construction, begin-play or tick
// ═══════════════════════════════════════════════════════════════════════════

import type { CompiledGraph } from '../compiler/compile'
import type { NodeId, PinId } from '../model/graph'
import { asBool, asString, cloneValue, f32Value, type DataType, type Value } from '../model/values'
import { VARIABLE_NAME_PROPERTY } from '../nodes'
import { handlerFor } from './handlers'
import { runScript } from './scriptBridge'

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export type ExecutionEvent =
  | { type: 'EnterNode'; nodeId: NodeId }
  | { type: 'Print'; text: string }

export interface InterpreterOutput {
  /** Everything that happened during the call, in execution order */
  events: ExecutionEvent[]
  /** Full variable store after the call */
  variables: Map<string, Value>
}

export interface InterpreterConfig {
  /** Reserved variable slot that tick() writes the frame delta into */
  deltaTimeVariable: string
  /** Prefix of the Print event emitted when a script fails */
  scriptErrorPrefix: string
}

export const DEFAULT_INTERPRETER_CONFIG: InterpreterConfig = {
  deltaTimeVariable: '__dt',
  scriptErrorPrefix: '[Lua error]',
}

export function createOutput(): InterpreterOutput {
  return { events: [], variables: new Map() }
}

// ─────────────────────────────────────────────────────────────────────────────
// Interpreter
// ─────────────────────────────────────────────────────────────────────────────

export class Interpreter {
  readonly compiled: CompiledGraph
  readonly config: InterpreterConfig
  private store: Map<string, Value>

  constructor(compiled: CompiledGraph, config: Partial<InterpreterConfig> = {}) {
    this.compiled = compiled
    this.config = { ...DEFAULT_INTERPRETER_CONFIG, ...config }
    this.store = new Map()
    for (const [name, value] of compiled.variables) {
      this.store.set(name, cloneValue(value))
    }
  }

  runBeginPlay(): InterpreterOutput {
    return this.runEntry(this.compiled.beginPlayEntry)
  }

  runConstructionScript(): InterpreterOutput {
    return this.runEntry(this.compiled.constructionEntry)
  }

  tick(dt: number): InterpreterOutput {
    const entry = this.compiled.tickEntry
    if (entry === undefined) return createOutput()
    this.store.set(this.config.deltaTimeVariable, f32Value(dt))
    return this.runFromExecOut(entry, 'then')
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Chain Execution
  // ───────────────────────────────────────────────────────────────────────────

  private runEntry(entry: NodeId | undefined): InterpreterOutput {
    if (entry === undefined) return createOutput()
    return this.runFromExecOut(entry, 'then')
  }

  /**
   * Follow the exec chain starting at an output pin until a handler returns
   * no successor. Termination relies on the compiler's cycle check.
   */
  private runFromExecOut(startNode: NodeId, execOutPin: string): InterpreterOutput {
    const output = createOutput()

    let next = this.nextExec(startNode, execOutPin)
    while (next !== undefined) {
      const nodeId = this.pinOwner(next)
      if (nodeId === undefined) break
      const node = this.compiled.nodes.get(nodeId)
      if (!node) break

      output.events.push({ type: 'EnterNode', nodeId })
      next = handlerFor(node.kind).execute(this, output, nodeId, node)
    }

    output.variables = this.variables()
    return output
  }

  /**
   * Exec input pin linked to the named exec output of a node, if any.
   */
  nextExec(nodeId: NodeId, execOutName: string): PinId | undefined {
    const pin = this.compiled.nodes.get(nodeId)?.pins.get(execOutName)
    if (!pin || pin.dataType !== 'Exec') return undefined
    return this.compiled.execEdges.get(pin.id)
  }

  pinOwner(pinId: PinId): NodeId | undefined {
    return this.compiled.pinOwners.get(pinId)
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Data Inputs
  // ───────────────────────────────────────────────────────────────────────────

  inputPinType(nodeId: NodeId, inputName: string): DataType | undefined {
    return this.compiled.nodes.get(nodeId)?.pins.get(inputName)?.dataType
  }

  /**
   * Value flowing into a data input through a link. Only GetVariable nodes
   * produce values; any other source, a missing link or a value whose type
   * differs from the input's effective type yields undefined so the caller
   * can fall back to a literal property.
   */
  readValueInput(nodeId: NodeId, inputName: string): Value | undefined {
    const input = this.compiled.nodes.get(nodeId)?.pins.get(inputName)
    if (!input) return undefined

    const sourcePin = this.compiled.dataEdges.get(input.id)
    if (sourcePin === undefined) return undefined
    const sourceId = this.pinOwner(sourcePin)
    if (sourceId === undefined) return undefined
    const source = this.compiled.nodes.get(sourceId)
    if (!source || source.kind !== 'GetVariable') return undefined

    const name = asString(source.properties[VARIABLE_NAME_PROPERTY])
    if (name === undefined) return undefined
    const value = this.store.get(name)
    if (!value || value.type !== input.dataType) return undefined

    return cloneValue(value)
  }

  readStringInput(nodeId: NodeId, inputName: string): string | undefined {
    return asString(this.readValueInput(nodeId, inputName))
  }

  readBoolInput(nodeId: NodeId, inputName: string): boolean | undefined {
    return asBool(this.readValueInput(nodeId, inputName))
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Variables
  // ───────────────────────────────────────────────────────────────────────────

  getVariable(name: string): Value | undefined {
    const value = this.store.get(name)
    return value ? cloneValue(value) : undefined
  }

  setVariable(name: string, value: Value): void {
    this.store.set(name, cloneValue(value))
  }

  /** Snapshot of the store. */
  variables(): Map<string, Value> {
    const snapshot = new Map<string, Value>()
    for (const [name, value] of this.store) {
      snapshot.set(name, cloneValue(value))
    }
    return snapshot
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Scripts
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * Run a script node's code. Variable writes are copied back even when the
   * script fails; prints and the error message land in the output events.
   */
  executeScript(code: string, output: InterpreterOutput): void {
    const result = runScript(code, this.store, this.config.deltaTimeVariable)
    this.store = result.variables

    for (const text of result.prints) {
      output.events.push({ type: 'Print', text })
    }
    if (result.error !== undefined) {
      output.events.push({
        type: 'Print',
        text: `${this.config.scriptErrorPrefix} ${result.error}`,
      })
    }
  }
}
