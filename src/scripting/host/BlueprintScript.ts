// ═══════════════════════════════════════════════════════════════════════════
// Blueprint Script - Component that runs a blueprint asset on an actor
// Construction script first (at most once), then begin-play, then ticks
// ═══════════════════════════════════════════════════════════════════════════

import { tryCompile, type CompiledGraph } from '../compiler/compile'
import {
  Interpreter,
  type ExecutionEvent,
  type InterpreterConfig,
} from '../runtime/Interpreter'
import { parseAssetGraph, type BlueprintAsset } from '../serialization'

export type PrintSink = (text: string) => void

export interface BlueprintScriptConfig {
  /** Receives the text of every Print event */
  onPrint: PrintSink
  /** Overrides passed to the interpreter */
  interpreter: Partial<InterpreterConfig>
}

export const DEFAULT_BLUEPRINT_SCRIPT_CONFIG: BlueprintScriptConfig = {
  onPrint: text => console.info(`[Blueprint] ${text}`),
  interpreter: {},
}

export type ScriptState = 'idle' | 'ready' | 'failed'

export class BlueprintScript {
  private asset: BlueprintAsset | null
  private readonly config: BlueprintScriptConfig
  private interpreter: Interpreter | null = null
  private _state: ScriptState = 'idle'
  private _constructionRan = false

  constructor(asset: BlueprintAsset | null = null, config: Partial<BlueprintScriptConfig> = {}) {
    this.asset = asset
    this.config = { ...DEFAULT_BLUEPRINT_SCRIPT_CONFIG, ...config }
  }

  get state(): ScriptState {
    return this._state
  }

  get constructionRan(): boolean {
    return this._constructionRan
  }

  /** Compiled graph, once the asset has been loaded successfully. */
  get compiled(): CompiledGraph | null {
    return this.interpreter?.compiled ?? null
  }

  /**
   * Swap the asset. The next lifecycle call recompiles; whether the
   * construction script already ran is kept.
   */
  setAsset(asset: BlueprintAsset | null): void {
    this.asset = asset
    this.interpreter = null
    this._state = 'idle'
  }

  /**
   * Restore the persisted construction flag, e.g. for an actor loaded from a
   * save game.
   */
  restoreConstructionRan(ran: boolean): void {
    this._constructionRan = ran
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Lifecycle
  // ───────────────────────────────────────────────────────────────────────────

  /** Fresh instance: run the construction script. */
  onInit(): void {
    if (!this._constructionRan) {
      this.runConstruction()
    }
  }

  /** Construction script runs first if init was skipped, then begin-play. */
  onStart(): void {
    if (!this._constructionRan) {
      this.runConstruction()
    }

    const interpreter = this.ensureCompiled()
    if (!interpreter) return
    this.flushEvents(interpreter.runBeginPlay().events)
  }

  onUpdate(dt: number): void {
    const interpreter = this.ensureCompiled()
    if (!interpreter) return
    this.flushEvents(interpreter.tick(dt).events)
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Internals
  // ───────────────────────────────────────────────────────────────────────────

  private runConstruction(): void {
    const interpreter = this.ensureCompiled()
    if (!interpreter) return
    this.flushEvents(interpreter.runConstructionScript().events)
    this._constructionRan = true
  }

  /**
   * Load and compile the asset on first use. A failure is logged once and
   * leaves the script inert until a new asset is set.
   */
  private ensureCompiled(): Interpreter | null {
    if (this.interpreter) return this.interpreter
    if (this._state === 'failed' || !this.asset) return null
    if (this.asset.graphJson.trim() === '') return null

    let compiled: CompiledGraph
    try {
      const result = tryCompile(parseAssetGraph(this.asset))
      if (!result.ok) {
        console.error(`[BlueprintScript] Compile error: ${result.error.message}`)
        this._state = 'failed'
        return null
      }
      compiled = result.compiled
    } catch (e) {
      console.error('[BlueprintScript] Invalid graph payload:', e)
      this._state = 'failed'
      return null
    }

    this.interpreter = new Interpreter(compiled, this.config.interpreter)
    this._state = 'ready'
    return this.interpreter
  }

  private flushEvents(events: ExecutionEvent[]): void {
    for (const event of events) {
      if (event.type === 'Print') {
        this.config.onPrint(event.text)
      }
    }
  }
}
