// =============================================================================
// Graph Storage - Save and load blueprint assets to/from files
// =============================================================================

import { mkdir, readdir, readFile, rm, stat, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import { BlueprintGraph } from '../model/graph'
import {
  assetFromJSON,
  assetToJSON,
  createAsset,
  DEFAULT_GRAPH_ID,
  loadAssetGraph,
} from '../serialization'

export const BLUEPRINT_EXTENSION = '.blueprint'

// -----------------------------------------------------------------------------
// Types
// -----------------------------------------------------------------------------

export interface GraphListEntry {
  /** File name without extension */
  name: string
  path: string
  modifiedAt: number
}

// -----------------------------------------------------------------------------
// Graph Storage Class
// -----------------------------------------------------------------------------

export class GraphStorage {
  private basePath: string = ''

  /**
   * Set the base path for graph storage (project path + /blueprints)
   */
  setBasePath(projectPath: string): void {
    this.basePath = join(projectPath, 'blueprints')
  }

  getBasePath(): string {
    return this.basePath
  }

  /**
   * Ensure the blueprints directory exists
   */
  async ensureDirectory(): Promise<void> {
    if (!this.basePath) {
      throw new Error('Base path not set. Call setBasePath first.')
    }
    await mkdir(this.basePath, { recursive: true })
  }

  pathFor(name: string): string {
    const file = name.endsWith(BLUEPRINT_EXTENSION) ? name : `${name}${BLUEPRINT_EXTENSION}`
    return join(this.basePath, file)
  }

  /**
   * Save a graph wrapped in an asset envelope. Returns the written path.
   */
  async save(name: string, graph: BlueprintGraph): Promise<string> {
    await this.ensureDirectory()
    const path = this.pathFor(name)
    await writeFile(path, assetToJSON(createAsset(graph), true), 'utf-8')
    return path
  }

  /**
   * Load a graph. A missing or unreadable file yields an empty default graph.
   */
  async load(name: string): Promise<BlueprintGraph> {
    const path = this.pathFor(name)

    let content: string
    try {
      content = await readFile(path, 'utf-8')
    } catch (e) {
      console.warn(`[GraphStorage] Failed to read blueprint: ${path}`, e)
      return new BlueprintGraph(DEFAULT_GRAPH_ID)
    }

    try {
      // loadAssetGraph falls back on a bad payload; only the envelope can throw here
      return loadAssetGraph(assetFromJSON(content))
    } catch (e) {
      console.warn(`[GraphStorage] Malformed blueprint asset: ${path}`, e)
      return new BlueprintGraph(DEFAULT_GRAPH_ID)
    }
  }

  /**
   * List saved blueprints, newest first
   */
  async list(): Promise<GraphListEntry[]> {
    await this.ensureDirectory()
    const entries = await readdir(this.basePath)

    const graphs: GraphListEntry[] = []
    for (const entry of entries) {
      if (!entry.endsWith(BLUEPRINT_EXTENSION)) continue
      const path = join(this.basePath, entry)
      const info = await stat(path)
      if (!info.isFile()) continue
      graphs.push({
        name: entry.slice(0, -BLUEPRINT_EXTENSION.length),
        path,
        modifiedAt: info.mtimeMs,
      })
    }

    return graphs.sort((a, b) => b.modifiedAt - a.modifiedAt || a.name.localeCompare(b.name))
  }

  /**
   * Delete a blueprint file. Returns false if it did not exist.
   */
  async remove(name: string): Promise<boolean> {
    const path = this.pathFor(name)
    if (!(await this.exists(name))) return false
    await rm(path)
    return true
  }

  async exists(name: string): Promise<boolean> {
    try {
      const info = await stat(this.pathFor(name))
      return info.isFile()
    } catch {
      return false
    }
  }
}

// -----------------------------------------------------------------------------
// Global Instance
// -----------------------------------------------------------------------------

export const graphStorage = new GraphStorage()
