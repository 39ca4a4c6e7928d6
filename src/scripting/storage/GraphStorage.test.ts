import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { compile } from '../compiler/compile'
import { BlueprintGraph } from '../model/graph'
import { stringValue } from '../model/values'
import { createNode } from '../nodes'
import { DEFAULT_GRAPH_ID } from '../serialization'
import { GraphStorage } from './GraphStorage'

function sampleGraph(id: string): BlueprintGraph {
  const graph = new BlueprintGraph(id)
  const print = createNode('Print')
  print.properties.text = stringValue(`from ${id}`)
  graph.addNode(print)
  return graph
}

describe('GraphStorage', () => {
  let projectDir: string
  let storage: GraphStorage

  beforeEach(async () => {
    projectDir = await mkdtemp(join(tmpdir(), 'blueprint-storage-'))
    storage = new GraphStorage()
    storage.setBasePath(projectDir)
  })

  afterEach(async () => {
    vi.restoreAllMocks()
    await rm(projectDir, { recursive: true, force: true })
  })

  it('should save under the blueprints directory', async () => {
    const path = await storage.save('player', sampleGraph('player'))

    expect(path).toBe(join(projectDir, 'blueprints', 'player.blueprint'))
  })

  it('should load what it saved', async () => {
    const graph = sampleGraph('player')
    await storage.save('player', graph)

    const loaded = await storage.load('player')

    expect(loaded.id).toBe('player')
    expect(compile(loaded)).toEqual(compile(graph))
  })

  it('should accept names with the extension', async () => {
    await storage.save('door.blueprint', sampleGraph('door'))

    expect((await storage.load('door')).id).toBe('door')
  })

  it('should fall back to an empty graph for a missing file', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})

    const loaded = await storage.load('missing')

    expect(loaded.id).toBe(DEFAULT_GRAPH_ID)
    expect(loaded.nodes.size).toBe(0)
    expect(warn).toHaveBeenCalledTimes(1)
  })

  it('should fall back to an empty graph for a malformed file', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    await storage.ensureDirectory()
    await writeFile(storage.pathFor('broken'), 'not json', 'utf-8')

    const loaded = await storage.load('broken')

    expect(loaded.id).toBe(DEFAULT_GRAPH_ID)
    expect(warn).toHaveBeenCalledTimes(1)
  })

  it('should list only blueprint files', async () => {
    await storage.save('a', sampleGraph('a'))
    await storage.save('b', sampleGraph('b'))
    await writeFile(join(storage.getBasePath(), 'notes.txt'), 'ignore me', 'utf-8')

    const names = (await storage.list()).map(entry => entry.name).sort()

    expect(names).toEqual(['a', 'b'])
  })

  it('should remove files', async () => {
    await storage.save('temp', sampleGraph('temp'))

    expect(await storage.remove('temp')).toBe(true)
    expect(await storage.exists('temp')).toBe(false)
    expect(await storage.remove('temp')).toBe(false)
  })

  it('should require a base path', async () => {
    await expect(new GraphStorage().save('x', sampleGraph('x'))).rejects.toThrow(
      'Base path not set. Call setBasePath first.'
    )
  })
})
