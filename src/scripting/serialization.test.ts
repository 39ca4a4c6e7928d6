// ═══════════════════════════════════════════════════════════════════════════
// Serialization Tests
// ═══════════════════════════════════════════════════════════════════════════

import { describe, it, expect, vi, afterEach } from 'vitest'
import { compile } from './compiler/compile'
import { BlueprintGraph, CONSTRUCTION_GRAPH, pinNamed, type NodeId } from './model/graph'
import { i32Value, stringValue } from './model/values'
import { createNode } from './nodes'
import {
  assetFromJSON,
  assetToJSON,
  createAsset,
  DEFAULT_GRAPH_ID,
  deserializeGraph,
  GraphFormatError,
  graphFromJSON,
  graphToJSON,
  loadAssetGraph,
  parseAssetGraph,
  serializeGraph,
} from './serialization'

// ─────────────────────────────────────────────────────────────────────────────
// Test Fixtures
// ─────────────────────────────────────────────────────────────────────────────

function linkPins(graph: BlueprintGraph, from: NodeId, fromPin: string, to: NodeId, toPin: string): void {
  const fromNode = graph.node(from)
  const toNode = graph.node(to)
  const a = fromNode ? pinNamed(fromNode, fromPin) : undefined
  const b = toNode ? pinNamed(toNode, toPin) : undefined
  if (a === undefined || b === undefined) throw new Error('missing pin')
  graph.addLink({ from: a, to: b })
}

function createTestGraph(): BlueprintGraph {
  const graph = new BlueprintGraph('test-graph')
  graph.variables.push({ name: 'message', dataType: 'String', defaultValue: stringValue('Hi') })
  graph.variables.push({ name: 'count', dataType: 'I32' })

  const begin = graph.addNode(createNode('BeginPlay'))
  const get = graph.addNode(createNode('GetVariable'))
  const print = graph.addNode(createNode('Print'))
  const construction = graph.addNode(createNode('ConstructionScript', CONSTRUCTION_GRAPH))
  const set = graph.addNode(createNode('SetVariable', CONSTRUCTION_GRAPH))

  const getNode = graph.node(get)
  const setNode = graph.node(set)
  if (!getNode || !setNode) throw new Error('missing node')
  getNode.properties.name = stringValue('message')
  getNode.position = [40, 120]
  setNode.properties.name = stringValue('count')
  setNode.properties.value = i32Value(3)

  linkPins(graph, begin, 'then', print, 'exec')
  linkPins(graph, get, 'value', print, 'text')
  linkPins(graph, construction, 'then', set, 'exec')
  return graph
}

afterEach(() => {
  vi.restoreAllMocks()
})

// ─────────────────────────────────────────────────────────────────────────────
// Graph Payload
// ─────────────────────────────────────────────────────────────────────────────

describe('serializeGraph', () => {
  it('should key nodes by id', () => {
    const data = serializeGraph(createTestGraph())

    expect(Object.keys(data.nodes)).toEqual(['1', '2', '3', '4', '5'])
    expect(data.nodes['2'].position).toEqual([40, 120])
    expect(data.nextNodeId).toBe(6)
    expect(data.nextPinId).toBe(10)
  })

  it('should omit absent variable defaults', () => {
    const data = serializeGraph(createTestGraph())

    expect(data.variables).toEqual([
      { name: 'message', dataType: 'String', defaultValue: { type: 'String', value: 'Hi' } },
      { name: 'count', dataType: 'I32' },
    ])
  })
})

describe('deserializeGraph', () => {
  it('should round-trip to an identical compiled graph', () => {
    const graph = createTestGraph()
    const restored = graphFromJSON(graphToJSON(graph))

    expect(compile(restored)).toEqual(compile(graph))
    expect(restored.nextNodeId).toBe(graph.nextNodeId)
    expect(restored.nextPinId).toBe(graph.nextPinId)
    expect(restored.graphs).toEqual(graph.graphs)
  })

  it('should round-trip pretty printed JSON', () => {
    const graph = createTestGraph()
    const json = graphToJSON(graph, true)

    expect(json).toContain('\n  "id": "test-graph"')
    expect(serializeGraph(graphFromJSON(json))).toEqual(serializeGraph(graph))
  })

  it('should fill in partitions missing from older payloads', () => {
    const data = serializeGraph(createTestGraph())
    delete data.graphs

    expect(deserializeGraph(data).graphs.map(g => g.name)).toEqual(['EventGraph', 'ConstructionScript'])
  })

  it('should keep id counters ahead of stored ids', () => {
    const data = serializeGraph(createTestGraph())
    data.nextNodeId = 1
    data.nextPinId = 1

    const graph = deserializeGraph(data)
    expect(graph.nextNodeId).toBe(6)
    expect(graph.nextPinId).toBe(10)
  })

  it('should reject unknown node kinds', () => {
    const data = JSON.parse(graphToJSON(createTestGraph()))
    data.nodes['1'].kind = 'Teleport'

    expect(() => deserializeGraph(data)).toThrow(GraphFormatError)
  })

  it('should reject mismatched node keys', () => {
    const data = serializeGraph(createTestGraph())
    data.nodes['9'] = data.nodes['1']
    delete data.nodes['1']

    expect(() => deserializeGraph(data)).toThrow('Node key 9 does not match node id 1')
  })

  it('should reject malformed JSON', () => {
    expect(() => graphFromJSON('{nope')).toThrow(GraphFormatError)
  })

  it('should reject values with the wrong payload', () => {
    const data = JSON.parse(graphToJSON(createTestGraph()))
    data.variables[0].defaultValue = { type: 'I32', value: 'x' }

    expect(() => deserializeGraph(data)).toThrow(GraphFormatError)
  })

  it('should reject I32 values outside the 32-bit range', () => {
    const data = JSON.parse(graphToJSON(createTestGraph()))
    data.variables[1].defaultValue = { type: 'I32', value: 5000000000 }

    expect(() => deserializeGraph(data)).toThrow(GraphFormatError)
  })

  it('should round F32 values to single precision', () => {
    const data = JSON.parse(graphToJSON(createTestGraph()))
    data.variables.push({ name: 'speed', dataType: 'F32', defaultValue: { type: 'F32', value: 0.1 } })

    const graph = deserializeGraph(data)
    expect(graph.variable('speed')?.defaultValue).toEqual({ type: 'F32', value: Math.fround(0.1) })
  })

  it('should reject pin ids shared between nodes', () => {
    const data = serializeGraph(createTestGraph())
    data.nodes['2'].pins[0].id = 1

    expect(() => deserializeGraph(data)).toThrow('Duplicate pin id 1 on node 2')
  })
})

// ─────────────────────────────────────────────────────────────────────────────
// Asset Envelope
// ─────────────────────────────────────────────────────────────────────────────

describe('blueprint assets', () => {
  it('should wrap the graph payload with a version', () => {
    const graph = createTestGraph()
    const asset = createAsset(graph)

    expect(asset.version).toBe(1)
    expect(asset.graphJson).toBe(graphToJSON(graph))
  })

  it('should round-trip assets through JSON', () => {
    const asset = createAsset(createTestGraph())
    const restored = assetFromJSON(assetToJSON(asset, true))

    expect(restored).toEqual(asset)
    expect(compile(parseAssetGraph(restored))).toEqual(compile(createTestGraph()))
  })

  it('should accept unstamped version 0 assets', () => {
    const graph = createTestGraph()
    const asset = { version: 0, graphJson: graphToJSON(graph) }

    expect(serializeGraph(parseAssetGraph(asset))).toEqual(serializeGraph(graph))
  })

  it('should reject newer asset versions', () => {
    const asset = { version: 2, graphJson: graphToJSON(createTestGraph()) }

    expect(() => parseAssetGraph(asset)).toThrow('Unsupported blueprint asset version: 2')
  })

  it('should reject envelopes without a payload', () => {
    expect(() => assetFromJSON('{"version":1}')).toThrow(GraphFormatError)
  })

  it('should fall back to an empty graph on a bad payload', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})

    const graph = loadAssetGraph({ version: 1, graphJson: '{"id": 3}' })

    expect(graph.id).toBe(DEFAULT_GRAPH_ID)
    expect(graph.nodes.size).toBe(0)
    expect(graph.graphs.map(g => g.name)).toEqual(['EventGraph', 'ConstructionScript'])
    expect(warn).toHaveBeenCalledTimes(1)
  })

  it('should load a valid asset without warnings', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})

    const graph = loadAssetGraph(createAsset(createTestGraph()))

    expect(graph.id).toBe('test-graph')
    expect(warn).not.toHaveBeenCalled()
  })
})
