// ═══════════════════════════════════════════════════════════════════════════
// Graph Serialization - Save/load blueprint graphs and asset envelopes
// ═══════════════════════════════════════════════════════════════════════════

import { z } from 'zod'
import {
  BUILTIN_NODE_KINDS,
  BlueprintGraph,
  defaultGraphs,
  GRAPH_KINDS,
  type Node,
} from './model/graph'
import { DATA_TYPES, isI32 } from './model/values'

// ─────────────────────────────────────────────────────────────────────────────
// Schemas
// ─────────────────────────────────────────────────────────────────────────────

const ValueSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('Bool'), value: z.boolean() }),
  z.object({
    type: z.literal('I32'),
    value: z.number().int().refine(isI32, { message: 'Integer outside the 32-bit range' }),
  }),
  z.object({ type: z.literal('F32'), value: z.number().transform(Math.fround) }),
  z.object({ type: z.literal('String'), value: z.string() }),
  z.object({ type: z.literal('Unit') }),
])

const PinSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  direction: z.enum(['Input', 'Output']),
  dataType: z.enum(DATA_TYPES),
})

const NodeSchema = z.object({
  id: z.number().int(),
  kind: z.enum(BUILTIN_NODE_KINDS),
  graph: z.string(),
  position: z.tuple([z.number(), z.number()]),
  pins: z.array(PinSchema),
  properties: z.record(ValueSchema),
})

const LinkSchema = z.object({
  from: z.number().int(),
  to: z.number().int(),
})

const VariableSchema = z.object({
  name: z.string(),
  dataType: z.enum(DATA_TYPES),
  defaultValue: ValueSchema.optional(),
})

const GraphDefSchema = z.object({
  name: z.string(),
  kind: z.enum(GRAPH_KINDS),
})

export const SerializedGraphSchema = z.object({
  id: z.string(),
  // Payloads written before partitions existed have no `graphs` list
  graphs: z.array(GraphDefSchema).optional(),
  nodes: z.record(NodeSchema),
  links: z.array(LinkSchema),
  variables: z.array(VariableSchema),
  nextNodeId: z.number().int().positive(),
  nextPinId: z.number().int().positive(),
})

export type SerializedGraph = z.infer<typeof SerializedGraphSchema>

export const BlueprintAssetSchema = z.object({
  version: z.number().int(),
  graphJson: z.string(),
})

/** Asset envelope persisted by the host component. */
export type BlueprintAsset = z.infer<typeof BlueprintAssetSchema>

export const CURRENT_ASSET_VERSION = 1

export const DEFAULT_GRAPH_ID = 'blueprint'

export class GraphFormatError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'GraphFormatError'
  }
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '<root>'}: ${issue.message}`)
    .join('; ')
}

// ─────────────────────────────────────────────────────────────────────────────
// Graph Payload
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Serialize a graph to its JSON-safe payload. Nodes are keyed by id and
 * written in ascending id order.
 */
export function serializeGraph(graph: BlueprintGraph): SerializedGraph {
  const parts = graph.toParts()
  const nodes: Record<string, Node> = {}
  for (const node of parts.nodes) {
    nodes[String(node.id)] = node
  }

  return {
    id: parts.id,
    graphs: parts.graphs.map(g => ({ ...g })),
    nodes,
    links: parts.links.map(l => ({ from: l.from, to: l.to })),
    variables: parts.variables.map(v =>
      v.defaultValue
        ? { name: v.name, dataType: v.dataType, defaultValue: v.defaultValue }
        : { name: v.name, dataType: v.dataType }
    ),
    nextNodeId: parts.nextNodeId,
    nextPinId: parts.nextPinId,
  }
}

/**
 * Rebuild a graph from an untrusted payload. Throws GraphFormatError when the
 * payload does not match the schema.
 */
export function deserializeGraph(data: unknown): BlueprintGraph {
  const result = SerializedGraphSchema.safeParse(data)
  if (!result.success) {
    throw new GraphFormatError(`Invalid graph payload: ${describeIssues(result.error)}`)
  }
  const payload = result.data

  const nodes: Node[] = []
  let maxNodeId = 0
  let maxPinId = 0
  const pinIds = new Set<number>()
  for (const [key, node] of Object.entries(payload.nodes)) {
    if (key !== String(node.id)) {
      throw new GraphFormatError(`Node key ${key} does not match node id ${node.id}`)
    }
    nodes.push(node)
    maxNodeId = Math.max(maxNodeId, node.id)
    for (const pin of node.pins) {
      // Pin ids are unique across the whole graph, not per node
      if (pinIds.has(pin.id)) {
        throw new GraphFormatError(`Duplicate pin id ${pin.id} on node ${node.id}`)
      }
      pinIds.add(pin.id)
      maxPinId = Math.max(maxPinId, pin.id)
    }
  }

  const graph = BlueprintGraph.restore({
    id: payload.id,
    graphs: payload.graphs ?? defaultGraphs(),
    nodes,
    links: payload.links,
    variables: payload.variables,
    // Counters never fall behind ids already in use
    nextNodeId: Math.max(payload.nextNodeId, maxNodeId + 1),
    nextPinId: Math.max(payload.nextPinId, maxPinId + 1),
  })
  graph.ensureBuiltinGraphs()
  return graph
}

/**
 * Serialize a graph to a JSON string.
 */
export function graphToJSON(graph: BlueprintGraph, pretty = false): string {
  const serialized = serializeGraph(graph)
  return pretty ? JSON.stringify(serialized, null, 2) : JSON.stringify(serialized)
}

/**
 * Deserialize a graph from a JSON string.
 */
export function graphFromJSON(json: string): BlueprintGraph {
  let parsed: unknown
  try {
    parsed = JSON.parse(json)
  } catch (e) {
    throw new GraphFormatError(`Graph payload is not valid JSON: ${e instanceof Error ? e.message : String(e)}`)
  }
  return deserializeGraph(parsed)
}

// ─────────────────────────────────────────────────────────────────────────────
// Asset Envelope
// ─────────────────────────────────────────────────────────────────────────────

export function createAsset(graph: BlueprintGraph): BlueprintAsset {
  return { version: CURRENT_ASSET_VERSION, graphJson: graphToJSON(graph) }
}

/**
 * Parse the graph held by an asset. Throws GraphFormatError on an unknown
 * version or a bad payload.
 */
export function parseAssetGraph(asset: BlueprintAsset): BlueprintGraph {
  const migrated = migrateAsset(asset)
  return graphFromJSON(migrated.graphJson)
}

/**
 * Like parseAssetGraph, but never throws: any failure is logged and an empty
 * default graph is returned instead.
 */
export function loadAssetGraph(asset: BlueprintAsset): BlueprintGraph {
  try {
    return parseAssetGraph(asset)
  } catch (e) {
    console.warn(
      `[Serialization] Failed to load blueprint asset, using empty graph: ${e instanceof Error ? e.message : String(e)}`
    )
    return new BlueprintGraph(DEFAULT_GRAPH_ID)
  }
}

export function assetToJSON(asset: BlueprintAsset, pretty = false): string {
  return pretty ? JSON.stringify(asset, null, 2) : JSON.stringify(asset)
}

export function assetFromJSON(json: string): BlueprintAsset {
  let parsed: unknown
  try {
    parsed = JSON.parse(json)
  } catch (e) {
    throw new GraphFormatError(`Asset is not valid JSON: ${e instanceof Error ? e.message : String(e)}`)
  }
  const result = BlueprintAssetSchema.safeParse(parsed)
  if (!result.success) {
    throw new GraphFormatError(`Invalid blueprint asset: ${describeIssues(result.error)}`)
  }
  return result.data
}

// ─────────────────────────────────────────────────────────────────────────────
// Migration
// ─────────────────────────────────────────────────────────────────────────────

function migrateAsset(asset: BlueprintAsset): BlueprintAsset {
  if (asset.version > CURRENT_ASSET_VERSION) {
    throw new GraphFormatError(`Unsupported blueprint asset version: ${asset.version}`)
  }

  // Version 0 assets carry the same payload under an unstamped envelope
  if (asset.version < 1) {
    return { ...asset, version: 1 }
  }

  return asset
}
