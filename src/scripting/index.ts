// ═══════════════════════════════════════════════════════════════════════════
// Blueprint Scripting - Graph model, compiler, interpreter and host glue
// ═══════════════════════════════════════════════════════════════════════════

// Model
export * from './model/values'
export {
  BlueprintGraph,
  BUILTIN_NODE_KINDS,
  CONSTRUCTION_GRAPH,
  defaultGraphs,
  EVENT_GRAPH,
  GRAPH_KINDS,
  pinNamed,
  setProperty,
} from './model/graph'
export type {
  BlueprintGraphParts,
  BuiltinNodeKind,
  GraphDef,
  GraphKind,
  Link,
  Node,
  NodeId,
  Pin,
  PinDirection,
  PinId,
  VariableDef,
} from './model/graph'

// Node catalog
export {
  allNodeDefinitions,
  CATEGORY_LABELS,
  createNode,
  DEFAULT_SCRIPT_CODE,
  definitionsByCategory,
  getNodeDefinition,
  isEntryKind,
  NODE_DEFINITIONS,
  VARIABLE_NAME_PROPERTY,
  VARIABLE_VALUE_PIN,
} from './nodes'
export type { NodeCategory, NodeDefinition, PinDef, PropertyDef } from './nodes'

// Compiler
export * from './compiler'

// Runtime
export * from './runtime'

// Persistence
export {
  assetFromJSON,
  assetToJSON,
  BlueprintAssetSchema,
  createAsset,
  CURRENT_ASSET_VERSION,
  DEFAULT_GRAPH_ID,
  deserializeGraph,
  GraphFormatError,
  graphFromJSON,
  graphToJSON,
  loadAssetGraph,
  parseAssetGraph,
  SerializedGraphSchema,
  serializeGraph,
} from './serialization'
export type { BlueprintAsset, SerializedGraph } from './serialization'
export { BLUEPRINT_EXTENSION, GraphStorage, graphStorage } from './storage/GraphStorage'
export type { GraphListEntry } from './storage/GraphStorage'

// Host
export * from './host'

// Authoring
export { createDefaultGraph, createGraphEditorStore } from './editor/graphEditorStore'
export type { GraphEditorState, GraphEditorStore } from './editor/graphEditorStore'
