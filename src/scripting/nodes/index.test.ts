import { describe, it, expect } from 'vitest'
import { BUILTIN_NODE_KINDS, CONSTRUCTION_GRAPH } from '../model/graph'
import {
  allNodeDefinitions,
  createNode,
  DEFAULT_SCRIPT_CODE,
  definitionsByCategory,
  getNodeDefinition,
  isEntryKind,
} from './index'

const pinSummary = (kind: Parameters<typeof createNode>[0]): string[] =>
  createNode(kind).pins.map(p => `${p.name}:${p.direction}:${p.dataType}`)

describe('node catalog', () => {
  it('should define every built-in kind', () => {
    expect(allNodeDefinitions().map(def => def.kind)).toEqual([...BUILTIN_NODE_KINDS])
  })

  it('should build fixed pin templates', () => {
    expect(pinSummary('Tick')).toEqual(['then:Output:Exec', 'dt:Output:F32'])
    expect(pinSummary('Print')).toEqual(['exec:Input:Exec', 'then:Output:Exec', 'text:Input:String'])
    expect(pinSummary('Branch')).toEqual([
      'exec:Input:Exec',
      'condition:Input:Bool',
      'true:Output:Exec',
      'false:Output:Exec',
    ])
    expect(pinSummary('GetVariable')).toEqual(['value:Output:String'])
    expect(pinSummary('SetVariable')).toEqual([
      'exec:Input:Exec',
      'then:Output:Exec',
      'value:Input:String',
    ])
    expect(pinSummary('GetActorName')).toEqual(['actor:Input:String', 'name:Output:String'])
  })

  it('should fill default properties', () => {
    expect(createNode('Print').properties).toEqual({ text: { type: 'String', value: 'Hello' } })
    expect(createNode('GetVariable').properties).toEqual({ name: { type: 'String', value: '' } })
    expect(createNode('LuaScript').properties).toEqual({
      code: { type: 'String', value: DEFAULT_SCRIPT_CODE },
    })
    expect(createNode('Self').properties).toEqual({})
  })

  it('should place new nodes in the requested partition', () => {
    expect(createNode('ConstructionScript', CONSTRUCTION_GRAPH).graph).toBe(CONSTRUCTION_GRAPH)
    expect(createNode('Print').graph).toBe('EventGraph')
  })

  it('should return independent property objects', () => {
    const a = createNode('Print')
    const b = createNode('Print')
    a.properties.text = { type: 'String', value: 'changed' }

    expect(b.properties.text).toEqual({ type: 'String', value: 'Hello' })
  })

  it('should mark only event nodes as entries', () => {
    const entries = BUILTIN_NODE_KINDS.filter(isEntryKind)
    expect(entries).toEqual(['BeginPlay', 'Tick', 'ConstructionScript'])
  })

  it('should group definitions by category', () => {
    expect(definitionsByCategory('Variable').map(def => def.kind)).toEqual([
      'GetVariable',
      'SetVariable',
    ])
    expect(getNodeDefinition('Branch').category).toBe('FlowControl')
  })
})
