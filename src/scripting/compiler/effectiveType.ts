import type { Node, Pin, VariableDef } from '../model/graph'
import type { DataType } from '../model/values'
import { VARIABLE_NAME_PROPERTY, VARIABLE_VALUE_PIN } from '../nodes'

/**
 * Name of the variable a GetVariable/SetVariable node refers to, if its
 * `name` property holds a string.
 */
export function referencedVariable(node: Node): string | undefined {
  if (node.kind !== 'GetVariable' && node.kind !== 'SetVariable') return undefined
  const prop = node.properties[VARIABLE_NAME_PROPERTY]
  return prop?.type === 'String' ? prop.value : undefined
}

/**
 * Type of a pin once the variable override is applied: the `value` pin of a
 * variable node takes the current type of the variable it names. Every other
 * pin keeps its template type, as does a `value` pin naming no known variable.
 */
export function effectiveType(
  variables: readonly VariableDef[],
  node: Node,
  pin: Pin
): DataType {
  if (pin.name !== VARIABLE_VALUE_PIN) return pin.dataType
  const name = referencedVariable(node)
  if (name === undefined) return pin.dataType
  return variables.find(v => v.name === name)?.dataType ?? pin.dataType
}
